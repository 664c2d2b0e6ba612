export * from './lib/honeypot.config';
