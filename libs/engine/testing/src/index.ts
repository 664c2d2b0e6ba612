export * from './lib/mock-session';
export * from './lib/mock-config';
export * from './lib/mock-turn-context';
