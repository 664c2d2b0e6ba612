export * from './lib/rate-gate';
export * from './lib/per-key-lock';
export * from './lib/errors';
