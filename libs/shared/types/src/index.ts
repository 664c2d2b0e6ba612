export * from './lib/enums';
export * from './lib/intelligence.types';
export * from './lib/profile.types';
export * from './lib/session.types';
export * from './lib/report.types';
