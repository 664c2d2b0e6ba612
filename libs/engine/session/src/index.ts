// Interfaces
export * from './lib/interfaces';

// Repositories
export * from './lib/repositories/in-memory-session.repository';

// Services
export * from './lib/session-store.service';

// Module
export * from './lib/session-store.module';
