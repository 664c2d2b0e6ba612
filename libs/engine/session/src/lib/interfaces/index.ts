export * from './session-repository.interface';
