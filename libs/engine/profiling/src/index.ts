export * from './lib/profiler.service';
export * from './lib/profiling.module';
