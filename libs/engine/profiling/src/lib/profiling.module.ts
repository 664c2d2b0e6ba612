import { Module } from '@nestjs/common';
import { ProfilerService } from './profiler.service';

@Module({
  providers: [ProfilerService],
  exports: [ProfilerService],
})
export class ProfilingModule {}
