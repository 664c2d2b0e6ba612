import { Module } from '@nestjs/common';
import { CallbackDispatcherService } from './callback-dispatcher.service';
import { ReportBuilderService } from './report-builder.service';

@Module({
  providers: [ReportBuilderService, CallbackDispatcherService],
  exports: [ReportBuilderService, CallbackDispatcherService],
})
export class ReportingModule {}
