import { Module } from '@nestjs/common';
import { PersonaSelectorService } from './personas/persona-selector.service';
import { StageTrackerService } from './stages/stage-tracker.service';
import { ReplyTemplateService } from './templates/reply-templates.service';

@Module({
  providers: [StageTrackerService, PersonaSelectorService, ReplyTemplateService],
  exports: [StageTrackerService, PersonaSelectorService, ReplyTemplateService],
})
export class StrategyModule {}
