import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { honeypotConfig } from '@decoy-agent/shared/config';
import {
  ConversationStage,
  ConversationStageLabel,
  FIRST_STAGE,
  Intelligence,
  LAST_STAGE,
  TerminationReason,
} from '@decoy-agent/shared/types';
import { intelligenceScore } from '@decoy-agent/engine/extraction';
import { analyzeIntelGap } from './intel-gap';
import { getStageConfig } from './stage-registry';

/** Patience below this pushes the conversation toward compliance. */
export const LOW_PATIENCE = 0.4;
/** Intel Gap only forces mining once the conversation is past this many messages. */
export const INTEL_GAP_AFTER = 5;
const MESSAGES_PER_STAGE = 2;

export interface StageInputs {
  messageCount: number;
  completeness: number;
  patience: number;
}

export type TerminationCheck =
  | { terminate: false }
  | { terminate: true; reason: TerminationReason; score: number };

@Injectable()
export class StageTrackerService {
  private readonly logger = new Logger(StageTrackerService.name);

  constructor(
    @Inject(honeypotConfig.KEY)
    private readonly config: ConfigType<typeof honeypotConfig>
  ) {}

  /**
   * Stage for the conversation after `messageCount` scammer messages.
   * Never lower than `previous`.
   */
  nextStage(previous: ConversationStage, inputs: StageInputs): ConversationStage {
    const { messageCount, completeness, patience } = inputs;
    const base = this.baseStage(messageCount);
    let candidate = base;

    if (patience < LOW_PATIENCE && messageCount >= 3) {
      candidate = Math.max(candidate, ConversationStage.GRADUAL_COMPLIANCE);
    }

    if (messageCount > INTEL_GAP_AFTER && completeness < getStageConfig(base).completenessTarget) {
      candidate = Math.max(candidate, ConversationStage.INTELLIGENCE_MINING);
    }

    const next: ConversationStage = Math.max(previous, candidate);
    if (next !== previous) {
      this.logger.debug(
        `Stage ${ConversationStageLabel[previous]} -> ${ConversationStageLabel[next]} at message ${messageCount}`
      );
    }
    return next;
  }

  baseStage(messageCount: number): ConversationStage {
    const steps = Math.floor(Math.max(0, messageCount - 1) / MESSAGES_PER_STAGE);
    return Math.min(LAST_STAGE, FIRST_STAGE + steps);
  }

  /**
   * Steer text for the current stage. Intelligence Mining adds the directive
   * for the most wanted missing category.
   */
  tacticHint(
    stage: ConversationStage,
    intel: Intelligence,
    messageCount: number,
    profileHint?: string
  ): string {
    const parts = [getStageConfig(stage).tacticHint];

    if (stage === ConversationStage.INTELLIGENCE_MINING) {
      parts.push(analyzeIntelGap(intel, stage, messageCount).directive);
    }
    if (profileHint) {
      parts.push(profileHint);
    }

    return parts.join('. ');
  }

  shouldTerminate(messageCount: number, intel: Intelligence): TerminationCheck {
    const { maxMessages, intelScoreThreshold } = this.config.engagement;
    const score = intelligenceScore(intel);

    if (score >= intelScoreThreshold) {
      return { terminate: true, reason: 'intelligence_threshold', score };
    }
    if (messageCount >= maxMessages) {
      return { terminate: true, reason: 'message_limit', score };
    }
    return { terminate: false };
  }
}
