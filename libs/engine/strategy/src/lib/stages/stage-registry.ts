import { ConversationStage, ConversationStageLabel } from '@decoy-agent/shared/types';

export type StageKey =
  | 'initial_hook'
  | 'engagement'
  | 'information_probe'
  | 'resistance'
  | 'gradual_compliance'
  | 'intelligence_mining'
  | 'prolongation';

export interface StageConfig {
  stage: ConversationStage;
  key: StageKey;
  label: string;
  /** Steer for the reply generator while in this stage */
  tacticHint: string;
  /** Share of key intelligence categories expected by this stage */
  completenessTarget: number;
}

/**
 * Stage Configuration Registry
 *
 * One entry per stage, keyed exhaustively so adding a stage is a
 * compile-time change here and in the reply template table.
 */
export const STAGE_CONFIGS: Record<ConversationStage, StageConfig> = {
  [ConversationStage.INITIAL_HOOK]: {
    stage: ConversationStage.INITIAL_HOOK,
    key: 'initial_hook',
    label: ConversationStageLabel[ConversationStage.INITIAL_HOOK],
    tacticHint: 'React with worry and surprise, ask who they are and what happened',
    completenessTarget: 0,
  },
  [ConversationStage.ENGAGEMENT]: {
    stage: ConversationStage.ENGAGEMENT,
    key: 'engagement',
    label: ConversationStageLabel[ConversationStage.ENGAGEMENT],
    tacticHint: 'Show interest and trust, ask what you need to do next',
    completenessTarget: 0,
  },
  [ConversationStage.INFORMATION_PROBE]: {
    stage: ConversationStage.INFORMATION_PROBE,
    key: 'information_probe',
    label: ConversationStageLabel[ConversationStage.INFORMATION_PROBE],
    tacticHint: 'Feign confusion, ask which account or number they mean',
    completenessTarget: 0.25,
  },
  [ConversationStage.RESISTANCE]: {
    stage: ConversationStage.RESISTANCE,
    key: 'resistance',
    label: ConversationStageLabel[ConversationStage.RESISTANCE],
    tacticHint: 'Hesitate a little, ask them to prove they are genuine with an official number or ID',
    completenessTarget: 0.25,
  },
  [ConversationStage.GRADUAL_COMPLIANCE]: {
    stage: ConversationStage.GRADUAL_COMPLIANCE,
    key: 'gradual_compliance',
    label: ConversationStageLabel[ConversationStage.GRADUAL_COMPLIANCE],
    tacticHint: 'Agree to cooperate but ask exactly where and how to send',
    completenessTarget: 0.5,
  },
  [ConversationStage.INTELLIGENCE_MINING]: {
    stage: ConversationStage.INTELLIGENCE_MINING,
    key: 'intelligence_mining',
    label: ConversationStageLabel[ConversationStage.INTELLIGENCE_MINING],
    tacticHint: 'Act ready to pay, ask for their payment details to complete it',
    completenessTarget: 0.75,
  },
  [ConversationStage.PROLONGATION]: {
    stage: ConversationStage.PROLONGATION,
    key: 'prolongation',
    label: ConversationStageLabel[ConversationStage.PROLONGATION],
    tacticHint: 'Stall with small problems like a failed payment or low balance, keep them talking',
    completenessTarget: 0.75,
  },
};

export function getStageConfig(stage: ConversationStage): StageConfig {
  return STAGE_CONFIGS[stage];
}
