import {
  ConversationStage,
  Intelligence,
  KeyIntelligenceField,
} from '@decoy-agent/shared/types';
import { intelligenceCompleteness, missingCategories } from '@decoy-agent/engine/extraction';
import { getStageConfig } from './stage-registry';

/** Past this message number gap directives stop being subtle. */
export const SUBTLE_UNTIL_MESSAGE = 8;

interface GapDirective {
  subtle: string;
  direct: string;
}

export const GAP_DIRECTIVES: Record<KeyIntelligenceField, GapDirective> = {
  upiIds: {
    subtle: 'Mention you use GPay or PhonePe and wonder which UPI ID to send to',
    direct: 'Ask directly for their UPI ID so you can send the money now',
  },
  bankAccounts: {
    subtle: 'Say the UPI app is failing and a bank transfer might be easier',
    direct: 'Ask for their account number and IFSC code to do a bank transfer',
  },
  phishingLinks: {
    subtle: 'Say you cannot find the page they mean on the official site',
    direct: 'Ask them to send the exact link or website you should open',
  },
  phoneNumbers: {
    subtle: 'Say the chat is confusing and a call might be easier',
    direct: 'Ask for a number you can call them back on',
  },
};

export const BACKUP_DIRECTIVE =
  'You have their payment details: ask for a backup account or another UPI ID in case this one fails';

export interface IntelGapAnalysis {
  completeness: number;
  target: number;
  /** Completeness below the stage target */
  hasGap: boolean;
  missing: KeyIntelligenceField[];
  priority: KeyIntelligenceField | null;
  directive: string;
}

/**
 * Compare what has been extracted against the stage's target and name the
 * next category to go after.
 */
export function analyzeIntelGap(
  intel: Intelligence,
  stage: ConversationStage,
  messageCount: number
): IntelGapAnalysis {
  const completeness = intelligenceCompleteness(intel);
  const target = getStageConfig(stage).completenessTarget;
  const missing = missingCategories(intel);
  const priority = missing.length > 0 ? missing[0] : null;

  let directive = BACKUP_DIRECTIVE;
  if (priority) {
    const { subtle, direct } = GAP_DIRECTIVES[priority];
    directive = messageCount < SUBTLE_UNTIL_MESSAGE ? subtle : direct;
  }

  return {
    completeness,
    target,
    hasGap: completeness < target,
    missing,
    priority,
    directive,
  };
}
