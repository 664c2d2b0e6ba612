import { Intelligence } from './intelligence.types';

/**
 * Payload posted to the evaluation endpoint once per session.
 */
export interface FinalReport {
  sessionId: string;
  scamDetected: boolean;
  totalMessagesExchanged: number;
  extractedIntelligence: Intelligence;
  agentNotes: string;
}

// ============================================================================
// Domain Events
// ============================================================================

export const EngagementEvent = {
  TERMINATED: 'engagement.terminated',
} as const;

export interface EngagementTerminatedEvent {
  sessionId: string;
  reason: TerminationReason;
  report: FinalReport;
}

export type TerminationReason = 'message_limit' | 'intelligence_threshold';
