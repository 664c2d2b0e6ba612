import {
  ConversationStage,
  ConversationTurn,
  FallbackReason,
  Intelligence,
  PersonaId,
  ScamType,
  TurnPath,
} from '@decoy-agent/shared/types';

/**
 * Everything a strategy needs to answer one inbound message. Built by the
 * engine from the session; strategies never touch the session itself.
 */
export interface TurnContext {
  sessionId: string;
  message: string;
  /** Inbound messages processed so far, this one included */
  messageCount: number;
  /** Turns before the current message */
  history: readonly ConversationTurn[];
  stage: ConversationStage;
  /** Locked persona, or the provisional voice before detection */
  persona: PersonaId;
  scamDetected: boolean;
  terminated: boolean;
  /** Intelligence gathered before this message */
  intelligence: Intelligence;
  tacticHint: string;
}

/**
 * Shared output contract of both paths.
 */
export interface TurnOutcome {
  path: TurnPath;
  isScam: boolean;
  confidence: number;
  scamType: ScamType;
  /** Intelligence found in this message only */
  intelligence: Intelligence;
  reply: string;
  tokensUsed: number;
  fallbackReason?: FallbackReason;
}

export type TurnAttempt =
  | { kind: 'completed'; outcome: TurnOutcome }
  | { kind: 'failed'; reason: FallbackReason; detail: string; tokensUsed: number };

export interface TurnStrategy {
  readonly path: TurnPath;
  run(context: TurnContext): Promise<TurnAttempt>;
}
