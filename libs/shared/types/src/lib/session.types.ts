import {
  ConversationStage,
  DetectionState,
  PersonaId,
  ScamType,
  SenderRole,
} from './enums';
import { Intelligence } from './intelligence.types';
import { ScammerProfile } from './profile.types';

export interface ConversationTurn {
  sender: SenderRole;
  text: string;
  /** Epoch milliseconds */
  timestamp: number;
}

export interface TransportMetadata {
  channel?: string;
  language?: string;
  locale?: string;
}

export interface SessionMetrics {
  llmTurns: number;
  fallbackTurns: number;
  tokensUsed: number;
}

/**
 * One continuous exchange with a single remote sender.
 *
 * `persona` and `scamType` are written at most once. `stage` and
 * `messageCount` only move forward.
 */
export interface HoneypotSession {
  sessionId: string;
  history: ConversationTurn[];
  stage: ConversationStage;
  persona: PersonaId | null;
  scamType: ScamType | null;
  detectionState: DetectionState;
  detectionConfidence: number;
  scamDetected: boolean;
  intelligence: Intelligence;
  /** Inbound scammer messages processed in this session */
  messageCount: number;
  profile: ScammerProfile;
  terminated: boolean;
  reportEmitted: boolean;
  metrics: SessionMetrics;
  metadata: TransportMetadata;
  createdAt: Date;
  lastActivityAt: Date;
}
