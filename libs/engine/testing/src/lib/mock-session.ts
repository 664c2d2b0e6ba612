import {
  DetectionState,
  FIRST_STAGE,
  HoneypotSession,
} from '@decoy-agent/shared/types';
import { emptyIntelligence } from '@decoy-agent/engine/extraction';
import { defaultProfile } from '@decoy-agent/engine/profiling';

/**
 * Factory for a fresh session in its initial state
 */
export const createMockSession = (overrides: Partial<HoneypotSession> = {}): HoneypotSession => ({
  sessionId: 'session-001',
  history: [],
  stage: FIRST_STAGE,
  persona: null,
  scamType: null,
  detectionState: DetectionState.NOT_DETECTED,
  detectionConfidence: 0,
  scamDetected: false,
  intelligence: emptyIntelligence(),
  messageCount: 0,
  profile: defaultProfile(),
  terminated: false,
  reportEmitted: false,
  metrics: { llmTurns: 0, fallbackTurns: 0, tokensUsed: 0 },
  metadata: {},
  createdAt: new Date('2025-01-01T00:00:00Z'),
  lastActivityAt: new Date('2025-01-01T00:00:00Z'),
  ...overrides,
});
