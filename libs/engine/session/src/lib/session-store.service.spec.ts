/**
 * SessionStoreService Tests
 * Tests for session creation and one-way state transitions
 */

import { Test, TestingModule } from '@nestjs/testing';
import { honeypotConfig } from '@decoy-agent/shared/config';
import {
  ConversationStage,
  DetectionState,
  PersonaId,
  ScamType,
  SenderRole,
  TurnPath,
} from '@decoy-agent/shared/types';
import { createMockSession, createTestConfig } from '@decoy-agent/engine/testing';
import { ISessionRepository, SESSION_REPOSITORY } from './interfaces';
import { SessionStoreService } from './session-store.service';

describe('SessionStoreService', () => {
  let store: SessionStoreService;
  let sessionRepository: jest.Mocked<ISessionRepository>;

  beforeEach(async () => {
    const mockRepo = {
      getSession: jest.fn(),
      saveSession: jest.fn(),
      cleanupReportedSessions: jest.fn(() => 0),
      getAllSessions: jest.fn(() => []),
      count: jest.fn(() => 0),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SessionStoreService,
        { provide: SESSION_REPOSITORY, useValue: mockRepo },
        { provide: honeypotConfig.KEY, useValue: createTestConfig() },
      ],
    }).compile();

    store = module.get<SessionStoreService>(SessionStoreService);
    sessionRepository = module.get(SESSION_REPOSITORY);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('getOrCreate', () => {
    it('should return an existing session untouched', () => {
      const existing = createMockSession({ messageCount: 4 });
      sessionRepository.getSession.mockReturnValue(existing);

      const result = store.getOrCreate('session-001', {
        history: [{ sender: SenderRole.SCAMMER, text: 'ignored', timestamp: 1 }],
      });

      expect(result).toBe(existing);
      expect(result.history).toEqual([]);
      expect(sessionRepository.saveSession).not.toHaveBeenCalled();
    });

    it('should create a session in its initial state', () => {
      sessionRepository.getSession.mockReturnValue(null);

      const result = store.getOrCreate('new-session', { metadata: { channel: 'SMS' } });

      expect(result).toMatchObject({
        sessionId: 'new-session',
        stage: ConversationStage.INITIAL_HOOK,
        persona: null,
        scamType: null,
        detectionState: DetectionState.NOT_DETECTED,
        messageCount: 0,
        terminated: false,
        reportEmitted: false,
        metadata: { channel: 'SMS' },
      });
      expect(sessionRepository.saveSession).toHaveBeenCalledWith(result);
    });

    it('should seed prior history without counting it as processed messages', () => {
      sessionRepository.getSession.mockReturnValue(null);
      const history = [
        { sender: SenderRole.SCAMMER, text: 'Your KYC is pending', timestamp: 1 },
        { sender: SenderRole.USER, text: 'What KYC?', timestamp: 2 },
      ];

      const result = store.getOrCreate('seeded', { history });

      expect(result.history).toEqual(history);
      expect(result.history).not.toBe(history);
      expect(result.messageCount).toBe(0);
    });
  });

  it('should count each inbound message exactly once', () => {
    const session = createMockSession();

    store.recordInbound(session, 'first', 1);
    store.recordReply(session, 'Who is this?', 2);
    store.recordInbound(session, 'second', 3);

    expect(session.messageCount).toBe(2);
    expect(session.history.map((t) => t.sender)).toEqual([
      SenderRole.SCAMMER,
      SenderRole.USER,
      SenderRole.SCAMMER,
    ]);
    expect(store.scammerMessages(session)).toEqual(['first', 'second']);
  });

  it('should never move the stage backwards', () => {
    const session = createMockSession({ stage: ConversationStage.RESISTANCE });

    store.advanceStage(session, ConversationStage.ENGAGEMENT);
    expect(session.stage).toBe(ConversationStage.RESISTANCE);

    store.advanceStage(session, ConversationStage.INTELLIGENCE_MINING);
    expect(session.stage).toBe(ConversationStage.INTELLIGENCE_MINING);
  });

  it('should lock persona and scam type on first assignment', () => {
    const session = createMockSession();

    expect(store.lockPersona(session, PersonaId.CURIOUS_STUDENT)).toBe(PersonaId.CURIOUS_STUDENT);
    expect(store.lockPersona(session, PersonaId.ELDERLY_CONFUSED)).toBe(PersonaId.CURIOUS_STUDENT);
    expect(store.lockScamType(session, ScamType.LOTTERY)).toBe(ScamType.LOTTERY);
    expect(store.lockScamType(session, ScamType.PHISHING)).toBe(ScamType.LOTTERY);
    expect(session.persona).toBe(PersonaId.CURIOUS_STUDENT);
    expect(session.scamType).toBe(ScamType.LOTTERY);
  });

  it('should keep the highest confidence and a positive verdict', () => {
    const session = createMockSession();

    store.recordDetection(session, 0.8, true);
    store.recordDetection(session, 0.3, false);

    expect(session.detectionConfidence).toBe(0.8);
    expect(session.scamDetected).toBe(true);
    expect(session.detectionState).toBe(DetectionState.DETECTED);

    store.markEngaged(session);
    expect(session.detectionState).toBe(DetectionState.ENGAGED);
  });

  it('should merge intelligence idempotently', () => {
    const session = createMockSession();
    const delta = { upiIds: ['fraud1@ybl'], phoneNumbers: ['9876543210'] };

    expect(store.mergeIntelligence(session, delta)).toBe(2);
    expect(store.mergeIntelligence(session, delta)).toBe(0);
    expect(session.intelligence.upiIds).toEqual(['fraud1@ybl']);
  });

  it('should track turns per path', () => {
    const session = createMockSession();

    store.recordTurnMetrics(session, TurnPath.LLM, 420);
    store.recordTurnMetrics(session, TurnPath.FALLBACK, 0);

    expect(session.metrics).toEqual({ llmTurns: 1, fallbackTurns: 1, tokensUsed: 420 });
  });

  it('should report a session only once', () => {
    const session = createMockSession();

    store.markTerminated(session);

    expect(session.detectionState).toBe(DetectionState.TERMINATED);
    expect(store.markReported(session)).toBe(true);
    expect(store.markReported(session)).toBe(false);
  });

  it('should sweep reported sessions past the grace period', () => {
    sessionRepository.cleanupReportedSessions.mockReturnValue(3);
    const before = Date.now();

    expect(store.sweepReportedSessions()).toBe(3);

    const [cutoff] = sessionRepository.cleanupReportedSessions.mock.calls[0];
    expect(cutoff.getTime()).toBeLessThanOrEqual(before - 10 * 60 * 1000 + 1000);
  });
});
