import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { honeypotConfig } from '@decoy-agent/shared/config';
import {
  ConversationStage,
  ConversationTurn,
  DetectionState,
  FIRST_STAGE,
  HoneypotSession,
  Intelligence,
  PersonaId,
  ScamType,
  ScammerProfile,
  SenderRole,
  TransportMetadata,
  TurnPath,
} from '@decoy-agent/shared/types';
import { emptyIntelligence, mergeIntelligence } from '@decoy-agent/engine/extraction';
import { defaultProfile } from '@decoy-agent/engine/profiling';
import { ISessionRepository, SESSION_REPOSITORY } from './interfaces';

export interface SessionSeed {
  /** Turns the transport already exchanged before this service saw the session */
  history?: ConversationTurn[];
  metadata?: TransportMetadata;
}

/**
 * Owns every session's state. Other components receive a session for the
 * duration of one message and hand it back through these methods; nothing
 * else keeps a reference between messages.
 *
 * Mutators change the session in place. Call `save` once the message is
 * processed to persist it and restart its idle timeout.
 */
@Injectable()
export class SessionStoreService {
  private readonly logger = new Logger(SessionStoreService.name);

  constructor(
    @Inject(SESSION_REPOSITORY)
    private readonly sessionRepository: ISessionRepository,
    @Inject(honeypotConfig.KEY)
    private readonly config: ConfigType<typeof honeypotConfig>
  ) {}

  /**
   * Get the session for `sessionId`, creating it on first contact.
   * A seed only applies to a newly created session.
   */
  getOrCreate(sessionId: string, seed: SessionSeed = {}): HoneypotSession {
    const existing = this.sessionRepository.getSession(sessionId);
    if (existing) {
      return existing;
    }

    const now = new Date();
    const session: HoneypotSession = {
      sessionId,
      history: (seed.history ?? []).map((turn) => ({ ...turn })),
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
      metadata: { ...seed.metadata },
      createdAt: now,
      lastActivityAt: now,
    };

    this.logger.log(
      `Created session ${sessionId}` +
        (session.history.length > 0 ? ` with ${session.history.length} prior turns` : '')
    );
    this.sessionRepository.saveSession(session);
    return session;
  }

  get(sessionId: string): HoneypotSession | null {
    return this.sessionRepository.getSession(sessionId);
  }

  /**
   * Scammer messages already in the history, oldest first.
   */
  scammerMessages(session: HoneypotSession): string[] {
    return session.history.filter((t) => t.sender === SenderRole.SCAMMER).map((t) => t.text);
  }

  recordInbound(session: HoneypotSession, text: string, timestamp: number): void {
    session.history.push({ sender: SenderRole.SCAMMER, text, timestamp });
    session.messageCount += 1;
    session.lastActivityAt = new Date();
  }

  recordReply(session: HoneypotSession, text: string, timestamp = Date.now()): void {
    session.history.push({ sender: SenderRole.USER, text, timestamp });
    session.lastActivityAt = new Date();
  }

  updateProfile(session: HoneypotSession, profile: ScammerProfile): void {
    session.profile = profile;
  }

  /** Stages only move forward; a lower stage is ignored. */
  advanceStage(session: HoneypotSession, stage: ConversationStage): void {
    session.stage = Math.max(session.stage, stage);
  }

  /** Locks the persona on first call; later calls return the locked one. */
  lockPersona(session: HoneypotSession, persona: PersonaId): PersonaId {
    if (session.persona !== null) {
      return session.persona;
    }
    session.persona = persona;
    this.logger.log(`[${session.sessionId}] Persona locked: ${persona}`);
    return persona;
  }

  /** Locks the scam category on first call; later calls return the locked one. */
  lockScamType(session: HoneypotSession, scamType: ScamType): ScamType {
    if (session.scamType !== null) {
      return session.scamType;
    }
    session.scamType = scamType;
    return scamType;
  }

  /**
   * Record a detection verdict. Confidence keeps its highest value and a
   * positive verdict is never withdrawn.
   */
  recordDetection(session: HoneypotSession, confidence: number, detected: boolean): void {
    session.detectionConfidence = Math.max(session.detectionConfidence, confidence);
    if (detected && !session.scamDetected) {
      session.scamDetected = true;
      if (!session.terminated) {
        session.detectionState = DetectionState.DETECTED;
      }
    }
  }

  markEngaged(session: HoneypotSession): void {
    if (session.detectionState === DetectionState.DETECTED) {
      session.detectionState = DetectionState.ENGAGED;
    }
  }

  mergeIntelligence(session: HoneypotSession, delta: Partial<Intelligence>): number {
    return mergeIntelligence(session.intelligence, delta);
  }

  recordTurnMetrics(session: HoneypotSession, path: TurnPath, tokensUsed: number): void {
    if (path === TurnPath.LLM) {
      session.metrics.llmTurns += 1;
    } else {
      session.metrics.fallbackTurns += 1;
    }
    session.metrics.tokensUsed += tokensUsed;
  }

  markTerminated(session: HoneypotSession): void {
    if (!session.terminated) {
      session.terminated = true;
      session.detectionState = DetectionState.TERMINATED;
      this.logger.log(`[${session.sessionId}] Terminated after ${session.messageCount} messages`);
    }
  }

  /**
   * Flag the session as reported. Returns false when it already was, so the
   * caller can skip a second report.
   */
  markReported(session: HoneypotSession): boolean {
    if (session.reportEmitted) {
      return false;
    }
    session.reportEmitted = true;
    return true;
  }

  save(session: HoneypotSession): void {
    this.sessionRepository.saveSession(session);
  }

  activeCount(): number {
    return this.sessionRepository.count();
  }

  /**
   * Drop reported sessions once their grace period has passed.
   * Idle sessions expire on their own through the repository's TTL.
   */
  @Cron(CronExpression.EVERY_10_MINUTES)
  sweepReportedSessions(): number {
    const cutoff = new Date(Date.now() - this.config.session.reportedGraceMs);
    const removed = this.sessionRepository.cleanupReportedSessions(cutoff);
    if (removed > 0) {
      this.logger.log(`Swept ${removed} reported sessions`);
    }
    return removed;
  }
}
