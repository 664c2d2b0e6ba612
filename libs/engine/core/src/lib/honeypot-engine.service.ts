import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { honeypotConfig } from '@decoy-agent/shared/config';
import {
  ConversationStage,
  ConversationTurn,
  EngagementEvent,
  EngagementTerminatedEvent,
  HoneypotSession,
  PersonaId,
  TransportMetadata,
  TurnPath,
} from '@decoy-agent/shared/types';
import { PerKeyLock } from '@decoy-agent/shared/utils';
import { intelligenceCompleteness } from '@decoy-agent/engine/extraction';
import { ProfilerService } from '@decoy-agent/engine/profiling';
import { PersonaSelectorService, StageTrackerService } from '@decoy-agent/engine/strategy';
import { SessionStoreService } from '@decoy-agent/engine/session';
import { ReportBuilderService } from '@decoy-agent/engine/reporting';
import { quickScamType } from './detection/keyword-detector';
import { OrchestratorService } from './orchestrator.service';
import { TurnContext } from './strategies/turn-strategy.interface';

export interface InboundMessage {
  sessionId: string;
  text: string;
  /** Epoch milliseconds */
  timestamp: number;
  conversationHistory?: ConversationTurn[];
  metadata?: TransportMetadata;
}

export interface EngineReply {
  sessionId: string;
  reply: string;
  stage: ConversationStage;
  scamDetected: boolean;
  terminated: boolean;
  path: TurnPath;
}

/**
 * Per-message pipeline. Messages for one session run strictly one at a time;
 * different sessions run in parallel.
 */
@Injectable()
export class HoneypotEngineService implements OnModuleDestroy {
  private readonly logger = new Logger(HoneypotEngineService.name);
  private readonly sessionLocks = new PerKeyLock<string>();

  constructor(
    private readonly sessionStore: SessionStoreService,
    private readonly profiler: ProfilerService,
    private readonly stageTracker: StageTrackerService,
    private readonly personaSelector: PersonaSelectorService,
    private readonly orchestrator: OrchestratorService,
    private readonly reportBuilder: ReportBuilderService,
    private readonly eventEmitter: EventEmitter2,
    @Inject(honeypotConfig.KEY)
    private readonly config: ConfigType<typeof honeypotConfig>
  ) {}

  handleMessage(message: InboundMessage): Promise<EngineReply> {
    return this.sessionLocks.runExclusive(message.sessionId, () => this.process(message));
  }

  /** Lets messages already in flight finish before the app stops. */
  async onModuleDestroy(): Promise<void> {
    const pending = this.sessionLocks.activeCount;
    if (pending > 0) {
      this.logger.log(`Waiting for ${pending} sessions to finish their current message`);
    }
    await this.sessionLocks.drain();
  }

  /** Sessions with a message currently in flight. */
  inFlight(): number {
    return this.sessionLocks.activeCount;
  }

  private async process(message: InboundMessage): Promise<EngineReply> {
    const session = this.sessionStore.getOrCreate(message.sessionId, {
      history: message.conversationHistory,
      metadata: message.metadata,
    });
    const priorHistory = [...session.history];
    const priorScammerMessages = this.sessionStore.scammerMessages(session);

    this.sessionStore.recordInbound(session, message.text, message.timestamp);

    if (!session.terminated) {
      this.advance(session, priorScammerMessages, message.text);
    }

    const scammerMessages = [...priorScammerMessages, message.text];
    const voice = session.persona ?? this.provisionalPersona(scammerMessages);
    const context: TurnContext = {
      sessionId: session.sessionId,
      message: message.text,
      messageCount: session.messageCount,
      history: priorHistory,
      stage: session.stage,
      persona: voice,
      scamDetected: session.scamDetected,
      terminated: session.terminated,
      intelligence: session.intelligence,
      tacticHint: this.stageTracker.tacticHint(
        session.stage,
        session.intelligence,
        session.messageCount,
        this.profileHint(session, scammerMessages)
      ),
    };

    const outcome = await this.orchestrator.process(context);

    if (!session.terminated) {
      const wasDetected = session.scamDetected;
      this.sessionStore.recordDetection(
        session,
        outcome.confidence,
        outcome.isScam && outcome.confidence >= this.config.engagement.detectionThreshold
      );

      if (session.scamDetected) {
        const scamType = this.sessionStore.lockScamType(session, outcome.scamType);
        if (session.persona === null) {
          this.sessionStore.lockPersona(session, this.personaSelector.select(scamType, voice));
        }
        const added = this.sessionStore.mergeIntelligence(session, outcome.intelligence);
        if (added > 0) {
          this.logger.log(`[${session.sessionId}] ${added} new intelligence values`);
        }
        if (wasDetected) {
          this.sessionStore.markEngaged(session);
        }
      }
    }

    this.sessionStore.recordReply(session, outcome.reply);
    this.sessionStore.recordTurnMetrics(session, outcome.path, outcome.tokensUsed);

    if (!session.terminated) {
      this.checkTermination(session);
    }
    this.sessionStore.save(session);

    this.logger.log(
      `[${session.sessionId}] msg#${session.messageCount} stage=${session.stage} ` +
        `path=${outcome.path}${outcome.fallbackReason ? `(${outcome.fallbackReason})` : ''} ` +
        `detected=${session.scamDetected}`
    );

    return {
      sessionId: session.sessionId,
      reply: outcome.reply,
      stage: session.stage,
      scamDetected: session.scamDetected,
      terminated: session.terminated,
      path: outcome.path,
    };
  }

  private advance(session: HoneypotSession, priorScammerMessages: string[], text: string): void {
    const profile = this.profiler.update(session.profile, priorScammerMessages, text);
    this.sessionStore.updateProfile(session, profile);

    const next = this.stageTracker.nextStage(session.stage, {
      messageCount: session.messageCount,
      completeness: intelligenceCompleteness(session.intelligence),
      patience: profile.patience,
    });
    this.sessionStore.advanceStage(session, next);
  }

  private profileHint(session: HoneypotSession, scammerMessages: string[]): string {
    const hint = this.profiler.promptHint(session.profile);
    const style = this.profiler.styleHint(scammerMessages);
    return style === null ? hint : `${hint}; ${style}`;
  }

  /**
   * Voice for a session no detection has locked yet: the first candidate for
   * the category the scammer's messages suggest so far.
   */
  private provisionalPersona(scammerMessages: string[]): PersonaId {
    const [first] = this.personaSelector.candidates(quickScamType(scammerMessages.join(' ')));
    return first;
  }

  private checkTermination(session: HoneypotSession): void {
    const check = this.stageTracker.shouldTerminate(session.messageCount, session.intelligence);
    if (!check.terminate) {
      return;
    }

    this.sessionStore.markTerminated(session);
    if (!this.sessionStore.markReported(session)) {
      return;
    }

    const event: EngagementTerminatedEvent = {
      sessionId: session.sessionId,
      reason: check.reason,
      report: this.reportBuilder.build(session),
    };
    this.logger.log(
      `[${session.sessionId}] Terminating (${check.reason}, score ${check.score}), emitting report`
    );
    this.eventEmitter.emit(EngagementEvent.TERMINATED, event);
  }
}
