import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { honeypotConfig } from '@decoy-agent/shared/config';
import { ConversationStage, FallbackReason, TurnPath } from '@decoy-agent/shared/types';
import { ExtractorService } from '@decoy-agent/engine/extraction';
import { ReplyTemplateService, analyzeIntelGap } from '@decoy-agent/engine/strategy';
import { detectByKeywords } from '../detection/keyword-detector';
import { checkReply, recentReplies } from '../quality/reply-quality';
import { TurnAttempt, TurnContext, TurnOutcome, TurnStrategy } from './turn-strategy.interface';

/** Sent when no table line passes the reply gate. */
export const SAFE_REPLY = 'Sorry, can you say that again?';

// Stages whose lines answer what the scammer just asked for; the others keep their own.
const INTENT_STAGES: ReadonlySet<ConversationStage> = new Set([
  ConversationStage.ENGAGEMENT,
  ConversationStage.INFORMATION_PROBE,
  ConversationStage.RESISTANCE,
  ConversationStage.GRADUAL_COMPLIANCE,
]);

/**
 * Deterministic path: keyword detection, recognizer-only extraction and a
 * canned reply. Makes no external call and always completes.
 */
@Injectable()
export class FallbackTurnStrategy implements TurnStrategy {
  readonly path = TurnPath.FALLBACK;
  private readonly logger = new Logger(FallbackTurnStrategy.name);

  constructor(
    private readonly extractor: ExtractorService,
    private readonly templates: ReplyTemplateService,
    @Inject(honeypotConfig.KEY)
    private readonly config: ConfigType<typeof honeypotConfig>
  ) {}

  async run(context: TurnContext): Promise<TurnAttempt> {
    return { kind: 'completed', outcome: this.respond(context) };
  }

  respond(context: TurnContext, reason?: FallbackReason): TurnOutcome {
    const detection = detectByKeywords(context.message);
    const engaged =
      context.scamDetected ||
      (detection.isScam && detection.confidence >= this.config.engagement.detectionThreshold);

    return {
      path: TurnPath.FALLBACK,
      isScam: detection.isScam,
      confidence: detection.confidence,
      scamType: detection.scamType,
      intelligence: this.extractor.extract(context.message),
      reply: this.reply(context, engaged),
      tokensUsed: 0,
      fallbackReason: reason,
    };
  }

  /**
   * Canned reply for the turn. Sessions not judged to be scams get the
   * neutral table. Engaged sessions answer a request for credentials, account
   * details or payment with a line for that request while the stage allows
   * it; at Intelligence Mining the line asks for the most wanted missing
   * category. Every candidate goes through the reply gate against our recent
   * replies, so a line that was just sent is skipped for the next one.
   */
  reply(context: TurnContext, engaged: boolean): string {
    const recent = recentReplies(context.history);
    const line = this.candidates(context, engaged).find((candidate) => checkReply(candidate, recent).ok);
    if (line === undefined) {
      this.logger.warn(`[${context.sessionId}] No template line passed the reply gate, using the safe reply`);
      return SAFE_REPLY;
    }
    return line;
  }

  private candidates(context: TurnContext, engaged: boolean): string[] {
    const turn = context.messageCount - 1;
    if (!engaged) {
      return [this.templates.neutral(turn), this.templates.neutral(turn + 1)];
    }

    const tableLine = (offset: number): string => {
      if (context.stage === ConversationStage.INTELLIGENCE_MINING) {
        const gap = analyzeIntelGap(context.intelligence, context.stage, context.messageCount);
        return this.templates.forGap(context.persona, gap.priority ?? 'backup', turn + offset);
      }
      return this.templates.forStage(context.persona, context.stage, turn + offset);
    };

    const intent = INTENT_STAGES.has(context.stage) ? this.templates.intentOf(context.message) : null;
    const lines = intent === null ? [] : [this.templates.forIntent(context.persona, intent, turn)];
    return [...lines, tableLine(0), tableLine(1)];
  }
}
