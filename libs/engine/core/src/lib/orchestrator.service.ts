import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { honeypotConfig } from '@decoy-agent/shared/config';
import { FallbackReason } from '@decoy-agent/shared/types';
import { checkReply, polishReply, recentReplies } from './quality/reply-quality';
import { FallbackTurnStrategy } from './strategies/fallback-turn.strategy';
import { LlmTurnStrategy } from './strategies/llm-turn.strategy';
import { TurnContext, TurnOutcome } from './strategies/turn-strategy.interface';

/**
 * Chooses the path for each turn and enforces the reply quality gate.
 *
 * A generated reply is only sent once the sender is judged a scammer. Before
 * that the model's detection and extraction are kept but the reply comes
 * from the neutral table, so an undetected sender is never asked for details.
 *
 * The external-call path runs at most once per message. Any failure on it,
 * including a reply that fails the gate, is answered from the deterministic
 * path without a second call.
 */
@Injectable()
export class OrchestratorService {
  private readonly logger = new Logger(OrchestratorService.name);

  constructor(
    private readonly llmStrategy: LlmTurnStrategy,
    private readonly fallbackStrategy: FallbackTurnStrategy,
    @Inject(honeypotConfig.KEY)
    private readonly config: ConfigType<typeof honeypotConfig>
  ) {}

  async process(context: TurnContext): Promise<TurnOutcome> {
    if (context.terminated) {
      return this.fallbackStrategy.respond(context, FallbackReason.SESSION_TERMINATED);
    }

    const attempt = await this.llmStrategy.run(context);

    if (attempt.kind === 'failed') {
      this.logger.warn(
        `[${context.sessionId}] Falling back (${attempt.reason}): ${attempt.detail}`
      );
      return {
        ...this.fallbackStrategy.respond(context, attempt.reason),
        tokensUsed: attempt.tokensUsed,
      };
    }

    const { outcome } = attempt;
    const engaged =
      context.scamDetected ||
      (outcome.isScam && outcome.confidence >= this.config.engagement.detectionThreshold);
    if (!engaged) {
      return { ...outcome, reply: this.fallbackStrategy.reply(context, false) };
    }

    const reply = polishReply(outcome.reply);
    const check = checkReply(reply, recentReplies(context.history));
    if (check.ok) {
      return { ...outcome, reply };
    }

    this.logger.warn(
      `[${context.sessionId}] Generated reply rejected (${check.rejection}), using template reply`
    );
    return {
      ...outcome,
      reply: this.fallbackStrategy.reply(context, true),
      fallbackReason: FallbackReason.QUALITY_REJECTED,
    };
  }
}
