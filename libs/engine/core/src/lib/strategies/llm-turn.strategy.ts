import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { honeypotConfig } from '@decoy-agent/shared/config';
import { ConversationStageLabel, FallbackReason, TurnPath } from '@decoy-agent/shared/types';
import { RateGate, errorMessage } from '@decoy-agent/shared/utils';
import { ExtractorService } from '@decoy-agent/engine/extraction';
import { getPersona } from '@decoy-agent/engine/strategy';
import {
  GENERATION_BACKEND,
  GenerationResult,
  IGenerationBackend,
} from '../generation/generation-backend.interface';
import { parseTurnOutput } from '../output/turn-output.parser';
import { SYSTEM_PROMPT, buildTurnPrompt, estimateTokens } from '../prompts/turn-prompt';
import { TurnAttempt, TurnContext, TurnStrategy } from './turn-strategy.interface';

/**
 * External-call path: one rate-gated generation call returning detection,
 * extraction and the reply together.
 */
@Injectable()
export class LlmTurnStrategy implements TurnStrategy {
  readonly path = TurnPath.LLM;
  private readonly logger = new Logger(LlmTurnStrategy.name);

  constructor(
    @Inject(GENERATION_BACKEND)
    private readonly backend: IGenerationBackend,
    private readonly rateGate: RateGate,
    private readonly extractor: ExtractorService,
    @Inject(honeypotConfig.KEY)
    private readonly config: ConfigType<typeof honeypotConfig>
  ) {}

  async run(context: TurnContext): Promise<TurnAttempt> {
    const { llm, rateLimit } = this.config;
    const prompt = buildTurnPrompt({
      message: context.message,
      personaDescription: getPersona(context.persona).description,
      history: context.history,
      messageNumber: context.messageCount,
      stageLabel: ConversationStageLabel[context.stage],
      tacticHint: context.tacticHint,
    });
    const estimate = Math.max(
      rateLimit.estimatedTokensPerCall,
      estimateTokens(SYSTEM_PROMPT + prompt, llm.maxTokens)
    );

    const admission = await this.rateGate.acquire(estimate, rateLimit.maxWaitMs);
    if (admission.kind === 'rate_exceeded') {
      return {
        kind: 'failed',
        reason: FallbackReason.RATE_EXCEEDED,
        detail: admission.reason,
        tokensUsed: 0,
      };
    }

    let generated: GenerationResult;
    try {
      generated = await this.backend.generate({
        system: SYSTEM_PROMPT,
        prompt,
        maxTokens: llm.maxTokens,
        temperature: llm.temperature,
        timeoutMs: llm.timeoutMs,
      });
    } catch (error) {
      this.rateGate.record(admission.ticket, 0);
      return {
        kind: 'failed',
        reason: FallbackReason.GENERATION_FAILURE,
        detail: errorMessage(error),
        tokensUsed: 0,
      };
    }
    this.rateGate.record(admission.ticket, generated.tokensUsed);

    const parsed = parseTurnOutput(generated.text);
    if (!parsed.ok) {
      return {
        kind: 'failed',
        reason: FallbackReason.INVALID_OUTPUT,
        detail: parsed.error,
        tokensUsed: generated.tokensUsed,
      };
    }
    if (parsed.repaired) {
      this.logger.debug(`[${context.sessionId}] Generated output needed repair`);
    }

    const { output } = parsed;
    const intelligence = this.extractor.reconcile(
      output.intel,
      this.extractor.extract(context.message),
      context.message
    );

    return {
      kind: 'completed',
      outcome: {
        path: TurnPath.LLM,
        isScam: output.isScam,
        confidence: output.confidence,
        scamType: output.scamType,
        intelligence,
        reply: output.reply,
        tokensUsed: generated.tokensUsed,
      },
    };
  }
}
