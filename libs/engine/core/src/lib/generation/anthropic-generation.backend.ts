import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { createAnthropic } from '@ai-sdk/anthropic';
import { APICallError, generateText, type LanguageModelV1 } from 'ai';
import { honeypotConfig } from '@decoy-agent/shared/config';
import { GenerationFailureError, errorMessage } from '@decoy-agent/shared/utils';
import {
  GenerationRequest,
  GenerationResult,
  IGenerationBackend,
} from './generation-backend.interface';

function countTokens(value: number | undefined): number {
  return value !== undefined && Number.isFinite(value) ? value : 0;
}

/**
 * Anthropic Messages API through the AI SDK. Retries are disabled: a failed
 * call falls through to the deterministic path instead.
 */
@Injectable()
export class AnthropicGenerationBackend implements IGenerationBackend {
  private readonly logger = new Logger(AnthropicGenerationBackend.name);
  private readonly model: LanguageModelV1;

  constructor(
    @Inject(honeypotConfig.KEY)
    private readonly config: ConfigType<typeof honeypotConfig>
  ) {
    const anthropic = createAnthropic({ apiKey: config.llm.apiKey });
    this.model = anthropic(config.llm.model);
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), request.timeoutMs);
    const startTime = Date.now();

    try {
      const result = await generateText({
        model: this.model,
        system: request.system,
        prompt: request.prompt,
        maxTokens: request.maxTokens,
        temperature: request.temperature,
        abortSignal: controller.signal,
        maxRetries: 0,
      });

      const tokensUsed =
        countTokens(result.usage.promptTokens) + countTokens(result.usage.completionTokens);
      this.logger.debug(
        `${this.config.llm.model} answered in ${Date.now() - startTime}ms using ${tokensUsed} tokens`
      );

      if (!result.text.trim()) {
        throw new GenerationFailureError('empty', 'Generation returned no text');
      }
      return { text: result.text, tokensUsed };
    } catch (error) {
      if (error instanceof GenerationFailureError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new GenerationFailureError(
          'timeout',
          `Generation timed out after ${request.timeoutMs}ms`,
          { cause: error }
        );
      }
      const kind = APICallError.isInstance(error) ? 'provider' : 'network';
      throw new GenerationFailureError(kind, errorMessage(error), { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }
}
