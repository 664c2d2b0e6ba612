/**
 * Injection token for the text generation backend
 */
export const GENERATION_BACKEND = 'GENERATION_BACKEND';

export interface GenerationRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
  /** The call is abandoned after this long */
  timeoutMs: number;
}

export interface GenerationResult {
  text: string;
  /** Prompt plus completion tokens as billed by the provider */
  tokensUsed: number;
}

/**
 * A single-shot text generation call. Implementations throw
 * GenerationFailureError on timeout, transport or provider errors.
 */
export interface IGenerationBackend {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}
