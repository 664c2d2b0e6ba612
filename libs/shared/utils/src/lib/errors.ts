/**
 * Raised while the application context is built when required settings are
 * missing or malformed. The only failure that stops the process.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export type GenerationFailureKind = 'timeout' | 'network' | 'provider' | 'empty';

/**
 * The external generation call failed. Callers answer the turn on the
 * deterministic path instead.
 */
export class GenerationFailureError extends Error {
  readonly kind: GenerationFailureKind;

  constructor(kind: GenerationFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationFailureError';
    this.kind = kind;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
