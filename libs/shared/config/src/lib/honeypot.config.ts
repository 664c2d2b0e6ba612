import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { ConfigurationError } from '@decoy-agent/shared/utils';

const required = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  ANTHROPIC_API_KEY: required('ANTHROPIC_API_KEY'),
  HONEYPOT_API_KEY: required('HONEYPOT_API_KEY'),

  LLM_MODEL: z.string().trim().min(1).default('claude-3-5-haiku-latest'),
  LLM_MAX_TOKENS: z.coerce.number().int().min(64).max(1024).default(250),
  LLM_TIMEOUT_MS: positiveInt(8000),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.8),

  RATE_LIMIT_RPM: positiveInt(30),
  RATE_LIMIT_RPD: positiveInt(1000),
  RATE_LIMIT_TPM: positiveInt(12000),
  RATE_LIMIT_TPD: positiveInt(100000),
  RATE_LIMIT_MAX_WAIT_MS: z.coerce.number().int().min(0).default(2000),
  ESTIMATED_TOKENS_PER_CALL: positiveInt(600),

  DETECTION_THRESHOLD: z.coerce.number().min(0).max(1).default(0.65),
  MAX_MESSAGES: positiveInt(15),
  INTEL_SCORE_THRESHOLD: positiveInt(8),

  SESSION_IDLE_TIMEOUT_MS: positiveInt(60 * 60 * 1000),
  SESSION_MAX: positiveInt(10000),
  SESSION_REPORTED_GRACE_MS: positiveInt(10 * 60 * 1000),

  CALLBACK_URL: z.string().url().default('https://hackathon.guvi.in/api/updateHoneyPotFinalResult'),
  CALLBACK_TIMEOUT_MS: positiveInt(5000),

  PORT: positiveInt(3000),
});

export interface HoneypotConfig {
  port: number;
  apiKey: string;
  llm: {
    apiKey: string;
    model: string;
    maxTokens: number;
    timeoutMs: number;
    temperature: number;
  };
  rateLimit: {
    requestsPerMinute: number;
    requestsPerDay: number;
    tokensPerMinute: number;
    tokensPerDay: number;
    maxWaitMs: number;
    estimatedTokensPerCall: number;
  };
  engagement: {
    detectionThreshold: number;
    maxMessages: number;
    intelScoreThreshold: number;
  };
  session: {
    idleTimeoutMs: number;
    maxSessions: number;
    reportedGraceMs: number;
  };
  callback: {
    url: string;
    timeoutMs: number;
  };
}

/**
 * Validate the environment and shape it into the engine's settings.
 * Throws ConfigurationError listing every problem found.
 */
export function loadHoneypotConfig(env: NodeJS.ProcessEnv = process.env): HoneypotConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    apiKey: e.HONEYPOT_API_KEY,
    llm: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.LLM_MODEL,
      maxTokens: e.LLM_MAX_TOKENS,
      timeoutMs: e.LLM_TIMEOUT_MS,
      temperature: e.LLM_TEMPERATURE,
    },
    rateLimit: {
      requestsPerMinute: e.RATE_LIMIT_RPM,
      requestsPerDay: e.RATE_LIMIT_RPD,
      tokensPerMinute: e.RATE_LIMIT_TPM,
      tokensPerDay: e.RATE_LIMIT_TPD,
      maxWaitMs: e.RATE_LIMIT_MAX_WAIT_MS,
      estimatedTokensPerCall: e.ESTIMATED_TOKENS_PER_CALL,
    },
    engagement: {
      detectionThreshold: e.DETECTION_THRESHOLD,
      maxMessages: e.MAX_MESSAGES,
      intelScoreThreshold: e.INTEL_SCORE_THRESHOLD,
    },
    session: {
      idleTimeoutMs: e.SESSION_IDLE_TIMEOUT_MS,
      maxSessions: e.SESSION_MAX,
      reportedGraceMs: e.SESSION_REPORTED_GRACE_MS,
    },
    callback: {
      url: e.CALLBACK_URL,
      timeoutMs: e.CALLBACK_TIMEOUT_MS,
    },
  };
}

export const honeypotConfig = registerAs('honeypot', (): HoneypotConfig => loadHoneypotConfig());
