/**
 * Shared enums used across the engine
 * Session store, strategy, orchestrator and reporting all reference these constants
 */

// ============================================================================
// Conversation Stages
// ============================================================================

/**
 * Ordered engagement phases. Numeric so stages compare with < and Math.max.
 */
export enum ConversationStage {
  INITIAL_HOOK = 1,
  ENGAGEMENT = 2,
  INFORMATION_PROBE = 3,
  RESISTANCE = 4,
  GRADUAL_COMPLIANCE = 5,
  INTELLIGENCE_MINING = 6,
  PROLONGATION = 7,
}

export const ConversationStageLabel: Record<ConversationStage, string> = {
  [ConversationStage.INITIAL_HOOK]: 'Initial Hook',
  [ConversationStage.ENGAGEMENT]: 'Engagement',
  [ConversationStage.INFORMATION_PROBE]: 'Information Probe',
  [ConversationStage.RESISTANCE]: 'Resistance',
  [ConversationStage.GRADUAL_COMPLIANCE]: 'Gradual Compliance',
  [ConversationStage.INTELLIGENCE_MINING]: 'Intelligence Mining',
  [ConversationStage.PROLONGATION]: 'Prolongation',
};

export const FIRST_STAGE = ConversationStage.INITIAL_HOOK;
export const LAST_STAGE = ConversationStage.PROLONGATION;

// ============================================================================
// Scam Categories
// ============================================================================

export enum ScamType {
  BANK_FRAUD = 'bank_fraud',
  UPI_FRAUD = 'upi_fraud',
  PHISHING = 'phishing',
  JOB_SCAM = 'job_scam',
  LOTTERY = 'lottery',
  INVESTMENT = 'investment',
  TECH_SUPPORT = 'tech_support',
  OTHER = 'other',
}

export const ScamTypeLabel: Record<ScamType, string> = {
  [ScamType.BANK_FRAUD]: 'Bank fraud',
  [ScamType.UPI_FRAUD]: 'UPI fraud',
  [ScamType.PHISHING]: 'Phishing',
  [ScamType.JOB_SCAM]: 'Job scam',
  [ScamType.LOTTERY]: 'Lottery / prize scam',
  [ScamType.INVESTMENT]: 'Investment scam',
  [ScamType.TECH_SUPPORT]: 'Tech support scam',
  [ScamType.OTHER]: 'Other',
};

export const SCAM_TYPES: readonly ScamType[] = Object.values(ScamType);

export function isScamType(value: string): value is ScamType {
  return SCAM_TYPES.some((type) => type === value);
}

// ============================================================================
// Personas
// ============================================================================

export enum PersonaId {
  ELDERLY_CONFUSED = 'elderly_confused',
  BUSY_PROFESSIONAL = 'busy_professional',
  CURIOUS_STUDENT = 'curious_student',
  TECH_NAIVE_PARENT = 'tech_naive_parent',
  DESPERATE_JOB_SEEKER = 'desperate_job_seeker',
}

export const PERSONA_IDS: readonly PersonaId[] = Object.values(PersonaId);

// ============================================================================
// Manipulation & Response Tactics
// ============================================================================

export enum ManipulationTactic {
  FEAR = 'fear',
  URGENCY = 'urgency',
  AUTHORITY = 'authority',
  GREED = 'greed',
  GUILT = 'guilt',
}

export const MANIPULATION_TACTICS: readonly ManipulationTactic[] =
  Object.values(ManipulationTactic);

/**
 * How the persona should lean in response to the scammer's observed behaviour.
 */
export enum ResponseTactic {
  SHOW_MORE_CONFUSION = 'show_more_confusion',
  MORE_REALISTIC_PERSONA = 'more_realistic_persona',
  STRATEGIC_ALMOST_COMPLIANCE = 'strategic_almost_compliance',
  DANGLE_COMPLIANCE = 'dangle_compliance',
  MAINTAIN_ENGAGEMENT = 'maintain_engagement',
}

// ============================================================================
// Turn Processing
// ============================================================================

export enum SenderRole {
  SCAMMER = 'scammer',
  USER = 'user',
}

export enum DetectionState {
  NOT_DETECTED = 'not_detected',
  DETECTED = 'detected',
  ENGAGED = 'engaged',
  TERMINATED = 'terminated',
}

export enum TurnPath {
  LLM = 'llm',
  FALLBACK = 'fallback',
}

/**
 * Why a turn was answered by the deterministic path instead of the model.
 */
export enum FallbackReason {
  RATE_EXCEEDED = 'rate_exceeded',
  GENERATION_FAILURE = 'generation_failure',
  INVALID_OUTPUT = 'invalid_output',
  QUALITY_REJECTED = 'quality_rejected',
  SESSION_TERMINATED = 'session_terminated',
}
