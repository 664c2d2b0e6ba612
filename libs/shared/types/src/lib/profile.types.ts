import { ManipulationTactic, ResponseTactic } from './enums';

/**
 * Running behavioural read of the remote party. All scores are in [0, 1].
 */
export interface ScammerProfile {
  aggression: number;
  /** Inverse of impatience: drops as the scammer repeats and demands. */
  patience: number;
  sophistication: number;
  manipulation: number;
  /** Every manipulation tactic seen so far. Only grows. */
  tactics: ManipulationTactic[];
  tacticCounts: Record<ManipulationTactic, number>;
  dominantTactic: ManipulationTactic | null;
  recommendedTactic: ResponseTactic;
  messagesAnalyzed: number;
}
