import { HoneypotSession } from '@decoy-agent/shared/types';

/**
 * Injection token for ISessionRepository
 * Use this token when injecting the repository via @Inject()
 */
export const SESSION_REPOSITORY = 'SESSION_REPOSITORY';

export interface ISessionRepository {
  // Session lifecycle
  getSession(sessionId: string): HoneypotSession | null;
  /** Store or refresh a session; refreshing restarts its idle timeout */
  saveSession(session: HoneypotSession): void;

  // Cleanup
  cleanupReportedSessions(cutoffDate: Date): number;

  // Query methods
  getAllSessions(): HoneypotSession[];
  count(): number;
}
