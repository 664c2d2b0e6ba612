import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import NodeCache = require('node-cache');
import { honeypotConfig } from '@decoy-agent/shared/config';
import { HoneypotSession } from '@decoy-agent/shared/types';
import { ISessionRepository } from '../interfaces';

/**
 * Process-local session storage on node-cache.
 *
 * Every save restarts the entry's idle TTL, so a session disappears once no
 * message has touched it for `session.idleTimeoutMs`. When `maxSessions`
 * is reached the least recently active session is dropped to make room.
 */
@Injectable()
export class InMemorySessionRepository implements ISessionRepository, OnModuleDestroy {
  private readonly logger = new Logger(InMemorySessionRepository.name);
  private readonly cache: NodeCache;
  private readonly maxSessions: number;

  constructor(
    @Inject(honeypotConfig.KEY)
    config: ConfigType<typeof honeypotConfig>
  ) {
    this.maxSessions = config.session.maxSessions;
    this.cache = new NodeCache({
      stdTTL: Math.max(1, Math.ceil(config.session.idleTimeoutMs / 1000)),
      checkperiod: 60,
      useClones: false,
      maxKeys: -1,
    });

    this.cache.on('expired', (sessionId: string) => {
      this.logger.log(`Session ${sessionId} evicted after idle timeout`);
    });
  }

  getSession(sessionId: string): HoneypotSession | null {
    return this.cache.get<HoneypotSession>(sessionId) ?? null;
  }

  saveSession(session: HoneypotSession): void {
    if (!this.cache.has(session.sessionId) && this.cache.keys().length >= this.maxSessions) {
      this.evictLeastRecentlyActive();
    }
    this.cache.set(session.sessionId, session);
  }

  cleanupReportedSessions(cutoffDate: Date): number {
    let cleanedCount = 0;
    const cutoffTime = cutoffDate.getTime();

    for (const session of this.getAllSessions()) {
      // Only reported sessions are finished; everything else waits for its idle timeout
      if (session.reportEmitted && session.lastActivityAt.getTime() < cutoffTime) {
        this.cache.del(session.sessionId);
        cleanedCount++;
      }
    }

    return cleanedCount;
  }

  getAllSessions(): HoneypotSession[] {
    const sessions: HoneypotSession[] = [];
    for (const key of this.cache.keys()) {
      const session = this.cache.get<HoneypotSession>(key);
      if (session) sessions.push(session);
    }
    return sessions;
  }

  count(): number {
    return this.cache.keys().length;
  }

  onModuleDestroy(): void {
    this.cache.close();
  }

  private evictLeastRecentlyActive(): void {
    let oldest: HoneypotSession | null = null;
    for (const session of this.getAllSessions()) {
      if (!oldest || session.lastActivityAt.getTime() < oldest.lastActivityAt.getTime()) {
        oldest = session;
      }
    }
    if (oldest) {
      this.logger.warn(`Session limit ${this.maxSessions} reached, evicting ${oldest.sessionId}`);
      this.cache.del(oldest.sessionId);
    }
  }
}
