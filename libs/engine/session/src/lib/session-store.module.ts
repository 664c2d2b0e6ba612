import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { SESSION_REPOSITORY } from './interfaces';
import { InMemorySessionRepository } from './repositories/in-memory-session.repository';
import { SessionStoreService } from './session-store.service';

/**
 * SessionStore Module
 *
 * Exports:
 * - SESSION_REPOSITORY token (bound to InMemorySessionRepository)
 * - SessionStoreService (session lifecycle and state transitions)
 */
@Module({
  imports: [ScheduleModule.forRoot()],
  providers: [
    {
      provide: SESSION_REPOSITORY,
      useClass: InMemorySessionRepository,
    },
    SessionStoreService,
  ],
  exports: [SESSION_REPOSITORY, SessionStoreService],
})
export class SessionStoreModule {}
