import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { honeypotConfig } from '@decoy-agent/shared/config';
import { RateGate } from '@decoy-agent/shared/utils';
import { ExtractionModule } from '@decoy-agent/engine/extraction';
import { ProfilingModule } from '@decoy-agent/engine/profiling';
import { StrategyModule } from '@decoy-agent/engine/strategy';
import { SessionStoreModule } from '@decoy-agent/engine/session';
import { ReportingModule } from '@decoy-agent/engine/reporting';
import { AnthropicGenerationBackend } from './generation/anthropic-generation.backend';
import { GENERATION_BACKEND } from './generation/generation-backend.interface';
import { HoneypotEngineService } from './honeypot-engine.service';
import { OrchestratorService } from './orchestrator.service';
import { FallbackTurnStrategy } from './strategies/fallback-turn.strategy';
import { LlmTurnStrategy } from './strategies/llm-turn.strategy';

/**
 * Engine Module
 *
 * Wires the per-message pipeline. The RateGate is a single process-wide
 * instance; every generation call goes through it.
 */
@Module({
  imports: [
    EventEmitterModule.forRoot({
      wildcard: true,
      delimiter: '.',
      maxListeners: 20,
      verboseMemoryLeak: true,
    }),
    ExtractionModule,
    ProfilingModule,
    StrategyModule,
    SessionStoreModule,
    ReportingModule,
  ],
  providers: [
    {
      provide: RateGate,
      useFactory: (config: ConfigType<typeof honeypotConfig>) =>
        new RateGate({
          limits: {
            requestsPerMinute: config.rateLimit.requestsPerMinute,
            requestsPerDay: config.rateLimit.requestsPerDay,
            tokensPerMinute: config.rateLimit.tokensPerMinute,
            tokensPerDay: config.rateLimit.tokensPerDay,
          },
        }),
      inject: [honeypotConfig.KEY],
    },
    {
      provide: GENERATION_BACKEND,
      useClass: AnthropicGenerationBackend,
    },
    LlmTurnStrategy,
    FallbackTurnStrategy,
    OrchestratorService,
    HoneypotEngineService,
  ],
  exports: [HoneypotEngineService, RateGate, SessionStoreModule],
})
export class EngineModule {}
