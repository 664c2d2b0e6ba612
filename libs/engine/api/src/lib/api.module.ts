import { Module } from '@nestjs/common';
import { EngineModule } from '@decoy-agent/engine/core';
import { ApiKeyGuard } from './guards/api-key.guard';
import { HoneypotController } from './honeypot.controller';

@Module({
  imports: [EngineModule],
  controllers: [HoneypotController],
  providers: [ApiKeyGuard],
})
export class ApiModule {}
