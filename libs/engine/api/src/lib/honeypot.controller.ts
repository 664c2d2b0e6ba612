import { Body, Controller, Get, HttpCode, Logger, Post, UseGuards } from '@nestjs/common';
import { ConversationTurn } from '@decoy-agent/shared/types';
import { RateGate, RateGateUsage } from '@decoy-agent/shared/utils';
import { HoneypotEngineService } from '@decoy-agent/engine/core';
import { SessionStoreService } from '@decoy-agent/engine/session';
import {
  HoneypotRequestDto,
  HoneypotResponseDto,
  honeypotRequestSchema,
} from './dto/honeypot-request.dto';
import { ApiKeyGuard } from './guards/api-key.guard';
import { ZodValidationPipe } from './pipes/zod-validation.pipe';

export interface HealthResponseDto {
  status: 'ok';
  activeSessions: number;
  inFlight: number;
  rateLimit: RateGateUsage;
}

/**
 * Honeypot Controller
 *
 * Example request:
 * POST /api/honeypot
 * Headers: x-api-key: <key>
 * Body: {
 *   "sessionId": "abc-123",
 *   "message": { "sender": "scammer", "text": "Your account is blocked", "timestamp": 1735689600000 },
 *   "conversationHistory": [],
 *   "metadata": { "channel": "SMS", "language": "English", "locale": "IN" }
 * }
 *
 * Response: { "status": "success", "reply": "..." }
 */
@Controller('api')
export class HoneypotController {
  private readonly logger = new Logger(HoneypotController.name);

  constructor(
    private readonly engine: HoneypotEngineService,
    private readonly sessionStore: SessionStoreService,
    private readonly rateGate: RateGate
  ) {}

  @Post('honeypot')
  @HttpCode(200)
  @UseGuards(ApiKeyGuard)
  async handleMessage(
    @Body(new ZodValidationPipe(honeypotRequestSchema)) body: HoneypotRequestDto
  ): Promise<HoneypotResponseDto> {
    const { sessionId, message, conversationHistory, metadata } = body;
    this.logger.debug(`[${sessionId}] Inbound message (${message.text.length} chars)`);

    const result = await this.engine.handleMessage({
      sessionId,
      text: message.text,
      timestamp: message.timestamp ?? Date.now(),
      conversationHistory: conversationHistory?.map(
        (turn): ConversationTurn => ({
          sender: turn.sender,
          text: turn.text,
          timestamp: turn.timestamp ?? Date.now(),
        })
      ),
      metadata,
    });

    return { status: 'success', reply: result.reply };
  }

  @Get('health')
  health(): HealthResponseDto {
    return {
      status: 'ok',
      activeSessions: this.sessionStore.activeCount(),
      inFlight: this.engine.inFlight(),
      rateLimit: this.rateGate.getUsage(),
    };
  }
}
