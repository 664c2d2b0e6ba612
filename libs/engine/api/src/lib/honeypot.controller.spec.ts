/**
 * HoneypotController Tests
 * Tests for the message and health endpoints
 */

import { Test, TestingModule } from '@nestjs/testing';
import { honeypotConfig } from '@decoy-agent/shared/config';
import { ConversationStage, SenderRole, TurnPath } from '@decoy-agent/shared/types';
import { RateGate } from '@decoy-agent/shared/utils';
import { HoneypotEngineService } from '@decoy-agent/engine/core';
import { SessionStoreService } from '@decoy-agent/engine/session';
import { createTestConfig } from '@decoy-agent/engine/testing';
import { HoneypotController } from './honeypot.controller';
import { honeypotRequestSchema } from './dto/honeypot-request.dto';

describe('HoneypotController', () => {
  let controller: HoneypotController;
  let engine: { handleMessage: jest.Mock; inFlight: jest.Mock };
  let rateGate: RateGate;

  beforeEach(async () => {
    engine = {
      handleMessage: jest.fn().mockResolvedValue({
        sessionId: 'abc-123',
        reply: 'Oh dear, what happened? Who is this speaking?',
        stage: ConversationStage.INITIAL_HOOK,
        scamDetected: true,
        terminated: false,
        path: TurnPath.FALLBACK,
      }),
      inFlight: jest.fn().mockReturnValue(1),
    };
    rateGate = new RateGate({ now: () => 0 });

    const module: TestingModule = await Test.createTestingModule({
      controllers: [HoneypotController],
      providers: [
        { provide: HoneypotEngineService, useValue: engine },
        { provide: SessionStoreService, useValue: { activeCount: jest.fn().mockReturnValue(4) } },
        { provide: RateGate, useValue: rateGate },
        { provide: honeypotConfig.KEY, useValue: createTestConfig() },
      ],
    }).compile();

    controller = module.get<HoneypotController>(HoneypotController);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('handleMessage', () => {
    it('should pass the validated message to the engine and wrap the reply', async () => {
      const body = honeypotRequestSchema.parse({
        sessionId: 'abc-123',
        message: { sender: 'scammer', text: ' Your account is blocked ', timestamp: '2025-01-01T00:00:00Z' },
        conversationHistory: [
          { sender: 'scammer', text: 'Dear customer', timestamp: 1735689000000 },
          { sender: 'user', text: 'Yes?', timestamp: '1735689300000' },
        ],
        metadata: { channel: 'SMS', language: 'English', locale: 'IN' },
      });

      const result = await controller.handleMessage(body);

      expect(result).toEqual({
        status: 'success',
        reply: 'Oh dear, what happened? Who is this speaking?',
      });
      expect(engine.handleMessage).toHaveBeenCalledWith({
        sessionId: 'abc-123',
        text: 'Your account is blocked',
        timestamp: 1735689600000,
        conversationHistory: [
          { sender: SenderRole.SCAMMER, text: 'Dear customer', timestamp: 1735689000000 },
          { sender: SenderRole.USER, text: 'Yes?', timestamp: 1735689300000 },
        ],
        metadata: { channel: 'SMS', language: 'English', locale: 'IN' },
      });
    });

    it('should stamp a message that arrives without a timestamp', async () => {
      jest.spyOn(Date, 'now').mockReturnValue(1735690000000);
      const body = honeypotRequestSchema.parse({
        sessionId: 'abc-123',
        message: { sender: 'scammer', text: 'Hello' },
      });

      await controller.handleMessage(body);

      expect(engine.handleMessage).toHaveBeenCalledWith({
        sessionId: 'abc-123',
        text: 'Hello',
        timestamp: 1735690000000,
        conversationHistory: undefined,
        metadata: undefined,
      });
    });
  });

  describe('health', () => {
    it('should report sessions, in-flight work and rate usage', () => {
      const health = controller.health();

      expect(health.status).toBe('ok');
      expect(health.activeSessions).toBe(4);
      expect(health.inFlight).toBe(1);
      expect(health.rateLimit.minute).toEqual({
        requests: 0,
        tokens: 0,
        requestLimit: 30,
        tokenLimit: 12000,
        remainingRequests: 30,
        remainingTokens: 12000,
        resetsInMs: 60000,
      });
    });
  });
});
