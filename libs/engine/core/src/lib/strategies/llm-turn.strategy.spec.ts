/**
 * LlmTurnStrategy Tests
 * Tests for the rate-gated generation call and its tagged failures
 */

import { Test, TestingModule } from '@nestjs/testing';
import { honeypotConfig } from '@decoy-agent/shared/config';
import { FallbackReason, ScamType, TurnPath } from '@decoy-agent/shared/types';
import { GenerationFailureError, RateGate } from '@decoy-agent/shared/utils';
import { ExtractorService } from '@decoy-agent/engine/extraction';
import { createTestConfig, createTurnContext } from '@decoy-agent/engine/testing';
import { GENERATION_BACKEND, IGenerationBackend } from '../generation/generation-backend.interface';
import { LlmTurnStrategy } from './llm-turn.strategy';

describe('LlmTurnStrategy', () => {
  let strategy: LlmTurnStrategy;
  let rateGate: RateGate;
  let backend: jest.Mocked<IGenerationBackend>;

  const message =
    'Your account will be blocked today! Verify immediately. Call +91 9876543210 or send ₹1 to 9876543210@paytm';

  const modelOutput = {
    is_scam: true,
    confidence: 0.92,
    scam_type: 'upi_fraud',
    intel: {
      bank_accounts: ['1111222233334444'],
      upi_ids: ['9876543210@PayTM'],
      phone_numbers: ['+91 9876543210'],
      links: [],
    },
    response: 'Oh no, which account is this about?',
  };

  const createModule = async (gate: RateGate) => {
    backend = { generate: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LlmTurnStrategy,
        ExtractorService,
        { provide: RateGate, useValue: gate },
        { provide: GENERATION_BACKEND, useValue: backend },
        { provide: honeypotConfig.KEY, useValue: createTestConfig() },
      ],
    }).compile();

    strategy = module.get<LlmTurnStrategy>(LlmTurnStrategy);
  };

  beforeEach(async () => {
    rateGate = new RateGate();
    await createModule(rateGate);
  });

  it('should return the validated turn and bill the actual tokens', async () => {
    backend.generate.mockResolvedValue({ text: JSON.stringify(modelOutput), tokensUsed: 480 });

    const attempt = await strategy.run(createTurnContext({ message }));

    expect(attempt).toEqual({
      kind: 'completed',
      outcome: {
        path: TurnPath.LLM,
        isScam: true,
        confidence: 0.92,
        scamType: ScamType.UPI_FRAUD,
        intelligence: {
          bankAccounts: [],
          upiIds: ['9876543210@paytm'],
          phoneNumbers: ['9876543210'],
          phishingLinks: [],
          suspiciousKeywords: ['immediately', 'blocked', 'verify'],
        },
        reply: 'Oh no, which account is this about?',
        tokensUsed: 480,
      },
    });
    expect(rateGate.getUsage().minute).toMatchObject({ requests: 1, tokens: 480 });
  });

  it('should send the persona, history and output contract in one call', async () => {
    backend.generate.mockResolvedValue({ text: JSON.stringify(modelOutput), tokensUsed: 300 });

    await strategy.run(
      createTurnContext({
        message,
        tacticHint: 'Feign confusion',
      })
    );

    expect(backend.generate).toHaveBeenCalledTimes(1);
    const [request] = backend.generate.mock.calls[0];
    expect(request.maxTokens).toBe(250);
    expect(request.timeoutMs).toBe(8000);
    expect(request.prompt).toContain('You are Kamala');
    expect(request.prompt).toContain('STAGE TACTIC: Feign confusion');
    expect(request.prompt).toContain('RECENT HISTORY: [First message]');
    expect(request.prompt).toContain('"upi_ids":[]');
  });

  it('should fail with rate_exceeded and make no call when the minute window is full', async () => {
    const fullGate = new RateGate({ limits: { requestsPerMinute: 1 } });
    fullGate.admit(100);
    await createModule(fullGate);

    const attempt = await strategy.run(createTurnContext({ message }));

    expect(attempt).toMatchObject({
      kind: 'failed',
      reason: FallbackReason.RATE_EXCEEDED,
      tokensUsed: 0,
    });
    expect(backend.generate).not.toHaveBeenCalled();
  });

  it('should settle the reservation at zero tokens when the call fails', async () => {
    backend.generate.mockRejectedValue(
      new GenerationFailureError('timeout', 'Generation timed out after 8000ms')
    );

    const attempt = await strategy.run(createTurnContext({ message }));

    expect(attempt).toEqual({
      kind: 'failed',
      reason: FallbackReason.GENERATION_FAILURE,
      detail: 'Generation timed out after 8000ms',
      tokensUsed: 0,
    });
    expect(rateGate.getUsage().minute).toMatchObject({ requests: 1, tokens: 0 });
  });

  it('should fail with invalid_output when the text cannot be repaired', async () => {
    backend.generate.mockResolvedValue({ text: 'I think this is a scam.', tokensUsed: 120 });

    const attempt = await strategy.run(createTurnContext({ message }));

    expect(attempt).toMatchObject({
      kind: 'failed',
      reason: FallbackReason.INVALID_OUTPUT,
      tokensUsed: 120,
    });
  });
});
