import { RateGate, RateTicket } from './rate-gate';

describe('RateGate', () => {
  let clock: number;
  const now = () => clock;

  const admitOrFail = (gate: RateGate, tokens: number): RateTicket => {
    const decision = gate.admit(tokens);
    if (decision.kind !== 'admitted') {
      throw new Error(`expected admission, got ${decision.kind}`);
    }
    return decision.ticket;
  };

  beforeEach(() => {
    clock = 1_000_000;
  });

  describe('admit', () => {
    it('should reserve one request and the estimate in both windows', () => {
      const gate = new RateGate({ now });

      const decision = gate.admit(500);

      expect(decision.kind).toBe('admitted');
      const usage = gate.getUsage();
      expect(usage.minute.requests).toBe(1);
      expect(usage.minute.tokens).toBe(500);
      expect(usage.day.requests).toBe(1);
      expect(usage.day.tokens).toBe(500);
    });

    it('should ask the caller to wait when the minute request ceiling is reached', () => {
      const gate = new RateGate({ now, limits: { requestsPerMinute: 2 } });
      admitOrFail(gate, 10);
      admitOrFail(gate, 10);
      clock += 15_000;

      const decision = gate.admit(10);

      expect(decision).toEqual({ kind: 'wait', waitMs: 45_000, window: 'minute' });
      expect(gate.getUsage().minute.requests).toBe(2);
    });

    it('should signal rate_exceeded when the wait is longer than the caller allows', () => {
      const gate = new RateGate({ now, limits: { requestsPerMinute: 1 } });
      admitOrFail(gate, 10);

      const decision = gate.admit(10, 2000);

      expect(decision.kind).toBe('rate_exceeded');
      expect(decision.kind === 'rate_exceeded' && decision.window).toBe('minute');
    });

    it('should bind on the minute token ceiling', () => {
      const gate = new RateGate({ now, limits: { tokensPerMinute: 1000 } });
      admitOrFail(gate, 600);

      expect(gate.admit(600).kind).toBe('wait');
      expect(gate.admit(400).kind).toBe('admitted');
    });

    it('should wait for the later reset when both windows bind', () => {
      const gate = new RateGate({
        now,
        limits: { requestsPerMinute: 1, requestsPerDay: 1 },
      });
      admitOrFail(gate, 10);

      const decision = gate.admit(10);

      expect(decision).toEqual({ kind: 'wait', waitMs: 24 * 60 * 60_000, window: 'day' });
    });

    it('should reject an estimate that can never fit a window', () => {
      const gate = new RateGate({ now, limits: { tokensPerMinute: 100 } });

      const decision = gate.admit(101);

      expect(decision.kind).toBe('rate_exceeded');
      expect(gate.getUsage().minute.requests).toBe(0);
    });

    it('should reset counts to zero at rollover', () => {
      const gate = new RateGate({ now, limits: { requestsPerMinute: 1 } });
      admitOrFail(gate, 10);
      clock += 60_000;

      expect(gate.admit(10).kind).toBe('admitted');
      expect(gate.getUsage().minute.requests).toBe(1);
      expect(gate.getUsage().day.requests).toBe(2);
    });

    it('should never admit past a ceiling under a burst', () => {
      const gate = new RateGate({ now });

      const admitted = Array.from({ length: 50 }, () => gate.admit(100)).filter(
        (d) => d.kind === 'admitted'
      );

      expect(admitted).toHaveLength(30);
      expect(gate.getUsage().minute.requests).toBe(30);
      expect(gate.getUsage().minute.tokens).toBe(3000);
    });
  });

  describe('record', () => {
    it('should replace the estimate with the actual token count', () => {
      const gate = new RateGate({ now });
      const before = gate.getUsage().minute.tokens;
      const ticket = admitOrFail(gate, 500);

      gate.record(ticket, 320);

      const usage = gate.getUsage();
      expect(usage.minute.tokens).toBe(before + 320);
      expect(usage.day.tokens).toBe(before + 320);
      expect(usage.minute.requests).toBe(1);
    });

    it('should keep the request but drop the tokens of a failed call', () => {
      const gate = new RateGate({ now });
      const ticket = admitOrFail(gate, 500);

      gate.record(ticket, 0);

      expect(gate.getUsage().minute).toMatchObject({ requests: 1, tokens: 0 });
    });

    it('should ignore a ticket that was already settled', () => {
      const gate = new RateGate({ now });
      const ticket = admitOrFail(gate, 500);

      gate.record(ticket, 300);
      gate.record(ticket, 300);

      expect(gate.getUsage().minute.tokens).toBe(300);
    });

    it('should bill the new window when the reservation rolled over', () => {
      const gate = new RateGate({ now });
      const ticket = admitOrFail(gate, 500);
      clock += 60_000;

      gate.record(ticket, 300);

      const usage = gate.getUsage();
      expect(usage.minute).toMatchObject({ requests: 0, tokens: 300 });
      expect(usage.day).toMatchObject({ requests: 1, tokens: 300 });
    });

    it('should keep the new window within its ceiling when billing a rolled-over reservation', () => {
      const gate = new RateGate({ now, limits: { tokensPerMinute: 1000 } });
      const first = admitOrFail(gate, 900);
      clock += 60_000;
      admitOrFail(gate, 900);

      gate.record(first, 900);

      const usage = gate.getUsage();
      expect(usage.minute).toMatchObject({ requests: 1, tokens: 1000, remainingTokens: 0 });
      expect(usage.day).toMatchObject({ requests: 2, tokens: 1800 });
      expect(gate.admit(10)).toMatchObject({ kind: 'wait', window: 'minute' });
    });

    it('should cap an overrun at the window ceiling', () => {
      const gate = new RateGate({ now, limits: { tokensPerMinute: 1000 } });
      const ticket = admitOrFail(gate, 600);

      gate.record(ticket, 1500);

      expect(gate.getUsage().minute.tokens).toBe(1000);
    });
  });

  describe('acquire', () => {
    it('should sleep until the window rolls over and then admit', async () => {
      const sleep = jest.fn(async (ms: number) => {
        clock += ms;
      });
      const gate = new RateGate({ now, sleep, limits: { requestsPerMinute: 1 } });
      admitOrFail(gate, 10);
      clock += 59_000;

      const result = await gate.acquire(10, 2000);

      expect(result.kind).toBe('admitted');
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(1000);
    });

    it('should return rate_exceeded without sleeping when the wait is too long', async () => {
      const sleep = jest.fn(async () => undefined);
      const gate = new RateGate({ now, sleep, limits: { requestsPerMinute: 1 } });
      admitOrFail(gate, 10);

      const result = await gate.acquire(10, 2000);

      expect(result.kind).toBe('rate_exceeded');
      expect(sleep).not.toHaveBeenCalled();
    });
  });

  it('should report remaining budget', () => {
    const gate = new RateGate({ now, limits: { requestsPerMinute: 5, tokensPerMinute: 1000 } });
    admitOrFail(gate, 250);
    clock += 10_000;

    expect(gate.getUsage().minute).toEqual({
      requests: 1,
      tokens: 250,
      requestLimit: 5,
      tokenLimit: 1000,
      remainingRequests: 4,
      remainingTokens: 750,
      resetsInMs: 50_000,
    });
  });
});
