export type RateWindowName = 'minute' | 'day';

export interface RateGateLimits {
  requestsPerMinute: number;
  requestsPerDay: number;
  tokensPerMinute: number;
  tokensPerDay: number;
}

export const DEFAULT_RATE_LIMITS: RateGateLimits = {
  requestsPerMinute: 30,
  requestsPerDay: 1000,
  tokensPerMinute: 12000,
  tokensPerDay: 100000,
};

interface RateGateOptions {
  limits?: Partial<RateGateLimits>;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

interface UsageWindow {
  name: RateWindowName;
  durationMs: number;
  requestLimit: number;
  tokenLimit: number;
  requests: number;
  tokens: number;
  windowStart: number;
}

/**
 * A reservation handed out by `admit`. Settle it with `record` once the
 * external call has finished, successful or not.
 */
export interface RateTicket {
  readonly id: number;
  readonly estimatedTokens: number;
  readonly windowStarts: Readonly<Record<RateWindowName, number>>;
}

export type AdmissionDecision =
  | { kind: 'admitted'; ticket: RateTicket }
  | { kind: 'wait'; waitMs: number; window: RateWindowName }
  | { kind: 'rate_exceeded'; waitMs: number; window: RateWindowName; reason: string };

export type AcquireResult = Exclude<AdmissionDecision, { kind: 'wait' }>;

export interface RateWindowUsage {
  requests: number;
  tokens: number;
  requestLimit: number;
  tokenLimit: number;
  remainingRequests: number;
  remainingTokens: number;
  resetsInMs: number;
}

export type RateGateUsage = Record<RateWindowName, RateWindowUsage>;

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * 60_000;

/**
 * Dual-window (minute + day) admission controller for calls to the
 * generation service. Each window tracks request and token counts and
 * rolls over lazily when it is read.
 *
 * Every ledger read-modify-write happens inside one synchronous method, so
 * concurrent sessions on the event loop never interleave inside an update.
 * The only awaits are in `acquire`, between admission attempts.
 */
export class RateGate {
  private readonly windows: UsageWindow[];
  private readonly pending = new Set<number>();
  private readonly now: () => number;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private nextTicketId = 1;

  constructor(options: RateGateOptions = {}) {
    const limits = { ...DEFAULT_RATE_LIMITS, ...options.limits };
    this.now = options.now ?? (() => Date.now());
    this.sleepFn = options.sleep ?? ((ms) => this.sleep(ms));

    const start = this.now();
    this.windows = [
      {
        name: 'minute',
        durationMs: MINUTE_MS,
        requestLimit: limits.requestsPerMinute,
        tokenLimit: limits.tokensPerMinute,
        requests: 0,
        tokens: 0,
        windowStart: start,
      },
      {
        name: 'day',
        durationMs: DAY_MS,
        requestLimit: limits.requestsPerDay,
        tokenLimit: limits.tokensPerDay,
        requests: 0,
        tokens: 0,
        windowStart: start,
      },
    ];
  }

  /**
   * Try to reserve one request and `estimatedTokens` tokens in both windows.
   *
   * Returns `wait` with the time until every binding window has rolled over,
   * or `rate_exceeded` when that wait is longer than `maxWaitMs` or the
   * estimate can never fit a window.
   */
  admit(estimatedTokens: number, maxWaitMs = Number.POSITIVE_INFINITY): AdmissionDecision {
    const estimate = Math.max(0, Math.ceil(estimatedTokens));
    const now = this.now();
    this.rollover(now);

    const oversized = this.windows.find((w) => estimate > w.tokenLimit);
    if (oversized) {
      return {
        kind: 'rate_exceeded',
        waitMs: 0,
        window: oversized.name,
        reason: `estimate of ${estimate} tokens exceeds the ${oversized.name} ceiling of ${oversized.tokenLimit}`,
      };
    }

    const binding = this.windows.filter(
      (w) => w.requests + 1 > w.requestLimit || w.tokens + estimate > w.tokenLimit
    );

    if (binding.length === 0) {
      for (const w of this.windows) {
        w.requests += 1;
        w.tokens += estimate;
      }
      const ticket: RateTicket = {
        id: this.nextTicketId++,
        estimatedTokens: estimate,
        windowStarts: this.snapshotStarts(),
      };
      this.pending.add(ticket.id);
      return { kind: 'admitted', ticket };
    }

    // Both windows may bind at once; admission needs every one of them clear.
    let waitMs = 0;
    let window: RateWindowName = binding[0].name;
    for (const w of binding) {
      const untilReset = Math.max(1, w.windowStart + w.durationMs - now);
      if (untilReset > waitMs) {
        waitMs = untilReset;
        window = w.name;
      }
    }

    if (waitMs > maxWaitMs) {
      return {
        kind: 'rate_exceeded',
        waitMs,
        window,
        reason: `${window} window resets in ${waitMs}ms, over the ${maxWaitMs}ms limit`,
      };
    }

    return { kind: 'wait', waitMs, window };
  }

  /**
   * Replace a ticket's estimate with the tokens actually consumed.
   * A ticket is settled once; later calls with it are ignored.
   *
   * A window never holds more than its token ceiling. Usage past it, from an
   * overrun or from a reservation that rolled into a fresh window, is billed
   * only up to the ceiling, which still blocks admission until the reset.
   */
  record(ticket: RateTicket, actualTokens: number): void {
    if (!this.pending.delete(ticket.id)) {
      return;
    }

    const actual = Math.max(0, Math.ceil(actualTokens));
    this.rollover(this.now());

    for (const w of this.windows) {
      let billed: number;
      if (w.windowStart === ticket.windowStarts[w.name]) {
        billed = w.tokens - ticket.estimatedTokens + actual;
      } else {
        // The reservation rolled away with the old window; bill the new one.
        billed = w.tokens + actual;
      }
      w.tokens = Math.min(w.tokenLimit, Math.max(0, billed));
    }
  }

  /**
   * Admit, sleeping through `wait` decisions until admitted or until the
   * total wait would pass `maxWaitMs`.
   */
  async acquire(estimatedTokens: number, maxWaitMs: number): Promise<AcquireResult> {
    let budget = maxWaitMs;

    for (;;) {
      const decision = this.admit(estimatedTokens, budget);
      if (decision.kind !== 'wait') {
        return decision;
      }
      await this.sleepFn(decision.waitMs);
      budget -= decision.waitMs;
    }
  }

  getUsage(): RateGateUsage {
    const now = this.now();
    this.rollover(now);

    const [minute, day] = this.windows.map((w) => ({
      requests: w.requests,
      tokens: w.tokens,
      requestLimit: w.requestLimit,
      tokenLimit: w.tokenLimit,
      remainingRequests: Math.max(0, w.requestLimit - w.requests),
      remainingTokens: Math.max(0, w.tokenLimit - w.tokens),
      resetsInMs: Math.max(0, w.windowStart + w.durationMs - now),
    }));

    return { minute, day };
  }

  private rollover(now: number): void {
    for (const w of this.windows) {
      if (now - w.windowStart >= w.durationMs) {
        w.requests = 0;
        w.tokens = 0;
        w.windowStart = now;
      }
    }
  }

  private snapshotStarts(): Record<RateWindowName, number> {
    const [minute, day] = this.windows;
    return { minute: minute.windowStart, day: day.windowStart };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
