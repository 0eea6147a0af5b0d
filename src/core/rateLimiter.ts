import { sleep } from "./async.js";
import { EngineError } from "./errors.js";

/** Gate in front of upstream calls. `acquire` resolves when the caller may proceed. */
export interface RateLimiter {
  acquire(signal?: AbortSignal): Promise<void>;
}

type Clock = {
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

/**
 * Limits the start rate: starts are spaced at least `intervalMs` apart, the first one goes
 * immediately. It does not pause after a call finishes, so once a call outlasts the
 * interval the next one starts without delay.
 */
export class FixedIntervalRateLimiter implements RateLimiter {
  private nextAt = 0;
  private readonly now: () => number;
  private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    readonly intervalMs: number,
    clock: Clock = {}
  ) {
    this.now = clock.now ?? Date.now;
    this.wait = clock.sleep ?? sleep;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    const now = this.now();
    const startAt = Math.max(now, this.nextAt);
    // Reserve the slot before waiting so concurrent callers queue behind it.
    this.nextAt = startAt + this.intervalMs;
    await this.wait(startAt - now, signal);
  }
}

/** Up to `capacity` calls in a burst, refilled at `refillPerSecond`. */
export class TokenBucketRateLimiter implements RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly now: () => number;
  private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    readonly capacity: number,
    readonly refillPerSecond: number,
    clock: Clock = {}
  ) {
    if (capacity < 1) throw new Error("capacity must be >= 1");
    if (refillPerSecond <= 0) throw new Error("refillPerSecond must be > 0");
    this.now = clock.now ?? Date.now;
    this.wait = clock.sleep ?? sleep;
    this.tokens = capacity;
    this.lastRefill = this.now();
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + (elapsed / 1000) * this.refillPerSecond);
      this.lastRefill = now;
    }
  }

  /** Tokens available right now (fractional while refilling). */
  available(): number {
    this.refill();
    return this.tokens;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    for (;;) {
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      const waitMs = Math.ceil(((1 - this.tokens) / this.refillPerSecond) * 1000);
      await this.wait(waitMs, signal);
    }
  }
}

export type RateLimiterSettings = {
  kind: string;
  intervalMs: number;
  burst: number;
  perSecond: number;
};

export function createRateLimiter(s: RateLimiterSettings, clock: Clock = {}): RateLimiter {
  switch (s.kind) {
    case "fixed":
      return new FixedIntervalRateLimiter(s.intervalMs, clock);
    case "token-bucket":
      return new TokenBucketRateLimiter(s.burst, s.perSecond, clock);
    default:
      throw new EngineError("INVALID_INPUT", `unknown rate limiter: ${s.kind} (expected fixed or token-bucket)`);
  }
}
