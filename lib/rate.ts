export type RateDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; reason: "too_many_calls"; retryAfterMs: number }
  | { allowed: false; reason: "prompt_too_large"; retryAfterMs: null; limit: number };

export type RateLimiterOptions = {
  windowMs?: number;
  maxCalls?: number;
  maxPromptChars?: number;
  now?: () => number;
};

/**
 * Rolling-window limiter keyed by user. The check and the slot write happen in
 * one synchronous step, so simultaneous sessions for the same user cannot both
 * take the last slot.
 */
export class RateLimiter {
  private readonly calls = new Map<string, number[]>();
  readonly windowMs: number;
  readonly maxCalls: number;
  readonly maxPromptChars: number;
  private readonly now: () => number;

  constructor(opts: RateLimiterOptions = {}) {
    this.windowMs = opts.windowMs ?? 60_000;
    this.maxCalls = opts.maxCalls ?? 30;
    this.maxPromptChars = opts.maxPromptChars ?? 5000;
    this.now = opts.now ?? Date.now;
  }

  acquire(userId: string, promptLength: number): RateDecision {
    if (promptLength > this.maxPromptChars) {
      return { allowed: false, reason: "prompt_too_large", retryAfterMs: null, limit: this.maxPromptChars };
    }

    const now = this.now();
    const live = this.prune(userId, now);
    if (live.length >= this.maxCalls) {
      // oldest call leaves the window first
      const retryAfterMs = Math.max(1, live[0] + this.windowMs - now);
      return { allowed: false, reason: "too_many_calls", retryAfterMs };
    }

    live.push(now);
    this.calls.set(userId, live);
    return { allowed: true, remaining: this.maxCalls - live.length };
  }

  /** Calls still counted against the user right now. */
  inFlightCount(userId: string): number {
    return this.prune(userId, this.now()).length;
  }

  reset(userId?: string) {
    if (userId === undefined) this.calls.clear();
    else this.calls.delete(userId);
  }

  private prune(userId: string, now: number): number[] {
    const stamps = this.calls.get(userId) ?? [];
    const live = stamps.filter((ts) => now - ts < this.windowMs);
    if (live.length) this.calls.set(userId, live);
    else this.calls.delete(userId);
    return live;
  }
}
