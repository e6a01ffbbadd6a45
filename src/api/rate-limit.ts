/**
 * In-memory per-key request quota, bucketed by wall-clock minute.
 *
 * A key's counter resets as soon as the minute changes. Counters live for
 * the lifetime of the process only, so a restart resets every quota.
 * Suitable for single-process deployments.
 */

export const MINUTE_MS = 60_000;

/** Counter for one key identity. */
export interface RateWindow {
  minute: number;
  count: number;
}

export interface RateDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Time until the current bucket rolls over. */
  retryAfterMs: number;
}

export type Clock = () => number;

export class MinuteWindowLimiter {
  private readonly windows = new Map<string, RateWindow>();

  constructor(private readonly now: Clock = Date.now) {}

  /** Count one request for `identity` against `limit` per minute. */
  consume(identity: string, limit: number): RateDecision {
    const now = this.now();
    const minute = Math.floor(now / MINUTE_MS);
    const retryAfterMs = (minute + 1) * MINUTE_MS - now;

    let window = this.windows.get(identity);
    if (!window || window.minute !== minute) {
      window = { minute, count: 0 };
      this.windows.set(identity, window);
    }

    if (window.count >= limit) {
      return { allowed: false, limit, remaining: 0, retryAfterMs };
    }
    window.count += 1;
    return { allowed: true, limit, remaining: limit - window.count, retryAfterMs };
  }

  /** Current window for `identity`, if it has one. */
  peek(identity: string): RateWindow | undefined {
    const window = this.windows.get(identity);
    return window ? { ...window } : undefined;
  }
}
