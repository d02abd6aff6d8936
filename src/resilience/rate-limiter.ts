/**
 * Call-rate limiting for capture attempts.
 *
 * A rolling window keeps the timestamp of every admitted attempt per key;
 * an attempt is admitted while fewer than `maxAttempts` timestamps fall
 * inside the window. Node runs every capture on one event loop, so the
 * check-and-record in `attempt()` cannot interleave with another capture.
 */

/**
 * Key under which all capture attempts are counted
 */
export const CAPTURE_RATE_LIMIT_KEY = 'allstack-api';

/**
 * Default rolling window length in milliseconds
 */
export const DEFAULT_RATE_LIMIT_WINDOW_MS = 60_000;

/**
 * Rate limiter interface for capture admission
 */
export interface RateLimiter {
  /**
   * Record an attempt for the key if the budget allows it.
   * @returns True when admitted, false when throttled.
   */
  attempt(key: string, maxAttempts: number): boolean;

  /**
   * Attempts still available for the key in the current window
   */
  remaining(key: string, maxAttempts: number): number;

  /**
   * Milliseconds until the oldest recorded attempt leaves the window
   */
  availableIn(key: string): number;

  /**
   * Forget every attempt recorded for the key
   */
  clear(key: string): void;
}

/**
 * Rolling-window rate limiter held in process memory
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly windowMs: number;
  private readonly attempts = new Map<string, number[]>();

  constructor(windowMs: number = DEFAULT_RATE_LIMIT_WINDOW_MS) {
    this.windowMs = windowMs;
  }

  attempt(key: string, maxAttempts: number): boolean {
    const now = Date.now();
    const timestamps = this.prune(key, now);
    if (timestamps.length >= maxAttempts) {
      return false;
    }
    timestamps.push(now);
    this.attempts.set(key, timestamps);
    return true;
  }

  remaining(key: string, maxAttempts: number): number {
    return Math.max(0, maxAttempts - this.prune(key, Date.now()).length);
  }

  availableIn(key: string): number {
    const now = Date.now();
    const timestamps = this.prune(key, now);
    if (timestamps.length === 0) {
      return 0;
    }
    return Math.max(0, timestamps[0] + this.windowMs - now);
  }

  clear(key: string): void {
    this.attempts.delete(key);
  }

  /**
   * Drop timestamps that have left the window and return the rest
   */
  private prune(key: string, now: number): number[] {
    const cutoff = now - this.windowMs;
    const timestamps = (this.attempts.get(key) ?? []).filter((timestamp) => timestamp > cutoff);
    if (timestamps.length === 0) {
      this.attempts.delete(key);
    } else {
      this.attempts.set(key, timestamps);
    }
    return timestamps;
  }
}
