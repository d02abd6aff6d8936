/**
 * Resilience module: rate limiting and retry
 */

export {
  SlidingWindowRateLimiter,
  CAPTURE_RATE_LIMIT_KEY,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
} from './rate-limiter.js';
export type { RateLimiter } from './rate-limiter.js';
export { RetryExecutor, DEFAULT_RETRY_CONFIG } from './retry.js';
export type { RetryHooks } from './retry.js';
