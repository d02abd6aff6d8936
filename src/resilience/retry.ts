/**
 * Fixed-delay retry executor for collector delivery.
 */

import type { RetryConfig } from '../types/index.js';
import { RetriesExhaustedError } from '../errors/index.js';

/**
 * Retry hook callbacks.
 */
export interface RetryHooks {
  /** Called after each failed attempt */
  onAttemptFailed?: (attempt: number, error: Error) => void;
  /** Called before waiting for the next attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Called when all attempts are exhausted */
  onExhausted?: (error: Error, attempts: number) => void;
}

/**
 * Default retry configuration: three attempts, one second apart
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  delayMs: 1000,
};

/**
 * Retry executor for transient failures.
 *
 * Every failure is retried; the delay between attempts is constant.
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly hooks: RetryHooks;

  constructor(config: RetryConfig = DEFAULT_RETRY_CONFIG, hooks: RetryHooks = {}) {
    this.config = config;
    this.hooks = hooks;
  }

  /**
   * Executes an operation with retry logic.
   * @param operation - The async operation to execute, given the 1-based attempt number
   * @returns The result of the first successful attempt
   * @throws RetriesExhaustedError wrapping the last failure
   */
  async execute<T>(operation: (attempt: number) => Promise<T>): Promise<T> {
    const maxAttempts = Math.max(1, this.config.maxAttempts);
    let lastError: Error = new Error('No attempt was made');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        this.hooks.onAttemptFailed?.(attempt, lastError);

        if (attempt < maxAttempts) {
          this.hooks.onRetry?.(attempt, lastError, this.config.delayMs);
          await this.sleep(this.config.delayMs);
        }
      }
    }

    this.hooks.onExhausted?.(lastError, maxAttempts);
    throw new RetriesExhaustedError(maxAttempts, lastError);
  }

  getConfig(): Readonly<RetryConfig> {
    return { ...this.config };
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
