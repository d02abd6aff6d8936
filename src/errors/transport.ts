/**
 * Failures of a single HTTP exchange with the collector. All of them are
 * retryable, non-2xx answers included.
 */

import { AllStackError } from './base.js';
import type { ErrorCategory } from './base.js';

export class TransportError extends AllStackError {
  readonly category: ErrorCategory = 'transport';

  constructor(message: string, options: { details?: Record<string, unknown>; cause?: Error } = {}) {
    super(message, { ...options, retryable: true });
  }
}

/**
 * The collector answered outside 2xx
 */
export class HttpStatusError extends TransportError {
  readonly statusCode: number;

  constructor(statusCode: number, url: string, responseBody?: string) {
    const kind = statusCode >= 500 ? 'Server Error' : 'Client Error';
    super(`HTTP ${statusCode}: ${kind}`, { details: { statusCode, url, responseBody } });
    this.statusCode = statusCode;
  }
}

/**
 * An attempt ran past its deadline
 */
export class RequestTimeoutError extends TransportError {
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number, cause?: Error) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`, {
      details: { url, timeoutMs },
      cause,
    });
    this.timeoutMs = timeoutMs;
  }
}
