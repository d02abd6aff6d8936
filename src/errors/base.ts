/**
 * Error taxonomy root for the AllStack client.
 *
 * Only configuration errors reach callers; transport and delivery errors
 * are caught at the capture boundary and turned into log entries.
 */

/**
 * Stage of the pipeline an error belongs to
 */
export type ErrorCategory = 'configuration' | 'transport' | 'delivery';

/**
 * Options shared by every client error
 */
export interface AllStackErrorOptions {
  /** Structured facts for logs */
  details?: Record<string, unknown>;
  /** Underlying failure */
  cause?: Error;
  /** Whether delivery may attempt the operation again */
  retryable?: boolean;
}

export abstract class AllStackError extends Error {
  abstract readonly category: ErrorCategory;
  readonly isRetryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(message: string, options: AllStackErrorOptions = {}) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.isRetryable = options.retryable ?? false;
    this.details = options.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      isRetryable: this.isRetryable,
      details: this.details,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }

  toString(): string {
    const head = `${this.name}: ${this.message}`;
    return this.cause instanceof Error ? `${head}\nCaused by: ${this.cause.message}` : head;
  }
}

export function isAllStackError(error: unknown): error is AllStackError {
  return error instanceof AllStackError;
}

export function isRetryableError(error: unknown): boolean {
  return isAllStackError(error) && error.isRetryable;
}

/**
 * Message of any thrown value, for log lines
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
