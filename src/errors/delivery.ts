import { AllStackError } from './base.js';
import type { ErrorCategory } from './base.js';

/**
 * Every delivery attempt failed; `cause` holds the last failure
 */
export class RetriesExhaustedError extends AllStackError {
  readonly category: ErrorCategory = 'delivery';
  readonly attempts: number;

  constructor(attempts: number, cause: Error) {
    super(`Failed after ${attempts} attempts: ${cause.message}`, {
      details: { attempts },
      cause,
    });
    this.attempts = attempts;
  }
}
