/**
 * Severity and level classification for captured errors
 */

import type { ErrorLevel, ErrorSeverity, EventKind } from '../types/index.js';

/**
 * Error classes classified as high severity: type mismatches and
 * engine-raised reference failures
 */
export const HIGH_SEVERITY_ERROR_TYPES: readonly (new (...args: never[]) => Error)[] = [
  TypeError,
  ReferenceError,
];

/**
 * Map an error to a severity tier. First match wins.
 */
export function determineSeverity(error: Error): ErrorSeverity {
  if (HIGH_SEVERITY_ERROR_TYPES.some((type) => error instanceof type)) {
    return 'high';
  }

  const message = error.message.toLowerCase();
  if (message.includes('syntax')) {
    return 'critical';
  }
  if (message.includes('timeout') || message.includes('network')) {
    return 'medium';
  }
  return 'low';
}

/**
 * Map an event kind and severity to a level
 */
export function determineLevel(kind: EventKind, severity: ErrorSeverity): ErrorLevel {
  if (severity === 'critical') {
    return 'CRITICAL';
  }
  return kind === 'error' ? 'ERROR' : 'WARNING';
}
