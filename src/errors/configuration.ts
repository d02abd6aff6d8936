/**
 * Construction-time configuration errors. Capture calls never throw these.
 */

import { AllStackError } from './base.js';
import type { ErrorCategory } from './base.js';

export class ConfigurationError extends AllStackError {
  readonly category: ErrorCategory = 'configuration';

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { details });
  }

  static missingRequiredField(field: string): ConfigurationError {
    return new ConfigurationError(`Missing required configuration field: ${field}`, { field });
  }

  static invalidFieldValue(field: string, value: unknown, reason?: string): ConfigurationError {
    const message = `Invalid value for configuration field '${field}'`;
    return new ConfigurationError(reason ? `${message}: ${reason}` : message, { field, value });
  }
}
