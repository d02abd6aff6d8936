/**
 * Error classes for the AllStack client.
 */

// Base error
export {
  AllStackError,
  isAllStackError,
  isRetryableError,
  errorMessage,
} from './base.js';
export type { ErrorCategory, AllStackErrorOptions } from './base.js';

// Configuration errors
export { ConfigurationError } from './configuration.js';

// Transport errors
export {
  TransportError,
  HttpStatusError,
  RequestTimeoutError,
} from './transport.js';

// Delivery errors
export { RetriesExhaustedError } from './delivery.js';
