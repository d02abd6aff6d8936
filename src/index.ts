/**
 * AllStack client for Node.js
 *
 * Captures exceptions and inbound HTTP transactions as normalized events,
 * redacts sensitive request data, classifies severity, and delivers events
 * to the AllStack collector with rate limiting and bounded retry.
 *
 * @packageDocumentation
 */

// ============================================================================
// Client Exports
// ============================================================================

export type { AllStackClient, ClientDependencies } from './client/index.js';
export { AllStackClientImpl, createClient } from './client/index.js';

// ============================================================================
// Event Exports
// ============================================================================

export {
  EventBuilder,
  normalizeError,
  errorTypeName,
  formatTimestamp,
  createContexts,
  UNKNOWN_EXCEPTION_MESSAGE,
  REQUEST_EVENT_MESSAGE,
} from './event/index.js';
export type { EventBuilderOptions, HostEnvironment } from './event/index.js';

export { formatStackTrace, parseStackLine, isParsedFrame } from './stacktrace/index.js';
export type { StackLineParser } from './stacktrace/index.js';

export { determineSeverity, determineLevel } from './severity/index.js';

// ============================================================================
// Security Exports
// ============================================================================

export {
  RequestDataTransformer,
  SENSITIVE_FIELDS,
  REDACTED_MARKER,
  isSensitiveKey,
  coerceScalar,
} from './security/index.js';

// ============================================================================
// Validation Exports
// ============================================================================

export { PayloadValidator, checkPayload } from './validation/index.js';
export type { PayloadCheck } from './validation/index.js';

// ============================================================================
// Resilience Exports
// ============================================================================

export {
  SlidingWindowRateLimiter,
  RetryExecutor,
  CAPTURE_RATE_LIMIT_KEY,
} from './resilience/index.js';
export type { RateLimiter, RetryHooks } from './resilience/index.js';

// ============================================================================
// Transport Exports
// ============================================================================

export { DeliveryClient, UndiciTransport, ENDPOINTS } from './transport/index.js';
export type {
  HttpRequest,
  HttpResponse,
  HttpTransport,
  UndiciTransportOptions,
} from './transport/index.js';

// ============================================================================
// HTTP Request Extraction
// ============================================================================

export { extractRequestData } from './http/index.js';
export type { ExtractRequestOptions } from './http/index.js';

// ============================================================================
// Logging Exports
// ============================================================================

export { ConsoleLogger, NoopLogger, GuardedLogger, LogLevel } from './observability/index.js';
export type { ConsoleLoggerOptions, LogSink } from './observability/index.js';

// ============================================================================
// Error Exports
// ============================================================================

export {
  AllStackError,
  isAllStackError,
  isRetryableError,
  ConfigurationError,
  TransportError,
  HttpStatusError,
  RequestTimeoutError,
  RetriesExhaustedError,
} from './errors/index.js';
export type { ErrorCategory, AllStackErrorOptions } from './errors/index.js';

// ============================================================================
// Configuration Exports
// ============================================================================

export {
  DEFAULT_CONFIG,
  applyDefaults,
  resolveConfig,
  configFromEnvironment,
} from './config/index.js';

// ============================================================================
// Type Exports
// ============================================================================

export type {
  AllStackConfig,
  ResolvedConfig,
  Logger,
  EventPayload,
  ErrorLevel,
  ErrorSeverity,
  EventKind,
  StackFrame,
  StackTrace,
  ParsedStackFrame,
  RawStackFrame,
  ExceptionDetails,
  RequestDetails,
  EventContexts,
  RequestData,
  DataMap,
  DataValue,
  DataScalar,
} from './types/index.js';
export { HTTP_REQUEST_EVENT_TYPE } from './types/index.js';
