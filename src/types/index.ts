/**
 * Type definitions for the AllStack client
 */

export type {
  DataScalar,
  DataValue,
  DataMap,
  HeaderBag,
  QueryBag,
} from './common.js';

export type {
  ErrorSeverity,
  ErrorLevel,
  EventKind,
  ParsedStackFrame,
  RawStackFrame,
  StackFrame,
  StackTrace,
  EventContexts,
  ExceptionDetails,
  RequestDetails,
  EventPayload,
} from './event.js';
export { HTTP_REQUEST_EVENT_TYPE } from './event.js';

export type { RequestData } from './request.js';

export type {
  Logger,
  RateLimitConfig,
  RetryConfig,
  TimeoutConfig,
  AllStackConfig,
  ResolvedConfig,
} from './config.js';
