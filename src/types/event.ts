/**
 * Event payload types.
 *
 * Field names and nesting are the collector's wire contract.
 */

import type { DataMap, DataScalar } from './common.js';

/**
 * Coarse impact tier derived from an error
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Logging-style classification derived from severity and event kind
 */
export type ErrorLevel = 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

/**
 * Kind of event being classified
 */
export type EventKind = 'error' | 'request';

/**
 * Structured stack frame parsed from a trace line
 */
export interface ParsedStackFrame {
  file: string;
  line: number;
  column: number;
  function: string;
}

/**
 * Unparseable trace line kept verbatim
 */
export interface RawStackFrame {
  raw: string;
}

export type StackFrame = ParsedStackFrame | RawStackFrame;

/**
 * Frames keyed by ordinal position: frame0, frame1, ...
 */
export type StackTrace = Record<string, StackFrame>;

/**
 * Static descriptors of the running process
 */
export interface EventContexts {
  runtime: {
    name: string;
    version: string;
  };
  system: {
    os: string;
    uname: string;
  };
  process: {
    pid: number;
  };
}

/**
 * Additional data attached to exception events
 */
export interface ExceptionDetails {
  file: string;
  line: number;
  trace: string;
  hostname: string;
}

/**
 * Additional data attached to HTTP request events
 */
export interface RequestDetails {
  headers: Record<string, string>;
  queryParams: Record<string, DataScalar>;
  body: DataMap;
  method: string;
  host: string;
  protocol: string;
  hostname: string;
  port: string;
}

/**
 * Normalized, delivery-ready telemetry record
 */
export interface EventPayload {
  errorMessage: string;
  errorType: string;
  errorLevel: ErrorLevel;
  environment: string;
  ip: string;
  userAgent: string;
  url: string;
  timestamp: string;
  additionalData: ExceptionDetails | RequestDetails;
  stackTrace: StackTrace;
  contexts: EventContexts;
  release: string;
  component: string;
  transactionId: string;
  fingerprint: string;
  rootCause: string;
  category: string;
  memoryUsage: number;
  cpuUsage: number | null;
  responseTime: number;
  tags: string[];
  errorSeverity: ErrorSeverity;
}

/**
 * Error type sentinel used for request events
 */
export const HTTP_REQUEST_EVENT_TYPE = 'HTTPRequest';
