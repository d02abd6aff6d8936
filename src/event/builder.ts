/**
 * Event construction for the exception and HTTP-transaction paths
 */

import type {
  EventContexts,
  EventPayload,
  Logger,
  RequestData,
} from '../types/index.js';
import { HTTP_REQUEST_EVENT_TYPE } from '../types/index.js';
import { RequestDataTransformer } from '../security/index.js';
import { formatStackTrace, firstParsedFrame } from '../stacktrace/index.js';
import { determineLevel, determineSeverity } from '../severity/index.js';
import {
  createContexts,
  formatTimestamp,
  getHostname,
  getIpAddress,
  getMemoryUsage,
} from './context.js';

export const UNKNOWN_EXCEPTION_MESSAGE = 'Unknown Exception';
export const REQUEST_EVENT_MESSAGE = 'HTTP Request Captured';
export const EXCEPTION_USER_AGENT = 'Node.js';
export const UNKNOWN_USER_AGENT = 'unknown';

/**
 * Host facts used while building events; replaceable in tests
 */
export interface HostEnvironment {
  contexts(): EventContexts;
  hostname(): string;
  ipAddress(): string;
  memoryUsage(): number;
  now(): Date;
}

export const NODE_HOST_ENVIRONMENT: HostEnvironment = {
  contexts: createContexts,
  hostname: getHostname,
  ipAddress: getIpAddress,
  memoryUsage: getMemoryUsage,
  now: () => new Date(),
};

type CommonEventFields = Pick<
  EventPayload,
  | 'contexts'
  | 'release'
  | 'component'
  | 'transactionId'
  | 'fingerprint'
  | 'rootCause'
  | 'category'
  | 'memoryUsage'
  | 'cpuUsage'
  | 'responseTime'
  | 'tags'
>;

/**
 * Options for the event builder
 */
export interface EventBuilderOptions {
  environment: string;
  release: string;
  component: string;
  logger: Logger;
  transformer?: RequestDataTransformer;
  host?: HostEnvironment;
}

/**
 * Wrap any thrown value in an Error
 */
export function normalizeError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  if (typeof value === 'string') {
    return new Error(value);
  }
  if (value === undefined || value === null) {
    return new Error(UNKNOWN_EXCEPTION_MESSAGE);
  }
  try {
    return new Error(JSON.stringify(value));
  } catch {
    return new Error(String(value));
  }
}

/**
 * Class name of an error, e.g. "TypeError" or "PaymentDeclinedError"
 */
export function errorTypeName(error: Error): string {
  if (error.name && error.name !== 'Error') {
    return error.name;
  }
  return error.constructor.name || 'Error';
}

/**
 * Builds frozen event payloads
 */
export class EventBuilder {
  private readonly options: EventBuilderOptions;
  private readonly transformer: RequestDataTransformer;
  private readonly host: HostEnvironment;

  constructor(options: EventBuilderOptions) {
    this.options = options;
    this.transformer = options.transformer ?? new RequestDataTransformer();
    this.host = options.host ?? NODE_HOST_ENVIRONMENT;
  }

  /**
   * Build an "error" event from a thrown value
   */
  fromException(error: Error, environment: string = this.options.environment): Readonly<EventPayload> {
    const errorSeverity = determineSeverity(error);
    const errorLevel = determineLevel('error', errorSeverity);
    const rawTrace = error.stack ?? '';
    const stackTrace = formatStackTrace(rawTrace);
    const origin = firstParsedFrame(stackTrace);

    const payload: EventPayload = {
      errorMessage: error.message || UNKNOWN_EXCEPTION_MESSAGE,
      errorType: errorTypeName(error),
      errorLevel,
      environment,
      ip: this.host.ipAddress(),
      userAgent: EXCEPTION_USER_AGENT,
      url: '',
      timestamp: formatTimestamp(this.host.now()),
      additionalData: {
        file: origin?.file ?? '',
        line: origin?.line ?? 0,
        trace: rawTrace,
        hostname: this.host.hostname(),
      },
      stackTrace,
      ...this.commonFields(0),
      errorSeverity,
    };

    this.options.logger.debug('AllStack exception payload', { payload });
    return Object.freeze(payload);
  }

  /**
   * Build a "request" event from extracted request primitives
   */
  fromRequest(
    request: RequestData,
    responseTimeMs: number = 0,
    environment: string = this.options.environment
  ): Readonly<EventPayload> {
    const headers = this.transformer.transformHeaders(request.headers ?? {});
    this.options.logger.debug('Transformed headers', { headers });

    const queryParams = this.transformer.transformQueryParams(request.query ?? {});
    this.options.logger.debug('Transformed query params', { params: queryParams });

    const payload: EventPayload = {
      errorMessage: REQUEST_EVENT_MESSAGE,
      errorType: HTTP_REQUEST_EVENT_TYPE,
      errorLevel: 'WARNING',
      environment,
      ip: request.ip ?? '',
      userAgent: request.userAgent ?? UNKNOWN_USER_AGENT,
      url: request.url,
      timestamp: formatTimestamp(this.host.now()),
      additionalData: {
        headers,
        queryParams,
        body: this.transformer.transformRequestBody(request.body),
        method: request.method.toUpperCase(),
        host: request.host ?? '',
        protocol: request.protocol ?? '',
        hostname: this.host.hostname(),
        port: request.port === undefined ? '' : String(request.port),
      },
      stackTrace: {},
      ...this.commonFields(responseTimeMs),
      errorSeverity: 'low',
    };

    this.options.logger.debug('AllStack request payload', { payload });
    return Object.freeze(payload);
  }

  private commonFields(responseTime: number): CommonEventFields {
    return {
      contexts: this.host.contexts(),
      release: this.options.release,
      component: this.options.component,
      transactionId: '',
      fingerprint: '',
      rootCause: '',
      category: '',
      memoryUsage: this.host.memoryUsage(),
      cpuUsage: null,
      responseTime,
      tags: [],
    };
  }
}
