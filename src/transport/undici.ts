/**
 * Pooled HTTP transport built on undici.
 *
 * One Agent keeps keep-alive connections per origin and is shared by every
 * capture that goes through this transport.
 *
 * @module transport/undici
 */

import { Agent, request } from 'undici';
import type { Dispatcher } from 'undici';
import type { TimeoutConfig } from '../types/index.js';
import { RequestTimeoutError, TransportError } from '../errors/index.js';
import type { HttpRequest, HttpResponse, HttpTransport } from './types.js';

/**
 * Default per-attempt timeouts
 */
export const DEFAULT_TIMEOUT_CONFIG: TimeoutConfig = {
  connectMs: 5000,
  requestMs: 5000,
};

const TIMEOUT_ERROR_CODES = new Set([
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

/**
 * Undici transport options
 */
export interface UndiciTransportOptions {
  /** Per-attempt timeouts */
  timeout?: Partial<TimeoutConfig>;
  /** Maximum pooled connections per origin */
  connections?: number;
  /** Idle keep-alive timeout in milliseconds */
  keepAliveTimeout?: number;
  /** Dispatcher to use instead of an owned Agent (e.g. a MockAgent in tests) */
  dispatcher?: Dispatcher;
}

/**
 * HTTP transport backed by an undici connection pool
 */
export class UndiciTransport implements HttpTransport {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly timeout: TimeoutConfig;
  private closed = false;

  constructor(options: UndiciTransportOptions = {}) {
    this.timeout = {
      ...DEFAULT_TIMEOUT_CONFIG,
      ...options.timeout,
    };

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({
        connections: options.connections ?? 10,
        keepAliveTimeout: options.keepAliveTimeout ?? 30000,
        connect: { timeout: this.timeout.connectMs },
        headersTimeout: this.timeout.requestMs,
        bodyTimeout: this.timeout.requestMs,
      });
      this.ownsDispatcher = true;
    }
  }

  async send(httpRequest: HttpRequest): Promise<HttpResponse> {
    if (this.closed) {
      throw new TransportError('Transport is closed', {
        details: { url: httpRequest.url },
      });
    }

    try {
      const response = await request(httpRequest.url, {
        dispatcher: this.dispatcher,
        method: httpRequest.method,
        headers: httpRequest.headers,
        body: httpRequest.body,
        headersTimeout: this.timeout.requestMs,
        bodyTimeout: this.timeout.requestMs,
        signal: AbortSignal.timeout(this.timeout.requestMs),
      });

      // Consume the response body to free the connection
      const body = await response.body.text();

      return {
        status: response.statusCode,
        headers: flattenHeaders(response.headers),
        body,
      };
    } catch (error) {
      throw this.toTransportError(error, httpRequest.url);
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  getTimeoutConfig(): Readonly<TimeoutConfig> {
    return { ...this.timeout };
  }

  private toTransportError(error: unknown, url: string): TransportError {
    if (!(error instanceof Error)) {
      return new TransportError(`Request to ${url} failed: ${String(error)}`, {
        details: { url },
      });
    }
    if (isTimeoutError(error)) {
      return new RequestTimeoutError(url, this.timeout.requestMs, error);
    }
    return new TransportError(`Request to ${url} failed: ${error.message}`, {
      details: { url },
      cause: error,
    });
  }
}

function isTimeoutError(error: Error): boolean {
  if (error.name === 'TimeoutError') {
    return true;
  }
  const code = 'code' in error ? error.code : undefined;
  return typeof code === 'string' && TIMEOUT_ERROR_CODES.has(code);
}

function flattenHeaders(
  headers: Record<string, string | string[] | undefined>
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value !== undefined) {
      result[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
    }
  }
  return result;
}
