/**
 * Extraction of request primitives from a Node.js HTTP request.
 *
 * @module http/request-data
 */

import type { IncomingMessage } from 'node:http';
import type { QueryBag, RequestData } from '../types/index.js';

/**
 * Extraction options
 */
export interface ExtractRequestOptions {
  /** Parsed body; Node does not parse bodies itself */
  body?: unknown;
  /** Trust X-Forwarded-* headers for client IP, protocol and host */
  trustProxy?: boolean;
}

/**
 * Collect the query string of a URL into a bag; repeated keys become arrays
 */
export function parseQuery(searchParams: URLSearchParams): QueryBag {
  const query: QueryBag = {};
  for (const key of new Set(searchParams.keys())) {
    const values = searchParams.getAll(key);
    query[key] = values.length === 1 ? values[0] : values;
  }
  return query;
}

function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first?.split(',')[0]?.trim() || undefined;
}

/**
 * Build RequestData from an IncomingMessage
 */
export function extractRequestData(
  req: IncomingMessage,
  options: ExtractRequestOptions = {}
): RequestData {
  const socket = req.socket;
  const encrypted = 'encrypted' in socket && socket.encrypted === true;
  const forwardedProto = options.trustProxy
    ? firstHeaderValue(req.headers['x-forwarded-proto'])
    : undefined;
  const protocol = forwardedProto ?? (encrypted ? 'https' : 'http');

  const forwardedHost = options.trustProxy
    ? firstHeaderValue(req.headers['x-forwarded-host'])
    : undefined;
  const hostHeader = forwardedHost ?? req.headers.host ?? 'localhost';

  const url = new URL(req.url ?? '/', `${protocol}://${hostHeader}`);
  const defaultPort = protocol === 'https' ? 443 : 80;

  const forwardedFor = options.trustProxy
    ? firstHeaderValue(req.headers['x-forwarded-for'])
    : undefined;

  return {
    method: req.method ?? 'GET',
    url: url.toString(),
    headers: req.headers,
    query: parseQuery(url.searchParams),
    body: options.body,
    ip: forwardedFor ?? socket.remoteAddress ?? '',
    userAgent: req.headers['user-agent'],
    host: url.hostname,
    protocol,
    port: url.port === '' ? defaultPort : Number(url.port),
  };
}
