/**
 * Request primitives consumed by the request capture path.
 */

import type { HeaderBag, QueryBag } from './common.js';

/**
 * Primitives extracted from the host's inbound HTTP request
 */
export interface RequestData {
  /** HTTP method (GET, POST, ...) */
  method: string;
  /** Full request URL including query string */
  url: string;
  /** Request headers; multi-value headers as arrays */
  headers?: HeaderBag;
  /** Query parameters; repeated parameters as arrays */
  query?: QueryBag;
  /** Parsed request body */
  body?: unknown;
  /** Client IP address */
  ip?: string;
  /** Client user agent */
  userAgent?: string;
  /** Host name the request was addressed to */
  host?: string;
  /** URL scheme ("http" or "https") */
  protocol?: string;
  /** Server port */
  port?: number | string;
}
