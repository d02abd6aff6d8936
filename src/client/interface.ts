/**
 * Public client interface
 */

import type { RequestData } from '../types/index.js';

/**
 * Capture client. Capture calls resolve to false on any failure and never reject.
 */
export interface AllStackClient {
  /**
   * Capture a thrown value as an "error" event
   * @returns True when the collector accepted the event
   */
  captureException(error: unknown): Promise<boolean>;

  /**
   * Capture an inbound HTTP transaction as a "request" event
   * @param request - Primitives extracted from the host's request
   * @param responseTimeMs - Time taken to serve the request
   * @returns True when the collector accepted the event
   */
  captureRequest(request: RequestData, responseTimeMs?: number): Promise<boolean>;

  /**
   * Release pooled connections
   */
  close(): Promise<void>;
}
