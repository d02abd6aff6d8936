/**
 * HTTP transport types.
 *
 * @module transport/types
 */

/**
 * Outbound HTTP request
 */
export interface HttpRequest {
  method: 'POST';
  url: string;
  headers: Record<string, string>;
  body: string;
}

/**
 * HTTP response as seen by the delivery client
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Transport interface for HTTP communication.
 *
 * Implementations must support concurrent use by many captures.
 */
export interface HttpTransport {
  /**
   * Send an HTTP request and return the response, whatever its status.
   * @throws TransportError if no response was received
   */
  send(request: HttpRequest): Promise<HttpResponse>;

  /**
   * Release pooled connections
   */
  close(): Promise<void>;
}
