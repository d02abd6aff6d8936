/**
 * Mock HTTP transport for testing without network dependency
 *
 * @module testing/mock-transport
 */

import type { HttpRequest, HttpResponse, HttpTransport } from '../transport/index.js';

/**
 * Scripted outcome of one send: a response, or an error to throw
 */
export type MockOutcome = HttpResponse | Error;

/**
 * Transport that records requests and replays scripted outcomes in order.
 * Once the script runs out, `fallback` is used for every further send.
 */
export class MockTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  private readonly script: MockOutcome[];
  private readonly fallback: MockOutcome;
  private closed = false;

  constructor(script: MockOutcome[] = [], fallback: MockOutcome = jsonResponse(200, { ok: true })) {
    this.script = [...script];
    this.fallback = fallback;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    const outcome = this.script.shift() ?? this.fallback;
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Parsed JSON body of the nth recorded request
   */
  bodyOf(index: number): unknown {
    const request = this.requests[index];
    if (!request) {
      throw new Error(`No request recorded at index ${index}`);
    }
    return JSON.parse(request.body);
  }
}

/**
 * Build a JSON response
 */
export function jsonResponse(status: number, body: unknown = {}): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  };
}
