/**
 * Tests for the undici transport against an in-process mock agent
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import { UndiciTransport, DEFAULT_TIMEOUT_CONFIG } from '../index.js';
import { RequestTimeoutError, TransportError } from '../../errors/index.js';

const ORIGIN = 'http://collector.test';

describe('UndiciTransport', () => {
  let agent: MockAgent;
  let transport: UndiciTransport;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    transport = new UndiciTransport({ dispatcher: agent });
  });

  afterEach(async () => {
    await transport.close();
    await agent.close();
  });

  it('should post the body and return status, headers and text', async () => {
    let seenBody: unknown;
    let seenMethod: string | undefined;

    agent
      .get(ORIGIN)
      .intercept({ path: '/api/client/exception', method: 'POST' })
      .reply((options) => {
        seenBody = options.body;
        seenMethod = options.method;
        return {
          statusCode: 201,
          data: '{"id":1}',
          responseOptions: { headers: { 'content-type': 'application/json' } },
        };
      });

    const response = await transport.send({
      method: 'POST',
      url: `${ORIGIN}/api/client/exception`,
      headers: { 'content-type': 'application/json' },
      body: '{"errorMessage":"boom"}',
    });

    expect(seenMethod).toBe('POST');
    expect(seenBody).toBe('{"errorMessage":"boom"}');
    expect(response.status).toBe(201);
    expect(response.body).toBe('{"id":1}');
    expect(response.headers['content-type']).toBe('application/json');
  });

  it('should return non-2xx responses without throwing', async () => {
    agent.get(ORIGIN).intercept({ path: '/exception', method: 'POST' }).reply(503, 'unavailable');

    const response = await transport.send({
      method: 'POST',
      url: `${ORIGIN}/exception`,
      headers: {},
      body: '{}',
    });

    expect(response.status).toBe(503);
    expect(response.body).toBe('unavailable');
  });

  it('should wrap connection failures in a transport error', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/exception', method: 'POST' })
      .replyWithError(new Error('connection refused'));

    const error = await transport
      .send({ method: 'POST', url: `${ORIGIN}/exception`, headers: {}, body: '{}' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).not.toBeInstanceOf(RequestTimeoutError);
    if (error instanceof TransportError) {
      expect(error.message).toBe(`Request to ${ORIGIN}/exception failed: connection refused`);
      expect(error.isRetryable).toBe(true);
    }
  });

  it('should report undici timeouts as request timeouts', async () => {
    const timeout = Object.assign(new Error('Headers Timeout Error'), {
      code: 'UND_ERR_HEADERS_TIMEOUT',
    });
    agent.get(ORIGIN).intercept({ path: '/exception', method: 'POST' }).replyWithError(timeout);

    await expect(
      transport.send({ method: 'POST', url: `${ORIGIN}/exception`, headers: {}, body: '{}' })
    ).rejects.toThrow(`Request to ${ORIGIN}/exception timed out after 5000ms`);
  });

  it('should refuse to send once closed', async () => {
    await transport.close();

    await expect(
      transport.send({ method: 'POST', url: `${ORIGIN}/exception`, headers: {}, body: '{}' })
    ).rejects.toThrow('Transport is closed');
  });

  it('should merge partial timeouts over the defaults', () => {
    const custom = new UndiciTransport({ dispatcher: agent, timeout: { requestMs: 250 } });

    expect(custom.getTimeoutConfig()).toEqual({
      connectMs: DEFAULT_TIMEOUT_CONFIG.connectMs,
      requestMs: 250,
    });
  });
});
