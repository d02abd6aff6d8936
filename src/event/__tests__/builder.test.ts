/**
 * Tests for event construction
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  EventBuilder,
  errorTypeName,
  formatTimestamp,
  normalizeError,
} from '../index.js';
import { CapturingLogger, fixedHostEnvironment } from '../../testing/index.js';
import type { ExceptionDetails, RequestDetails } from '../../types/index.js';

class PaymentDeclinedError extends Error {}

function withStack(error: Error, stack: string): Error {
  error.stack = stack;
  return error;
}

describe('EventBuilder', () => {
  let logger: CapturingLogger;
  let builder: EventBuilder;

  beforeEach(() => {
    logger = new CapturingLogger();
    builder = new EventBuilder({
      environment: 'staging',
      release: '2.3.1',
      component: 'checkout',
      logger,
      host: fixedHostEnvironment(),
    });
  });

  describe('fromException', () => {
    it('should build an error event with origin and trace', () => {
      const error = withStack(
        new TypeError('x is not a function'),
        'TypeError: x is not a function\n    at pay (/srv/app/pay.js:12:7)'
      );

      const payload = builder.fromException(error);

      expect(payload).toEqual({
        errorMessage: 'x is not a function',
        errorType: 'TypeError',
        errorLevel: 'ERROR',
        environment: 'staging',
        ip: '10.0.0.5',
        userAgent: 'Node.js',
        url: '',
        timestamp: '2024-12-21T21:54:16',
        additionalData: {
          file: '/srv/app/pay.js',
          line: 12,
          trace: 'TypeError: x is not a function\n    at pay (/srv/app/pay.js:12:7)',
          hostname: 'test-host',
        },
        stackTrace: {
          frame0: { raw: 'TypeError: x is not a function' },
          frame1: { file: '/srv/app/pay.js', line: 12, column: 7, function: 'pay' },
        },
        contexts: {
          runtime: { name: 'node', version: 'v20.0.0' },
          system: { os: 'Linux', uname: 'Linux test-host 6.0.0 #1 SMP x64' },
          process: { pid: 4242 },
        },
        release: '2.3.1',
        component: 'checkout',
        transactionId: '',
        fingerprint: '',
        rootCause: '',
        category: '',
        memoryUsage: 52428800,
        cpuUsage: null,
        responseTime: 0,
        tags: [],
        errorSeverity: 'high',
      });
    });

    it('should classify a network timeout as medium', () => {
      const payload = builder.fromException(new Error('Network timeout occurred'));

      expect(payload.errorSeverity).toBe('medium');
      expect(payload.errorLevel).toBe('ERROR');
    });

    it('should classify a syntax failure as critical', () => {
      const payload = builder.fromException(new Error('syntax error, unexpected end of input'));

      expect(payload.errorSeverity).toBe('critical');
      expect(payload.errorLevel).toBe('CRITICAL');
    });

    it('should substitute a placeholder for an empty message', () => {
      const payload = builder.fromException(new Error(''));

      expect(payload.errorMessage).toBe('Unknown Exception');
    });

    it('should use the subclass name as the error type', () => {
      const payload = builder.fromException(new PaymentDeclinedError('declined'));

      expect(payload.errorType).toBe('PaymentDeclinedError');
    });

    it('should fall back to an empty origin when no frame parses', () => {
      const payload = builder.fromException(withStack(new Error('boom'), 'Error: boom'));
      const details: ExceptionDetails = {
        file: '',
        line: 0,
        trace: 'Error: boom',
        hostname: 'test-host',
      };

      expect(payload.additionalData).toEqual(details);
    });

    it('should honour an environment override', () => {
      expect(builder.fromException(new Error('x'), 'qa').environment).toBe('qa');
    });

    it('should return a frozen payload and log it at debug', () => {
      const payload = builder.fromException(new Error('x'));

      expect(Object.isFrozen(payload)).toBe(true);
      expect(logger.messages('debug')).toEqual(['AllStack exception payload']);
    });
  });

  describe('fromRequest', () => {
    it('should build a request event with transformed data', () => {
      const payload = builder.fromRequest(
        {
          method: 'post',
          url: 'https://shop.example.com/api/orders?page=2',
          headers: { 'Content-Type': 'application/json', Accept: ['a', 'b'] },
          query: { page: '2', token: 'abc' },
          body: { password: 'abc123', age: '30' },
          ip: '192.0.2.10',
          userAgent: 'curl/8.0',
          host: 'shop.example.com',
          protocol: 'https',
          port: 443,
        },
        125
      );

      const details: RequestDetails = {
        headers: { 'content-type': 'application/json', accept: 'a, b' },
        queryParams: { page: 2, token: '[REDACTED]' },
        body: { password: '[REDACTED]', age: 30 },
        method: 'POST',
        host: 'shop.example.com',
        protocol: 'https',
        hostname: 'test-host',
        port: '443',
      };

      expect(payload.errorMessage).toBe('HTTP Request Captured');
      expect(payload.errorType).toBe('HTTPRequest');
      expect(payload.errorLevel).toBe('WARNING');
      expect(payload.errorSeverity).toBe('low');
      expect(payload.environment).toBe('staging');
      expect(payload.ip).toBe('192.0.2.10');
      expect(payload.userAgent).toBe('curl/8.0');
      expect(payload.url).toBe('https://shop.example.com/api/orders?page=2');
      expect(payload.timestamp).toBe('2024-12-21T21:54:16');
      expect(payload.additionalData).toEqual(details);
      expect(payload.stackTrace).toEqual({});
      expect(payload.responseTime).toBe(125);
      expect(payload.cpuUsage).toBeNull();
    });

    it('should default missing request facts', () => {
      const payload = builder.fromRequest({ method: 'get', url: '/health' });

      expect(payload.ip).toBe('');
      expect(payload.userAgent).toBe('unknown');
      expect(payload.responseTime).toBe(0);
      expect(payload.additionalData).toEqual({
        headers: {},
        queryParams: {},
        body: {},
        method: 'GET',
        host: '',
        protocol: '',
        hostname: 'test-host',
        port: '',
      });
    });

    it('should log transformed headers and query params at debug', () => {
      builder.fromRequest({ method: 'GET', url: '/', query: { q: '1' } });

      expect(logger.messages('debug')).toEqual([
        'Transformed headers',
        'Transformed query params',
        'AllStack request payload',
      ]);
      expect(logger.logs[1].context).toEqual({ params: { q: 1 } });
    });
  });
});

describe('normalizeError', () => {
  it('should pass errors through', () => {
    const error = new RangeError('r');

    expect(normalizeError(error)).toBe(error);
  });

  it('should wrap strings and other values', () => {
    expect(normalizeError('failed').message).toBe('failed');
    expect(normalizeError(undefined).message).toBe('Unknown Exception');
    expect(normalizeError({ code: 42 }).message).toBe('{"code":42}');
  });

  it('should fall back to String for unserializable values', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    expect(normalizeError(cyclic).message).toBe('[object Object]');
  });
});

describe('errorTypeName', () => {
  it('should prefer an explicit name', () => {
    const error = new Error('x');
    error.name = 'QuotaError';

    expect(errorTypeName(error)).toBe('QuotaError');
    expect(errorTypeName(new Error('y'))).toBe('Error');
  });
});

describe('formatTimestamp', () => {
  it('should zero-pad every component', () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 3, 4, 5))).toBe('2024-01-05T03:04:05');
  });
});
