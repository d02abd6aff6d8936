/**
 * Tests for payload validation
 */

import { describe, it, expect } from 'vitest';
import {
  EXCEPTION_REQUIRED_FIELDS,
  PayloadValidator,
  REQUEST_REQUIRED_FIELDS,
  checkPayload,
  isMissing,
} from '../index.js';
import { CapturingLogger } from '../../testing/index.js';

const exceptionPayload = {
  errorMessage: 'boom',
  errorType: 'Error',
  errorLevel: 'ERROR',
  environment: 'production',
  timestamp: '2024-12-21T21:54:16',
  url: '',
};

const requestPayload = {
  errorMessage: 'HTTP Request Captured',
  errorType: 'HTTPRequest',
  errorLevel: 'WARNING',
  environment: 'production',
  timestamp: '2024-12-21T21:54:16',
  url: '/orders',
};

describe('checkPayload', () => {
  it('should accept a complete exception payload with an empty url', () => {
    expect(checkPayload(exceptionPayload)).toEqual({
      valid: true,
      requiredFields: EXCEPTION_REQUIRED_FIELDS,
    });
  });

  it('should accept a complete request payload', () => {
    expect(checkPayload(requestPayload)).toEqual({
      valid: true,
      requiredFields: REQUEST_REQUIRED_FIELDS,
    });
  });

  it('should require a url on request payloads', () => {
    expect(checkPayload({ ...requestPayload, url: '' })).toEqual({
      valid: false,
      reason: 'missing_field',
      field: 'url',
    });
  });

  it('should not require errorLevel on request payloads', () => {
    const { errorLevel: _ignored, ...withoutLevel } = requestPayload;

    expect(checkPayload(withoutLevel).valid).toBe(true);
  });

  it('should report the first missing exception field', () => {
    expect(checkPayload({ ...exceptionPayload, errorLevel: '', environment: null })).toEqual({
      valid: false,
      reason: 'missing_field',
      field: 'errorLevel',
    });
  });

  it('should report an empty message as a missing field', () => {
    expect(checkPayload({ ...exceptionPayload, errorMessage: '' })).toEqual({
      valid: false,
      reason: 'missing_field',
      field: 'errorMessage',
    });
  });

  it('should treat payloads without a message or type as unknown', () => {
    expect(checkPayload({ ...exceptionPayload, errorMessage: null })).toEqual({
      valid: false,
      reason: 'unknown_payload',
    });
    expect(checkPayload({ errorMessage: 'boom' })).toEqual({
      valid: false,
      reason: 'unknown_payload',
    });
    expect(checkPayload({})).toEqual({ valid: false, reason: 'unknown_payload' });
  });

  it('should classify by the request sentinel before anything else', () => {
    expect(checkPayload({ errorType: 'HTTPRequest' })).toEqual({
      valid: false,
      reason: 'missing_field',
      field: 'errorMessage',
    });
  });
});

describe('isMissing', () => {
  it('should count only null, undefined and the empty string as missing', () => {
    expect(isMissing(null)).toBe(true);
    expect(isMissing(undefined)).toBe(true);
    expect(isMissing('')).toBe(true);
    expect(isMissing(0)).toBe(false);
    expect(isMissing(false)).toBe(false);
    expect(isMissing(' ')).toBe(false);
  });
});

describe('PayloadValidator', () => {
  it('should log a missing field at warning level', () => {
    const logger = new CapturingLogger();
    const validator = new PayloadValidator(logger);
    const payload = { ...exceptionPayload, timestamp: undefined };

    expect(validator.validate(payload)).toBe(false);
    expect(logger.logs).toEqual([
      {
        level: 'warn',
        message: 'Missing required field: timestamp',
        context: { field: 'timestamp', payload },
      },
    ]);
  });

  it('should name the field when the message is empty', () => {
    const logger = new CapturingLogger();
    const validator = new PayloadValidator(logger);

    expect(validator.validate({ ...exceptionPayload, errorMessage: '' })).toBe(false);
    expect(logger.messages('warn')).toEqual(['Missing required field: errorMessage']);
  });

  it('should log an unknown payload at warning level', () => {
    const logger = new CapturingLogger();
    const validator = new PayloadValidator(logger);

    expect(validator.validate({ foo: 'bar' })).toBe(false);
    expect(logger.messages('warn')).toEqual(['Unknown payload type']);
  });

  it('should log nothing for a valid payload', () => {
    const logger = new CapturingLogger();

    expect(new PayloadValidator(logger).validate(requestPayload)).toBe(true);
    expect(logger.logs).toEqual([]);
  });
});
