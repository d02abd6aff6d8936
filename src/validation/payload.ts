/**
 * Required-field validation of event payloads before submission
 */

import type { EventPayload, Logger } from '../types/index.js';
import { HTTP_REQUEST_EVENT_TYPE } from '../types/index.js';

export const REQUEST_REQUIRED_FIELDS: readonly (keyof EventPayload)[] = [
  'errorMessage',
  'errorType',
  'environment',
  'timestamp',
  'url',
];

export const EXCEPTION_REQUIRED_FIELDS: readonly (keyof EventPayload)[] = [
  'errorMessage',
  'errorType',
  'errorLevel',
  'environment',
  'timestamp',
];

/**
 * Outcome of checking a payload
 */
export type PayloadCheck =
  | { valid: true; requiredFields: readonly string[] }
  | { valid: false; reason: 'unknown_payload' }
  | { valid: false; reason: 'missing_field'; field: string };

/**
 * A value is missing only when null, undefined or the empty string;
 * 0 and false are values.
 */
export function isMissing(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

/**
 * Presence decides the payload kind; an empty string is present but
 * still fails the required-field check.
 */
function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/**
 * Determine the required-field set for a payload and check it
 */
export function checkPayload(payload: object): PayloadCheck {
  const fields = new Map<string, unknown>(Object.entries(payload));

  let requiredFields: readonly string[];
  if (fields.get('errorType') === HTTP_REQUEST_EVENT_TYPE) {
    requiredFields = REQUEST_REQUIRED_FIELDS;
  } else if (isPresent(fields.get('errorMessage')) && isPresent(fields.get('errorType'))) {
    requiredFields = EXCEPTION_REQUIRED_FIELDS;
  } else {
    return { valid: false, reason: 'unknown_payload' };
  }

  for (const field of requiredFields) {
    if (isMissing(fields.get(field))) {
      return { valid: false, reason: 'missing_field', field };
    }
  }

  return { valid: true, requiredFields };
}

/**
 * Validates payloads and logs rejections
 */
export class PayloadValidator {
  constructor(private readonly logger: Logger) {}

  validate(payload: object): boolean {
    const result = checkPayload(payload);
    if (result.valid) {
      return true;
    }

    if (result.reason === 'unknown_payload') {
      this.logger.warn('Unknown payload type', { payload });
    } else {
      this.logger.warn(`Missing required field: ${result.field}`, {
        field: result.field,
        payload,
      });
    }
    return false;
  }
}
