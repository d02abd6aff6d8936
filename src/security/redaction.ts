/**
 * Redaction and type coercion of untyped request data
 *
 * @module security/redaction
 */

import type { DataMap, DataScalar, DataValue, HeaderBag, QueryBag } from '../types/index.js';
import { REDACTED_MARKER, SENSITIVE_FIELDS, isSensitiveKey } from './rules.js';

const NUMERIC_PATTERN = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?\s*$/;

/**
 * Check whether a string reads as a decimal number
 */
export function isNumericString(value: string): boolean {
  return NUMERIC_PATTERN.test(value);
}

/**
 * Coerce a string scalar into a boolean or number where it reads as one.
 * Non-string values are returned unchanged.
 */
export function coerceScalar(value: DataScalar): DataScalar {
  if (typeof value !== 'string') {
    return value;
  }
  if (value === 'true') {
    return true;
  }
  if (value === 'false') {
    return false;
  }
  if (isNumericString(value)) {
    return Number(value);
  }
  return value;
}

/**
 * Narrow an arbitrary value into the DataValue model.
 *
 * Functions, symbols and undefined become null; bigints become strings;
 * dates become ISO strings; other objects are copied key by key.
 */
export function toDataValue(value: unknown, seen: WeakSet<object> = new WeakSet()): DataValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value !== 'object') {
    return null;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => toDataValue(item, seen));
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, item]): [string, DataValue] => [key, toDataValue(item, seen)])
  );
}

/**
 * Narrow an arbitrary body into a mapping; non-mapping bodies are wrapped
 * under a "value" key so they are still visible to the collector.
 */
export function toDataMap(value: unknown): DataMap {
  if (value === null || value === undefined) {
    return {};
  }
  const converted = toDataValue(value);
  if (isDataMap(converted)) {
    return converted;
  }
  return { value: converted };
}

/**
 * Type guard for mapping values
 */
export function isDataMap(value: DataValue): value is DataMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Redacts sensitive fields and coerces string scalars in untyped data
 */
export class RequestDataTransformer {
  private readonly sensitiveFields: readonly string[];

  constructor(sensitiveFields: readonly string[] = SENSITIVE_FIELDS) {
    this.sensitiveFields = sensitiveFields;
  }

  /**
   * Recursively redact and coerce a mapping.
   *
   * A sensitive key has its value replaced whatever the value's type.
   * Sequences keep their scalar elements as they are; mapping elements
   * are walked with the same rules.
   */
  redactAndCoerce(data: DataMap): DataMap {
    return Object.fromEntries(
      Object.entries(data).map(([key, value]): [string, DataValue] => [
        key,
        this.transformEntry(key, value),
      ])
    );
  }

  /**
   * Transform a request body: narrow it to a mapping, then redact and coerce
   */
  transformRequestBody(body: unknown): DataMap {
    return this.redactAndCoerce(toDataMap(body));
  }

  /**
   * Transform query parameters one level deep.
   *
   * Sensitive parameters are redacted, repeated parameters are joined
   * with "," and scalar values are coerced.
   */
  transformQueryParams(params: QueryBag): Record<string, DataScalar> {
    const entries: [string, DataScalar][] = [];

    for (const [key, value] of Object.entries(params)) {
      if (value === undefined) {
        continue;
      }
      if (isSensitiveKey(key, this.sensitiveFields)) {
        entries.push([key, REDACTED_MARKER]);
      } else {
        entries.push([key, Array.isArray(value) ? value.join(',') : coerceScalar(value)]);
      }
    }

    return Object.fromEntries(entries);
  }

  /**
   * Lower-case header names and join multi-value headers with ", "
   */
  transformHeaders(headers: HeaderBag): Record<string, string> {
    const entries: [string, string][] = [];

    for (const [key, value] of Object.entries(headers)) {
      if (value !== undefined) {
        entries.push([key.toLowerCase(), Array.isArray(value) ? value.join(', ') : value]);
      }
    }

    return Object.fromEntries(entries);
  }

  private transformEntry(key: string, value: DataValue): DataValue {
    if (isSensitiveKey(key, this.sensitiveFields)) {
      return REDACTED_MARKER;
    }
    if (Array.isArray(value)) {
      return this.walkSequence(value);
    }
    if (isDataMap(value)) {
      return this.redactAndCoerce(value);
    }
    return coerceScalar(value);
  }

  /**
   * Walk nested sequences and mappings; scalar elements stay as they are
   */
  private walkSequence(values: DataValue[]): DataValue[] {
    return values.map((item) => {
      if (Array.isArray(item)) {
        return this.walkSequence(item);
      }
      return isDataMap(item) ? this.redactAndCoerce(item) : item;
    });
  }
}
