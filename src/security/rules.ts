/**
 * Redaction rules for sensitive request fields
 *
 * @module security/rules
 */

/**
 * Key fragments that mark a field as sensitive (matched case-insensitively)
 */
export const SENSITIVE_FIELDS: readonly string[] = [
  'password',
  'token',
  'secret',
  'credit_card',
];

/**
 * Replacement written in place of a sensitive value
 */
export const REDACTED_MARKER = '[REDACTED]';

/**
 * Check whether a key names a sensitive field
 */
export function isSensitiveKey(
  key: string,
  fields: readonly string[] = SENSITIVE_FIELDS
): boolean {
  const lowerKey = key.toLowerCase();
  return fields.some((field) => lowerKey.includes(field.toLowerCase()));
}
