/**
 * Security module: sensitive-field redaction and value coercion
 *
 * @module security
 */

export { SENSITIVE_FIELDS, REDACTED_MARKER, isSensitiveKey } from './rules.js';
export {
  RequestDataTransformer,
  coerceScalar,
  isNumericString,
  toDataValue,
  toDataMap,
  isDataMap,
} from './redaction.js';
