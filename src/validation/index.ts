export {
  PayloadValidator,
  checkPayload,
  isMissing,
  REQUEST_REQUIRED_FIELDS,
  EXCEPTION_REQUIRED_FIELDS,
} from './payload.js';
export type { PayloadCheck } from './payload.js';
