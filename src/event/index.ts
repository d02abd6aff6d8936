/**
 * Event construction module exports
 */

export {
  EventBuilder,
  normalizeError,
  errorTypeName,
  NODE_HOST_ENVIRONMENT,
  UNKNOWN_EXCEPTION_MESSAGE,
  REQUEST_EVENT_MESSAGE,
  EXCEPTION_USER_AGENT,
  UNKNOWN_USER_AGENT,
} from './builder.js';
export type { EventBuilderOptions, HostEnvironment } from './builder.js';
export {
  createContexts,
  formatTimestamp,
  getHostname,
  getIpAddress,
  getMemoryUsage,
  LOOPBACK_ADDRESS,
} from './context.js';
