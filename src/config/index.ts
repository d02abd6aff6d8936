/**
 * Configuration module exports for the AllStack client
 */

export {
  DEFAULT_CONFIG,
  DEFAULT_BASE_URL,
  DEFAULT_MAX_ATTEMPTS_PER_WINDOW,
  applyDefaults,
} from './defaults.js';
export { resolveConfig } from './validation.js';
export { configFromEnvironment } from './env.js';
