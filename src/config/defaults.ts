/**
 * Default configuration values for the AllStack client
 */

import type { AllStackConfig, ResolvedConfig } from '../types/index.js';
import { NoopLogger } from '../observability/index.js';
import { DEFAULT_RATE_LIMIT_WINDOW_MS } from '../resilience/index.js';
import { DEFAULT_RETRY_CONFIG } from '../resilience/index.js';
import { DEFAULT_TIMEOUT_CONFIG } from '../transport/index.js';

/** Default collector base URL. */
export const DEFAULT_BASE_URL = 'http://localhost:8080/api/client';

/** Default maximum capture attempts per window. */
export const DEFAULT_MAX_ATTEMPTS_PER_WINDOW = 100;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'apiKey' | 'logger'> = {
  baseUrl: DEFAULT_BASE_URL,
  environment: 'production',
  release: '1.0.0',
  component: 'my-component',
  rateLimit: {
    maxAttempts: DEFAULT_MAX_ATTEMPTS_PER_WINDOW,
    windowMs: DEFAULT_RATE_LIMIT_WINDOW_MS,
  },
  retry: DEFAULT_RETRY_CONFIG,
  timeout: DEFAULT_TIMEOUT_CONFIG,
};

/**
 * Apply default values to a configuration
 *
 * @param config - Configuration to apply defaults to
 * @returns Configuration with defaults applied (not yet validated)
 */
export function applyDefaults(config: AllStackConfig): ResolvedConfig {
  return {
    apiKey: config.apiKey,
    baseUrl: (config.baseUrl ?? DEFAULT_CONFIG.baseUrl).replace(/\/+$/, ''),
    environment: config.environment ?? DEFAULT_CONFIG.environment,
    release: config.release ?? DEFAULT_CONFIG.release,
    component: config.component ?? DEFAULT_CONFIG.component,
    rateLimit: { ...DEFAULT_CONFIG.rateLimit, ...config.rateLimit },
    retry: { ...DEFAULT_CONFIG.retry, ...config.retry },
    timeout: { ...DEFAULT_CONFIG.timeout, ...config.timeout },
    logger: config.logger ?? new NoopLogger(),
  };
}
