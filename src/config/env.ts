/**
 * Environment variable configuration for the AllStack client
 */

import type { AllStackConfig } from '../types/index.js';

/**
 * Parse numeric environment variable
 *
 * @returns Parsed number or undefined if unset or invalid
 */
function parseNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }

  const parsed = Number(value);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Create configuration from environment variables
 *
 * Reads configuration from the following environment variables:
 * - ALLSTACK_API_KEY - API key
 * - ALLSTACK_BASE_URL - Collector base URL
 * - ALLSTACK_ENVIRONMENT, NODE_ENV - Environment name
 * - ALLSTACK_RELEASE, RELEASE - Release tag
 * - ALLSTACK_COMPONENT, COMPONENT - Component name
 * - ALLSTACK_RATE_LIMIT - Maximum captures per minute
 * - ALLSTACK_TIMEOUT_MS - Connect and request timeout
 *
 * @param env - Environment to read, defaults to process.env
 * @returns Partial configuration from environment variables
 */
export function configFromEnvironment(
  env: NodeJS.ProcessEnv = process.env
): Partial<AllStackConfig> {
  const config: Partial<AllStackConfig> = {};

  if (env.ALLSTACK_API_KEY) {
    config.apiKey = env.ALLSTACK_API_KEY;
  }

  if (env.ALLSTACK_BASE_URL) {
    config.baseUrl = env.ALLSTACK_BASE_URL;
  }

  const environment = env.ALLSTACK_ENVIRONMENT || env.NODE_ENV;
  if (environment) {
    config.environment = environment;
  }

  const release = env.ALLSTACK_RELEASE || env.RELEASE;
  if (release) {
    config.release = release;
  }

  const component = env.ALLSTACK_COMPONENT || env.COMPONENT;
  if (component) {
    config.component = component;
  }

  const rateLimit = parseNumber(env.ALLSTACK_RATE_LIMIT);
  if (rateLimit !== undefined) {
    config.rateLimit = { maxAttempts: rateLimit };
  }

  const timeoutMs = parseNumber(env.ALLSTACK_TIMEOUT_MS);
  if (timeoutMs !== undefined) {
    config.timeout = { connectMs: timeoutMs, requestMs: timeoutMs };
  }

  return config;
}
