/**
 * Factory for creating AllStack clients.
 */

import type { AllStackConfig } from '../types/index.js';
import { configFromEnvironment, resolveConfig } from '../config/index.js';
import { AllStackClientImpl } from './client.js';
import type { ClientDependencies } from './client.js';

/**
 * Create a client from explicit configuration layered over environment
 * variables.
 *
 * @param config - Explicit configuration; wins over the environment
 * @param dependencies - Optional shared or substitute collaborators
 * @param env - Environment to read, defaults to process.env
 * @throws ConfigurationError if no API key is available or a value is invalid
 *
 * @example
 * ```typescript
 * const client = createClient({ apiKey: 'my-key', environment: 'staging' });
 *
 * try {
 *   await chargeCard(order);
 * } catch (error) {
 *   await client.captureException(error);
 * }
 * ```
 */
export function createClient(
  config: Partial<AllStackConfig> = {},
  dependencies: ClientDependencies = {},
  env: NodeJS.ProcessEnv = process.env
): AllStackClientImpl {
  const fromEnv = configFromEnvironment(env);

  const resolved = resolveConfig({
    ...fromEnv,
    ...config,
    apiKey: config.apiKey ?? fromEnv.apiKey ?? '',
    rateLimit: { ...fromEnv.rateLimit, ...config.rateLimit },
    retry: { ...fromEnv.retry, ...config.retry },
    timeout: { ...fromEnv.timeout, ...config.timeout },
  });

  return new AllStackClientImpl(resolved, dependencies);
}
