/**
 * Configuration validation for the AllStack client
 */

import { z } from 'zod';
import type { AllStackConfig, ResolvedConfig } from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';
import { applyDefaults } from './defaults.js';

/**
 * Zod schema for URL validation.
 */
const urlSchema = z
  .string()
  .url()
  .refine((value) => value.startsWith('http://') || value.startsWith('https://'), {
    message: 'must start with http:// or https://',
  });

const rateLimitConfigSchema = z.object({
  maxAttempts: z.number().int().min(1),
  windowMs: z.number().int().min(1),
});

const retryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).max(10),
  delayMs: z.number().int().min(0),
});

const timeoutConfigSchema = z.object({
  connectMs: z.number().int().min(1),
  requestMs: z.number().int().min(1),
});

const nonEmptyString = z.string().trim().min(1);

/**
 * Validate a configuration and apply defaults
 *
 * @param config - Configuration to validate
 * @returns Validated configuration with defaults applied
 * @throws ConfigurationError if the API key is missing or a value is invalid
 */
export function resolveConfig(config: AllStackConfig): ResolvedConfig {
  if (!config.apiKey || config.apiKey.trim() === '') {
    throw ConfigurationError.missingRequiredField('apiKey');
  }

  const resolved = applyDefaults(config);

  check('baseUrl', urlSchema, resolved.baseUrl);
  check('environment', nonEmptyString, resolved.environment);
  check('rateLimit', rateLimitConfigSchema, resolved.rateLimit);
  check('retry', retryConfigSchema, resolved.retry);
  check('timeout', timeoutConfigSchema, resolved.timeout);

  return resolved;
}

function check(field: string, schema: z.ZodTypeAny, value: unknown): void {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw ConfigurationError.invalidFieldValue(field, value, reason);
  }
}
