/**
 * Configuration types for the AllStack client.
 */

/**
 * Logger interface for client logging
 */
export interface Logger {
  /** Log debug message */
  debug(message: string, context?: Record<string, unknown>): void;
  /** Log info message */
  info(message: string, context?: Record<string, unknown>): void;
  /** Log warning message */
  warn(message: string, context?: Record<string, unknown>): void;
  /** Log error message */
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  /** Maximum capture attempts per window */
  maxAttempts: number;
  /** Rolling window length in milliseconds */
  windowMs: number;
}

/**
 * Delivery retry configuration
 */
export interface RetryConfig {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Fixed delay between attempts in milliseconds */
  delayMs: number;
}

/**
 * Per-attempt timeouts
 */
export interface TimeoutConfig {
  /** Connection establishment timeout in milliseconds */
  connectMs: number;
  /** Total request timeout in milliseconds */
  requestMs: number;
}

/**
 * AllStack client configuration
 */
export interface AllStackConfig {
  /** API key sent as x-api-key */
  apiKey: string;
  /** Collector base URL, e.g. http://localhost:8080/api/client */
  baseUrl?: string;
  /** Environment name */
  environment?: string;
  /** Release tag */
  release?: string;
  /** Component name */
  component?: string;
  /** Rate limit configuration */
  rateLimit?: Partial<RateLimitConfig>;
  /** Retry configuration */
  retry?: Partial<RetryConfig>;
  /** Timeout configuration */
  timeout?: Partial<TimeoutConfig>;
  /** Logger instance for client logging */
  logger?: Logger;
}

/**
 * Configuration with defaults applied and values validated
 */
export interface ResolvedConfig {
  apiKey: string;
  baseUrl: string;
  environment: string;
  release: string;
  component: string;
  rateLimit: RateLimitConfig;
  retry: RetryConfig;
  timeout: TimeoutConfig;
  logger: Logger;
}
