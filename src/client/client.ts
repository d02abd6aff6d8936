/**
 * AllStack client implementation.
 *
 * Wires rate limiting, event construction, validation and delivery, and
 * owns the capture boundary: every failure below it becomes `false` plus
 * a log entry.
 */

import type { AllStackClient } from './interface.js';
import type {
  EventPayload,
  Logger,
  RequestData,
  ResolvedConfig,
} from '../types/index.js';
import { errorMessage } from '../errors/index.js';
import { GuardedLogger } from '../observability/index.js';
import { EventBuilder, normalizeError } from '../event/index.js';
import type { HostEnvironment } from '../event/index.js';
import { PayloadValidator } from '../validation/index.js';
import {
  CAPTURE_RATE_LIMIT_KEY,
  SlidingWindowRateLimiter,
} from '../resilience/index.js';
import type { RateLimiter } from '../resilience/index.js';
import { DeliveryClient, ENDPOINTS, UndiciTransport } from '../transport/index.js';
import type { HttpTransport } from '../transport/index.js';

/**
 * Collaborators that may be shared between clients or replaced in tests
 */
export interface ClientDependencies {
  /** Shared rate limiter; defaults to one owned by the client */
  rateLimiter?: RateLimiter;
  /** HTTP transport; defaults to a pooled undici transport */
  transport?: HttpTransport;
  /** Host facts used in events */
  host?: HostEnvironment;
}

type CaptureKind = keyof typeof ENDPOINTS;

/**
 * Implementation of the AllStackClient interface.
 */
export class AllStackClientImpl implements AllStackClient {
  private readonly config: ResolvedConfig;
  private readonly logger: Logger;
  private readonly rateLimiter: RateLimiter;
  private readonly transport: HttpTransport;
  private readonly builder: EventBuilder;
  private readonly validator: PayloadValidator;
  private readonly delivery: DeliveryClient;

  /**
   * Create a new client from a resolved configuration.
   *
   * @param config - Validated configuration (see resolveConfig)
   * @param dependencies - Optional shared or substitute collaborators
   */
  constructor(config: ResolvedConfig, dependencies: ClientDependencies = {}) {
    this.config = config;
    this.logger = new GuardedLogger(config.logger);
    this.rateLimiter =
      dependencies.rateLimiter ?? new SlidingWindowRateLimiter(config.rateLimit.windowMs);
    this.transport = dependencies.transport ?? new UndiciTransport({ timeout: config.timeout });
    this.builder = new EventBuilder({
      environment: config.environment,
      release: config.release,
      component: config.component,
      logger: this.logger,
      host: dependencies.host,
    });
    this.validator = new PayloadValidator(this.logger);
    this.delivery = new DeliveryClient({
      baseUrl: config.baseUrl,
      apiKey: config.apiKey,
      transport: this.transport,
      retry: config.retry,
      logger: this.logger,
    });
  }

  captureException(error: unknown): Promise<boolean> {
    return this.capture('exception', () =>
      this.builder.fromException(normalizeError(error), this.config.environment)
    );
  }

  captureRequest(request: RequestData, responseTimeMs: number = 0): Promise<boolean> {
    return this.capture('request', () =>
      this.builder.fromRequest(request, responseTimeMs, this.config.environment)
    );
  }

  async close(): Promise<void> {
    try {
      await this.transport.close();
    } catch (error) {
      this.logger.error('Failed to close AllStack transport', { error: errorMessage(error) });
    }
  }

  /**
   * Remaining capture budget in the current window
   */
  remainingCaptures(): number {
    return this.rateLimiter.remaining(CAPTURE_RATE_LIMIT_KEY, this.config.rateLimit.maxAttempts);
  }

  private async capture(
    kind: CaptureKind,
    build: () => Readonly<EventPayload>
  ): Promise<boolean> {
    try {
      if (!this.rateLimiter.attempt(CAPTURE_RATE_LIMIT_KEY, this.config.rateLimit.maxAttempts)) {
        this.logger.warn('AllStack rate limit exceeded', {
          kind,
          availableInMs: this.rateLimiter.availableIn(CAPTURE_RATE_LIMIT_KEY),
        });
        return false;
      }

      const payload = build();
      if (!this.validator.validate(payload)) {
        return false;
      }

      return await this.delivery.send(ENDPOINTS[kind], payload);
    } catch (error) {
      this.logger.error(`Failed to send ${kind} to AllStack: ${errorMessage(error)}`, { kind });
      return false;
    }
  }
}
