/**
 * Event delivery to the collector with bounded, fixed-delay retry.
 *
 * @module transport/delivery
 */

import type { EventPayload, Logger, RetryConfig } from '../types/index.js';
import { HttpStatusError, errorMessage } from '../errors/index.js';
import { RetryExecutor } from '../resilience/index.js';
import type { HttpResponse, HttpTransport } from './types.js';

/**
 * Collector endpoint paths, relative to the base URL
 */
export const ENDPOINTS = {
  exception: '/exception',
  request: '/http-request-transactions',
} as const;

/**
 * Delivery client options
 */
export interface DeliveryClientOptions {
  baseUrl: string;
  apiKey: string;
  transport: HttpTransport;
  retry: RetryConfig;
  logger: Logger;
}

/**
 * Serializes events and posts them to the collector
 */
export class DeliveryClient {
  private readonly options: DeliveryClientOptions;

  constructor(options: DeliveryClientOptions) {
    this.options = options;
  }

  /**
   * Post an event to `baseUrl + endpointPath`.
   *
   * Resolves true on the first 2xx response, false once every attempt has
   * failed. Never rejects.
   */
  async send(endpointPath: string, payload: Readonly<EventPayload>): Promise<boolean> {
    const { logger } = this.options;
    const url = `${this.options.baseUrl}${endpointPath}`;

    const executor = new RetryExecutor(this.options.retry, {
      onAttemptFailed: (attempt, error) => {
        logger.error('Failed to send to AllStack', {
          endpoint: endpointPath,
          attempt,
          error: error.message,
        });
      },
    });

    try {
      const body = JSON.stringify(payload);

      const response = await executor.execute(async (attempt) => {
        logger.debug('Sending payload to AllStack', {
          endpoint: endpointPath,
          attempt,
          payload,
        });
        return this.post(url, body);
      });

      logger.info('Successfully sent to AllStack', {
        endpoint: endpointPath,
        status: response.status,
      });
      return true;
    } catch (error) {
      logger.error(errorMessage(error), { endpoint: endpointPath });
      return false;
    }
  }

  /**
   * Headers sent with every request
   */
  getHeaders(): Record<string, string> {
    return {
      'x-api-key': this.options.apiKey,
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
  }

  private async post(url: string, body: string): Promise<HttpResponse> {
    const response = await this.options.transport.send({
      method: 'POST',
      url,
      headers: this.getHeaders(),
      body,
    });

    if (response.status < 200 || response.status >= 300) {
      throw new HttpStatusError(response.status, url, response.body);
    }
    return response;
  }
}
