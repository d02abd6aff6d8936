/**
 * Transport module exports
 */

export type { HttpRequest, HttpResponse, HttpTransport } from './types.js';
export { UndiciTransport, DEFAULT_TIMEOUT_CONFIG } from './undici.js';
export type { UndiciTransportOptions } from './undici.js';
export { DeliveryClient, ENDPOINTS } from './delivery.js';
export type { DeliveryClientOptions } from './delivery.js';
