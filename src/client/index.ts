/**
 * Client module exports
 */

export type { AllStackClient } from './interface.js';
export { AllStackClientImpl } from './client.js';
export type { ClientDependencies } from './client.js';
export { createClient } from './factory.js';
