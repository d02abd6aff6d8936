export { extractRequestData, parseQuery } from './request-data.js';
export type { ExtractRequestOptions } from './request-data.js';
