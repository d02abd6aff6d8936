/**
 * Observability module exports
 */

export { LogLevel, NoopLogger, ConsoleLogger, GuardedLogger } from './logger.js';
export type { ConsoleLoggerOptions, LogSink } from './logger.js';
