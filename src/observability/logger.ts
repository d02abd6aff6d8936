/**
 * Logger implementations for the AllStack client.
 *
 * The client itself only ever talks to the `Logger` interface; these are the
 * two implementations shipped with it.
 */

import type { Logger } from '../types/index.js';
import { REDACTED_MARKER, SENSITIVE_FIELDS, isSensitiveKey } from '../security/rules.js';

export enum LogLevel {
  Debug = 0,
  Info = 1,
  Warn = 2,
  Error = 3,
  Silent = 4,
}

type LevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * Console methods the logger writes through
 */
export type LogSink = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;

const LEVELS: Record<LevelName, LogLevel> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warn,
  error: LogLevel.Error,
};

const CONTEXT_SENSITIVE_FIELDS: readonly string[] = [
  ...SENSITIVE_FIELDS,
  'apikey',
  'api_key',
  'authorization',
];

// ============================================================================
// NoopLogger
// ============================================================================

/**
 * Default logger: drops everything
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}

// ============================================================================
// ConsoleLogger
// ============================================================================

export interface ConsoleLoggerOptions {
  /** Component name shown in every line */
  name?: string;
  /** Minimum level written */
  level?: LogLevel;
  /** One JSON object per line instead of text */
  json?: boolean;
  /** Key fragments to redact on top of the built-in ones */
  sensitiveFields?: string[];
  /** Where lines go; the global console by default */
  sink?: LogSink;
}

/**
 * Writes to the console, redacting sensitive keys anywhere in the context
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private readonly name: string;
  private readonly json: boolean;
  private readonly sensitiveFields: readonly string[];
  private readonly sink?: LogSink;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.name = options.name ?? 'allstack';
    this.level = options.level ?? LogLevel.Info;
    this.json = options.json ?? false;
    this.sensitiveFields = [...CONTEXT_SENSITIVE_FIELDS, ...(options.sensitiveFields ?? [])];
    this.sink = options.sink;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  private write(levelName: LevelName, message: string, context?: Record<string, unknown>): void {
    if (LEVELS[levelName] < this.level) {
      return;
    }

    // Resolved per call so a replaced global console is honoured
    const sink = this.sink ?? console;
    const emit = (...args: unknown[]): void => {
      if (levelName === 'info') {
        sink.log(...args);
      } else {
        sink[levelName](...args);
      }
    };
    const timestamp = new Date().toISOString();
    const safeContext = context === undefined ? undefined : this.redact(context);

    if (this.json) {
      emit(
        JSON.stringify({
          level: levelName,
          component: this.name,
          message,
          timestamp,
          context: safeContext,
        })
      );
      return;
    }

    const line = `${timestamp} ${levelName.toUpperCase()} [${this.name}] ${message}`;
    if (safeContext !== undefined && Object.keys(safeContext).length > 0) {
      emit(line, safeContext);
    } else {
      emit(line);
    }
  }

  private redact(context: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(
      Object.entries(context).map(([key, value]) => [
        key,
        isSensitiveKey(key, this.sensitiveFields) ? REDACTED_MARKER : this.redactValue(value),
      ])
    );
  }

  private redactValue(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => this.redactValue(item));
    }
    if (isRecord(value)) {
      return this.redact(value);
    }
    return value;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && !(value instanceof Error) && !(value instanceof Date)
  );
}

// ============================================================================
// GuardedLogger
// ============================================================================

/**
 * Wraps a caller-supplied logger so that a failing sink never breaks the
 * operation that is logging. Entries the inner logger rejects are counted
 * and dropped.
 */
export class GuardedLogger implements Logger {
  private dropped = 0;

  constructor(private readonly inner: Logger) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.forward('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.forward('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.forward('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.forward('error', message, context);
  }

  /**
   * Number of entries the inner logger failed to accept
   */
  droppedEntries(): number {
    return this.dropped;
  }

  private forward(level: LevelName, message: string, context?: Record<string, unknown>): void {
    try {
      this.inner[level](message, context);
    } catch {
      this.dropped++;
    }
  }
}
