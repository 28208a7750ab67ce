/**
 * Structured Logging
 *
 * JSON log entries with levels, trace IDs, child loggers and pluggable sinks.
 * Trace IDs propagate through async calls with AsyncLocalStorage.
 *
 * @packageDocumentation
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

// =============================================================================
// Types and Interfaces
// =============================================================================

/**
 * Log levels supported by the structured logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Numeric log level values for comparison
 */
export const LogLevel = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
} as const;

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

/**
 * Compare two log levels
 * @returns negative if a < b, positive if a > b, 0 if equal
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  return LOG_LEVEL_VALUES[a] - LOG_LEVEL_VALUES[b];
}

/**
 * Get log level from the LOG_LEVEL environment variable
 */
export function getLogLevelFromEnv(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

/**
 * Structured log entry format
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Trace ID for request correlation */
  traceId: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    code?: string;
    message: string;
    stack?: string;
  };
}

/**
 * Destination for log entries
 */
export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
  flush?(): void | Promise<void>;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  sink?: LogSink;
  /** Whether to include stack traces of logged errors */
  includeStackTraces?: boolean;
  /** Context merged into every entry */
  defaultContext?: Record<string, unknown>;
  /** Initial trace ID */
  traceId?: string;
}

/**
 * Structured logger interface
 */
export interface StructuredLogger {
  debug(message: string | (() => string), context?: Record<string, unknown>): void;
  info(message: string | (() => string), context?: Record<string, unknown>): void;
  warn(message: string | (() => string), context?: Record<string, unknown>, error?: unknown): void;
  error(message: string | (() => string), error?: unknown, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(context: Record<string, unknown>): StructuredLogger;

  getTraceId(): string;
  getLevel(): LogLevel;
  setLevel(level: LogLevel): void;

  /** Flush any buffered log entries */
  flush(): Promise<void>;
}

// =============================================================================
// Trace Context Propagation
// =============================================================================

interface TraceContextData {
  traceId: string;
}

const traceStorage = new AsyncLocalStorage<TraceContextData>();

/**
 * Run a function with a specific trace context
 */
export function withTraceContext<T>(traceId: string, fn: () => T): T {
  return traceStorage.run({ traceId }, fn);
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Safely copy objects with circular reference handling
 */
function safeStringify(obj: unknown, seen = new WeakSet<object>()): unknown {
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (seen.has(obj)) {
    return '[Circular]';
  }
  seen.add(obj);

  if (Array.isArray(obj)) {
    return obj.map((item) => safeStringify(item, seen));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = safeStringify(value, seen);
  }
  return result;
}

/**
 * Format message with placeholder substitution
 * Template syntax: {fieldName}
 */
function formatMessage(template: string, context?: Record<string, unknown>): string {
  if (!context) return template;

  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    if (key in context) {
      return String(context[key]);
    }
    return match;
  });
}

function describeError(error: unknown, includeStack: boolean): NonNullable<LogEntry['error']> {
  if (!(error instanceof Error)) {
    return { name: 'NonError', message: String(error) };
  }
  const described: NonNullable<LogEntry['error']> = {
    name: error.name,
    message: error.message,
  };
  const code: unknown = Reflect.get(error, 'code');
  if (typeof code === 'string') {
    described.code = code;
  }
  if (includeStack && error.stack) {
    described.stack = error.stack;
  }
  return described;
}

// =============================================================================
// Logger Implementation
// =============================================================================

class Logger implements StructuredLogger {
  private level: LogLevel;
  private readonly sink: LogSink;
  private readonly defaultContext: Record<string, unknown>;
  private readonly includeStackTraces: boolean;
  private readonly traceId: string;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? getLogLevelFromEnv();
    this.sink = config.sink ?? new ConsoleSink();
    this.defaultContext = config.defaultContext ?? {};
    this.includeStackTraces = config.includeStackTraces ?? true;
    this.traceId = config.traceId ?? randomUUID();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  private getActiveTraceId(): string {
    return traceStorage.getStore()?.traceId ?? this.traceId;
  }

  private log(
    level: LogLevel,
    messageOrFn: string | (() => string),
    context?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const rawMessage = typeof messageOrFn === 'function' ? messageOrFn() : messageOrFn;
    const mergedContext = context ? { ...this.defaultContext, ...context } : this.defaultContext;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: formatMessage(rawMessage, mergedContext),
      traceId: this.getActiveTraceId(),
    };

    if (Object.keys(mergedContext).length > 0) {
      const copied = safeStringify(mergedContext);
      if (copied !== null && typeof copied === 'object' && !Array.isArray(copied)) {
        entry.context = { ...copied };
      }
    }

    if (error !== undefined) {
      entry.error = describeError(error, this.includeStackTraces);
    }

    try {
      const written = this.sink.write(entry);
      if (written instanceof Promise) {
        written.catch((sinkError: unknown) => console.error('Log sink failed:', sinkError));
      }
    } catch (sinkError) {
      console.error('Log sink failed:', sinkError);
    }
  }

  debug(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string | (() => string), context?: Record<string, unknown>, error?: unknown): void {
    this.log('warn', message, context, error);
  }

  error(message: string | (() => string), error?: unknown, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  child(context: Record<string, unknown>): StructuredLogger {
    return new Logger({
      level: this.level,
      sink: this.sink,
      defaultContext: { ...this.defaultContext, ...context },
      includeStackTraces: this.includeStackTraces,
      traceId: this.traceId,
    });
  }

  getTraceId(): string {
    return this.getActiveTraceId();
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  async flush(): Promise<void> {
    if (this.sink.flush) {
      await this.sink.flush();
    }
  }
}

/**
 * Create a new structured logger
 */
export function createLogger(config?: LoggerConfig): StructuredLogger {
  return new Logger(config);
}

// =============================================================================
// Built-in Sinks
// =============================================================================

/**
 * Console sink options
 */
export interface ConsoleSinkOptions {
  /** Enable colorized output */
  colorize?: boolean;
  /** Pretty print JSON */
  prettyPrint?: boolean;
}

/**
 * Console sink for development
 */
export class ConsoleSink implements LogSink {
  private readonly colorize: boolean;
  private readonly prettyPrint: boolean;

  constructor(options: ConsoleSinkOptions = {}) {
    this.colorize = options.colorize ?? false;
    this.prettyPrint = options.prettyPrint ?? false;
  }

  write(entry: LogEntry): void {
    const output = this.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry);

    if (this.colorize) {
      const colors: Record<LogLevel, string> = {
        debug: '\x1b[36m',
        info: '\x1b[32m',
        warn: '\x1b[33m',
        error: '\x1b[31m',
      };
      console.log(`${colors[entry.level]}${output}\x1b[0m`);
    } else {
      console.log(output);
    }
  }
}

/**
 * JSON sink options
 */
export interface JsonSinkOptions {
  /** Write function for output */
  write: (json: string) => void;
  prettyPrint?: boolean;
}

/**
 * JSON sink for structured output
 */
export class JsonSink implements LogSink {
  private readonly writeFn: (json: string) => void;
  private readonly prettyPrint: boolean;

  constructor(options: JsonSinkOptions) {
    this.writeFn = options.write;
    this.prettyPrint = options.prettyPrint ?? false;
  }

  write(entry: LogEntry): void {
    this.writeFn(this.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry));
  }
}

/**
 * In-memory sink, mostly for tests and diagnostics dumps
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  /** Entries at the given level */
  at(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * No-op sink
 */
export class NoOpSink implements LogSink {
  write(_entry: LogEntry): void {
    // Intentionally empty
  }
}
