/**
 * @module trackio-client
 * @description Diagnostics logger used by the client to report what it does
 * with your metrics. Pass your own via `ClientOptions.logger`.
 *
 * @example
 * ```ts
 * import { createLogger, memorySink } from 'trackio-client';
 *
 * const logger = createLogger({ level: 'DEBUG', sinks: [memorySink()] });
 * const runLog = logger.child({ run: 'baseline' });
 * runLog.debug('bulk log sent', { count: 12 });
 * ```
 */

import { randomUUID } from "node:crypto";
import { fanOutToSinks } from "./pipeline.js";
import {
  type LogEntry,
  type LogError,
  type Logger,
  type LoggerOptions,
  LogLevel,
  type LogLevelName,
  type Sink,
} from "./types.js";

type Meta = Record<string, unknown>;

// ─── Logger Implementation ──────────────────────────────────────

class LoggerImpl implements Logger {
  private _level: number;
  private readonly _sinks: Sink[];
  private readonly _context: Meta;
  private readonly _includeStack: boolean | LogLevelName;
  private readonly _timestampFn: () => number;
  private readonly _idFn: () => string;

  constructor(options: LoggerOptions = {}) {
    this._level = LogLevel[options.level ?? "WARN"];
    this._sinks = [...(options.sinks ?? [])];
    this._context = options.context ? { ...options.context } : {};
    this._includeStack = options.includeStack ?? "ERROR";
    this._timestampFn = options.timestamp ?? Date.now;
    this._idFn = options.idGenerator ?? randomUUID;
  }

  trace(message: string, meta?: Meta): void {
    this._logWithContext(10, "TRACE", message, this._context, meta);
  }

  debug(message: string, meta?: Meta): void {
    this._logWithContext(20, "DEBUG", message, this._context, meta);
  }

  info(message: string, meta?: Meta): void {
    this._logWithContext(30, "INFO", message, this._context, meta);
  }

  warn(message: string, metaOrError?: Meta | Error, error?: Error): void {
    this._logSplit(40, "WARN", message, this._context, metaOrError, error);
  }

  error(message: string, metaOrError?: Meta | Error, error?: Error): void {
    this._logSplit(50, "ERROR", message, this._context, metaOrError, error);
  }

  child(context: Meta): Logger {
    return new ChildLoggerImpl(this, { ...this._context, ...context });
  }

  setLevel(level: LogLevelName): void {
    this._level = LogLevel[level];
  }

  isLevelEnabled(level: LogLevelName): boolean {
    return LogLevel[level] >= this._level;
  }

  // ─── Internal ───────────────────────────────────────────────

  /** @internal */
  _logSplit(
    level: number,
    levelName: LogLevelName,
    message: string,
    context: Meta,
    metaOrError?: Meta | Error,
    error?: Error,
  ): void {
    if (metaOrError instanceof Error) {
      this._logWithContext(level, levelName, message, context, undefined, metaOrError);
    } else {
      this._logWithContext(level, levelName, message, context, metaOrError, error);
    }
  }

  /** @internal Used by child loggers to inject bound context */
  _logWithContext(
    level: number,
    levelName: LogLevelName,
    message: string,
    context: Meta,
    meta?: Meta,
    error?: Error,
  ): void {
    if (level < this._level) return;

    const entry: LogEntry = {
      id: this._idFn(),
      level,
      levelName,
      message,
      timestamp: this._timestampFn(),
      meta: meta ?? {},
      context: Object.keys(context).length > 0 ? context : undefined,
    };

    if (error) {
      const withStack =
        typeof this._includeStack === "boolean"
          ? this._includeStack
          : level >= LogLevel[this._includeStack];
      entry.error = serializeError(error, withStack);
    }

    fanOutToSinks(entry, this._sinks, this._level);
  }
}

// ─── Error Serialization ─────────────────────────────────────────

/** Recursively serialize an Error including its cause chain */
export function serializeError(
  error: Error,
  includeStack: boolean,
  depth = 0,
): LogError {
  const logError: LogError = { message: error.message, name: error.name };
  if ("code" in error && typeof error.code === "string") {
    logError.code = error.code;
  }
  if (includeStack) {
    logError.stack = error.stack;
  }
  // Cap depth at 5 to stop on cyclic causes
  if (error.cause instanceof Error && depth < 5) {
    logError.cause = serializeError(error.cause, includeStack, depth + 1);
  }
  return logError;
}

// ─── Child Logger ────────────────────────────────────────────────

class ChildLoggerImpl implements Logger {
  constructor(
    private readonly _parent: LoggerImpl,
    private readonly _context: Meta,
  ) {}

  trace(message: string, meta?: Meta): void {
    this._parent._logWithContext(10, "TRACE", message, this._context, meta);
  }
  debug(message: string, meta?: Meta): void {
    this._parent._logWithContext(20, "DEBUG", message, this._context, meta);
  }
  info(message: string, meta?: Meta): void {
    this._parent._logWithContext(30, "INFO", message, this._context, meta);
  }
  warn(message: string, metaOrError?: Meta | Error, error?: Error): void {
    this._parent._logSplit(40, "WARN", message, this._context, metaOrError, error);
  }
  error(message: string, metaOrError?: Meta | Error, error?: Error): void {
    this._parent._logSplit(50, "ERROR", message, this._context, metaOrError, error);
  }
  child(context: Meta): Logger {
    return new ChildLoggerImpl(this._parent, { ...this._context, ...context });
  }
  setLevel(level: LogLevelName): void {
    this._parent.setLevel(level);
  }
  isLevelEnabled(level: LogLevelName): boolean {
    return this._parent.isLevelEnabled(level);
  }
}

// ─── Factory ─────────────────────────────────────────────────────

/**
 * Create a diagnostics logger.
 *
 * @example
 * ```ts
 * const logger = createLogger({ sinks: [consoleSink()] });
 * ```
 */
export function createLogger(options?: LoggerOptions): Logger {
  return new LoggerImpl(options);
}
