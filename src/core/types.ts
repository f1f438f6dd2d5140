/**
 * @module trackio-client
 * @description Type definitions for the metrics client and its diagnostics logger.
 */

// ─── Metrics ─────────────────────────────────────────────────────

/** Arbitrary structured metric values, keyed by metric name */
export type Metrics = Record<string, unknown>;

/** A single measurement waiting in the buffer */
export interface LogItem {
  readonly metrics: Metrics;
  /** Logical step index; absent when the caller gave none */
  readonly step?: number;
  /** Caller-supplied timestamp; absent when the caller gave none */
  readonly timestamp?: string;
}

/** Request body accepted by the bulk-log endpoints */
export interface BulkPayload {
  project: string;
  run: string;
  metrics_list: Metrics[];
  /** `-1` marks an item logged without a step */
  steps: number[];
  /** `""` marks an item logged without a timestamp */
  timestamps: string[];
  config: Metrics | null;
}

/** Outcome of a flush that did not fail */
export interface FlushResult {
  /** Number of items sent (0 when the buffer was empty) */
  sent: number;
  /** Path the batch was posted to, `null` when nothing was sent */
  path: string | null;
}

// ─── Diagnostics Levels ──────────────────────────────────────────

export const LogLevel = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
  SILENT: Infinity,
} as const;

export type LogLevelName = keyof typeof LogLevel;

// ─── Diagnostics Entry ───────────────────────────────────────────

export interface LogEntry {
  /** Unique entry ID */
  id: string;
  /** Numeric log level */
  level: number;
  levelName: LogLevelName;
  message: string;
  /** Unix epoch timestamp (ms) */
  timestamp: number;
  meta: Record<string, unknown>;
  /** Bound context from child loggers (e.g. project, run) */
  context?: Record<string, unknown>;
  error?: LogError;
}

export interface LogError {
  message: string;
  name?: string;
  code?: string;
  stack?: string;
  /** Nested cause chain */
  cause?: LogError;
}

// ─── Sink ────────────────────────────────────────────────────────

/**
 * A Sink receives diagnostics entries and delivers them somewhere
 * (console, memory, a file...). Errors thrown by a sink are swallowed.
 */
export interface Sink {
  name: string;
  /** Optional per-sink level filter */
  level?: LogLevelName;
  write(entry: LogEntry): void;
}

// ─── Logger ──────────────────────────────────────────────────────

export interface LoggerOptions {
  /** Minimum log level (default: WARN) */
  level?: LogLevelName;
  sinks?: Sink[];
  /** Default bound context for all entries */
  context?: Record<string, unknown>;
  /** When to include stack traces (default: 'ERROR') */
  includeStack?: boolean | LogLevelName;
  /** Custom timestamp function (default: Date.now) */
  timestamp?: () => number;
  /** Custom ID generator (default: `crypto.randomUUID`) */
  idGenerator?: () => string;
}

export interface Logger {
  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(
    message: string,
    metaOrError?: Record<string, unknown> | Error,
    error?: Error,
  ): void;
  error(
    message: string,
    metaOrError?: Record<string, unknown> | Error,
    error?: Error,
  ): void;

  /** Create a child logger with additional bound context */
  child(context: Record<string, unknown>): Logger;

  setLevel(level: LogLevelName): void;
  isLevelEnabled(level: LogLevelName): boolean;
}

// ─── Client Options ──────────────────────────────────────────────

/** Called when a background flush (threshold or timer) fails */
export type FlushErrorHandler = (error: Error, dropped: number) => void;

export type FetchLike = (
  input: string,
  init: RequestInit,
) => Promise<Response>;

export interface ClientOptions {
  /** Dashboard server URL (default: `http://127.0.0.1:7860`) */
  baseURL?: string;
  project?: string;
  /** Run name (default: generated `run-<id>`) */
  run?: string;
  /** Sent as `X-Trackio-Write-Token` on every request */
  writeToken?: string;
  /** Per-request timeout in ms (default: 5000) */
  timeoutMs?: number;
  /** Buffer size that triggers an immediate flush (default: 128) */
  maxBatch?: number;
  /** Background flush period in ms (default: 200) */
  flushIntervalMs?: number;
  /** Diagnostics logger (default: console sink at WARN) */
  logger?: Logger;
  onFlushError?: FlushErrorHandler;
  /** Fetch implementation (default: global `fetch`) */
  fetch?: FetchLike;
}

export interface ResolvedConfig {
  readonly baseURL: string;
  readonly project: string;
  readonly run: string;
  readonly writeToken?: string;
  readonly timeoutMs: number;
  readonly maxBatch: number;
  readonly flushIntervalMs: number;
}
