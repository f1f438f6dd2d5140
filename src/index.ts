/**
 * @module trackio-client
 *
 * Batching client for experiment-tracking metrics. Buffers `log` calls
 * and ships them to the dashboard server as bulk requests.
 */

// ─── Client ──────────────────────────────────────────────────────
export { Batcher, type BatcherOptions } from "./core/batcher.js";
export { ClientBuilder, createClient, TrackioClient } from "./core/client.js";
export {
  DEFAULT_BASE_URL,
  DEFAULT_FLUSH_INTERVAL_MS,
  DEFAULT_MAX_BATCH,
  DEFAULT_TIMEOUT_MS,
  type Env,
  MAX_TIMER_MS,
  resolveConfig,
} from "./core/config.js";
export {
  createLogItem,
  MISSING_STEP,
  MISSING_TIMESTAMP,
  toBulkPayload,
} from "./core/payload.js";
// ─── Errors ──────────────────────────────────────────────────────
export {
  ConfigError,
  isTrackioError,
  NoEndpointError,
  NotFoundError,
  StatusError,
  TrackioError,
  type TrackioErrorCode,
  TransportError,
} from "./core/errors.js";
// ─── Types ───────────────────────────────────────────────────────
export {
  type BulkPayload,
  type ClientOptions,
  type FetchLike,
  type FlushErrorHandler,
  type FlushResult,
  type LogEntry,
  type LogError,
  type Logger,
  type LoggerOptions,
  type LogItem,
  LogLevel,
  type LogLevelName,
  type Metrics,
  type ResolvedConfig,
  type Sink,
} from "./core/types.js";
// ─── Transports ──────────────────────────────────────────────────
export {
  BULK_LOG_PATHS,
  EndpointResolver,
} from "./transports/endpoint-resolver.js";
export {
  HttpTransport,
  type HttpTransportOptions,
  WRITE_TOKEN_HEADER,
} from "./transports/http.js";
// ─── Diagnostics ─────────────────────────────────────────────────
export { createLogger } from "./core/logger.js";
export { consoleSink } from "./sinks/console.js";
export {
  type MemorySink,
  type MemorySinkOptions,
  memorySink,
} from "./sinks/memory.js";
