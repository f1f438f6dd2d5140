/**
 * @module trackio-client
 * @description Client facade over the batcher and endpoint resolver.
 *
 * @example Basic usage
 * ```ts
 * import { createClient } from 'trackio-client';
 *
 * const client = createClient({ project: 'mnist', run: 'baseline' });
 *
 * for (let step = 0; step < 100; step++) {
 *   client.log({ loss: 1 / (step + 1) }, step);
 * }
 *
 * await client.close(); // sends whatever is still buffered
 * ```
 *
 * @example Builder
 * ```ts
 * const client = TrackioClient.builder()
 *   .withBaseURL('http://localhost:7860')
 *   .withProject('mnist')
 *   .withWriteToken(process.env.TRACKIO_WRITE_TOKEN ?? '')
 *   .withMaxBatch(64)
 *   .build();
 * ```
 *
 * @example Checking delivery
 * ```ts
 * try {
 *   const { sent, path } = await client.flush();
 * } catch (err) {
 *   if (isTrackioError(err) && err.code === 'STATUS') { ... }
 * }
 * ```
 */

import { Batcher } from "./batcher.js";
import { resolveConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createLogItem } from "./payload.js";
import { consoleSink } from "../sinks/console.js";
import { EndpointResolver } from "../transports/endpoint-resolver.js";
import { HttpTransport } from "../transports/http.js";
import type {
  ClientOptions,
  FetchLike,
  FlushErrorHandler,
  FlushResult,
  Logger,
  Metrics,
  ResolvedConfig,
} from "./types.js";

export class TrackioClient {
  private readonly _config: ResolvedConfig;
  private readonly _logger: Logger;
  private readonly _resolver: EndpointResolver;
  private readonly _batcher: Batcher;
  private _closed = false;

  constructor(options: ClientOptions = {}) {
    this._config = resolveConfig(options);
    const { project, run } = this._config;

    const root =
      options.logger ?? createLogger({ level: "WARN", sinks: [consoleSink()] });
    this._logger = root.child({ project, run });

    const transport = new HttpTransport({
      baseURL: this._config.baseURL,
      writeToken: this._config.writeToken,
      timeoutMs: this._config.timeoutMs,
      fetch: options.fetch,
    });
    this._resolver = new EndpointResolver(transport, this._logger);
    this._batcher = new Batcher({
      project,
      run,
      maxBatch: this._config.maxBatch,
      flushIntervalMs: this._config.flushIntervalMs,
      deliver: (payload) => this._resolver.send(payload),
      logger: this._logger,
      onFlushError: options.onFlushError,
    });
    this._batcher.start();
  }

  /** Client configured from `TRACKIO_*` environment variables only */
  static fromEnv(): TrackioClient {
    return new TrackioClient();
  }

  static builder(): ClientBuilder {
    return new ClientBuilder();
  }

  get config(): ResolvedConfig {
    return this._config;
  }

  /** Items buffered and not yet drained by a flush */
  get pending(): number {
    return this._batcher.pending;
  }

  /** Bulk-log path in use, `null` until a batch has been accepted */
  get endpoint(): string | null {
    return this._resolver.resolvedPath;
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Buffer one measurement. Never throws and never waits on the network;
   * a batch that fails to send from here is logged and dropped.
   */
  log(
    metrics: Metrics,
    step?: number | null,
    timestamp?: string | null,
  ): void {
    if (this._closed) {
      this._logger.warn("log called after close, dropping metrics", { step });
      return;
    }
    this._batcher.enqueue(createLogItem(metrics, step, timestamp));
  }

  /** Send everything buffered now. Rejects with a `TrackioError` on failure. */
  flush(): Promise<FlushResult> {
    return this._batcher.flush();
  }

  /**
   * Stop the background timer, send the remaining buffer and wait for
   * in-flight batches. Must be called before the client is dropped.
   */
  async close(): Promise<FlushResult> {
    if (this._closed) {
      await this._batcher.idle();
      return { sent: 0, path: null };
    }
    this._closed = true;
    this._batcher.stop();
    try {
      return await this._batcher.flush();
    } finally {
      await this._batcher.idle();
    }
  }
}

// ─── Builder ─────────────────────────────────────────────────────

export class ClientBuilder {
  private readonly options: ClientOptions = {};

  withBaseURL(url: string): this {
    this.options.baseURL = url;
    return this;
  }

  withProject(project: string): this {
    this.options.project = project;
    return this;
  }

  withRun(run: string): this {
    this.options.run = run;
    return this;
  }

  withWriteToken(token: string): this {
    this.options.writeToken = token;
    return this;
  }

  withTimeout(ms: number): this {
    this.options.timeoutMs = ms;
    return this;
  }

  withMaxBatch(size: number): this {
    this.options.maxBatch = size;
    return this;
  }

  withFlushInterval(ms: number): this {
    this.options.flushIntervalMs = ms;
    return this;
  }

  withLogger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  withFetch(fetchFn: FetchLike): this {
    this.options.fetch = fetchFn;
    return this;
  }

  onFlushError(handler: FlushErrorHandler): this {
    this.options.onFlushError = handler;
    return this;
  }

  build(): TrackioClient {
    return new TrackioClient({ ...this.options });
  }
}

/**
 * Create a metrics client.
 *
 * @example
 * ```ts
 * const client = createClient({ project: 'mnist', maxBatch: 32 });
 * ```
 */
export function createClient(options?: ClientOptions): TrackioClient {
  return new TrackioClient(options);
}
