/**
 * @module trackio-client
 * @description Batcher — buffers log items and ships them as bulk payloads.
 *
 * A flush is triggered three ways: the buffer reaching `maxBatch`, the
 * background interval, or an explicit `flush()`. Every flush swaps the
 * buffer out synchronously, so items logged while a request is in the
 * air land in the next batch. Sends run one at a time in drain order.
 *
 * Failed batches are dropped, never requeued. Background failures are
 * logged and handed to `onFlushError`; explicit flushes reject.
 */

import { toError } from "./errors.js";
import { toBulkPayload } from "./payload.js";
import type {
  BulkPayload,
  FlushErrorHandler,
  FlushResult,
  LogItem,
  Logger,
} from "./types.js";

export interface BatcherOptions {
  project: string;
  run: string;
  maxBatch: number;
  flushIntervalMs: number;
  /** Delivers a payload and returns the path it was accepted on */
  deliver: (payload: BulkPayload) => Promise<string>;
  logger: Logger;
  onFlushError?: FlushErrorHandler;
}

type Trigger = "threshold" | "interval";

export class Batcher {
  private buffer: LogItem[] = [];
  private tail: Promise<void> = Promise.resolve();
  private sending = 0;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly options: BatcherOptions) {}

  /** Items waiting for the next flush */
  get pending(): number {
    return this.buffer.length;
  }

  /** Batches drained but not yet settled */
  get inFlight(): number {
    return this.sending;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Start the background flush interval. Does not keep the process alive. */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick();
    }, this.options.flushIntervalMs);
    if (typeof this.timer === "object" && "unref" in this.timer) {
      this.timer.unref();
    }
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  enqueue(item: LogItem): void {
    this.buffer.push(item);
    if (this.buffer.length >= this.options.maxBatch) {
      this.background("threshold");
    }
  }

  flush(): Promise<FlushResult> {
    if (this.buffer.length === 0) {
      return Promise.resolve({ sent: 0, path: null });
    }
    const items = this.buffer;
    this.buffer = [];
    return this.schedule(items);
  }

  /** Resolves once every batch drained so far has settled */
  idle(): Promise<void> {
    return this.tail;
  }

  // ─── Internal ───────────────────────────────────────────────

  private tick(): void {
    // A tick never overlaps a send already on the wire
    if (this.sending > 0) return;
    this.background("interval");
  }

  private schedule(items: LogItem[]): Promise<FlushResult> {
    this.sending++;
    const result = this.tail
      .then(() => this.send(items))
      .then(
        (path) => {
          this.sending--;
          return { sent: items.length, path };
        },
        (err: unknown) => {
          this.sending--;
          throw err;
        },
      );
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async send(items: LogItem[]): Promise<string> {
    const { project, run, deliver, logger } = this.options;
    const path = await deliver(toBulkPayload(project, run, items));
    logger.debug("bulk log sent", { count: items.length, path });
    return path;
  }

  private background(trigger: Trigger): void {
    const dropped = this.buffer.length;
    this.flush().catch((err: unknown) => {
      this.reportFailure(toError(err), dropped, trigger);
    });
  }

  private reportFailure(error: Error, dropped: number, trigger: Trigger): void {
    this.options.logger.warn(
      "background flush failed, batch dropped",
      { trigger, dropped },
      error,
    );
    if (!this.options.onFlushError) return;
    try {
      this.options.onFlushError(error, dropped);
    } catch (handlerErr) {
      this.options.logger.error("onFlushError handler threw", toError(handlerErr));
    }
  }
}
