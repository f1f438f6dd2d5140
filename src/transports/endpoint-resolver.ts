/**
 * @module trackio-client
 * @description Finds which bulk-log path the server accepts and remembers it.
 *
 * The REST route is tried first, then the RPC-style route. Only a 404
 * moves on to the next candidate; any other failure ends the attempt.
 * The first path that accepts a batch is kept for the life of the
 * client. Nothing is cached while no path has succeeded.
 */

import { NoEndpointError, NotFoundError } from "../core/errors.js";
import type { Logger } from "../core/types.js";
import type { HttpTransport } from "./http.js";

export const BULK_LOG_PATHS = ["/api/bulk_log", "/gradio_api/bulk_log"] as const;

export class EndpointResolver {
  private cached: string | null = null;

  constructor(
    private readonly transport: Pick<HttpTransport, "post">,
    private readonly logger: Logger,
    private readonly candidates: readonly string[] = BULK_LOG_PATHS,
  ) {}

  get resolvedPath(): string | null {
    return this.cached;
  }

  /** POST the payload to the bulk-log endpoint, resolving it first if needed */
  async send(payload: unknown): Promise<string> {
    if (this.cached !== null) {
      await this.transport.post(this.cached, payload);
      return this.cached;
    }

    const misses: NotFoundError[] = [];
    for (const path of this.candidates) {
      try {
        await this.transport.post(path, payload);
      } catch (err) {
        if (err instanceof NotFoundError) {
          this.logger.debug("bulk-log path not found, trying next", { path });
          misses.push(err);
          continue;
        }
        throw err;
      }
      // Another send may have resolved while this one was waiting
      if (this.cached === null) {
        this.cached = path;
        this.logger.debug("bulk-log endpoint resolved", { path });
      }
      return path;
    }

    throw new NoEndpointError(misses);
  }
}
