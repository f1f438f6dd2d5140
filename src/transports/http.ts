/**
 * @module trackio-client
 * @description HTTP transport — POSTs JSON payloads and classifies the answer.
 * Uses `fetch`, so it runs on Node.js 18+ without extra dependencies.
 *
 * Outcomes:
 * - 2xx → resolves
 * - 404 → {@link NotFoundError}
 * - other non-2xx → {@link StatusError}
 * - connection failure or timeout → {@link TransportError}
 *
 * A redirect answer carrying a `Location` header is re-POSTed once to
 * that location with the same body. The write token only follows a
 * redirect that stays on the base URL's origin. Nothing else is retried.
 */

import { NotFoundError, StatusError, TransportError } from "../core/errors.js";
import type { FetchLike } from "../core/types.js";

export const WRITE_TOKEN_HEADER = "X-Trackio-Write-Token";

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface HttpTransportOptions {
  baseURL: string;
  writeToken?: string;
  timeoutMs: number;
  /** Default: the global `fetch`, looked up on every request */
  fetch?: FetchLike;
}

export class HttpTransport {
  private readonly baseURL: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;

  constructor(options: HttpTransportOptions) {
    this.baseURL = options.baseURL.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.headers = { "Content-Type": "application/json" };
    if (options.writeToken) {
      this.headers[WRITE_TOKEN_HEADER] = options.writeToken;
    }
  }

  urlFor(path: string): string {
    return this.baseURL + path;
  }

  async post(path: string, payload: unknown): Promise<void> {
    const body = JSON.stringify(payload);
    const url = this.urlFor(path);

    let response = await this.request(path, url, body, this.headers);

    if (REDIRECT_STATUSES.has(response.status)) {
      const location = response.headers.get("location");
      if (location) {
        await readBody(response);
        const target = new URL(location, url);
        const headers =
          target.origin === new URL(url).origin
            ? this.headers
            : withoutToken(this.headers);
        response = await this.request(path, target.href, body, headers);
      }
    }

    if (response.ok) return;

    const text = await readBody(response);
    if (response.status === 404) {
      throw new NotFoundError(path, text);
    }
    throw new StatusError(path, response.status, text);
  }

  private async request(
    path: string,
    url: string,
    body: string,
    headers: Record<string, string>,
  ): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.fetchFn(url, {
        method: "POST",
        headers,
        body,
        redirect: "manual",
        signal: controller.signal,
      });
    } catch (err) {
      const cause = controller.signal.aborted
        ? new Error(`request timed out after ${this.timeoutMs}ms`, { cause: err })
        : err;
      throw new TransportError(path, cause);
    } finally {
      clearTimeout(timer);
    }
  }
}

function withoutToken(
  headers: Record<string, string>,
): Record<string, string> {
  const { [WRITE_TOKEN_HEADER]: _token, ...rest } = headers;
  return rest;
}

async function readBody(response: Response): Promise<string> {
  return response.text().catch(() => "");
}
