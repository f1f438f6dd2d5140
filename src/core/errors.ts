/**
 * @module trackio-client
 * @description Error hierarchy for flush, transport and configuration failures.
 */

export type TrackioErrorCode =
  | "TRANSPORT"
  | "NOT_FOUND"
  | "STATUS"
  | "NO_ENDPOINT"
  | "CONFIG";

/**
 * Base class for every error the client surfaces.
 * Switch on `code` to tell the failure kinds apart.
 */
export class TrackioError extends Error {
  constructor(
    message: string,
    public readonly code: TrackioErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TrackioError";
  }

  toJSON(): Record<string, unknown> {
    return {
      type: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

/** Connection failure, DNS failure or request timeout */
export class TransportError extends TrackioError {
  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`POST ${path} failed: ${reason}`, "TRANSPORT", { cause });
    this.name = "TransportError";
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), path: this.path };
  }
}

/** The server answered 404; the resolver takes this as "try the next path" */
export class NotFoundError extends TrackioError {
  readonly status = 404;

  constructor(
    public readonly path: string,
    public readonly body: string,
  ) {
    super(`POST ${path} -> 404; body: ${body}`, "NOT_FOUND");
    this.name = "NotFoundError";
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), path: this.path, status: this.status };
  }
}

/** Any other non-2xx answer */
export class StatusError extends TrackioError {
  constructor(
    public readonly path: string,
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`POST ${path} -> ${status}; body: ${body}`, "STATUS");
    this.name = "StatusError";
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      path: this.path,
      status: this.status,
      body: this.body,
    };
  }
}

/** Every candidate bulk-log path answered 404 */
export class NoEndpointError extends TrackioError {
  constructor(public readonly attempts: readonly NotFoundError[]) {
    const paths = attempts.map((a) => a.path).join(", ");
    super(`no bulk-log endpoint available (tried ${paths})`, "NO_ENDPOINT");
    this.name = "NoEndpointError";
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), attempts: this.attempts.map((a) => a.path) };
  }
}

export class ConfigError extends TrackioError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

export function isTrackioError(value: unknown): value is TrackioError {
  return value instanceof TrackioError;
}

/** Normalize anything thrown into an Error */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
