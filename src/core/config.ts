/**
 * @module trackio-client
 * @description Option resolution: explicit options first, then environment, then defaults.
 *
 * | Option            | Environment variable        | Default                 |
 * |-------------------|-----------------------------|-------------------------|
 * | `baseURL`         | `TRACKIO_SERVER_URL`        | `http://127.0.0.1:7860` |
 * | `project`         | `TRACKIO_PROJECT`           | `""`                    |
 * | `run`             | `TRACKIO_RUN`               | `run-<cuid>`            |
 * | `writeToken`      | `TRACKIO_WRITE_TOKEN`       | none                    |
 * | `timeoutMs`       | `TRACKIO_TIMEOUT_MS`        | `5000`                  |
 * | `maxBatch`        | `TRACKIO_MAX_BATCH`         | `128`                   |
 * | `flushIntervalMs` | `TRACKIO_FLUSH_INTERVAL_MS` | `200`                   |
 */

import { createId } from "@paralleldrive/cuid2";
import { ConfigError } from "./errors.js";
import type { ClientOptions, ResolvedConfig } from "./types.js";

export const DEFAULT_BASE_URL = "http://127.0.0.1:7860";
export const DEFAULT_TIMEOUT_MS = 5000;
export const DEFAULT_MAX_BATCH = 128;
export const DEFAULT_FLUSH_INTERVAL_MS = 200;

/** Largest delay Node timers accept; anything above fires after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

export type Env = Record<string, string | undefined>;

function envString(env: Env, key: string): string | undefined {
  const v = env[key];
  return v === undefined || v === "" ? undefined : v;
}

/** Unset or non-numeric values fall back to the default */
function envNumber(env: Env, key: string, def: number): number {
  const v = envString(env, key);
  if (v === undefined) return def;
  const n = Number(v);
  return Number.isFinite(n) ? n : def;
}

export function resolveConfig(
  options: ClientOptions = {},
  env: Env = process.env,
): ResolvedConfig {
  const config: ResolvedConfig = {
    baseURL:
      options.baseURL ?? envString(env, "TRACKIO_SERVER_URL") ?? DEFAULT_BASE_URL,
    project: options.project ?? envString(env, "TRACKIO_PROJECT") ?? "",
    run: options.run ?? envString(env, "TRACKIO_RUN") ?? `run-${createId()}`,
    writeToken: options.writeToken ?? envString(env, "TRACKIO_WRITE_TOKEN"),
    timeoutMs:
      options.timeoutMs ?? envNumber(env, "TRACKIO_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
    maxBatch:
      options.maxBatch ?? envNumber(env, "TRACKIO_MAX_BATCH", DEFAULT_MAX_BATCH),
    flushIntervalMs:
      options.flushIntervalMs ??
      envNumber(env, "TRACKIO_FLUSH_INTERVAL_MS", DEFAULT_FLUSH_INTERVAL_MS),
  };

  validate(config);
  return Object.freeze(config);
}

function validate(config: ResolvedConfig): void {
  if (!Number.isInteger(config.maxBatch) || config.maxBatch < 1) {
    throw new ConfigError(
      `maxBatch must be an integer >= 1, got ${config.maxBatch}`,
    );
  }
  checkDelay("flushIntervalMs", config.flushIntervalMs);
  checkDelay("timeoutMs", config.timeoutMs);
  try {
    new URL(config.baseURL);
  } catch (err) {
    throw new ConfigError(`baseURL is not a valid URL: ${config.baseURL}`, {
      cause: err,
    });
  }
}

function checkDelay(name: string, ms: number): void {
  if (!(ms > 0 && ms <= MAX_TIMER_MS)) {
    throw new ConfigError(
      `${name} must be > 0 and <= ${MAX_TIMER_MS}, got ${ms}`,
    );
  }
}
