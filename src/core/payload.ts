/**
 * @module trackio-client
 * @description LogItem construction and the bulk-log wire codec.
 */

import type { BulkPayload, LogItem, Metrics } from "./types.js";

/** Step sent for items logged without one */
export const MISSING_STEP = -1;
/** Timestamp sent for items logged without one */
export const MISSING_TIMESTAMP = "";

/**
 * Build an immutable LogItem holding its own copy of `metrics`, so the
 * caller may reuse and mutate the object it passed. A non-integer step
 * or non-string timestamp counts as absent.
 */
export function createLogItem(
  metrics: Metrics | null | undefined,
  step?: number | null,
  timestamp?: string | null,
): LogItem {
  const item: { metrics: Metrics; step?: number; timestamp?: string } = {
    metrics: snapshot(metrics ?? {}),
  };
  if (typeof step === "number" && Number.isInteger(step)) item.step = step;
  if (typeof timestamp === "string") item.timestamp = timestamp;
  return Object.freeze(item);
}

function snapshot(metrics: Metrics): Metrics {
  try {
    return structuredClone(metrics);
  } catch {
    // Values structuredClone rejects (functions, symbols) keep a shallow copy
    return { ...metrics };
  }
}

/**
 * Turn buffered items into the parallel-array shape the server expects.
 * All three arrays are filled in the same pass so index `i` always
 * describes `items[i]`.
 */
export function toBulkPayload(
  project: string,
  run: string,
  items: readonly LogItem[],
): BulkPayload {
  const metricsList: Metrics[] = [];
  const steps: number[] = [];
  const timestamps: string[] = [];

  for (const item of items) {
    metricsList.push(item.metrics);
    steps.push(item.step ?? MISSING_STEP);
    timestamps.push(item.timestamp ?? MISSING_TIMESTAMP);
  }

  return {
    project,
    run,
    metrics_list: metricsList,
    steps,
    timestamps,
    config: null,
  };
}
