/**
 * @module trackio-client
 * @description Sink fan-out for diagnostics entries.
 */

import { type LogEntry, LogLevel, type Sink } from "./types.js";

/**
 * Deliver an entry to every sink whose level filter it passes.
 * A failing sink never reaches the code that logged.
 */
export function fanOutToSinks(
  entry: LogEntry,
  sinks: readonly Sink[],
  loggerLevel: number,
): void {
  for (const sink of sinks) {
    const sinkLevel = sink.level ? LogLevel[sink.level] : loggerLevel;
    if (entry.level < sinkLevel) continue;

    try {
      sink.write(entry);
    } catch {
      /* dropped: see above */
    }
  }
}
