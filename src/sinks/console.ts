/**
 * @module trackio-client
 * @description Default diagnostics sink used by the client: one JSON line per
 * WARN-or-worse entry, on stderr.
 */

import { type LogEntry, LogLevel, type Sink } from "../core/types.js";

export function consoleSink(): Sink {
  return {
    name: "console",
    level: "WARN",
    write(entry: LogEntry): void {
      const line = JSON.stringify(entry);
      if (entry.level >= LogLevel.ERROR) {
        console.error(line);
      } else {
        console.warn(line);
      }
    },
  };
}
