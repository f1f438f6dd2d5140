/**
 * @module trackio-client
 * @description Memory sink — keeps the most recent diagnostics entries for inspection.
 *
 * @example
 * ```ts
 * const memory = memorySink({ maxSize: 50 });
 * const client = createClient({ logger: createLogger({ level: 'DEBUG', sinks: [memory] }) });
 * // ...
 * memory.getEntries('WARN');
 * ```
 */

import {
  type LogEntry,
  LogLevel,
  type LogLevelName,
  type Sink,
} from "../core/types.js";

export interface MemorySinkOptions {
  /** Maximum number of entries to keep (default: 1000) */
  maxSize?: number;
  level?: LogLevelName;
}

export interface MemorySink extends Sink {
  /** Entries oldest → newest, optionally at or above a level */
  getEntries(level?: LogLevelName): LogEntry[];
  clear(): void;
  readonly size: number;
}

export function memorySink(options: MemorySinkOptions = {}): MemorySink {
  const maxSize = options.maxSize ?? 1000;
  let entries: LogEntry[] = [];

  return {
    name: "memory",
    level: options.level,
    write(entry: LogEntry): void {
      entries.push(entry);
      if (entries.length > maxSize) {
        entries = entries.slice(entries.length - maxSize);
      }
    },
    getEntries(level?: LogLevelName): LogEntry[] {
      if (!level) return [...entries];
      const min = LogLevel[level];
      return entries.filter((e) => e.level >= min);
    },
    clear(): void {
      entries = [];
    },
    get size(): number {
      return entries.length;
    },
  };
}
