/**
 * Winston transport that keeps log entries in memory.
 * Used by tests to assert on what a component logged.
 */

import TransportStream from "winston-transport";

export interface LogEntry {
  readonly level: string;
  readonly message: string;
  readonly module?: string;
  readonly meta: Readonly<Record<string, unknown>>;
  /** The line the configured format produced. */
  readonly line?: string;
}

const FORMATTED_MESSAGE = Symbol.for("message");

const RESERVED_KEYS: ReadonlySet<string> = new Set(["level", "message", "module", "timestamp"]);

export class MemoryTransport extends TransportStream {
  readonly entries: LogEntry[] = [];

  log(info: Record<string, unknown>, next: () => void): void {
    const meta: Record<string, unknown> = {};
    for (const key of Object.keys(info)) {
      if (!RESERVED_KEYS.has(key)) {
        meta[key] = info[key];
      }
    }
    const line: unknown = Reflect.get(info, FORMATTED_MESSAGE);
    this.entries.push({
      level: String(info.level),
      message: String(info.message),
      ...(typeof info.module === "string" ? { module: info.module } : {}),
      meta,
      ...(typeof line === "string" ? { line } : {}),
    });
    next();
  }

  messages(level?: string): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }
}

/**
 * Winston pipes the logger into its transports on the next tick, so
 * entries written right after creating a logger land asynchronously.
 */
export function flushLogs(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
