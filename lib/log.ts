// /lib/log.ts
// Scoped logger for the HTTP surface. The conversion engine itself never logs.

export type LogLevel = "info" | "warn" | "error";

export type LogEntry = {
  /** Unix time, ms. */
  ts: number;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
};

export type LogSink = (entry: LogEntry) => void;

export type Logger = {
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
};

const MAX_STRING_CHARS = 4000;

export const consoleSink: LogSink = (entry) => {
  const line = `${new Date(entry.ts).toISOString()} ${entry.level.toUpperCase()} ${entry.message}`;
  const args: unknown[] = entry.data ? [line, entry.data] : [line];
  if (entry.level === "error") console.error(...args);
  else if (entry.level === "warn") console.warn(...args);
  else console.info(...args);
};

/** Sink that keeps entries in memory, for tests and diagnostics. */
export function memorySink(): LogSink & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const sink = (entry: LogEntry) => {
    entries.push(entry);
  };
  return Object.assign(sink, { entries });
}

function truncate(value: unknown): unknown {
  if (typeof value !== "string" || value.length <= MAX_STRING_CHARS) return value;
  return `${value.slice(0, MAX_STRING_CHARS)}…(${value.length - MAX_STRING_CHARS} more)`;
}

/**
 * Create a logger whose messages are prefixed with `scope` and whose data always
 * carries `fixed`.
 *
 *   const log = createLogger("convert", { fixed: { kind: "western" } });
 *   log.warn("year info inconsistent", { year: 1385 });
 */
export function createLogger(scope: string, opts: { sink?: LogSink; fixed?: Record<string, unknown> } = {}): Logger {
  const sink = opts.sink ?? consoleSink;
  const prefix = scope.trim();
  const write = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    const merged = opts.fixed || data ? { ...(opts.fixed ?? {}), ...(data ?? {}) } : undefined;
    const safe = merged
      ? Object.fromEntries(Object.entries(merged).map(([k, v]) => [k, truncate(v)]))
      : undefined;
    sink({ ts: Date.now(), level, message: prefix ? `${prefix}: ${message}` : message, data: safe });
  };
  return {
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
  };
}
