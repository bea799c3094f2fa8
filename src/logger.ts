/** Sessions report progress at `debug`, deferred work at `warn` and rejected messages at `error`. */
export type LogLevel = "debug" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

/** Structured logger. Sessions log through this; supply your own to route elsewhere. */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Minimum level to output. */
  level?: LogLevel;
  /** Prefix naming the component, e.g. `Reconciler`. */
  context?: string;
  handler?: (entry: LogEntry) => void;
  /** Defaults to off when NODE_ENV is production. */
  enabled?: boolean;
}

const LEVELS: Record<
  LogLevel,
  { priority: number; label: string; write: (...args: unknown[]) => void }
> = {
  debug: { priority: 0, label: "DEBUG", write: (...args) => console.debug(...args) },
  warn: { priority: 1, label: "WARN", write: (...args) => console.warn(...args) },
  error: { priority: 2, label: "ERROR", write: (...args) => console.error(...args) },
};

/** Bounds and counts are bigints, which JSON cannot carry. */
function stringifyData(data: Record<string, unknown>): string {
  return JSON.stringify(
    data,
    (_key, value) => typeof value === "bigint" ? value.toString() : value,
  );
}

export function formatLogEntry(entry: LogEntry): string {
  const prefix = entry.context ? `[${entry.context}]` : "";
  const data = entry.data ? ` ${stringifyData(entry.data)}` : "";

  return `${new Date(entry.timestamp).toISOString()} ${
    LEVELS[entry.level].label
  }${prefix} ${entry.message}${data}`;
}

function defaultLogHandler(entry: LogEntry): void {
  const line = formatLogEntry(entry);

  if (entry.error) {
    LEVELS[entry.level].write(line, entry.error);
  } else {
    LEVELS[entry.level].write(line);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = "warn",
    context,
    handler = defaultLogHandler,
    enabled = process.env.NODE_ENV !== "production",
  } = options;

  const minPriority = LEVELS[level].priority;

  function log(
    logLevel: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (!enabled || LEVELS[logLevel].priority < minPriority) {
      return;
    }

    handler({
      level: logLevel,
      message,
      timestamp: Date.now(),
      context,
      data,
      error,
    });
  }

  return {
    debug: (message, data) => log("debug", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, error, data) => log("error", message, data, error),
  };
}

export const noopLogger: Logger = {
  debug: () => {},
  warn: () => {},
  error: () => {},
};
