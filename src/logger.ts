// src/logger.ts

export type LogLevel = "debug" | "info" | "warn" | "error" | "none";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

export interface LogContext {
  nodeId?: string;
  component?: string;
  peerId?: string;
  digest?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
  error?: Error;
}

export type LogHandler = (entry: LogEntry) => void;

/**
 * Default console log handler that formats entries for terminal output.
 */
export const consoleLogHandler: LogHandler = (entry: LogEntry) => {
  const { level, message, context, timestamp, error } = entry;
  const ts = timestamp.toISOString();
  const ctx = Object.entries(context)
    .filter(([_, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${v}`)
    .join(" ");

  const prefix = ctx ? `[${ctx}]` : "";
  const formatted = `${ts} ${level.toUpperCase().padEnd(5)} ${prefix} ${message}`;

  switch (level) {
    case "debug":
      console.debug(formatted);
      break;
    case "info":
      console.log(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "error":
      console.error(formatted);
      if (error) {
        console.error(error);
      }
      break;
  }
};

/**
 * A handler that keeps entries in memory, for assertions in tests or for
 * surfacing recent node activity in a status view.
 */
export interface MemoryLogHandler {
  handler: LogHandler;
  entries: LogEntry[];
  clear(): void;
}

export function createMemoryLogHandler(maxEntries = 1000): MemoryLogHandler {
  const entries: LogEntry[] = [];
  return {
    entries,
    handler: (entry) => {
      entries.push(entry);
      if (entries.length > maxEntries) {
        entries.shift();
      }
    },
    clear: () => {
      entries.length = 0;
    },
  };
}

/**
 * Process-wide logger configuration. Every node in the process shares it.
 */
class LoggerConfig {
  private _level: LogLevel = "info";
  private _handler: LogHandler = consoleLogHandler;

  get level(): LogLevel {
    return this._level;
  }

  set level(level: LogLevel) {
    this._level = level;
  }

  get handler(): LogHandler {
    return this._handler;
  }

  set handler(handler: LogHandler) {
    this._handler = handler;
  }

  configure(options: { level?: LogLevel; handler?: LogHandler }): void {
    if (options.level !== undefined) {
      this._level = options.level;
    }
    if (options.handler !== undefined) {
      this._handler = options.handler;
    }
  }

  /** Restores console output at `info`. */
  reset(): void {
    this._level = "info";
    this._handler = consoleLogHandler;
  }
}

export const loggerConfig = new LoggerConfig();

/**
 * A structured logger with context.
 */
export class Logger {
  private readonly context: LogContext;

  constructor(context: LogContext = {}) {
    this.context = context;
  }

  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext });
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[loggerConfig.level];
  }

  private log(
    level: LogLevel,
    message: string,
    extra: LogContext = {},
    error?: Error,
  ): void {
    if (!this.isEnabled(level)) {
      return;
    }

    loggerConfig.handler({
      level,
      message,
      context: { ...this.context, ...extra },
      timestamp: new Date(),
      error,
    });
  }

  debug(message: string, extra?: LogContext): void {
    this.log("debug", message, extra);
  }

  info(message: string, extra?: LogContext): void {
    this.log("info", message, extra);
  }

  warn(message: string, extra?: LogContext, error?: Error): void {
    this.log("warn", message, extra, error);
  }

  error(message: string, error?: Error, extra?: LogContext): void {
    this.log("error", message, extra, error);
  }
}

export function createLogger(component: string, nodeId?: string): Logger {
  return new Logger({ component, nodeId });
}

/** Normalizes an unknown thrown value into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
