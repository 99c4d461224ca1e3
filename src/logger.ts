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
  component?: string;
  serviceName?: string;
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
 * Formats an entry as a single line: timestamp, level, `[k=v ...]`, message.
 */
export function formatLogEntry(entry: LogEntry): string {
  const ctx = Object.entries(entry.context)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${v}`)
    .join(" ");

  const prefix = ctx ? `[${ctx}] ` : "";
  return `${entry.timestamp.toISOString()} ${entry.level.toUpperCase().padEnd(5)} ${prefix}${entry.message}`;
}

/**
 * Default console log handler.
 */
export const consoleLogHandler: LogHandler = (entry: LogEntry) => {
  const formatted = formatLogEntry(entry);

  switch (entry.level) {
    case "debug":
      console.debug(formatted);
      break;
    case "info":
      console.info(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "error":
      console.error(formatted);
      if (entry.error) {
        console.error(entry.error);
      }
      break;
  }
};

/**
 * Global logger configuration.
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

  /**
   * Restores the console handler at info level.
   */
  reset(): void {
    this._level = "info";
    this._handler = consoleLogHandler;
  }
}

export const loggerConfig = new LoggerConfig();

/**
 * A structured logger bound to a context.
 */
export class Logger {
  private readonly context: LogContext;

  constructor(context: LogContext = {}) {
    this.context = context;
  }

  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext });
  }

  private log(
    level: LogLevel,
    message: string,
    extra?: LogContext,
    error?: Error,
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[loggerConfig.level]) {
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

  warn(message: string, extra?: LogContext): void {
    this.log("warn", message, extra);
  }

  error(message: string, error?: Error, extra?: LogContext): void {
    this.log("error", message, extra, error);
  }
}

/**
 * Creates a logger for a specific component.
 */
export function createLogger(component: string, serviceName?: string): Logger {
  return new Logger({ component, serviceName });
}
