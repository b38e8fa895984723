// src/log/logger.ts
// Leveled console logging for the compiler pipeline

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * Where log lines end up. `console` satisfies this.
 */
export interface LogSink {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(level: LogLevel, sink: LogSink = console, scope = "netc"): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const emit = (at: Exclude<LogLevel, "silent">, message: string, context?: LogContext): void => {
    if (threshold < LOG_LEVELS.indexOf(at)) return;
    const line = `[${scope}] ${message}`;
    if (context && Object.keys(context).length > 0) {
      sink[at](line, context);
    } else {
      sink[at](line);
    }
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
  };
}

export const silentLogger: Logger = createLogger("silent");
