export type { LogLevel, LogContext, Logger, LogSink } from "./logger";
export { LOG_LEVELS, createLogger, isLogLevel, silentLogger } from "./logger";
