/**
 * Logging module public API.
 */

export type { Logger, LoggerName, LoggingService, LogContext } from "./types.js";
export { LogLevel, logAtLevel } from "./types.js";
export { NodeLogService } from "./node-log-service.js";
