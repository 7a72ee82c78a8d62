/**
 * NodeLogService - Logging implementation using electron-log's Node.js entry point.
 *
 * Features:
 * - Console output on by default (the tool runs in CI logs)
 * - Optional session log file: `<datetime>-<uuid>.log` in LOCAL_RT_LOG_DIR
 * - Environment variable configuration for level and logger filtering
 * - Named logger scopes for component identification
 * - Context serialization as key=value pairs
 */

import log from "electron-log/node";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types.js";
import { LogLevel as LogLevelValues } from "./types.js";

/**
 * Type for electron-log scope (log functions).
 */
type LogScope = ReturnType<typeof log.scope>;

/**
 * Environment variables read by the logging service.
 */
export const LOG_LEVEL_ENV = "LOCAL_RT_LOGLEVEL";
export const LOG_DIR_ENV = "LOCAL_RT_LOG_DIR";
export const LOGGER_FILTER_ENV = "LOCAL_RT_LOGGER";

const LOG_FORMAT = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";

/**
 * Format context object as key=value pairs for log message.
 *
 * @returns Formatted string like "key1=value1 key2=value2"
 */
export function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => {
      if (value === null) return `${key}=null`;
      return `${key}=${String(value)}`;
    })
    .join(" ");
}

/**
 * Parse and validate the log level environment variable.
 *
 * @returns Valid log level or undefined if unset or invalid
 */
export function parseLogLevel(envValue: string | undefined): LogLevel | undefined {
  if (!envValue) return undefined;
  const normalized = envValue.toLowerCase().trim();
  for (const level of Object.values(LogLevelValues)) {
    if (level === normalized) {
      return level;
    }
  }
  return undefined;
}

/**
 * Generate session-based log filename.
 * Format: YYYY-MM-DDTHH-MM-SS-<uuid>.log
 */
function generateSessionFilename(): string {
  const timestamp = new Date()
    .toISOString()
    .replace(/[:.]/g, "-") // Replace : and . with -
    .slice(0, 19); // YYYY-MM-DDTHH-MM-SS
  const uuid = randomUUID().slice(0, 8);
  return `${timestamp}-${uuid}.log`;
}

function withContext(message: string, context: LogContext | undefined): string {
  const contextStr = formatContext(context);
  return contextStr ? `${message} ${contextStr}` : message;
}

/**
 * Logger implementation wrapping an electron-log scope.
 */
class ScopedLogger implements Logger {
  constructor(private readonly scope: LogScope) {}

  silly(message: string, context?: LogContext): void {
    this.scope.silly(withContext(message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.scope.debug(withContext(message, context));
  }

  info(message: string, context?: LogContext): void {
    this.scope.info(withContext(message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.scope.warn(withContext(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (error) {
      this.scope.error(withContext(message, context), error);
    } else {
      this.scope.error(withContext(message, context));
    }
  }
}

const LOGGER_NAMES: readonly LoggerName[] = [
  "process",
  "network",
  "fs",
  "env",
  "provisioning",
  "download",
  "install",
  "config",
  "readiness",
  "credentials",
  "post-start",
  "cli",
];

function isLoggerName(name: string): name is LoggerName {
  return LOGGER_NAMES.some((known) => known === name);
}

/**
 * Parse the logger filter env var to get the set of allowed logger names.
 * Unknown names are ignored.
 *
 * @returns Set of allowed logger names, or undefined if not set (allow all)
 */
export function parseLoggerFilter(envValue: string | undefined): Set<LoggerName> | undefined {
  if (!envValue) return undefined;
  const names = envValue
    .split(",")
    .map((name) => name.trim())
    .filter(isLoggerName);
  if (names.length === 0) return undefined;
  return new Set(names);
}

/**
 * Logger that filters based on allowed logger names.
 * If the logger is not in the allowed set, all log methods are no-ops.
 */
class FilteredLogger implements Logger {
  private readonly enabled: boolean;

  constructor(
    private readonly inner: Logger,
    allowedLoggers: Set<LoggerName> | undefined,
    name: LoggerName
  ) {
    this.enabled = allowedLoggers === undefined || allowedLoggers.has(name);
  }

  silly(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.silly(message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.debug(message, context);
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.info(message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.warn(message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (this.enabled) this.inner.error(message, context, error);
  }
}

/**
 * Logging service for the provisioning CLI.
 *
 * Configuration:
 * - Default level: info
 * - Override via LOCAL_RT_LOGLEVEL (silly, debug, info, warn, error)
 * - File output via LOCAL_RT_LOG_DIR (directory for session log files)
 * - Logger filtering via LOCAL_RT_LOGGER (comma-separated logger names)
 *
 * @example
 * ```typescript
 * const loggingService = new NodeLogService(process.env);
 * const logger = loggingService.createLogger("readiness");
 * logger.info("Artifactory is up!", { attempts: 4 });
 * // Output: [2026-10-19 10:30:00.123] [info] [readiness] Artifactory is up! attempts=4
 * ```
 */
export class NodeLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly logLevel: LogLevel;
  private readonly allowedLoggers: Set<LoggerName> | undefined;

  constructor(env: NodeJS.ProcessEnv) {
    this.logLevel = parseLogLevel(env[LOG_LEVEL_ENV]) ?? "info";
    this.allowedLoggers = parseLoggerFilter(env[LOGGER_FILTER_ENV]);

    const logsDir = env[LOG_DIR_ENV];
    if (logsDir) {
      const filename = generateSessionFilename();
      log.transports.file.resolvePathFn = (): string => join(logsDir, filename);
      log.transports.file.level = this.logLevel;
    } else {
      log.transports.file.level = false;
    }

    log.transports.console.level = this.logLevel;

    log.transports.file.format = LOG_FORMAT;
    log.transports.console.format = LOG_FORMAT;
  }

  /**
   * Create a logger with the specified name (scope).
   * If LOCAL_RT_LOGGER is set, only loggers in the list will actually log.
   */
  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const scope = log.scope(`[${name}]`);
    const logger = new FilteredLogger(new ScopedLogger(scope), this.allowedLoggers, name);
    this.loggers.set(name, logger);
    return logger;
  }

  dispose(): void {
    this.loggers.clear();
  }
}
