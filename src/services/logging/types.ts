/**
 * Logging types and interfaces.
 *
 * Provides a testable logging abstraction over electron-log with:
 * - Type-safe logger names (scopes)
 * - Constrained context type (no nested objects, functions, symbols)
 * - Interface for dependency injection
 */

/**
 * Log levels in order of verbosity (most verbose to least).
 */
export const LogLevel = {
  silly: "silly",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Valid logger names (scopes).
 * Each name corresponds to a module or subsystem of the provisioning tool.
 */
export type LoggerName =
  | "process" // ExecaProcessRunner - process spawning
  | "network" // DefaultNetworkLayer - HTTP
  | "fs" // DefaultFileSystemLayer - filesystem operations
  | "env" // ProcessEnvironmentLayer - environment variables
  | "provisioning" // Provisioner - pipeline orchestration
  | "download" // ArchiveFetcher - release archive download
  | "install" // ArchiveInstaller - extraction and platform fixups
  | "config" // ConfigPatcher - pre-start configuration files
  | "readiness" // ReadinessPoller - health polling
  | "credentials" // CredentialMinter, CredentialExporter - access tokens
  | "post-start" // PostStartConfigurator - runtime configuration
  | "cli"; // main entry point

/**
 * Context data for log entries.
 * Constrained to primitive types for serialization safety:
 * - No nested objects (prevents circular references)
 * - No functions or symbols (not serializable)
 * - null allowed for explicit "no value" cases
 */
export type LogContext = Record<string, string | number | boolean | null>;

/**
 * Logger interface for dependency injection.
 * Services receive this interface via constructor injection.
 *
 * @example
 * ```typescript
 * class ArchiveFetcher {
 *   constructor(private readonly logger: Logger) {}
 *
 *   async fetch(url: string): Promise<void> {
 *     this.logger.info("Downloading", { url });
 *   }
 * }
 * ```
 */
export interface Logger {
  /**
   * Log a silly message (most verbose).
   * Use for per-iteration details that would be overwhelming in normal debug output.
   */
  silly(message: string, context?: LogContext): void;

  /**
   * Log a debug message.
   * Use for detailed tracing information.
   */
  debug(message: string, context?: LogContext): void;

  /**
   * Log an info message.
   * Use for pipeline steps and their outcomes.
   */
  info(message: string, context?: LogContext): void;

  /**
   * Log a warning message.
   * Use for recoverable issues, such as a failed readiness probe.
   */
  warn(message: string, context?: LogContext): void;

  /**
   * Log an error message.
   *
   * @param message - Human-readable error description
   * @param context - Structured context data
   * @param error - Optional Error object for stack trace inclusion
   */
  error(message: string, context?: LogContext, error?: Error): void;
}

/**
 * Logging service interface.
 * Creates named loggers sharing one transport configuration.
 *
 * @example
 * ```typescript
 * const loggingService = new NodeLogService(process.env);
 * const logger = loggingService.createLogger("download");
 * ```
 */
export interface LoggingService {
  /**
   * Create a logger with the specified name (scope).
   * The name appears in log output to identify the source.
   */
  createLogger(name: LoggerName): Logger;

  /**
   * Dispose of the logging service.
   */
  dispose(): void;
}

/**
 * Log a message at the specified level.
 * Useful when the log level is dynamic.
 */
export function logAtLevel(
  logger: Logger,
  level: LogLevel,
  message: string,
  context?: LogContext
): void {
  logger[level](message, context);
}
