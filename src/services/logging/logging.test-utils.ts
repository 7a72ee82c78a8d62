/**
 * Logger doubles for service tests.
 */

import { vi, type Mock } from "vitest";
import type { LogContext, LogLevel, Logger, LoggerName, LoggingService } from "./types.js";

type LogMethod = Mock<(message: string, context?: LogContext) => void>;

/**
 * Logger whose methods are spies.
 */
export interface MockLogger extends Logger {
  silly: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: Mock<(message: string, context?: LogContext, error?: Error) => void>;
}

/**
 * @example
 * const logger = createMockLogger();
 * await new DefaultReadinessPoller(serverApi, logger, { sleep }).waitUntilReady();
 * expect(logger.info).toHaveBeenCalledWith("Artifactory is up!", { attempts: 1 });
 */
export function createMockLogger(): MockLogger {
  return {
    silly: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function createSilentLogger(): Logger {
  return {
    silly: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}

/**
 * Logging service handing out one spy logger per name, shared by every caller.
 */
export interface MockLoggingService extends LoggingService {
  createLogger: Mock<(name: LoggerName) => MockLogger>;
  dispose: Mock<() => void>;
}

export function createMockLoggingService(): MockLoggingService {
  const loggers = new Map<LoggerName, MockLogger>();

  return {
    createLogger: vi.fn((name: LoggerName): MockLogger => {
      let logger = loggers.get(name);
      if (logger === undefined) {
        logger = createMockLogger();
        loggers.set(name, logger);
      }
      return logger;
    }),
    dispose: vi.fn(),
  };
}

export interface RecordedLine {
  readonly level: LogLevel;
  readonly text: string;
}

/**
 * Logger that keeps every line as it would be printed, context included.
 */
export interface RecordingLogger extends Logger {
  readonly lines: readonly RecordedLine[];
  /** All recorded lines joined, for checking that a value was never logged */
  output(): string;
}

export function createRecordingLogger(): RecordingLogger {
  const lines: RecordedLine[] = [];
  const record =
    (level: LogLevel) =>
    (message: string, context?: LogContext): void => {
      lines.push({ level, text: context ? `${message} ${JSON.stringify(context)}` : message });
    };

  return {
    lines,
    silly: record("silly"),
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    output: () => lines.map((line) => line.text).join("\n"),
  };
}
