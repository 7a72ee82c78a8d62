/**
 * Service error definitions.
 *
 * Every failure raised by the provisioning pipeline is a ServiceError subclass.
 * The `type` discriminator identifies the failure class; `code` narrows it further
 * where a class covers several causes.
 */

import type { FileSystemErrorCode } from "./platform/filesystem.js";

/**
 * Error codes for archive extraction operations.
 */
export type ArchiveErrorCode = "INVALID_ARCHIVE" | "EXTRACTION_FAILED" | "PERMISSION_DENIED";

/**
 * Serialized error format, used for structured error output.
 */
export interface SerializedError {
  readonly type:
    | "configuration"
    | "already-provisioned"
    | "unsupported-platform"
    | "invalid-version"
    | "download"
    | "protocol"
    | "archive"
    | "installation"
    | "launch"
    | "connection-timeout"
    | "credential"
    | "filesystem";
  readonly message: string;
  readonly code?: string;
  readonly path?: string;
}

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: SerializedError["type"];
  readonly code: string | undefined;

  constructor(message: string, code?: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code ?? undefined;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    const result: SerializedError = {
      type: this.type,
      message: this.message,
    };
    if (this.code !== undefined) {
      return { ...result, code: this.code };
    }
    return result;
  }
}

/**
 * Missing or invalid configuration: environment, CLI flags, templates,
 * or the running server's configuration API rejecting a change.
 */
export class ConfigurationError extends ServiceError {
  readonly type = "configuration" as const;
}

/**
 * A server installation already exists in the target home directory.
 */
export class AlreadyProvisionedError extends ServiceError {
  readonly type = "already-provisioned" as const;

  constructor(readonly installDir: string) {
    super(`Artifactory dir already exists in home directory: ${installDir}`);
    this.name = "AlreadyProvisionedError";
  }
}

/**
 * The host operating system is not one the release archives are built for.
 */
export class UnsupportedPlatformError extends ServiceError {
  readonly type = "unsupported-platform" as const;

  constructor(readonly platform: string) {
    super(
      `The OS on this machine is currently unsupported: ${platform}. Supported: darwin, linux, win32`
    );
    this.name = "UnsupportedPlatformError";
  }
}

/**
 * The requested server version is malformed or below the supported major.
 */
export class InvalidVersionError extends ServiceError {
  readonly type = "invalid-version" as const;
}

/**
 * The release archive could not be downloaded.
 */
export class DownloadError extends ServiceError {
  readonly type = "download" as const;

  constructor(
    message: string,
    /** HTTP status of the failed response, null for transport failures */
    readonly status: number | null = null
  ) {
    super(message, status !== null ? String(status) : undefined);
    this.name = "DownloadError";
  }
}

/**
 * The server (or release host) answered in a shape this tool does not understand.
 */
export class ProtocolError extends ServiceError {
  readonly type = "protocol" as const;
}

/**
 * Error from archive extraction operations (tar.gz, zip).
 */
export class ArchiveError extends ServiceError {
  readonly type = "archive" as const;

  constructor(
    message: string,
    readonly errorCode?: ArchiveErrorCode
  ) {
    super(message, errorCode);
    this.name = "ArchiveError";
  }
}

/**
 * The unpacked archive does not have the expected structure.
 */
export class InstallationError extends ServiceError {
  readonly type = "installation" as const;
}

/**
 * The server's start command could not be spawned or exited unsuccessfully.
 */
export class LaunchError extends ServiceError {
  readonly type = "launch" as const;

  constructor(
    message: string,
    /** Exit code of the start command, null when it never ran or was killed */
    readonly exitCode: number | null = null
  ) {
    super(message, exitCode !== null ? String(exitCode) : undefined);
    this.name = "LaunchError";
  }
}

/**
 * A polling loop used up its budget without observing success.
 */
export class ConnectionTimeoutError extends ServiceError {
  readonly type = "connection-timeout" as const;

  constructor(
    message: string,
    readonly attempts: number
  ) {
    super(message);
    this.name = "ConnectionTimeoutError";
  }
}

/**
 * The administrative access token could not be obtained.
 */
export class CredentialError extends ServiceError {
  readonly type = "credential" as const;
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  readonly type = "filesystem" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    /** Original error for debugging */
    override readonly cause?: Error,
    /** Original Node.js error code (e.g., "EMFILE", "ENOSPC") */
    readonly originalCode?: string
  ) {
    super(message, fsCode);
    this.name = "FileSystemError";
  }

  override toJSON(): SerializedError {
    return {
      type: this.type,
      message: this.message,
      path: this.path,
      code: this.fsCode,
    };
  }
}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

/**
 * Type guard for a FileSystemError with a specific code.
 */
export function isFileSystemErrorWithCode(
  error: unknown,
  code: FileSystemErrorCode
): error is FileSystemError {
  return error instanceof FileSystemError && error.fsCode === code;
}

export { getErrorMessage } from "../shared/error-utils.js";
