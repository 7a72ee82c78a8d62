/**
 * FileSystemLayer - Abstraction over filesystem operations.
 *
 * Provides an injectable interface for filesystem access, enabling:
 * - Unit testing of provisioning steps with the in-memory state mock
 * - Boundary testing of DefaultFileSystemLayer against a real temp directory
 * - Consistent error handling via FileSystemError
 */

import { createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as nodePath from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { FileSystemError } from "../errors.js";
import type { Logger } from "../logging/index.js";

/**
 * Directory entry returned by readdir.
 */
export interface DirEntry {
  /** Entry name (not full path) */
  readonly name: string;
  /** True if entry is a directory */
  readonly isDirectory: boolean;
}

/**
 * Options for rm operation.
 */
export interface RmOptions {
  /** Ignore errors if path doesn't exist (default: false) */
  readonly force?: boolean;
}

/**
 * Options for operations that create files.
 */
export interface WriteOptions {
  /** Permission bits for a newly created file (default: 0o644) */
  readonly mode?: number;
}

/**
 * Options for chmod operation.
 */
export interface ChmodOptions {
  /** Apply the mode to every file and directory below the path as well (default: false) */
  readonly recursive?: boolean;
}

/**
 * Error codes for filesystem operations.
 */
export type FileSystemErrorCode =
  | "ENOENT" // File/directory not found
  | "EACCES" // Permission denied
  | "EEXIST" // File/directory already exists
  | "ENOTDIR" // Not a directory
  | "EISDIR" // Is a directory (when file expected)
  | "ENOTEMPTY" // Directory not empty
  | "UNKNOWN"; // Other errors (check originalCode)

/**
 * Default permission bits for files written without an explicit mode.
 */
export const DEFAULT_FILE_MODE = 0o644;

/**
 * Abstraction over filesystem operations.
 *
 * All paths are absolute. All text operations use UTF-8 encoding.
 * Methods throw FileSystemError on failures.
 *
 * NOTE: No exists() method - use try/catch on actual operations to avoid TOCTOU races.
 */
export interface FileSystemLayer {
  /**
   * Read entire file as UTF-8 string.
   *
   * @throws FileSystemError with code ENOENT if file not found
   * @throws FileSystemError with code EISDIR if path is a directory
   */
  readFile(path: string): Promise<string>;

  /**
   * Read up to `length` bytes from the start of a file.
   * Returns fewer bytes when the file is shorter.
   *
   * @throws FileSystemError with code ENOENT if file not found
   */
  readFileHead(path: string, length: number): Promise<Buffer>;

  /**
   * Write content to file. Overwrites existing file.
   *
   * @throws FileSystemError with code ENOENT if parent directory doesn't exist
   * @throws FileSystemError with code EISDIR if path is a directory
   */
  writeFile(path: string, content: string, options?: WriteOptions): Promise<void>;

  /**
   * Append content to a file, creating it when missing.
   *
   * @throws FileSystemError with code ENOENT if parent directory doesn't exist
   */
  appendFile(path: string, content: string, options?: WriteOptions): Promise<void>;

  /**
   * Stream a body to a file. Overwrites existing file.
   * Resolves only after every byte has been flushed; a failing source or sink rejects.
   *
   * @returns Number of bytes written
   */
  writeStream(path: string, source: ReadableStream<Uint8Array>): Promise<number>;

  /**
   * Create directory together with any missing parents.
   * No-op if directory already exists.
   *
   * @throws FileSystemError with code EEXIST if path exists as a file
   */
  mkdir(path: string): Promise<void>;

  /**
   * List directory contents.
   *
   * @throws FileSystemError with code ENOENT if directory not found
   * @throws FileSystemError with code ENOTDIR if path is not a directory
   */
  readdir(path: string): Promise<readonly DirEntry[]>;

  /**
   * Delete a file.
   *
   * @throws FileSystemError with code ENOENT if path not found (unless force: true)
   * @throws FileSystemError with code EISDIR if path is a directory
   */
  rm(path: string, options?: RmOptions): Promise<void>;

  /**
   * Rename (move) a file or directory.
   *
   * @throws FileSystemError with code ENOENT if oldPath doesn't exist
   */
  rename(oldPath: string, newPath: string): Promise<void>;

  /**
   * Change permission bits, optionally for a whole tree.
   * Symbolic links inside a tree are left alone.
   *
   * @throws FileSystemError with code ENOENT if path not found
   */
  chmod(path: string, mode: number, options?: ChmodOptions): Promise<void>;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Known error codes that map to FileSystemErrorCode.
 */
const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<FileSystemErrorCode>([
  "ENOENT",
  "EACCES",
  "EEXIST",
  "ENOTDIR",
  "EISDIR",
  "ENOTEMPTY",
]);

function isKnownErrorCode(code: string): code is Exclude<FileSystemErrorCode, "UNKNOWN"> {
  return KNOWN_ERROR_CODES.has(code);
}

/**
 * SystemError info structure for fs.rm() errors.
 * Node.js rm() returns errors with ERR_FS_* codes and info.code containing POSIX code.
 */
interface SystemErrorInfo {
  readonly code?: string;
}

/**
 * Extract the POSIX error code from a Node.js error.
 * Handles both ErrnoException (regular fs errors) and SystemError (rm errors).
 */
function extractErrorCode(error: Error): string | undefined {
  const nodeError = error as NodeJS.ErrnoException & { info?: SystemErrorInfo };

  // ERR_FS_* errors from fs.rm() carry the POSIX code in info.code
  if (nodeError.info?.code) {
    return nodeError.info.code;
  }

  return nodeError.code;
}

/**
 * Map a Node.js filesystem error to a FileSystemError.
 */
function mapError(error: unknown, path: string): FileSystemError {
  if (error instanceof FileSystemError) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new FileSystemError("UNKNOWN", path, String(error));
  }

  const code = extractErrorCode(error);

  if (code && isKnownErrorCode(code)) {
    return new FileSystemError(code, path, error.message, error);
  }

  // Unknown error code - preserve original code
  return new FileSystemError("UNKNOWN", path, error.message, error, code);
}

// ============================================================================
// DefaultFileSystemLayer Implementation
// ============================================================================

/**
 * Default implementation of FileSystemLayer using node:fs/promises.
 * Maps Node.js errors to FileSystemError for consistent error handling.
 */
export class DefaultFileSystemLayer implements FileSystemLayer {
  constructor(private readonly logger: Logger) {}

  async readFile(filePath: string): Promise<string> {
    this.logger.debug("Read", { path: filePath });
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw this.failed("Read", filePath, error);
    }
  }

  async readFileHead(filePath: string, length: number): Promise<Buffer> {
    this.logger.debug("ReadHead", { path: filePath, length });
    try {
      const handle = await fs.open(filePath, "r");
      try {
        const buffer = Buffer.alloc(length);
        const { bytesRead } = await handle.read(buffer, 0, length, 0);
        return buffer.subarray(0, bytesRead);
      } finally {
        await handle.close();
      }
    } catch (error) {
      throw this.failed("ReadHead", filePath, error);
    }
  }

  async writeFile(filePath: string, content: string, options?: WriteOptions): Promise<void> {
    const mode = options?.mode ?? DEFAULT_FILE_MODE;
    this.logger.debug("Write", { path: filePath, mode: mode.toString(8) });
    try {
      await fs.writeFile(filePath, content, { encoding: "utf-8", mode });
    } catch (error) {
      throw this.failed("Write", filePath, error);
    }
  }

  async appendFile(filePath: string, content: string, options?: WriteOptions): Promise<void> {
    const mode = options?.mode ?? DEFAULT_FILE_MODE;
    this.logger.debug("Append", { path: filePath });
    try {
      await fs.appendFile(filePath, content, { encoding: "utf-8", mode });
    } catch (error) {
      throw this.failed("Append", filePath, error);
    }
  }

  async writeStream(filePath: string, source: ReadableStream<Uint8Array>): Promise<number> {
    this.logger.debug("WriteStream", { path: filePath });
    const sink = createWriteStream(filePath, { mode: DEFAULT_FILE_MODE });
    try {
      await pipeline(Readable.fromWeb(source), sink);
    } catch (error) {
      throw this.failed("WriteStream", filePath, error);
    }
    this.logger.debug("WriteStream complete", { path: filePath, bytes: sink.bytesWritten });
    return sink.bytesWritten;
  }

  async mkdir(dirPath: string): Promise<void> {
    this.logger.debug("Mkdir", { path: dirPath });
    try {
      await fs.mkdir(dirPath, { recursive: true });
    } catch (error) {
      throw this.failed("Mkdir", dirPath, error);
    }
  }

  async readdir(dirPath: string): Promise<readonly DirEntry[]> {
    try {
      const entries = await fs.readdir(dirPath, { withFileTypes: true });
      const result = entries.map((entry) => ({
        name: entry.name,
        isDirectory: entry.isDirectory(),
      }));
      this.logger.debug("Readdir", { path: dirPath, count: result.length });
      return result;
    } catch (error) {
      throw this.failed("Readdir", dirPath, error);
    }
  }

  async rm(targetPath: string, options?: RmOptions): Promise<void> {
    const force = options?.force ?? false;
    this.logger.debug("Rm", { path: targetPath });
    try {
      await fs.rm(targetPath, { force });
    } catch (error) {
      throw this.failed("Rm", targetPath, error);
    }
  }

  async rename(oldPath: string, newPath: string): Promise<void> {
    this.logger.debug("Rename", { oldPath, newPath });
    try {
      await fs.rename(oldPath, newPath);
    } catch (error) {
      throw this.failed("Rename", oldPath, error);
    }
  }

  async chmod(targetPath: string, mode: number, options?: ChmodOptions): Promise<void> {
    const recursive = options?.recursive ?? false;
    this.logger.debug("Chmod", { path: targetPath, mode: mode.toString(8), recursive });
    try {
      await fs.chmod(targetPath, mode);
      if (recursive) {
        await this.chmodChildren(targetPath, mode);
      }
    } catch (error) {
      throw this.failed("Chmod", targetPath, error);
    }
  }

  private async chmodChildren(dirPath: string, mode: number): Promise<void> {
    const stat = await fs.lstat(dirPath);
    if (!stat.isDirectory()) {
      return;
    }
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isSymbolicLink()) {
        continue;
      }
      const childPath = nodePath.join(dirPath, entry.name);
      await fs.chmod(childPath, mode);
      if (entry.isDirectory()) {
        await this.chmodChildren(childPath, mode);
      }
    }
  }

  private failed(operation: string, path: string, error: unknown): FileSystemError {
    const fsError = mapError(error, path);
    const context = { path, code: fsError.fsCode, error: fsError.message };
    // ENOENT is an expected outcome for polled paths
    if (fsError.fsCode === "ENOENT") {
      this.logger.debug(`${operation} failed`, context);
    } else {
      this.logger.warn(`${operation} failed`, context);
    }
    return fsError;
  }
}
