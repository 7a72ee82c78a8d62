/**
 * Behavioral mock for FileSystemLayer with in-memory state.
 *
 * Provides a stateful mock that simulates real filesystem behavior:
 * - In-memory file/directory storage with permission bits
 * - Proper error handling (ENOENT, EISDIR, ENOTDIR, ...)
 * - Custom matchers for behavioral assertions
 *
 * @example
 * const mock = createFileSystemMock({
 *   entries: {
 *     "/home/ci/jfrog_home": directory(),
 *     "/home/ci/jfrog_home/notes.txt": file("hello"),
 *   },
 * });
 *
 * await mock.writeFile("/home/ci/jfrog_home/data.txt", "{}", { mode: 0o600 });
 * expect(mock).toHaveFile("/home/ci/jfrog_home/data.txt", "{}");
 * expect(mock).toHaveMode("/home/ci/jfrog_home/data.txt", 0o600);
 */

import { posix } from "node:path";
import { Readable } from "node:stream";
import { expect } from "vitest";
import {
  DEFAULT_FILE_MODE,
  type DirEntry,
  type FileSystemErrorCode,
  type FileSystemLayer,
} from "./filesystem.js";
import { FileSystemError } from "../errors.js";
import type {
  MockState,
  MockWithState,
  Snapshot,
  MatcherImplementationsFor,
  MatcherResult,
} from "../../test/state-mock.js";

// =============================================================================
// Entry Types
// =============================================================================

/**
 * File entry in the mock filesystem.
 */
export interface FileEntry {
  readonly type: "file";
  readonly content: string | Buffer;
  readonly mode: number;
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

/**
 * Directory entry in the mock filesystem.
 */
export interface DirectoryEntry {
  readonly type: "directory";
  readonly mode: number;
  /** If set, accessing this entry throws an error with this code */
  readonly error?: FileSystemErrorCode;
}

/**
 * Any entry type in the mock filesystem.
 */
export type Entry = FileEntry | DirectoryEntry;

const DEFAULT_DIRECTORY_MODE = 0o755;

/**
 * Create a file entry.
 *
 * @example
 * file("hello world")
 * file(Buffer.from([0x1f, 0x8b]))  // Binary
 * file("#!/bin/sh", { mode: 0o755 })
 * file("secret", { error: "EACCES" })
 */
export function file(
  content: string | Buffer,
  options?: { mode?: number; error?: FileSystemErrorCode }
): FileEntry {
  return {
    type: "file" as const,
    content,
    mode: options?.mode ?? DEFAULT_FILE_MODE,
    ...(options?.error !== undefined && { error: options.error }),
  };
}

/**
 * Create a directory entry.
 *
 * @example
 * directory()
 * directory({ error: "EACCES" })
 */
export function directory(options?: {
  mode?: number;
  error?: FileSystemErrorCode;
}): DirectoryEntry {
  return {
    type: "directory" as const,
    mode: options?.mode ?? DEFAULT_DIRECTORY_MODE,
    ...(options?.error !== undefined && { error: options.error }),
  };
}

// =============================================================================
// State
// =============================================================================

/**
 * State interface for the filesystem mock.
 */
export interface FileSystemMockState extends MockState {
  /** Read-only access to all entries, keyed by normalized absolute path. */
  readonly entries: ReadonlyMap<string, Entry>;

  /**
   * Set an entry, auto-creating parent directories.
   * This is a test helper - it does NOT follow real filesystem semantics.
   */
  setEntry(path: string, entry: Entry): void;

  /** Remove an entry and everything below it. */
  deleteEntry(path: string): void;
}

/**
 * FileSystemLayer with behavioral mock state access via `$` property.
 */
export type MockFileSystemLayer = FileSystemLayer & MockWithState<FileSystemMockState>;

/**
 * Normalize a path for use as a map key.
 */
function normalizePath(path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, "/"));
  return normalized.length > 1 && normalized.endsWith("/") ? normalized.slice(0, -1) : normalized;
}

function getParentPath(normalizedPath: string): string | null {
  if (normalizedPath === "/") {
    return null;
  }
  return posix.dirname(normalizedPath);
}

function childPrefix(path: string): string {
  return path === "/" ? "/" : path + "/";
}

class FileSystemMockStateImpl implements FileSystemMockState {
  private readonly _entries: Map<string, Entry>;

  constructor(initialEntries: Map<string, Entry>) {
    this._entries = new Map();
    for (const [path, entry] of initialEntries) {
      this.setEntry(path, entry);
    }
  }

  get entries(): ReadonlyMap<string, Entry> {
    return this._entries;
  }

  setEntry(path: string, entry: Entry): void {
    const normalizedPath = normalizePath(path);

    let parent = getParentPath(normalizedPath);
    while (parent !== null) {
      if (!this._entries.has(parent)) {
        this._entries.set(parent, directory());
      }
      parent = getParentPath(parent);
    }

    this._entries.set(normalizedPath, entry);
  }

  deleteEntry(path: string): void {
    const normalizedPath = normalizePath(path);
    const prefix = childPrefix(normalizedPath);
    for (const key of [...this._entries.keys()]) {
      if (key === normalizedPath || key.startsWith(prefix)) {
        this._entries.delete(key);
      }
    }
  }

  snapshot(): Snapshot {
    return { __brand: "Snapshot", value: this.toString() };
  }

  toString(): string {
    const sorted = [...this._entries.entries()].sort(([a], [b]) => a.localeCompare(b));
    const lines = sorted.map(([path, entry]) => {
      const mode = entry.mode.toString(8);
      const flags = entry.error ? ` [error:${entry.error}]` : "";
      if (entry.type === "directory") {
        return `${path}: directory(${mode})${flags}`;
      }
      const rawContent: string | Buffer = entry.content;
      const content =
        typeof rawContent === "string"
          ? JSON.stringify(rawContent.length > 50 ? rawContent.substring(0, 50) + "..." : rawContent)
          : `<Buffer ${rawContent.length} bytes>`;
      return `${path}: file(${content}, ${mode})${flags}`;
    });
    return lines.join("\n");
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Options for creating a mock filesystem.
 */
export interface MockFileSystemOptions {
  /** Initial entries. Parent directories are created automatically. */
  entries?: Record<string, Entry>;
}

/**
 * Create a behavioral mock for FileSystemLayer.
 *
 * @example Error simulation
 * const mock = createFileSystemMock({
 *   entries: {
 *     "/protected": directory({ error: "EACCES" }),
 *   },
 * });
 */
export function createFileSystemMock(options?: MockFileSystemOptions): MockFileSystemLayer {
  const state = new FileSystemMockStateImpl(new Map(Object.entries(options?.entries ?? {})));

  const throwIfError = (entry: Entry, path: string): void => {
    if (entry.error) {
      throw new FileSystemError(entry.error, path, `Mock error: ${entry.error}`);
    }
  };

  const requireFile = (path: string): FileEntry => {
    const entry = state.entries.get(path);
    if (!entry) {
      throw new FileSystemError("ENOENT", path, `File not found: ${path}`);
    }
    throwIfError(entry, path);
    if (entry.type === "directory") {
      throw new FileSystemError("EISDIR", path, `Is a directory: ${path}`);
    }
    return entry;
  };

  const requireWritable = (path: string): FileEntry | undefined => {
    const existing = state.entries.get(path);
    if (existing) {
      throwIfError(existing, path);
      if (existing.type === "directory") {
        throw new FileSystemError("EISDIR", path, `Is a directory: ${path}`);
      }
    }
    const parent = getParentPath(path);
    if (parent !== null) {
      const parentEntry = state.entries.get(parent);
      if (!parentEntry) {
        throw new FileSystemError("ENOENT", path, `Parent directory not found: ${parent}`);
      }
      throwIfError(parentEntry, parent);
      if (parentEntry.type !== "directory") {
        throw new FileSystemError("ENOTDIR", path, `Parent is not a directory: ${parent}`);
      }
    }
    return existing;
  };

  const toText = (content: string | Buffer): string =>
    typeof content === "string" ? content : content.toString("utf-8");

  const layer: FileSystemLayer = {
    async readFile(pathLike: string): Promise<string> {
      const path = normalizePath(pathLike);
      return toText(requireFile(path).content);
    },

    async readFileHead(pathLike: string, length: number): Promise<Buffer> {
      const path = normalizePath(pathLike);
      const content = requireFile(path).content;
      const bytes = typeof content === "string" ? Buffer.from(content, "utf-8") : content;
      return bytes.subarray(0, length);
    },

    async writeFile(pathLike: string, content: string, writeOptions?): Promise<void> {
      const path = normalizePath(pathLike);
      const existing = requireWritable(path);
      // An existing file keeps its permission bits, like fs.writeFile
      const mode = existing?.mode ?? writeOptions?.mode ?? DEFAULT_FILE_MODE;
      state.setEntry(path, file(content, { mode }));
    },

    async appendFile(pathLike: string, content: string, writeOptions?): Promise<void> {
      const path = normalizePath(pathLike);
      const existing = requireWritable(path);
      const previous = existing ? toText(existing.content) : "";
      const mode = existing?.mode ?? writeOptions?.mode ?? DEFAULT_FILE_MODE;
      state.setEntry(path, file(previous + content, { mode }));
    },

    async writeStream(pathLike: string, source: ReadableStream<Uint8Array>): Promise<number> {
      const path = normalizePath(pathLike);
      requireWritable(path);
      const chunks: Buffer[] = [];
      for await (const chunk of Readable.fromWeb(source)) {
        if (chunk instanceof Uint8Array) {
          chunks.push(Buffer.from(chunk));
        }
      }
      const content = Buffer.concat(chunks);
      state.setEntry(path, file(content));
      return content.length;
    },

    async mkdir(pathLike: string): Promise<void> {
      const path = normalizePath(pathLike);
      const existing = state.entries.get(path);

      if (existing) {
        throwIfError(existing, path);
        if (existing.type === "directory") {
          return;
        }
        throw new FileSystemError("EEXIST", path, `File exists at path: ${path}`);
      }

      const parent = getParentPath(path);
      if (parent !== null) {
        const parentEntry = state.entries.get(parent);
        if (parentEntry) {
          throwIfError(parentEntry, parent);
          if (parentEntry.type !== "directory") {
            throw new FileSystemError("ENOTDIR", path, `Not a directory: ${parent}`);
          }
        } else {
          await layer.mkdir(parent);
        }
      }
      state.setEntry(path, directory());
    },

    async readdir(pathLike: string): Promise<readonly DirEntry[]> {
      const path = normalizePath(pathLike);
      const entry = state.entries.get(path);

      if (!entry) {
        throw new FileSystemError("ENOENT", path, `Directory not found: ${path}`);
      }
      throwIfError(entry, path);
      if (entry.type !== "directory") {
        throw new FileSystemError("ENOTDIR", path, `Not a directory: ${path}`);
      }

      const prefix = childPrefix(path);
      const children: DirEntry[] = [];
      for (const [entryPath, e] of state.entries) {
        if (!entryPath.startsWith(prefix)) continue;
        const relativePath = entryPath.substring(prefix.length);
        if (relativePath.includes("/")) continue;
        children.push({
          name: relativePath,
          isDirectory: e.type === "directory",
        });
      }
      return children;
    },

    async rm(pathLike: string, rmOptions?): Promise<void> {
      const path = normalizePath(pathLike);
      const force = rmOptions?.force ?? false;
      const entry = state.entries.get(path);

      if (!entry) {
        if (force) return;
        throw new FileSystemError("ENOENT", path, `Path not found: ${path}`);
      }
      throwIfError(entry, path);

      if (entry.type === "directory") {
        throw new FileSystemError("EISDIR", path, `Is a directory: ${path}`);
      }
      state.deleteEntry(path);
    },

    async rename(oldPathLike: string, newPathLike: string): Promise<void> {
      const srcPath = normalizePath(oldPathLike);
      const destPath = normalizePath(newPathLike);
      const entry = state.entries.get(srcPath);

      if (!entry) {
        throw new FileSystemError("ENOENT", srcPath, `Source not found: ${srcPath}`);
      }
      throwIfError(entry, srcPath);

      const prefix = childPrefix(srcPath);
      const toMove: [string, Entry][] = [[destPath, entry]];
      for (const [entryPath, e] of state.entries) {
        if (entryPath.startsWith(prefix)) {
          toMove.push([childPrefix(destPath) + entryPath.substring(prefix.length), e]);
        }
      }
      state.deleteEntry(srcPath);
      for (const [newPath, e] of toMove) {
        state.setEntry(newPath, e);
      }
    },

    async chmod(pathLike: string, mode: number, chmodOptions?): Promise<void> {
      const path = normalizePath(pathLike);
      const entry = state.entries.get(path);

      if (!entry) {
        throw new FileSystemError("ENOENT", path, `Path not found: ${path}`);
      }
      throwIfError(entry, path);

      const targets: [string, Entry][] = [[path, entry]];
      if (chmodOptions?.recursive) {
        const prefix = childPrefix(path);
        for (const [entryPath, e] of state.entries) {
          if (entryPath.startsWith(prefix)) {
            targets.push([entryPath, e]);
          }
        }
      }
      for (const [targetPath, target] of targets) {
        state.setEntry(targetPath, { ...target, mode });
      }
    },
  };

  return Object.assign(layer, { $: state });
}

// =============================================================================
// Custom Matchers
// =============================================================================

/**
 * Custom matchers for filesystem mock assertions.
 */
interface FileSystemMatchers {
  /** Assert that a file exists, optionally with exact content. */
  toHaveFile(path: string, content?: string | Buffer): void;

  /** Assert that a directory exists. */
  toHaveDirectory(path: string): void;

  /** Assert that a file exists and contains a pattern. */
  toHaveFileContaining(path: string, pattern: string | RegExp): void;

  /** Assert the permission bits of a file or directory. */
  toHaveMode(path: string, mode: number): void;
}

declare module "vitest" {
  interface Assertion<T> extends FileSystemMatchers {}
}

function lookupFile(
  received: MockFileSystemLayer,
  path: string
): { entry: FileEntry; normalizedPath: string } | MatcherResult {
  const normalizedPath = normalizePath(path);
  const entry = received.$.entries.get(normalizedPath);

  if (!entry) {
    return {
      pass: false,
      message: () => `Expected file at ${normalizedPath} but it does not exist`,
    };
  }
  if (entry.type !== "file") {
    return {
      pass: false,
      message: () => `Expected file at ${normalizedPath} but found ${entry.type}`,
    };
  }
  return { entry, normalizedPath };
}

export const fileSystemMatchers: MatcherImplementationsFor<
  MockFileSystemLayer,
  FileSystemMatchers
> = {
  toHaveFile(received, path, content?) {
    const found = lookupFile(received, path);
    if (!("entry" in found)) {
      return found;
    }
    const { entry, normalizedPath } = found;

    if (content !== undefined) {
      const actualBytes =
        typeof entry.content === "string" ? Buffer.from(entry.content, "utf-8") : entry.content;
      const expectedBytes = typeof content === "string" ? Buffer.from(content, "utf-8") : content;

      if (!actualBytes.equals(expectedBytes)) {
        const describe = (value: string | Buffer): string =>
          typeof value === "string" ? JSON.stringify(value) : `<Buffer ${value.length} bytes>`;
        return {
          pass: false,
          message: () =>
            `Expected file ${normalizedPath} to have content ${describe(content)} but got ${describe(entry.content)}`,
        };
      }
    }

    return {
      pass: true,
      message: () => `Expected ${normalizedPath} not to be a file`,
    };
  },

  toHaveDirectory(received, path) {
    const normalizedPath = normalizePath(path);
    const entry = received.$.entries.get(normalizedPath);

    if (!entry) {
      return {
        pass: false,
        message: () => `Expected directory at ${normalizedPath} but it does not exist`,
      };
    }

    if (entry.type !== "directory") {
      return {
        pass: false,
        message: () => `Expected directory at ${normalizedPath} but found ${entry.type}`,
      };
    }

    return {
      pass: true,
      message: () => `Expected ${normalizedPath} not to be a directory`,
    };
  },

  toHaveFileContaining(received, path, pattern) {
    const found = lookupFile(received, path);
    if (!("entry" in found)) {
      return found;
    }
    const { entry, normalizedPath } = found;

    const rawContent: string | Buffer = entry.content;
    const contentStr = typeof rawContent === "string" ? rawContent : rawContent.toString("utf-8");
    const matches =
      pattern instanceof RegExp ? pattern.test(contentStr) : contentStr.includes(pattern);
    const patternStr = pattern instanceof RegExp ? pattern.toString() : JSON.stringify(pattern);

    return {
      pass: matches,
      message: () =>
        matches
          ? `Expected file ${normalizedPath} not to contain ${patternStr}`
          : `Expected file ${normalizedPath} to contain ${patternStr} but content was ${JSON.stringify(contentStr)}`,
    };
  },

  toHaveMode(received, path, mode) {
    const normalizedPath = normalizePath(path);
    const entry = received.$.entries.get(normalizedPath);

    if (!entry) {
      return {
        pass: false,
        message: () => `Expected ${normalizedPath} to exist but it does not`,
      };
    }

    const pass = entry.mode === mode;
    return {
      pass,
      message: () =>
        pass
          ? `Expected ${normalizedPath} not to have mode ${mode.toString(8)}`
          : `Expected ${normalizedPath} to have mode ${mode.toString(8)} but has ${entry.mode.toString(8)}`,
    };
  },
};

// Register matchers with expect
expect.extend(fileSystemMatchers);
