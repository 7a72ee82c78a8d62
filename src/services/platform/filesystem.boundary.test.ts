// @vitest-environment node
/**
 * Boundary tests for DefaultFileSystemLayer.
 * Tests filesystem operations against real filesystem with temp directories.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import {
  mkdir as nodeMkdir,
  readFile as nodeReadFile,
  stat,
  writeFile as nodeWriteFile,
} from "node:fs/promises";
import { DefaultFileSystemLayer } from "./filesystem.js";
import { FileSystemError } from "../errors.js";
import { createTempDir } from "../test-utils.js";
import { createMockLogger, createSilentLogger } from "../logging/logging.test-utils.js";

const isWindows = process.platform === "win32";

async function modeOf(path: string): Promise<number> {
  return (await stat(path)).mode & 0o777;
}

async function catchError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("Expected promise to reject");
}

describe("DefaultFileSystemLayer", () => {
  let fs: DefaultFileSystemLayer;
  let tempDir: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    fs = new DefaultFileSystemLayer(createSilentLogger());
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  describe("readFile", () => {
    it("reads UTF-8 content", async () => {
      const filePath = join(tempDir.path, "unicode.txt");
      await nodeWriteFile(filePath, "Hello 世界", "utf-8");

      expect(await fs.readFile(filePath)).toBe("Hello 世界");
    });

    it("throws ENOENT for non-existent file", async () => {
      const filePath = join(tempDir.path, "non-existent.txt");

      const error = await catchError(fs.readFile(filePath));

      expect(error).toBeInstanceOf(FileSystemError);
      expect(error).toMatchObject({ fsCode: "ENOENT", path: filePath });
    });

    it("throws EISDIR when reading a directory", async () => {
      const error = await catchError(fs.readFile(tempDir.path));

      expect(error).toMatchObject({ fsCode: "EISDIR" });
    });

    it("logs a missing file at debug level only", async () => {
      const logger = createMockLogger();
      const layer = new DefaultFileSystemLayer(logger);
      const filePath = join(tempDir.path, "token.json");

      await catchError(layer.readFile(filePath));

      expect(logger.warn).not.toHaveBeenCalled();
      expect(logger.debug).toHaveBeenCalledWith("Read failed", {
        path: filePath,
        code: "ENOENT",
        error: expect.stringContaining("ENOENT"),
      });
    });

    it("logs other failures as warnings", async () => {
      const logger = createMockLogger();
      const layer = new DefaultFileSystemLayer(logger);

      await catchError(layer.readFile(tempDir.path));

      expect(logger.warn).toHaveBeenCalledWith("Read failed", {
        path: tempDir.path,
        code: "EISDIR",
        error: expect.stringContaining("EISDIR"),
      });
    });
  });

  describe("readFileHead", () => {
    it("returns the leading bytes", async () => {
      const filePath = join(tempDir.path, "data.bin");
      await nodeWriteFile(filePath, Buffer.from([0x1f, 0x8b, 0x08, 0x00, 0x01]));

      const head = await fs.readFileHead(filePath, 2);

      expect([...head]).toEqual([0x1f, 0x8b]);
    });

    it("returns fewer bytes for a short file", async () => {
      const filePath = join(tempDir.path, "short.bin");
      await nodeWriteFile(filePath, Buffer.from([0x50]));

      const head = await fs.readFileHead(filePath, 4);

      expect([...head]).toEqual([0x50]);
    });

    it("throws ENOENT for non-existent file", async () => {
      const error = await catchError(fs.readFileHead(join(tempDir.path, "missing"), 4));

      expect(error).toMatchObject({ fsCode: "ENOENT" });
    });
  });

  describe("writeFile", () => {
    it("writes and overwrites content", async () => {
      const filePath = join(tempDir.path, "test.txt");

      await fs.writeFile(filePath, "first");
      await fs.writeFile(filePath, "second");

      expect(await nodeReadFile(filePath, "utf-8")).toBe("second");
    });

    it.skipIf(isWindows)("creates new files with the requested mode", async () => {
      const filePath = join(tempDir.path, "secret.txt");

      await fs.writeFile(filePath, "test-secret", { mode: 0o600 });

      expect(await modeOf(filePath)).toBe(0o600);
    });

    it("throws ENOENT when parent directory does not exist", async () => {
      const filePath = join(tempDir.path, "missing", "file.txt");

      const error = await catchError(fs.writeFile(filePath, "content"));

      expect(error).toMatchObject({ fsCode: "ENOENT" });
    });
  });

  describe("appendFile", () => {
    it("creates the file and appends to it", async () => {
      const filePath = join(tempDir.path, "env");

      await fs.appendFile(filePath, "A=1\n");
      await fs.appendFile(filePath, "B=2\n");

      expect(await nodeReadFile(filePath, "utf-8")).toBe("A=1\nB=2\n");
    });

    it.skipIf(isWindows)("uses the requested mode for a new file", async () => {
      const filePath = join(tempDir.path, "env");

      await fs.appendFile(filePath, "A=1\n", { mode: 0o600 });

      expect(await modeOf(filePath)).toBe(0o600);
    });
  });

  describe("writeStream", () => {
    it("writes every chunk and reports the byte count", async () => {
      const filePath = join(tempDir.path, "archive.bin");
      const body = new Response(Buffer.from("streamed content")).body;
      if (!body) throw new Error("Response has no body");

      const bytes = await fs.writeStream(filePath, body);

      expect(bytes).toBe(16);
      expect(await nodeReadFile(filePath, "utf-8")).toBe("streamed content");
    });

    it("throws ENOENT when parent directory does not exist", async () => {
      const body = new Response("content").body;
      if (!body) throw new Error("Response has no body");

      const error = await catchError(fs.writeStream(join(tempDir.path, "missing", "a"), body));

      expect(error).toMatchObject({ fsCode: "ENOENT" });
    });
  });

  describe("mkdir", () => {
    it("creates nested directories by default", async () => {
      const dirPath = join(tempDir.path, "a", "b", "c");

      await fs.mkdir(dirPath);

      expect((await stat(dirPath)).isDirectory()).toBe(true);
    });

    it("is no-op when directory already exists", async () => {
      await expect(fs.mkdir(tempDir.path)).resolves.toBeUndefined();
    });

    it("throws EEXIST when file exists at path", async () => {
      const filePath = join(tempDir.path, "file.txt");
      await nodeWriteFile(filePath, "content");

      const error = await catchError(fs.mkdir(filePath));

      expect(error).toMatchObject({ fsCode: "EEXIST" });
    });
  });

  describe("readdir", () => {
    it("lists entries with type information", async () => {
      await nodeWriteFile(join(tempDir.path, "file.txt"), "content");
      await nodeMkdir(join(tempDir.path, "subdir"));

      const entries = await fs.readdir(tempDir.path);
      const sorted = [...entries].sort((a, b) => a.name.localeCompare(b.name));

      expect(sorted).toEqual([
        { name: "file.txt", isDirectory: false },
        { name: "subdir", isDirectory: true },
      ]);
    });

    it("throws ENOENT for non-existent directory", async () => {
      const error = await catchError(fs.readdir(join(tempDir.path, "missing")));

      expect(error).toMatchObject({ fsCode: "ENOENT" });
    });

    it("throws ENOTDIR when path is a file", async () => {
      const filePath = join(tempDir.path, "file.txt");
      await nodeWriteFile(filePath, "content");

      const error = await catchError(fs.readdir(filePath));

      expect(error).toMatchObject({ fsCode: "ENOTDIR" });
    });
  });

  describe("rm", () => {
    it("deletes a file", async () => {
      const filePath = join(tempDir.path, "file.txt");
      await nodeWriteFile(filePath, "content");

      await fs.rm(filePath);

      await expect(stat(filePath)).rejects.toThrow();
    });

    it("refuses to delete a directory", async () => {
      const dirPath = join(tempDir.path, "dir");
      await nodeMkdir(dirPath);

      const error = await catchError(fs.rm(dirPath));

      expect(error).toMatchObject({ fsCode: "EISDIR" });
      expect((await stat(dirPath)).isDirectory()).toBe(true);
    });

    it("throws ENOENT for a missing path", async () => {
      const error = await catchError(fs.rm(join(tempDir.path, "missing")));

      expect(error).toMatchObject({ fsCode: "ENOENT" });
    });

    it("ignores a missing path with force", async () => {
      await expect(
        fs.rm(join(tempDir.path, "missing"), { force: true })
      ).resolves.toBeUndefined();
    });
  });

  describe("rename", () => {
    it("moves a directory with its contents", async () => {
      const source = join(tempDir.path, "artifactory-pro-7.55.10");
      await nodeMkdir(join(source, "app"), { recursive: true });
      await nodeWriteFile(join(source, "app", "file.txt"), "content");
      const target = join(tempDir.path, "artifactory");

      await fs.rename(source, target);

      expect(await nodeReadFile(join(target, "app", "file.txt"), "utf-8")).toBe("content");
      await expect(stat(source)).rejects.toThrow();
    });

    it("throws ENOENT when the source does not exist", async () => {
      const error = await catchError(
        fs.rename(join(tempDir.path, "missing"), join(tempDir.path, "target"))
      );

      expect(error).toMatchObject({ fsCode: "ENOENT" });
    });
  });

  describe.skipIf(isWindows)("chmod", () => {
    it("changes a single file", async () => {
      const filePath = join(tempDir.path, "script.sh");
      await nodeWriteFile(filePath, "#!/bin/sh\n", { mode: 0o644 });

      await fs.chmod(filePath, 0o755);

      expect(await modeOf(filePath)).toBe(0o755);
    });

    it("changes a whole tree with recursive", async () => {
      const root = join(tempDir.path, "var");
      await nodeMkdir(join(root, "etc", "access"), { recursive: true });
      await nodeWriteFile(join(root, "etc", "system.yaml"), "x", { mode: 0o644 });

      await fs.chmod(root, 0o777, { recursive: true });

      expect(await modeOf(root)).toBe(0o777);
      expect(await modeOf(join(root, "etc"))).toBe(0o777);
      expect(await modeOf(join(root, "etc", "access"))).toBe(0o777);
      expect(await modeOf(join(root, "etc", "system.yaml"))).toBe(0o777);
    });

    it("throws ENOENT for a missing path", async () => {
      const error = await catchError(fs.chmod(join(tempDir.path, "missing"), 0o777));

      expect(error).toMatchObject({ fsCode: "ENOENT" });
    });
  });
});
