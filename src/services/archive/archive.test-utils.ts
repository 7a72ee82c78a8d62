/**
 * Test utilities for building real archives on disk.
 */

import * as tar from "tar";
import archiver from "archiver";
import * as fs from "node:fs/promises";
import { createWriteStream } from "node:fs";
import * as path from "node:path";
import type { ArchiveExtractor } from "./archive-extractor.js";

/**
 * File content, optionally with a Unix mode.
 */
export type TestArchiveEntry = string | { readonly content: string; readonly mode: number };

function contentOf(entry: TestArchiveEntry): string {
  return typeof entry === "string" ? entry : entry.content;
}

function modeOf(entry: TestArchiveEntry): number | undefined {
  return typeof entry === "string" ? undefined : entry.mode;
}

/**
 * Create a zip archive from file contents.
 *
 * @param archivePath - Where to write the archive (parent must exist)
 * @param files - Map of relative file paths to their contents
 *
 * @example
 * await createTestZip(join(dir, "rt.zip"), {
 *   "artifactory-pro-6.23.1/bin/artifactoryctl": "#!/bin/sh",
 * });
 */
export function createTestZip(
  archivePath: string,
  files: Record<string, TestArchiveEntry>
): Promise<void> {
  return new Promise((resolve, reject) => {
    const output = createWriteStream(archivePath);
    const archive = archiver("zip", { zlib: { level: 9 } });

    output.on("close", () => resolve());
    output.on("error", reject);
    archive.on("error", reject);

    archive.pipe(output);

    for (const [relativePath, entry] of Object.entries(files)) {
      const mode = modeOf(entry);
      archive.append(contentOf(entry), {
        name: relativePath,
        ...(mode !== undefined && { mode }),
      });
    }

    archive.finalize().catch(reject);
  });
}

/**
 * Create a gzip-compressed tar archive from file contents.
 * Files are staged in a sibling directory that is removed afterwards.
 *
 * @param archivePath - Where to write the archive (parent must exist)
 * @param files - Map of relative file paths to their contents
 */
export async function createTestTarGz(
  archivePath: string,
  files: Record<string, TestArchiveEntry>
): Promise<void> {
  const sourceDir = `${archivePath}.source`;

  try {
    for (const [relativePath, entry] of Object.entries(files)) {
      const fullPath = path.join(sourceDir, relativePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, contentOf(entry));
      const mode = modeOf(entry);
      if (mode !== undefined) {
        await fs.chmod(fullPath, mode);
      }
    }

    await tar.create({ gzip: true, file: archivePath, cwd: sourceDir }, ["."]);
  } finally {
    await fs.rm(sourceDir, { recursive: true, force: true });
  }
}

/**
 * Extractor spy that records calls and optionally fails.
 */
export interface MockArchiveExtractor extends ArchiveExtractor {
  readonly calls: ReadonlyArray<{ archivePath: string; destDir: string }>;
}

/**
 * Create a mock ArchiveExtractor.
 *
 * @param onExtract - Runs for every call; a rejection becomes the extraction failure
 */
export function createMockArchiveExtractor(
  onExtract?: (archivePath: string, destDir: string) => Promise<void>
): MockArchiveExtractor {
  const calls: Array<{ archivePath: string; destDir: string }> = [];
  return {
    calls,
    async extract(archivePath: string, destDir: string): Promise<void> {
      calls.push({ archivePath, destDir });
      await onExtract?.(archivePath, destDir);
    },
  };
}
