/**
 * Archive extraction interface and implementations.
 */

import * as tar from "tar";
import yauzl from "yauzl";
import * as fs from "node:fs";
import * as path from "node:path";
import { pipeline } from "node:stream/promises";
import { ArchiveError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";

/**
 * Interface for extracting archives.
 */
export interface ArchiveExtractor {
  /**
   * Extract an archive to a destination directory.
   *
   * @param archivePath - Path to the archive file
   * @param destDir - Directory to extract to (will be created if it doesn't exist)
   * @throws ArchiveError on extraction failure
   */
  extract(archivePath: string, destDir: string): Promise<void>;
}

export type ArchiveFormat = "tar.gz" | "zip";

function classifyError(error: unknown, archivePath: string, destDir: string): ArchiveError {
  if (error instanceof ArchiveError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (message.includes("EACCES") || message.includes("EPERM")) {
    return new ArchiveError(
      `Permission denied extracting to ${destDir}: ${message}`,
      "PERMISSION_DENIED"
    );
  }
  if (message.includes("TAR") || message.includes("zlib") || message.includes("unexpected end")) {
    return new ArchiveError(
      `Invalid or corrupt archive at ${archivePath}: ${message}`,
      "INVALID_ARCHIVE"
    );
  }
  return new ArchiveError(`Failed to extract ${archivePath}: ${message}`, "EXTRACTION_FAILED");
}

/**
 * Extractor for .tar.gz archives using the `tar` package.
 */
export class TarExtractor implements ArchiveExtractor {
  async extract(archivePath: string, destDir: string): Promise<void> {
    try {
      await fs.promises.mkdir(destDir, { recursive: true });
      await tar.extract({
        file: archivePath,
        cwd: destDir,
        // Corrupt input must reject instead of being skipped with a warning
        strict: true,
      });
    } catch (error) {
      throw classifyError(error, archivePath, destDir);
    }
  }
}

/**
 * Extractor for .zip archives using the `yauzl` package.
 */
export class ZipExtractor implements ArchiveExtractor {
  async extract(archivePath: string, destDir: string): Promise<void> {
    try {
      await fs.promises.mkdir(destDir, { recursive: true });
      await this.extractZip(archivePath, path.resolve(destDir));
    } catch (error) {
      throw classifyError(error, archivePath, destDir);
    }
  }

  private extractZip(archivePath: string, destDir: string): Promise<void> {
    return new Promise((resolve, reject) => {
      yauzl.open(archivePath, { lazyEntries: true }, (err, zipfile) => {
        if (err) {
          const code = err.message.includes("end of central directory")
            ? "INVALID_ARCHIVE"
            : "EXTRACTION_FAILED";
          reject(
            new ArchiveError(`Failed to open zip archive at ${archivePath}: ${err.message}`, code)
          );
          return;
        }

        const fail = (error: unknown): void => {
          zipfile.close();
          reject(error);
        };

        zipfile.on("entry", (entry: yauzl.Entry) => {
          const entryPath = path.resolve(destDir, entry.fileName);
          const relative = path.relative(destDir, entryPath);

          if (relative.startsWith("..") || path.isAbsolute(relative)) {
            fail(
              new ArchiveError(
                `Path traversal detected in archive: ${entry.fileName}`,
                "INVALID_ARCHIVE"
              )
            );
            return;
          }

          if (entry.fileName.endsWith("/")) {
            fs.promises
              .mkdir(entryPath, { recursive: true })
              .then(() => zipfile.readEntry())
              .catch(fail);
            return;
          }

          fs.promises
            .mkdir(path.dirname(entryPath), { recursive: true })
            .then(() => {
              zipfile.openReadStream(entry, (streamErr, readStream) => {
                if (streamErr) {
                  fail(
                    new ArchiveError(
                      `Failed to read entry ${entry.fileName}: ${streamErr.message}`,
                      "EXTRACTION_FAILED"
                    )
                  );
                  return;
                }

                pipeline(readStream, fs.createWriteStream(entryPath))
                  .then(async () => {
                    // Unix mode lives in the upper 16 bits of the external attributes
                    const mode = (entry.externalFileAttributes >> 16) & 0o777;
                    if (mode !== 0) {
                      await fs.promises.chmod(entryPath, mode);
                    }
                  })
                  .then(() => zipfile.readEntry())
                  .catch(fail);
              });
            })
            .catch(fail);
        });

        zipfile.on("end", () => resolve());
        zipfile.on("error", (zipErr: Error) => {
          reject(
            new ArchiveError(`Error reading zip archive: ${zipErr.message}`, "EXTRACTION_FAILED")
          );
        });

        zipfile.readEntry();
      });
    });
  }
}

/**
 * Detect the archive format from the file name, falling back to the leading bytes.
 *
 * @returns null when neither the extension nor the magic bytes are recognised
 */
export function detectArchiveFormat(fileName: string, head: Uint8Array): ArchiveFormat | null {
  const lower = fileName.toLowerCase();
  if (lower.endsWith(".tar.gz") || lower.endsWith(".tgz")) {
    return "tar.gz";
  }
  if (lower.endsWith(".zip")) {
    return "zip";
  }
  // PK\x03\x04 (zip local file header), \x1f\x8b (gzip)
  if (head[0] === 0x50 && head[1] === 0x4b && head[2] === 0x03 && head[3] === 0x04) {
    return "zip";
  }
  if (head[0] === 0x1f && head[1] === 0x8b) {
    return "tar.gz";
  }
  return null;
}

/**
 * Archive extractor that selects the implementation by extension or magic bytes.
 */
export class DefaultArchiveExtractor implements ArchiveExtractor {
  private readonly extractors: Record<ArchiveFormat, ArchiveExtractor>;

  constructor(
    private readonly fileSystem: FileSystemLayer,
    private readonly logger: Logger,
    extractors?: Partial<Record<ArchiveFormat, ArchiveExtractor>>
  ) {
    this.extractors = {
      "tar.gz": extractors?.["tar.gz"] ?? new TarExtractor(),
      zip: extractors?.zip ?? new ZipExtractor(),
    };
  }

  async extract(archivePath: string, destDir: string): Promise<void> {
    const head = await this.fileSystem.readFileHead(archivePath, 4);
    const format = detectArchiveFormat(path.basename(archivePath), head);

    if (format === null) {
      throw new ArchiveError(
        `Unsupported archive format: ${archivePath}. Supported formats: .tar.gz, .tgz, .zip`,
        "INVALID_ARCHIVE"
      );
    }

    this.logger.info("Extracting", { archive: archivePath, format, destination: destDir });
    await this.extractors[format].extract(archivePath, destDir);
    this.logger.debug("Extracted", { archive: archivePath });
  }
}
