/**
 * Unpacks the release archive and normalises the installation directory.
 */

import { join } from "node:path";
import { InstallationError } from "../errors.js";
import type { ArchiveExtractor } from "../archive/index.js";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import {
  EXTRACTED_DIR_PREFIX,
  INSTALL_DIR_NAME,
  type ModernServerLayout,
  type ServerLayout,
} from "./server-layout.js";
import { stripBash4CaseConversion } from "./text-patches.js";
import type { DownloadedArchive, HostOs } from "./types.js";

export const RUNTIME_DATA_MODE = 0o777;
export const SCRIPT_MODE = 0o755;

export interface ArchiveInstaller {
  /**
   * Extract the archive into the home directory, rename the extracted
   * directory to its canonical name and apply the mac fixups.
   *
   * @throws ArchiveError when extraction fails
   * @throws InstallationError when the extracted directory cannot be identified
   * @throws FileSystemError when a fixup cannot be applied
   */
  install(
    archive: DownloadedArchive,
    homeDirectory: string,
    layout: ServerLayout,
    os: HostOs
  ): Promise<string>;
}

export class DefaultArchiveInstaller implements ArchiveInstaller {
  constructor(
    private readonly extractor: ArchiveExtractor,
    private readonly fileSystem: FileSystemLayer,
    private readonly logger: Logger
  ) {}

  async install(
    archive: DownloadedArchive,
    homeDirectory: string,
    layout: ServerLayout,
    os: HostOs
  ): Promise<string> {
    this.logger.info("Extracting archive", { path: archive.localPath });
    await this.extractor.extract(archive.localPath, homeDirectory);
    await this.fileSystem.rm(archive.localPath, { force: true });

    const installDir = await this.renameExtractedDir(homeDirectory);

    if (os === "mac" && layout.kind === "modern") {
      await this.applyMacFixups(homeDirectory, layout);
    }

    return installDir;
  }

  /**
   * Rename the single `artifactory-pro-*` directory to `artifactory`.
   */
  async renameExtractedDir(homeDirectory: string): Promise<string> {
    const entries = await this.fileSystem.readdir(homeDirectory);
    const candidates = entries.filter(
      (entry) => entry.isDirectory && entry.name.startsWith(EXTRACTED_DIR_PREFIX)
    );

    const [extracted, ...others] = candidates;
    if (extracted === undefined) {
      throw new InstallationError(
        `Artifactory dir was not found after extracting into ${homeDirectory}`,
        "EXTRACTED_DIR_NOT_FOUND"
      );
    }
    if (others.length > 0) {
      throw new InstallationError(
        `Found several Artifactory dirs after extracting: ${candidates.map((c) => c.name).join(", ")}`,
        "EXTRACTED_DIR_AMBIGUOUS"
      );
    }

    const installDir = join(homeDirectory, INSTALL_DIR_NAME);
    await this.fileSystem.rename(join(homeDirectory, extracted.name), installDir);
    this.logger.debug("Renamed extracted directory", { from: extracted.name, to: INSTALL_DIR_NAME });
    return installDir;
  }

  private async applyMacFixups(homeDirectory: string, layout: ModernServerLayout): Promise<void> {
    // Archive permissions are not preserved faithfully on mac
    await this.fileSystem.chmod(join(homeDirectory, layout.varDir), RUNTIME_DATA_MODE, {
      recursive: true,
    });

    const scriptPath = join(homeDirectory, layout.commonScript);
    const script = await this.fileSystem.readFile(scriptPath);
    await this.fileSystem.writeFile(scriptPath, stripBash4CaseConversion(script), {
      mode: SCRIPT_MODE,
    });
    await this.fileSystem.chmod(scriptPath, SCRIPT_MODE);
    this.logger.info("Applied mac compatibility fixes");
  }
}
