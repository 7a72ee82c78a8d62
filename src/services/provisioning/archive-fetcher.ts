/**
 * Downloads the release archive for a version and host OS.
 */

import { basename, join } from "node:path";
import contentDisposition from "content-disposition";
import { DownloadError, ProtocolError, getErrorMessage } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import { discardBody, type HttpClient } from "../platform/network.js";
import type { DownloadedArchive, HostOs, InstallTarget } from "./types.js";

export const RELEASES_URL =
  "https://releases.jfrog.io/artifactory/artifactory-pro/org/artifactory/pro/jfrog-artifactory-pro";

const OS_SUFFIXES: Readonly<Record<HostOs, string>> = {
  mac: "-darwin.tar.gz",
  windows: "-windows.zip",
  linux: "-linux.tar.gz",
};

/** Legacy majors ship one archive for every OS. */
const LEGACY_SUFFIX = ".zip";

/** Time allowed until the release host sends response headers. */
const DOWNLOAD_HEADERS_TIMEOUT_MS = 60_000;

/**
 * Build the release archive URL. Pure: equal inputs give equal URLs.
 */
export function buildDownloadUrl(version: string, os: HostOs, isLegacyMajor: boolean): string {
  const suffix = isLegacyMajor ? LEGACY_SUFFIX : OS_SUFFIXES[os];
  return `${RELEASES_URL}/${version}/jfrog-artifactory-pro-${version}${suffix}`;
}

/**
 * Extract the archive file name from a Content-Disposition header.
 * Only the base name is kept so the header cannot point outside the target directory.
 *
 * @throws ProtocolError when the header is missing, malformed or names no file
 */
export function parseArchiveFileName(header: string | null): string {
  if (header === null || header.trim() === "") {
    throw new ProtocolError("Release response has no Content-Disposition header");
  }

  let filename: unknown;
  try {
    filename = contentDisposition.parse(header).parameters.filename;
  } catch (error) {
    throw new ProtocolError(`Malformed Content-Disposition header: ${getErrorMessage(error)}`);
  }

  const name = typeof filename !== "string" ? "" : basename(filename.replaceAll("\\", "/"));
  if (name === "" || name === "." || name === "..") {
    throw new ProtocolError(`Content-Disposition header names no file: ${header}`);
  }
  return name;
}

export interface ArchiveFetcher {
  /**
   * Download the archive for the target into its home directory.
   *
   * @throws DownloadError on transport failures and non-200 responses
   * @throws ProtocolError when the response does not name the archive
   */
  fetch(target: InstallTarget, os: HostOs): Promise<DownloadedArchive>;
}

export class DefaultArchiveFetcher implements ArchiveFetcher {
  constructor(
    private readonly httpClient: HttpClient,
    private readonly fileSystem: FileSystemLayer,
    private readonly logger: Logger
  ) {}

  async fetch(target: InstallTarget, os: HostOs): Promise<DownloadedArchive> {
    const sourceUrl = buildDownloadUrl(target.version, os, target.isLegacyMajor);
    this.logger.info("Downloading Artifactory", { url: sourceUrl });

    let response: Response;
    try {
      response = await this.httpClient.fetch(sourceUrl, { timeout: DOWNLOAD_HEADERS_TIMEOUT_MS });
    } catch (error) {
      throw new DownloadError(`Failed getting archive: ${getErrorMessage(error)}`);
    }

    if (response.status !== 200) {
      await discardBody(response);
      throw new DownloadError(
        `Failed downloading Artifactory. Releases response: ${response.status}`,
        response.status
      );
    }

    let fileName: string;
    try {
      fileName = parseArchiveFileName(response.headers.get("content-disposition"));
    } catch (error) {
      await discardBody(response);
      throw error;
    }

    if (response.body === null) {
      throw new ProtocolError("Release response has no body");
    }

    const localPath = join(target.homeDirectory, fileName);
    this.logger.debug("Archive name from response", { name: fileName });

    try {
      const bytes = await this.fileSystem.writeStream(localPath, response.body);
      this.logger.info("Downloaded archive", { path: localPath, bytes });
    } catch (error) {
      // Never leave a truncated archive behind that looks like a finished download
      await this.fileSystem.rm(localPath, { force: true });
      throw error;
    }

    return { localPath, sourceUrl };
  }
}
