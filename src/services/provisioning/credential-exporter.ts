import { CredentialError } from "../errors.js";
import { ENV_VARS } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import { SECRET_FILE_MODE } from "./config-patcher.js";
import type { AccessToken } from "./types.js";

export interface CredentialExporter {
  /**
   * Append the token to the CI environment file.
   *
   * @param exportFilePath - Environment file; when undefined the export is skipped
   * @returns true when the token was written
   */
  export(token: AccessToken, exportFilePath: string | undefined): Promise<boolean>;
}

/**
 * Exports the admin token as `NAME=value` line, the format CI environment files use.
 */
export class DefaultCredentialExporter implements CredentialExporter {
  constructor(
    private readonly fileSystem: FileSystemLayer,
    private readonly logger: Logger
  ) {}

  async export(token: AccessToken, exportFilePath: string | undefined): Promise<boolean> {
    if (exportFilePath === undefined) {
      this.logger.info(
        `${ENV_VARS.exportFile} not set, assuming the tool is not running on GitHub. Skipping token export`
      );
      return false;
    }

    // A line break would let the value define further variables
    if (/[\r\n]/.test(token.tokenValue)) {
      throw new CredentialError("Admin access token contains a line break");
    }

    await this.fileSystem.appendFile(
      exportFilePath,
      `${ENV_VARS.accessToken}=${token.tokenValue}\n`,
      { mode: SECRET_FILE_MODE }
    );
    this.logger.info("Exported admin token", { name: ENV_VARS.accessToken, path: exportFilePath });
    return true;
  }
}
