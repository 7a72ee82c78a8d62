/**
 * Resolves and prepares the home directory the server is installed into.
 */

import { join } from "node:path";
import { AlreadyProvisionedError, ConfigurationError, FileSystemError } from "../errors.js";
import { ENV_VARS } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import type { EnvironmentLayer } from "../platform/environment.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { PlatformInfo } from "../platform/platform-info.js";
import { INSTALL_DIR_NAME } from "./server-layout.js";

/** Directory under the user's home used when no override is set. */
export const DEFAULT_HOME_DIR_NAME = "jfrog_home";

export interface HomeResolver {
  /**
   * Return a writable home directory without an existing installation.
   *
   * @param override - Home directory taken from the environment, if any
   * @throws ConfigurationError when the directory cannot be created
   * @throws AlreadyProvisionedError when an installation is already present
   */
  resolve(override: string | undefined): Promise<string>;
}

export class DefaultHomeResolver implements HomeResolver {
  constructor(
    private readonly fileSystem: FileSystemLayer,
    private readonly environment: EnvironmentLayer,
    private readonly platformInfo: PlatformInfo,
    private readonly logger: Logger
  ) {}

  async resolve(override: string | undefined): Promise<string> {
    let homeDirectory = override;
    if (homeDirectory === undefined) {
      homeDirectory = join(this.platformInfo.homeDir, DEFAULT_HOME_DIR_NAME);
      // Tools started later in the same job look for the same variable
      this.environment.set(ENV_VARS.home, homeDirectory);
      this.logger.info("Using default home directory", { path: homeDirectory });
    }

    try {
      await this.fileSystem.mkdir(homeDirectory);
    } catch (error) {
      if (error instanceof FileSystemError) {
        throw new ConfigurationError(
          `Cannot create home directory ${homeDirectory}: ${error.message}`,
          error.fsCode
        );
      }
      throw error;
    }

    const entries = await this.fileSystem.readdir(homeDirectory);
    if (entries.some((entry) => entry.name === INSTALL_DIR_NAME)) {
      throw new AlreadyProvisionedError(join(homeDirectory, INSTALL_DIR_NAME));
    }

    this.logger.debug("Home directory ready", { path: homeDirectory });
    return homeDirectory;
  }
}
