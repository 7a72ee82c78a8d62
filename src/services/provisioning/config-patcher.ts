/**
 * Writes configuration the server reads on its first start.
 */

import { dirname, join } from "node:path";
import { ENV_VARS } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import type { EnvironmentLayer } from "../platform/environment.js";
import { DEFAULT_FILE_MODE, type FileSystemLayer } from "../platform/filesystem.js";
import type { ModernServerLayout, ServerLayout } from "./server-layout.js";
import type { TemplateStore } from "./templates.js";

/** Mode of files holding secrets (license, token trigger). */
export const SECRET_FILE_MODE = 0o600;

export const STAGING_MODE_PROPERTIES = "staging.mode=true\n";

/** Values substituted into system.yaml. */
export const SYSTEM_TEMPLATE_VALUES = {
  nodeId: "local-rt-setup",
  nodeIp: "127.0.0.1",
} as const;

export interface ConfigPatcher {
  /**
   * Write the license and, for modern layouts, the system, staging and access
   * configuration plus the token trigger file. The license variable is removed
   * from the environment afterwards, also when a write fails.
   *
   * @throws FileSystemError on any write failure
   */
  patch(homeDirectory: string, layout: ServerLayout, license: string): Promise<void>;
}

export class DefaultConfigPatcher implements ConfigPatcher {
  constructor(
    private readonly fileSystem: FileSystemLayer,
    private readonly environment: EnvironmentLayer,
    private readonly templates: TemplateStore,
    private readonly logger: Logger
  ) {}

  async patch(homeDirectory: string, layout: ServerLayout, license: string): Promise<void> {
    try {
      this.logger.info("Creating license");
      await this.writeSecret(join(homeDirectory, layout.licenseFile), license);
    } finally {
      this.environment.unset(ENV_VARS.license);
    }

    if (layout.kind === "modern") {
      await this.writeModernConfiguration(homeDirectory, layout);
    }
  }

  private async writeModernConfiguration(
    homeDirectory: string,
    layout: ModernServerLayout
  ): Promise<void> {
    const systemYaml = await this.templates.render("system.yaml", SYSTEM_TEMPLATE_VALUES);
    await this.writeConfig(join(homeDirectory, layout.systemConfigFile), systemYaml);
    this.logger.info("Allowed non-PostgreSQL database");

    await this.writeConfig(
      join(homeDirectory, layout.systemPropertiesFile),
      STAGING_MODE_PROPERTIES
    );
    this.logger.info("Enabled staging mode");

    const accessImport = await this.templates.render("access.config.import.yml", {});
    await this.writeConfig(join(homeDirectory, layout.accessImportFile), accessImport);

    // The server generates a bootstrap token on first boot when this file exists
    await this.writeSecret(join(homeDirectory, layout.tokenTriggerFile), "");
    this.logger.info("Triggered bootstrap token creation");
  }

  private async writeConfig(path: string, content: string): Promise<void> {
    await this.fileSystem.mkdir(dirname(path));
    await this.fileSystem.writeFile(path, content, { mode: DEFAULT_FILE_MODE });
    this.logger.debug("Wrote configuration", { path });
  }

  private async writeSecret(path: string, content: string): Promise<void> {
    await this.fileSystem.mkdir(dirname(path));
    await this.fileSystem.writeFile(path, content, { mode: SECRET_FILE_MODE });
    // An existing file keeps its mode on write
    await this.fileSystem.chmod(path, SECRET_FILE_MODE);
    this.logger.debug("Wrote secret file", { path });
  }
}
