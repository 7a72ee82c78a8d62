/**
 * Runs the provisioning pipeline: each step either completes or aborts the run.
 */

import type { ProvisioningConfig } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import type { PlatformInfo } from "../platform/platform-info.js";
import type { ArchiveFetcher } from "./archive-fetcher.js";
import type { ArchiveInstaller } from "./archive-installer.js";
import type { ConfigPatcher } from "./config-patcher.js";
import type { CredentialExporter } from "./credential-exporter.js";
import type { CredentialMinter } from "./credential-minter.js";
import type { HomeResolver } from "./home-resolver.js";
import { detectHostOs } from "./host-os.js";
import type { PostStartConfigurator } from "./post-start-configurator.js";
import type { ProcessLauncher } from "./process-launcher.js";
import type { ReadinessPoller } from "./readiness-poller.js";
import { resolveServerLayout, type ServerLayout } from "./server-layout.js";
import type { InstallTarget } from "./types.js";
import { parseVersionSelector } from "./version.js";

/**
 * Dependencies for Provisioner.
 */
export interface ProvisionerDeps {
  readonly platformInfo: PlatformInfo;
  readonly homeResolver: HomeResolver;
  readonly archiveFetcher: ArchiveFetcher;
  readonly archiveInstaller: ArchiveInstaller;
  readonly configPatcher: ConfigPatcher;
  readonly processLauncher: ProcessLauncher;
  readonly readinessPoller: ReadinessPoller;
  readonly credentialMinter: CredentialMinter;
  readonly credentialExporter: CredentialExporter;
  readonly postStartConfigurator: PostStartConfigurator;
  readonly logger: Logger;
}

export interface ProvisioningResult {
  readonly target: InstallTarget;
  readonly layout: ServerLayout;
  readonly installDir: string;
  /** Whether an admin token was written to the export file */
  readonly tokenExported: boolean;
}

export class Provisioner {
  constructor(private readonly deps: ProvisionerDeps) {}

  async run(config: ProvisioningConfig): Promise<ProvisioningResult> {
    const { logger } = this.deps;

    // Cheap precondition checks come before any disk or network work
    const selector = parseVersionSelector(config.version);
    const os = detectHostOs(this.deps.platformInfo.platform);

    const homeDirectory = await this.deps.homeResolver.resolve(config.homeDirOverride);
    const target: InstallTarget = {
      homeDirectory,
      version: selector.version,
      isLegacyMajor: selector.isLegacyMajor,
    };
    const layout = resolveServerLayout(target.isLegacyMajor);
    logger.info("Provisioning Artifactory", {
      version: target.version,
      layout: layout.kind,
      os,
      home: homeDirectory,
    });

    const archive = await this.deps.archiveFetcher.fetch(target, os);
    const installDir = await this.deps.archiveInstaller.install(archive, homeDirectory, layout, os);
    await this.deps.configPatcher.patch(homeDirectory, layout, config.license);
    await this.deps.processLauncher.launch(homeDirectory, layout, os);
    await this.deps.readinessPoller.waitUntilReady();

    let tokenExported = false;
    if (layout.kind === "modern") {
      const token = await this.deps.credentialMinter.mint(homeDirectory, layout);
      tokenExported = await this.deps.credentialExporter.export(token, config.exportFilePath);
    }

    await this.deps.postStartConfigurator.configure(layout);

    logger.info("Artifactory is ready", { home: homeDirectory, tokenExported });
    return { target, layout, installDir, tokenExported };
  }
}
