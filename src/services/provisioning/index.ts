/**
 * Provisioning pipeline: public API and default wiring.
 */

import { DefaultArchiveExtractor } from "../archive/index.js";
import type { PollTiming } from "../config/index.js";
import type { LoggingService } from "../logging/index.js";
import type { EnvironmentLayer } from "../platform/environment.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { HttpClient } from "../platform/network.js";
import type { PlatformInfo } from "../platform/platform-info.js";
import type { ProcessRunner } from "../platform/process.js";
import { DefaultArchiveFetcher } from "./archive-fetcher.js";
import { DefaultArchiveInstaller } from "./archive-installer.js";
import { DefaultConfigPatcher } from "./config-patcher.js";
import { DefaultCredentialExporter } from "./credential-exporter.js";
import { DefaultCredentialMinter } from "./credential-minter.js";
import { createServerEndpoints, type ServerEndpoints } from "./endpoints.js";
import { DefaultHomeResolver } from "./home-resolver.js";
import { DefaultPostStartConfigurator } from "./post-start-configurator.js";
import { DefaultProcessLauncher } from "./process-launcher.js";
import { Provisioner } from "./provisioner.js";
import { DefaultReadinessPoller } from "./readiness-poller.js";
import { DefaultServerApi } from "./server-api.js";
import { DefaultTemplateStore, TEMPLATE_DIR } from "./templates.js";
import type { Sleep } from "./types.js";

export { Provisioner, type ProvisionerDeps, type ProvisioningResult } from "./provisioner.js";
export { parseVersionSelector, type VersionSelector } from "./version.js";
export { detectHostOs } from "./host-os.js";
export { buildDownloadUrl } from "./archive-fetcher.js";
export { runWithRetry, type RetryOutcome } from "./retry.js";
export { createServerEndpoints, type ServerEndpoints } from "./endpoints.js";
export { resolveServerLayout, type ServerLayout } from "./server-layout.js";
export type { AccessToken, DownloadedArchive, HostOs, InstallTarget, Sleep } from "./types.js";

/**
 * Boundary layers and settings the default pipeline is built from.
 */
export interface ProvisionerSetup {
  readonly loggingService: LoggingService;
  readonly fileSystem: FileSystemLayer;
  readonly httpClient: HttpClient;
  readonly processRunner: ProcessRunner;
  readonly environment: EnvironmentLayer;
  readonly platformInfo: PlatformInfo;
  readonly endpoints?: ServerEndpoints;
  readonly templateDir?: string;
  readonly timing?: PollTiming;
  readonly sleep?: Sleep;
}

/**
 * Wire the default implementation of every provisioning step.
 */
export function createProvisioner(setup: ProvisionerSetup): Provisioner {
  const { loggingService, fileSystem, httpClient, environment } = setup;
  const endpoints = setup.endpoints ?? createServerEndpoints();
  const pollOptions = {
    ...(setup.timing !== undefined && { timing: setup.timing }),
    ...(setup.sleep !== undefined && { sleep: setup.sleep }),
  };
  const serverApi = new DefaultServerApi(httpClient, endpoints, loggingService.createLogger("network"));

  return new Provisioner({
    platformInfo: setup.platformInfo,
    homeResolver: new DefaultHomeResolver(
      fileSystem,
      environment,
      setup.platformInfo,
      loggingService.createLogger("provisioning")
    ),
    archiveFetcher: new DefaultArchiveFetcher(
      httpClient,
      fileSystem,
      loggingService.createLogger("download")
    ),
    archiveInstaller: new DefaultArchiveInstaller(
      new DefaultArchiveExtractor(fileSystem, loggingService.createLogger("install")),
      fileSystem,
      loggingService.createLogger("install")
    ),
    configPatcher: new DefaultConfigPatcher(
      fileSystem,
      environment,
      new DefaultTemplateStore(fileSystem, setup.templateDir ?? TEMPLATE_DIR),
      loggingService.createLogger("config")
    ),
    processLauncher: new DefaultProcessLauncher(
      setup.processRunner,
      environment,
      loggingService.createLogger("process")
    ),
    readinessPoller: new DefaultReadinessPoller(
      serverApi,
      loggingService.createLogger("readiness"),
      pollOptions
    ),
    credentialMinter: new DefaultCredentialMinter(
      fileSystem,
      serverApi,
      loggingService.createLogger("credentials"),
      pollOptions
    ),
    credentialExporter: new DefaultCredentialExporter(
      fileSystem,
      loggingService.createLogger("credentials")
    ),
    postStartConfigurator: new DefaultPostStartConfigurator(
      serverApi,
      endpoints,
      loggingService.createLogger("post-start")
    ),
    logger: loggingService.createLogger("provisioning"),
  });
}
