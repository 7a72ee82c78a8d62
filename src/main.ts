#!/usr/bin/env node
/**
 * local-rt-setup CLI entry point.
 *
 * Downloads, configures and starts a local Artifactory server, then exports an
 * admin token for later CI steps. Exits 0 only when every step succeeded.
 */

import { loadProvisioningConfig, USAGE } from "./services/config/index.js";
import { getErrorMessage } from "./services/errors.js";
import { NodeLogService, type LoggingService } from "./services/logging/index.js";
import {
  DefaultFileSystemLayer,
  DefaultNetworkLayer,
  ExecaProcessRunner,
  NodePlatformInfo,
  ProcessEnvironmentLayer,
  type EnvironmentLayer,
} from "./services/platform/index.js";
import { createProvisioner, type Provisioner } from "./services/provisioning/index.js";

const EXIT_SUCCESS = 0;
const EXIT_FAILURE = 1;

export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

export type ProvisionerFactory = (
  environment: EnvironmentLayer,
  loggingService: LoggingService
) => Pick<Provisioner, "run">;

function createDefaultProvisioner(
  environment: EnvironmentLayer,
  loggingService: LoggingService
): Provisioner {
  return createProvisioner({
    loggingService,
    environment,
    fileSystem: new DefaultFileSystemLayer(loggingService.createLogger("fs")),
    httpClient: new DefaultNetworkLayer(loggingService.createLogger("network")),
    processRunner: new ExecaProcessRunner(loggingService.createLogger("process")),
    platformInfo: new NodePlatformInfo(),
  });
}

/**
 * Run the CLI.
 *
 * @param argv - Arguments after the node binary and script path
 * @param env - Process environment; the home and license variables are updated in place
 * @returns Exit code
 */
export async function runCli(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  output: CliOutput,
  createPipeline: ProvisionerFactory = createDefaultProvisioner
): Promise<number> {
  const loggingService = new NodeLogService(env);
  const logger = loggingService.createLogger("cli");
  const environment = new ProcessEnvironmentLayer(env, loggingService.createLogger("env"));

  try {
    const cli = loadProvisioningConfig(argv, environment);
    if (cli.command === "help") {
      output.stdout(USAGE);
      return EXIT_SUCCESS;
    }

    const result = await createPipeline(environment, loggingService).run(cli.config);
    logger.debug("Provisioning finished", {
      home: result.target.homeDirectory,
      tokenExported: result.tokenExported,
    });
    return EXIT_SUCCESS;
  } catch (error) {
    output.stderr(`Error: ${getErrorMessage(error)}\n`);
    return EXIT_FAILURE;
  } finally {
    loggingService.dispose();
  }
}

// Skip when running in test environment (Vitest sets VITEST env var)
if (!process.env.VITEST) {
  runCli(process.argv.slice(2), process.env, {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error("Fatal error:", getErrorMessage(error));
      process.exitCode = EXIT_FAILURE;
    });
}
