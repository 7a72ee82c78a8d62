/**
 * Builds the provisioning configuration from the command line and environment.
 */

import { ConfigurationError } from "../errors.js";
import type { EnvironmentLayer } from "../platform/environment.js";
import { ENV_VARS, LATEST_VERSION, type CliCommand } from "./types.js";

const VERSION_FLAG = "--rt-version";

export const USAGE = `Usage: local-rt-setup [--rt-version <version>]

Downloads, configures and starts a local Artifactory server.

Options:
  --rt-version <version>  Server version (X.Y.Z, major >= 6). Default: ${LATEST_VERSION}
  --help                  Show this message

Environment:
  ${ENV_VARS.license}        License key (required)
  ${ENV_VARS.home}    Installation home (default: <user home>/jfrog_home)
  ${ENV_VARS.exportFile}    File the admin token is appended to (optional)
`;

/**
 * Extract the version selector from argv (without the node and script entries).
 *
 * @returns null when --help was requested
 * @throws ConfigurationError on unknown flags or a flag without a value
 */
export function parseCliArgs(argv: readonly string[]): { version: string } | null {
  let version = LATEST_VERSION;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      return null;
    }
    if (arg === VERSION_FLAG) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new ConfigurationError(`Missing value for ${VERSION_FLAG}`);
      }
      version = value;
      i++;
      continue;
    }
    if (arg?.startsWith(`${VERSION_FLAG}=`)) {
      version = arg.substring(VERSION_FLAG.length + 1);
      if (version === "") {
        throw new ConfigurationError(`Missing value for ${VERSION_FLAG}`);
      }
      continue;
    }
    throw new ConfigurationError(`Unknown argument: ${arg}`);
  }

  return { version };
}

/**
 * Load the configuration for a run.
 *
 * @throws ConfigurationError when arguments are invalid or the license is missing
 */
export function loadProvisioningConfig(
  argv: readonly string[],
  environment: EnvironmentLayer
): CliCommand {
  const args = parseCliArgs(argv);
  if (args === null) {
    return { command: "help" };
  }

  const license = environment.get(ENV_VARS.license);
  if (license === undefined) {
    throw new ConfigurationError(
      `License not found in environment variable ${ENV_VARS.license}`,
      "MISSING_LICENSE"
    );
  }

  const homeDirOverride = environment.get(ENV_VARS.home);
  const exportFilePath = environment.get(ENV_VARS.exportFile);

  return {
    command: "provision",
    config: {
      version: args.version,
      license,
      ...(homeDirOverride !== undefined && { homeDirOverride }),
      ...(exportFilePath !== undefined && { exportFilePath }),
    },
  };
}
