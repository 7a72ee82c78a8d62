/**
 * Provisioning configuration module.
 */

export { loadProvisioningConfig, parseCliArgs, USAGE } from "./config-loader.js";
export {
  DEFAULT_POLL_TIMING,
  ENV_VARS,
  LATEST_VERSION,
  type CliCommand,
  type PollTiming,
  type ProvisioningConfig,
} from "./types.js";
