/**
 * Provisioning configuration types and fixed settings.
 */

/**
 * Environment variable names read or written by the tool.
 */
export const ENV_VARS = {
  /** Home directory override; written back when the default is used */
  home: "JFROG_HOME",
  /** License content; cleared once it is on disk */
  license: "RTLIC",
  /** File that collects variables for later CI steps */
  exportFile: "GITHUB_ENV",
  /** Variable name under which the admin token is exported */
  accessToken: "JFROG_TESTS_LOCAL_ACCESS_TOKEN",
} as const;

/** Version selector meaning "whatever the release host currently publishes". */
export const LATEST_VERSION = "[RELEASE]";

/**
 * Immutable configuration for one provisioning run.
 */
export interface ProvisioningConfig {
  /** Raw version selector, validated by parseVersionSelector */
  readonly version: string;
  readonly license: string;
  readonly homeDirOverride?: string;
  readonly exportFilePath?: string;
}

/**
 * Parsed command line.
 */
export type CliCommand =
  | { readonly command: "help" }
  | { readonly command: "provision"; readonly config: ProvisioningConfig };

/**
 * Timing of a polling loop.
 */
export interface PollTiming {
  /** Total time before giving up, in ms */
  readonly budgetMs: number;
  /** Sleep before every probe, in ms */
  readonly intervalMs: number;
}

export const DEFAULT_POLL_TIMING: PollTiming = {
  budgetMs: 300_000,
  intervalMs: 10_000,
};
