/**
 * Environment variable access.
 *
 * The provisioning steps read and write process-wide variables (home directory,
 * license) only through this layer, so tests can run against an isolated map.
 */

import type { Logger } from "../logging/index.js";

export interface EnvironmentLayer {
  /** Value of a variable; empty strings count as unset. */
  get(name: string): string | undefined;

  /** Set a variable for this process and every child spawned afterwards. */
  set(name: string, value: string): void;

  /** Remove a variable. No-op if it is not set. */
  unset(name: string): void;

  /** Copy of the current variables, for passing to child processes. */
  toProcessEnv(): NodeJS.ProcessEnv;
}

/**
 * EnvironmentLayer over a NodeJS.ProcessEnv object (normally `process.env`).
 * Only variable names are logged, never values.
 */
export class ProcessEnvironmentLayer implements EnvironmentLayer {
  constructor(
    private readonly env: NodeJS.ProcessEnv,
    private readonly logger: Logger
  ) {}

  get(name: string): string | undefined {
    const value = this.env[name];
    return value === undefined || value === "" ? undefined : value;
  }

  set(name: string, value: string): void {
    this.logger.debug("Set", { name });
    this.env[name] = value;
  }

  unset(name: string): void {
    if (name in this.env) {
      this.logger.debug("Unset", { name });
      delete this.env[name];
    }
  }

  toProcessEnv(): NodeJS.ProcessEnv {
    return { ...this.env };
  }
}
