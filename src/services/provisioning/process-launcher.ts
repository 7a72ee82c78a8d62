/**
 * Starts the server through its platform start script.
 */

import { join } from "node:path";
import { LaunchError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { EnvironmentLayer } from "../platform/environment.js";
import type { ProcessRunner } from "../platform/process.js";
import type { ServerLayout } from "./server-layout.js";
import type { HostOs } from "./types.js";

export interface StartCommand {
  /** Path of the start script, as named in logs and errors */
  readonly script: string;
  readonly command: string;
  readonly args: readonly string[];
  /** .bat scripts only run through cmd.exe */
  readonly shell: boolean;
}

export function resolveStartCommand(binDir: string, os: HostOs): StartCommand {
  if (os === "windows") {
    const script = join(binDir, "InstallService.bat");
    // The shell receives one command line; the path may contain spaces.
    return { script, command: `"${script}"`, args: [], shell: true };
  }
  const script = join(binDir, "artifactoryctl");
  return { script, command: script, args: ["start"], shell: false };
}

export interface ProcessLauncher {
  /**
   * Run the start script and wait for the script (not the server) to finish.
   *
   * @throws LaunchError when the script cannot be spawned or exits unsuccessfully
   */
  launch(homeDirectory: string, layout: ServerLayout, os: HostOs): Promise<void>;
}

export class DefaultProcessLauncher implements ProcessLauncher {
  constructor(
    private readonly processRunner: ProcessRunner,
    private readonly environment: EnvironmentLayer,
    private readonly logger: Logger
  ) {}

  async launch(homeDirectory: string, layout: ServerLayout, os: HostOs): Promise<void> {
    const binDir = join(homeDirectory, layout.binDir);
    const start = resolveStartCommand(binDir, os);
    this.logger.info("Starting Artifactory", { script: start.script });

    const result = await this.processRunner
      .run(start.command, start.args, {
        cwd: binDir,
        env: this.environment.toProcessEnv(),
        shell: start.shell,
      })
      .wait();

    if (result.spawnError !== undefined) {
      throw new LaunchError(`Failed to run ${start.script}: ${result.spawnError}`);
    }
    if (result.exitCode === null) {
      throw new LaunchError(
        `${start.script} was terminated${result.signal !== undefined ? ` by ${result.signal}` : ""}`
      );
    }
    if (result.exitCode !== 0) {
      throw new LaunchError(
        `${start.script} exited with code ${result.exitCode}`,
        result.exitCode
      );
    }

    this.logger.debug("Start script finished", { script: start.script });
  }
}
