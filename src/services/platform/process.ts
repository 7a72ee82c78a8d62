/**
 * Process spawning utilities.
 */

import { execa } from "execa";
import type { Logger } from "../logging/index.js";

export interface ProcessOptions {
  /** Working directory for the process */
  readonly cwd?: string;
  /**
   * Environment variables.
   * When provided, replaces process.env entirely (no merging).
   */
  readonly env?: NodeJS.ProcessEnv;
  /** Run the command through the platform shell (needed for .bat scripts on Windows) */
  readonly shell?: boolean;
}

/**
 * Result of running a process command.
 */
export interface ProcessResult {
  /**
   * Exit code, or null if process didn't exit normally.
   * null when: killed by signal or spawn error.
   */
  readonly exitCode: number | null;
  /** Signal name if process was killed (e.g., 'SIGTERM', 'SIGKILL') */
  readonly signal?: string;
  /** Spawn failure message (ENOENT, EACCES, ...), set only when the process never ran */
  readonly spawnError?: string;
}

/**
 * Handle for a spawned process.
 * Its stdout and stderr go to this process's own streams.
 */
export interface SpawnedProcess {
  /**
   * Process ID.
   * undefined if process failed to spawn (e.g., ENOENT, EACCES).
   */
  readonly pid: number | undefined;

  /**
   * Wait for the process to exit.
   * Never throws for process exit status - check result fields instead.
   *
   * @example
   * const result = await runner.run("./artifactoryctl", ["start"]).wait();
   * if (result.exitCode !== 0) {
   *   throw new LaunchError(`artifactoryctl exited with code ${result.exitCode}`);
   * }
   */
  wait(): Promise<ProcessResult>;
}

/**
 * Interface for running external processes.
 * Allows dependency injection for testing.
 */
export interface ProcessRunner {
  /**
   * Start a process and return a handle to it.
   * Returns synchronously - the process is spawned immediately.
   */
  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess;
}

/**
 * Type alias for execa subprocess - using ReturnType to get the exact type.
 */
type ExecaSubprocess = ReturnType<typeof execa>;

/**
 * SpawnedProcess implementation wrapping an execa subprocess.
 */
export class ExecaSpawnedProcess implements SpawnedProcess {
  private readonly completion: Promise<ProcessResult>;

  constructor(
    private readonly subprocess: ExecaSubprocess,
    private readonly logger: Logger,
    private readonly command: string
  ) {
    this.completion = this.waitForProcess();
  }

  get pid(): number | undefined {
    return this.subprocess.pid;
  }

  wait(): Promise<ProcessResult> {
    return this.completion;
  }

  private async waitForProcess(): Promise<ProcessResult> {
    // reject: false makes execa resolve for non-zero exits and spawn failures alike
    const awaited = await this.subprocess;
    // Cast to get access to 'originalMessage' and 'shortMessage', set on failed results
    const result = awaited as typeof awaited & {
      originalMessage?: string;
      shortMessage?: string;
    };
    const processResult: ProcessResult = {
      exitCode: result.exitCode ?? null,
      ...(result.signal !== undefined && { signal: result.signal }),
    };

    if (result.failed && result.exitCode === undefined && result.signal === undefined) {
      const spawnError = result.originalMessage ?? result.shortMessage ?? "spawn failed";
      this.logger.error("Spawn failed", { command: this.command, error: spawnError });
      return { ...processResult, spawnError };
    }
    this.logger.debug("Exited", {
      command: this.command,
      pid: this.pid ?? 0,
      exitCode: result.exitCode ?? -1,
    });
    return processResult;
  }
}

/**
 * Process runner implementation using execa.
 */
export class ExecaProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger) {}

  run(command: string, args: readonly string[], options?: ProcessOptions): SpawnedProcess {
    const subprocess = execa(command, [...args], {
      reject: false, // Don't throw on non-zero exit - check exitCode instead
      stdin: "ignore",
      stdout: "inherit",
      stderr: "inherit",
      ...(options?.cwd && { cwd: options.cwd }),
      ...(options?.shell && { shell: true }),
      // When custom env is provided, disable extendEnv so that deleted keys
      // from the custom env are actually removed (not inherited from process.env)
      ...(options?.env && { env: options.env, extendEnv: false }),
    }) as ExecaSubprocess;

    const spawned = new ExecaSpawnedProcess(subprocess, this.logger, command);

    // Spawn failures have no PID; they are logged when the result settles
    if (spawned.pid !== undefined) {
      this.logger.debug("Spawned", { command, args: args.join(" "), pid: spawned.pid });
    }

    return spawned;
  }
}
