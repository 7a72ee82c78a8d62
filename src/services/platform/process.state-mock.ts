/**
 * State mock for ProcessRunner following the State Mock Pattern.
 * Provides behavioral simulation with state tracking and custom matchers.
 */
import { expect } from "vitest";
import type { ProcessOptions, ProcessRunner, SpawnedProcess, ProcessResult } from "./process.js";
import type {
  MockState,
  MockWithState,
  Snapshot,
  MatcherImplementationsFor,
} from "../../test/state-mock.js";

// =============================================================================
// Types and Interfaces
// =============================================================================

/**
 * Spawn record for partial matching in assertions.
 * All properties are optional; only the ones given are compared.
 */
export interface SpawnRecord {
  readonly command?: string;
  readonly args?: readonly string[];
  readonly cwd?: string;
  readonly shell?: boolean;
}

/**
 * A recorded spawn.
 */
export interface SpawnedProcessRecord {
  readonly command: string;
  readonly args: readonly string[];
  readonly options: ProcessOptions;
}

/**
 * State interface for MockProcessRunner.
 */
export interface ProcessRunnerMockState extends MockState {
  readonly spawns: readonly SpawnedProcessRecord[];
}

/**
 * Mock ProcessRunner with inspectable state.
 */
export type MockProcessRunner = ProcessRunner & MockWithState<ProcessRunnerMockState>;

/**
 * Configuration returned by onSpawn callback.
 */
export interface SpawnConfig {
  /** Process ID. Explicitly set to undefined for a spawn failure. Default: 12345 */
  pid?: number | undefined;
  /** Exit code for wait(). Default: 0. Use null for a process killed by a signal. */
  exitCode?: number | null;
  signal?: string;
  /** Spawn failure message; implies no exit code */
  spawnError?: string;
}

/**
 * Options for createMockProcessRunner factory.
 */
export interface MockProcessRunnerOptions {
  /**
   * Default result for all spawned processes.
   * Can be overridden per-spawn via onSpawn.
   */
  defaultResult?: {
    exitCode?: number;
  };

  /**
   * Called when run() is invoked. Return overrides for this spawn.
   * When this returns undefined, defaultResult is used.
   */
  onSpawn?: (command: string, args: readonly string[]) => SpawnConfig | undefined;
}

// =============================================================================
// Implementation
// =============================================================================

function describeSpawn(record: SpawnedProcessRecord): string {
  const flags = [
    record.options.cwd !== undefined ? `cwd=${record.options.cwd}` : null,
    record.options.shell ? "shell" : null,
  ]
    .filter((flag) => flag !== null)
    .join(", ");
  return `${record.command} [${record.args.join(", ")}]${flags ? ` (${flags})` : ""}`;
}

/**
 * Create a mock ProcessRunner with state tracking and custom matchers.
 *
 * @example
 * const runner = createMockProcessRunner();
 * await launcher.launch(layout, "linux");
 * expect(runner).toHaveSpawned([{ command: "/home/ci/jfrog_home/artifactory/app/bin/artifactoryctl", args: ["start"] }]);
 *
 * @example Per-spawn customization
 * const runner = createMockProcessRunner({
 *   onSpawn: () => ({ exitCode: 127 }),
 * });
 */
export function createMockProcessRunner(options?: MockProcessRunnerOptions): MockProcessRunner {
  const spawns: SpawnedProcessRecord[] = [];
  const defaultResult: ProcessResult = {
    exitCode: options?.defaultResult?.exitCode ?? 0,
  };

  const state: ProcessRunnerMockState = {
    get spawns(): readonly SpawnedProcessRecord[] {
      return spawns;
    },
    snapshot(): Snapshot {
      return { __brand: "Snapshot", value: this.toString() };
    },
    toString(): string {
      return `ProcessRunner(spawned=[${spawns.map(describeSpawn).join("; ")}])`;
    },
  };

  return {
    $: state,

    run(command: string, args: readonly string[], runOptions?: ProcessOptions): SpawnedProcess {
      spawns.push({ command, args: [...args], options: { ...runOptions } });
      const config = options?.onSpawn?.(command, args);

      // 'in' distinguishes "not set" from "explicitly undefined"
      const pid = config !== undefined && "pid" in config ? config.pid : 12345;
      const result: ProcessResult = {
        exitCode:
          config?.spawnError !== undefined
            ? null
            : config?.exitCode !== undefined
              ? config.exitCode
              : defaultResult.exitCode,
        ...(config?.signal !== undefined && { signal: config.signal }),
        ...(config?.spawnError !== undefined && { spawnError: config.spawnError }),
      };

      return {
        pid,
        async wait(): Promise<ProcessResult> {
          return result;
        },
      };
    },
  };
}

// =============================================================================
// Custom Matchers
// =============================================================================

function matchesSpawnRecord(actual: SpawnedProcessRecord, expected: SpawnRecord): boolean {
  if (expected.command !== undefined && actual.command !== expected.command) {
    return false;
  }
  if (
    expected.args !== undefined &&
    (actual.args.length !== expected.args.length ||
      expected.args.some((arg, i) => actual.args[i] !== arg))
  ) {
    return false;
  }
  if (expected.cwd !== undefined && actual.options.cwd !== expected.cwd) {
    return false;
  }
  if (expected.shell !== undefined && (actual.options.shell ?? false) !== expected.shell) {
    return false;
  }
  return true;
}

/**
 * Custom matchers for MockProcessRunner.
 */
interface ProcessRunnerMatchers {
  /**
   * Assert the exact sequence of spawns.
   * Supports partial matching - only specified fields are checked.
   */
  toHaveSpawned(expected: SpawnRecord[]): void;
}

declare module "vitest" {
  interface Assertion<T> extends ProcessRunnerMatchers {}
}

export const processRunnerMatchers: MatcherImplementationsFor<
  MockProcessRunner,
  ProcessRunnerMatchers
> = {
  toHaveSpawned(received, expected) {
    const spawned = received.$.spawns;
    const mismatches: string[] = [];

    expected.forEach((exp, i) => {
      const act = spawned[i];
      if (act === undefined) {
        mismatches.push(
          `Expected spawn at index ${i}: ${JSON.stringify(exp)}\nActual: (no spawn at this index)`
        );
      } else if (!matchesSpawnRecord(act, exp)) {
        mismatches.push(
          `Expected spawn at index ${i}: ${JSON.stringify(exp)}\nActual: ${describeSpawn(act)}`
        );
      }
    });

    spawned.slice(expected.length).forEach((extra, offset) => {
      mismatches.push(`Unexpected spawn at index ${expected.length + offset}: ${describeSpawn(extra)}`);
    });

    const pass = mismatches.length === 0;

    return {
      pass,
      message: () =>
        pass
          ? `Expected not to have spawned: ${JSON.stringify(expected)}\nActual: ${received.$.toString()}`
          : `Spawn mismatch:\n${mismatches.join("\n")}\nActual state: ${received.$.toString()}`,
    };
  },
};

// Auto-register matchers when this file is imported
expect.extend(processRunnerMatchers);
