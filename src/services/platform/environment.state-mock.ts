/**
 * State mock for EnvironmentLayer backed by a plain map.
 */
import type { EnvironmentLayer } from "./environment.js";
import type { MockState, MockWithState, Snapshot } from "../../test/state-mock.js";

export interface EnvironmentMockState extends MockState {
  /** Current variables */
  readonly values: ReadonlyMap<string, string>;
  /** Names passed to unset(), in call order */
  readonly unsetCalls: readonly string[];
}

export type MockEnvironmentLayer = EnvironmentLayer & MockWithState<EnvironmentMockState>;

/**
 * Create an EnvironmentLayer mock.
 *
 * @example
 * const env = createEnvironmentMock({ RTLIC: "test-license" });
 * await patcher.patch(target, layout);
 * expect(env.$.values.has("RTLIC")).toBe(false);
 */
export function createEnvironmentMock(initial?: Record<string, string>): MockEnvironmentLayer {
  const values = new Map<string, string>(Object.entries(initial ?? {}));
  const unsetCalls: string[] = [];

  const state: EnvironmentMockState = {
    get values(): ReadonlyMap<string, string> {
      return values;
    },
    get unsetCalls(): readonly string[] {
      return unsetCalls;
    },
    snapshot(): Snapshot {
      return { __brand: "Snapshot", value: this.toString() };
    },
    toString(): string {
      const names = [...values.keys()].sort().join(", ");
      return `Environment(${names || "(empty)"})`;
    },
  };

  return {
    $: state,
    get(name: string): string | undefined {
      const value = values.get(name);
      return value === "" ? undefined : value;
    },
    set(name: string, value: string): void {
      values.set(name, value);
    },
    unset(name: string): void {
      unsetCalls.push(name);
      values.delete(name);
    },
    toProcessEnv(): NodeJS.ProcessEnv {
      return Object.fromEntries(values);
    },
  };
}
