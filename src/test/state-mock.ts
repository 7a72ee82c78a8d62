/**
 * Base types for behavioral state mocks.
 *
 * A state mock is a fake implementation of a boundary interface that records
 * what happened to it and exposes that record through a `$` property:
 *
 * @example
 * const httpClient = createMockHttpClient();
 * await httpClient.fetch("http://localhost:8081/artifactory/api/system/ping");
 * expect(httpClient).toHaveRequestCount(1);
 * expect(httpClient.$.requests[0]?.method).toBe("GET");
 *
 * Mock-specific matchers are registered by the module that defines the mock.
 * This module registers the shared `toBeUnchanged` matcher.
 */

import { expect } from "vitest";

/**
 * Opaque capture of a mock's state, produced by `$.snapshot()`.
 */
export interface Snapshot {
  readonly __brand: "Snapshot";
  readonly value: string;
}

/**
 * State exposed by every mock through `$`.
 */
export interface MockState {
  snapshot(): Snapshot;
  toString(): string;
}

/**
 * A mock carrying inspectable state.
 */
export interface MockWithState<TState extends MockState> {
  readonly $: TState;
}

/**
 * Result returned by a custom matcher.
 */
export interface MatcherResult {
  readonly pass: boolean;
  readonly message: () => string;
}

/**
 * Maps a matcher interface to the implementations passed to `expect.extend`.
 * The first parameter is the received mock; the rest mirror the matcher's parameters.
 */
export type MatcherImplementationsFor<TMock, TMatchers> = {
  [K in keyof TMatchers]: TMatchers[K] extends (...args: infer TArgs) => void
    ? (received: TMock, ...args: TArgs) => MatcherResult
    : never;
};

interface BaseMatchers {
  /** Assert that the mock's state equals a previously captured snapshot. */
  toBeUnchanged(snapshot: Snapshot): void;
}

declare module "vitest" {
  interface Assertion<T> extends BaseMatchers {}
}

function hasState(value: unknown): value is MockWithState<MockState> {
  if (typeof value !== "object" || value === null || !("$" in value)) {
    return false;
  }
  const state: unknown = value.$;
  return typeof state === "object" && state !== null && "snapshot" in state;
}

export const baseMatchers = {
  toBeUnchanged(received: unknown, snapshot: Snapshot): MatcherResult {
    if (!hasState(received)) {
      return {
        pass: false,
        message: (): string => "Expected a mock with a `$` state property",
      };
    }
    const current = received.$.snapshot().value;
    const pass = current === snapshot.value;
    return {
      pass,
      message: (): string =>
        pass
          ? "Expected state to have changed, but it is unchanged"
          : `Expected state to be unchanged.\nBefore:\n${snapshot.value}\nAfter:\n${current}`,
    };
  },
};

expect.extend(baseMatchers);
