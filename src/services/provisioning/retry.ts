/**
 * Fixed-interval retry loop shared by the readiness and bootstrap-token polls.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { PollTiming } from "../config/index.js";
import type { Sleep } from "./types.js";

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export type RetryOutcome<T> =
  | { readonly status: "success"; readonly value: T; readonly attempts: number }
  | { readonly status: "timed-out"; readonly attempts: number; readonly lastValue: T | undefined };

export interface RetryOptions<T> {
  readonly timing: PollTiming;
  readonly sleep?: Sleep;
  /** Called after every unsuccessful attempt */
  readonly onRetry?: (value: T, attempt: number) => void;
}

/** Number of probes that fit in the budget. Always at least one. */
export function maxAttempts(timing: PollTiming): number {
  return Math.max(1, Math.floor(timing.budgetMs / timing.intervalMs));
}

/**
 * Sleep, probe, and repeat until `isSuccess` accepts a probe result or the
 * attempt budget is used up. A probe that throws ends the loop with that error;
 * probes express "not ready yet" through their result.
 */
export async function runWithRetry<T>(
  probe: (attempt: number) => Promise<T>,
  isSuccess: (value: T) => boolean,
  options: RetryOptions<T>
): Promise<RetryOutcome<T>> {
  const sleep = options.sleep ?? defaultSleep;
  const attempts = maxAttempts(options.timing);
  let lastValue: T | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    await sleep(options.timing.intervalMs);
    const value = await probe(attempt);
    if (isSuccess(value)) {
      return { status: "success", value, attempts: attempt };
    }
    lastValue = value;
    options.onRetry?.(value, attempt);
  }

  return { status: "timed-out", attempts, lastValue };
}
