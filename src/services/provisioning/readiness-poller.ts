/**
 * Waits for the freshly started server to answer its health check.
 */

import { ConnectionTimeoutError, getErrorMessage } from "../errors.js";
import { DEFAULT_POLL_TIMING, type PollTiming } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import { runWithRetry } from "./retry.js";
import type { ServerApi } from "./server-api.js";
import type { Sleep } from "./types.js";

/**
 * Result of one health probe.
 */
export type ProbeResult =
  | { readonly kind: "response"; readonly status: number }
  | { readonly kind: "unreachable"; readonly error: string };

export interface ReadinessPollerOptions {
  readonly timing?: PollTiming;
  readonly sleep?: Sleep;
}

export interface ReadinessPoller {
  /**
   * Poll until the health check returns 200.
   *
   * @returns Number of probes it took
   * @throws ConnectionTimeoutError when the budget runs out
   */
  waitUntilReady(): Promise<number>;
}

export class DefaultReadinessPoller implements ReadinessPoller {
  private readonly timing: PollTiming;
  private readonly sleep: Sleep | undefined;

  constructor(
    private readonly serverApi: ServerApi,
    private readonly logger: Logger,
    options: ReadinessPollerOptions = {}
  ) {
    this.timing = options.timing ?? DEFAULT_POLL_TIMING;
    this.sleep = options.sleep;
  }

  async waitUntilReady(): Promise<number> {
    this.logger.info("Waiting for successful connection with Artifactory");
    const retryIn = Math.round(this.timing.intervalMs / 1000);

    const outcome = await runWithRetry(
      () => this.probe(),
      (result) => result.kind === "response" && result.status === 200,
      {
        timing: this.timing,
        ...(this.sleep !== undefined && { sleep: this.sleep }),
        onRetry: (result, attempt) => {
          if (result.kind === "unreachable") {
            this.logger.warn(`Received error: ${result.error}. Trying again in ${retryIn} seconds`, {
              attempt,
            });
          } else {
            this.logger.info(
              `Artifactory response: ${result.status}. Trying again in ${retryIn} seconds`,
              { attempt }
            );
          }
        },
      }
    );

    if (outcome.status === "timed-out") {
      throw new ConnectionTimeoutError("Could not connect to Artifactory", outcome.attempts);
    }

    this.logger.info("Artifactory is up!", { attempts: outcome.attempts });
    return outcome.attempts;
  }

  private async probe(): Promise<ProbeResult> {
    try {
      return { kind: "response", status: await this.serverApi.ping() };
    } catch (error) {
      // Connection refused is expected while the server is still starting
      return { kind: "unreachable", error: getErrorMessage(error) };
    }
  }
}
