/**
 * Behavioral mock for HttpClient following the mock.$ state pattern.
 *
 * Provides:
 * - Request history tracking (method, headers, body)
 * - Response configuration per URL, optionally per method
 * - Response sequences for polling scenarios
 * - Network error simulation
 * - Custom matchers (toHaveRequested, toHaveRequestCount, toHaveNoRequests)
 *
 * Matchers are auto-registered when this module is imported.
 */

import { expect } from "vitest";
import type { HttpClient, HttpMethod, HttpRequestOptions } from "./network.js";
import type {
  MockState,
  MockWithState,
  Snapshot,
  MatcherResult,
  MatcherImplementationsFor,
} from "../../test/state-mock.js";

// =============================================================================
// Type Definitions
// =============================================================================

/** Record of an HTTP request made through the mock. */
export interface HttpRequestRecord {
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string | undefined;
}

/**
 * Response configuration - stores DATA, not Response objects.
 * Fresh Response constructed on each fetch() call.
 */
export interface ConfiguredResponse {
  readonly body?: string | Uint8Array;
  readonly status?: number; // Default: 200
  readonly headers?: Record<string, string>;
  readonly error?: Error; // Throw this instead of returning response
}

/**
 * A single response, or a sequence consumed one per request.
 * The last entry of a sequence repeats once the others are used up.
 */
export type ResponseSetup = ConfiguredResponse | readonly ConfiguredResponse[];

/** Mock state - pure data, logic in matchers. */
export interface HttpClientMockState extends MockState {
  readonly requests: readonly HttpRequestRecord[];
  readonly networkError: Error | null;
}

/** Mock type with state access and setup methods. */
export type MockHttpClient = HttpClient &
  MockWithState<HttpClientMockState> & {
    /** Configure the response for a URL; a method narrows it to requests using that method. */
    setResponse(url: string, setup: ResponseSetup, method?: HttpMethod): void;
    simulateNetworkDown(): void;
    simulateNetworkUp(): void;
  };

/** Factory options. */
export interface MockHttpClientOptions {
  /** Pre-configured responses by exact URL (any method). */
  responses?: Record<string, ResponseSetup>;
  /** Default for unconfigured URLs. Default: { status: 200, body: "" } */
  defaultResponse?: ConfiguredResponse;
}

// =============================================================================
// Factory Implementation
// =============================================================================

function isSequence(setup: ResponseSetup): setup is readonly ConfiguredResponse[] {
  return Array.isArray(setup);
}

function routeKey(url: string, method?: HttpMethod): string {
  return method === undefined ? url : `${method} ${url}`;
}

/**
 * Create a behavioral mock HttpClient for testing.
 *
 * @example Poll until the server answers
 * const httpClient = createMockHttpClient();
 * httpClient.setResponse(pingUrl, [
 *   { error: new TypeError("fetch failed") },
 *   { status: 200, body: "OK" },
 * ]);
 *
 * @example Method-specific responses
 * httpClient.setResponse(configUrl, { body: "<config/>" }, "GET");
 * httpClient.setResponse(configUrl, { status: 200 }, "POST");
 * expect(httpClient).toHaveRequested(configUrl, "POST");
 */
export function createMockHttpClient(options?: MockHttpClientOptions): MockHttpClient {
  const requests: HttpRequestRecord[] = [];
  const responses = new Map<string, ResponseSetup>(
    options?.responses ? Object.entries(options.responses) : []
  );
  // Number of requests already served per route key, for sequences
  const served = new Map<string, number>();
  let networkError: Error | null = null;

  const defaultResponse: ConfiguredResponse = options?.defaultResponse ?? { status: 200, body: "" };

  function resolveResponse(url: string, method: HttpMethod): ConfiguredResponse {
    for (const key of [routeKey(url, method), routeKey(url)]) {
      const setup = responses.get(key);
      if (setup === undefined) {
        continue;
      }
      if (!isSequence(setup)) {
        return setup;
      }
      const index = served.get(key) ?? 0;
      served.set(key, index + 1);
      return setup[Math.min(index, setup.length - 1)] ?? defaultResponse;
    }
    return defaultResponse;
  }

  const state: HttpClientMockState = {
    get requests(): readonly HttpRequestRecord[] {
      return requests;
    },
    get networkError(): Error | null {
      return networkError;
    },
    snapshot(): Snapshot {
      return {
        __brand: "Snapshot" as const,
        value: this.toString(),
      };
    },
    toString(): string {
      const count = requests.length;
      const urls = requests.map((r) => `${r.method} ${r.url}`).join(", ");
      const network = networkError ? ` [NETWORK DOWN: ${networkError.message}]` : "";
      return `${count} request(s): ${urls || "(none)"}${network}`;
    },
  };

  const mock: MockHttpClient = {
    $: state,

    async fetch(url: string, fetchOptions?: HttpRequestOptions): Promise<Response> {
      const method = fetchOptions?.method ?? "GET";
      requests.push({
        url,
        method,
        headers: { ...fetchOptions?.headers },
        body: fetchOptions?.body,
      });

      if (networkError) {
        throw networkError;
      }

      const config = resolveResponse(url, method);
      if (config.error) {
        throw config.error;
      }

      const responseInit: { status: number; headers?: Record<string, string> } = {
        status: config.status ?? 200,
      };
      if (config.headers !== undefined) {
        responseInit.headers = config.headers;
      }

      // Copy binary bodies so every Response owns its bytes
      let body: string | Uint8Array | null = null;
      if (config.body !== undefined) {
        body = typeof config.body === "string" ? config.body : new Uint8Array(config.body);
      }

      return new Response(body, responseInit);
    },

    setResponse(url: string, setup: ResponseSetup, method?: HttpMethod): void {
      const key = routeKey(url, method);
      responses.set(key, setup);
      served.delete(key);
    },

    simulateNetworkDown(): void {
      networkError = new TypeError("fetch failed");
    },

    simulateNetworkUp(): void {
      networkError = null;
    },
  };

  return mock;
}

// =============================================================================
// Custom Matchers
// =============================================================================

/** Custom matchers for MockHttpClient assertions. */
interface HttpClientMatchers {
  /** Assert that a URL was requested, optionally with a specific method. */
  toHaveRequested(url: string | RegExp, method?: HttpMethod): void;
  /** Assert that exactly N requests were made. */
  toHaveRequestCount(count: number): void;
  /** Assert that no requests were made. */
  toHaveNoRequests(): void;
}

declare module "vitest" {
  interface Assertion<T> extends HttpClientMatchers {}
}

function matchesUrl(record: HttpRequestRecord, url: string | RegExp): boolean {
  return url instanceof RegExp ? url.test(record.url) : record.url === url;
}

/** Matcher implementations. */
export const httpClientMatchers: MatcherImplementationsFor<MockHttpClient, HttpClientMatchers> = {
  toHaveRequested(received, url, method) {
    const requests = received.$.requests;
    const pass = requests.some(
      (r) => matchesUrl(r, url) && (method === undefined || r.method === method)
    );
    const target = method === undefined ? String(url) : `${method} ${String(url)}`;

    return {
      pass,
      message: (): string => {
        const urls = requests.map((r) => `${r.method} ${r.url}`).join(", ") || "(none)";
        return pass
          ? `Expected not to have requested ${target}, but did. Requests: ${urls}`
          : `Expected to have requested ${target}, but didn't. Requests: ${urls}`;
      },
    } satisfies MatcherResult;
  },

  toHaveRequestCount(received, count) {
    const actual = received.$.requests.length;
    const pass = actual === count;

    return {
      pass,
      message: (): string =>
        pass
          ? `Expected not to have ${count} request(s), but did`
          : `Expected ${count} request(s), but got ${actual}`,
    } satisfies MatcherResult;
  },

  toHaveNoRequests(received) {
    const count = received.$.requests.length;
    const pass = count === 0;

    return {
      pass,
      message: (): string => {
        const urls = received.$.requests.map((r) => r.url).join(", ");
        return pass
          ? `Expected to have requests, but had none`
          : `Expected no requests, but had ${count}: ${urls}`;
      },
    } satisfies MatcherResult;
  },
};

// Auto-register matchers when this module is imported
expect.extend(httpClientMatchers);
