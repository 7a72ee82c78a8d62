/**
 * Network layer interface and implementation.
 *
 * HttpClient wraps the global fetch with a per-request timeout and debug
 * logging. Credentials passed in headers are never logged.
 */

import type { Logger } from "../logging/index.js";

// ============================================================================
// HTTP Client Interface
// ============================================================================

export type HttpMethod = "GET" | "POST" | "PUT";

/**
 * Options for HTTP requests.
 */
export interface HttpRequestOptions {
  /** Request method. Default: GET */
  readonly method?: HttpMethod;
  /** Request headers */
  readonly headers?: Readonly<Record<string, string>>;
  /** Request body, sent as-is */
  readonly body?: string;
  /**
   * Timeout in milliseconds until the response headers arrive.
   * Reading the body is not bounded by it. Default: 5000
   */
  readonly timeout?: number;
}

/**
 * HTTP client for making fetch requests with timeout support.
 */
export interface HttpClient {
  /**
   * Perform an HTTP request.
   *
   * @returns Response object; non-2xx statuses resolve normally
   * @throws DOMException with name "AbortError" on timeout
   * @throws TypeError on network error (connection refused, DNS failure)
   *
   * @example
   * const response = await httpClient.fetch(pingUrl, {
   *   headers: { Authorization: basicAuth("admin", "password") },
   * });
   * if (response.ok) {
   *   const text = await response.text();
   * }
   */
  fetch(url: string, options?: HttpRequestOptions): Promise<Response>;
}

/**
 * Build an HTTP Basic `Authorization` header value.
 */
export function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, "utf-8").toString("base64")}`;
}

/**
 * Build an HTTP Bearer `Authorization` header value.
 */
export function bearerAuth(token: string): string {
  return `Bearer ${token}`;
}

/**
 * Release the connection held by a response whose body is not needed.
 */
export async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Configuration for DefaultNetworkLayer.
 */
export interface NetworkLayerConfig {
  /** Default timeout for HTTP requests in ms. Default: 5000 */
  readonly defaultTimeout?: number;
}

// ============================================================================
// Default Implementation
// ============================================================================

/**
 * Default implementation of HttpClient on the global fetch.
 */
export class DefaultNetworkLayer implements HttpClient {
  private readonly config: Required<NetworkLayerConfig>;
  private readonly logger: Logger;

  constructor(logger: Logger, config: NetworkLayerConfig = {}) {
    this.logger = logger;
    this.config = {
      defaultTimeout: config.defaultTimeout ?? 5000,
    };
  }

  async fetch(url: string, options?: HttpRequestOptions): Promise<Response> {
    const timeout = options?.timeout ?? this.config.defaultTimeout;
    const method = options?.method ?? "GET";

    this.logger.debug("Fetch", { url, method });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }, timeout);

    const init: RequestInit = { method, signal: controller.signal };
    if (options?.headers !== undefined) {
      init.headers = { ...options.headers };
    }
    if (options?.body !== undefined) {
      init.body = options.body;
    }

    try {
      const response = await fetch(url, init);
      this.logger.debug("Fetch complete", { url, method, status: response.status });
      return response;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.warn("Fetch failed", { url, method, error: errorMessage });
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
