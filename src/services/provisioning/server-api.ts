/**
 * HTTP calls against the running server.
 *
 * Every call reads or discards the response body before returning, so no
 * connection is left open on any path. Transport errors propagate.
 */

import type { Logger } from "../logging/index.js";
import { bearerAuth, discardBody, type HttpClient } from "../platform/network.js";
import { adminAuthorization, type ServerEndpoints } from "./endpoints.js";

export interface ApiResponse {
  readonly status: number;
  readonly body: string;
}

export interface TokenRequest {
  readonly audience: string;
  readonly refreshable: boolean;
}

export interface ServerApi {
  /** GET the health endpoint; resolves with the status code. */
  ping(): Promise<number>;
  /** PUT the custom base URL; resolves with the status code. */
  setBaseUrl(baseUrl: string): Promise<number>;
  getConfiguration(): Promise<ApiResponse>;
  postConfiguration(configurationXml: string): Promise<ApiResponse>;
  /** POST a token request authenticated with a bearer token. */
  requestToken(bearerToken: string, request: TokenRequest): Promise<ApiResponse>;
}

/** Probe and configuration calls are answered quickly by a healthy server. */
const REQUEST_TIMEOUT_MS = 30_000;

export class DefaultServerApi implements ServerApi {
  constructor(
    private readonly httpClient: HttpClient,
    private readonly endpoints: ServerEndpoints,
    private readonly logger: Logger
  ) {}

  async ping(): Promise<number> {
    const response = await this.httpClient.fetch(this.endpoints.ping, {
      headers: { Authorization: adminAuthorization() },
      timeout: REQUEST_TIMEOUT_MS,
    });
    await discardBody(response);
    return response.status;
  }

  async setBaseUrl(baseUrl: string): Promise<number> {
    const response = await this.httpClient.fetch(this.endpoints.baseUrl, {
      method: "PUT",
      headers: { Authorization: adminAuthorization(), "Content-Type": "text/plain" },
      body: baseUrl,
      timeout: REQUEST_TIMEOUT_MS,
    });
    await discardBody(response);
    return response.status;
  }

  async getConfiguration(): Promise<ApiResponse> {
    return this.send(this.endpoints.configuration, "GET", {
      headers: { Authorization: adminAuthorization() },
    });
  }

  async postConfiguration(configurationXml: string): Promise<ApiResponse> {
    return this.send(this.endpoints.configuration, "POST", {
      headers: { Authorization: adminAuthorization(), "Content-Type": "application/xml" },
      body: configurationXml,
    });
  }

  async requestToken(bearerToken: string, request: TokenRequest): Promise<ApiResponse> {
    return this.send(this.endpoints.tokens, "POST", {
      headers: { Authorization: bearerAuth(bearerToken), "Content-Type": "application/json" },
      body: JSON.stringify(request),
    });
  }

  private async send(
    url: string,
    method: "GET" | "POST",
    init: { headers: Record<string, string>; body?: string }
  ): Promise<ApiResponse> {
    const response = await this.httpClient.fetch(url, {
      method,
      timeout: REQUEST_TIMEOUT_MS,
      ...init,
    });
    const body = await response.text();
    this.logger.silly("Response", { url, method, status: response.status, bytes: body.length });
    return { status: response.status, body };
  }
}
