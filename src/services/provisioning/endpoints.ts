import { basicAuth } from "../platform/network.js";

/**
 * Addresses of the locally started server.
 */
export interface ServerEndpoints {
  /** Repository service base URL, with trailing slash */
  readonly artifactoryUrl: string;
  /** Access service base URL, with trailing slash */
  readonly accessUrl: string;
  readonly ping: string;
  readonly baseUrl: string;
  readonly configuration: string;
  readonly tokens: string;
}

export const DEFAULT_ARTIFACTORY_URL = "http://localhost:8081/artifactory/";
export const DEFAULT_ACCESS_URL = "http://localhost:8081/access/";

/** Credentials of the admin user every fresh install starts with. */
export const DEFAULT_ADMIN_CREDENTIALS = { username: "admin", password: "password" } as const;

export function createServerEndpoints(
  artifactoryUrl: string = DEFAULT_ARTIFACTORY_URL,
  accessUrl: string = DEFAULT_ACCESS_URL
): ServerEndpoints {
  return {
    artifactoryUrl,
    accessUrl,
    ping: `${artifactoryUrl}api/system/ping`,
    baseUrl: `${artifactoryUrl}api/system/configuration/baseUrl`,
    configuration: `${artifactoryUrl}api/system/configuration`,
    tokens: `${accessUrl}api/v1/tokens`,
  };
}

export function adminAuthorization(): string {
  return basicAuth(DEFAULT_ADMIN_CREDENTIALS.username, DEFAULT_ADMIN_CREDENTIALS.password);
}
