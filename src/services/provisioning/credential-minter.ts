/**
 * Obtains an administrative access token from a freshly started server.
 *
 * The server writes a narrowly scoped bootstrap token to disk after seeing the
 * trigger file; that token is exchanged for a refreshable admin token.
 */

import { join } from "node:path";
import { z } from "zod";
import {
  ConnectionTimeoutError,
  CredentialError,
  ProtocolError,
  isFileSystemErrorWithCode,
} from "../errors.js";
import { DEFAULT_POLL_TIMING, type PollTiming } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import { runWithRetry } from "./retry.js";
import type { ServerApi, TokenRequest } from "./server-api.js";
import type { ModernServerLayout } from "./server-layout.js";
import type { AccessToken, Sleep } from "./types.js";

export const ADMIN_TOKEN_REQUEST: TokenRequest = { audience: "*@*", refreshable: true };

const bootstrapTokenSchema = z.object({ token: z.string().optional() });
const tokenResponseSchema = z.object({ access_token: z.string().optional() });

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new ProtocolError(`${what} is not valid JSON`);
  }
}

/**
 * Extract the bootstrap token from the generated token file.
 *
 * @throws ProtocolError when the content is malformed or the token is empty
 */
export function parseBootstrapToken(content: string): string {
  const parsed = bootstrapTokenSchema.safeParse(parseJson(content, "Bootstrap token file"));
  if (!parsed.success) {
    throw new ProtocolError("Bootstrap token file has an unexpected format");
  }
  const token = parsed.data.token ?? "";
  if (token === "") {
    throw new ProtocolError("Bootstrap token is empty");
  }
  return token;
}

/**
 * Extract the admin token from a token API response body.
 *
 * @throws ProtocolError when the body is malformed
 * @throws CredentialError when the token is empty
 */
export function parseAdminToken(body: string): string {
  const parsed = tokenResponseSchema.safeParse(parseJson(body, "Token response"));
  if (!parsed.success) {
    throw new ProtocolError("Token response has an unexpected format");
  }
  const token = parsed.data.access_token ?? "";
  if (token === "") {
    throw new CredentialError("Admin access token is empty");
  }
  return token;
}

export interface CredentialMinterOptions {
  readonly timing?: PollTiming;
  readonly sleep?: Sleep;
}

export interface CredentialMinter {
  /**
   * Wait for the bootstrap token and exchange it for an admin token.
   *
   * @throws ConnectionTimeoutError when the token file does not appear in time
   * @throws ProtocolError when the token file is malformed
   * @throws CredentialError when the exchange fails
   */
  mint(homeDirectory: string, layout: ModernServerLayout): Promise<AccessToken>;
}

export class DefaultCredentialMinter implements CredentialMinter {
  private readonly timing: PollTiming;
  private readonly sleep: Sleep | undefined;

  constructor(
    private readonly fileSystem: FileSystemLayer,
    private readonly serverApi: ServerApi,
    private readonly logger: Logger,
    options: CredentialMinterOptions = {}
  ) {
    this.timing = options.timing ?? DEFAULT_POLL_TIMING;
    this.sleep = options.sleep;
  }

  async mint(homeDirectory: string, layout: ModernServerLayout): Promise<AccessToken> {
    const bootstrapToken = await this.waitForBootstrapToken(
      join(homeDirectory, layout.generatedTokenFile)
    );
    return this.exchange(bootstrapToken);
  }

  private async waitForBootstrapToken(tokenPath: string): Promise<string> {
    const outcome = await runWithRetry(
      () => this.readBootstrapToken(tokenPath),
      (token) => token !== null,
      {
        timing: this.timing,
        ...(this.sleep !== undefined && { sleep: this.sleep }),
      }
    );

    if (outcome.status === "timed-out" || outcome.value === null) {
      throw new ConnectionTimeoutError(
        `Bootstrap token file ${tokenPath} was not created in time`,
        outcome.attempts
      );
    }
    this.logger.info("Extracted bootstrap token", { attempts: outcome.attempts });
    return outcome.value;
  }

  /**
   * @returns null while the server has not written the file yet
   */
  private async readBootstrapToken(tokenPath: string): Promise<string | null> {
    let content: string;
    try {
      content = await this.fileSystem.readFile(tokenPath);
    } catch (error) {
      if (isFileSystemErrorWithCode(error, "ENOENT")) {
        this.logger.info("Bootstrap token file does not exist yet", { path: tokenPath });
        return null;
      }
      throw error;
    }
    return parseBootstrapToken(content);
  }

  private async exchange(bootstrapToken: string): Promise<AccessToken> {
    const response = await this.serverApi.requestToken(bootstrapToken, ADMIN_TOKEN_REQUEST);
    if (response.status !== 200) {
      throw new CredentialError(
        `Failed getting admin token from Artifactory. response: ${response.status}`,
        String(response.status)
      );
    }

    const tokenValue = parseAdminToken(response.body);
    this.logger.info("Obtained admin access token", { audience: ADMIN_TOKEN_REQUEST.audience });
    return { tokenValue, audience: ADMIN_TOKEN_REQUEST.audience };
  }
}
