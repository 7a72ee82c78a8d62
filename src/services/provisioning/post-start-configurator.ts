/**
 * Configuration that can only be applied through the running server's API.
 */

import { ConfigurationError, ProtocolError } from "../errors.js";
import type { Logger } from "../logging/index.js";
import type { ServerEndpoints } from "./endpoints.js";
import type { ServerApi } from "./server-api.js";
import type { ServerLayout } from "./server-layout.js";
import { enableArchiveIndex } from "./text-patches.js";

export interface PostStartConfigurator {
  /**
   * Set the custom base URL and, on modern layouts, enable archive indexing.
   *
   * @throws ConfigurationError when the server rejects a change
   * @throws ProtocolError when the configuration document is empty
   */
  configure(layout: ServerLayout): Promise<void>;
}

export class DefaultPostStartConfigurator implements PostStartConfigurator {
  constructor(
    private readonly serverApi: ServerApi,
    private readonly endpoints: ServerEndpoints,
    private readonly logger: Logger
  ) {}

  async configure(layout: ServerLayout): Promise<void> {
    await this.setCustomBaseUrl();
    if (layout.kind === "modern") {
      await this.enableArchiveIndex();
    }
  }

  /**
   * Point the base URL at the local server; federated repositories require one.
   */
  async setCustomBaseUrl(): Promise<void> {
    this.logger.info("Setting custom URL base");
    const status = await this.serverApi.setBaseUrl(this.endpoints.artifactoryUrl);

    // 500 is reported while the URL change is still applied
    if (status !== 200 && status !== 500) {
      throw new ConfigurationError(`Failed setting custom URL base. response: ${status}`, String(status));
    }

    const pingStatus = await this.serverApi.ping();
    if (pingStatus !== 200) {
      throw new ConfigurationError(
        `Failed reaching Artifactory after setting custom URL base. response: ${pingStatus}`,
        String(pingStatus)
      );
    }
    this.logger.info("Done setting custom URL base");
  }

  async enableArchiveIndex(): Promise<void> {
    this.logger.info("Enabling archive index");

    const current = await this.serverApi.getConfiguration();
    if (current.status !== 200) {
      throw new ConfigurationError(
        `Failed getting Artifactory configuration. response: ${current.status}`,
        String(current.status)
      );
    }
    if (current.body === "") {
      throw new ProtocolError("Artifactory configuration response is empty");
    }

    const updated = await this.serverApi.postConfiguration(enableArchiveIndex(current.body));
    if (updated.status !== 200) {
      throw new ConfigurationError(
        `Failed posting Artifactory configuration. response: ${updated.status}`,
        String(updated.status)
      );
    }
    this.logger.info("Archive index enabled");
  }
}
