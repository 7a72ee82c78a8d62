// @vitest-environment node
/**
 * The bundled templates are found and render with the values the patcher supplies.
 */

import { describe, it, expect } from "vitest";
import { DefaultTemplateStore } from "./templates.js";
import { SYSTEM_TEMPLATE_VALUES } from "./config-patcher.js";
import { DefaultFileSystemLayer } from "../platform/filesystem.js";
import { createSilentLogger } from "../logging/logging.test-utils.js";

describe("bundled templates", () => {
  const store = new DefaultTemplateStore(new DefaultFileSystemLayer(createSilentLogger()));

  it("renders system.yaml with non-PostgreSQL databases allowed", async () => {
    const rendered = await store.render("system.yaml", SYSTEM_TEMPLATE_VALUES);

    expect(rendered).toContain("allowNonPostgresql: true");
    expect(rendered).toContain('id: "local-rt-setup"');
    expect(rendered).not.toContain("{{");
  });

  it("renders the access import document", async () => {
    const rendered = await store.render("access.config.import.yml", {});

    expect(rendered).toContain("security:");
  });
});
