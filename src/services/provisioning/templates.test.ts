import { describe, it, expect } from "vitest";
import { DefaultTemplateStore, renderTemplate } from "./templates.js";
import { ConfigurationError } from "../errors.js";
import { createFileSystemMock, file } from "../platform/filesystem.state-mock.js";

describe("renderTemplate", () => {
  it("substitutes placeholders", () => {
    expect(renderTemplate('id: "{{nodeId}}"\nip: {{ nodeIp }}\n', { nodeId: "n1", nodeIp: "127.0.0.1" })).toBe(
      'id: "n1"\nip: 127.0.0.1\n'
    );
  });

  it("leaves text without placeholders unchanged", () => {
    expect(renderTemplate("version: 1\n", {})).toBe("version: 1\n");
  });

  it("fails on a placeholder without value", () => {
    expect(() => renderTemplate("id: {{nodeId}}", {})).toThrow(
      "Template placeholder has no value: nodeId"
    );
  });
});

describe("DefaultTemplateStore", () => {
  it("reads the template from its directory", async () => {
    const fileSystem = createFileSystemMock({
      entries: { "/opt/tool/templates/system.yaml": file("id: {{nodeId}}\n") },
    });
    const store = new DefaultTemplateStore(fileSystem, "/opt/tool/templates");

    expect(await store.render("system.yaml", { nodeId: "n1" })).toBe("id: n1\n");
  });

  it("reports a missing template as a configuration error", async () => {
    const store = new DefaultTemplateStore(createFileSystemMock(), "/opt/tool/templates");

    await expect(store.render("access.config.import.yml", {})).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});
