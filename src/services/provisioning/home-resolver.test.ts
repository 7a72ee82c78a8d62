import { describe, it, expect } from "vitest";
import { DefaultHomeResolver } from "./home-resolver.js";
import { AlreadyProvisionedError, ConfigurationError } from "../errors.js";
import { createFileSystemMock, directory, file } from "../platform/filesystem.state-mock.js";
import { createEnvironmentMock } from "../platform/environment.state-mock.js";
import { createMockPlatformInfo } from "../platform/platform-info.test-utils.js";
import { createSilentLogger } from "../logging/logging.test-utils.js";

function setup(entries: Parameters<typeof createFileSystemMock>[0] = {}) {
  const fileSystem = createFileSystemMock(entries);
  const environment = createEnvironmentMock();
  const resolver = new DefaultHomeResolver(
    fileSystem,
    environment,
    createMockPlatformInfo({ homeDir: "/home/ci" }),
    createSilentLogger()
  );
  return { fileSystem, environment, resolver };
}

describe("DefaultHomeResolver", () => {
  it("derives and persists a default under the user home", async () => {
    const { fileSystem, environment, resolver } = setup();

    const home = await resolver.resolve(undefined);

    expect(home).toBe("/home/ci/jfrog_home");
    expect(environment.$.values.get("JFROG_HOME")).toBe("/home/ci/jfrog_home");
    expect(fileSystem).toHaveDirectory("/home/ci/jfrog_home");
  });

  it("uses the override without touching the environment", async () => {
    const { fileSystem, environment, resolver } = setup();

    const home = await resolver.resolve("/opt/jfrog");

    expect(home).toBe("/opt/jfrog");
    expect(environment.$.values.has("JFROG_HOME")).toBe(false);
    expect(fileSystem).toHaveDirectory("/opt/jfrog");
  });

  it("accepts an existing home with unrelated content", async () => {
    const { resolver } = setup({
      entries: { "/opt/jfrog/notes.txt": file("keep"), "/opt/jfrog/artifactory-old": directory() },
    });

    await expect(resolver.resolve("/opt/jfrog")).resolves.toBe("/opt/jfrog");
  });

  it("refuses a home that already holds an installation", async () => {
    const { resolver } = setup({ entries: { "/opt/jfrog/artifactory": directory() } });

    const result = resolver.resolve("/opt/jfrog");

    await expect(result).rejects.toBeInstanceOf(AlreadyProvisionedError);
    await expect(result).rejects.toMatchObject({ installDir: "/opt/jfrog/artifactory" });
  });

  it("reports a home that cannot be created as a configuration error", async () => {
    const { resolver } = setup({ entries: { "/opt/jfrog": file("not a directory") } });

    const result = resolver.resolve("/opt/jfrog");

    await expect(result).rejects.toBeInstanceOf(ConfigurationError);
    await expect(result).rejects.toMatchObject({ code: "EEXIST" });
  });
});
