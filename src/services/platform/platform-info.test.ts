/**
 * Tests for PlatformInfo implementation and mock factory.
 */

import { describe, it, expect } from "vitest";
import { homedir } from "node:os";
import { NodePlatformInfo } from "./platform-info.js";
import { createMockPlatformInfo } from "./platform-info.test-utils.js";

describe("NodePlatformInfo", () => {
  it("reports the running process platform and home directory", () => {
    const platformInfo = new NodePlatformInfo();

    expect(platformInfo.platform).toBe(process.platform);
    expect(platformInfo.homeDir).toBe(homedir());
  });
});

describe("createMockPlatformInfo", () => {
  it("returns sensible defaults", () => {
    const platformInfo = createMockPlatformInfo();

    expect(platformInfo).toEqual({ platform: "linux", homeDir: "/home/test" });
  });

  it("accepts overrides", () => {
    const platformInfo = createMockPlatformInfo({ platform: "darwin", homeDir: "/Users/ci" });

    expect(platformInfo).toEqual({ platform: "darwin", homeDir: "/Users/ci" });
  });
});
