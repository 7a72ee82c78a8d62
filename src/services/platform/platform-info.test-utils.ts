/**
 * Test utilities for PlatformInfo.
 */
import type { PlatformInfo } from "./platform-info.js";

/**
 * Create a mock PlatformInfo.
 * Defaults to Linux with a test home directory.
 */
export function createMockPlatformInfo(overrides?: Partial<PlatformInfo>): PlatformInfo {
  return {
    platform: overrides?.platform ?? "linux",
    homeDir: overrides?.homeDir ?? "/home/test",
  };
}
