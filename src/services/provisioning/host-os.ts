import { UnsupportedPlatformError } from "../errors.js";
import type { HostOs } from "./types.js";

/**
 * Map a Node.js platform to the operating system a release archive is built for.
 *
 * @throws UnsupportedPlatformError for anything but darwin, win32 and linux
 */
export function detectHostOs(platform: NodeJS.Platform): HostOs {
  switch (platform) {
    case "darwin":
      return "mac";
    case "win32":
      return "windows";
    case "linux":
      return "linux";
    default:
      throw new UnsupportedPlatformError(platform);
  }
}
