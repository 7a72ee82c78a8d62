/**
 * Platform information provider.
 * Abstracts process.platform and os.homedir() for testability.
 */

import { homedir } from "node:os";

export interface PlatformInfo {
  /** Operating system platform: 'linux', 'darwin', 'win32', ... */
  readonly platform: NodeJS.Platform;

  /** User's home directory */
  readonly homeDir: string;
}

/**
 * PlatformInfo for the running Node.js process.
 */
export class NodePlatformInfo implements PlatformInfo {
  readonly platform: NodeJS.Platform = process.platform;
  readonly homeDir: string = homedir();
}
