/**
 * Provisioning domain types.
 */

/**
 * Host operating systems release archives exist for.
 */
export type HostOs = "mac" | "windows" | "linux";

/**
 * What gets installed where. Derived once at start, read-only afterwards.
 */
export interface InstallTarget {
  readonly homeDirectory: string;
  /** "[RELEASE]" or X.Y.Z */
  readonly version: string;
  /** Major version 6, with the flat bin/etc layout and no access subsystem */
  readonly isLegacyMajor: boolean;
}

/**
 * Archive saved by the fetcher, consumed by the installer.
 */
export interface DownloadedArchive {
  readonly localPath: string;
  readonly sourceUrl: string;
}

/**
 * Administrative access token. The value must never be logged.
 */
export interface AccessToken {
  readonly tokenValue: string;
  readonly audience: string;
}

/**
 * Sleep used between polling attempts; injected so tests run without delays.
 */
export type Sleep = (ms: number) => Promise<void>;
