import { InvalidVersionError } from "../errors.js";
import { LATEST_VERSION } from "../config/index.js";

/** Oldest supported major version; it is also the only legacy-layout major. */
export const MIN_SUPPORTED_MAJOR = 6;

const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

export interface VersionSelector {
  readonly version: string;
  readonly isLegacyMajor: boolean;
}

/**
 * Validate a version selector and classify its layout.
 * The latest-release sentinel always resolves to the modern layout.
 *
 * @throws InvalidVersionError when the selector is neither the sentinel nor X.Y.Z with X >= 6
 */
export function parseVersionSelector(raw: string): VersionSelector {
  if (raw === LATEST_VERSION) {
    return { version: raw, isLegacyMajor: false };
  }

  const match = VERSION_PATTERN.exec(raw);
  if (match === null || match[1] === undefined) {
    throw new InvalidVersionError(
      `The Artifactory version is invalid: "${raw}". It must be ${LATEST_VERSION} or match this format: X.X.X`
    );
  }

  const major = Number.parseInt(match[1], 10);
  if (major < MIN_SUPPORTED_MAJOR) {
    throw new InvalidVersionError(
      `Artifactory ${raw} is not supported. This tool supports Artifactory ${MIN_SUPPORTED_MAJOR} or higher`,
      "UNSUPPORTED_MAJOR"
    );
  }

  return { version: raw, isLegacyMajor: major === MIN_SUPPORTED_MAJOR };
}
