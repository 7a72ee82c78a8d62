/**
 * Well-known paths of an installation, relative to the home directory.
 *
 * Legacy (major 6) and modern (7+) installs differ in layout and in which
 * provisioning steps apply; everything that differs is resolved here once.
 */

/** Canonical name of the extracted installation directory. */
export const INSTALL_DIR_NAME = "artifactory";

/** Prefix of the directory the release archive unpacks to. */
export const EXTRACTED_DIR_PREFIX = "artifactory-pro-";

interface BaseLayout {
  /** Directory holding the start scripts */
  readonly binDir: string;
  /** License file written before the first start */
  readonly licenseFile: string;
}

export interface LegacyServerLayout extends BaseLayout {
  readonly kind: "legacy";
}

export interface ModernServerLayout extends BaseLayout {
  readonly kind: "modern";
  /** Runtime data directory; needs permissive modes on mac */
  readonly varDir: string;
  /** Shell helper that needs bash 3 fixes on mac */
  readonly commonScript: string;
  readonly systemConfigFile: string;
  readonly systemPropertiesFile: string;
  readonly accessImportFile: string;
  /** Empty file whose presence makes the server generate a bootstrap token */
  readonly tokenTriggerFile: string;
  /** Bootstrap token the server writes after seeing the trigger file */
  readonly generatedTokenFile: string;
}

export type ServerLayout = LegacyServerLayout | ModernServerLayout;

export const LEGACY_LAYOUT = {
  kind: "legacy",
  binDir: "artifactory/bin",
  licenseFile: "artifactory/etc/artifactory.lic",
} as const satisfies LegacyServerLayout;

export const MODERN_LAYOUT = {
  kind: "modern",
  binDir: "artifactory/app/bin",
  licenseFile: "artifactory/var/etc/artifactory/artifactory.cluster.license",
  varDir: "artifactory/var",
  commonScript: "artifactory/app/bin/artifactoryCommon.sh",
  systemConfigFile: "artifactory/var/etc/system.yaml",
  systemPropertiesFile: "artifactory/var/etc/artifactory/artifactory.system.properties",
  accessImportFile: "artifactory/var/etc/access/access.config.import.yml",
  tokenTriggerFile: "artifactory/var/bootstrap/etc/access/keys/generate.token.json",
  generatedTokenFile: "artifactory/var/etc/access/keys/token.json",
} as const satisfies ModernServerLayout;

export function resolveServerLayout(isLegacyMajor: boolean): ServerLayout {
  return isLegacyMajor ? LEGACY_LAYOUT : MODERN_LAYOUT;
}
