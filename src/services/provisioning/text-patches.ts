/**
 * Literal text edits applied to files shipped with the server.
 *
 * Each patch matches exact substrings rather than parsing the document, so a
 * change in the shipped format shows up as a failed precondition.
 */

import { ConfigurationError } from "../errors.js";

export const ARCHIVE_INDEX_DISABLED = "<archiveIndexEnabled>false</archiveIndexEnabled>";
export const ARCHIVE_INDEX_ENABLED = "<archiveIndexEnabled>true</archiveIndexEnabled>";

/**
 * Turn on archive indexing in the server's XML configuration.
 * Precondition: the document contains ARCHIVE_INDEX_DISABLED.
 *
 * @throws ConfigurationError when the disabled element is absent
 */
export function enableArchiveIndex(configurationXml: string): string {
  if (!configurationXml.includes(ARCHIVE_INDEX_DISABLED)) {
    throw new ConfigurationError(
      "Failed setting the archive index property - attribute does not exist in configuration",
      "ARCHIVE_INDEX_ATTRIBUTE_MISSING"
    );
  }
  return configurationXml.replaceAll(ARCHIVE_INDEX_DISABLED, ARCHIVE_INDEX_ENABLED);
}

/**
 * Remove the `,,` case-conversion operator, which bash 3 (the macOS default) rejects.
 * No precondition: scripts without the operator come back unchanged.
 */
export function stripBash4CaseConversion(script: string): string {
  return script.replaceAll(",,", "");
}
