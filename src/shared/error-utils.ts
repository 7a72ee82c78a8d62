/**
 * Error helpers shared by services and the CLI entry point.
 */

/**
 * Extract a message string from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Wrap an unknown thrown value in an Error, keeping Error instances as they are.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
