/**
 * Test utilities for service tests.
 * These helpers create temporary directories with automatic cleanup.
 */

import { mkdtemp, rm, realpath } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a temporary directory with automatic cleanup.
 * Uses realpath to resolve symlinked temp roots (e.g. /var -> /private/var on macOS).
 * @returns Object with path and cleanup function
 */
export async function createTempDir(): Promise<{
  path: string;
  cleanup: () => Promise<void>;
}> {
  const tempPath = await mkdtemp(join(tmpdir(), "local-rt-setup-test-"));
  const resolvedPath = await realpath(tempPath);
  return {
    path: resolvedPath,
    cleanup: async () => {
      await rm(resolvedPath, {
        recursive: true,
        force: true,
        maxRetries: 5,
        retryDelay: 200,
      });
    },
  };
}

/**
 * Run a test function with a temporary directory.
 * The directory is automatically cleaned up after the test,
 * even if the test fails.
 *
 * @param fn Test function that receives the directory path
 */
export async function withTempDir(fn: (dirPath: string) => Promise<void>): Promise<void> {
  const { path, cleanup } = await createTempDir();
  try {
    await fn(path);
  } finally {
    await cleanup();
  }
}
