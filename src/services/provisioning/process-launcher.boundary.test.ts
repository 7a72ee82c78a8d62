// @vitest-environment node
/**
 * Boundary tests for DefaultProcessLauncher over a real ExecaProcessRunner.
 * The windows branch runs a stand-in InstallService.bat through the host shell.
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { DefaultProcessLauncher } from "./process-launcher.js";
import { LEGACY_LAYOUT } from "./server-layout.js";
import { ExecaProcessRunner } from "../platform/process.js";
import { createEnvironmentMock } from "../platform/environment.state-mock.js";
import { createSilentLogger } from "../logging/logging.test-utils.js";
import { createTempDir } from "../test-utils.js";

const TEST_TIMEOUT = process.env.CI ? 30_000 : 10_000;

const SCRIPT =
  process.platform === "win32"
    ? "@echo off\r\necho started> started.txt\r\n"
    : "#!/bin/sh\necho started > started.txt\n";

function hostEnvironment(): Record<string, string> {
  return Object.fromEntries(
    Object.entries(process.env).filter(
      (entry): entry is [string, string] => entry[1] !== undefined
    )
  );
}

describe("DefaultProcessLauncher (boundary)", () => {
  let tempDir: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  it(
    "runs InstallService.bat from a home whose path contains a space",
    async () => {
      const home = join(tempDir.path, "John Smith", "jfrog_home");
      const binDir = join(home, "artifactory", "bin");
      await mkdir(binDir, { recursive: true });
      await writeFile(join(binDir, "InstallService.bat"), SCRIPT, { mode: 0o755 });
      const launcher = new DefaultProcessLauncher(
        new ExecaProcessRunner(createSilentLogger()),
        createEnvironmentMock(hostEnvironment()),
        createSilentLogger()
      );

      await launcher.launch(home, LEGACY_LAYOUT, "windows");

      expect((await readFile(join(binDir, "started.txt"), "utf-8")).trim()).toBe("started");
    },
    TEST_TIMEOUT
  );

  it(
    "reports the script path when the script is missing",
    async () => {
      const home = join(tempDir.path, "John Smith", "jfrog_home");
      await mkdir(join(home, "artifactory", "bin"), { recursive: true });
      const launcher = new DefaultProcessLauncher(
        new ExecaProcessRunner(createSilentLogger()),
        createEnvironmentMock(hostEnvironment()),
        createSilentLogger()
      );

      await expect(launcher.launch(home, LEGACY_LAYOUT, "windows")).rejects.toThrow(
        `${join(home, "artifactory", "bin", "InstallService.bat")} exited with code`
      );
    },
    TEST_TIMEOUT
  );
});
