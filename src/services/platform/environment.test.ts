import { describe, it, expect } from "vitest";
import { ProcessEnvironmentLayer } from "./environment.js";
import { createEnvironmentMock } from "./environment.state-mock.js";
import { createMockLogger, createSilentLogger } from "../logging/logging.test-utils.js";

describe("ProcessEnvironmentLayer", () => {
  it("reads variables and treats empty values as unset", () => {
    const layer = new ProcessEnvironmentLayer(
      { JFROG_HOME: "/home/ci/jfrog_home", GITHUB_ENV: "" },
      createSilentLogger()
    );

    expect(layer.get("JFROG_HOME")).toBe("/home/ci/jfrog_home");
    expect(layer.get("GITHUB_ENV")).toBeUndefined();
    expect(layer.get("MISSING")).toBeUndefined();
  });

  it("writes through to the backing object", () => {
    const env: NodeJS.ProcessEnv = {};
    const layer = new ProcessEnvironmentLayer(env, createSilentLogger());

    layer.set("JFROG_HOME", "/home/ci/jfrog_home");

    expect(env["JFROG_HOME"]).toBe("/home/ci/jfrog_home");
  });

  it("removes variables and logs only the name", () => {
    const env: NodeJS.ProcessEnv = { RTLIC: "test-license" };
    const logger = createMockLogger();
    const layer = new ProcessEnvironmentLayer(env, logger);

    layer.unset("RTLIC");

    expect("RTLIC" in env).toBe(false);
    expect(logger.debug).toHaveBeenCalledWith("Unset", { name: "RTLIC" });
  });

  it("ignores unset of a missing variable", () => {
    const logger = createMockLogger();
    const layer = new ProcessEnvironmentLayer({}, logger);

    layer.unset("RTLIC");

    expect(logger.debug).not.toHaveBeenCalled();
  });

  it("returns a detached copy for child processes", () => {
    const env: NodeJS.ProcessEnv = { A: "1" };
    const layer = new ProcessEnvironmentLayer(env, createSilentLogger());

    const copy = layer.toProcessEnv();
    copy["A"] = "2";

    expect(env["A"]).toBe("1");
  });
});

describe("createEnvironmentMock", () => {
  it("tracks values and unset calls", () => {
    const env = createEnvironmentMock({ RTLIC: "test-license" });

    env.set("JFROG_HOME", "/home/test/jfrog_home");
    env.unset("RTLIC");

    expect(env.get("JFROG_HOME")).toBe("/home/test/jfrog_home");
    expect(env.get("RTLIC")).toBeUndefined();
    expect(env.$.unsetCalls).toEqual(["RTLIC"]);
    expect(env.$.toString()).toBe("Environment(JFROG_HOME)");
  });
});
