import { describe, it, expect } from "vitest";
import { parseVersionSelector } from "./version.js";
import { InvalidVersionError } from "../errors.js";

describe("parseVersionSelector", () => {
  it("accepts the latest-release sentinel as modern", () => {
    expect(parseVersionSelector("[RELEASE]")).toEqual({
      version: "[RELEASE]",
      isLegacyMajor: false,
    });
  });

  it("classifies major 6 as legacy", () => {
    expect(parseVersionSelector("6.23.1")).toEqual({ version: "6.23.1", isLegacyMajor: true });
  });

  it.each(["7.0.0", "7.55.10", "10.1.2"])("classifies %s as modern", (version) => {
    expect(parseVersionSelector(version)).toEqual({ version, isLegacyMajor: false });
  });

  it.each(["", "7", "7.55", "7.55.10.1", "v7.55.10", "7.x.1", "7.55.10-rc1", " 7.55.10", "latest"])(
    "rejects malformed selector %j",
    (version) => {
      expect(() => parseVersionSelector(version)).toThrow(InvalidVersionError);
    }
  );

  it("rejects majors below 6", () => {
    expect(() => parseVersionSelector("5.11.0")).toThrow(
      "Artifactory 5.11.0 is not supported. This tool supports Artifactory 6 or higher"
    );
  });
});
