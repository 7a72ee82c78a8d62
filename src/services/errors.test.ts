// @vitest-environment node
import { describe, it, expect } from "vitest";
import {
  ServiceError,
  ConfigurationError,
  AlreadyProvisionedError,
  UnsupportedPlatformError,
  DownloadError,
  LaunchError,
  ConnectionTimeoutError,
  FileSystemError,
  isServiceError,
  isFileSystemErrorWithCode,
  getErrorMessage,
} from "./errors.js";

describe("ServiceError", () => {
  describe("ConfigurationError", () => {
    it("has correct type", () => {
      const error = new ConfigurationError("No license provided");
      expect(error.type).toBe("configuration");
    });

    it("is instanceof ServiceError and Error", () => {
      const error = new ConfigurationError("test");
      expect(error).toBeInstanceOf(ServiceError);
      expect(error).toBeInstanceOf(Error);
    });

    it("serializes without code when not provided", () => {
      const error = new ConfigurationError("No license provided");

      expect(error.toJSON()).toEqual({
        type: "configuration",
        message: "No license provided",
      });
    });

    it("serializes with code when provided", () => {
      const error = new ConfigurationError("Unknown flag", "UNKNOWN_FLAG");

      expect(error.toJSON()).toEqual({
        type: "configuration",
        message: "Unknown flag",
        code: "UNKNOWN_FLAG",
      });
    });
  });

  describe("AlreadyProvisionedError", () => {
    it("names the existing installation directory", () => {
      const error = new AlreadyProvisionedError("/home/ci/jfrog_home/artifactory");

      expect(error.installDir).toBe("/home/ci/jfrog_home/artifactory");
      expect(error.message).toBe(
        "Artifactory dir already exists in home directory: /home/ci/jfrog_home/artifactory"
      );
      expect(error.name).toBe("AlreadyProvisionedError");
    });
  });

  describe("UnsupportedPlatformError", () => {
    it("carries the rejected platform", () => {
      const error = new UnsupportedPlatformError("freebsd");

      expect(error.platform).toBe("freebsd");
      expect(error.type).toBe("unsupported-platform");
    });
  });

  describe("DownloadError", () => {
    it("uses the HTTP status as code", () => {
      const error = new DownloadError("HTTP 404", 404);

      expect(error.status).toBe(404);
      expect(error.code).toBe("404");
    });

    it("has no code for transport failures", () => {
      const error = new DownloadError("connection refused");

      expect(error.status).toBeNull();
      expect(error.code).toBeUndefined();
    });
  });

  describe("LaunchError", () => {
    it("uses the exit code as code", () => {
      const error = new LaunchError("start failed", 3);

      expect(error.exitCode).toBe(3);
      expect(error.toJSON()).toEqual({ type: "launch", message: "start failed", code: "3" });
    });
  });

  describe("ConnectionTimeoutError", () => {
    it("records the number of attempts", () => {
      const error = new ConnectionTimeoutError("Could not connect to Artifactory", 30);

      expect(error.attempts).toBe(30);
      expect(error.type).toBe("connection-timeout");
    });
  });

  describe("FileSystemError", () => {
    it("serializes path and fs code", () => {
      const error = new FileSystemError("ENOENT", "/missing", "File not found");

      expect(error.toJSON()).toEqual({
        type: "filesystem",
        message: "File not found",
        path: "/missing",
        code: "ENOENT",
      });
    });
  });
});

describe("isServiceError", () => {
  it("returns true for service errors", () => {
    expect(isServiceError(new ConfigurationError("x"))).toBe(true);
  });

  it("returns false for plain errors", () => {
    expect(isServiceError(new Error("x"))).toBe(false);
  });
});

describe("isFileSystemErrorWithCode", () => {
  it("matches the fs code", () => {
    const error = new FileSystemError("ENOENT", "/missing", "File not found");

    expect(isFileSystemErrorWithCode(error, "ENOENT")).toBe(true);
    expect(isFileSystemErrorWithCode(error, "EACCES")).toBe(false);
  });

  it("rejects other errors", () => {
    expect(isFileSystemErrorWithCode(new Error("ENOENT"), "ENOENT")).toBe(false);
  });
});

describe("getErrorMessage", () => {
  it("returns the message of an Error", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
  });

  it("stringifies other values", () => {
    expect(getErrorMessage(42)).toBe("42");
  });
});
