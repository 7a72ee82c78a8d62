/**
 * Platform layer exports.
 *
 * Platform layers abstract OS/runtime-specific operations
 * (filesystem, HTTP, processes, environment variables, host information).
 */

export { DefaultFileSystemLayer, DEFAULT_FILE_MODE } from "./filesystem.js";
export type {
  FileSystemLayer,
  FileSystemErrorCode,
  DirEntry,
  RmOptions,
  WriteOptions,
  ChmodOptions,
} from "./filesystem.js";

export { DefaultNetworkLayer, basicAuth, bearerAuth, discardBody } from "./network.js";
export type { HttpClient, HttpMethod, HttpRequestOptions, NetworkLayerConfig } from "./network.js";

export { ExecaProcessRunner } from "./process.js";
export type { ProcessRunner, SpawnedProcess, ProcessOptions, ProcessResult } from "./process.js";

export { ProcessEnvironmentLayer } from "./environment.js";
export type { EnvironmentLayer } from "./environment.js";

export { NodePlatformInfo } from "./platform-info.js";
export type { PlatformInfo } from "./platform-info.js";
