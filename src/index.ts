// Public API for programmatic usage
export { ConfigManager, type ConfigManagerOptions } from "./core/config-manager.js";
export { SnapshotStore, type HistoryEntry } from "./core/snapshot-store.js";
export { computeConfigDiff, diffConfigs } from "./core/differ.js";
export {
  createServerConfig,
  serverConfigsEqual,
  validateServerConfig,
  checkEnvVars,
} from "./core/server-config.js";
export {
  parseVersionRequirement,
  matchesRequirement,
  formatRequirement,
  parseVersion,
  compareVersions,
  satisfiesVersion,
} from "./core/version.js";
export * from "./core/errors.js";
export { ClientRegistry, createDefaultRegistry } from "./clients/registry.js";
export { JsonFileClient } from "./clients/json-file-client.js";
export { CLIENT_DEFINITIONS } from "./clients/definitions.js";
export {
  detectPlatformContext,
  resolveDataDir,
  resolveHistoryFile,
  findExecutable,
} from "./clients/platform.js";
export { loadServerFile } from "./parsers/server-file.js";
export { detectServerType, parseNpmPackage, serverConfigForPackage } from "./parsers/package-spec.js";
export { checkDependency, builtinDependencies, extractVersion } from "./deps/probe.js";
export type { ServerConfig, ConfigSnapshot, ClientAdapter } from "./core/types.js";
export type { ConfigDiffEntry } from "./core/differ.js";
export type { VersionRequirement } from "./core/version.js";
export type { RegisteredClient } from "./clients/registry.js";
export type { ClientDefinition } from "./clients/json-file-client.js";
export type { PlatformContext } from "./clients/platform.js";
export type { ServerType, NpmPackage } from "./parsers/package-spec.js";
export type { DependencySpec, DependencyCheck, DependencyStatus, CommandRunner } from "./deps/probe.js";
