import type { ServerConfig } from "./types.js";

export interface ConfigDiffEntry {
  type:
    | "command-changed"
    | "args-changed"
    | "env-modified"
    | "env-added"
    | "env-removed";
  /** Env var name, for env-* entries */
  key?: string;
  detail: string;
  oldValue?: string;
  newValue?: string;
}

/**
 * Compare two server configs.
 *
 * Entry order is fixed: command, arguments, then env vars as
 * modified → added → removed, each group sorted by key.
 */
export function computeConfigDiff(
  oldConfig: ServerConfig,
  newConfig: ServerConfig
): ConfigDiffEntry[] {
  const entries: ConfigDiffEntry[] = [];

  if (oldConfig.command !== newConfig.command) {
    entries.push({
      type: "command-changed",
      detail: `Command: ${oldConfig.command} → ${newConfig.command}`,
      oldValue: oldConfig.command,
      newValue: newConfig.command,
    });
  }

  if (!sameArgs(oldConfig.args, newConfig.args)) {
    const oldArgs = JSON.stringify(oldConfig.args);
    const newArgs = JSON.stringify(newConfig.args);
    entries.push({
      type: "args-changed",
      detail: `Arguments: ${oldArgs} → ${newArgs}`,
      oldValue: oldArgs,
      newValue: newArgs,
    });
  }

  const oldEnv = oldConfig.env;
  const newEnv = newConfig.env;
  const oldKeys = Object.keys(oldEnv).sort();
  const newKeys = Object.keys(newEnv).sort();

  for (const key of oldKeys) {
    if (!Object.hasOwn(newEnv, key)) continue;
    if (oldEnv[key] !== newEnv[key]) {
      entries.push({
        type: "env-modified",
        key,
        detail: `Modified env var ${key}: ${oldEnv[key]} → ${newEnv[key]}`,
        oldValue: oldEnv[key],
        newValue: newEnv[key],
      });
    }
  }

  for (const key of newKeys) {
    if (Object.hasOwn(oldEnv, key)) continue;
    entries.push({
      type: "env-added",
      key,
      detail: `Added env var: ${key}=${newEnv[key]}`,
      newValue: newEnv[key],
    });
  }

  for (const key of oldKeys) {
    if (Object.hasOwn(newEnv, key)) continue;
    entries.push({
      type: "env-removed",
      key,
      detail: `Removed env var: ${key}`,
      oldValue: oldEnv[key],
    });
  }

  return entries;
}

/**
 * Human-readable change list between two configs. Empty when equal.
 */
export function diffConfigs(oldConfig: ServerConfig, newConfig: ServerConfig): string[] {
  return computeConfigDiff(oldConfig, newConfig).map((e) => e.detail);
}

function sameArgs(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((arg, i) => arg === b[i]);
}
