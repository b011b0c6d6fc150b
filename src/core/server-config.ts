import type { ServerConfig } from "./types.js";
import { InvalidServerConfigError } from "./errors.js";
import { canonicalize } from "../utils/hash.js";

export interface ServerConfigInput {
  command: string;
  args?: readonly string[];
  env?: Readonly<Record<string, string>>;
}

/**
 * Build an immutable ServerConfig. Inputs are copied, so later mutation of
 * the caller's arrays or objects never leaks into recorded history.
 */
export function createServerConfig(input: ServerConfigInput): ServerConfig {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(input.env ?? {})) {
    env[key] = value;
  }
  return Object.freeze({
    command: input.command,
    args: Object.freeze([...(input.args ?? [])]),
    env: Object.freeze(env),
  });
}

/**
 * Structural equality. Env key order is irrelevant; args order is not.
 */
export function serverConfigsEqual(a: ServerConfig, b: ServerConfig): boolean {
  return canonicalize(a) === canonicalize(b);
}

/**
 * Normalize an untrusted JSON value into a ServerConfig.
 * Returns null when there is no string `command` (e.g. URL transports).
 * Non-string args and env values are dropped.
 */
export function parseServerConfig(value: unknown): ServerConfig | null {
  if (!isRecord(value)) return null;
  if (typeof value.command !== "string") return null;

  const args = Array.isArray(value.args)
    ? value.args.filter((a): a is string => typeof a === "string")
    : [];

  const env: Record<string, string> = {};
  if (isRecord(value.env)) {
    for (const [key, v] of Object.entries(value.env)) {
      if (typeof v === "string") env[key] = v;
    }
  }

  return createServerConfig({ command: value.command, args, env });
}

/**
 * Plain JSON shape for writing into client files and history.
 */
export function serverConfigToJson(config: ServerConfig): {
  command: string;
  args: string[];
  env: Record<string, string>;
} {
  return { command: config.command, args: [...config.args], env: { ...config.env } };
}

/**
 * Reject configs no client can run. Throws InvalidServerConfigError.
 */
export function validateServerConfig(config: ServerConfig): void {
  if (config.command.trim() === "") {
    throw new InvalidServerConfigError("Server command cannot be empty");
  }
  for (const key of Object.keys(config.env)) {
    if (key === "") {
      throw new InvalidServerConfigError("Environment variable name cannot be empty");
    }
    if (key.includes("=")) {
      throw new InvalidServerConfigError(
        `Environment variable name cannot contain '=': ${key}`
      );
    }
  }
}

export interface EnvVarIssue {
  key: string;
  message: string;
}

const ENV_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Advisory checks on env vars: portable names, non-empty values, and no
 * shell expansion syntax (clients pass values through verbatim).
 */
export function checkEnvVars(env: Readonly<Record<string, string>>): EnvVarIssue[] {
  const issues: EnvVarIssue[] = [];
  for (const key of Object.keys(env).sort()) {
    const value = env[key] ?? "";
    if (!ENV_NAME_PATTERN.test(key)) {
      issues.push({ key, message: `Invalid environment variable name: ${key}` });
    }
    if (value.trim() === "") {
      issues.push({ key, message: "Environment variable value is empty" });
    }
    if (value.includes("$(") || value.includes("${") || value.includes("`")) {
      issues.push({
        key,
        message: "Environment variable contains shell expansion characters",
      });
    }
  }
  return issues;
}

/**
 * Parse KEY=VALUE pairs (CLI `--env`). The first "=" splits; values may contain "=".
 */
export function parseEnvPairs(pairs: readonly string[]): Record<string, string> {
  const env: Record<string, string> = {};
  for (const pair of pairs) {
    const idx = pair.indexOf("=");
    if (idx <= 0) {
      throw new InvalidServerConfigError(
        `Invalid env entry "${pair}": expected KEY=VALUE`
      );
    }
    env[pair.slice(0, idx)] = pair.slice(idx + 1);
  }
  return env;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
