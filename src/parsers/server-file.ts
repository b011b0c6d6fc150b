import { readFileSync } from "node:fs";
import { extname } from "node:path";
import yaml from "js-yaml";
import { parse as parseJsonc, type ParseError } from "jsonc-parser";
import type { ServerConfig } from "../core/types.js";
import { InvalidServerConfigError } from "../core/errors.js";
import { createServerConfig, isRecord } from "../core/server-config.js";

/**
 * Server definition file, YAML or JSON(C):
 *
 *   command: npx
 *   args: ["-y", "@modelcontextprotocol/server-filesystem", "~/Documents"]
 *   env:
 *     LOG_LEVEL: info
 *
 * Numbers and booleans in args/env are stringified (YAML reads `PORT: 3000`
 * as a number); anything else is rejected.
 */
export function loadServerFile(filePath: string): ServerConfig {
  const raw = readFileSync(filePath, "utf-8");
  const parsed = isJsonFile(filePath) ? parseJsonFile(raw, filePath) : yaml.load(raw);
  return serverConfigFromDefinition(parsed, filePath);
}

export function serverConfigFromDefinition(value: unknown, source: string): ServerConfig {
  if (!isRecord(value)) {
    throw new InvalidServerConfigError(`Invalid server file: expected a mapping in ${source}`);
  }
  if (typeof value.command !== "string" || value.command.trim() === "") {
    throw new InvalidServerConfigError(`Invalid server file: "command" is required in ${source}`);
  }

  const args: string[] = [];
  if (value.args !== undefined) {
    if (!Array.isArray(value.args)) {
      throw new InvalidServerConfigError(`Invalid server file: "args" must be a list in ${source}`);
    }
    for (const arg of value.args) {
      args.push(scalarToString(arg, "args", source));
    }
  }

  const env: Record<string, string> = {};
  if (value.env !== undefined && value.env !== null) {
    if (!isRecord(value.env)) {
      throw new InvalidServerConfigError(`Invalid server file: "env" must be a mapping in ${source}`);
    }
    for (const [key, v] of Object.entries(value.env)) {
      env[key] = scalarToString(v, `env.${key}`, source);
    }
  }

  return createServerConfig({ command: value.command, args, env });
}

function scalarToString(value: unknown, field: string, source: string): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  throw new InvalidServerConfigError(
    `Invalid server file: "${field}" must be a string in ${source}`
  );
}

function isJsonFile(filePath: string): boolean {
  const ext = extname(filePath).toLowerCase();
  return ext === ".json" || ext === ".jsonc";
}

function parseJsonFile(raw: string, filePath: string): unknown {
  const errors: ParseError[] = [];
  const parsed: unknown = parseJsonc(raw, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    throw new InvalidServerConfigError(`Invalid server file: malformed JSON in ${filePath}`);
  }
  return parsed;
}
