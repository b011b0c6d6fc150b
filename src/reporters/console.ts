// Console reporter utilities: shared formatting for CLI output.
// Individual commands handle their own output; this module provides reusable helpers.

import chalk from "chalk";
import type { ServerConfig } from "../core/types.js";
import type { ConfigDiffEntry } from "../core/differ.js";
import { formatTimestamp } from "../core/config-manager.js";

const noColor = !!process.env.NO_COLOR;

export function clientLabel(name: string): string {
  return noColor ? name : chalk.cyan.bold(name);
}

export function serverLabel(name: string): string {
  return noColor ? name : chalk.yellow(name);
}

export function snapshotIdLabel(id: string): string {
  return noColor ? id : chalk.magenta(id);
}

export function timestampLabel(iso: string): string {
  const text = formatTimestamp(iso);
  return noColor ? text : chalk.dim(text);
}

/** "npx -y @scope/server /tmp" */
export function commandLine(config: ServerConfig): string {
  const args = config.args.join(" ");
  if (noColor) return args ? `${config.command} ${args}` : config.command;
  return args ? `${chalk.green(config.command)} ${chalk.dim(args)}` : chalk.green(config.command);
}

const ENTRY_BADGES: Record<ConfigDiffEntry["type"], string> = {
  "command-changed": "~",
  "args-changed": "~",
  "env-modified": "~",
  "env-added": "+",
  "env-removed": "-",
};

export function printDiffEntries(entries: ConfigDiffEntry[], indent = "  "): void {
  for (const entry of entries) {
    const badge = ENTRY_BADGES[entry.type];
    const colored = noColor
      ? badge
      : badge === "+"
        ? chalk.green(badge)
        : badge === "-"
          ? chalk.red(badge)
          : chalk.yellow(badge);
    console.log(`${indent}${colored} ${entry.detail}`);
  }
}

export function printEnv(env: Readonly<Record<string, string>>, indent: string): void {
  for (const key of Object.keys(env).sort()) {
    console.log(`${indent}${noColor ? key : chalk.cyan(key)}: ${env[key]}`);
  }
}
