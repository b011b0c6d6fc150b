import { spawnSync } from "node:child_process";
import { formatRequirement, matchesRequirement, parseVersion, parseVersionRequirement } from "../core/version.js";
import { DEFAULT_PROBE_TIMEOUT_MS } from "../utils/constants.js";

export interface DependencySpec {
  name: string;
  /** Commands tried in order; the first that runs wins */
  commands: string[];
  versionArgs: string[];
  /** Requirement expression (see parseVersionRequirement); empty = any */
  requirement: string;
}

export type DependencyStatus =
  | { state: "installed"; version: string; command: string }
  | { state: "missing" }
  | { state: "version-mismatch"; version: string; required: string; command: string };

export interface DependencyCheck {
  name: string;
  status: DependencyStatus;
}

/**
 * Runs a command and returns stdout followed by stderr. Throws if it cannot
 * be started.
 */
export type CommandRunner = (command: string, args: string[]) => string;

export const defaultRunner: CommandRunner = (command, args) => {
  const result = spawnSync(command, args, {
    encoding: "utf-8",
    stdio: ["ignore", "pipe", "pipe"],
    timeout: DEFAULT_PROBE_TIMEOUT_MS,
    shell: process.platform === "win32",
  });
  if (result.error) throw result.error;
  // Some tools (python2, older docker) print their version on stderr
  return result.stdout + result.stderr;
};

export function builtinDependencies(requirements: {
  node?: string;
  python?: string;
  docker?: string;
}): DependencySpec[] {
  return [
    { name: "Node.js", commands: ["node"], versionArgs: ["--version"], requirement: requirements.node ?? "" },
    { name: "npx", commands: ["npx"], versionArgs: ["--version"], requirement: "" },
    {
      name: "Python",
      commands: ["python3", "python"],
      versionArgs: ["--version"],
      requirement: requirements.python ?? "",
    },
    { name: "Docker", commands: ["docker"], versionArgs: ["--version"], requirement: requirements.docker ?? "" },
  ];
}

/**
 * Pull the first dotted version out of tool output, padded to three parts:
 *   "v20.11.1"                       → "20.11.1"
 *   "Python 3.12.1"                  → "3.12.1"
 *   "Docker version 24.0.7, build x" → "24.0.7"
 *   "10.2"                           → "10.2.0"
 */
export function extractVersion(output: string): string | null {
  const match = /(\d+)\.(\d+)(?:\.(\d+))?/.exec(output);
  if (!match) return null;
  const [, major, minor, patch] = match;
  return `${major}.${minor}.${patch ?? "0"}`;
}

export function checkDependency(
  spec: DependencySpec,
  runner: CommandRunner = defaultRunner
): DependencyCheck {
  const requirement = parseVersionRequirement(spec.requirement);

  for (const command of spec.commands) {
    let output: string;
    try {
      output = runner(command, spec.versionArgs);
    } catch {
      // Not on PATH or not runnable; try the next candidate
      continue;
    }

    const version = extractVersion(output);
    if (!version) continue;

    if (matchesRequirement(requirement, parseVersion(version))) {
      return { name: spec.name, status: { state: "installed", version, command } };
    }
    return {
      name: spec.name,
      status: {
        state: "version-mismatch",
        version,
        required: formatRequirement(requirement),
        command,
      },
    };
  }

  return { name: spec.name, status: { state: "missing" } };
}
