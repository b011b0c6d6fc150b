import * as semver from "semver";
import { VersionParseError } from "./errors.js";

/**
 * Version requirement as written in server metadata or on the command line.
 *
 *   "1.2.3" / "=1.2.3"  exact
 *   ">=1.2.3"           minimum
 *   "^1.2.3"            compatible (same major, >=)
 *   "~1.2.3"            approximate (same major.minor, >=)
 *   "", "*", "any"      any
 *   anything else       custom semver range (e.g. ">=1.0.0 <2.0.0")
 */
export type VersionRequirement =
  | { kind: "exact"; version: semver.SemVer }
  | { kind: "minimum"; version: semver.SemVer }
  | { kind: "compatible"; version: semver.SemVer }
  | { kind: "approximate"; version: semver.SemVer }
  | { kind: "custom"; range: semver.Range }
  | { kind: "any" };

const PREFIXES = [
  [">=", "minimum"],
  ["^", "compatible"],
  ["~", "approximate"],
  ["=", "exact"],
] as const;

export function parseVersionRequirement(input: string): VersionRequirement {
  const trimmed = input.trim();
  if (trimmed === "" || trimmed === "*" || trimmed === "any") {
    return { kind: "any" };
  }

  const prefixed = PREFIXES.find(([prefix]) => trimmed.startsWith(prefix));
  if (prefixed) {
    const [prefix, kind] = prefixed;
    const version = semver.parse(trimmed.slice(prefix.length).trim());
    // ">=1.0.0 <2.0.0" and friends fall through to a range
    if (version) return { kind, version };
  }

  const exact = semver.parse(trimmed);
  if (exact) return { kind: "exact", version: exact };

  try {
    return { kind: "custom", range: new semver.Range(trimmed) };
  } catch {
    throw new VersionParseError(`Invalid version requirement '${input}'`);
  }
}

export function matchesRequirement(
  requirement: VersionRequirement,
  version: semver.SemVer
): boolean {
  switch (requirement.kind) {
    case "exact":
      return semver.eq(version, requirement.version);
    case "minimum":
      return semver.gte(version, requirement.version);
    case "compatible":
      return (
        version.major === requirement.version.major &&
        semver.gte(version, requirement.version)
      );
    case "approximate":
      return (
        version.major === requirement.version.major &&
        version.minor === requirement.version.minor &&
        semver.gte(version, requirement.version)
      );
    case "custom":
      return requirement.range.test(version);
    case "any":
      return true;
  }
}

export function formatRequirement(requirement: VersionRequirement): string {
  switch (requirement.kind) {
    case "exact":
      return `=${requirement.version.version}`;
    case "minimum":
      return `>=${requirement.version.version}`;
    case "compatible":
      return `^${requirement.version.version}`;
    case "approximate":
      return `~${requirement.version.version}`;
    case "custom":
      return requirement.range.range;
    case "any":
      return "*";
  }
}

/**
 * Parse a version string, tolerating surrounding whitespace and a leading "v"
 * (as printed by `node --version`).
 */
export function parseVersion(input: string): semver.SemVer {
  const cleaned = input.trim().replace(/^v/, "");
  return strictVersion(cleaned, input);
}

export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  return semver.compare(parseVersion(a), parseVersion(b));
}

export function satisfiesVersion(installed: string, requirement: string): boolean {
  return matchesRequirement(parseVersionRequirement(requirement), parseVersion(installed));
}

function strictVersion(value: string, original = value): semver.SemVer {
  const parsed = semver.parse(value);
  if (!parsed) {
    throw new VersionParseError(`Invalid version '${original}'`);
  }
  return parsed;
}
