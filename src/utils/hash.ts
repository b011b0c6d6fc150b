import { createHash } from "node:crypto";
import { HASH_ALGORITHM, SNAPSHOT_ID_LENGTH } from "./constants.js";

/**
 * Hash a value deterministically using canonical JSON serialization.
 * Objects are sorted by key so property order never changes the result.
 */
export function hashValue(value: unknown): string {
  const canonical = canonicalize(value);
  return `${HASH_ALGORITHM}:${createHash(HASH_ALGORITHM).update(canonical).digest("hex")}`;
}

/**
 * Short hex digest used as a human-typeable identifier.
 */
export function shortHash(value: unknown): string {
  return hashValue(value)
    .slice(HASH_ALGORITHM.length + 1)
    .slice(0, SNAPSHOT_ID_LENGTH);
}

/**
 * Canonical JSON: sorted keys, no whitespace, deterministic output.
 */
export function canonicalize(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean")
    return String(value);

  if (Array.isArray(value)) {
    return "[" + value.map(canonicalize).join(",") + "]";
  }

  if (typeof value === "object") {
    const sorted = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, v]) => JSON.stringify(key) + ":" + canonicalize(v));
    return "{" + sorted.join(",") + "}";
  }

  return String(value);
}
