import { randomBytes } from "node:crypto";
import { copyFileSync, existsSync, mkdirSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { BACKUP_SUFFIX, SECURE_FILE_MODE } from "./constants.js";

/**
 * Write a file atomically: contents go to a temp file in the same directory,
 * which is then renamed over the target. Owner-only permissions (0600).
 */
export function writeFileAtomic(targetPath: string, contents: string): void {
  const dir = dirname(targetPath);
  mkdirSync(dir, { recursive: true });

  const tempPath = join(
    dir,
    `.${basename(targetPath)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`
  );

  try {
    writeFileSync(tempPath, contents, { encoding: "utf-8", mode: SECURE_FILE_MODE });
    renameSync(tempPath, targetPath);
  } catch (err) {
    rmSync(tempPath, { force: true });
    throw err;
  }
}

/**
 * Copy an existing file to `<path>.backup`. Returns the backup path,
 * or null when there was nothing to back up.
 */
export function backupFile(targetPath: string): string | null {
  if (!existsSync(targetPath)) return null;
  const backupPath = targetPath + BACKUP_SUFFIX;
  copyFileSync(targetPath, backupPath);
  return backupPath;
}

/**
 * JSON.parse that drops prototype pollution payloads.
 */
export function parseJsonSafe(raw: string): unknown {
  return JSON.parse(raw, (key, value: unknown) => {
    if (key === "__proto__" || key === "constructor" || key === "prototype") {
      return undefined;
    }
    return value;
  });
}
