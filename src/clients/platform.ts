import { existsSync } from "node:fs";
import { homedir, platform } from "node:os";
import { win32, posix } from "node:path";
import { APP_NAME, ENV_DATA_DIR, HISTORY_DIR, HISTORY_FILE } from "../utils/constants.js";

/**
 * Everything path resolution depends on. Built once at the CLI boundary;
 * tests construct their own instead of touching real env vars.
 */
export interface PlatformContext {
  platform: NodeJS.Platform;
  homeDir: string;
  env: Readonly<Record<string, string | undefined>>;
  cwd: string;
}

export function detectPlatformContext(): PlatformContext {
  return {
    platform: platform(),
    homeDir: homedir(),
    env: process.env,
    cwd: process.cwd(),
  };
}

/**
 * path.join flavour matching the target platform, so Windows paths resolve
 * correctly even when computed elsewhere (and vice versa).
 */
export function joinFor(ctx: PlatformContext, ...parts: string[]): string {
  return ctx.platform === "win32" ? win32.join(...parts) : posix.join(...parts);
}

export function dirnameFor(ctx: PlatformContext, path: string): string {
  return ctx.platform === "win32" ? win32.dirname(path) : posix.dirname(path);
}

/** %APPDATA%, falling back to ~/AppData/Roaming */
export function appDataDir(ctx: PlatformContext): string {
  return ctx.env.APPDATA || joinFor(ctx, ctx.homeDir, "AppData", "Roaming");
}

/** $XDG_CONFIG_HOME, falling back to ~/.config */
export function xdgConfigDir(ctx: PlatformContext): string {
  return ctx.env.XDG_CONFIG_HOME || joinFor(ctx, ctx.homeDir, ".config");
}

/**
 * Per-user data directory for this tool.
 */
export function resolveDataDir(ctx: PlatformContext): string {
  const override = ctx.env[ENV_DATA_DIR];
  if (override) return override;

  switch (ctx.platform) {
    case "darwin":
      return joinFor(ctx, ctx.homeDir, "Library", "Application Support", APP_NAME);
    case "win32":
      return joinFor(ctx, appDataDir(ctx), APP_NAME, "data");
    default:
      return joinFor(
        ctx,
        ctx.env.XDG_DATA_HOME || joinFor(ctx, ctx.homeDir, ".local", "share"),
        APP_NAME
      );
  }
}

export function resolveHistoryFile(ctx: PlatformContext): string {
  return joinFor(ctx, resolveDataDir(ctx), HISTORY_DIR, HISTORY_FILE);
}

/**
 * Search PATH for an executable (PATHEXT-aware on Windows).
 */
export function executableCandidates(ctx: PlatformContext, command: string): string[] {
  const pathVar = ctx.env.PATH ?? ctx.env.Path ?? "";
  const separator = ctx.platform === "win32" ? ";" : ":";
  // npx.cmd already carries its extension
  const extensions =
    ctx.platform === "win32" && !win32.extname(command)
      ? (ctx.env.PATHEXT ?? ".EXE;.CMD;.BAT").split(";").filter(Boolean)
      : [""];

  const candidates: string[] = [];
  for (const dir of pathVar.split(separator)) {
    if (!dir) continue;
    for (const ext of extensions) {
      candidates.push(joinFor(ctx, dir, command + ext));
    }
  }
  return candidates;
}

/**
 * Resolve a server command the way a client would launch it. Commands with a
 * directory part are checked as paths (relative to cwd); bare names are
 * looked up on PATH.
 */
export function findExecutable(ctx: PlatformContext, command: string): string | null {
  const path = ctx.platform === "win32" ? win32 : posix;
  const hasDir = ctx.platform === "win32" ? /[\\/]/.test(command) : command.includes("/");
  if (hasDir) {
    const resolved = path.resolve(ctx.cwd, command);
    return existsSync(resolved) ? resolved : null;
  }
  return executableCandidates(ctx, command).find((candidate) => existsSync(candidate)) ?? null;
}
