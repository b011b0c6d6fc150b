import type { ServerConfig } from "../core/types.js";
import { InvalidServerConfigError } from "../core/errors.js";
import { createServerConfig } from "../core/server-config.js";
import type { PlatformContext } from "../clients/platform.js";

export type ServerType =
  | { kind: "npm"; package: string; version: string | null }
  | { kind: "docker"; image: string; tag: string }
  | { kind: "python"; script: string }
  | { kind: "binary"; url: string };

export interface NpmPackage {
  name: string;
  version: string | null;
}

/**
 * Classify a package spec given on the command line:
 * `docker:image[:tag]`, an http(s) URL, a `.py` script, or an npm package.
 */
export function detectServerType(spec: string): ServerType {
  if (spec.startsWith("docker:")) {
    const ref = spec.slice("docker:".length);
    const colon = ref.indexOf(":");
    return colon === -1
      ? { kind: "docker", image: ref, tag: "latest" }
      : { kind: "docker", image: ref.slice(0, colon), tag: ref.slice(colon + 1) };
  }
  if (spec.startsWith("http://") || spec.startsWith("https://")) {
    return { kind: "binary", url: spec };
  }
  if (spec.endsWith(".py")) {
    return { kind: "python", script: spec };
  }
  const { name, version } = parseNpmPackage(spec);
  return { kind: "npm", package: name, version };
}

/**
 * Split `name@version` or `@scope/name@version`. The leading `@` of a
 * scope never counts as a version separator.
 */
export function parseNpmPackage(spec: string): NpmPackage {
  const at = spec.lastIndexOf("@");
  if (at <= 0) return { name: spec, version: null };
  const version = spec.slice(at + 1);
  return { name: spec.slice(0, at), version: version || null };
}

/** Launch command for a package spec. */
export function serverConfigForPackage(
  spec: string,
  ctx: Pick<PlatformContext, "platform">,
  extraArgs: readonly string[] = [],
  env: Readonly<Record<string, string>> = {}
): ServerConfig {
  const trimmed = spec.trim();
  if (!trimmed) {
    throw new InvalidServerConfigError("Package spec cannot be empty");
  }

  const type = detectServerType(trimmed);
  let command: string;
  let args: string[];
  switch (type.kind) {
    case "npm":
      command = ctx.platform === "win32" ? "npx.cmd" : "npx";
      args = [
        "--yes",
        type.version ? `${type.package}@${type.version}` : type.package,
        "--stdio",
      ];
      break;
    case "docker":
      if (!type.image) {
        throw new InvalidServerConfigError(`Docker spec "${trimmed}" names no image`);
      }
      command = "docker";
      args = [
        "run",
        "--rm",
        "-i",
        "--init",
        "--name",
        `mcp-${type.image.replace(/[/:]/g, "-")}`,
        `${type.image}:${type.tag}`,
      ];
      break;
    case "python":
      command = ctx.platform === "win32" ? "python" : "python3";
      args = [type.script];
      break;
    case "binary":
      throw new InvalidServerConfigError(
        `Binary downloads are not supported (${type.url}); download it and pass --command instead`
      );
  }

  return createServerConfig({ command, args: [...args, ...extraArgs], env: { ...env } });
}
