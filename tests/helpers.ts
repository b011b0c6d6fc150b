import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ClientAdapter, ServerConfig } from "../src/core/types.js";
import { createServerConfig, type ServerConfigInput } from "../src/core/server-config.js";
import type { PlatformContext } from "../src/clients/platform.js";

/** In-process client adapter holding servers in a Map. */
export class MemoryClient implements ClientAdapter {
  readonly servers = new Map<string, ServerConfig>();
  failWrites = false;
  writes = 0;

  constructor(readonly name = "test-client") {}

  addServer(name: string, config: ServerConfig): void {
    if (this.failWrites) {
      throw new Error("permission denied");
    }
    this.writes++;
    this.servers.set(name, config);
  }

  listServers(): Map<string, ServerConfig> {
    return new Map(this.servers);
  }
}

export function config(command: string, args: string[] = [], env: Record<string, string> = {}): ServerConfig {
  return createServerConfig({ command, args, env } satisfies ServerConfigInput);
}

export function makeTempDir(prefix = "mcp-helper-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Linux-flavoured context rooted in a temp home, with its own data dir. */
export function tempPlatform(home: string, env: Record<string, string> = {}): PlatformContext {
  return {
    platform: "linux",
    homeDir: home,
    env: { PATH: "", MCP_HELPER_DATA_DIR: join(home, "data"), ...env },
    cwd: home,
  };
}

/** Clock that advances one second per call, starting at the given instant. */
export function steppingClock(startIso = "2026-01-02T10:00:00.000Z"): () => Date {
  let t = Date.parse(startIso);
  return () => {
    const now = new Date(t);
    t += 1000;
    return now;
  };
}
