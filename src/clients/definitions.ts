import { existsSync } from "node:fs";
import type { ServerConfig } from "../core/types.js";
import {
  appDataDir,
  dirnameFor,
  executableCandidates,
  joinFor,
  xdgConfigDir,
} from "./platform.js";
import type { ClientDefinition } from "./json-file-client.js";

/**
 * Known MCP clients and where each keeps its server config.
 */

export const CLAUDE_DESKTOP: ClientDefinition = {
  id: "claude-desktop",
  name: "Claude Desktop",
  serversKey: "mcpServers",
  resolveConfigPath(ctx) {
    if (ctx.platform === "darwin") {
      return joinFor(
        ctx,
        ctx.homeDir,
        "Library/Application Support/Claude/claude_desktop_config.json"
      );
    }
    if (ctx.platform === "win32") {
      return joinFor(ctx, appDataDir(ctx), "Claude", "claude_desktop_config.json");
    }
    return joinFor(ctx, xdgConfigDir(ctx), "Claude", "claude_desktop_config.json");
  },
  isInstalled: (ctx, configPath) => existsSync(dirnameFor(ctx, configPath)),
};

export const CLAUDE_CODE: ClientDefinition = {
  id: "claude-code",
  name: "Claude Code",
  serversKey: "mcpServers",
  resolveConfigPath: (ctx) => joinFor(ctx, ctx.homeDir, ".claude.json"),
  // The CLI may be installed without ever having written its config
  isInstalled: (ctx, configPath) =>
    existsSync(configPath) ||
    executableCandidates(ctx, "claude").some((candidate) => existsSync(candidate)),
  toEntry: (config) => {
    const entry: Record<string, unknown> = {
      command: config.command,
      args: [...config.args],
    };
    if (Object.keys(config.env).length > 0) entry.env = { ...config.env };
    return entry;
  },
};

export const CURSOR: ClientDefinition = {
  id: "cursor",
  name: "Cursor",
  serversKey: "mcpServers",
  resolveConfigPath: (ctx) => joinFor(ctx, ctx.homeDir, ".cursor", "mcp.json"),
  isInstalled: (ctx) => existsSync(joinFor(ctx, ctx.homeDir, ".cursor")),
};

export const VSCODE: ClientDefinition = {
  id: "vscode",
  name: "VS Code",
  serversKey: "servers",
  resolveConfigPath: (ctx) => joinFor(ctx, ctx.homeDir, ".vscode", "mcp.json"),
  isInstalled: (ctx) => existsSync(joinFor(ctx, ctx.homeDir, ".vscode")),
  toEntry: (config: ServerConfig) => ({
    type: "stdio",
    command: config.command,
    args: [...config.args],
    env: { ...config.env },
  }),
};

export const WINDSURF: ClientDefinition = {
  id: "windsurf",
  name: "Windsurf",
  serversKey: "mcpServers",
  resolveConfigPath: (ctx) =>
    joinFor(ctx, ctx.homeDir, ".codeium", "windsurf", "mcp_config.json"),
  isInstalled: (ctx) => existsSync(joinFor(ctx, ctx.homeDir, ".codeium", "windsurf")),
};

/** Registration order; also the order clients are listed in. */
export const CLIENT_DEFINITIONS: readonly ClientDefinition[] = [
  CLAUDE_CODE,
  CLAUDE_DESKTOP,
  CURSOR,
  VSCODE,
  WINDSURF,
];
