import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { parse as parseJsonc } from "jsonc-parser";
import { JsonFileClient } from "../../src/clients/json-file-client.js";
import {
  CLAUDE_CODE,
  CLAUDE_DESKTOP,
  CURSOR,
  VSCODE,
  WINDSURF,
} from "../../src/clients/definitions.js";
import { createDefaultRegistry } from "../../src/clients/registry.js";
import { InvalidServerConfigError, NotFoundError } from "../../src/core/errors.js";
import { config, makeTempDir, removeDir, tempPlatform } from "../helpers.js";

function write(path: string, contents: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, contents);
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf-8"));
}

describe("JsonFileClient", () => {
  let home: string;

  beforeEach(() => {
    home = makeTempDir();
  });

  afterEach(() => removeDir(home));

  it("creates the config file when it does not exist", () => {
    const client = new JsonFileClient(CURSOR, tempPlatform(home));
    client.addServer("fs", config("npx", ["-y", "server-fs"], { ROOT: "/tmp" }));

    expect(client.configPath).toBe(join(home, ".cursor", "mcp.json"));
    expect(readJson(client.configPath)).toEqual({
      mcpServers: { fs: { command: "npx", args: ["-y", "server-fs"], env: { ROOT: "/tmp" } } },
    });
    expect(readFileSync(client.configPath, "utf-8").endsWith("\n")).toBe(true);
  });

  it("replaces one entry and leaves the rest of the file alone", () => {
    const client = new JsonFileClient(CLAUDE_DESKTOP, tempPlatform(home));
    write(
      client.configPath,
      [
        "{",
        "  // user settings",
        '  "theme": "dark",',
        '  "mcpServers": {',
        '    "keep": { "command": "keep-me" },',
        '    "fs": { "command": "old" },',
        "  },",
        "}",
        "",
      ].join("\n")
    );

    client.addServer("fs", config("new", ["--flag"]));

    const text = readFileSync(client.configPath, "utf-8");
    expect(text).toContain("// user settings");
    expect(parseJsonc(text, [], { allowTrailingComma: true })).toEqual({
      theme: "dark",
      mcpServers: {
        keep: { command: "keep-me" },
        fs: { command: "new", args: ["--flag"], env: {} },
      },
    });
  });

  it("copies the previous file to .backup before writing", () => {
    const client = new JsonFileClient(CURSOR, tempPlatform(home));
    write(client.configPath, '{ "mcpServers": {} }\n');

    client.addServer("fs", config("node"));

    expect(readFileSync(client.configPath + ".backup", "utf-8")).toBe('{ "mcpServers": {} }\n');
  });

  it("writes no backup for a brand-new file", () => {
    const client = new JsonFileClient(CURSOR, tempPlatform(home));
    client.addServer("fs", config("node"));
    expect(existsSync(client.configPath + ".backup")).toBe(false);
  });

  it("writes client files owner-only", () => {
    const client = new JsonFileClient(CURSOR, tempPlatform(home));
    client.addServer("fs", config("node"));
    // Windows has no POSIX permission bits
    if (process.platform !== "win32") {
      expect(statSync(client.configPath).mode & 0o777).toBe(0o600);
    }
    expect(existsSync(client.configPath)).toBe(true);
  });

  it("uses the servers key and stdio type for VS Code", () => {
    const client = new JsonFileClient(VSCODE, tempPlatform(home));
    client.addServer("fs", config("node", ["a.js"]));

    expect(readJson(client.configPath)).toEqual({
      servers: { fs: { type: "stdio", command: "node", args: ["a.js"], env: {} } },
    });
    expect(client.listServers().get("fs")).toEqual({ command: "node", args: ["a.js"], env: {} });
  });

  it("omits an empty env block for Claude Code", () => {
    const client = new JsonFileClient(CLAUDE_CODE, tempPlatform(home));
    client.addServer("plain", config("node"));
    client.addServer("withEnv", config("node", [], { TOKEN: "test-secret" }));

    expect(readJson(join(home, ".claude.json"))).toEqual({
      mcpServers: {
        plain: { command: "node", args: [] },
        withEnv: { command: "node", args: [], env: { TOKEN: "test-secret" } },
      },
    });
  });

  it("lists stdio servers and skips entries without a command", () => {
    const client = new JsonFileClient(WINDSURF, tempPlatform(home));
    write(
      client.configPath,
      JSON.stringify({
        mcpServers: {
          local: { command: "node", args: ["a.js", 3], env: { A: "1", B: 2 } },
          remote: { url: "https://example.invalid/mcp" },
        },
      })
    );

    const servers = client.listServers();
    expect([...servers.keys()]).toEqual(["local"]);
    expect(servers.get("local")).toEqual({ command: "node", args: ["a.js"], env: { A: "1" } });
  });

  it("returns no servers for a missing or blank file", () => {
    const client = new JsonFileClient(CURSOR, tempPlatform(home));
    expect(client.listServers().size).toBe(0);
    write(client.configPath, "  \n");
    expect(client.listServers().size).toBe(0);
  });

  it("refuses to overwrite a file it cannot parse", () => {
    const client = new JsonFileClient(CURSOR, tempPlatform(home));
    write(client.configPath, '{ "mcpServers": ');

    expect(() => client.addServer("fs", config("node"))).toThrow(/^Failed to parse /);
    expect(readFileSync(client.configPath, "utf-8")).toBe('{ "mcpServers": ');
  });

  it("refuses a servers key that is not an object", () => {
    const client = new JsonFileClient(CURSOR, tempPlatform(home));
    write(client.configPath, '{ "mcpServers": [] }');

    expect(() => client.addServer("fs", config("node"))).toThrow(
      `Malformed Cursor config: "mcpServers" is not an object (${client.configPath})`
    );
  });

  it("validates configs before writing", () => {
    const client = new JsonFileClient(CURSOR, tempPlatform(home));
    expect(() => client.addServer("fs", config("  "))).toThrow(InvalidServerConfigError);
    expect(existsSync(client.configPath)).toBe(false);
  });

  it("detects installation from the client's directory", () => {
    const client = new JsonFileClient(CURSOR, tempPlatform(home));
    expect(client.isInstalled()).toBe(false);
    mkdirSync(join(home, ".cursor"));
    expect(client.isInstalled()).toBe(true);
  });

  it("detects Claude Code from an executable on PATH", () => {
    const bin = join(home, "bin");
    write(join(bin, "claude"), "");
    const client = new JsonFileClient(CLAUDE_CODE, tempPlatform(home, { PATH: bin }));
    expect(client.isInstalled()).toBe(true);
  });
});

describe("ClientRegistry", () => {
  const registry = createDefaultRegistry(tempPlatform("/home/test"));

  it("registers the known clients in order", () => {
    expect(registry.list().map((c) => c.id)).toEqual([
      "claude-code",
      "claude-desktop",
      "cursor",
      "vscode",
      "windsurf",
    ]);
  });

  it("looks clients up by id or display name, ignoring case", () => {
    expect(registry.get("vscode")?.name).toBe("VS Code");
    expect(registry.get("Claude Desktop")?.id).toBe("claude-desktop");
    expect(registry.get(" CURSOR ")?.name).toBe("Cursor");
    expect(registry.get("zed")).toBeUndefined();
  });

  it("require names the known ids when lookup fails", () => {
    expect(() => registry.require("zed")).toThrow(NotFoundError);
    expect(() => registry.require("zed")).toThrow(
      'Unknown client "zed" (known: claude-code, claude-desktop, cursor, vscode, windsurf)'
    );
  });
});
