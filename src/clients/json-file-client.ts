import { existsSync, readFileSync } from "node:fs";
import {
  applyEdits,
  modify,
  parse as parseJsonc,
  printParseErrorCode,
  type ParseError,
} from "jsonc-parser";
import type { ClientAdapter, ServerConfig } from "../core/types.js";
import {
  isRecord,
  parseServerConfig,
  serverConfigToJson,
  validateServerConfig,
} from "../core/server-config.js";
import { backupFile, writeFileAtomic } from "../utils/secure-file.js";
import type { PlatformContext } from "./platform.js";

/**
 * Static description of one MCP client's config file.
 */
export interface ClientDefinition {
  /** Stable slug used on the command line (e.g., "claude-desktop") */
  id: string;
  /** Display name, also recorded in snapshots (e.g., "Claude Desktop") */
  name: string;
  /** Top-level key holding the server map */
  serversKey: string;
  resolveConfigPath(ctx: PlatformContext): string;
  isInstalled(ctx: PlatformContext, configPath: string): boolean;
  /** Client-specific on-disk entry shape; defaults to { command, args, env } */
  toEntry?(config: ServerConfig): Record<string, unknown>;
}

const FORMATTING = { insertSpaces: true, tabSize: 2, eol: "\n" } as const;

/**
 * Client adapter for clients that keep MCP servers in a JSON (or JSONC) file.
 *
 * Writes are surgical: only the one server entry is touched, so comments,
 * formatting and unrelated keys (Claude Code keeps a lot in ~/.claude.json)
 * survive. The prior file is copied to `<file>.backup` before each write.
 */
export class JsonFileClient implements ClientAdapter {
  readonly id: string;
  readonly name: string;
  readonly configPath: string;

  constructor(
    private readonly definition: ClientDefinition,
    private readonly ctx: PlatformContext
  ) {
    this.id = definition.id;
    this.name = definition.name;
    this.configPath = definition.resolveConfigPath(ctx);
  }

  isInstalled(): boolean {
    return this.definition.isInstalled(this.ctx, this.configPath);
  }

  addServer(name: string, config: ServerConfig): void {
    validateServerConfig(config);

    const text = this.readText() ?? "{}";
    const document = this.parseDocument(text);
    const servers = document[this.definition.serversKey];
    if (servers !== undefined && !isRecord(servers)) {
      throw new Error(
        `Malformed ${this.name} config: "${this.definition.serversKey}" is not an object (${this.configPath})`
      );
    }

    const entry = this.definition.toEntry
      ? this.definition.toEntry(config)
      : serverConfigToJson(config);

    const edits = modify(text, [this.definition.serversKey, name], entry, {
      formattingOptions: FORMATTING,
    });
    const updated = applyEdits(text, edits);

    backupFile(this.configPath);
    writeFileAtomic(this.configPath, updated.endsWith("\n") ? updated : updated + "\n");
  }

  listServers(): Map<string, ServerConfig> {
    const servers = new Map<string, ServerConfig>();
    const text = this.readText();
    if (text === null) return servers;

    const raw = this.parseDocument(text)[this.definition.serversKey];
    if (!isRecord(raw)) return servers;

    for (const [name, value] of Object.entries(raw)) {
      const config = parseServerConfig(value);
      if (config) servers.set(name, config);
    }
    return servers;
  }

  private readText(): string | null {
    if (!existsSync(this.configPath)) return null;
    const text = readFileSync(this.configPath, "utf-8");
    return text.trim() === "" ? null : text;
  }

  private parseDocument(text: string): Record<string, unknown> {
    const errors: ParseError[] = [];
    const parsed: unknown = parseJsonc(text, errors, { allowTrailingComma: true });

    const [first] = errors;
    if (first) {
      throw new Error(
        `Failed to parse ${this.configPath}: ${printParseErrorCode(first.error)} at offset ${first.offset}`
      );
    }
    if (!isRecord(parsed)) {
      throw new Error(`Malformed ${this.name} config: expected a JSON object (${this.configPath})`);
    }
    return parsed;
  }
}
