/**
 * Core data model for server configurations and their recorded history.
 *
 * Conventions:
 * - ServerConfig values are frozen once built (see createServerConfig)
 * - Snapshots are never mutated or deleted; history only grows
 * - Timestamps are ISO 8601 UTC strings with millisecond precision
 */

export interface ServerConfig {
  /** Executable or launcher (e.g., "npx", "uvx", "docker") */
  readonly command: string;
  /** Ordered arguments passed to the command */
  readonly args: readonly string[];
  /** Environment variables (name → value) */
  readonly env: Readonly<Record<string, string>>;
}

export interface ConfigSnapshot {
  /** Name of the client adapter that was written (e.g., "Claude Desktop") */
  readonly clientName: string;
  /** Logical server entry inside the client's config */
  readonly serverName: string;
  /** Config made active by this snapshot */
  readonly config: ServerConfig;
  /** Config active immediately before; null for the first snapshot of a pair */
  readonly previousConfig: ServerConfig | null;
  /** ISO 8601 creation time, assigned once by the ConfigManager */
  readonly timestamp: string;
  /** Human-readable summary of the change */
  readonly description: string;
}

/**
 * Capability set every MCP client integration provides.
 * `addServer` is an upsert and must write atomically.
 */
export interface ClientAdapter {
  readonly name: string;
  addServer(name: string, config: ServerConfig): void;
  listServers(): Map<string, ServerConfig>;
}
