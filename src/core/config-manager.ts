import type { ClientAdapter, ConfigSnapshot, ServerConfig } from "./types.js";
import { SnapshotStore, type HistoryEntry } from "./snapshot-store.js";
import { diffConfigs } from "./differ.js";
import {
  AdapterWriteFailedError,
  AppliedNotRecordedError,
  ClientMismatchError,
  NoPreviousConfigError,
  NotFoundError,
} from "./errors.js";

export interface ConfigManagerOptions {
  store: SnapshotStore;
  /** Wall clock; injectable for tests */
  clock?: () => Date;
}

/**
 * The only component that creates snapshots.
 *
 * apply and rollback are all-or-nothing toward history: when the client
 * write fails nothing is appended. The one partial-failure window (client
 * written, append failed) surfaces as AppliedNotRecordedError.
 *
 * Not safe for concurrent use; snapshot ordering assumes a single writer.
 */
export class ConfigManager {
  private readonly store: SnapshotStore;
  private readonly clock: () => Date;

  constructor(options: ConfigManagerOptions) {
    this.store = options.store;
    this.clock = options.clock ?? (() => new Date());
  }

  applyConfig(
    client: ClientAdapter,
    serverName: string,
    newConfig: ServerConfig
  ): ConfigSnapshot {
    const latest = this.store.latest(client.name, serverName);

    const snapshot: ConfigSnapshot = Object.freeze({
      clientName: client.name,
      serverName,
      config: newConfig,
      previousConfig: latest?.config ?? null,
      timestamp: this.nextTimestamp(latest),
      description: `Configuration update for ${serverName}`,
    });

    this.writeToClient(client, serverName, newConfig);
    this.record(snapshot);
    return snapshot;
  }

  /**
   * Undo the change `target` made: write its previousConfig back to the
   * client and record that as a new forward snapshot.
   */
  rollback(client: ClientAdapter, target: ConfigSnapshot): ConfigSnapshot {
    const restored = target.previousConfig;
    if (!restored) {
      throw new NoPreviousConfigError(target.serverName);
    }
    if (target.clientName !== client.name) {
      throw new ClientMismatchError(target.clientName, client.name);
    }

    // Linking to the current head keeps history linear even when the
    // target is an older snapshot.
    const latest = this.store.latest(target.clientName, target.serverName);

    const snapshot: ConfigSnapshot = Object.freeze({
      clientName: target.clientName,
      serverName: target.serverName,
      config: restored,
      previousConfig: latest?.config ?? target.config,
      timestamp: this.nextTimestamp(latest),
      description: `Rollback from ${formatTimestamp(target.timestamp)} to previous configuration`,
    });

    this.writeToClient(client, target.serverName, restored);
    this.record(snapshot);
    return snapshot;
  }

  getHistory(clientFilter?: string, serverFilter?: string): ConfigSnapshot[] {
    return this.store.query(clientFilter, serverFilter);
  }

  getHistoryEntries(clientFilter?: string, serverFilter?: string): HistoryEntry[] {
    return this.store.entries(clientFilter, serverFilter);
  }

  getLatestSnapshot(clientName: string, serverName: string): ConfigSnapshot | null {
    return this.store.latest(clientName, serverName);
  }

  requireLatestSnapshot(clientName: string, serverName: string): ConfigSnapshot {
    const latest = this.store.latest(clientName, serverName);
    if (!latest) {
      throw new NotFoundError(`No recorded history for "${serverName}" in ${clientName}`);
    }
    return latest;
  }

  /**
   * Resolve a snapshot id (or unique id prefix) within one (client, server) history.
   */
  findSnapshot(clientName: string, serverName: string, idPrefix: string): HistoryEntry {
    const matches = this.store
      .entries(clientName, serverName)
      .filter((e) => e.id.startsWith(idPrefix));

    if (matches.length === 0) {
      throw new NotFoundError(
        `No snapshot "${idPrefix}" in history of "${serverName}" for ${clientName}`
      );
    }
    const [match, ...rest] = matches;
    if (!match || rest.length > 0) {
      throw new NotFoundError(`Snapshot id "${idPrefix}" is ambiguous; use more characters`);
    }
    return match;
  }

  diffConfigs(oldConfig: ServerConfig, newConfig: ServerConfig): string[] {
    return diffConfigs(oldConfig, newConfig);
  }

  private writeToClient(client: ClientAdapter, serverName: string, config: ServerConfig): void {
    try {
      client.addServer(serverName, config);
    } catch (err) {
      throw new AdapterWriteFailedError(client.name, serverName, err);
    }
  }

  private record(snapshot: ConfigSnapshot): void {
    try {
      this.store.append(snapshot);
    } catch (err) {
      throw new AppliedNotRecordedError(snapshot, err);
    }
  }

  /**
   * Wall-clock now, clamped so a key's timestamps never go backwards.
   */
  private nextTimestamp(latest: ConfigSnapshot | null): string {
    const now = this.clock().getTime();
    const floor = latest ? Date.parse(latest.timestamp) : Number.NEGATIVE_INFINITY;
    return new Date(Math.max(now, floor)).toISOString();
  }
}

/** "2026-01-02T10:00:00.000Z" → "2026-01-02 10:00:00" */
export function formatTimestamp(iso: string): string {
  return iso.slice(0, 19).replace("T", " ");
}
