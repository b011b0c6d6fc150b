import { existsSync, readFileSync } from "node:fs";
import type { ConfigSnapshot, ServerConfig } from "./types.js";
import { PersistenceError } from "./errors.js";
import { isRecord, parseServerConfig, serverConfigToJson } from "./server-config.js";
import { writeFileAtomic, parseJsonSafe } from "../utils/secure-file.js";
import { shortHash } from "../utils/hash.js";
import { HISTORY_FILE_VERSION } from "../utils/constants.js";

/**
 * history.json schema. Field names are snake_case on disk.
 */
interface HistoryFile {
  version: number;
  snapshots: SnapshotRecord[];
}

interface SnapshotRecord {
  client_name: string;
  server_name: string;
  config: ServerConfigRecord;
  previous_config: ServerConfigRecord | null;
  timestamp: string;
  description: string;
}

interface ServerConfigRecord {
  command: string;
  args: string[];
  env: Record<string, string>;
}

export interface HistoryEntry {
  /** Short stable identifier shown to users */
  id: string;
  /** Insertion position in the log (0-based) */
  seq: number;
  snapshot: ConfigSnapshot;
}

/**
 * Append-only snapshot log backed by a single JSON file.
 *
 * Every call reads the whole file. `append` re-reads before writing and
 * replaces the file atomically. There is no cross-process lock: two
 * processes appending at once can lose one entry (last writer wins).
 */
export class SnapshotStore {
  constructor(readonly historyPath: string) {}

  append(snapshot: ConfigSnapshot): void {
    const snapshots = this.load();
    snapshots.push(snapshot);

    const file: HistoryFile = {
      version: HISTORY_FILE_VERSION,
      snapshots: snapshots.map(toRecord),
    };

    try {
      writeFileAtomic(this.historyPath, JSON.stringify(file, null, 2) + "\n");
    } catch (err) {
      throw new PersistenceError("Failed to write history file", this.historyPath, err);
    }
  }

  /**
   * Matching entries, newest first. Equal timestamps: later insertion first.
   */
  entries(clientFilter?: string, serverFilter?: string): HistoryEntry[] {
    return this.all()
      .filter(
        (e) =>
          (clientFilter === undefined || e.snapshot.clientName === clientFilter) &&
          (serverFilter === undefined || e.snapshot.serverName === serverFilter)
      )
      .sort(
        (a, b) =>
          Date.parse(b.snapshot.timestamp) - Date.parse(a.snapshot.timestamp) ||
          b.seq - a.seq
      );
  }

  query(clientFilter?: string, serverFilter?: string): ConfigSnapshot[] {
    return this.entries(clientFilter, serverFilter).map((e) => e.snapshot);
  }

  latest(clientName: string, serverName: string): ConfigSnapshot | null {
    return this.entries(clientName, serverName)[0]?.snapshot ?? null;
  }

  /**
   * Every entry in insertion order.
   */
  all(): HistoryEntry[] {
    return this.load().map((snapshot, seq) => ({
      id: snapshotId(snapshot, seq),
      seq,
      snapshot,
    }));
  }

  private load(): ConfigSnapshot[] {
    if (!existsSync(this.historyPath)) return [];

    let raw: string;
    try {
      raw = readFileSync(this.historyPath, "utf-8");
    } catch (err) {
      throw new PersistenceError("Failed to read history file", this.historyPath, err);
    }

    let parsed: unknown;
    try {
      parsed = parseJsonSafe(raw);
    } catch (err) {
      throw new PersistenceError("Failed to parse history file", this.historyPath, err);
    }

    if (!isRecord(parsed) || !Array.isArray(parsed.snapshots)) {
      throw new PersistenceError("Malformed history file", this.historyPath);
    }
    // Files written before the version field existed hold only `snapshots`
    const version = parsed.version ?? HISTORY_FILE_VERSION;
    if (typeof version !== "number") {
      throw new PersistenceError("Malformed history file", this.historyPath);
    }
    if (version > HISTORY_FILE_VERSION) {
      throw new PersistenceError(
        `History file version ${version} is newer than supported (${HISTORY_FILE_VERSION})`,
        this.historyPath
      );
    }

    return parsed.snapshots.map((record: unknown, index: number) => {
      const snapshot = fromRecord(record);
      if (!snapshot) {
        throw new PersistenceError(`Invalid snapshot record at index ${index}`, this.historyPath);
      }
      return snapshot;
    });
  }
}

export function snapshotId(snapshot: ConfigSnapshot, seq: number): string {
  return shortHash({
    seq,
    client: snapshot.clientName,
    server: snapshot.serverName,
    timestamp: snapshot.timestamp,
    config: snapshot.config,
  });
}

function toRecord(snapshot: ConfigSnapshot): SnapshotRecord {
  return {
    client_name: snapshot.clientName,
    server_name: snapshot.serverName,
    config: serverConfigToJson(snapshot.config),
    previous_config: snapshot.previousConfig ? serverConfigToJson(snapshot.previousConfig) : null,
    timestamp: snapshot.timestamp,
    description: snapshot.description,
  };
}

function fromRecord(record: unknown): ConfigSnapshot | null {
  if (!isRecord(record)) return null;
  const { client_name, server_name, description } = record;
  if (typeof client_name !== "string" || typeof server_name !== "string") return null;
  const timestamp = typeof record.timestamp === "string" ? normalizeTimestamp(record.timestamp) : null;
  if (!timestamp) return null;

  const config = parseServerConfig(record.config);
  if (!config) return null;

  let previousConfig: ServerConfig | null = null;
  if (record.previous_config !== null && record.previous_config !== undefined) {
    previousConfig = parseServerConfig(record.previous_config);
    if (!previousConfig) return null;
  }

  return Object.freeze({
    clientName: client_name,
    serverName: server_name,
    config,
    previousConfig,
    timestamp,
    description: typeof description === "string" ? description : "",
  });
}

/**
 * Any RFC 3339 time as a millisecond-precision UTC ISO string.
 * Sub-millisecond digits ("...45.123456789Z") are truncated.
 */
function normalizeTimestamp(value: string): string | null {
  const ms = Date.parse(value.replace(/(\.\d{3})\d+/, "$1"));
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}
