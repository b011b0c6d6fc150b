import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { writeFileSync } from "node:fs";
import { ConfigManager } from "../../src/core/config-manager.js";
import { SnapshotStore } from "../../src/core/snapshot-store.js";
import {
  AdapterWriteFailedError,
  AppliedNotRecordedError,
  ClientMismatchError,
  NoPreviousConfigError,
  NotFoundError,
  PersistenceError,
} from "../../src/core/errors.js";
import { serverConfigsEqual } from "../../src/core/server-config.js";
import { MemoryClient, config, makeTempDir, removeDir, steppingClock } from "../helpers.js";

describe("ConfigManager", () => {
  let dir: string;
  let store: SnapshotStore;
  let manager: ConfigManager;
  let client: MemoryClient;

  beforeEach(() => {
    dir = makeTempDir();
    store = new SnapshotStore(join(dir, "history.json"));
    manager = new ConfigManager({ store, clock: steppingClock() });
    client = new MemoryClient();
  });

  afterEach(() => removeDir(dir));

  describe("applyConfig", () => {
    it("records the first snapshot with no predecessor", () => {
      const snapshot = manager.applyConfig(client, "test-server", config("node", ["server.js"]));

      expect(snapshot.previousConfig).toBeNull();
      expect(snapshot.clientName).toBe("test-client");
      expect(snapshot.serverName).toBe("test-server");
      expect(snapshot.timestamp).toBe("2026-01-02T10:00:00.000Z");
      expect(snapshot.description).toBe("Configuration update for test-server");
      expect(client.listServers().get("test-server")?.args).toEqual(["server.js"]);
    });

    it("keeps history linear across applies", () => {
      for (let i = 0; i < 4; i++) {
        manager.applyConfig(client, "test-server", config("node", [`v${i}.js`]));
      }

      const history = manager.getHistory("test-client", "test-server");
      expect(history).toHaveLength(4);
      for (let i = 0; i < history.length - 1; i++) {
        const newer = history[i];
        const older = history[i + 1];
        expect(newer?.previousConfig).not.toBeNull();
        if (newer?.previousConfig && older) {
          expect(serverConfigsEqual(newer.previousConfig, older.config)).toBe(true);
        }
      }
      expect(history[3]?.previousConfig).toBeNull();
    });

    it("returns history newest first", () => {
      manager.applyConfig(client, "test-server", config("node", ["v0.js"]));
      manager.applyConfig(client, "test-server", config("node", ["v1.js"]));
      manager.applyConfig(client, "test-server", config("node", ["v2.js"]));

      const history = manager.getHistory();
      expect(history.map((s) => s.config.args[0])).toEqual(["v2.js", "v1.js", "v0.js"]);
      expect(manager.getLatestSnapshot("test-client", "test-server")?.config.args[0]).toContain("v2.js");
    });

    it("derives the previous config from history, not from the client file", () => {
      client.servers.set("test-server", config("python", ["hand-edited.py"]));
      const snapshot = manager.applyConfig(client, "test-server", config("node"));
      expect(snapshot.previousConfig).toBeNull();
    });

    it("keeps separate histories per client and server", () => {
      const other = new MemoryClient("other-client");
      manager.applyConfig(client, "a", config("one"));
      manager.applyConfig(other, "a", config("two"));
      const third = manager.applyConfig(client, "b", config("three"));

      expect(third.previousConfig).toBeNull();
      expect(manager.getHistory("test-client")).toHaveLength(2);
      expect(manager.getHistory(undefined, "a")).toHaveLength(2);
      expect(manager.getLatestSnapshot("other-client", "a")?.config.command).toBe("two");
    });

    it("never creates a snapshot when the client write fails", () => {
      manager.applyConfig(client, "test-server", config("node", ["v0.js"]));
      client.failWrites = true;

      expect(() => manager.applyConfig(client, "test-server", config("node", ["v1.js"]))).toThrow(
        AdapterWriteFailedError
      );
      expect(manager.getHistory()).toHaveLength(1);
      expect(manager.getLatestSnapshot("test-client", "test-server")?.config.args).toEqual(["v0.js"]);
    });

    it("wraps the adapter error with client and server context", () => {
      client.failWrites = true;
      try {
        manager.applyConfig(client, "test-server", config("node"));
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(AdapterWriteFailedError);
        if (err instanceof AdapterWriteFailedError) {
          expect(err.code).toBe("ADAPTER_WRITE_FAILED");
          expect(err.message).toBe('Failed to write "test-server" to test-client: permission denied');
          expect(err.cause).toBeInstanceOf(Error);
        }
      }
    });

    it("reports applied-but-not-recorded when the append fails", () => {
      const blocker = join(dir, "blocker");
      writeFileSync(blocker, "x");
      const broken = new ConfigManager({
        store: new SnapshotStore(join(blocker, "history.json")),
        clock: steppingClock(),
      });

      let caught: unknown;
      try {
        broken.applyConfig(client, "test-server", config("node", ["new.js"]));
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(AppliedNotRecordedError);
      if (caught instanceof AppliedNotRecordedError) {
        expect(caught.code).toBe("APPLIED_NOT_RECORDED");
        expect(caught.cause).toBeInstanceOf(PersistenceError);
        expect(caught.snapshot.config.args).toEqual(["new.js"]);
      }
      // The client write already happened
      expect(client.listServers().get("test-server")?.args).toEqual(["new.js"]);
    });

    it("fails before touching the client when history cannot be read", () => {
      const historyPath = join(dir, "corrupt.json");
      writeFileSync(historyPath, "[[[");
      const broken = new ConfigManager({ store: new SnapshotStore(historyPath) });

      expect(() => broken.applyConfig(client, "test-server", config("node"))).toThrow(PersistenceError);
      expect(client.writes).toBe(0);
    });

    it("never lets timestamps go backwards for a key", () => {
      const times = ["2026-01-02T10:00:05.000Z", "2026-01-02T10:00:01.000Z"];
      const skewed = new ConfigManager({
        store,
        clock: () => new Date(times.shift() ?? "2026-01-02T10:00:09.000Z"),
      });

      const first = skewed.applyConfig(client, "s", config("a"));
      const second = skewed.applyConfig(client, "s", config("b"));

      expect(first.timestamp).toBe("2026-01-02T10:00:05.000Z");
      expect(second.timestamp).toBe("2026-01-02T10:00:05.000Z");
      expect(skewed.getLatestSnapshot("test-client", "s")?.config.command).toBe("b");
    });

    it("freezes recorded configs", () => {
      const snapshot = manager.applyConfig(client, "s", config("node", ["a"]));
      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot.config.args)).toBe(true);
    });
  });

  describe("rollback", () => {
    it("restores the previous config and records the rollback", () => {
      const a = config("node", ["server.js"]);
      const b = config("node", ["server.js", "--port=3000"]);
      manager.applyConfig(client, "test-server", a);
      const snapshotB = manager.applyConfig(client, "test-server", b);

      const rolled = manager.rollback(client, snapshotB);

      expect(client.listServers().get("test-server")?.args).toEqual(["server.js"]);
      const latest = manager.getLatestSnapshot("test-client", "test-server");
      expect(latest).toEqual(rolled);
      expect(latest && serverConfigsEqual(latest.config, a)).toBe(true);
      expect(latest?.previousConfig && serverConfigsEqual(latest.previousConfig, b)).toBe(true);
      expect(latest?.description).toBe("Rollback from 2026-01-02 10:00:01 to previous configuration");
      expect(manager.getHistory()).toHaveLength(3);
    });

    it("supports redo by rolling back the rollback", () => {
      manager.applyConfig(client, "s", config("node", ["a"]));
      const b = manager.applyConfig(client, "s", config("node", ["b"]));
      const undo = manager.rollback(client, b);
      manager.rollback(client, undo);

      expect(client.listServers().get("s")?.args).toEqual(["b"]);
      expect(manager.getHistory()).toHaveLength(4);
    });

    it("links an older target's rollback to the current head", () => {
      manager.applyConfig(client, "s", config("node", ["a"]));
      const b = manager.applyConfig(client, "s", config("node", ["b"]));
      manager.applyConfig(client, "s", config("node", ["c"]));

      const rolled = manager.rollback(client, b);

      expect(rolled.config.args).toEqual(["a"]);
      expect(rolled.previousConfig?.args).toEqual(["c"]);
    });

    it("refuses to roll back the first snapshot", () => {
      const first = manager.applyConfig(client, "s", config("node"));
      expect(() => manager.rollback(client, first)).toThrow(NoPreviousConfigError);
      expect(() => manager.rollback(client, first)).toThrow(
        "Cannot rollback: no previous configuration found for s"
      );
      expect(manager.getHistory()).toHaveLength(1);
    });

    it("refuses a snapshot that belongs to another client", () => {
      manager.applyConfig(client, "s", config("a"));
      const b = manager.applyConfig(client, "s", config("b"));
      expect(() => manager.rollback(new MemoryClient("other"), b)).toThrow(ClientMismatchError);
    });

    it("does not record a rollback whose client write fails", () => {
      manager.applyConfig(client, "s", config("a"));
      const b = manager.applyConfig(client, "s", config("b"));
      client.failWrites = true;

      expect(() => manager.rollback(client, b)).toThrow(AdapterWriteFailedError);
      expect(manager.getHistory()).toHaveLength(2);
    });

    it("reports applied-but-not-recorded when the rollback append fails", () => {
      manager.applyConfig(client, "s", config("node", ["a.js"]));
      const b = manager.applyConfig(client, "s", config("node", ["b.js"]));

      const blocker = join(dir, "blocker");
      writeFileSync(blocker, "x");
      const broken = new ConfigManager({
        store: new SnapshotStore(join(blocker, "history.json")),
        clock: steppingClock("2026-01-02T11:00:00.000Z"),
      });

      let caught: unknown;
      try {
        broken.rollback(client, b);
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(AppliedNotRecordedError);
      if (caught instanceof AppliedNotRecordedError) {
        expect(caught.cause).toBeInstanceOf(PersistenceError);
        expect(caught.snapshot.config.args).toEqual(["a.js"]);
        expect(caught.snapshot.previousConfig?.args).toEqual(["b.js"]);
        expect(caught.snapshot.description).toBe(
          "Rollback from 2026-01-02 10:00:01 to previous configuration"
        );
      }
      // The restored config reached the client anyway
      expect(client.listServers().get("s")?.args).toEqual(["a.js"]);
      expect(manager.getHistory()).toHaveLength(2);
    });
  });

  describe("lookups", () => {
    it("requireLatestSnapshot throws NotFoundError without history", () => {
      expect(() => manager.requireLatestSnapshot("test-client", "missing")).toThrow(NotFoundError);
    });

    it("findSnapshot resolves an id prefix within one key", () => {
      manager.applyConfig(client, "s", config("a"));
      manager.applyConfig(client, "s", config("b"));
      const [newest, oldest] = manager.getHistoryEntries("test-client", "s");

      expect(oldest && manager.findSnapshot("test-client", "s", oldest.id).snapshot.config.command).toBe("a");
      expect(newest && manager.findSnapshot("test-client", "s", newest.id.slice(0, 8)).snapshot.config.command).toBe("b");
      expect(() => manager.findSnapshot("test-client", "s", "zzzz")).toThrow(NotFoundError);
      expect(() => manager.findSnapshot("test-client", "s", "")).toThrow(/ambiguous/);
    });

    it("diffConfigs delegates to the diff engine", () => {
      expect(manager.diffConfigs(config("node"), config("deno"))).toEqual(["Command: node → deno"]);
    });
  });
});
