import type { ConfigSnapshot } from "../core/types.js";
import { computeConfigDiff, type ConfigDiffEntry } from "../core/differ.js";
import { serverConfigToJson } from "../core/server-config.js";
import type { RegisteredClient } from "../clients/registry.js";
import { log } from "../utils/logger.js";
import { EXIT_DRIFT, EXIT_OK } from "../utils/constants.js";
import { commandLine, printDiffEntries, serverLabel, timestampLabel } from "../reporters/console.js";
import { createCommandContext, reportError, type CommandContext } from "./context.js";

interface DiffOptions {
  snapshot?: string;
  live?: boolean;
  json?: boolean;
}

/**
 * Default: what a snapshot changed relative to its predecessor.
 * --live: latest recorded config against what the client file holds now.
 */
export function diffCommand(
  clientName: string,
  serverName: string,
  options: DiffOptions,
  context: CommandContext = createCommandContext()
): number {
  try {
    const client = context.registry.require(clientName);
    const target = options.snapshot
      ? context.manager.findSnapshot(client.name, serverName, options.snapshot).snapshot
      : context.manager.requireLatestSnapshot(client.name, serverName);

    return options.live
      ? diffLive(client, serverName, target, options)
      : diffSnapshot(target, options);
  } catch (err) {
    return reportError(err);
  }
}

function diffSnapshot(target: ConfigSnapshot, options: DiffOptions): number {
  const changes = target.previousConfig
    ? computeConfigDiff(target.previousConfig, target.config)
    : [];

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          timestamp: target.timestamp,
          first: target.previousConfig === null,
          changes: changes.map(toJson),
        },
        null,
        2
      )
    );
    return EXIT_OK;
  }

  log.info(`${serverLabel(target.serverName)} at ${timestampLabel(target.timestamp)}: ${target.description}`);
  if (!target.previousConfig) {
    log.dim(`  First recorded configuration: ${commandLine(target.config)}`);
  } else if (changes.length === 0) {
    log.dim("  No changes");
  } else {
    printDiffEntries(changes);
  }
  return EXIT_OK;
}

function diffLive(
  client: RegisteredClient,
  serverName: string,
  latest: ConfigSnapshot,
  options: DiffOptions
): number {
  const live = client.listServers().get(serverName);
  const changes = live ? computeConfigDiff(latest.config, live) : [];
  const drifted = !live || changes.length > 0;

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          drifted,
          removed: !live,
          recorded: serverConfigToJson(latest.config),
          live: live ? serverConfigToJson(live) : null,
          changes: changes.map(toJson),
        },
        null,
        2
      )
    );
    return drifted ? EXIT_DRIFT : EXIT_OK;
  }

  if (!live) {
    log.drift(`${serverName} is recorded in history but missing from ${client.name}`);
    return EXIT_DRIFT;
  }
  if (!drifted) {
    log.success("No drift detected — live config matches recorded history");
    return EXIT_OK;
  }

  console.log();
  printDiffEntries(changes);
  console.log();
  log.drift(`${changes.length} change(s) since the last recorded snapshot`);
  log.info(`Run "mcp-helper apply" to record the live config, or "mcp-helper rollback" to restore history.`);
  return EXIT_DRIFT;
}

function toJson(entry: ConfigDiffEntry): Record<string, string> {
  const out: Record<string, string> = { type: entry.type, detail: entry.detail };
  if (entry.key !== undefined) out.key = entry.key;
  if (entry.oldValue !== undefined) out.oldValue = entry.oldValue;
  if (entry.newValue !== undefined) out.newValue = entry.newValue;
  return out;
}
