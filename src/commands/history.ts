import { serverConfigToJson } from "../core/server-config.js";
import type { HistoryEntry } from "../core/snapshot-store.js";
import { log } from "../utils/logger.js";
import { EXIT_OK } from "../utils/constants.js";
import {
  clientLabel,
  commandLine,
  serverLabel,
  snapshotIdLabel,
  timestampLabel,
} from "../reporters/console.js";
import { createCommandContext, reportError, type CommandContext } from "./context.js";

interface HistoryOptions {
  client?: string;
  server?: string;
  limit?: string;
  json?: boolean;
}

export function historyCommand(
  options: HistoryOptions,
  context: CommandContext = createCommandContext()
): number {
  let entries: HistoryEntry[];
  try {
    // History may mention clients this build no longer knows; filter on the raw name then
    const clientName = options.client
      ? context.registry.get(options.client)?.name ?? options.client
      : undefined;
    entries = context.manager.getHistoryEntries(clientName, options.server);
  } catch (err) {
    return reportError(err);
  }

  const limit = options.limit ? parseInt(options.limit, 10) : NaN;
  if (Number.isInteger(limit) && limit > 0) {
    entries = entries.slice(0, limit);
  }

  if (options.json) {
    console.log(
      JSON.stringify(
        entries.map(({ id, snapshot }) => ({
          id,
          client: snapshot.clientName,
          server: snapshot.serverName,
          timestamp: snapshot.timestamp,
          description: snapshot.description,
          config: serverConfigToJson(snapshot.config),
          previousConfig: snapshot.previousConfig
            ? serverConfigToJson(snapshot.previousConfig)
            : null,
        })),
        null,
        2
      )
    );
    return EXIT_OK;
  }

  if (entries.length === 0) {
    log.info("No configuration history recorded");
    return EXIT_OK;
  }

  for (const { id, snapshot } of entries) {
    console.log(
      `${snapshotIdLabel(id)}  ${timestampLabel(snapshot.timestamp)}  ${clientLabel(snapshot.clientName)} → ${serverLabel(snapshot.serverName)}`
    );
    console.log(`    ${snapshot.description}`);
    console.log(`    ${commandLine(snapshot.config)}`);
  }
  console.log();
  log.info(`${entries.length} snapshot(s)`);
  return EXIT_OK;
}
