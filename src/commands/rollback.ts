import ora from "ora";
import type { ConfigSnapshot } from "../core/types.js";
import { computeConfigDiff } from "../core/differ.js";
import type { RegisteredClient } from "../clients/registry.js";
import { log } from "../utils/logger.js";
import { EXIT_OK } from "../utils/constants.js";
import { clientLabel, printDiffEntries, serverLabel, timestampLabel } from "../reporters/console.js";
import { createCommandContext, reportError, type CommandContext } from "./context.js";

interface RollbackOptions {
  snapshot?: string;
}

/**
 * Undo the latest change (or the change made by --snapshot <id>).
 */
export function rollbackCommand(
  clientName: string,
  serverName: string,
  options: RollbackOptions,
  context: CommandContext = createCommandContext()
): number {
  let client: RegisteredClient;
  let target: ConfigSnapshot;
  try {
    client = context.registry.require(clientName);
    target = options.snapshot
      ? context.manager.findSnapshot(client.name, serverName, options.snapshot).snapshot
      : context.manager.requireLatestSnapshot(client.name, serverName);
  } catch (err) {
    return reportError(err);
  }

  const spinner = ora(`Rolling back ${serverName} in ${client.name}...`).start();
  try {
    const snapshot = context.manager.rollback(client, target);
    spinner.succeed(
      `Rolled back ${serverLabel(serverName)} in ${clientLabel(client.name)} (undid change from ${timestampLabel(target.timestamp)})`
    );

    const changes = snapshot.previousConfig
      ? computeConfigDiff(snapshot.previousConfig, snapshot.config)
      : [];
    if (changes.length === 0) {
      log.info("Restored configuration is identical to the current one");
    } else {
      printDiffEntries(changes);
    }
    return EXIT_OK;
  } catch (err) {
    spinner.fail(`Rollback of ${serverName} failed`);
    return reportError(err);
  }
}
