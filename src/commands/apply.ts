import ora from "ora";
import type { ServerConfig } from "../core/types.js";
import { InvalidServerConfigError } from "../core/errors.js";
import { computeConfigDiff } from "../core/differ.js";
import {
  checkEnvVars,
  createServerConfig,
  parseEnvPairs,
  serverConfigToJson,
} from "../core/server-config.js";
import { loadServerFile } from "../parsers/server-file.js";
import { serverConfigForPackage } from "../parsers/package-spec.js";
import type { RegisteredClient } from "../clients/registry.js";
import { findExecutable, type PlatformContext } from "../clients/platform.js";
import { log } from "../utils/logger.js";
import { EXIT_OK } from "../utils/constants.js";
import { clientLabel, printDiffEntries, serverLabel, snapshotIdLabel } from "../reporters/console.js";
import { createCommandContext, reportError, type CommandContext } from "./context.js";

interface ApplyOptions {
  command?: string;
  package?: string;
  arg?: string[];
  env?: string[];
  file?: string;
  json?: boolean;
}

export function applyCommand(
  clientName: string,
  serverName: string,
  options: ApplyOptions,
  context: CommandContext = createCommandContext()
): number {
  let config: ServerConfig;
  let client: RegisteredClient;
  try {
    client = context.registry.require(clientName);
    config = buildConfig(options, context.platform);
  } catch (err) {
    return reportError(err);
  }

  for (const issue of checkEnvVars(config.env)) {
    log.warn(`env.${issue.key}: ${issue.message}`);
  }
  const resolved = findExecutable(context.platform, config.command);
  if (resolved) {
    log.debug(`Resolved ${config.command} to ${resolved}`);
  } else {
    log.warn(`Command "${config.command}" not found on PATH; ${client.name} may fail to start ${serverName}`);
  }

  const spinner = options.json
    ? null
    : ora(`Applying ${serverName} to ${client.name}...`).start();

  try {
    const snapshot = context.manager.applyConfig(client, serverName, config);
    const [entry] = context.manager.getHistoryEntries(client.name, serverName);
    const changes = snapshot.previousConfig
      ? computeConfigDiff(snapshot.previousConfig, snapshot.config)
      : [];

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            id: entry?.id,
            client: snapshot.clientName,
            server: snapshot.serverName,
            timestamp: snapshot.timestamp,
            config: serverConfigToJson(snapshot.config),
            previousConfig: snapshot.previousConfig
              ? serverConfigToJson(snapshot.previousConfig)
              : null,
            changes: changes.map((c) => c.detail),
          },
          null,
          2
        )
      );
      return EXIT_OK;
    }

    spinner?.succeed(`Applied ${serverLabel(serverName)} to ${clientLabel(client.name)}`);
    if (!snapshot.previousConfig) {
      log.info("First recorded configuration for this server");
    } else if (changes.length === 0) {
      log.info("No changes from the previous configuration");
    } else {
      printDiffEntries(changes);
    }
    if (entry) log.dim(`Snapshot ${snapshotIdLabel(entry.id)} recorded`);
    return EXIT_OK;
  } catch (err) {
    spinner?.fail(`Failed to apply ${serverName}`);
    return reportError(err);
  }
}

function buildConfig(options: ApplyOptions, platform: PlatformContext): ServerConfig {
  const sources = [options.command, options.package, options.file].filter((s) => s !== undefined);
  if (sources.length > 1) {
    throw new InvalidServerConfigError("Use only one of --command, --package or --file");
  }
  if (options.file) {
    if (options.arg?.length || options.env?.length) {
      throw new InvalidServerConfigError("Use either --file or --arg/--env, not both");
    }
    return loadServerFile(options.file);
  }
  if (options.package !== undefined) {
    return serverConfigForPackage(
      options.package,
      platform,
      options.arg ?? [],
      parseEnvPairs(options.env ?? [])
    );
  }
  if (!options.command) {
    throw new InvalidServerConfigError("A server needs --command, --package or --file");
  }
  return createServerConfig({
    command: options.command,
    args: options.arg ?? [],
    env: parseEnvPairs(options.env ?? []),
  });
}
