import type { ServerConfig } from "../core/types.js";
import { serverConfigToJson } from "../core/server-config.js";
import type { RegisteredClient } from "../clients/registry.js";
import { log } from "../utils/logger.js";
import { EXIT_ERROR, EXIT_OK } from "../utils/constants.js";
import { clientLabel, commandLine, printEnv, serverLabel } from "../reporters/console.js";
import { createCommandContext, reportError, type CommandContext } from "./context.js";

interface ListOptions {
  client?: string;
  showEnv?: boolean;
  json?: boolean;
}

interface ClientListing {
  client: RegisteredClient;
  servers?: Map<string, ServerConfig>;
  error?: string;
}

export function listCommand(
  options: ListOptions,
  context: CommandContext = createCommandContext()
): number {
  let clients: RegisteredClient[];
  try {
    clients = options.client
      ? [context.registry.require(options.client)]
      : context.registry.detectInstalled();
  } catch (err) {
    return reportError(err);
  }

  if (clients.length === 0) {
    log.warn("No MCP clients found");
    log.info('Run "mcp-helper clients" to see where each client is expected.');
    return EXIT_ERROR;
  }

  const listings: ClientListing[] = clients.map((client) => {
    try {
      return { client, servers: client.listServers() };
    } catch (err) {
      return { client, error: err instanceof Error ? err.message : String(err) };
    }
  });

  if (options.json) {
    const output = listings.map(({ client, servers, error }) => ({
      id: client.id,
      name: client.name,
      configPath: client.configPath,
      ...(error !== undefined
        ? { error }
        : {
            servers: Object.fromEntries(
              [...(servers ?? new Map<string, ServerConfig>())].map(([name, config]) => [
                name,
                serverConfigToJson(config),
              ])
            ),
          }),
    }));
    console.log(JSON.stringify(output, null, 2));
    return EXIT_OK;
  }

  let total = 0;
  for (const { client, servers, error } of listings) {
    if (error !== undefined) {
      log.warn(`${client.name}: ${error}`);
      continue;
    }
    if (!servers || servers.size === 0) {
      log.dim(`→ ${client.name} (no servers configured)`);
      continue;
    }

    total += servers.size;
    console.log(`→ ${clientLabel(client.name)}`);
    log.dim(`  ${client.configPath}`);
    for (const name of [...servers.keys()].sort()) {
      const config = servers.get(name);
      if (!config) continue;
      console.log(`  • ${serverLabel(name)}: ${commandLine(config)}`);
      if (options.showEnv && Object.keys(config.env).length > 0) {
        printEnv(config.env, "      ");
      }
    }
    console.log();
  }

  if (total === 0) {
    log.info("No MCP servers configured yet.");
    log.dim('  To configure one, run: mcp-helper apply <client> <server> --command <cmd>');
  } else {
    log.info(`Total: ${total} server(s) configured`);
  }
  return EXIT_OK;
}
