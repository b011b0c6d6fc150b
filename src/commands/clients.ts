import chalk from "chalk";
import { log } from "../utils/logger.js";
import { EXIT_OK } from "../utils/constants.js";
import { createCommandContext, type CommandContext } from "./context.js";

interface ClientsOptions {
  json?: boolean;
}

export function clientsCommand(
  options: ClientsOptions,
  context: CommandContext = createCommandContext()
): number {
  const clients = context.registry.list().map((client) => ({
    id: client.id,
    name: client.name,
    configPath: client.configPath,
    installed: client.isInstalled(),
  }));

  if (options.json) {
    console.log(JSON.stringify(clients, null, 2));
    return EXIT_OK;
  }

  const noColor = !!process.env.NO_COLOR;
  for (const client of clients) {
    const status = client.installed
      ? noColor ? "installed" : chalk.green("installed")
      : noColor ? "not found" : chalk.dim("not found");
    console.log(`  ${client.id.padEnd(16)} ${client.name.padEnd(16)} ${status}`);
    log.dim(`    ${client.configPath}`);
  }

  const installed = clients.filter((c) => c.installed).length;
  console.log();
  log.info(`${installed} of ${clients.length} client(s) detected`);
  return EXIT_OK;
}
