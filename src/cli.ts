#!/usr/bin/env node
import { Command } from "commander";
import { clientsCommand } from "./commands/clients.js";
import { listCommand } from "./commands/list.js";
import { applyCommand } from "./commands/apply.js";
import { historyCommand } from "./commands/history.js";
import { rollbackCommand } from "./commands/rollback.js";
import { diffCommand } from "./commands/diff.js";
import { depsCommand } from "./commands/deps.js";
import { setDebug } from "./utils/logger.js";
import { VERSION } from "./utils/constants.js";

const collect = (value: string, previous: string[] = []): string[] => [...previous, value];

const program = new Command();

program
  .name("mcp-helper")
  .description(
    "Install and manage MCP server configs across clients, with history, diff and rollback"
  )
  .version(VERSION)
  .option("--debug", "Print diagnostic output")
  .hook("preAction", (command) => {
    setDebug(Boolean(command.opts().debug));
  });

program
  .command("clients")
  .description("Show supported MCP clients, their config paths and whether they are installed")
  .option("--json", "Output as JSON")
  .action((options) => {
    process.exitCode = clientsCommand(options);
  });

program
  .command("list")
  .description("List configured servers across installed clients")
  .option("-c, --client <name>", "Only this client (id or name)")
  .option("--show-env", "Show environment variables")
  .option("--json", "Output as JSON")
  .action((options) => {
    process.exitCode = listCommand(options);
  });

program
  .command("apply")
  .description("Write a server config to a client and record a snapshot")
  .argument("<client>", "Client id or name (e.g. claude-desktop)")
  .argument("<server>", "Server entry name")
  .option("--command <cmd>", "Executable to launch the server")
  .option("--package <spec>", "npm package, docker:image[:tag] or script.py to launch")
  .option("--arg <value>", "Argument (repeatable)", collect)
  .option("--env <KEY=VALUE>", "Environment variable (repeatable)", collect)
  .option("-f, --file <path>", "Server definition file (YAML or JSON)")
  .option("--json", "Output the recorded snapshot as JSON")
  .action((client: string, server: string, options) => {
    process.exitCode = applyCommand(client, server, options);
  });

program
  .command("history")
  .description("Show recorded configuration snapshots, newest first")
  .option("-c, --client <name>", "Filter by client")
  .option("-s, --server <name>", "Filter by server")
  .option("-n, --limit <n>", "Show at most n snapshots")
  .option("--json", "Output as JSON")
  .action((options) => {
    process.exitCode = historyCommand(options);
  });

program
  .command("rollback")
  .description("Undo the latest change to a server (recorded as a new snapshot)")
  .argument("<client>", "Client id or name")
  .argument("<server>", "Server entry name")
  .option("--snapshot <id>", "Undo the change made by this snapshot instead of the latest")
  .action((client: string, server: string, options) => {
    process.exitCode = rollbackCommand(client, server, options);
  });

program
  .command("diff")
  .description("Show what a snapshot changed, or compare history against the live config")
  .argument("<client>", "Client id or name")
  .argument("<server>", "Server entry name")
  .option("--snapshot <id>", "Snapshot to inspect (default: latest)")
  .option("--live", "Compare the latest snapshot against the client's live config")
  .option("--json", "Output as JSON")
  .action((client: string, server: string, options) => {
    process.exitCode = diffCommand(client, server, options);
  });

program
  .command("deps")
  .description("Check Node.js, npx, Python and Docker availability")
  .option("--node <requirement>", "Required Node.js version (e.g. >=18.0.0)")
  .option("--python <requirement>", "Required Python version (e.g. ^3.10.0)")
  .option("--docker <requirement>", "Required Docker version")
  .option("--json", "Output as JSON")
  .action((options) => {
    process.exitCode = depsCommand(options);
  });

program.parse();
