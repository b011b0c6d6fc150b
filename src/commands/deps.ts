import ora from "ora";
import chalk from "chalk";
import {
  builtinDependencies,
  checkDependency,
  defaultRunner,
  type CommandRunner,
  type DependencyCheck,
} from "../deps/probe.js";
import { log } from "../utils/logger.js";
import { EXIT_DRIFT, EXIT_OK } from "../utils/constants.js";
import { reportError } from "./context.js";

interface DepsOptions {
  node?: string;
  python?: string;
  docker?: string;
  json?: boolean;
}

/**
 * Probe the runtimes MCP servers usually need. Fails only for dependencies
 * that were given an explicit requirement.
 */
export function depsCommand(options: DepsOptions, runner: CommandRunner = defaultRunner): number {
  const specs = builtinDependencies(options);
  const spinner = options.json ? null : ora("Checking dependencies...").start();

  let checks: DependencyCheck[];
  try {
    checks = specs.map((spec) => checkDependency(spec, runner));
  } catch (err) {
    spinner?.fail("Dependency check failed");
    return reportError(err);
  }
  spinner?.stop();

  const failed = checks.filter(
    (check, i) => check.status.state !== "installed" && specs[i]?.requirement !== ""
  );

  if (options.json) {
    console.log(JSON.stringify(checks, null, 2));
    return failed.length > 0 ? EXIT_DRIFT : EXIT_OK;
  }

  for (const check of checks) {
    printCheck(check);
  }

  if (failed.length > 0) {
    console.log();
    log.error(`${failed.length} required dependenc${failed.length === 1 ? "y" : "ies"} not satisfied`);
    return EXIT_DRIFT;
  }
  return EXIT_OK;
}

function printCheck(check: DependencyCheck): void {
  const noColor = !!process.env.NO_COLOR;
  const { status } = check;
  switch (status.state) {
    case "installed":
      log.success(`${check.name} ${noColor ? status.version : chalk.green(status.version)}`);
      break;
    case "version-mismatch":
      log.warn(`${check.name} ${status.version} does not satisfy ${status.required}`);
      break;
    case "missing":
      log.warn(`${check.name} not found`);
      break;
  }
}
