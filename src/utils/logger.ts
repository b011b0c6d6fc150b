import chalk from "chalk";
import { ENV_DEBUG } from "./constants.js";

const noColor = !!process.env.NO_COLOR;
let debug = !!process.env[ENV_DEBUG];

function colorize(fn: (s: string) => string, text: string): string {
  return noColor ? text : fn(text);
}

export function setDebug(enabled: boolean): void {
  debug = enabled || !!process.env[ENV_DEBUG];
}

export const log = {
  info: (msg: string) => console.log(colorize(chalk.blue, "ℹ") + " " + msg),
  success: (msg: string) =>
    console.log(colorize(chalk.green, "✓") + " " + msg),
  warn: (msg: string) =>
    console.log(colorize(chalk.yellow, "⚠") + " " + msg),
  error: (msg: string) =>
    console.error(colorize(chalk.red, "✗") + " " + msg),
  drift: (msg: string) =>
    console.log(colorize(chalk.red, "⚡") + " " + msg),
  dim: (msg: string) => console.log(colorize(chalk.dim, msg)),
  debug: (msg: string) => {
    if (debug) console.error(colorize(chalk.gray, "· " + msg));
  },
};
