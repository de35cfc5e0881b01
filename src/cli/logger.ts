/**
 * Console logger for the sdd CLI
 * Every level takes a message object so call sites read the same everywhere
 */

import chalk from "chalk";

let silentMode = false;
let verboseMode = false;

/**
 * Suppress all non-error output
 * @param args - Mode arguments
 * @param args.silent - Whether silent mode is on
 */
export const setSilentMode = (args: { silent: boolean }): void => {
  silentMode = args.silent;
};

/**
 * Enable debug output
 * @param args - Mode arguments
 * @param args.verbose - Whether debug lines are printed
 */
export const setVerboseMode = (args: { verbose: boolean }): void => {
  verboseMode = args.verbose;
};

export const info = (args: { message: string }): void => {
  if (silentMode) return;
  console.log(chalk.cyan(args.message));
};

export const success = (args: { message: string }): void => {
  if (silentMode) return;
  console.log(chalk.green(args.message));
};

export const warn = (args: { message: string }): void => {
  if (silentMode) return;
  console.warn(chalk.yellow(`warning: ${args.message}`));
};

/**
 * Errors are printed even in silent mode
 * @param args - Log arguments
 * @param args.message - Message to print
 */
export const error = (args: { message: string }): void => {
  console.error(chalk.red(`error: ${args.message}`));
};

export const debug = (args: { message: string }): void => {
  if (silentMode || !verboseMode) return;
  console.error(chalk.gray(`[${new Date().toISOString()}] ${args.message}`));
};

export const raw = (args: { message: string }): void => {
  if (silentMode) return;
  console.log(args.message);
};

export const newline = (): void => {
  if (silentMode) return;
  console.log();
};

export const bold = (text: string): string => chalk.bold(text);
export const gray = (text: string): string => chalk.gray(text);
