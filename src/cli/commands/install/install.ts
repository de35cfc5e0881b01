/**
 * Install Command
 *
 * Writes the `plans` prompt into the agent's home so a new agent session
 * can start the workflow.
 */

import * as os from "os";
import * as path from "path";

import { runCommand } from "@/cli/commands/context.js";
import { writePlansPrompt } from "@/cli/features/docs/templates.js";
import { info, success } from "@/cli/logger.js";
import { expandDir } from "@/utils/path.js";

import type { Command } from "commander";

/**
 * Agent home directory: $CODEX_HOME, else ~/.codex
 * @param args - Arguments
 * @param args.env - Process environment
 *
 * @returns Absolute agent home
 */
export const resolveAgentHome = (args: { env: NodeJS.ProcessEnv }): string => {
  const configured = args.env.CODEX_HOME?.trim();
  if (configured != null && configured !== "") {
    return expandDir({ dir: configured });
  }
  return path.join(os.homedir(), ".codex");
};

/**
 * Install the plans prompt
 * @param args - Install arguments
 * @param args.env - Process environment
 *
 * @returns Path of the written prompt
 */
export const runInstall = async (args: { env: NodeJS.ProcessEnv }): Promise<string> => {
  const agentHome = resolveAgentHome({ env: args.env });
  const promptPath = await writePlansPrompt({ agentHome });

  success({ message: `Wrote ${promptPath}` });
  info({ message: "Open a new agent session to pick up the plans prompt." });
  return promptPath;
};

/**
 * Register the 'install' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerInstallCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("install")
    .description("Install the plans prompt into $CODEX_HOME/prompts")
    .action(async () => {
      await runCommand({
        action: async () => {
          await runInstall({ env: process.env });
        },
      });
    });
};
