/**
 * Init Command
 *
 * Scaffolds docs/sdd/ and AGENTS.md in the current repository.
 */

import { loadCommandContext, runCommand } from "@/cli/commands/context.js";
import { ensureAgentsMd, ensureRepoScaffold } from "@/cli/features/docs/templates.js";
import { info, success } from "@/cli/logger.js";
import { STATE_DIR_NAME } from "@/cli/paths.js";

import type { RepoPaths } from "@/cli/paths.js";
import type { Command } from "commander";

/**
 * Create the repository scaffold; existing files are kept
 * @param args - Init arguments
 * @param args.paths - Repository layout
 *
 * @returns Whether AGENTS.md was created
 */
export const runInit = async (args: { paths: RepoPaths }): Promise<{ agentsCreated: boolean }> => {
  const { paths } = args;
  await ensureRepoScaffold({ paths });
  const agentsCreated = await ensureAgentsMd({ repoRoot: paths.repoRoot });

  if (agentsCreated) {
    success({ message: "Created AGENTS.md" });
  } else {
    info({ message: "AGENTS.md already exists" });
  }
  info({ message: `Consider adding ${STATE_DIR_NAME}/ to .gitignore` });

  return { agentsCreated };
};

/**
 * Register the 'init' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerInitCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("init")
    .description("Scaffold docs/sdd and AGENTS.md in this repository")
    .action(async () => {
      await runCommand({
        action: async () => {
          const ctx = await loadCommandContext();
          await runInit({ paths: ctx.paths });
        },
      });
    });
};
