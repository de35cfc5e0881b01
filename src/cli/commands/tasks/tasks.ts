/**
 * Tasks Command
 *
 * Runs one read-only agent over the digest and review and stores the task
 * breakdown as 40_tasks.md.
 */

import * as path from "path";

import { loadCommandContext, runCommand } from "@/cli/commands/context.js";
import { renderTasksPrompt } from "@/cli/features/docs/prompts.js";
import { ensureSchemas, getSchemaPath } from "@/cli/features/docs/templates.js";
import { runSingleAgent } from "@/cli/features/orchestrator/singleRun.js";
import { recordThread, resolveChangeId, withState } from "@/cli/features/state/stateStore.js";
import { success } from "@/cli/logger.js";
import { findChangeDir, getContextDir } from "@/cli/paths.js";
import { writeFileEnsuringDir } from "@/utils/path.js";

import type { CommandContext } from "@/cli/commands/context.js";
import type { Command } from "commander";

/**
 * Run the tasks stage
 * @param args - Tasks arguments
 * @param args.ctx - Command context
 * @param args.id - Change id (defaults to the active change)
 *
 * @returns Path of the written task list
 */
export const runTasks = async (args: {
  ctx: CommandContext;
  id?: string | null;
}): Promise<string> => {
  const { paths, runner } = args.ctx;

  const tasksPath = await withState({
    statePath: paths.statePath,
    fn: async (state) => {
      const changeId = resolveChangeId({ state, requested: args.id });
      const changeDir = await findChangeDir({ paths, changeId });
      await ensureSchemas({ paths });

      const run = await runSingleAgent({
        runner,
        runsDir: paths.runsDir,
        changeId,
        name: "tasks",
        cwd: paths.repoRoot,
        prompt: renderTasksPrompt({ changeDir, changeId }),
        promptPath: path.join(getContextDir({ changeDir }), "tasks_prompt.md"),
        sandbox: "read-only",
        schemaPath: getSchemaPath({ paths, name: "tasks" }),
      });
      recordThread({ state, changeId, purpose: "tasks", threadId: run.threadId });

      const target = path.join(changeDir, "40_tasks.md");
      await writeFileEnsuringDir({ filePath: target, contents: run.output });
      return target;
    },
  });

  success({ message: `tasks complete: ${tasksPath}` });
  return tasksPath;
};

/**
 * Register the 'tasks' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerTasksCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("tasks")
    .description("Break the change into tasks with a read-only agent")
    .option("--id <id>", "Change id (defaults to the active change)")
    .action(async (options: { id?: string }) => {
      await runCommand({
        action: async () => {
          const ctx = await loadCommandContext();
          await runTasks({ ctx, id: options.id ?? null });
        },
      });
    });
};
