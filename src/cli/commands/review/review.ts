/**
 * Review Command
 *
 * Runs one read-only agent over the repo digest and stores its findings as
 * 20_review.md.
 */

import * as path from "path";

import { loadCommandContext, runCommand } from "@/cli/commands/context.js";
import { renderReviewPrompt } from "@/cli/features/docs/prompts.js";
import { ensureSchemas, getSchemaPath } from "@/cli/features/docs/templates.js";
import { runSingleAgent } from "@/cli/features/orchestrator/singleRun.js";
import { recordThread, resolveChangeId, withState } from "@/cli/features/state/stateStore.js";
import { success } from "@/cli/logger.js";
import { findChangeDir, getContextDir } from "@/cli/paths.js";
import { writeFileEnsuringDir } from "@/utils/path.js";

import type { CommandContext } from "@/cli/commands/context.js";
import type { Command } from "commander";

/**
 * Run the review stage
 * @param args - Review arguments
 * @param args.ctx - Command context
 * @param args.id - Change id (defaults to the active change)
 *
 * @returns Path of the written review
 */
export const runReview = async (args: {
  ctx: CommandContext;
  id?: string | null;
}): Promise<string> => {
  const { paths, runner } = args.ctx;

  const reviewPath = await withState({
    statePath: paths.statePath,
    fn: async (state) => {
      const changeId = resolveChangeId({ state, requested: args.id });
      const changeDir = await findChangeDir({ paths, changeId });
      await ensureSchemas({ paths });

      const run = await runSingleAgent({
        runner,
        runsDir: paths.runsDir,
        changeId,
        name: "review",
        cwd: paths.repoRoot,
        prompt: renderReviewPrompt({ changeDir, changeId }),
        promptPath: path.join(getContextDir({ changeDir }), "review_prompt.md"),
        sandbox: "read-only",
        schemaPath: getSchemaPath({ paths, name: "review" }),
      });
      recordThread({ state, changeId, purpose: "review", threadId: run.threadId });

      const target = path.join(changeDir, "20_review.md");
      await writeFileEnsuringDir({ filePath: target, contents: run.output });
      return target;
    },
  });

  success({ message: `review complete: ${reviewPath}` });
  return reviewPath;
};

/**
 * Register the 'review' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerReviewCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("review")
    .description("Review the repo digest with a read-only agent")
    .option("--id <id>", "Change id (defaults to the active change)")
    .action(async (options: { id?: string }) => {
      await runCommand({
        action: async () => {
          const ctx = await loadCommandContext();
          await runReview({ ctx, id: options.id ?? null });
        },
      });
    });
};
