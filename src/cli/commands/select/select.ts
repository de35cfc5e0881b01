/**
 * Select Command
 *
 * Compares the worktree variants of a change by test outcome, coverage and
 * diff size, and writes a selection summary for the human picking one.
 */

import * as fs from "fs/promises";
import * as path from "path";

import { loadCommandContext, runCommand } from "@/cli/commands/context.js";
import {
  buildVariant,
  detectRisk,
  readMetrics,
  renderSelectionSummary,
  taskCompletionRatio,
  writeRecords,
} from "@/cli/features/selection/metrics.js";
import { getChangeState, loadState, resolveChangeId } from "@/cli/features/state/stateStore.js";
import { debug, success } from "@/cli/logger.js";
import { findChangeDir, getRunDir } from "@/cli/paths.js";
import { writeFileEnsuringDir } from "@/utils/path.js";

import type { CommandContext } from "@/cli/commands/context.js";
import type { SelectionVariant } from "@/cli/features/selection/metrics.js";
import type { Command } from "commander";

/**
 * Read a change document, treating a missing one as empty
 * @param filePath - Document path
 *
 * @returns File contents, or "" when it cannot be read
 */
const readOptionalDocument = async (filePath: string): Promise<string> => {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch {
    debug({ message: `${filePath} not readable; treating as empty` });
    return "";
  }
};

/**
 * Run the select stage
 * @param args - Select arguments
 * @param args.ctx - Command context
 * @param args.id - Change id (defaults to the active change)
 *
 * @returns Selection variants in metrics order
 */
export const runSelect = async (args: {
  ctx: CommandContext;
  id?: string | null;
}): Promise<Array<SelectionVariant>> => {
  const { paths, vcs } = args.ctx;

  const state = await loadState({ statePath: paths.statePath });
  const changeId = resolveChangeId({ state, requested: args.id });
  const changeDir = await findChangeDir({ paths, changeId });
  const runDir = getRunDir({ paths, changeId });

  const metrics = await readMetrics({ metricsPath: path.join(runDir, "metrics.json") });
  const baseCommit = getChangeState({ state, changeId })?.base_commit ?? "HEAD~1";

  const variants: Array<SelectionVariant> = [];
  for (const entry of metrics) {
    const { added, removed } = await vcs.diffNumstat({
      cwd: path.join(paths.worktreesDir, changeId, entry.agent),
      base: baseCommit,
    });
    variants.push(buildVariant({ metrics: entry, added, removed }));
  }

  const summary = renderSelectionSummary({
    tasksCompletion: taskCompletionRatio({
      tasks: await readOptionalDocument(path.join(changeDir, "40_tasks.md")),
    }),
    riskFlag: detectRisk({
      review: await readOptionalDocument(path.join(changeDir, "20_review.md")),
    }),
    variants,
  });

  await writeFileEnsuringDir({
    filePath: path.join(changeDir, "80_selection.md"),
    contents: summary,
  });
  await writeRecords({ filePath: path.join(runDir, "selection.json"), records: variants });

  success({ message: `select complete: ${changeDir}` });
  return variants;
};

/**
 * Register the 'select' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerSelectCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("select")
    .description("Summarize the worktree variants to pick one")
    .option("--id <id>", "Change id (defaults to the active change)")
    .action(async (options: { id?: string }) => {
      await runCommand({
        action: async () => {
          const ctx = await loadCommandContext();
          await runSelect({ ctx, id: options.id ?? null });
        },
      });
    });
};
