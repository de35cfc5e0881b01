/**
 * Approve Command
 *
 * Opens the approval gate for a change and records the decision document.
 */

import * as path from "path";

import { loadCommandContext, runCommand } from "@/cli/commands/context.js";
import { renderDecision } from "@/cli/features/docs/prompts.js";
import { approveChange, resolveChangeId, withState } from "@/cli/features/state/stateStore.js";
import { success } from "@/cli/logger.js";
import { findChangeDir } from "@/cli/paths.js";
import { writeFileEnsuringDir } from "@/utils/path.js";

import type { CommandContext } from "@/cli/commands/context.js";
import type { Command } from "commander";

/**
 * Who is approving: --by, else $USER, else "unknown"
 * @param args - Arguments
 * @param args.by - Value of --by
 * @param args.env - Process environment
 *
 * @returns Approver name
 */
export const resolveApprover = (args: {
  by?: string | null;
  env: NodeJS.ProcessEnv;
}): string => {
  if (args.by != null && args.by !== "") {
    return args.by;
  }
  const user = args.env.USER;
  if (user != null && user !== "") {
    return user;
  }
  return "unknown";
};

/**
 * Approve a change
 * @param args - Approve arguments
 * @param args.ctx - Command context
 * @param args.id - Change id (defaults to the active change)
 * @param args.by - Approver
 *
 * @returns Approved change id, approver and decision document path
 */
export const runApprove = async (args: {
  ctx: CommandContext;
  id?: string | null;
  by?: string | null;
}): Promise<{ changeId: string; approvedBy: string; decisionPath: string }> => {
  const { paths, env } = args.ctx;
  const approvedBy = resolveApprover({ by: args.by, env });

  const result = await withState({
    statePath: paths.statePath,
    fn: async (state) => {
      const changeId = resolveChangeId({ state, requested: args.id });
      const changeDir = await findChangeDir({ paths, changeId });
      const change = approveChange({ state, changeId, approvedBy });

      const decisionPath = path.join(changeDir, "90_decision.md");
      await writeFileEnsuringDir({
        filePath: decisionPath,
        contents: renderDecision({
          approvedAt: change.approved_at ?? new Date().toISOString(),
          approvedBy,
        }),
      });
      return { changeId, approvedBy, decisionPath };
    },
  });

  success({ message: `approved ${result.changeId} (by ${approvedBy})` });
  return result;
};

/**
 * Register the 'approve' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerApproveCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("approve")
    .description("Approve a change so worktrees, test-plan and finalize can run")
    .option("--id <id>", "Change id (defaults to the active change)")
    .option("--by <name>", "Approver (defaults to $USER)")
    .action(async (options: { id?: string; by?: string }) => {
      await runCommand({
        action: async () => {
          const ctx = await loadCommandContext();
          await runApprove({ ctx, id: options.id ?? null, by: options.by ?? null });
        },
      });
    });
};
