/**
 * Status Command
 *
 * Prints what the state knows about a change.
 */

import { loadCommandContext, runCommand } from "@/cli/commands/context.js";
import { inferStage } from "@/cli/features/gate/workflowGate.js";
import { getChangeState, loadState } from "@/cli/features/state/stateStore.js";
import { bold, gray, info, newline, raw } from "@/cli/logger.js";

import type { CommandContext } from "@/cli/commands/context.js";
import type { ChangeState } from "@/cli/features/state/types.js";
import type { Command } from "commander";

/**
 * Render a change's state as plain lines
 * @param args - Render arguments
 * @param args.changeId - Change identifier
 * @param args.change - Change state
 *
 * @returns Lines without trailing newlines
 */
export const formatChangeStatus = (args: {
  changeId: string;
  change: ChangeState;
}): Array<string> => {
  const { changeId, change } = args;
  const approval = change.approved
    ? `yes (${change.approved_by ?? "unknown"} at ${change.approved_at ?? "?"})`
    : "no";
  const fileCount = Object.keys(change.file_hashes).length;

  const lines = [
    `change: ${changeId}`,
    `stage: ${inferStage({ change })}`,
    `approved: ${approval}`,
    `file index: ${change.file_index_hash ?? "none"} (${fileCount} files)`,
    `base commit: ${change.base_commit ?? "none"}`,
  ];

  const shardNames = Object.keys(change.reader_shard_hashes).sort();
  lines.push(`reader shards: ${shardNames.length}`);
  for (const name of shardNames) {
    lines.push(`  ${name} ${change.reader_shard_hashes[name]}`);
  }

  lines.push(`agent runs: ${change.codex_threads.length}`);
  for (const thread of change.codex_threads) {
    lines.push(`  ${thread.started_at} ${thread.purpose} ${thread.thread_id}`);
  }
  return lines;
};

/**
 * Show status
 * @param args - Status arguments
 * @param args.ctx - Command context
 * @param args.id - Change id (defaults to the active change)
 *
 * @returns Printed lines
 */
export const runStatus = async (args: {
  ctx: CommandContext;
  id?: string | null;
}): Promise<Array<string>> => {
  const { paths } = args.ctx;
  const state = await loadState({ statePath: paths.statePath });
  const changeId = args.id ?? state.active_change_id;

  info({ message: bold(`active change: ${state.active_change_id ?? "none"}`) });
  if (changeId == null) {
    return [];
  }

  const change = getChangeState({ state, changeId });
  if (change == null) {
    info({ message: gray(`no state recorded for ${changeId}`) });
    return [];
  }

  const lines = formatChangeStatus({ changeId, change });
  newline();
  for (const line of lines) {
    raw({ message: line });
  }
  return lines;
};

/**
 * Register the 'status' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerStatusCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("status")
    .description("Show approval, index and agent run state of a change")
    .option("--id <id>", "Change id (defaults to the active change)")
    .action(async (options: { id?: string }) => {
      await runCommand({
        action: async () => {
          const ctx = await loadCommandContext();
          await runStatus({ ctx, id: options.id ?? null });
        },
      });
    });
};
