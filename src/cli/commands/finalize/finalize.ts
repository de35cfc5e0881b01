/**
 * Finalize Command
 *
 * Integrates the selected variant's branch and archives the change.
 */

import * as fs from "fs/promises";
import * as path from "path";

import { Option } from "commander";

import { getGateLayout, loadCommandContext, runCommand } from "@/cli/commands/context.js";
import { SddError } from "@/cli/errors.js";
import { requireSpecUpdate } from "@/cli/features/gate/workflowGate.js";
import {
  archiveChange,
  getChangeState,
  requireApproved,
  resolveChangeId,
  withState,
} from "@/cli/features/state/stateStore.js";
import { info, success } from "@/cli/logger.js";
import { findChangeDir } from "@/cli/paths.js";
import { pathExists } from "@/utils/path.js";

import type { CommandContext } from "@/cli/commands/context.js";
import type { Command } from "commander";

export const FINALIZE_STRATEGIES = ["merge", "cherry-pick"] as const;

export type FinalizeStrategy = (typeof FINALIZE_STRATEGIES)[number];

/**
 * Archive location: docs/sdd/archive/<YYYY-MM-DD>-<change dir name>
 * @param args - Arguments
 * @param args.docsArchive - docs/sdd/archive
 * @param args.changeDir - Change directory being archived
 * @param args.now - Archive time
 *
 * @returns Absolute archive directory
 */
export const getArchiveDir = (args: {
  docsArchive: string;
  changeDir: string;
  now: Date;
}): string => {
  const date = args.now.toISOString().slice(0, 10);
  return path.join(args.docsArchive, `${date}-${path.basename(args.changeDir)}`);
};

/**
 * Run the finalize stage
 * @param args - Finalize arguments
 * @param args.ctx - Command context
 * @param args.agent - Selected variant (e.g. agent1)
 * @param args.id - Change id (defaults to the active change)
 * @param args.strategy - How to integrate the branch
 * @param args.now - Clock used for the archive name
 *
 * @throws GateViolationError when the change is not approved or the
 * variant did not update a spec
 *
 * @returns Archive directory
 */
export const runFinalize = async (args: {
  ctx: CommandContext;
  agent: string;
  id?: string | null;
  strategy?: FinalizeStrategy | null;
  now?: Date | null;
}): Promise<string> => {
  const { ctx, agent } = args;
  const { paths, config, vcs } = ctx;
  const strategy = args.strategy ?? "merge";

  const archiveDir = await withState({
    statePath: paths.statePath,
    fn: async (state) => {
      const changeId = resolveChangeId({ state, requested: args.id });
      requireApproved({ state, changeId });
      const changeDir = await findChangeDir({ paths, changeId });

      const worktreePath = path.join(paths.worktreesDir, changeId, agent);
      const baseCommit = getChangeState({ state, changeId })?.base_commit ?? null;
      if (baseCommit != null && (await pathExists(worktreePath))) {
        const changed = await vcs.diffNames({ cwd: worktreePath, base: baseCommit });
        requireSpecUpdate({ changed, layout: getGateLayout({ config }) });
      }

      const branch = `sdd/${changeId}/${agent}`;
      info({ message: `${strategy} ${branch}` });
      if (strategy === "cherry-pick") {
        await vcs.cherryPick({ repoRoot: paths.repoRoot, branch });
      } else {
        await vcs.merge({ repoRoot: paths.repoRoot, branch, noFastForward: true });
      }

      const target = getArchiveDir({
        docsArchive: paths.docsArchive,
        changeDir,
        now: args.now ?? new Date(),
      });
      if (await pathExists(target)) {
        throw new SddError({ message: `archive ${target} already exists`, kind: "io" });
      }
      await fs.mkdir(paths.docsArchive, { recursive: true });
      await fs.rename(changeDir, target);

      archiveChange({ state, changeId });
      return target;
    },
  });

  success({ message: `finalize complete: ${archiveDir}` });
  return archiveDir;
};

/**
 * Register the 'finalize' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerFinalizeCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("finalize")
    .description("Integrate the selected variant and archive the change (requires approval)")
    .requiredOption("--agent <name>", "Selected variant, e.g. agent1")
    .option("--id <id>", "Change id (defaults to the active change)")
    .addOption(
      new Option("--strategy <strategy>", "How to integrate the branch")
        .choices(FINALIZE_STRATEGIES)
        .default("merge"),
    )
    .action(async (options: { agent: string; id?: string; strategy: FinalizeStrategy }) => {
      await runCommand({
        action: async () => {
          const ctx = await loadCommandContext();
          await runFinalize({
            ctx,
            agent: options.agent,
            id: options.id ?? null,
            strategy: options.strategy,
          });
        },
      });
    });
};
