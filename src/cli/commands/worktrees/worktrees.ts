/**
 * Worktrees Command
 *
 * Records the base commit of an approved change and creates one git
 * worktree per implementation agent.
 */

import * as fs from "fs/promises";
import * as path from "path";

import { loadCommandContext, parseCount, runCommand } from "@/cli/commands/context.js";
import {
  getOrCreateChangeState,
  requireApproved,
  resolveChangeId,
  withState,
} from "@/cli/features/state/stateStore.js";
import { info, success, warn } from "@/cli/logger.js";

import type { CommandContext } from "@/cli/commands/context.js";
import type { RepoPaths } from "@/cli/paths.js";
import type { Command } from "commander";

export type WorktreePlan = {
  agent: string;
  branch: string;
  worktreePath: string;
};

/**
 * Names, branches and locations of a change's worktrees
 * @param args - Arguments
 * @param args.paths - Repository layout
 * @param args.changeId - Change identifier
 * @param args.agents - Number of agents
 *
 * @returns agent1..agentN with branch sdd/<id>/agentN
 */
export const planWorktrees = (args: {
  paths: RepoPaths;
  changeId: string;
  agents: number;
}): Array<WorktreePlan> => {
  const { paths, changeId, agents } = args;
  const root = path.join(paths.worktreesDir, changeId);
  const plans: Array<WorktreePlan> = [];
  for (let idx = 1; idx <= agents; idx++) {
    const agent = `agent${idx}`;
    plans.push({
      agent,
      branch: `sdd/${changeId}/${agent}`,
      worktreePath: path.join(root, agent),
    });
  }
  return plans;
};

/**
 * Create worktrees for an approved change
 * @param args - Worktrees arguments
 * @param args.ctx - Command context
 * @param args.id - Change id (defaults to the active change)
 * @param args.agents - Number of worktrees (defaults to config.worktreeAgents)
 *
 * @throws GateViolationError when the change is not approved
 *
 * @returns Base commit and the worktrees that were newly created
 */
export const runWorktrees = async (args: {
  ctx: CommandContext;
  id?: string | null;
  agents?: number | null;
}): Promise<{ changeId: string; baseCommit: string; created: Array<string> }> => {
  const { paths, config, vcs } = args.ctx;

  const { changeId, baseCommit } = await withState({
    statePath: paths.statePath,
    fn: async (state) => {
      const id = resolveChangeId({ state, requested: args.id });
      requireApproved({ state, changeId: id });

      const commit = await vcs.currentCommit({ cwd: paths.repoRoot });
      getOrCreateChangeState({ state, changeId: id }).base_commit = commit;
      return { changeId: id, baseCommit: commit };
    },
  });

  const created: Array<string> = [];
  await fs.mkdir(path.join(paths.worktreesDir, changeId), { recursive: true });
  const plans = planWorktrees({
    paths,
    changeId,
    agents: args.agents ?? config.worktreeAgents,
  });
  for (const plan of plans) {
    const isNew = await vcs.createWorktree({
      repoRoot: paths.repoRoot,
      branch: plan.branch,
      worktreePath: plan.worktreePath,
    });
    if (isNew) {
      created.push(plan.agent);
    } else {
      info({ message: `${plan.worktreePath} already exists; leaving it alone` });
    }
  }

  const registered = new Set(
    (await vcs.listWorktrees({ repoRoot: paths.repoRoot })).map((entry) => path.resolve(entry)),
  );
  for (const plan of plans) {
    if (!registered.has(path.resolve(plan.worktreePath))) {
      warn({ message: `${plan.worktreePath} exists but is not a registered git worktree` });
    }
  }

  success({ message: `worktrees ready under ${path.join(paths.worktreesDir, changeId)}` });
  return { changeId, baseCommit, created };
};

/**
 * Register the 'worktrees' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerWorktreesCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("worktrees")
    .description("Create one worktree per implementation agent (requires approval)")
    .option("--id <id>", "Change id (defaults to the active change)")
    .option("--agents <count>", "Number of worktrees", parseCount)
    .action(async (options: { id?: string; agents?: number }) => {
      await runCommand({
        action: async () => {
          const ctx = await loadCommandContext();
          await runWorktrees({
            ctx,
            id: options.id ?? null,
            agents: options.agents ?? null,
          });
        },
      });
    });
};
