/**
 * Check Command
 *
 * Verifies that the working tree's changes against a base ref follow the
 * workflow: code changes come with a spec update and one complete change
 * directory.
 */

import { getGateLayout, loadCommandContext, runCommand } from "@/cli/commands/context.js";
import { checkChangedPaths } from "@/cli/features/gate/workflowGate.js";
import { debug, info, success } from "@/cli/logger.js";

import type { CommandContext } from "@/cli/commands/context.js";
import type { VersionControl } from "@/cli/features/collaborators/types.js";
import type { CheckOutcome } from "@/cli/features/gate/workflowGate.js";
import type { Command } from "commander";

const FALLBACK_BASE = "HEAD~1";

/**
 * Pick the ref to diff against
 * @param args - Arguments
 * @param args.vcs - Version control collaborator
 * @param args.repoRoot - Repository root
 * @param args.requested - Value of --base
 * @param args.defaultBase - Configured default (e.g. origin/main)
 *
 * @returns `requested`, else `defaultBase` when it resolves, else HEAD~1
 */
export const resolveBaseRef = async (args: {
  vcs: VersionControl;
  repoRoot: string;
  requested?: string | null;
  defaultBase: string;
}): Promise<string> => {
  const { vcs, repoRoot, requested, defaultBase } = args;
  if (requested != null && requested !== "") {
    return requested;
  }
  if ((await vcs.verifyRef({ cwd: repoRoot, ref: defaultBase })) != null) {
    return defaultBase;
  }
  debug({ message: `${defaultBase} does not resolve; using ${FALLBACK_BASE}` });
  return FALLBACK_BASE;
};

const OUTCOME_MESSAGES: Record<CheckOutcome, string> = {
  "no-changes": "no changes",
  "docs-only": "docs-only changes pass",
  "non-code": "no code changes; nothing to verify",
  verified: "check passed",
};

/**
 * Run the workflow check
 * @param args - Check arguments
 * @param args.ctx - Command context
 * @param args.base - Base ref
 *
 * @throws GateViolationError when a requirement is not met
 *
 * @returns Why the check passed
 */
export const runCheck = async (args: {
  ctx: CommandContext;
  base?: string | null;
}): Promise<CheckOutcome> => {
  const { paths, config, vcs } = args.ctx;

  const base = await resolveBaseRef({
    vcs,
    repoRoot: paths.repoRoot,
    requested: args.base,
    defaultBase: config.defaultBase,
  });
  const changed = await vcs.diffNames({ cwd: paths.repoRoot, base });
  info({ message: `${changed.length} changed path(s) against ${base}` });

  const outcome = checkChangedPaths({ changed, layout: getGateLayout({ config }) });
  success({ message: OUTCOME_MESSAGES[outcome] });
  return outcome;
};

/**
 * Register the 'check' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerCheckCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("check")
    .description("Verify that code changes carry a spec update and change artifacts")
    .option("--base <ref>", "Base ref (defaults to origin/main, else HEAD~1)")
    .action(async (options: { base?: string }) => {
      await runCommand({
        action: async () => {
          const ctx = await loadCommandContext();
          await runCheck({ ctx, base: options.base ?? null });
        },
      });
    });
};
