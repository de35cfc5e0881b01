/**
 * Shared plumbing for command actions
 */

import { InvalidArgumentError } from "commander";

import { loadConfig } from "@/cli/config.js";
import { describeError } from "@/cli/errors.js";
import { CodexRunner } from "@/cli/features/collaborators/agentRunner.js";
import { GitClient, resolveRepoRoot } from "@/cli/features/collaborators/git.js";
import { processQualityRunner } from "@/cli/features/collaborators/quality.js";
import { createGateLayout } from "@/cli/features/gate/workflowGate.js";
import { error } from "@/cli/logger.js";
import { getRepoPaths } from "@/cli/paths.js";

import type { Config } from "@/cli/config.js";
import type { QualityRunner } from "@/cli/features/collaborators/quality.js";
import type { AgentRunner, VersionControl } from "@/cli/features/collaborators/types.js";
import type { GateLayout } from "@/cli/features/gate/workflowGate.js";
import type { RepoPaths } from "@/cli/paths.js";

/**
 * Everything a repository-scoped command works with
 */
export type CommandContext = {
  paths: RepoPaths;
  config: Config;
  vcs: VersionControl;
  runner: AgentRunner;
  quality: QualityRunner;
  env: NodeJS.ProcessEnv;
};

/**
 * Resolve the repository, load config and wire the real collaborators
 * @param args - Context arguments
 * @param args.cwd - Directory the command was started in
 * @param args.env - Process environment
 *
 * @throws RepositoryError when not inside a git repository
 * @throws ConfigError when .sdd/config.json is invalid
 *
 * @returns Command context
 */
export const loadCommandContext = async (args?: {
  cwd?: string | null;
  env?: NodeJS.ProcessEnv | null;
}): Promise<CommandContext> => {
  const cwd = args?.cwd ?? process.cwd();
  const env = args?.env ?? process.env;

  const repoRoot = await resolveRepoRoot({ cwd });
  const paths = getRepoPaths({ repoRoot });
  const config = await loadConfig({ configPath: paths.configPath, env });

  return {
    paths,
    config,
    vcs: new GitClient(),
    runner: new CodexRunner({ config }),
    quality: processQualityRunner,
    env,
  };
};

export const getGateLayout = (args: { config: Config }): GateLayout => {
  return createGateLayout({
    codePrefixes: args.config.codePrefixes,
    buildManifests: args.config.buildManifests,
  });
};

/**
 * Run a command action, turning any failure into one error line and exit 1
 * @param args - Run arguments
 * @param args.action - Command body
 */
export const runCommand = async (args: { action: () => Promise<void> }): Promise<void> => {
  try {
    await args.action();
  } catch (err) {
    error({ message: describeError(err) });
    process.exit(1);
  }
};

/**
 * commander argument parser for counts
 * @param value - Raw option value
 *
 * @throws InvalidArgumentError when the value is not a non-negative integer
 *
 * @returns Parsed count
 */
export const parseCount = (value: string): number => {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("expected a non-negative integer");
  }
  return Number.parseInt(value.trim(), 10);
};
