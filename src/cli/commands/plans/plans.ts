/**
 * Plans Command
 *
 * Creates a change workspace, indexes the repository, and fans the index out
 * to reader agents whose summaries become the repo digest.
 */

import * as path from "path";

import { loadCommandContext, parseCount, runCommand } from "@/cli/commands/context.js";
import { ConfigError } from "@/cli/errors.js";
import {
  ensureChangeScaffold,
  ensureRepoScaffold,
  ensureSchemas,
  getSchemaPath,
} from "@/cli/features/docs/templates.js";
import { buildIndex, writeIndex, writeRepoTree } from "@/cli/features/index/indexer.js";
import { shardFiles } from "@/cli/features/index/sharder.js";
import { composeRepoDigest, dispatchShards } from "@/cli/features/orchestrator/orchestrator.js";
import { getOrCreateChangeState, withState } from "@/cli/features/state/stateStore.js";
import { info, success, warn } from "@/cli/logger.js";
import {
  findChangeDir,
  getChangeDir,
  getContextDir,
  getStateDirRelative,
  validateChangeId,
} from "@/cli/paths.js";
import { pathExists, slugify, writeFileEnsuringDir } from "@/utils/path.js";

import type { CommandContext } from "@/cli/commands/context.js";
import type { RepoPaths } from "@/cli/paths.js";
import type { Command } from "commander";

export type PlansResult = {
  changeId: string;
  changeDir: string;
  indexHash: string;
  dispatched: Array<string>;
  reused: Array<string>;
};

/**
 * Pick the first free change id: `baseId`, then `baseId-2`, `baseId-3`, ...
 * @param args - Arguments
 * @param args.paths - Repository layout
 * @param args.baseId - Preferred id
 * @param args.slug - Change slug
 *
 * @returns An id whose change directory does not exist yet
 */
export const ensureUniqueChangeId = async (args: {
  paths: RepoPaths;
  baseId: string;
  slug: string;
}): Promise<string> => {
  const { paths, baseId, slug } = args;
  let candidate = baseId;
  let counter = 2;
  while (await pathExists(getChangeDir({ paths, changeId: candidate, slug }))) {
    candidate = `${baseId}-${counter}`;
    counter++;
  }
  return candidate;
};

/**
 * Resolve where this run writes: a fresh change, or an existing one on refresh
 * @param args - Arguments
 * @param args.paths - Repository layout
 * @param args.name - Change name
 * @param args.id - Requested id
 * @param args.refresh - Re-index an existing change in place
 *
 * @returns Change id and directory
 */
const resolveChangeWorkspace = async (args: {
  paths: RepoPaths;
  name: string;
  id: string | null;
  refresh: boolean;
}): Promise<{ changeId: string; changeDir: string }> => {
  const { paths, name, refresh } = args;
  const id = args.id == null ? null : validateChangeId({ changeId: args.id });

  if (refresh) {
    if (id == null) {
      throw new ConfigError({ message: "--refresh needs --id <change-id>" });
    }
    return { changeId: id, changeDir: await findChangeDir({ paths, changeId: id }) };
  }

  const slug = slugify({ name });
  const changeId = await ensureUniqueChangeId({ paths, baseId: id ?? slug, slug });
  return { changeId, changeDir: getChangeDir({ paths, changeId, slug }) };
};

/**
 * Run the plans stage
 * @param args - Plans arguments
 * @param args.ctx - Command context
 * @param args.name - Change name
 * @param args.id - Change id (defaults to the slugified name)
 * @param args.agents - Reader count (defaults to config.readerAgents)
 * @param args.includeUntracked - Index untracked, non-ignored files too
 * @param args.refresh - Re-index the existing change `id`
 *
 * @returns Change location, index hash and dispatch summary
 */
export const runPlans = async (args: {
  ctx: CommandContext;
  name: string;
  id?: string | null;
  agents?: number | null;
  includeUntracked?: boolean | null;
  refresh?: boolean | null;
}): Promise<PlansResult> => {
  const { ctx, name } = args;
  const { paths, config, vcs, runner } = ctx;

  await ensureRepoScaffold({ paths });
  const { changeId, changeDir } = await resolveChangeWorkspace({
    paths,
    name,
    id: args.id ?? null,
    refresh: args.refresh ?? false,
  });
  await ensureChangeScaffold({ changeDir });
  const contextDir = getContextDir({ changeDir });

  const result = await withState({
    statePath: paths.statePath,
    fn: async (state) => {
      const indexResult = await buildIndex({
        repoRoot: paths.repoRoot,
        includeUntracked: args.includeUntracked ?? false,
        vcs,
        stateDir: getStateDirRelative({ paths }),
      });
      if (indexResult.skippedPaths.length > 0) {
        warn({ message: `${indexResult.skippedPaths.length} path(s) skipped` });
      }

      await writeIndex({
        indexPath: path.join(contextDir, "file_index.json"),
        index: indexResult.index,
      });
      await writeRepoTree({
        treePath: path.join(contextDir, "repo_tree.txt"),
        repoTree: indexResult.repoTree,
      });

      const change = getOrCreateChangeState({ state, changeId });
      change.file_hashes = indexResult.fileHashes;
      change.file_index_hash = indexResult.indexHash;
      change.file_index_generated_at = new Date().toISOString();
      state.active_change_id = changeId;

      await ensureSchemas({ paths });

      const shards = shardFiles({
        index: indexResult.index,
        shards: args.agents ?? config.readerAgents,
      });
      info({
        message: `${indexResult.index.files.length} files in ${shards.length} shard(s)`,
      });

      const dispatch = await dispatchShards({
        state,
        changeId,
        shards,
        runner,
        repoRoot: paths.repoRoot,
        runsDir: paths.runsDir,
        contextDir,
        schemaPath: getSchemaPath({ paths, name: "reader" }),
      });

      const digest = await composeRepoDigest({
        runsDir: paths.runsDir,
        changeId,
        shardCount: shards.length,
      });
      for (const fileName of ["repo_digest.md", "10_repo_digest.md"]) {
        await writeFileEnsuringDir({
          filePath: path.join(changeDir, fileName),
          contents: digest,
        });
      }

      return {
        changeId,
        changeDir,
        indexHash: indexResult.indexHash,
        dispatched: dispatch.dispatched,
        reused: dispatch.reused,
      };
    },
  });

  success({ message: `plans complete: ${changeDir}` });
  return result;
};

/**
 * Register the 'plans' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerPlansCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("plans")
    .description("Create a change, index the repository and run reader agents")
    .requiredOption("--name <name>", "Change name")
    .option("--id <id>", "Change id (defaults to the slugified name)")
    .option("--agents <count>", "Number of reader agents", parseCount)
    .option("--include-untracked", "Index untracked files that are not ignored")
    .option("--refresh", "Re-index the existing change given by --id")
    .action(
      async (options: {
        name: string;
        id?: string;
        agents?: number;
        includeUntracked?: boolean;
        refresh?: boolean;
      }) => {
        await runCommand({
          action: async () => {
            const ctx = await loadCommandContext();
            await runPlans({
              ctx,
              name: options.name,
              id: options.id ?? null,
              agents: options.agents ?? null,
              includeUntracked: options.includeUntracked ?? false,
              refresh: options.refresh ?? false,
            });
          },
        });
      },
    );
};
