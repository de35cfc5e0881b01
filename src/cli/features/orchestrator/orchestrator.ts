/**
 * Reader orchestration
 *
 * Dispatches one agent run per changed shard, reuses the output of shards
 * whose hash did not change, and folds the results into the change state
 * only after every run has finished.
 */

import * as fs from "fs/promises";
import * as path from "path";

import { AgentRunError, describeError } from "@/cli/errors.js";
import { parseThreadId, outputPaths } from "@/cli/features/collaborators/agentRunner.js";
import { renderReaderPrompt } from "@/cli/features/docs/prompts.js";
import { shardHash, shardName } from "@/cli/features/index/sharder.js";
import { getOrCreateChangeState, recordThread } from "@/cli/features/state/stateStore.js";
import { debug, info, warn } from "@/cli/logger.js";
import { pathExists, writeFileEnsuringDir } from "@/utils/path.js";

import type { AgentRunner } from "@/cli/features/collaborators/types.js";
import type { Shard } from "@/cli/features/index/types.js";
import type { State } from "@/cli/features/state/types.js";

import { partitionOutcomes, runTaskGroup } from "./taskGroup.js";

/**
 * One shard that needs an agent run
 */
export type ShardRun = {
  idx: number;
  name: string;
  hash: string;
  shard: Shard;
  promptPath: string;
  outputPath: string;
  jsonPath: string;
};

/**
 * What a finished reader run contributes to the state
 */
export type ShardRunResult = {
  name: string;
  hash: string;
  threadId: string;
};

export type DispatchResult = {
  /** Shard names that ran this time, in shard order */
  dispatched: Array<string>;
  /** Shard names whose previous output was reused */
  reused: Array<string>;
};

/**
 * Decide which shards need a run
 * @param args - Planning arguments
 * @param args.shards - Ordered shards
 * @param args.storedHashes - shard name -> hash of the last successful run
 * @param args.runsDir - .sdd/runs
 * @param args.contextDir - Change context directory (prompts go here)
 * @param args.changeId - Change identifier
 *
 * @returns Runs to dispatch and names of reused shards
 */
export const planShardRuns = async (args: {
  shards: ReadonlyArray<Shard>;
  storedHashes: Readonly<Record<string, string>>;
  runsDir: string;
  contextDir: string;
  changeId: string;
}): Promise<{ runs: Array<ShardRun>; reused: Array<string> }> => {
  const { shards, storedHashes, runsDir, contextDir, changeId } = args;
  const runs: Array<ShardRun> = [];
  const reused: Array<string> = [];

  for (const [idx, shard] of shards.entries()) {
    if (shard.length === 0) {
      continue;
    }

    const name = shardName({ idx });
    const hash = shardHash({ shard });
    const { outputPath, jsonPath } = outputPaths({ runsDir, changeId, name });

    if (storedHashes[name] === hash && (await pathExists(outputPath))) {
      info({ message: `reuse shard ${idx} (${name} unchanged)` });
      reused.push(name);
      continue;
    }

    runs.push({
      idx,
      name,
      hash,
      shard,
      promptPath: path.join(contextDir, `reader_prompt_${idx}.md`),
      outputPath,
      jsonPath,
    });
  }

  return { runs, reused };
};

/**
 * Execute one reader run
 * @param args - Run arguments
 * @param args.run - Planned shard run
 * @param args.total - Total number of shards
 * @param args.changeId - Change identifier
 * @param args.repoRoot - Repository root (agent working directory)
 * @param args.schemaPath - Reader output schema
 * @param args.runner - Agent runner
 *
 * @throws Error when the agent reports failure
 *
 * @returns Name, hash and thread id of the finished run
 */
const executeShardRun = async (args: {
  run: ShardRun;
  total: number;
  changeId: string;
  repoRoot: string;
  schemaPath: string;
  runner: AgentRunner;
}): Promise<ShardRunResult> => {
  const { run, total, changeId, repoRoot, schemaPath, runner } = args;

  await writeFileEnsuringDir({
    filePath: run.promptPath,
    contents: renderReaderPrompt({ changeId, idx: run.idx, total, shard: run.shard }),
  });

  debug({ message: `dispatch ${run.name} (${run.shard.length} files)` });
  const result = await runner.run({
    spec: {
      cwd: repoRoot,
      promptPath: run.promptPath,
      outputPath: run.outputPath,
      jsonOutputPath: run.jsonPath,
      sandbox: "read-only",
      schemaPath,
    },
  });

  if (!result.ok) {
    const detail = result.stderr.trim();
    throw new Error(
      `exit code ${result.exitCode ?? "unknown"}${detail === "" ? "" : `: ${detail}`}`,
    );
  }

  return {
    name: run.name,
    hash: run.hash,
    threadId: parseThreadId({ jsonl: result.stdout }) ?? run.name,
  };
};

/**
 * Dispatch reader agents for every changed shard and record the results
 *
 * All runs are awaited even when one fails; a failure is reported only
 * after the whole group settled and leaves the state untouched. On success
 * each dispatched shard gets one provenance entry and its new hash.
 *
 * @param args - Dispatch arguments
 * @param args.state - State document (mutated on success)
 * @param args.changeId - Change identifier
 * @param args.shards - Ordered shards from the sharder
 * @param args.runner - Agent runner
 * @param args.repoRoot - Repository root
 * @param args.runsDir - .sdd/runs
 * @param args.contextDir - Change context directory
 * @param args.schemaPath - Reader output schema
 * @param args.concurrency - Maximum runs in flight (defaults to all)
 *
 * @throws AgentRunError naming every failed shard
 *
 * @returns Dispatched and reused shard names
 */
export const dispatchShards = async (args: {
  state: State;
  changeId: string;
  shards: ReadonlyArray<Shard>;
  runner: AgentRunner;
  repoRoot: string;
  runsDir: string;
  contextDir: string;
  schemaPath: string;
  concurrency?: number | null;
}): Promise<DispatchResult> => {
  const { state, changeId, shards, runner, repoRoot, runsDir, contextDir, schemaPath } = args;
  const changeState = getOrCreateChangeState({ state, changeId });

  await fs.mkdir(path.join(runsDir, changeId), { recursive: true });

  const { runs, reused } = await planShardRuns({
    shards,
    storedHashes: changeState.reader_shard_hashes,
    runsDir,
    contextDir,
    changeId,
  });

  const outcomes = await runTaskGroup({
    tasks: runs.map((run) => ({
      name: run.name,
      run: () =>
        executeShardRun({
          run,
          total: shards.length,
          changeId,
          repoRoot,
          schemaPath,
          runner,
        }),
    })),
    concurrency: args.concurrency,
  });

  const { succeeded, failed } = partitionOutcomes({ outcomes });
  if (failed.length > 0) {
    for (const failure of failed) {
      warn({ message: `${failure.name} failed: ${describeError(failure.reason)}` });
    }
    throw new AgentRunError({
      purpose: "reader",
      failedUnits: failed.map((failure) => failure.name),
    });
  }

  // Outcomes come back in shard order, so the log order is stable too
  for (const { value } of succeeded) {
    recordThread({ state, changeId, purpose: value.name, threadId: value.threadId });
    changeState.reader_shard_hashes[value.name] = value.hash;
  }

  return { dispatched: succeeded.map(({ value }) => value.name), reused };
};

/**
 * Concatenate every available reader output into the repo digest
 * @param args - Digest arguments
 * @param args.runsDir - .sdd/runs
 * @param args.changeId - Change identifier
 * @param args.shardCount - Number of shards
 *
 * @returns Markdown digest
 */
export const composeRepoDigest = async (args: {
  runsDir: string;
  changeId: string;
  shardCount: number;
}): Promise<string> => {
  const { runsDir, changeId, shardCount } = args;
  let digest = "# Repo Digest\n\n";

  for (let idx = 0; idx < shardCount; idx++) {
    const { outputPath } = outputPaths({
      runsDir,
      changeId,
      name: shardName({ idx }),
    });
    if (!(await pathExists(outputPath))) {
      continue;
    }
    const contents = await fs.readFile(outputPath, "utf-8");
    digest += `## Shard ${idx}\n\n${contents}\n`;
  }

  return digest;
};
