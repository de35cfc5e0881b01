/**
 * Test Plan Command
 *
 * For every worktree of an approved change: let an agent write the test
 * plan, run the test suite, optionally measure coverage, and record the
 * numbers select needs.
 */

import * as fs from "fs/promises";
import * as path from "path";

import { loadCommandContext, runCommand } from "@/cli/commands/context.js";
import { ConfigError, SddError } from "@/cli/errors.js";
import { renderTestPlanPrompt } from "@/cli/features/docs/prompts.js";
import { ensureSchemas, getSchemaPath } from "@/cli/features/docs/templates.js";
import { runSingleAgent } from "@/cli/features/orchestrator/singleRun.js";
import { writeRecords } from "@/cli/features/selection/metrics.js";
import {
  loadState,
  recordThread,
  requireApproved,
  resolveChangeId,
  withState,
} from "@/cli/features/state/stateStore.js";
import { info, success, warn } from "@/cli/logger.js";
import { findChangeDir, getContextDir, getRunDir } from "@/cli/paths.js";
import { writeFileEnsuringDir } from "@/utils/path.js";

import type { CommandContext } from "@/cli/commands/context.js";
import type { Config } from "@/cli/config.js";
import type { VariantMetrics } from "@/cli/features/selection/metrics.js";
import type { Command } from "commander";
import type { Dirent } from "fs";

export const NO_COVERAGE = "none";

/**
 * Look up the coverage command for a tool name
 * @param args - Arguments
 * @param args.config - Config
 * @param args.tool - Tool name or "none"
 *
 * @throws ConfigError for an unknown tool
 *
 * @returns Command to run, or null for "none"
 */
export const resolveCoverageCommand = (args: {
  config: Config;
  tool: string;
}): Array<string> | null => {
  const { config, tool } = args;
  if (tool === NO_COVERAGE) {
    return null;
  }
  const command = config.coverageCommands[tool];
  if (command == null) {
    const known = [...Object.keys(config.coverageCommands), NO_COVERAGE].join(", ");
    throw new ConfigError({
      message: `unknown coverage tool "${tool}" (expected one of: ${known})`,
    });
  }
  return command;
};

/**
 * Agent directories under .sdd/worktrees/<id>, sorted by name
 * @param args - Arguments
 * @param args.worktreeRoot - Worktree root of the change
 *
 * @returns Agent names
 */
const listAgentWorktrees = async (args: { worktreeRoot: string }): Promise<Array<string>> => {
  let entries: Array<Dirent>;
  try {
    entries = await fs.readdir(args.worktreeRoot, { withFileTypes: true });
  } catch (err) {
    throw new SddError({
      message: `no worktrees at ${args.worktreeRoot}; run "sdd worktrees" first`,
      kind: "io",
      cause: err,
    });
  }
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
};

/**
 * Run the test-plan stage
 * @param args - Test plan arguments
 * @param args.ctx - Command context
 * @param args.id - Change id (defaults to the active change)
 * @param args.coverage - Coverage tool name, or "none"
 *
 * @throws GateViolationError when the change is not approved
 *
 * @returns Metrics per worktree
 */
export const runTestPlan = async (args: {
  ctx: CommandContext;
  id?: string | null;
  coverage?: string | null;
}): Promise<Array<VariantMetrics>> => {
  const { paths, config, runner, quality } = args.ctx;
  const coverageTool = args.coverage ?? "llvm-cov";
  const coverageCommand = resolveCoverageCommand({ config, tool: coverageTool });

  const state = await loadState({ statePath: paths.statePath });
  const changeId = resolveChangeId({ state, requested: args.id });
  requireApproved({ state, changeId });

  const changeDir = await findChangeDir({ paths, changeId });
  const runDir = getRunDir({ paths, changeId });
  const agents = await listAgentWorktrees({
    worktreeRoot: path.join(paths.worktreesDir, changeId),
  });
  await ensureSchemas({ paths });
  await fs.mkdir(runDir, { recursive: true });

  const metrics: Array<VariantMetrics> = [];
  const sections: Array<string> = [];
  const threads: Array<{ purpose: string; threadId: string }> = [];

  for (const agent of agents) {
    const worktreePath = path.join(paths.worktreesDir, changeId, agent);
    info({ message: `test plan for ${agent}` });

    const run = await runSingleAgent({
      runner,
      runsDir: paths.runsDir,
      changeId,
      name: `test_plan_${agent}`,
      cwd: worktreePath,
      prompt: renderTestPlanPrompt({ changeId, agent }),
      promptPath: path.join(getContextDir({ changeDir }), `test_plan_prompt_${agent}.md`),
      sandbox: "workspace-write",
      schemaPath: getSchemaPath({ paths, name: "tasks" }),
    });
    threads.push({ purpose: `test_plan_${agent}`, threadId: run.threadId });

    const tests = await quality.runTests({ cwd: worktreePath, command: config.testCommand });
    const testOutput = path.join(runDir, `test_results_${agent}.txt`);
    await writeFileEnsuringDir({ filePath: testOutput, contents: tests.stdout });
    if (!tests.success) {
      warn({ message: `tests failed in ${agent}` });
    }

    let coveragePercent: number | null = null;
    let coverageOutput: string | null = null;
    if (coverageCommand != null) {
      const coverage = await quality.runCoverage({
        cwd: worktreePath,
        command: coverageCommand,
      });
      coverageOutput = path.join(runDir, `coverage_${agent}.txt`);
      await writeFileEnsuringDir({ filePath: coverageOutput, contents: coverage.stdout });
      coveragePercent = coverage.percent;
    }

    sections.push(`## ${agent}\n\n${run.output}\n`);
    metrics.push({
      agent,
      tests_passed: tests.success,
      coverage_percent: coveragePercent,
      coverage_tool: coverageCommand == null ? NO_COVERAGE : coverageTool,
      test_output: testOutput,
      coverage_output: coverageOutput,
    });
  }

  await writeFileEnsuringDir({
    filePath: path.join(changeDir, "50_test_plan.md"),
    contents: `# Test Plan\n\n${sections.join("\n")}`,
  });
  await writeRecords({ filePath: path.join(runDir, "metrics.json"), records: metrics });

  if (threads.length > 0) {
    await withState({
      statePath: paths.statePath,
      fn: async (current) => {
        for (const thread of threads) {
          recordThread({ state: current, changeId, ...thread });
        }
      },
    });
  }

  success({ message: `test-plan complete: ${changeDir}` });
  return metrics;
};

/**
 * Register the 'test-plan' command with commander
 * @param args - Configuration arguments
 * @param args.program - Commander program instance
 */
export const registerTestPlanCommand = (args: { program: Command }): void => {
  const { program } = args;

  program
    .command("test-plan")
    .description("Write test plans and collect test and coverage results per worktree")
    .option("--id <id>", "Change id (defaults to the active change)")
    .option("--coverage <tool>", "Coverage tool (llvm-cov, tarpaulin or none)", "llvm-cov")
    .action(async (options: { id?: string; coverage: string }) => {
      await runCommand({
        action: async () => {
          const ctx = await loadCommandContext();
          await runTestPlan({ ctx, id: options.id ?? null, coverage: options.coverage });
        },
      });
    });
};
