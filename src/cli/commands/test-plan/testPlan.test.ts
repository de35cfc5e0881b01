import * as fs from "fs/promises";
import { tmpdir } from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { ConfigError, GateViolationError, SddError } from "@/cli/errors.js";
import { readMetrics } from "@/cli/features/selection/metrics.js";
import { loadState } from "@/cli/features/state/stateStore.js";
import { createFakeQualityRunner, createTestContext, seedChange } from "@/cli/testing/fakes.js";
import { pathExists } from "@/utils/path.js";

import { resolveCoverageCommand, runTestPlan } from "./testPlan.js";

vi.mock("@/cli/logger.js", () => ({
  debug: vi.fn(),
  info: vi.fn(),
  success: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

describe("resolveCoverageCommand", () => {
  it("should map tool names to configured commands", () => {
    const { config } = createTestContext({ repoRoot: "/repo" });

    expect(resolveCoverageCommand({ config, tool: "tarpaulin" })).toEqual([
      "cargo",
      "tarpaulin",
      "--quiet",
    ]);
    expect(resolveCoverageCommand({ config, tool: "none" })).toBeNull();
    expect(() => resolveCoverageCommand({ config, tool: "gcov" })).toThrow(
      'unknown coverage tool "gcov" (expected one of: llvm-cov, tarpaulin, none)',
    );
  });
});

describe("test-plan command", () => {
  let repoRoot: string;
  let ctx: ReturnType<typeof createTestContext>;
  let changeDir: string;
  let runDir: string;

  const worktree = (agent: string): string => {
    return path.join(repoRoot, ".sdd", "worktrees", "c1", agent);
  };

  beforeEach(async () => {
    repoRoot = await fs.mkdtemp(path.join(tmpdir(), "test-plan-test-"));
    ctx = createTestContext({ repoRoot });
    ({ changeDir } = await seedChange({ paths: ctx.paths, changeId: "c1", approved: true }));
    runDir = path.join(repoRoot, ".sdd", "runs", "c1");
    await fs.mkdir(worktree("agent2"), { recursive: true });
    await fs.mkdir(worktree("agent1"), { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(repoRoot, { recursive: true, force: true });
  });

  it("should plan, test and measure every worktree", async () => {
    ctx.quality = createFakeQualityRunner({ failingTests: ["agent2"] });

    const metrics = await runTestPlan({ ctx });

    expect(metrics).toEqual([
      {
        agent: "agent1",
        tests_passed: true,
        coverage_percent: 75,
        coverage_tool: "llvm-cov",
        test_output: path.join(runDir, "test_results_agent1.txt"),
        coverage_output: path.join(runDir, "coverage_agent1.txt"),
      },
      {
        agent: "agent2",
        tests_passed: false,
        coverage_percent: 75,
        coverage_tool: "llvm-cov",
        test_output: path.join(runDir, "test_results_agent2.txt"),
        coverage_output: path.join(runDir, "coverage_agent2.txt"),
      },
    ]);
    expect(await readMetrics({ metricsPath: path.join(runDir, "metrics.json") })).toEqual(metrics);
    expect(await fs.readFile(path.join(runDir, "test_results_agent2.txt"), "utf-8")).toBe(
      "tests for agent2",
    );
    expect(ctx.quality.commands).toEqual([
      ["cargo", "test"],
      ["cargo", "llvm-cov", "--summary"],
      ["cargo", "test"],
      ["cargo", "llvm-cov", "--summary"],
    ]);
  });

  it("should run each agent in its worktree with write access", async () => {
    await runTestPlan({ ctx });

    expect(ctx.runner.calls.map((call) => [call.cwd, call.sandbox])).toEqual([
      [worktree("agent1"), "workspace-write"],
      [worktree("agent2"), "workspace-write"],
    ]);
    expect(await fs.readFile(path.join(changeDir, "50_test_plan.md"), "utf-8")).toBe(
      "# Test Plan\n\n" +
        "## agent1\n\ntest_plan_agent1 summary\n" +
        "\n" +
        "## agent2\n\ntest_plan_agent2 summary\n",
    );

    const state = await loadState({ statePath: ctx.paths.statePath });
    expect(state.changes.c1.codex_threads.map((thread) => thread.purpose)).toEqual([
      "test_plan_agent1",
      "test_plan_agent2",
    ]);
  });

  it("should take coverage from the first whitespace token ending in a percent", async () => {
    ctx.quality = createFakeQualityRunner({
      coverageOutput: "ratio 3/4=75%done\nlines 61.5% TOTAL 90%",
    });

    const metrics = await runTestPlan({ ctx });

    expect(metrics.map((metric) => metric.coverage_percent)).toEqual([61.5, 61.5]);
  });

  it("should skip coverage when asked to", async () => {
    const metrics = await runTestPlan({ ctx, coverage: "none" });

    expect(metrics[0]).toMatchObject({
      coverage_percent: null,
      coverage_tool: "none",
      coverage_output: null,
    });
    expect(await pathExists(path.join(runDir, "coverage_agent1.txt"))).toBe(false);
    expect(ctx.quality.commands).toEqual([
      ["cargo", "test"],
      ["cargo", "test"],
    ]);
  });

  it("should reject an unknown coverage tool before running anything", async () => {
    await expect(runTestPlan({ ctx, coverage: "gcov" })).rejects.toBeInstanceOf(ConfigError);
    expect(ctx.runner.calls).toEqual([]);
  });

  it("should refuse an unapproved change", async () => {
    await seedChange({ paths: ctx.paths, changeId: "c1" });

    await expect(runTestPlan({ ctx })).rejects.toBeInstanceOf(GateViolationError);
  });

  it("should fail when the change has no worktrees", async () => {
    await fs.rm(path.join(repoRoot, ".sdd", "worktrees"), { recursive: true });

    await expect(runTestPlan({ ctx })).rejects.toBeInstanceOf(SddError);
  });
});
