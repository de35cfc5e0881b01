import * as fs from "fs/promises";
import { tmpdir } from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { GateViolationError } from "@/cli/errors.js";
import { loadState } from "@/cli/features/state/stateStore.js";
import { warn } from "@/cli/logger.js";
import { createTestContext, seedChange } from "@/cli/testing/fakes.js";

import { planWorktrees, runWorktrees } from "./worktrees.js";

vi.mock("@/cli/logger.js", () => ({
  debug: vi.fn(),
  info: vi.fn(),
  success: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

describe("planWorktrees", () => {
  it("should name agents from 1 with one branch each", () => {
    const { paths } = createTestContext({ repoRoot: "/repo" });

    expect(planWorktrees({ paths, changeId: "c1", agents: 2 })).toEqual([
      {
        agent: "agent1",
        branch: "sdd/c1/agent1",
        worktreePath: path.join("/repo", ".sdd", "worktrees", "c1", "agent1"),
      },
      {
        agent: "agent2",
        branch: "sdd/c1/agent2",
        worktreePath: path.join("/repo", ".sdd", "worktrees", "c1", "agent2"),
      },
    ]);
  });
});

describe("worktrees command", () => {
  let repoRoot: string;
  let ctx: ReturnType<typeof createTestContext>;

  beforeEach(async () => {
    repoRoot = await fs.mkdtemp(path.join(tmpdir(), "worktrees-test-"));
    ctx = createTestContext({ repoRoot });
  });

  afterEach(async () => {
    await fs.rm(repoRoot, { recursive: true, force: true });
  });

  it("should refuse an unapproved change", async () => {
    await seedChange({ paths: ctx.paths, changeId: "c1" });

    await expect(runWorktrees({ ctx })).rejects.toBeInstanceOf(GateViolationError);
    expect(ctx.vcs.worktrees).toEqual([]);
    const state = await loadState({ statePath: ctx.paths.statePath });
    expect(state.changes.c1.base_commit).toBeNull();
  });

  it("should record the base commit and create the configured worktrees", async () => {
    await seedChange({ paths: ctx.paths, changeId: "c1", approved: true });

    const result = await runWorktrees({ ctx });

    expect(result).toEqual({
      changeId: "c1",
      baseCommit: "0123abcd",
      created: ["agent1", "agent2"],
    });
    expect(ctx.vcs.worktrees.map((worktree) => worktree.branch)).toEqual([
      "sdd/c1/agent1",
      "sdd/c1/agent2",
    ]);
    const state = await loadState({ statePath: ctx.paths.statePath });
    expect(state.changes.c1.base_commit).toBe("0123abcd");
  });

  it("should leave existing worktrees alone", async () => {
    await seedChange({ paths: ctx.paths, changeId: "c1", approved: true });
    await runWorktrees({ ctx, agents: 1 });

    const rerun = await runWorktrees({ ctx, agents: 3 });

    expect(rerun.created).toEqual(["agent2", "agent3"]);
  });

  it("should warn about a directory git does not know as a worktree", async () => {
    await seedChange({ paths: ctx.paths, changeId: "c1", approved: true });
    const stray = path.join(repoRoot, ".sdd", "worktrees", "c1", "agent1");
    await fs.mkdir(stray, { recursive: true });

    const result = await runWorktrees({ ctx });

    expect(result.created).toEqual(["agent2"]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith({
      message: `${stray} exists but is not a registered git worktree`,
    });
  });
});
