import * as fs from "fs/promises";
import { tmpdir } from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { AgentRunError } from "@/cli/errors.js";
import { loadState } from "@/cli/features/state/stateStore.js";
import { createTestContext, seedChange } from "@/cli/testing/fakes.js";
import { pathExists } from "@/utils/path.js";

import { runTasks } from "./tasks.js";

vi.mock("@/cli/logger.js", () => ({
  debug: vi.fn(),
  success: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

describe("tasks command", () => {
  let repoRoot: string;
  let ctx: ReturnType<typeof createTestContext>;
  let changeDir: string;

  beforeEach(async () => {
    repoRoot = await fs.mkdtemp(path.join(tmpdir(), "tasks-test-"));
    ctx = createTestContext({ repoRoot });
    ({ changeDir } = await seedChange({ paths: ctx.paths, changeId: "c1" }));
  });

  afterEach(async () => {
    await fs.rm(repoRoot, { recursive: true, force: true });
  });

  it("should run one read-only agent and store the task list", async () => {
    const tasksPath = await runTasks({ ctx });

    expect(tasksPath).toBe(path.join(changeDir, "40_tasks.md"));
    expect(await fs.readFile(tasksPath, "utf-8")).toBe("tasks summary");
    expect(ctx.runner.calls).toHaveLength(1);
    expect(ctx.runner.calls[0]).toMatchObject({
      cwd: repoRoot,
      sandbox: "read-only",
      schemaPath: path.join(repoRoot, ".sdd", "schemas", "tasks.json"),
      promptPath: path.join(changeDir, "context", "tasks_prompt.md"),
    });

    const prompt = await fs.readFile(path.join(changeDir, "context", "tasks_prompt.md"), "utf-8");
    expect(prompt).toContain("change_id: c1\n");
  });

  it("should record the thread", async () => {
    await runTasks({ ctx, id: "c1" });

    const state = await loadState({ statePath: ctx.paths.statePath });
    expect(state.changes.c1.codex_threads.map((thread) => thread.thread_id)).toEqual([
      "thread-tasks",
    ]);
  });

  it("should keep the state and task file untouched when the agent fails", async () => {
    ctx.runner.failing.add("tasks");

    await expect(runTasks({ ctx })).rejects.toThrow(AgentRunError);

    expect(await pathExists(path.join(changeDir, "40_tasks.md"))).toBe(false);
    const state = await loadState({ statePath: ctx.paths.statePath });
    expect(state.changes.c1.codex_threads).toEqual([]);
  });
});
