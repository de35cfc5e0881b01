import * as fs from "fs/promises";
import { tmpdir } from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { ConfigError } from "@/cli/errors.js";
import { loadState } from "@/cli/features/state/stateStore.js";
import { createTestContext, seedChange } from "@/cli/testing/fakes.js";

import { resolveApprover, runApprove } from "./approve.js";

vi.mock("@/cli/logger.js", () => ({
  debug: vi.fn(),
  success: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

describe("resolveApprover", () => {
  it("should prefer --by, then USER, then unknown", () => {
    expect(resolveApprover({ by: "alice", env: { USER: "bob" } })).toBe("alice");
    expect(resolveApprover({ by: null, env: { USER: "bob" } })).toBe("bob");
    expect(resolveApprover({ by: "", env: {} })).toBe("unknown");
  });
});

describe("approve command", () => {
  let repoRoot: string;

  beforeEach(async () => {
    repoRoot = await fs.mkdtemp(path.join(tmpdir(), "approve-test-"));
  });

  afterEach(async () => {
    await fs.rm(repoRoot, { recursive: true, force: true });
  });

  it("should approve the active change and write the decision", async () => {
    const ctx = createTestContext({ repoRoot, env: { USER: "tester" } });
    const { changeDir } = await seedChange({ paths: ctx.paths, changeId: "c1" });

    const result = await runApprove({ ctx });

    expect(result.changeId).toBe("c1");
    expect(result.approvedBy).toBe("tester");
    expect(result.decisionPath).toBe(path.join(changeDir, "90_decision.md"));

    const state = await loadState({ statePath: ctx.paths.statePath });
    const change = state.changes.c1;
    expect(change.approved).toBe(true);
    expect(change.approved_by).toBe("tester");
    expect(await fs.readFile(result.decisionPath, "utf-8")).toBe(
      "# Decision\n\n" +
        "- approved: true\n" +
        `- approved_at: ${change.approved_at}\n` +
        "- approved_by: tester\n",
    );
  });

  it("should refresh the approver on a repeated approval", async () => {
    const ctx = createTestContext({ repoRoot });
    await seedChange({ paths: ctx.paths, changeId: "c1", approved: true });

    await runApprove({ ctx, id: "c1", by: "alice" });

    const state = await loadState({ statePath: ctx.paths.statePath });
    expect(state.changes.c1.approved_by).toBe("alice");
  });

  it("should fail without an id or active change", async () => {
    const ctx = createTestContext({ repoRoot });

    await expect(runApprove({ ctx })).rejects.toBeInstanceOf(ConfigError);
  });
});
