import { describe, it, expect, vi } from "vitest";

import { parseNumstat, parseWorktreeList, splitNul } from "./git.js";

vi.mock("@/cli/logger.js", () => ({
  debug: vi.fn(),
}));

describe("splitNul", () => {
  it("should split on NUL and drop the trailing empty entry", () => {
    expect(splitNul("a.rs\0dir/b c.rs\0")).toEqual(["a.rs", "dir/b c.rs"]);
  });

  it("should keep newlines inside file names", () => {
    expect(splitNul("odd\nname\0")).toEqual(["odd\nname"]);
  });

  it("should return an empty list for empty output", () => {
    expect(splitNul("")).toEqual([]);
  });
});

describe("parseNumstat", () => {
  it("should sum added and removed lines", () => {
    const output = "10\t2\tsrc/lib.rs\n3\t0\tREADME.md\n";

    expect(parseNumstat(output)).toEqual({ added: 13, removed: 2 });
  });

  it("should count binary files as zero", () => {
    const output = "-\t-\tlogo.png\n4\t1\tsrc/main.rs\n";

    expect(parseNumstat(output)).toEqual({ added: 4, removed: 1 });
  });

  it("should return zero totals for an empty diff", () => {
    expect(parseNumstat("")).toEqual({ added: 0, removed: 0 });
  });
});

describe("parseWorktreeList", () => {
  it("should extract worktree paths in listing order", () => {
    const output = [
      "worktree /repo",
      "HEAD 0123abcd",
      "branch refs/heads/main",
      "",
      "worktree /repo/.sdd/worktrees/c1/agent1",
      "HEAD 0123abcd",
      "branch refs/heads/sdd/c1/agent1",
      "",
    ].join("\n");

    expect(parseWorktreeList(output)).toEqual(["/repo", "/repo/.sdd/worktrees/c1/agent1"]);
  });
});
