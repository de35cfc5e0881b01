/**
 * git collaborator backed by simple-git
 */

import { existsSync } from "fs";

import { simpleGit } from "simple-git";

import { RepositoryError, SubprocessError, describeError } from "@/cli/errors.js";
import { debug } from "@/cli/logger.js";

import type { VersionControl } from "./types.js";

/**
 * Run a raw git command
 * @param args - Command arguments
 * @param args.cwd - Working directory
 * @param args.gitArgs - Arguments after "git"
 *
 * @throws SubprocessError when git reports failure
 *
 * @returns Captured stdout
 */
const runGit = async (args: { cwd: string; gitArgs: Array<string> }): Promise<string> => {
  const { cwd, gitArgs } = args;
  const command = `git ${gitArgs.join(" ")}`;
  debug({ message: `${command} (in ${cwd})` });

  try {
    return await simpleGit({ baseDir: cwd }).raw(gitArgs);
  } catch (err) {
    throw new SubprocessError({ command, stderr: describeError(err), cause: err });
  }
};

const splitLines = (output: string): Array<string> => {
  return output.split("\n").filter((line) => line.trim() !== "");
};

/**
 * Split NUL-separated output (git ls-files -z)
 * @param output - Raw stdout
 *
 * @returns Non-empty entries
 */
export const splitNul = (output: string): Array<string> => {
  return output.split("\0").filter((entry) => entry !== "");
};

/**
 * Sum `git diff --numstat` output; binary files ("-") count as zero
 * @param output - Raw stdout
 *
 * @returns Added and removed line totals
 */
export const parseNumstat = (output: string): { added: number; removed: number } => {
  let added = 0;
  let removed = 0;
  for (const line of splitLines(output)) {
    const [add, del] = line.trim().split(/\s+/);
    added += toCount(add);
    removed += toCount(del);
  }
  return { added, removed };
};

const toCount = (value: string | undefined): number => {
  if (value == null || !/^\d+$/.test(value)) {
    return 0;
  }
  return Number.parseInt(value, 10);
};

/**
 * Extract worktree paths from `git worktree list --porcelain`
 * @param output - Raw stdout
 *
 * @returns Worktree paths in listing order
 */
export const parseWorktreeList = (output: string): Array<string> => {
  return splitLines(output)
    .filter((line) => line.startsWith("worktree "))
    .map((line) => line.slice("worktree ".length));
};

/**
 * Resolve the top-level directory of the repository containing `cwd`
 * @param args - Arguments
 * @param args.cwd - Directory to start from
 *
 * @throws RepositoryError when `cwd` is not inside a git repository
 *
 * @returns Absolute repository root
 */
export const resolveRepoRoot = async (args: { cwd: string }): Promise<string> => {
  const { cwd } = args;
  let root = "";
  try {
    root = (await simpleGit({ baseDir: cwd }).revparse(["--show-toplevel"])).trim();
  } catch (err) {
    throw new RepositoryError({
      message: `a git repository is required (${describeError(err)})`,
      cause: err,
    });
  }
  if (root === "") {
    throw new RepositoryError({ message: "a git repository is required" });
  }
  return root;
};

/**
 * VersionControl implementation that shells out to git
 */
export class GitClient implements VersionControl {
  async listTrackedFiles(args: { repoRoot: string }): Promise<Array<string>> {
    return splitNul(await runGit({ cwd: args.repoRoot, gitArgs: ["ls-files", "-z"] }));
  }

  async listUntrackedFiles(args: { repoRoot: string }): Promise<Array<string>> {
    const output = await runGit({
      cwd: args.repoRoot,
      gitArgs: ["ls-files", "--others", "--exclude-standard", "-z"],
    });
    return splitNul(output);
  }

  async diffNames(args: { cwd: string; base: string }): Promise<Array<string>> {
    return splitLines(
      await runGit({ cwd: args.cwd, gitArgs: ["diff", "--name-only", args.base] }),
    );
  }

  async diffNumstat(args: {
    cwd: string;
    base: string;
  }): Promise<{ added: number; removed: number }> {
    return parseNumstat(
      await runGit({ cwd: args.cwd, gitArgs: ["diff", "--numstat", args.base] }),
    );
  }

  async currentCommit(args: { cwd: string }): Promise<string> {
    const commit = (await runGit({ cwd: args.cwd, gitArgs: ["rev-parse", "HEAD"] })).trim();
    if (commit === "") {
      throw new SubprocessError({ command: "git rev-parse HEAD", stderr: "no commit" });
    }
    return commit;
  }

  async verifyRef(args: { cwd: string; ref: string }): Promise<string | null> {
    try {
      const resolved = await runGit({
        cwd: args.cwd,
        gitArgs: ["rev-parse", "--verify", args.ref],
      });
      return resolved.trim() === "" ? null : resolved.trim();
    } catch (err) {
      debug({ message: `ref ${args.ref} not found: ${describeError(err)}` });
      return null;
    }
  }

  async createWorktree(args: {
    repoRoot: string;
    branch: string;
    worktreePath: string;
  }): Promise<boolean> {
    const { repoRoot, branch, worktreePath } = args;
    if (existsSync(worktreePath)) {
      return false;
    }
    await runGit({
      cwd: repoRoot,
      gitArgs: ["worktree", "add", "-b", branch, worktreePath],
    });
    return true;
  }

  async listWorktrees(args: { repoRoot: string }): Promise<Array<string>> {
    return parseWorktreeList(
      await runGit({ cwd: args.repoRoot, gitArgs: ["worktree", "list", "--porcelain"] }),
    );
  }

  async merge(args: {
    repoRoot: string;
    branch: string;
    noFastForward: boolean;
  }): Promise<void> {
    const gitArgs = ["merge"];
    if (args.noFastForward) {
      gitArgs.push("--no-ff");
    }
    gitArgs.push(args.branch);
    await runGit({ cwd: args.repoRoot, gitArgs });
  }

  async cherryPick(args: { repoRoot: string; branch: string }): Promise<void> {
    await runGit({ cwd: args.repoRoot, gitArgs: ["cherry-pick", "-x", args.branch] });
  }
}
