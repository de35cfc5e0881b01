/**
 * In-process stand-ins for git, the agent runner and the quality tools,
 * shared by the command tests
 */

import * as fs from "fs/promises";
import * as path from "path";

import { getDefaultConfig } from "@/cli/config.js";
import { parsePercent } from "@/cli/features/collaborators/quality.js";
import {
  approveChange,
  createState,
  getOrCreateChangeState,
  saveState,
} from "@/cli/features/state/stateStore.js";
import { getChangeDir, getRepoPaths } from "@/cli/paths.js";
import { pathExists, writeFileEnsuringDir } from "@/utils/path.js";

import type { CommandContext } from "@/cli/commands/context.js";
import type { Config } from "@/cli/config.js";
import type { State } from "@/cli/features/state/types.js";
import type { RepoPaths } from "@/cli/paths.js";
import type { QualityRunner } from "@/cli/features/collaborators/quality.js";
import type {
  AgentRunResult,
  AgentRunSpec,
  AgentRunner,
  VersionControl,
} from "@/cli/features/collaborators/types.js";

export class FakeVersionControl implements VersionControl {
  tracked: Array<string> = [];
  untracked: Array<string> = [];
  /** cwd -> changed paths */
  diffs = new Map<string, Array<string>>();
  /** cwd -> line counts */
  numstats = new Map<string, { added: number; removed: number }>();
  refs = new Set<string>();
  commit = "0123abcd";
  worktrees: Array<{ branch: string; worktreePath: string }> = [];
  merges: Array<{ branch: string; noFastForward: boolean }> = [];
  cherryPicks: Array<string> = [];
  diffBases: Array<string> = [];

  async listTrackedFiles(): Promise<Array<string>> {
    return [...this.tracked];
  }

  async listUntrackedFiles(): Promise<Array<string>> {
    return [...this.untracked];
  }

  async diffNames(args: { cwd: string; base: string }): Promise<Array<string>> {
    this.diffBases.push(args.base);
    return [...(this.diffs.get(args.cwd) ?? [])];
  }

  async diffNumstat(args: {
    cwd: string;
    base: string;
  }): Promise<{ added: number; removed: number }> {
    this.diffBases.push(args.base);
    return this.numstats.get(args.cwd) ?? { added: 0, removed: 0 };
  }

  async currentCommit(): Promise<string> {
    return this.commit;
  }

  async verifyRef(args: { ref: string }): Promise<string | null> {
    return this.refs.has(args.ref) ? `${args.ref}-sha` : null;
  }

  async createWorktree(args: {
    repoRoot: string;
    branch: string;
    worktreePath: string;
  }): Promise<boolean> {
    if (await pathExists(args.worktreePath)) {
      return false;
    }
    await fs.mkdir(args.worktreePath, { recursive: true });
    this.worktrees.push({ branch: args.branch, worktreePath: args.worktreePath });
    return true;
  }

  async listWorktrees(): Promise<Array<string>> {
    return this.worktrees.map((worktree) => worktree.worktreePath);
  }

  async merge(args: { branch: string; noFastForward: boolean }): Promise<void> {
    this.merges.push({ branch: args.branch, noFastForward: args.noFastForward });
  }

  async cherryPick(args: { branch: string }): Promise<void> {
    this.cherryPicks.push(args.branch);
  }
}

/**
 * Agent runner that writes "<name> summary" as its last message and reports
 * thread "thread-<name>", where <name> is the output file's base name
 */
export class FakeAgentRunner implements AgentRunner {
  calls: Array<AgentRunSpec> = [];
  /** Run names that report failure */
  failing = new Set<string>();

  async run(args: { spec: AgentRunSpec }): Promise<AgentRunResult> {
    const { spec } = args;
    this.calls.push(spec);
    const name = path.basename(spec.outputPath, ".md");

    if (this.failing.has(name)) {
      return { ok: false, exitCode: 1, stdout: "", stderr: `${name} crashed` };
    }

    await writeFileEnsuringDir({ filePath: spec.outputPath, contents: `${name} summary` });
    return {
      ok: true,
      exitCode: 0,
      stdout: `${JSON.stringify({ type: "thread.started", thread_id: `thread-${name}` })}\n`,
      stderr: "",
    };
  }

  callNames(): Array<string> {
    return this.calls.map((call) => path.basename(call.outputPath, ".md"));
  }
}

/**
 * Quality runner whose results are keyed by worktree directory name
 */
export const createFakeQualityRunner = (args?: {
  failingTests?: Array<string> | null;
  coverageOutput?: string | null;
}): QualityRunner & { commands: Array<Array<string>> } => {
  const failing = new Set(args?.failingTests ?? []);
  const commands: Array<Array<string>> = [];

  return {
    commands,
    runTests: async ({ cwd, command }) => {
      commands.push([...command]);
      const agent = path.basename(cwd);
      return {
        success: !failing.has(agent),
        stdout: `tests for ${agent}`,
        stderr: "",
      };
    },
    runCoverage: async ({ command }) => {
      commands.push([...command]);
      const stdout = args?.coverageOutput ?? "TOTAL 120 30 75.00%";
      return { stdout, percent: parsePercent({ output: stdout }) };
    },
  };
};

/**
 * Build a command context over a temporary repository root
 * @param args - Context arguments
 * @param args.repoRoot - Temporary repository root
 * @param args.config - Config overrides
 * @param args.env - Environment
 *
 * @returns Context plus the fakes it uses
 */
export const createTestContext = (args: {
  repoRoot: string;
  config?: Partial<Config> | null;
  env?: NodeJS.ProcessEnv | null;
}): CommandContext & {
  vcs: FakeVersionControl;
  runner: FakeAgentRunner;
  quality: ReturnType<typeof createFakeQualityRunner>;
} => {
  return {
    paths: getRepoPaths({ repoRoot: args.repoRoot }),
    config: { ...getDefaultConfig(), ...(args.config ?? {}) },
    vcs: new FakeVersionControl(),
    runner: new FakeAgentRunner(),
    quality: createFakeQualityRunner(),
    env: args.env ?? {},
  };
};

/**
 * Write a state holding one active change and create its directory
 * @param args - Seed arguments
 * @param args.paths - Repository layout
 * @param args.changeId - Change identifier
 * @param args.approved - Approve the change as "tester"
 * @param args.baseCommit - Recorded base commit
 *
 * @returns The saved state and the change directory
 */
export const seedChange = async (args: {
  paths: RepoPaths;
  changeId: string;
  approved?: boolean | null;
  baseCommit?: string | null;
}): Promise<{ state: State; changeDir: string }> => {
  const { paths, changeId } = args;
  const state = createState();
  state.active_change_id = changeId;
  const change = getOrCreateChangeState({ state, changeId });
  if (args.approved ?? false) {
    approveChange({ state, changeId, approvedBy: "tester" });
  }
  change.base_commit = args.baseCommit ?? null;
  await saveState({ statePath: paths.statePath, state });

  const changeDir = getChangeDir({ paths, changeId, slug: "demo" });
  await fs.mkdir(changeDir, { recursive: true });
  return { state, changeDir };
};
