/**
 * Contracts for the external processes sdd drives
 *
 * Commands talk to git and the agent runner only through these types, so
 * tests can substitute in-process fakes.
 */

/**
 * Version control operations used by the workflow
 */
export interface VersionControl {
  /** Tracked paths, relative to the repository root */
  listTrackedFiles(args: { repoRoot: string }): Promise<Array<string>>;
  /** Untracked paths that are not ignored */
  listUntrackedFiles(args: { repoRoot: string }): Promise<Array<string>>;
  /** Paths changed between `base` and the working tree of `cwd` */
  diffNames(args: { cwd: string; base: string }): Promise<Array<string>>;
  /** Summed added/removed line counts between `base` and the working tree */
  diffNumstat(args: {
    cwd: string;
    base: string;
  }): Promise<{ added: number; removed: number }>;
  currentCommit(args: { cwd: string }): Promise<string>;
  /** Resolve a ref, or null when it does not exist */
  verifyRef(args: { cwd: string; ref: string }): Promise<string | null>;
  /** Create a worktree on a new branch; existing paths are left alone */
  createWorktree(args: {
    repoRoot: string;
    branch: string;
    worktreePath: string;
  }): Promise<boolean>;
  listWorktrees(args: { repoRoot: string }): Promise<Array<string>>;
  merge(args: { repoRoot: string; branch: string; noFastForward: boolean }): Promise<void>;
  cherryPick(args: { repoRoot: string; branch: string }): Promise<void>;
}

/**
 * The subset the indexer needs
 */
export type FileLister = Pick<VersionControl, "listTrackedFiles" | "listUntrackedFiles">;

/**
 * Agent sandbox modes
 */
export type SandboxMode = "read-only" | "workspace-write";

/**
 * One agent invocation
 */
export type AgentRunSpec = {
  /** Working directory the agent operates in */
  cwd: string;
  /** Markdown prompt file */
  promptPath: string;
  /** Where the agent writes its last message */
  outputPath: string;
  /** Where captured JSONL events are written, when wanted */
  jsonOutputPath?: string | null;
  sandbox: SandboxMode;
  /** JSON schema the agent's final output must follow */
  schemaPath?: string | null;
};

export type AgentRunResult = {
  ok: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
};

export interface AgentRunner {
  run(args: { spec: AgentRunSpec }): Promise<AgentRunResult>;
}
