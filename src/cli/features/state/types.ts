/**
 * Types for the persisted workflow state (.sdd/state.json)
 *
 * Field names are snake_case because they are the on-disk format and must
 * stay stable across releases.
 */

/**
 * One recorded interaction with the agent runner
 */
export type ThreadRecord = {
  /** What the run was for ("reader_0", "review", "tasks", ...) */
  purpose: string;
  /** Agent thread id, or the purpose when the runner reported none */
  thread_id: string;
  /** ISO timestamp */
  started_at: string;
};

/**
 * Everything sdd tracks for a single change
 */
export type ChangeState = {
  approved: boolean;
  approved_at: string | null;
  approved_by: string | null;
  /** Aggregate hash of the last index build */
  file_index_hash: string | null;
  file_index_generated_at: string | null;
  /** Provenance log, append-only */
  codex_threads: Array<ThreadRecord>;
  /** path -> content hash from the last index build */
  file_hashes: Record<string, string>;
  /** shard name -> shard hash of the last successful reader run */
  reader_shard_hashes: Record<string, string>;
  /** Commit the worktrees were branched from */
  base_commit: string | null;
};

/**
 * Whole state document
 */
export type State = {
  schema_version: number;
  tool_version: string;
  active_change_id: string | null;
  changes: Record<string, ChangeState>;
};
