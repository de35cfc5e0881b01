/**
 * State store for sdd
 * Loads, validates, mutates and atomically saves .sdd/state.json
 */

import * as fs from "fs/promises";
import * as path from "path";

import {
  ConfigError,
  GateViolationError,
  StateCorruptError,
  UnsupportedSchemaError,
} from "@/cli/errors.js";
import { warn } from "@/cli/logger.js";
import { validateChangeId } from "@/cli/paths.js";
import { ajv, formatSchemaErrors } from "@/cli/schema.js";
import { getCurrentPackageVersion, isNewerVersion } from "@/cli/version.js";

import type { ChangeState, State, ThreadRecord } from "./types.js";

import { acquireStateLock } from "./lock.js";

export const SCHEMA_VERSION = 1;

const nullableString = { type: ["string", "null"], default: null };

const stateSchema = {
  type: "object",
  properties: {
    schema_version: { type: "integer", minimum: 0, default: 0 },
    tool_version: { type: "string", default: "" },
    active_change_id: nullableString,
    changes: {
      type: "object",
      default: {},
      additionalProperties: {
        type: "object",
        properties: {
          approved: { type: "boolean", default: false },
          approved_at: {
            anyOf: [{ type: "string", format: "date-time" }, { type: "null" }],
            default: null,
          },
          approved_by: nullableString,
          file_index_hash: nullableString,
          file_index_generated_at: nullableString,
          codex_threads: {
            type: "array",
            default: [],
            items: {
              type: "object",
              properties: {
                purpose: { type: "string" },
                thread_id: { type: "string" },
                started_at: { type: "string" },
              },
              required: ["purpose", "thread_id", "started_at"],
            },
          },
          file_hashes: {
            type: "object",
            default: {},
            additionalProperties: { type: "string" },
          },
          reader_shard_hashes: {
            type: "object",
            default: {},
            additionalProperties: { type: "string" },
          },
          base_commit: nullableString,
        },
        required: [
          "approved",
          "approved_at",
          "approved_by",
          "file_index_hash",
          "file_index_generated_at",
          "codex_threads",
          "file_hashes",
          "reader_shard_hashes",
          "base_commit",
        ],
      },
    },
  },
  required: ["schema_version", "tool_version", "active_change_id", "changes"],
};

const validateStateSchema = ajv.compile<State>(stateSchema);

const currentToolVersion = (): string => getCurrentPackageVersion() ?? "unknown";

const now = (): string => new Date().toISOString();

/**
 * Create a fresh state document
 *
 * @returns State with no changes
 */
export const createState = (): State => {
  return {
    schema_version: SCHEMA_VERSION,
    tool_version: currentToolVersion(),
    active_change_id: null,
    changes: {},
  };
};

/**
 * Create an empty change record
 *
 * @returns Unapproved change state with empty logs and maps
 */
export const createChangeState = (): ChangeState => {
  return {
    approved: false,
    approved_at: null,
    approved_by: null,
    file_index_hash: null,
    file_index_generated_at: null,
    codex_threads: [],
    file_hashes: {},
    reader_shard_hashes: {},
    base_commit: null,
  };
};

/**
 * Load state from disk
 * @param args - Load arguments
 * @param args.statePath - Path to state.json
 *
 * @throws StateCorruptError when the file is not valid JSON or fails the schema
 * @throws UnsupportedSchemaError when schema_version is not supported
 *
 * @returns The stored state, or a fresh one when the file does not exist
 */
export const loadState = async (args: { statePath: string }): Promise<State> => {
  const { statePath } = args;

  let content: string;
  try {
    content = await fs.readFile(statePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      return createState();
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new StateCorruptError({ statePath, reason: `invalid JSON (${err})` });
  }

  if (!validateStateSchema(raw)) {
    const errors = formatSchemaErrors({
      errors: validateStateSchema.errors,
      label: "State",
    });
    throw new StateCorruptError({ statePath, reason: errors.join("; ") });
  }

  const state = raw;

  // Documents written before the version field existed
  if (state.schema_version === 0) {
    state.schema_version = SCHEMA_VERSION;
  }
  if (state.schema_version !== SCHEMA_VERSION) {
    throw new UnsupportedSchemaError({
      found: state.schema_version,
      supported: SCHEMA_VERSION,
    });
  }

  const current = currentToolVersion();
  if (state.tool_version === "") {
    state.tool_version = current;
  } else if (isNewerVersion({ recorded: state.tool_version, current })) {
    warn({
      message: `state was written by sdd ${state.tool_version}, running ${current}`,
    });
  }

  return state;
};

/**
 * Save state atomically: write a sibling temp file, then rename it over the
 * target so readers never see a partial document
 * @param args - Save arguments
 * @param args.statePath - Path to state.json
 * @param args.state - State to save
 */
export const saveState = async (args: {
  statePath: string;
  state: State;
}): Promise<void> => {
  const { statePath, state } = args;
  await fs.mkdir(path.dirname(statePath), { recursive: true });

  state.tool_version = currentToolVersion();

  const tempPath = `${statePath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tempPath, `${JSON.stringify(state, null, 2)}\n`);
    await fs.rename(tempPath, statePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
};

/**
 * Run a mutation against the state under an exclusive lock
 *
 * The state is loaded after the lock is taken and saved only if `fn`
 * resolves; a rejected `fn` leaves the file untouched.
 *
 * @param args - Scope arguments
 * @param args.statePath - Path to state.json
 * @param args.fn - Mutation to run
 *
 * @throws StateLockedError when another live process holds the lock
 *
 * @returns Whatever `fn` returns
 */
export const withState = async <T>(args: {
  statePath: string;
  fn: (state: State) => Promise<T>;
}): Promise<T> => {
  const { statePath, fn } = args;
  const release = await acquireStateLock({ statePath });

  try {
    const state = await loadState({ statePath });
    const result = await fn(state);
    await saveState({ statePath, state });
    return result;
  } finally {
    await release();
  }
};

/**
 * Get the state for a change, creating it on first reference
 * @param args - Lookup arguments
 * @param args.state - State document
 * @param args.changeId - Change identifier
 *
 * @returns The (possibly new) change state, owned by `state`
 */
export const getOrCreateChangeState = (args: {
  state: State;
  changeId: string;
}): ChangeState => {
  const { state, changeId } = args;
  const existing = getChangeState({ state, changeId });
  if (existing != null) {
    return existing;
  }
  const created = createChangeState();
  Object.defineProperty(state.changes, changeId, {
    value: created,
    enumerable: true,
    writable: true,
    configurable: true,
  });
  return created;
};

export const getChangeState = (args: {
  state: State;
  changeId: string;
}): ChangeState | null => {
  const { state, changeId } = args;
  if (!Object.hasOwn(state.changes, changeId)) {
    return null;
  }
  return state.changes[changeId] ?? null;
};

/**
 * Approve a change, refreshing approver and timestamp on repeat calls
 * @param args - Approval arguments
 * @param args.state - State document
 * @param args.changeId - Change identifier
 * @param args.approvedBy - Who approved
 *
 * @returns The updated change state
 */
export const approveChange = (args: {
  state: State;
  changeId: string;
  approvedBy: string;
}): ChangeState => {
  const { state, changeId, approvedBy } = args;
  const change = getOrCreateChangeState({ state, changeId });
  change.approved = true;
  change.approved_at = now();
  change.approved_by = approvedBy;
  return change;
};

/**
 * The approval gate in front of worktrees, test-plan and finalize
 * @param args - Gate arguments
 * @param args.state - State document
 * @param args.changeId - Change identifier
 *
 * @throws GateViolationError when the change is unknown or not approved
 */
export const requireApproved = (args: { state: State; changeId: string }): void => {
  const { state, changeId } = args;
  const change = getChangeState({ state, changeId });
  if (change == null) {
    throw new GateViolationError({ message: `change ${changeId} not found` });
  }
  if (!change.approved) {
    throw new GateViolationError({
      message: `approval required for change ${changeId}; run "sdd approve --id ${changeId}"`,
    });
  }
};

/**
 * Append one provenance entry
 * @param args - Record arguments
 * @param args.state - State document
 * @param args.changeId - Change identifier
 * @param args.purpose - What the agent run was for
 * @param args.threadId - Identifier reported by the agent runner
 *
 * @returns The appended record
 */
export const recordThread = (args: {
  state: State;
  changeId: string;
  purpose: string;
  threadId: string;
}): ThreadRecord => {
  const { state, changeId, purpose, threadId } = args;
  const change = getOrCreateChangeState({ state, changeId });
  const record: ThreadRecord = {
    purpose,
    thread_id: threadId,
    started_at: now(),
  };
  change.codex_threads.push(record);
  return record;
};

/**
 * Pick the change a command operates on
 * @param args - Resolve arguments
 * @param args.state - State document
 * @param args.requested - Id given on the command line
 *
 * @throws ConfigError when no id is given and no change is active, or the id is malformed
 *
 * @returns The change id
 */
export const resolveChangeId = (args: {
  state: State;
  requested?: string | null;
}): string => {
  const { state, requested } = args;
  if (requested != null && requested !== "") {
    return validateChangeId({ changeId: requested });
  }
  if (state.active_change_id != null) {
    return validateChangeId({ changeId: state.active_change_id });
  }
  throw new ConfigError({ message: "no active change; pass --id <change-id>" });
};

/**
 * Drop an archived change from the state
 * @param args - Archive arguments
 * @param args.state - State document
 * @param args.changeId - Change identifier
 */
export const archiveChange = (args: { state: State; changeId: string }): void => {
  const { state, changeId } = args;
  delete state.changes[changeId];
  if (state.active_change_id === changeId) {
    state.active_change_id = null;
  }
};

const isNotFound = (err: unknown): boolean => {
  return (
    err instanceof Error && "code" in err && err.code === "ENOENT"
  );
};
