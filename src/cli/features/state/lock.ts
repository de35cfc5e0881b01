/**
 * Exclusive lock around state.json
 * One sdd command at a time may hold it; a lock left behind by a dead
 * process is replaced.
 */

import * as fs from "fs/promises";
import * as path from "path";

import { StateLockedError } from "@/cli/errors.js";
import { debug } from "@/cli/logger.js";

type LockInfo = {
  pid: number;
  acquired_at: string;
};

export const getLockPath = (args: { statePath: string }): string => {
  return `${args.statePath}.lock`;
};

const readLockInfo = async (lockPath: string): Promise<LockInfo | null> => {
  try {
    const parsed: unknown = JSON.parse(await fs.readFile(lockPath, "utf-8"));
    if (
      parsed != null &&
      typeof parsed === "object" &&
      "pid" in parsed &&
      typeof parsed.pid === "number" &&
      "acquired_at" in parsed &&
      typeof parsed.acquired_at === "string"
    ) {
      return { pid: parsed.pid, acquired_at: parsed.acquired_at };
    }
  } catch {
    // Unreadable or half-written lock - treated as held below
  }
  return null;
};

/**
 * Check whether a process is still running
 * @param pid - Process id
 *
 * @returns False only when the process definitely does not exist
 */
export const isProcessAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: exists but belongs to someone else
    return !(err instanceof Error && "code" in err && err.code === "ESRCH");
  }
};

const tryCreateLock = async (lockPath: string): Promise<boolean> => {
  const info: LockInfo = { pid: process.pid, acquired_at: new Date().toISOString() };
  try {
    await fs.writeFile(lockPath, JSON.stringify(info), { flag: "wx" });
    return true;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") {
      return false;
    }
    throw err;
  }
};

/**
 * Acquire the state lock
 * @param args - Lock arguments
 * @param args.statePath - Path to state.json
 *
 * @throws StateLockedError when a live process holds the lock
 *
 * @returns Function that releases the lock
 */
export const acquireStateLock = async (args: {
  statePath: string;
}): Promise<() => Promise<void>> => {
  const lockPath = getLockPath({ statePath: args.statePath });
  await fs.mkdir(path.dirname(lockPath), { recursive: true });

  if (!(await tryCreateLock(lockPath))) {
    const holder = await readLockInfo(lockPath);
    if (holder == null || isProcessAlive(holder.pid)) {
      throw new StateLockedError({
        lockPath,
        holder: holder == null ? "unknown holder" : `pid ${holder.pid} since ${holder.acquired_at}`,
      });
    }

    debug({ message: `replacing stale state lock of pid ${holder.pid}` });
    await fs.rm(lockPath, { force: true });
    if (!(await tryCreateLock(lockPath))) {
      throw new StateLockedError({ lockPath, holder: "a concurrent sdd process" });
    }
  }

  return async () => {
    await fs.rm(lockPath, { force: true });
  };
};
