/**
 * Bounded task group
 *
 * Runs every task to completion, at most `concurrency` at a time. A failing
 * task never cancels its siblings; callers inspect the outcomes after the
 * whole group has settled.
 */

export type Task<T> = {
  name: string;
  run: () => Promise<T>;
};

export type TaskOutcome<T> =
  | { name: string; status: "fulfilled"; value: T }
  | { name: string; status: "rejected"; reason: unknown };

/**
 * Run tasks and wait for all of them
 * @param args - Group arguments
 * @param args.tasks - Tasks to run
 * @param args.concurrency - Maximum tasks in flight (defaults to all at once)
 *
 * @returns One outcome per task, in task order regardless of completion order
 */
export const runTaskGroup = async <T>(args: {
  tasks: ReadonlyArray<Task<T>>;
  concurrency?: number | null;
}): Promise<Array<TaskOutcome<T>>> => {
  const { tasks } = args;
  const limit = Math.max(1, args.concurrency ?? tasks.length);
  const outcomes: Array<TaskOutcome<T> | undefined> = new Array(tasks.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      const idx = next++;
      const task = tasks[idx];
      try {
        const value = await task.run();
        outcomes[idx] = { name: task.name, status: "fulfilled", value };
      } catch (reason) {
        outcomes[idx] = { name: task.name, status: "rejected", reason };
      }
    }
  };

  const workers = Array.from({ length: Math.min(limit, tasks.length) }, () => worker());
  await Promise.all(workers);

  return outcomes.filter((outcome): outcome is TaskOutcome<T> => outcome != null);
};

/**
 * Split outcomes into successes and failures
 * @param args - Arguments
 * @param args.outcomes - Settled outcomes
 *
 * @returns Fulfilled values and rejected names with their reasons
 */
export const partitionOutcomes = <T>(args: {
  outcomes: ReadonlyArray<TaskOutcome<T>>;
}): {
  succeeded: Array<{ name: string; value: T }>;
  failed: Array<{ name: string; reason: unknown }>;
} => {
  const succeeded: Array<{ name: string; value: T }> = [];
  const failed: Array<{ name: string; reason: unknown }> = [];
  for (const outcome of args.outcomes) {
    if (outcome.status === "fulfilled") {
      succeeded.push({ name: outcome.name, value: outcome.value });
    } else {
      failed.push({ name: outcome.name, reason: outcome.reason });
    }
  }
  return { succeeded, failed };
};
