/**
 * Tests for the bounded task group
 */

import { describe, it, expect } from "vitest";

import { partitionOutcomes, runTaskGroup } from "./taskGroup.js";

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe("runTaskGroup", () => {
  it("should return outcomes in task order regardless of completion order", async () => {
    const outcomes = await runTaskGroup({
      tasks: [
        {
          name: "slow",
          run: async () => {
            await delay(30);
            return 1;
          },
        },
        { name: "fast", run: async () => 2 },
      ],
    });

    expect(outcomes).toEqual([
      { name: "slow", status: "fulfilled", value: 1 },
      { name: "fast", status: "fulfilled", value: 2 },
    ]);
  });

  it("should let siblings finish when one task fails", async () => {
    const finished: Array<string> = [];
    const outcomes = await runTaskGroup({
      tasks: [
        {
          name: "broken",
          run: async () => {
            throw new Error("boom");
          },
        },
        {
          name: "late",
          run: async () => {
            await delay(20);
            finished.push("late");
            return "done";
          },
        },
      ],
    });

    expect(finished).toEqual(["late"]);
    const { succeeded, failed } = partitionOutcomes({ outcomes });
    expect(succeeded).toEqual([{ name: "late", value: "done" }]);
    expect(failed.map((failure) => failure.name)).toEqual(["broken"]);
  });

  it("should keep at most `concurrency` tasks in flight", async () => {
    let running = 0;
    let peak = 0;
    const task = (name: string) => ({
      name,
      run: async () => {
        running++;
        peak = Math.max(peak, running);
        await delay(5);
        running--;
        return name;
      },
    });

    const outcomes = await runTaskGroup({
      tasks: ["a", "b", "c", "d", "e"].map(task),
      concurrency: 2,
    });

    expect(peak).toBe(2);
    expect(outcomes).toHaveLength(5);
  });

  it("should handle an empty group", async () => {
    expect(await runTaskGroup({ tasks: [] })).toEqual([]);
  });
});
