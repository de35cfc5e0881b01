import * as fs from "fs/promises";
import { tmpdir } from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { SddError } from "@/cli/errors.js";

import { detectRisk, readMetrics, renderSelectionSummary, taskCompletionRatio } from "./metrics.js";

describe("taskCompletionRatio", () => {
  it("should divide checked boxes by all boxes", () => {
    expect(taskCompletionRatio({ tasks: "- [x] a\n- [x] b\n- [ ] c\n- [ ] d\n" })).toBe(0.5);
  });

  it("should be zero without boxes", () => {
    expect(taskCompletionRatio({ tasks: "# Tasks\n\nnothing yet\n" })).toBe(0);
  });
});

describe("detectRisk", () => {
  it("should match risk markers case-insensitively", () => {
    expect(detectRisk({ review: "One CRITICAL finding" })).toBe(true);
    expect(detectRisk({ review: "重大な問題" })).toBe(true);
    expect(detectRisk({ review: "minor nits only" })).toBe(false);
  });
});

describe("renderSelectionSummary", () => {
  it("should render a header without variants", () => {
    expect(renderSelectionSummary({ tasksCompletion: 1, riskFlag: false, variants: [] })).toBe(
      "# Selection Summary\n\n- tasks_completion: 100.0%\n- risk_flag: no\n\n## Variants\n",
    );
  });
});

describe("readMetrics", () => {
  let tempDir: string;
  let metricsPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(tmpdir(), "metrics-test-"));
    metricsPath = path.join(tempDir, "metrics.json");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should fill in missing optional fields", async () => {
    await fs.writeFile(
      metricsPath,
      JSON.stringify([
        { agent: "agent1", tests_passed: true, coverage_tool: "none", test_output: "t.txt" },
      ]),
    );

    expect(await readMetrics({ metricsPath })).toEqual([
      {
        agent: "agent1",
        tests_passed: true,
        coverage_percent: null,
        coverage_tool: "none",
        test_output: "t.txt",
        coverage_output: null,
      },
    ]);
  });

  it("should reject entries that miss required fields", async () => {
    await fs.writeFile(metricsPath, JSON.stringify([{ agent: "agent1" }]));

    await expect(readMetrics({ metricsPath })).rejects.toBeInstanceOf(SddError);
  });

  it("should reject invalid JSON", async () => {
    await fs.writeFile(metricsPath, "[oops");

    await expect(readMetrics({ metricsPath })).rejects.toThrow(`invalid JSON in ${metricsPath}`);
  });
});
