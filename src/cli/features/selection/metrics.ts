/**
 * Variant metrics and selection records
 *
 * test-plan writes one metrics entry per worktree; select turns them into
 * selection variants with diff sizes and a summary document.
 */

import * as fs from "fs/promises";

import { SddError } from "@/cli/errors.js";
import { ajv, formatSchemaErrors } from "@/cli/schema.js";
import { writeFileEnsuringDir } from "@/utils/path.js";

export type VariantMetrics = {
  agent: string;
  tests_passed: boolean;
  coverage_percent: number | null;
  coverage_tool: string;
  test_output: string;
  coverage_output: string | null;
};

export type SelectionVariant = {
  agent: string;
  tests_passed: boolean;
  coverage_percent: number | null;
  lines_added: number;
  lines_removed: number;
  notes: string;
};

const metricsSchema = {
  type: "array",
  items: {
    type: "object",
    properties: {
      agent: { type: "string", minLength: 1 },
      tests_passed: { type: "boolean" },
      coverage_percent: { type: ["number", "null"], default: null },
      coverage_tool: { type: "string" },
      test_output: { type: "string" },
      coverage_output: { type: ["string", "null"], default: null },
    },
    required: ["agent", "tests_passed", "coverage_tool", "test_output"],
  },
};

const validateMetrics = ajv.compile<Array<VariantMetrics>>(metricsSchema);

/**
 * Read metrics.json
 * @param args - Read arguments
 * @param args.metricsPath - .sdd/runs/<id>/metrics.json
 *
 * @throws SddError when the file is missing or malformed
 *
 * @returns Metrics entries in file order
 */
export const readMetrics = async (args: {
  metricsPath: string;
}): Promise<Array<VariantMetrics>> => {
  const { metricsPath } = args;

  let content: string;
  try {
    content = await fs.readFile(metricsPath, "utf-8");
  } catch (err) {
    throw new SddError({
      message: `metrics not found at ${metricsPath}; run "sdd test-plan" first`,
      kind: "io",
      cause: err,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new SddError({ message: `invalid JSON in ${metricsPath}`, kind: "io", cause: err });
  }

  if (!validateMetrics(raw)) {
    throw new SddError({
      message: formatSchemaErrors({ errors: validateMetrics.errors, label: "Metrics" }).join("; "),
      kind: "io",
    });
  }
  return raw;
};

export const writeRecords = async (args: {
  filePath: string;
  records: ReadonlyArray<VariantMetrics> | ReadonlyArray<SelectionVariant>;
}): Promise<void> => {
  await writeFileEnsuringDir({
    filePath: args.filePath,
    contents: JSON.stringify(args.records, null, 2),
  });
};

const countOccurrences = (haystack: string, needle: string): number => {
  return haystack.split(needle).length - 1;
};

/**
 * Share of checked task boxes
 * @param args - Arguments
 * @param args.tasks - Contents of 40_tasks.md
 *
 * @returns "- [x]" count over "- [" count, 0 when there are no boxes
 */
export const taskCompletionRatio = (args: { tasks: string }): number => {
  const total = countOccurrences(args.tasks, "- [");
  if (total === 0) {
    return 0;
  }
  return countOccurrences(args.tasks, "- [x]") / total;
};

const RISK_MARKERS = ["high", "critical", "重大"];

/**
 * Whether the review mentions a severe finding
 * @param args - Arguments
 * @param args.review - Contents of 20_review.md
 *
 * @returns True when a risk marker appears (case-insensitive)
 */
export const detectRisk = (args: { review: string }): boolean => {
  const lower = args.review.toLowerCase();
  return RISK_MARKERS.some((marker) => lower.includes(marker));
};

const formatPercent = (percent: number | null): string => {
  return percent == null ? "none" : `${percent}`;
};

export const buildVariant = (args: {
  metrics: VariantMetrics;
  added: number;
  removed: number;
}): SelectionVariant => {
  const { metrics, added, removed } = args;
  return {
    agent: metrics.agent,
    tests_passed: metrics.tests_passed,
    coverage_percent: metrics.coverage_percent,
    lines_added: added,
    lines_removed: removed,
    notes: `coverage: ${formatPercent(metrics.coverage_percent)}`,
  };
};

/**
 * Render 80_selection.md
 * @param args - Render arguments
 * @param args.tasksCompletion - Ratio from taskCompletionRatio
 * @param args.riskFlag - Result of detectRisk
 * @param args.variants - Selection variants
 *
 * @returns Markdown summary
 */
export const renderSelectionSummary = (args: {
  tasksCompletion: number;
  riskFlag: boolean;
  variants: ReadonlyArray<SelectionVariant>;
}): string => {
  const { tasksCompletion, riskFlag, variants } = args;
  let summary = "# Selection Summary\n\n";
  summary += `- tasks_completion: ${(tasksCompletion * 100).toFixed(1)}%\n`;
  summary += `- risk_flag: ${riskFlag ? "yes" : "no"}\n\n`;
  summary += "## Variants\n";
  for (const variant of variants) {
    summary +=
      `- ${variant.agent}: tests_passed=${variant.tests_passed}, ` +
      `coverage=${formatPercent(variant.coverage_percent)}, ` +
      `diff=+${variant.lines_added} -${variant.lines_removed}\n`;
  }
  return summary;
};
