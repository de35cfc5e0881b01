/**
 * Prompt and report renderers
 */

import type { Shard } from "@/cli/features/index/types.js";

export const renderReaderPrompt = (args: {
  changeId: string;
  idx: number;
  total: number;
  shard: Shard;
}): string => {
  const { changeId, idx, total, shard } = args;
  const files = shard.map((entry) => `- ${entry.path}\n`).join("");
  return (
    "# Reader\n\n" +
    `change_id: ${changeId}\n` +
    `shard: ${idx + 1}/${total}\n\n` +
    "Files:\n" +
    files +
    "\nSummarize briefly, per file:\n- role\n- public API\n- risks\n- test concerns\n"
  );
};

export const renderReviewPrompt = (args: { changeDir: string; changeId: string }): string => {
  const { changeDir, changeId } = args;
  return (
    "# Review\n\n" +
    `change_id: ${changeId}\n\n` +
    "Read the following document and list the review findings:\n" +
    `- ${changeDir}/10_repo_digest.md\n\n` +
    "Follow the JSON output schema.\n"
  );
};

export const renderTasksPrompt = (args: { changeDir: string; changeId: string }): string => {
  const { changeDir, changeId } = args;
  return (
    "# Tasks\n\n" +
    `change_id: ${changeId}\n\n` +
    "Read the following documents and break the change into implementation tasks:\n" +
    `- ${changeDir}/10_repo_digest.md\n` +
    `- ${changeDir}/20_review.md\n\n` +
    "Follow the JSON output schema.\n"
  );
};

export const renderTestPlanPrompt = (args: { changeId: string; agent: string }): string => {
  return (
    "# Test Plan\n\n" +
    `change_id: ${args.changeId}\n` +
    `agent: ${args.agent}\n\n` +
    "Write a test plan for this branch.\n"
  );
};

export const renderDecision = (args: { approvedAt: string; approvedBy: string }): string => {
  return (
    "# Decision\n\n" +
    "- approved: true\n" +
    `- approved_at: ${args.approvedAt}\n` +
    `- approved_by: ${args.approvedBy}\n`
  );
};
