/**
 * One-off agent runs (review, tasks, per-worktree test plans)
 */

import * as fs from "fs/promises";

import { AgentRunError, FileReadError } from "@/cli/errors.js";
import { outputPaths, parseThreadId } from "@/cli/features/collaborators/agentRunner.js";
import { debug } from "@/cli/logger.js";
import { writeFileEnsuringDir } from "@/utils/path.js";

import type { AgentRunner, SandboxMode } from "@/cli/features/collaborators/types.js";

export type SingleRunResult = {
  /** The agent's last message */
  output: string;
  outputPath: string;
  threadId: string;
};

/**
 * Write a prompt, run the agent once and read back its last message
 * @param args - Run arguments
 * @param args.runner - Agent runner
 * @param args.runsDir - .sdd/runs
 * @param args.changeId - Change identifier
 * @param args.name - Run name; also the fallback thread id
 * @param args.cwd - Agent working directory
 * @param args.prompt - Prompt markdown
 * @param args.promptPath - Where the prompt is written
 * @param args.sandbox - Sandbox mode
 * @param args.schemaPath - Output schema
 *
 * @throws AgentRunError when the agent reports failure
 *
 * @returns Output text, its path and the thread id
 */
export const runSingleAgent = async (args: {
  runner: AgentRunner;
  runsDir: string;
  changeId: string;
  name: string;
  cwd: string;
  prompt: string;
  promptPath: string;
  sandbox: SandboxMode;
  schemaPath: string;
}): Promise<SingleRunResult> => {
  const { runner, runsDir, changeId, name } = args;
  const { outputPath, jsonPath } = outputPaths({ runsDir, changeId, name });

  await writeFileEnsuringDir({ filePath: args.promptPath, contents: args.prompt });

  debug({ message: `dispatch ${name}` });
  const result = await runner.run({
    spec: {
      cwd: args.cwd,
      promptPath: args.promptPath,
      outputPath,
      jsonOutputPath: jsonPath,
      sandbox: args.sandbox,
      schemaPath: args.schemaPath,
    },
  });

  if (!result.ok) {
    throw new AgentRunError({ purpose: name, failedUnits: [name] });
  }

  let output: string;
  try {
    output = await fs.readFile(outputPath, "utf-8");
  } catch (err) {
    throw new FileReadError({ filePath: outputPath, cause: err });
  }

  return {
    output,
    outputPath,
    threadId: parseThreadId({ jsonl: result.stdout }) ?? name,
  };
};
