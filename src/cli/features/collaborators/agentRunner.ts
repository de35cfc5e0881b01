/**
 * Agent runner collaborator
 * Drives `codex exec` (or a configured compatible command) non-interactively
 */

import * as path from "path";

import { writeFileEnsuringDir } from "@/utils/path.js";

import type { AgentRunResult, AgentRunSpec, AgentRunner } from "./types.js";
import type { Config } from "@/cli/config.js";

import { runProcess } from "./process.js";

/**
 * Build the argument list for one agent invocation
 * @param args - Build arguments
 * @param args.spec - Invocation spec
 * @param args.promptFlag - Flag preceding the prompt file
 * @param args.extraArgs - Extra arguments appended at the end
 *
 * @returns Arguments after the executable
 */
export const buildAgentArgs = (args: {
  spec: AgentRunSpec;
  promptFlag: string;
  extraArgs: ReadonlyArray<string>;
}): Array<string> => {
  const { spec, promptFlag, extraArgs } = args;
  const result = [
    "exec",
    "--sandbox",
    spec.sandbox,
    "--cd",
    spec.cwd,
    "--output-last-message",
    spec.outputPath,
    promptFlag,
    spec.promptPath,
  ];

  if (spec.schemaPath != null) {
    result.push("--output-schema", spec.schemaPath);
  }
  if (spec.jsonOutputPath != null) {
    result.push("--json");
  }

  result.push(...extraArgs);
  return result;
};

/**
 * Output locations of a named run: .sdd/runs/<change>/<name>.md and .jsonl
 * @param args - Path arguments
 * @param args.runsDir - .sdd/runs
 * @param args.changeId - Change identifier
 * @param args.name - Run name (shard name, "review", ...)
 *
 * @returns Last-message and JSONL event paths
 */
export const outputPaths = (args: {
  runsDir: string;
  changeId: string;
  name: string;
}): { outputPath: string; jsonPath: string } => {
  const runDir = path.join(args.runsDir, args.changeId);
  return {
    outputPath: path.join(runDir, `${args.name}.md`),
    jsonPath: path.join(runDir, `${args.name}.jsonl`),
  };
};

/**
 * Find the agent's thread id in its JSONL event stream
 * @param args - Parse arguments
 * @param args.jsonl - Captured stdout of a `--json` run
 *
 * @returns First thread_id found, or null
 */
export const parseThreadId = (args: { jsonl: string }): string | null => {
  for (const line of args.jsonl.split("\n")) {
    const trimmed = line.trim();
    if (trimmed === "") {
      continue;
    }
    let event: unknown;
    try {
      event = JSON.parse(trimmed);
    } catch {
      // Progress lines are not all JSON
      continue;
    }
    if (
      event != null &&
      typeof event === "object" &&
      "thread_id" in event &&
      typeof event.thread_id === "string" &&
      event.thread_id !== ""
    ) {
      return event.thread_id;
    }
  }
  return null;
};

/**
 * AgentRunner that spawns the configured agent command
 */
export class CodexRunner implements AgentRunner {
  private readonly command: string;
  private readonly promptFlag: string;
  private readonly extraArgs: Array<string>;

  constructor(args: { config: Pick<Config, "agentCommand" | "promptFlag" | "extraArgs"> }) {
    this.command = args.config.agentCommand;
    this.promptFlag = args.config.promptFlag;
    this.extraArgs = [...args.config.extraArgs];
  }

  async run(args: { spec: AgentRunSpec }): Promise<AgentRunResult> {
    const { spec } = args;
    const result = await runProcess({
      command: this.command,
      commandArgs: buildAgentArgs({
        spec,
        promptFlag: this.promptFlag,
        extraArgs: this.extraArgs,
      }),
      cwd: spec.cwd,
    });

    if (spec.jsonOutputPath != null && result.stdout !== "") {
      await writeFileEnsuringDir({ filePath: spec.jsonOutputPath, contents: result.stdout });
    }

    return {
      ok: result.exitCode === 0,
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  }
}
