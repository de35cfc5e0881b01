/**
 * Test and coverage collaborators
 */

import type { ProcessResult } from "./process.js";

import { runProcess } from "./process.js";

export type TestResult = {
  success: boolean;
  stdout: string;
  stderr: string;
};

export type CoverageResult = {
  stdout: string;
  percent: number | null;
};

/**
 * Extract the first percentage from tool output
 * @param args - Parse arguments
 * @param args.output - Captured stdout
 *
 * @returns First whitespace-delimited token ending in "%" that parses as a number
 */
export const parsePercent = (args: { output: string }): number | null => {
  for (const token of args.output.split(/\s+/)) {
    if (!token.endsWith("%")) {
      continue;
    }
    const numeric = token.slice(0, -1);
    if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(numeric)) {
      continue;
    }
    return Number.parseFloat(numeric);
  }
  return null;
};

const splitCommand = (command: ReadonlyArray<string>): { bin: string; rest: Array<string> } => {
  const [bin, ...rest] = command;
  if (bin == null || bin === "") {
    throw new RangeError("command must not be empty");
  }
  return { bin, rest };
};

const runCommandIn = (args: {
  command: ReadonlyArray<string>;
  cwd: string;
}): Promise<ProcessResult> => {
  const { bin, rest } = splitCommand(args.command);
  return runProcess({ command: bin, commandArgs: rest, cwd: args.cwd });
};

/**
 * Run the test suite in a worktree
 * @param args - Run arguments
 * @param args.cwd - Worktree directory
 * @param args.command - Test command (e.g. ["cargo", "test"])
 *
 * @returns Success flag and captured output
 */
export const runTests = async (args: {
  cwd: string;
  command: ReadonlyArray<string>;
}): Promise<TestResult> => {
  const result = await runCommandIn(args);
  return {
    success: result.exitCode === 0,
    stdout: result.stdout,
    stderr: result.stderr,
  };
};

/**
 * Run a coverage tool in a worktree
 * @param args - Run arguments
 * @param args.cwd - Worktree directory
 * @param args.command - Coverage command
 *
 * @returns Captured output and the extracted percentage
 */
export const runCoverage = async (args: {
  cwd: string;
  command: ReadonlyArray<string>;
}): Promise<CoverageResult> => {
  const result = await runCommandIn(args);
  return {
    stdout: result.stdout,
    percent: parsePercent({ output: result.stdout }),
  };
};

/**
 * Test and coverage runs as one injectable collaborator
 */
export type QualityRunner = {
  runTests: typeof runTests;
  runCoverage: typeof runCoverage;
};

export const processQualityRunner: QualityRunner = { runTests, runCoverage };
