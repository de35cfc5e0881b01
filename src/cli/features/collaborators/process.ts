/**
 * Child process helper for collaborators whose exit status is data
 */

import { spawn } from "child_process";

import { SubprocessError } from "@/cli/errors.js";
import { debug } from "@/cli/logger.js";

export type ProcessResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
};

/**
 * Run a command to completion, capturing its output
 *
 * A non-zero exit is returned, not thrown; only a failure to start the
 * process rejects.
 *
 * @param args - Process arguments
 * @param args.command - Executable
 * @param args.commandArgs - Arguments
 * @param args.cwd - Working directory
 *
 * @throws SubprocessError when the process cannot be started
 *
 * @returns Exit code and captured output
 */
export const runProcess = (args: {
  command: string;
  commandArgs: Array<string>;
  cwd: string;
}): Promise<ProcessResult> => {
  const { command, commandArgs, cwd } = args;
  const rendered = [command, ...commandArgs].join(" ");
  debug({ message: `${rendered} (in ${cwd})` });

  return new Promise((resolve, reject) => {
    const child = spawn(command, commandArgs, {
      cwd,
      stdio: ["ignore", "pipe", "pipe"],
      shell: false,
    });

    const stdout: Array<Buffer> = [];
    const stderr: Array<Buffer> = [];
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (err) => {
      reject(new SubprocessError({ command: rendered, stderr: err.message, cause: err }));
    });
    child.on("close", (code) => {
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
      });
    });
  });
};
