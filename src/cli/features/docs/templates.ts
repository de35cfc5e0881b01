/**
 * On-disk scaffolding for docs/sdd, change directories and agent schemas
 * Template files live in the package's templates/ directory
 */

import * as fs from "fs/promises";
import * as path from "path";
import { fileURLToPath } from "url";

import { getContextDir } from "@/cli/paths.js";
import { writeFileEnsuringDir, writeFileIfMissing } from "@/utils/path.js";

import type { RepoPaths } from "@/cli/paths.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// src/cli/features/docs and dist/cli/features/docs are four levels deep
const TEMPLATES_DIR = path.join(__dirname, "..", "..", "..", "..", "templates");

export type OutputSchemaName = "reader" | "review" | "tasks" | "select";

const OUTPUT_SCHEMAS: ReadonlyArray<OutputSchemaName> = ["reader", "review", "tasks", "select"];

const CHANGE_PLACEHOLDERS: ReadonlyArray<{ name: string; contents: string }> = [
  { name: "10_repo_digest.md", contents: "# Repo Digest\n\n(generated)\n" },
  { name: "20_review.md", contents: "# Review\n\n(generated)\n" },
  { name: "40_tasks.md", contents: "# Tasks\n\n(generated)\n" },
  { name: "50_test_plan.md", contents: "# Test Plan\n\n(generated)\n" },
  { name: "90_decision.md", contents: "# Decision\n\n(written on approval)\n" },
];

const CONTEXT_PLACEHOLDERS: ReadonlyArray<{ name: string; contents: string }> = [
  {
    name: "README.md",
    contents: "# Context\n\nIndexes and supporting material for this change.\n",
  },
  { name: "repo_tree.txt", contents: "(generated)\n" },
  { name: "file_index.json", contents: "{}\n" },
];

const readTemplate = async (args: { name: string }): Promise<string> => {
  return fs.readFile(path.join(TEMPLATES_DIR, args.name), "utf-8");
};

/**
 * Create docs/sdd/{specs,changes} and its README
 * @param args - Scaffold arguments
 * @param args.paths - Repository layout
 */
export const ensureRepoScaffold = async (args: { paths: RepoPaths }): Promise<void> => {
  const { paths } = args;
  await fs.mkdir(paths.docsSpecs, { recursive: true });
  await fs.mkdir(paths.docsChanges, { recursive: true });
  await writeFileIfMissing({
    filePath: path.join(paths.docsSdd, "README.md"),
    contents: await readTemplate({ name: "sdd-readme.md" }),
  });
};

/**
 * Write AGENTS.md at the repository root unless one exists
 * @param args - Scaffold arguments
 * @param args.repoRoot - Repository root
 *
 * @returns True if the file was created
 */
export const ensureAgentsMd = async (args: { repoRoot: string }): Promise<boolean> => {
  return writeFileIfMissing({
    filePath: path.join(args.repoRoot, "AGENTS.md"),
    contents: await readTemplate({ name: "AGENTS.md" }),
  });
};

/**
 * Install the plans prompt into the agent's home (overwrites)
 * @param args - Install arguments
 * @param args.agentHome - Agent home directory (CODEX_HOME)
 *
 * @returns Path of the written prompt
 */
export const writePlansPrompt = async (args: { agentHome: string }): Promise<string> => {
  const promptPath = path.join(args.agentHome, "prompts", "plans.md");
  await writeFileEnsuringDir({
    filePath: promptPath,
    contents: await readTemplate({ name: "plans.md" }),
  });
  return promptPath;
};

/**
 * Create a change directory with placeholder artifacts and a context folder
 * Existing files are never overwritten.
 * @param args - Scaffold arguments
 * @param args.changeDir - Change directory
 */
export const ensureChangeScaffold = async (args: { changeDir: string }): Promise<void> => {
  const { changeDir } = args;
  for (const placeholder of CHANGE_PLACEHOLDERS) {
    await writeFileIfMissing({
      filePath: path.join(changeDir, placeholder.name),
      contents: placeholder.contents,
    });
  }

  const contextDir = getContextDir({ changeDir });
  for (const placeholder of CONTEXT_PLACEHOLDERS) {
    await writeFileIfMissing({
      filePath: path.join(contextDir, placeholder.name),
      contents: placeholder.contents,
    });
  }
};

export const getSchemaPath = (args: { paths: RepoPaths; name: OutputSchemaName }): string => {
  return path.join(args.paths.schemasDir, `${args.name}.json`);
};

/**
 * Copy the agent output schemas into .sdd/schemas, keeping local edits
 * @param args - Arguments
 * @param args.paths - Repository layout
 */
export const ensureSchemas = async (args: { paths: RepoPaths }): Promise<void> => {
  const { paths } = args;
  await fs.mkdir(paths.schemasDir, { recursive: true });
  for (const name of OUTPUT_SCHEMAS) {
    await writeFileIfMissing({
      filePath: getSchemaPath({ paths, name }),
      contents: await readTemplate({ name: path.join("schemas", `${name}.json`) }),
    });
  }
};
