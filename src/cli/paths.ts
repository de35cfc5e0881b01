/**
 * Repository layout used by every sdd command
 *
 * docs/sdd/ holds the reviewed artifacts, .sdd/ holds private runtime state
 * (state.json, agent runs, worktrees, output schemas, config).
 */

import * as fs from "fs/promises";
import * as path from "path";

import { ConfigError, SddError } from "@/cli/errors.js";

import type { Dirent } from "fs";

export const STATE_DIR_NAME = ".sdd";

export type RepoPaths = {
  repoRoot: string;
  docsSdd: string;
  docsSpecs: string;
  docsChanges: string;
  docsArchive: string;
  stateDir: string;
  statePath: string;
  configPath: string;
  runsDir: string;
  worktreesDir: string;
  schemasDir: string;
};

/**
 * Build the layout for a repository root
 * @param args - Layout arguments
 * @param args.repoRoot - Absolute repository root
 *
 * @returns All well-known paths
 */
export const getRepoPaths = (args: { repoRoot: string }): RepoPaths => {
  const { repoRoot } = args;
  const docsSdd = path.join(repoRoot, "docs", "sdd");
  const stateDir = path.join(repoRoot, STATE_DIR_NAME);

  return {
    repoRoot,
    docsSdd,
    docsSpecs: path.join(docsSdd, "specs"),
    docsChanges: path.join(docsSdd, "changes"),
    docsArchive: path.join(docsSdd, "archive"),
    stateDir,
    statePath: path.join(stateDir, "state.json"),
    configPath: path.join(stateDir, "config.json"),
    runsDir: path.join(stateDir, "runs"),
    worktreesDir: path.join(stateDir, "worktrees"),
    schemasDir: path.join(stateDir, "schemas"),
  };
};

const CHANGE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9-]*$/;

/**
 * Check a change id given on the command line or read from state
 * @param args - Arguments
 * @param args.changeId - Change identifier
 *
 * @throws ConfigError when the id uses anything but letters, digits and "-"
 *
 * @returns The id, unchanged
 */
export const validateChangeId = (args: { changeId: string }): string => {
  const { changeId } = args;
  if (!CHANGE_ID_PATTERN.test(changeId)) {
    throw new ConfigError({
      message: `invalid change id "${changeId}": use letters, digits and "-"`,
    });
  }
  return changeId;
};

/**
 * Directory for a change: docs/sdd/changes/<id>_<slug>
 * @param args - Arguments
 * @param args.paths - Repository layout
 * @param args.changeId - Change identifier
 * @param args.slug - Slugified change name
 *
 * @returns Absolute change directory
 */
export const getChangeDir = (args: {
  paths: RepoPaths;
  changeId: string;
  slug: string;
}): string => {
  const { paths, changeId, slug } = args;
  return path.join(paths.docsChanges, `${changeId}_${slug}`);
};

/**
 * Locate an existing change directory by its id prefix
 * @param args - Arguments
 * @param args.paths - Repository layout
 * @param args.changeId - Change identifier
 *
 * @throws SddError when docs/sdd/changes is missing or has no such change
 *
 * @returns Absolute change directory
 */
export const findChangeDir = async (args: {
  paths: RepoPaths;
  changeId: string;
}): Promise<string> => {
  const { paths, changeId } = args;

  let entries: Array<Dirent>;
  try {
    entries = await fs.readdir(paths.docsChanges, { withFileTypes: true });
  } catch (err) {
    throw new SddError({
      message: `cannot read ${paths.docsChanges}; run "sdd init" first`,
      kind: "io",
      cause: err,
    });
  }

  // Slugs carry no "_", so <id>_<slug> has exactly one after the id
  const prefix = `${changeId}_`;
  const match = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()
    .find((name) => name.startsWith(prefix) && !name.slice(prefix.length).includes("_"));

  if (match == null) {
    throw new SddError({
      message: `change workspace not found for ${changeId}`,
      kind: "io",
    });
  }

  return path.join(paths.docsChanges, match);
};

export const getContextDir = (args: { changeDir: string }): string => {
  return path.join(args.changeDir, "context");
};

/**
 * Per-change run directory: .sdd/runs/<changeId>
 * @param args - Arguments
 * @param args.paths - Repository layout
 * @param args.changeId - Change identifier
 *
 * @returns Absolute run directory
 */
export const getRunDir = (args: {
  paths: RepoPaths;
  changeId: string;
}): string => {
  return path.join(args.paths.runsDir, args.changeId);
};

/**
 * Repository-relative form of the private state directory, for exclusion
 * @param args - Arguments
 * @param args.paths - Repository layout
 *
 * @returns e.g. ".sdd"
 */
export const getStateDirRelative = (args: { paths: RepoPaths }): string => {
  const { paths } = args;
  return path.relative(paths.repoRoot, paths.stateDir).split(path.sep).join("/");
};
