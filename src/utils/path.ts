/**
 * Path utility functions shared by the indexer, the gate and the commands
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { PathNormalizationError } from "@/cli/errors.js";

/**
 * Normalize a repository-relative path to forward slashes
 *
 * git hands us paths that were decoded from bytes; undecodable sequences show
 * up as U+FFFD and cannot be mapped back to a file on disk.
 *
 * @param args - Normalization arguments
 * @param args.rawPath - Path as reported by version control
 *
 * @throws PathNormalizationError when the path is not representable
 *
 * @returns Normalized path without a leading "./"
 */
export const normalizeRepoPath = (args: { rawPath: string }): string => {
  const { rawPath } = args;

  if (rawPath.includes("\uFFFD")) {
    return rejectPath({ rawPath, reason: "invalid UTF-8 sequence" });
  }
  if (rawPath.includes("\0")) {
    return rejectPath({ rawPath, reason: "embedded NUL byte" });
  }

  let normalized = rawPath.replace(/\\/g, "/");
  while (normalized.startsWith("./")) {
    normalized = normalized.slice(2);
  }

  if (normalized === "" || normalized.endsWith("/")) {
    return rejectPath({ rawPath, reason: "not a file path" });
  }
  if (normalized.startsWith("/") || normalized.split("/").includes("..")) {
    return rejectPath({ rawPath, reason: "escapes the repository root" });
  }

  return normalized;
};

const rejectPath = (args: { rawPath: string; reason: string }): never => {
  throw new PathNormalizationError(args);
};

/**
 * Compare two paths by their UTF-8 bytes
 * @param a - First path
 * @param b - Second path
 *
 * @returns Negative, zero or positive like Array.prototype.sort expects
 */
export const comparePaths = (a: string, b: string): number => {
  return Buffer.compare(Buffer.from(a, "utf-8"), Buffer.from(b, "utf-8"));
};

/**
 * Turn a free-form change name into a directory-safe slug
 * @param args - Slug arguments
 * @param args.name - Change name
 *
 * @returns Lowercase ASCII slug, "change" when nothing usable remains
 */
export const slugify = (args: { name: string }): string => {
  const slug = args.name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug === "" ? "change" : slug;
};

/**
 * Expand a leading tilde and resolve the result to an absolute path
 * @param args - Expansion arguments
 * @param args.dir - Directory as written by the user
 *
 * @returns Absolute, normalized path without a trailing slash
 */
export const expandDir = (args: { dir: string }): string => {
  let expanded = args.dir;

  if (expanded.startsWith("~/")) {
    expanded = path.join(os.homedir(), expanded.slice(2));
  } else if (expanded === "~") {
    expanded = os.homedir();
  }

  if (!path.isAbsolute(expanded)) {
    expanded = path.join(process.cwd(), expanded);
  }

  expanded = path.normalize(expanded);
  if (expanded.length > 1 && expanded.endsWith(path.sep)) {
    expanded = expanded.slice(0, -1);
  }
  return expanded;
};

/**
 * Check if a path exists
 * @param filePath - Path to check
 *
 * @returns True if exists
 */
export const pathExists = async (filePath: string): Promise<boolean> => {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
};

/**
 * Write a file, creating parent directories first
 * @param args - Write arguments
 * @param args.filePath - Destination
 * @param args.contents - File contents
 */
export const writeFileEnsuringDir = async (args: {
  filePath: string;
  contents: string;
}): Promise<void> => {
  const { filePath, contents } = args;
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents);
};

/**
 * Write a file only when it does not exist yet
 * @param args - Write arguments
 * @param args.filePath - Destination
 * @param args.contents - File contents
 *
 * @returns True if the file was created
 */
export const writeFileIfMissing = async (args: {
  filePath: string;
  contents: string;
}): Promise<boolean> => {
  if (await pathExists(args.filePath)) {
    return false;
  }
  await writeFileEnsuringDir(args);
  return true;
};
