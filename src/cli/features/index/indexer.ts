/**
 * Content indexer
 * Enumerates version-controlled files and hashes every eligible one
 */

import * as fs from "fs/promises";
import * as path from "path";

import {
  FileReadError,
  PathNormalizationError,
  RepositoryError,
  describeError,
} from "@/cli/errors.js";
import { debug, warn } from "@/cli/logger.js";
import { comparePaths, normalizeRepoPath, writeFileEnsuringDir } from "@/utils/path.js";

import type { FileEntry, FileIndex, IndexResult } from "./types.js";
import type { FileLister } from "@/cli/features/collaborators/types.js";
import type { Stats } from "fs";

import { exceedsSizeLimit, isExcludedPath, looksBinary } from "./exclusion.js";
import { hashContent, hashEntries } from "./hashing.js";

/**
 * Collect candidate paths from version control
 * @param args - Listing arguments
 * @param args.repoRoot - Repository root
 * @param args.includeUntracked - Also list untracked, non-ignored paths
 * @param args.vcs - Version control collaborator
 *
 * @throws RepositoryError when tracked files cannot be listed
 *
 * @returns Raw paths, duplicates removed
 */
const listCandidatePaths = async (args: {
  repoRoot: string;
  includeUntracked: boolean;
  vcs: FileLister;
}): Promise<Array<string>> => {
  const { repoRoot, includeUntracked, vcs } = args;

  let tracked: Array<string>;
  try {
    tracked = await vcs.listTrackedFiles({ repoRoot });
  } catch (err) {
    throw new RepositoryError({
      message: `failed to list git files in ${repoRoot}: ${describeError(err)}`,
      cause: err,
    });
  }

  const candidates = new Set(tracked);

  if (includeUntracked) {
    try {
      const untracked = await vcs.listUntrackedFiles({ repoRoot });
      for (const rawPath of untracked) {
        candidates.add(rawPath);
      }
    } catch (err) {
      warn({
        message: `untracked files not listed, indexing tracked files only: ${describeError(err)}`,
      });
    }
  }

  return [...candidates].filter((rawPath) => rawPath !== "");
};

const statFile = async (filePath: string): Promise<Stats> => {
  try {
    return await fs.stat(filePath);
  } catch (err) {
    throw new FileReadError({ filePath, cause: err });
  }
};

const readFileContent = async (filePath: string): Promise<Buffer> => {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    throw new FileReadError({ filePath, cause: err });
  }
};

/**
 * Build the content index for a repository
 *
 * Paths that cannot be normalized are skipped with a warning. Any file that
 * passes the exclusion rules but cannot be read aborts the whole build.
 *
 * @param args - Index arguments
 * @param args.repoRoot - Repository root
 * @param args.includeUntracked - Also index untracked, non-ignored files
 * @param args.vcs - Version control collaborator
 * @param args.stateDir - Repository-relative private state directory to exclude
 *
 * @throws RepositoryError when tracked files cannot be listed
 * @throws FileReadError when an eligible file cannot be read
 *
 * @returns The index, per-file hashes, aggregate hash and tree listing
 */
export const buildIndex = async (args: {
  repoRoot: string;
  includeUntracked: boolean;
  vcs: FileLister;
  stateDir?: string | null;
}): Promise<IndexResult> => {
  const { repoRoot, includeUntracked, vcs, stateDir } = args;

  const rawPaths = await listCandidatePaths({ repoRoot, includeUntracked, vcs });
  rawPaths.sort(comparePaths);

  const entries: Array<FileEntry> = [];
  const seen = new Set<string>();
  const skippedPaths: Array<string> = [];

  for (const rawPath of rawPaths) {
    let relPath: string;
    try {
      relPath = normalizeRepoPath({ rawPath });
    } catch (err) {
      if (err instanceof PathNormalizationError) {
        warn({ message: `skip invalid path: ${err.message}` });
        skippedPaths.push(rawPath);
        continue;
      }
      throw err;
    }

    if (seen.has(relPath) || isExcludedPath({ path: relPath, stateDir })) {
      continue;
    }

    // Read through the name git reported; the normalized form is only the key
    const fullPath = path.join(repoRoot, rawPath);
    const stats = await statFile(fullPath);

    // Submodules show up as directories
    if (!stats.isFile()) {
      debug({ message: `skip non-regular file ${relPath}` });
      continue;
    }
    if (exceedsSizeLimit({ size: stats.size })) {
      debug({ message: `skip oversized file ${relPath} (${stats.size} bytes)` });
      continue;
    }

    const content = await readFileContent(fullPath);
    if (looksBinary({ content })) {
      debug({ message: `skip binary file ${relPath}` });
      continue;
    }

    seen.add(relPath);
    entries.push({
      path: relPath,
      hash: hashContent({ content }),
      size: content.length,
    });
  }

  entries.sort((a, b) => comparePaths(a.path, b.path));

  const fileHashes: Record<string, string> = Object.fromEntries(
    entries.map((entry) => [entry.path, entry.hash]),
  );

  return {
    index: { files: entries },
    fileHashes,
    indexHash: hashEntries({ entries }),
    repoTree: entries.map((entry) => `${entry.path}\n`).join(""),
    skippedPaths,
  };
};

/**
 * Persist the index as { files: [{ path, hash, size }] }
 * @param args - Write arguments
 * @param args.indexPath - Destination file
 * @param args.index - Index to write
 */
export const writeIndex = async (args: {
  indexPath: string;
  index: FileIndex;
}): Promise<void> => {
  const { indexPath, index } = args;
  const files = index.files.map(({ path: filePath, hash, size }) => ({
    path: filePath,
    hash,
    size,
  }));
  await writeFileEnsuringDir({
    filePath: indexPath,
    contents: JSON.stringify({ files }, null, 2),
  });
};

export const writeRepoTree = async (args: {
  treePath: string;
  repoTree: string;
}): Promise<void> => {
  await writeFileEnsuringDir({ filePath: args.treePath, contents: args.repoTree });
};
