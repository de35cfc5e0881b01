/**
 * Types for the content index
 *
 * The index is the canonical, path-sorted view of the repository that every
 * hash, shard and memoization key is derived from.
 */

/**
 * One indexed file
 */
export type FileEntry = {
  /** Repository-relative path with forward slashes (e.g. "src/lib.rs") */
  path: string;
  /** Hex SHA-256 of the raw file bytes */
  hash: string;
  /** Size in bytes */
  size: number;
};

/**
 * Persisted index document (context/file_index.json)
 */
export type FileIndex = {
  /** Entries sorted ascending by path, no duplicate paths */
  files: Array<FileEntry>;
};

/**
 * Everything a single index build produces
 */
export type IndexResult = {
  index: FileIndex;
  /** path -> content hash */
  fileHashes: Record<string, string>;
  /** Aggregate hash over every (path, hash) pair in index order */
  indexHash: string;
  /** Newline-terminated path listing (context/repo_tree.txt) */
  repoTree: string;
  /** Raw paths skipped because they could not be normalized */
  skippedPaths: Array<string>;
};

/**
 * Contiguous run of index entries handed to one reader agent
 */
export type Shard = Array<FileEntry>;
