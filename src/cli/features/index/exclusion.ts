/**
 * Exclusion predicates for the content index
 * Kept pure so each rule can be tested on its own.
 */

/** Files strictly larger than this are never indexed */
export const MAX_INDEXED_FILE_BYTES = 1_000_000;

/** Number of leading bytes sniffed for binary content */
export const BINARY_SNIFF_BYTES = 1024;

/** Root-level build output and dependency directories */
const EXCLUDED_ROOT_DIRS = [".git", "target", "dist", "build", "node_modules"];

/** Directory names excluded at any depth */
const EXCLUDED_SEGMENTS = new Set([".git", "node_modules"]);

/**
 * Check whether a normalized path lies under an excluded directory
 * @param args - Predicate arguments
 * @param args.path - Normalized repository-relative path
 * @param args.stateDir - Repository-relative private state directory (e.g. ".sdd")
 *
 * @returns True if the path must not be indexed
 */
export const isExcludedPath = (args: {
  path: string;
  stateDir?: string | null;
}): boolean => {
  const { path, stateDir } = args;

  for (const dir of EXCLUDED_ROOT_DIRS) {
    if (path.startsWith(`${dir}/`)) {
      return true;
    }
  }

  if (stateDir != null && stateDir !== "" && path.startsWith(`${stateDir}/`)) {
    return true;
  }

  const segments = path.split("/");
  // The last segment is the file name itself
  return segments.slice(0, -1).some((segment) => EXCLUDED_SEGMENTS.has(segment));
};

export const exceedsSizeLimit = (args: { size: number }): boolean => {
  return args.size > MAX_INDEXED_FILE_BYTES;
};

/**
 * Cheap binary heuristic: a zero byte among the first 1024 bytes
 * @param args - Predicate arguments
 * @param args.content - File content (only the head is inspected)
 *
 * @returns True if the content looks binary
 */
export const looksBinary = (args: { content: Uint8Array }): boolean => {
  const head = args.content.subarray(0, BINARY_SNIFF_BYTES);
  return head.includes(0);
};
