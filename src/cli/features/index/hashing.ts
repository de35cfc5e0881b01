/**
 * Content and aggregate hashing
 */

import * as crypto from "crypto";

import type { FileEntry } from "./types.js";

/**
 * Compute SHA-256 of raw bytes
 * @param args - Hash arguments
 * @param args.content - File content
 *
 * @returns Hex-encoded SHA-256 hash
 */
export const hashContent = (args: { content: Uint8Array }): string => {
  return crypto.createHash("sha256").update(args.content).digest("hex");
};

/**
 * Fold an ordered sequence of (path, hash) pairs into one digest
 *
 * Order is significant: callers pass entries in index order (or a shard's
 * existing order). Any membership or content change changes the result.
 *
 * @param args - Hash arguments
 * @param args.entries - Entries in the order they should be folded
 *
 * @returns Hex-encoded SHA-256 aggregate
 */
export const hashEntries = (args: {
  entries: ReadonlyArray<Pick<FileEntry, "path" | "hash">>;
}): string => {
  const hash = crypto.createHash("sha256");
  for (const entry of args.entries) {
    hash.update(entry.path);
    hash.update("\n");
    hash.update(entry.hash);
    hash.update("\n");
  }
  return hash.digest("hex");
};
