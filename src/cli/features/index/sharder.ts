/**
 * Sharder
 * Splits the index into contiguous partitions, one per reader agent
 */

import type { FileIndex, Shard } from "./types.js";

import { hashEntries } from "./hashing.js";

/**
 * Partition the index into exactly `shards` contiguous chunks
 *
 * Chunk size is ceil(files / shards); when shards exceed files the trailing
 * partitions are empty. Concatenating the result reproduces the index.
 *
 * @param args - Shard arguments
 * @param args.index - Sorted file index
 * @param args.shards - Number of partitions (0 yields none)
 *
 * @returns Ordered partitions
 */
export const shardFiles = (args: {
  index: FileIndex;
  shards: number;
}): Array<Shard> => {
  const { index, shards } = args;

  if (!Number.isInteger(shards) || shards < 0) {
    throw new RangeError(`shard count must be a non-negative integer, got ${shards}`);
  }
  if (shards === 0) {
    return [];
  }

  const total = index.files.length;
  const chunk = Math.ceil(total / shards);
  const result: Array<Shard> = [];

  for (let i = 0; i < shards; i++) {
    const start = Math.min(i * chunk, total);
    const end = Math.min(start + chunk, total);
    result.push(index.files.slice(start, end));
  }

  return result;
};

/**
 * Change-detection key for a shard
 * @param args - Hash arguments
 * @param args.shard - Shard entries in their existing order
 *
 * @returns Aggregate hash over the shard's (path, hash) pairs
 */
export const shardHash = (args: { shard: Shard }): string => {
  return hashEntries({ entries: args.shard });
};

/**
 * Stable name of a shard, used as its memoization key
 * @param args - Name arguments
 * @param args.idx - Zero-based shard index
 *
 * @returns e.g. "reader_0"
 */
export const shardName = (args: { idx: number }): string => {
  return `reader_${args.idx}`;
};
