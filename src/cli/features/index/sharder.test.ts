/**
 * Tests for sharding and shard hashing
 */

import { describe, it, expect } from "vitest";

import type { FileEntry, FileIndex } from "./types.js";

import { hashContent, hashEntries } from "./hashing.js";
import { shardFiles, shardHash, shardName } from "./sharder.js";

const makeIndex = (count: number): FileIndex => {
  const files: Array<FileEntry> = [];
  for (let i = 0; i < count; i++) {
    const path = `src/file_${String(i).padStart(2, "0")}.rs`;
    files.push({ path, hash: hashContent({ content: Buffer.from(path) }), size: path.length });
  }
  return { files };
};

describe("shardFiles", () => {
  it("should split 10 files into chunks of 3, 3, 3 and 1", () => {
    const shards = shardFiles({ index: makeIndex(10), shards: 4 });
    expect(shards.map((shard) => shard.length)).toEqual([3, 3, 3, 1]);
  });

  it("should leave trailing shards empty when there are more shards than files", () => {
    const shards = shardFiles({ index: makeIndex(2), shards: 4 });
    expect(shards.map((shard) => shard.length)).toEqual([1, 1, 0, 0]);
  });

  it("should return no shards for a count of zero", () => {
    expect(shardFiles({ index: makeIndex(5), shards: 0 })).toEqual([]);
  });

  it("should return empty shards for an empty index", () => {
    expect(shardFiles({ index: makeIndex(0), shards: 3 })).toEqual([[], [], []]);
  });

  it("should reproduce the index when the shards are concatenated", () => {
    const index = makeIndex(7);
    const shards = shardFiles({ index, shards: 3 });
    expect(shards.flat()).toEqual(index.files);
  });

  it("should reject a negative or fractional count", () => {
    expect(() => shardFiles({ index: makeIndex(1), shards: -1 })).toThrow(RangeError);
    expect(() => shardFiles({ index: makeIndex(1), shards: 1.5 })).toThrow(RangeError);
  });
});

describe("shardHash", () => {
  it("should change only for the shard whose file changed", () => {
    const before = shardFiles({ index: makeIndex(4), shards: 2 });
    const changedIndex = makeIndex(4);
    changedIndex.files[3] = {
      ...changedIndex.files[3],
      hash: hashContent({ content: Buffer.from("edited") }),
    };
    const after = shardFiles({ index: changedIndex, shards: 2 });

    expect(shardHash({ shard: after[0] })).toBe(shardHash({ shard: before[0] }));
    expect(shardHash({ shard: after[1] })).not.toBe(shardHash({ shard: before[1] }));
  });

  it("should equal the aggregate hash of its entries", () => {
    const [shard] = shardFiles({ index: makeIndex(3), shards: 1 });
    expect(shardHash({ shard })).toBe(hashEntries({ entries: shard }));
  });
});

describe("shardName", () => {
  it("should name shards by index", () => {
    expect(shardName({ idx: 0 })).toBe("reader_0");
    expect(shardName({ idx: 12 })).toBe("reader_12");
  });
});
