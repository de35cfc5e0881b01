/**
 * Tests for path utilities
 */

import * as fs from "fs/promises";
import { homedir, tmpdir } from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { PathNormalizationError } from "@/cli/errors.js";

import {
  comparePaths,
  expandDir,
  normalizeRepoPath,
  slugify,
  writeFileIfMissing,
} from "./path.js";

describe("normalizeRepoPath", () => {
  it("should convert backslashes and strip a leading ./", () => {
    expect(normalizeRepoPath({ rawPath: "src\\lib.rs" })).toBe("src/lib.rs");
    expect(normalizeRepoPath({ rawPath: "./src/lib.rs" })).toBe("src/lib.rs");
  });

  it("should reject undecodable, empty and escaping paths", () => {
    const rejected = ["bad\uFFFD.rs", "a\0b", "", "dir/", "/etc/passwd", "../x", "a/../../b"];
    for (const rawPath of rejected) {
      expect(() => normalizeRepoPath({ rawPath })).toThrow(PathNormalizationError);
    }
  });
});

describe("comparePaths", () => {
  it("should order by UTF-8 bytes", () => {
    const paths = ["b", "a", "B", "é", "a/b", "a.b"];
    expect([...paths].sort(comparePaths)).toEqual(["B", "a", "a.b", "a/b", "b", "é"]);
  });
});

describe("slugify", () => {
  it("should lowercase and dash-separate words", () => {
    expect(slugify({ name: "Add Retry Policy!" })).toBe("add-retry-policy");
  });

  it("should fall back to change when nothing usable remains", () => {
    expect(slugify({ name: "日本語" })).toBe("change");
  });
});

describe("expandDir", () => {
  it("should expand a leading tilde", () => {
    expect(expandDir({ dir: "~/agent" })).toBe(path.join(homedir(), "agent"));
  });

  it("should drop a trailing separator", () => {
    expect(expandDir({ dir: "/tmp/agent/" })).toBe("/tmp/agent");
  });
});

describe("writeFileIfMissing", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(tmpdir(), "path-test-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should create a file and keep an existing one", async () => {
    const filePath = path.join(dir, "nested", "AGENTS.md");

    expect(await writeFileIfMissing({ filePath, contents: "first" })).toBe(true);
    expect(await writeFileIfMissing({ filePath, contents: "second" })).toBe(false);
    expect(await fs.readFile(filePath, "utf-8")).toBe("first");
  });
});
