/**
 * Package version helpers
 */

import { readFileSync } from "fs";
import * as path from "path";
import { fileURLToPath } from "url";

import semver from "semver";

// src/cli and dist/cli both sit two levels below the package root
const packageJsonPath = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "..",
  "package.json",
);

let cachedVersion: string | null | undefined;

/**
 * Get the version of the running sdd package
 *
 * @returns The version from package.json, or null if it cannot be read
 */
export const getCurrentPackageVersion = (): string | null => {
  if (cachedVersion !== undefined) {
    return cachedVersion;
  }

  try {
    const content: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
    if (
      content != null &&
      typeof content === "object" &&
      "version" in content &&
      typeof content.version === "string"
    ) {
      cachedVersion = content.version;
      return cachedVersion;
    }
  } catch {
    // Missing or unreadable package.json (e.g. a bundled copy)
  }

  cachedVersion = null;
  return cachedVersion;
};

/**
 * Check whether a recorded tool version is newer than the running one
 * @param args - Comparison arguments
 * @param args.recorded - Version recorded in a persisted document
 * @param args.current - Version of the running tool
 *
 * @returns True only when both versions are valid semver and recorded > current
 */
export const isNewerVersion = (args: {
  recorded: string;
  current: string;
}): boolean => {
  const { recorded, current } = args;
  if (semver.valid(recorded) == null || semver.valid(current) == null) {
    return false;
  }
  return semver.gt(recorded, current);
};
