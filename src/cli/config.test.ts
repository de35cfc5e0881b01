/**
 * Tests for configuration loading
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { ConfigError } from "@/cli/errors.js";

import { applyEnvOverrides, getDefaultConfig, loadConfig, validateConfig } from "./config.js";

describe("getDefaultConfig", () => {
  it("should apply every schema default", () => {
    const config = getDefaultConfig();

    expect(config.agentCommand).toBe("codex");
    expect(config.promptFlag).toBe("--prompt-file");
    expect(config.readerAgents).toBe(4);
    expect(config.worktreeAgents).toBe(2);
    expect(config.defaultBase).toBe("origin/main");
    expect(config.testCommand).toEqual(["cargo", "test"]);
    expect(config.coverageCommands["llvm-cov"]).toEqual(["cargo", "llvm-cov", "--summary"]);
    expect(config.codePrefixes).toEqual(["src/", "tests/"]);
  });

  it("should return independent copies", () => {
    const first = getDefaultConfig();
    first.extraArgs.push("--mutated");

    expect(getDefaultConfig().extraArgs).toEqual([]);
  });
});

describe("validateConfig", () => {
  it("should reject a non-object", () => {
    expect(validateConfig({ raw: ["a"] })).toEqual({
      valid: false,
      config: null,
      errors: ["Config must be a JSON object"],
    });
  });

  it("should report the offending field", () => {
    const result = validateConfig({ raw: { readerAgents: -1 } });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["Config validation error at /readerAgents: must be >= 0"]);
  });

  it("should drop unknown fields and keep the given ones", () => {
    const raw = { readerAgents: 8, unknownField: true };
    const result = validateConfig({ raw });

    expect(result.valid).toBe(true);
    expect(result.config?.readerAgents).toBe(8);
    expect(result.config).not.toHaveProperty("unknownField");
    expect(raw).toEqual({ readerAgents: 8, unknownField: true });
  });
});

describe("applyEnvOverrides", () => {
  it("should override the agent invocation from SDD_* variables", () => {
    const config = applyEnvOverrides({
      config: getDefaultConfig(),
      env: {
        SDD_AGENT_COMMAND: " fake-agent ",
        SDD_PROMPT_FLAG: "--prompt",
        SDD_EXEC_ARGS: "--model  test-model",
      },
    });

    expect(config.agentCommand).toBe("fake-agent");
    expect(config.promptFlag).toBe("--prompt");
    expect(config.extraArgs).toEqual(["--model", "test-model"]);
  });

  it("should ignore blank variables", () => {
    const config = applyEnvOverrides({
      config: getDefaultConfig(),
      env: { SDD_AGENT_COMMAND: "  ", SDD_EXEC_ARGS: "" },
    });

    expect(config.agentCommand).toBe("codex");
    expect(config.extraArgs).toEqual([]);
  });
});

describe("loadConfig", () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "config-test-"));
    configPath = path.join(tempDir, "config.json");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should return defaults when the file is missing", async () => {
    const config = await loadConfig({ configPath, env: {} });

    expect(config).toEqual(getDefaultConfig());
  });

  it("should merge the file over the defaults", async () => {
    await fs.writeFile(
      configPath,
      JSON.stringify({ testCommand: ["npm", "test"], worktreeAgents: 3 }),
    );

    const config = await loadConfig({ configPath, env: { SDD_AGENT_COMMAND: "fake-agent" } });

    expect(config.testCommand).toEqual(["npm", "test"]);
    expect(config.worktreeAgents).toBe(3);
    expect(config.readerAgents).toBe(4);
    expect(config.agentCommand).toBe("fake-agent");
  });

  it("should throw ConfigError for invalid JSON", async () => {
    await fs.writeFile(configPath, "{ not json");

    await expect(loadConfig({ configPath, env: {} })).rejects.toThrow(
      `Invalid JSON in ${configPath}`,
    );
  });

  it("should throw ConfigError for schema violations", async () => {
    await fs.writeFile(configPath, JSON.stringify({ testCommand: [] }));

    await expect(loadConfig({ configPath, env: {} })).rejects.toBeInstanceOf(ConfigError);
  });
});
