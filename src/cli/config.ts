/**
 * Configuration management for sdd
 * Loads the optional .sdd/config.json, applies schema defaults and
 * environment overrides
 */

import * as fs from "fs/promises";

import { ConfigError } from "@/cli/errors.js";
import { ajv, formatSchemaErrors } from "@/cli/schema.js";

/**
 * Runtime configuration for every command
 */
export type Config = {
  /** Executable of the agent runner */
  agentCommand: string;
  /** Flag that precedes the prompt file in the agent invocation */
  promptFlag: string;
  /** Extra arguments appended to every agent invocation */
  extraArgs: Array<string>;
  /** Default shard count for `plans` */
  readerAgents: number;
  /** Default worktree count for `worktrees` */
  worktreeAgents: number;
  /** Base ref for `check` when none is given */
  defaultBase: string;
  /** Test suite command, run inside each worktree */
  testCommand: Array<string>;
  /** Coverage tool name -> command */
  coverageCommands: Record<string, Array<string>>;
  /** Path prefixes that count as code for `check` */
  codePrefixes: Array<string>;
  /** Root-level files that count as build manifests for `check` */
  buildManifests: Array<string>;
};

/**
 * Config as it may appear on disk: every field optional
 */
type RawDiskConfig = Partial<Config>;

const configSchema = {
  type: "object",
  properties: {
    agentCommand: { type: "string", minLength: 1, default: "codex" },
    promptFlag: { type: "string", minLength: 1, default: "--prompt-file" },
    extraArgs: {
      type: "array",
      items: { type: "string" },
      default: [],
    },
    readerAgents: { type: "integer", minimum: 0, default: 4 },
    worktreeAgents: { type: "integer", minimum: 1, default: 2 },
    defaultBase: { type: "string", minLength: 1, default: "origin/main" },
    testCommand: {
      type: "array",
      items: { type: "string" },
      minItems: 1,
      default: ["cargo", "test"],
    },
    coverageCommands: {
      type: "object",
      additionalProperties: {
        type: "array",
        items: { type: "string" },
        minItems: 1,
      },
      default: {
        "llvm-cov": ["cargo", "llvm-cov", "--summary"],
        tarpaulin: ["cargo", "tarpaulin", "--quiet"],
      },
    },
    codePrefixes: {
      type: "array",
      items: { type: "string", minLength: 1 },
      default: ["src/", "tests/"],
    },
    buildManifests: {
      type: "array",
      items: { type: "string", minLength: 1 },
      default: ["Cargo.toml", "Cargo.lock", "package.json", "package-lock.json"],
    },
  },
  required: [
    "agentCommand",
    "promptFlag",
    "extraArgs",
    "readerAgents",
    "worktreeAgents",
    "defaultBase",
    "testCommand",
    "coverageCommands",
    "codePrefixes",
    "buildManifests",
  ],
  additionalProperties: false,
};

// Compiled validator for config schema
const validateConfigSchema = ajv.compile<Config>(configSchema);

/**
 * Get the default configuration
 *
 * @returns Config with every schema default applied
 */
export const getDefaultConfig = (): Config => {
  const config: RawDiskConfig = {};
  if (!validateConfigSchema(config)) {
    throw new ConfigError({ message: "default configuration is invalid" });
  }
  return config;
};

/**
 * Validate raw config data, applying defaults
 * @param args - Validation arguments
 * @param args.raw - Parsed JSON from disk
 *
 * @returns Validation result; config is set only when valid
 */
export const validateConfig = (args: {
  raw: unknown;
}): { valid: boolean; config: Config | null; errors: Array<string> } => {
  const { raw } = args;

  if (raw == null || typeof raw !== "object" || Array.isArray(raw)) {
    return {
      valid: false,
      config: null,
      errors: ["Config must be a JSON object"],
    };
  }

  // Deep clone to avoid mutating the caller's object during validation
  const configClone: unknown = JSON.parse(JSON.stringify(raw));

  if (validateConfigSchema(configClone)) {
    return { valid: true, config: configClone, errors: [] };
  }

  return {
    valid: false,
    config: null,
    errors: formatSchemaErrors({
      errors: validateConfigSchema.errors,
      label: "Config",
    }),
  };
};

/**
 * Apply SDD_* environment overrides on top of a config
 * @param args - Override arguments
 * @param args.config - Config loaded from disk (or defaults)
 * @param args.env - Environment to read from
 *
 * @returns New config with overrides applied
 */
export const applyEnvOverrides = (args: {
  config: Config;
  env: NodeJS.ProcessEnv;
}): Config => {
  const { config, env } = args;
  const result: Config = { ...config };

  if (env.SDD_AGENT_COMMAND != null && env.SDD_AGENT_COMMAND.trim() !== "") {
    result.agentCommand = env.SDD_AGENT_COMMAND.trim();
  }
  if (env.SDD_PROMPT_FLAG != null && env.SDD_PROMPT_FLAG.trim() !== "") {
    result.promptFlag = env.SDD_PROMPT_FLAG.trim();
  }
  if (env.SDD_EXEC_ARGS != null && env.SDD_EXEC_ARGS.trim() !== "") {
    result.extraArgs = env.SDD_EXEC_ARGS.trim().split(/\s+/);
  }

  return result;
};

/**
 * Load configuration from disk
 * A missing file yields the defaults; an invalid one is fatal.
 * @param args - Configuration arguments
 * @param args.configPath - Path to .sdd/config.json
 * @param args.env - Environment for overrides (defaults to process.env)
 *
 * @throws ConfigError when the file is not valid JSON or fails the schema
 *
 * @returns The resolved config
 */
export const loadConfig = async (args: {
  configPath: string;
  env?: NodeJS.ProcessEnv | null;
}): Promise<Config> => {
  const { configPath } = args;
  const env = args.env ?? process.env;

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch {
    // No config file - defaults apply
    return applyEnvOverrides({ config: getDefaultConfig(), env });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError({
      message: `Invalid JSON in ${configPath}`,
      details: [`${err}`],
    });
  }

  const result = validateConfig({ raw });
  if (!result.valid || result.config == null) {
    throw new ConfigError({
      message: `Config has validation errors (${configPath}): ${result.errors.join("; ")}`,
      details: result.errors,
    });
  }

  return applyEnvOverrides({ config: result.config, env });
};
