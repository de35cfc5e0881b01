/**
 * Error taxonomy for the sdd CLI
 *
 * Every failure reaches the command boundary as one of these, where it is
 * printed as a single line and turned into exit code 1.
 */

export type ErrorKind = "configuration" | "io" | "subprocess" | "gate";

export class SddError extends Error {
  readonly kind: ErrorKind;

  constructor(args: { message: string; kind: ErrorKind; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = new.target.name;
    this.kind = args.kind;
  }
}

export class ConfigError extends SddError {
  readonly details: Array<string>;

  constructor(args: { message: string; details?: Array<string> | null }) {
    super({ message: args.message, kind: "configuration" });
    this.details = args.details ?? [];
  }
}

/** No enumerable repository, or the tracked file listing failed */
export class RepositoryError extends SddError {
  constructor(args: { message: string; cause?: unknown }) {
    super({ ...args, kind: "configuration" });
  }
}

export class UnsupportedSchemaError extends SddError {
  readonly found: number;

  constructor(args: { found: number; supported: number }) {
    super({
      message: `unsupported state schema version ${args.found} (supported: ${args.supported})`,
      kind: "configuration",
    });
    this.found = args.found;
  }
}

export class StateCorruptError extends SddError {
  constructor(args: { statePath: string; reason: string }) {
    super({
      message: `state file ${args.statePath} is invalid: ${args.reason}`,
      kind: "configuration",
    });
  }
}

export class StateLockedError extends SddError {
  constructor(args: { lockPath: string; holder: string }) {
    super({
      message: `state is locked by another sdd process (${args.holder}); remove ${args.lockPath} if that process is gone`,
      kind: "io",
    });
  }
}

export class FileReadError extends SddError {
  readonly filePath: string;

  constructor(args: { filePath: string; cause: unknown }) {
    super({
      message: `failed to read ${args.filePath}: ${describeError(args.cause)}`,
      kind: "io",
      cause: args.cause,
    });
    this.filePath = args.filePath;
  }
}

/** Recoverable: the indexer skips the path and keeps going */
export class PathNormalizationError extends SddError {
  readonly rawPath: string;

  constructor(args: { rawPath: string; reason: string }) {
    super({
      message: `cannot normalize path ${JSON.stringify(args.rawPath)}: ${args.reason}`,
      kind: "io",
    });
    this.rawPath = args.rawPath;
  }
}

export class SubprocessError extends SddError {
  readonly command: string;
  readonly stderr: string;

  constructor(args: { command: string; stderr?: string | null; cause?: unknown }) {
    const stderr = (args.stderr ?? "").trim();
    super({
      message: stderr
        ? `${args.command} failed: ${stderr}`
        : `${args.command} failed`,
      kind: "subprocess",
      cause: args.cause,
    });
    this.command = args.command;
    this.stderr = stderr;
  }
}

export class AgentRunError extends SddError {
  readonly failedUnits: Array<string>;

  constructor(args: { purpose: string; failedUnits: Array<string> }) {
    super({
      message: `${args.purpose} agent failed: ${args.failedUnits.join(", ")}`,
      kind: "subprocess",
    });
    this.failedUnits = args.failedUnits;
  }
}

export class GateViolationError extends SddError {
  constructor(args: { message: string }) {
    super({ message: args.message, kind: "gate" });
  }
}

/**
 * Render any thrown value as a single line
 * @param err - Thrown value
 *
 * @returns Human-readable message
 */
export const describeError = (err: unknown): string => {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
};
