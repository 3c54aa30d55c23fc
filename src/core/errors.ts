import type { FailureReason } from "./types.js";

export type CliOutputFormat = "text" | "json";

const EXIT_CODE_OPERATIONAL_FAILURE = 1;
const EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE = 2;

interface VoxdevErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class VoxdevError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: number, options: VoxdevErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

export class UserInputError extends VoxdevError {
  constructor(message: string, options: VoxdevErrorOptions = {}) {
    super(message, "USER_INPUT", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class ConfigError extends VoxdevError {
  constructor(message: string, options: VoxdevErrorOptions = {}) {
    super(message, "CONFIG", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class ExecutionError extends VoxdevError {
  constructor(message: string, options: VoxdevErrorOptions = {}) {
    super(message, "EXECUTION", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

/**
 * Raised by collaborators (AI, speech, test runner, deployer). The attached
 * reason becomes the `Failed` reason of the command that triggered it.
 */
export class CollaboratorFailure extends VoxdevError {
  readonly reason: FailureReason;

  constructor(message: string, reason: FailureReason = "CollaboratorError", options: VoxdevErrorOptions = {}) {
    super(message, "COLLABORATOR", EXIT_CODE_OPERATIONAL_FAILURE, options);
    this.reason = reason;
  }
}

export class GenerationError extends CollaboratorFailure {
  constructor(message: string, options: VoxdevErrorOptions = {}) {
    super(message, "GenerationFailed", options);
  }
}

export class RateLimitedError extends CollaboratorFailure {
  constructor(message: string, options: VoxdevErrorOptions = {}) {
    super(message, "RateLimited", options);
  }
}

export class CollaboratorTimeoutError extends CollaboratorFailure {
  constructor(message: string, options: VoxdevErrorOptions = {}) {
    super(message, "Timeout", options);
  }
}

export class TranscriptionError extends CollaboratorFailure {
  constructor(message: string, options: VoxdevErrorOptions = {}) {
    super(message, "TranscriptionError", options);
  }
}

function isCommanderErrorLike(error: unknown): error is { code?: unknown; message?: unknown } {
  if (!error || typeof error !== "object") return false;
  if (!("code" in error)) return false;
  return typeof (error as { code?: unknown }).code === "string";
}

export function normalizeError(error: unknown): VoxdevError {
  if (error instanceof VoxdevError) return error;
  if (isCommanderErrorLike(error) && String(error.code).startsWith("commander.")) {
    const message = error instanceof Error ? error.message : String(error.message ?? error.code);
    return new UserInputError(message, {
      cause: error,
      details: {
        commanderCode: String(error.code)
      }
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error));
}

export function failureReasonOf(error: unknown): FailureReason {
  return error instanceof CollaboratorFailure ? error.reason : "CollaboratorError";
}

export function normalizeOutputFormat(value: string | undefined): CliOutputFormat {
  const normalized = value?.trim().toLowerCase() ?? "text";
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new UserInputError(`Invalid --format value "${String(value)}". Expected "text" or "json".`);
}

export function resolveOutputFormatFromArgv(argv: string[]): CliOutputFormat {
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) continue;
    if (token === "--format") {
      const next = argv[index + 1];
      return next?.trim().toLowerCase() === "json" ? "json" : "text";
    }
    if (!token.startsWith("--format=")) continue;
    return token.slice("--format=".length).trim().toLowerCase() === "json" ? "json" : "text";
  }
  return "text";
}

export function toJsonErrorPayload(error: VoxdevError): Record<string, unknown> {
  return {
    error: {
      code: error.code,
      type: error.name,
      message: error.message,
      exitCode: error.exitCode,
      ...(error instanceof CollaboratorFailure ? { reason: error.reason } : {}),
      ...(error.details ? { details: error.details } : {})
    }
  };
}
