import type { StageName } from "./stages.js";

export class PipelineError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "PipelineError";
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigurationError";
  }
}

export class DiscoveryError extends PipelineError {
  constructor(
    message: string,
    public readonly inputRoot: string,
    public readonly patterns: string[],
  ) {
    super(message);
    this.name = "DiscoveryError";
  }
}

export class InputValidationError extends PipelineError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "InputValidationError";
  }
}

export class StageExecutionError extends PipelineError {
  constructor(
    message: string,
    public readonly stage: StageName,
    public readonly exitCode: number | null,
    // Time spent in the stage's invocations before it failed.
    public readonly durationMs: number | null = null,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "StageExecutionError";
  }
}

export class ResourceConstraintWarning extends PipelineError {
  constructor(
    message: string,
    public readonly requested: number,
    public readonly allocation: number,
  ) {
    super(message);
    this.name = "ResourceConstraintWarning";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  discovery: "DISCOVERY_ERROR",
  usage: "USAGE_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;
  readonly exitCode = 1;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

export function isFatalPipelineError(
  error: unknown,
): error is ConfigurationError | DiscoveryError {
  return error instanceof ConfigurationError || error instanceof DiscoveryError;
}

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof DiscoveryError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.discovery,
      title: "No sample directories found.",
      message: error.message,
      hint: "Check the input directory, that sample directories exist in pass/ folders, and that sample names contain underscores.",
      cause: error,
    });
  }

  if (error instanceof ConfigurationError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Invalid run configuration.",
      message: error.message,
      hint: "Run `modpipe --help` for the required options.",
      cause: error,
    });
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: "Unexpected error.",
    message: error instanceof Error ? error.message : String(error),
    cause: error,
  });
}
