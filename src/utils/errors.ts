/**
 * Standard error classes for lsp-specgen
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  UNRESOLVED_REFERENCE = "UNRESOLVED_REFERENCE",
  DEPENDENCY_CYCLE = "DEPENDENCY_CYCLE",
  MODEL_CONSISTENCY_ERROR = "MODEL_CONSISTENCY_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class SpecGenError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "SpecGenError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends SpecGenError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends SpecGenError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class ValidationError extends SpecGenError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.VALIDATION_ERROR, message, details, options);
    this.name = "ValidationError";
  }
}

/**
 * A declaration depends on a name that no alias or interface provides
 */
export class UnresolvedReferenceError extends SpecGenError {
  constructor(
    public readonly entity: string,
    public readonly missing: string,
  ) {
    super(
      ErrorCode.UNRESOLVED_REFERENCE,
      `Unresolvable external reference: ${entity} depends on ${missing}`,
      { entity, missing },
    );
    this.name = "UnresolvedReferenceError";
  }
}

export class DependencyCycleError extends SpecGenError {
  constructor(public readonly members: string[]) {
    super(
      ErrorCode.DEPENDENCY_CYCLE,
      `Dependency cycle between declarations: ${[...members, members[0]].join(" -> ")}`,
      { members },
    );
    this.name = "DependencyCycleError";
  }
}

export class ModelConsistencyError extends SpecGenError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.MODEL_CONSISTENCY_ERROR, message, details);
    this.name = "ModelConsistencyError";
  }
}

/**
 * Wrap anything thrown into a SpecGenError
 */
export function toSpecGenError(error: unknown): SpecGenError {
  if (error instanceof SpecGenError) {
    return error;
  }
  return new SpecGenError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
