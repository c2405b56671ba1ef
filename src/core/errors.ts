/*
Purpose: error types shared by the workspace store, materializer and CLI.
Assumptions: UserFacingError instances are safe to display to end users; the store
reports not-found as a no-op result and never throws these at callers.
Usage: new MaterializeError("...", "write", targetPath, err); throw new UserFacingError({ code, title, message, hint, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class LatticeError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "LatticeError";
  }
}

export class ConfigError extends LatticeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class WorkspaceError extends LatticeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "WorkspaceError";
  }
}

export type MaterializeOperation =
  | "create"
  | "write"
  | "delete"
  | "rename"
  | "remove-project"
  | "list";

export class MaterializeError extends LatticeError {
  constructor(
    message: string,
    public readonly operation: MaterializeOperation,
    public readonly targetPath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "MaterializeError";
  }

  /** Node's errno code of the underlying failure, when there is one. */
  get code(): string | undefined {
    const cause = this.cause;
    if (cause && typeof cause === "object" && "code" in cause) {
      return typeof cause.code === "string" ? cause.code : undefined;
    }
    return undefined;
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  workspace: "WORKSPACE_ERROR",
  disk: "DISK_ERROR",
  scaffold: "SCAFFOLD_ERROR",
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
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

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

export function createDiskUserError(input: {
  title: string;
  error: MaterializeError;
  hint?: string;
}): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.disk,
    title: input.title,
    message: input.error.message,
    hint: input.hint ?? "Check that the storage folder exists and is writable.",
    cause: input.error,
  });
}
