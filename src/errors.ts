export type ErrorCode =
  | "CONFIG_ERROR"
  | "VALIDATION_ERROR"
  | "PRECONDITION_FAILED";

/** Base class for every error the installer raises on purpose. */
export class InstallerError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode) {
    super(message);
    this.name = "InstallerError";
    this.code = code;
  }
}

/** Missing or unreadable config file, missing required key, missing task list. */
export class ConfigError extends InstallerError {
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(message, "CONFIG_ERROR");
    this.name = "ConfigError";
    this.path = path;
  }
}

export class ValidationError extends InstallerError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/** A pre-flight check failed or its warning was declined. Nothing has been installed. */
export class PreconditionError extends InstallerError {
  readonly check: string;

  constructor(check: string, message: string) {
    super(message, "PRECONDITION_FAILED");
    this.name = "PreconditionError";
    this.check = check;
  }
}

/** True for errors that must stop the process before any task runs. */
export function isFatal(err: unknown): err is ConfigError | ValidationError | PreconditionError {
  return err instanceof ConfigError || err instanceof ValidationError || err instanceof PreconditionError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
