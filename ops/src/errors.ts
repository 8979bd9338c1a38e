/**
 * errors.ts - Failure kinds for the deploy pipeline
 *
 * Every stage throws a DeployError subclass; the CLI maps it to an exit code.
 */

export type DeployErrorKind =
  | "MissingArgument"
  | "MissingExclusionFile"
  | "InvalidExclusionFile"
  | "InvalidConfig"
  | "FilesystemError"
  | "ExternalToolFailure";

export class DeployError extends Error {
  readonly kind: DeployErrorKind;
  readonly exitCode: number;

  constructor(kind: DeployErrorKind, message: string, exitCode = 1, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = kind;
    this.kind = kind;
    this.exitCode = exitCode;
  }
}

export class MissingArgumentError extends DeployError {
  constructor(message: string) {
    super("MissingArgument", message, 2);
  }
}

export class MissingExclusionFileError extends DeployError {
  readonly filePath: string;

  constructor(filePath: string, cause?: unknown) {
    super("MissingExclusionFile", `Exclusion file not found: ${filePath}`, 1, cause);
    this.filePath = filePath;
  }
}

export class InvalidExclusionFileError extends DeployError {
  constructor(message: string) {
    super("InvalidExclusionFile", message);
  }
}

export class InvalidConfigError extends DeployError {
  constructor(message: string, cause?: unknown) {
    super("InvalidConfig", message, 1, cause);
  }
}

export class FilesystemError extends DeployError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super("FilesystemError", `${message}: ${path}${describeCause(cause)}`, 1, cause);
    this.path = path;
  }
}

export class ExternalToolError extends DeployError {
  readonly command: string;

  constructor(command: string, exitCode: number, detail?: string, cause?: unknown) {
    super(
      "ExternalToolFailure",
      `${command} exited with code ${exitCode}${detail ? ` (${detail})` : ""}`,
      exitCode,
      cause
    );
    this.command = command;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Narrow an unknown thrown value to a Node system error, optionally with a given code.
 */
export function isNodeError(error: unknown, code?: string): error is NodeJS.ErrnoException {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  return code === undefined || error.code === code;
}

export function exitCodeFor(error: unknown): number {
  return error instanceof DeployError ? error.exitCode : 1;
}

function describeCause(cause: unknown): string {
  if (cause === undefined) return "";
  return ` - ${cause instanceof Error ? cause.message : String(cause)}`;
}
