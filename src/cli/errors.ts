/**
 * Error codes and exit codes for opskit
 *
 * Every command reports failures through CliError so the entry point can
 * print a JSON envelope or a plain message and exit with a stable code.
 * Checks that find a problem (disk over threshold, expiring certificate,
 * listed IP, changed file) exit with CHECK_FAILED so cron and CI can tell
 * them apart from crashes.
 */

/**
 * Error codes used in the JSON error.code field
 */
export enum ErrorCode {
  SUCCESS = 'SUCCESS',
  GENERAL_ERROR = 'GENERAL_ERROR',
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',
  CONFIG_ERROR = 'CONFIG_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  RESOURCE_LOCKED = 'RESOURCE_LOCKED',

  /** A monitored value crossed its threshold or a target is unhealthy */
  CHECK_FAILED = 'CHECK_FAILED',

  /** A required external binary (ssh, df, kubectl...) is not installed */
  MISSING_DEPENDENCY = 'MISSING_DEPENDENCY',

  /** Some items of a fan-out failed while the rest completed */
  PARTIAL_FAILURE = 'PARTIAL_FAILURE',

  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  BASELINE_NOT_FOUND = 'BASELINE_NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  COMMAND_FAILED = 'COMMAND_FAILED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Unix exit codes for process termination
 */
export enum ExitCode {
  SUCCESS = 0,
  GENERAL_ERROR = 1,
  INVALID_ARGUMENTS = 2,
  CONFIG_ERROR = 3,
  NOT_FOUND = 4,
  PERMISSION_DENIED = 5,
  RESOURCE_LOCKED = 6,
  CHECK_FAILED = 7,
  MISSING_DEPENDENCY = 8,
}

export const ERROR_CODE_TO_EXIT_CODE: Record<ErrorCode, ExitCode> = {
  [ErrorCode.SUCCESS]: ExitCode.SUCCESS,
  [ErrorCode.GENERAL_ERROR]: ExitCode.GENERAL_ERROR,
  [ErrorCode.INVALID_ARGUMENTS]: ExitCode.INVALID_ARGUMENTS,
  [ErrorCode.CONFIG_ERROR]: ExitCode.CONFIG_ERROR,
  [ErrorCode.NOT_FOUND]: ExitCode.NOT_FOUND,
  [ErrorCode.PERMISSION_DENIED]: ExitCode.PERMISSION_DENIED,
  [ErrorCode.RESOURCE_LOCKED]: ExitCode.RESOURCE_LOCKED,
  [ErrorCode.CHECK_FAILED]: ExitCode.CHECK_FAILED,
  [ErrorCode.MISSING_DEPENDENCY]: ExitCode.MISSING_DEPENDENCY,

  // Specific error codes map to generic exit codes
  [ErrorCode.PARTIAL_FAILURE]: ExitCode.GENERAL_ERROR,
  [ErrorCode.FILE_NOT_FOUND]: ExitCode.NOT_FOUND,
  [ErrorCode.BASELINE_NOT_FOUND]: ExitCode.NOT_FOUND,
  [ErrorCode.VALIDATION_ERROR]: ExitCode.INVALID_ARGUMENTS,
  [ErrorCode.COMMAND_FAILED]: ExitCode.GENERAL_ERROR,
  [ErrorCode.INTERNAL_ERROR]: ExitCode.GENERAL_ERROR,
};

export function getExitCode(errorCode: ErrorCode): ExitCode {
  return ERROR_CODE_TO_EXIT_CODE[errorCode] ?? ExitCode.GENERAL_ERROR;
}

/**
 * CLI Error class that includes error code and exit code
 */
export class CliError extends Error {
  public readonly code: ErrorCode;
  public readonly exitCode: ExitCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CliError';
    this.code = code;
    this.exitCode = getExitCode(code);
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CliError);
    }
  }

  toJSON(): { code: string; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export function invalidArgumentsError(message: string, details?: Record<string, unknown>): CliError {
  return new CliError(ErrorCode.INVALID_ARGUMENTS, message, details);
}

export function configError(message: string, details?: Record<string, unknown>): CliError {
  return new CliError(ErrorCode.CONFIG_ERROR, message, details);
}

export function permissionDeniedError(message: string): CliError {
  return new CliError(ErrorCode.PERMISSION_DENIED, message);
}

export function fileNotFoundError(path: string): CliError {
  return new CliError(ErrorCode.FILE_NOT_FOUND, `File not found: ${path}`, { path });
}

export function notFoundError(message: string, details?: Record<string, unknown>): CliError {
  return new CliError(ErrorCode.NOT_FOUND, message, details);
}

export function missingDependencyError(tool: string, hint?: string): CliError {
  return new CliError(
    ErrorCode.MISSING_DEPENDENCY,
    `Required command not found: ${tool}${hint ? ` (${hint})` : ''}`,
    { tool }
  );
}

/**
 * The `code` of a Node system error (ENOENT, EACCES, ENOTFOUND...)
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Wrap an unexpected error so it carries an exit code. Argument parsing
 * failures exit with INVALID_ARGUMENTS, permission failures with
 * PERMISSION_DENIED and anything else with GENERAL_ERROR
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }
  const code = systemErrorCode(error);
  if (code?.startsWith('ERR_PARSE_ARGS_')) {
    return invalidArgumentsError(errorMessage(error));
  }
  if (code === 'EACCES' || code === 'EPERM') {
    return permissionDeniedError(errorMessage(error));
  }
  return new CliError(ErrorCode.GENERAL_ERROR, errorMessage(error));
}

/**
 * Message text of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
