import { ExitCodes, type ExitCode } from './exit-codes.js';

/**
 * Standardized CLI response format for `--json` output.
 */
export interface CLIResponse<T = unknown> {
  /** Whether the command executed successfully */
  success: boolean;

  /** Command that was executed */
  command: string;

  /** ISO 8601 timestamp of when the response was generated */
  timestamp: string;

  /** Response data (only present on success) */
  data?: T | undefined;

  /** Error information (only present on failure) */
  error?:
    | {
        /** Machine-readable error code */
        code: string;

        /** Additional error details (optional) */
        details?: unknown;

        /** Human-readable error message */
        message: string;

        /** Stack trace (only in development mode) */
        stack?: string | undefined;
      }
    | undefined;

  /** Additional metadata about the execution, e.g. `duration_ms` */
  metadata?: Record<string, unknown> | undefined;
}

export function createSuccessResponse<T>(command: string, data: T, metadata?: Record<string, unknown>): CLIResponse<T> {
  const response: CLIResponse<T> = {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
  };

  if (metadata) {
    response.metadata = metadata;
  }

  return response;
}

export function createErrorResponse(
  command: string,
  error: Error,
  code: string,
  details?: unknown
): CLIResponse<never> {
  const errorObj: { code: string; details?: unknown; message: string; stack?: string | undefined } = {
    code,
    message: error.message,
  };

  if (details !== undefined) {
    errorObj.details = details;
  }

  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: errorObj,
  };
}

/**
 * Map exit code to error code string.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  const entry = Object.entries(ExitCodes).find(([, code]) => code === exitCode);
  return entry && exitCode !== ExitCodes.SUCCESS ? entry[0] : 'UNKNOWN_ERROR';
}
