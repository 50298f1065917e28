/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Batch, file or use case not found */
  NOT_FOUND: 4,

  /** Database error */
  DATABASE_ERROR: 7,

  /** Validation error (input, policy or window rejected) */
  VALIDATION_ERROR: 8,

  /** Computed settlement violated an engine invariant */
  CONSISTENCY_ERROR: 12,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
