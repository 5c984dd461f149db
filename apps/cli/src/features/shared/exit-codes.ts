/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** Evaluation failed (invalid ledger, missing price, unsupported operation, ...) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
