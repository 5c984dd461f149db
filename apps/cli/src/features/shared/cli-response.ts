import { DomainError } from '@coinreckon/core';

import { ExitCodes, type ExitCode } from './exit-codes.js';

/**
 * Standardized CLI response format for JSON output.
 */
export interface CLIResponse<T = unknown> {
  /** Whether the command executed successfully */
  success: boolean;

  /** Command that was executed */
  command: string;

  /** ISO 8601 timestamp of when the response was generated */
  timestamp: string;

  /** Response data (only present on success) */
  data?: T;

  /** Error information (only present on failure) */
  error?:
    | {
        /** Machine-readable error code */
        code: string;

        /** Structured context of domain errors */
        details?: unknown;

        /** Human-readable error message */
        message: string;
      }
    | undefined;

  metadata?: Record<string, unknown> | undefined;
}

export function createSuccessResponse<T>(command: string, data: T, metadata?: Record<string, unknown>): CLIResponse<T> {
  return {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
    ...(metadata ? { metadata } : {}),
  };
}

/**
 * Domain errors report their own code; anything else is named after the exit code.
 */
export function createErrorResponse(command: string, error: Error, exitCode: ExitCode): CLIResponse<never> {
  const isDomainError = error instanceof DomainError;

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: {
      code: isDomainError ? error.code : exitCodeToErrorCode(exitCode),
      message: error.message,
      ...(isDomainError && error.context ? { details: error.context } : {}),
    },
  };
}

export function exitCodeToErrorCode(exitCode: ExitCode): string {
  switch (exitCode) {
    case ExitCodes.SUCCESS:
      return 'SUCCESS';
    case ExitCodes.GENERAL_ERROR:
      return 'GENERAL_ERROR';
    case ExitCodes.INVALID_ARGS:
      return 'INVALID_ARGS';
  }
}
