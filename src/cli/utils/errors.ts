/**
 * CLI error handling utilities.
 * @module cli/utils/errors
 */

import { TransportError } from "../../errors.js";

// ============================================
// Exit Codes
// ============================================

/**
 * CLI exit codes.
 */
export const ExitCode = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  CONFIG_ERROR: 2,
  CONNECTION_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

// ============================================
// CLI Error Class
// ============================================

/**
 * CLI-specific error with exit code and optional hint.
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly code: ExitCode = ExitCode.GENERAL_ERROR,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = "CLIError";
  }
}

/**
 * Convert any thrown value to a CLIError.
 * Transport failures become CONNECTION_ERROR.
 */
export function toCLIError(error: unknown): CLIError {
  if (error instanceof CLIError) {
    return error;
  }

  if (TransportError.isTransportError(error)) {
    return new CLIError(
      error.message,
      ExitCode.CONNECTION_ERROR,
      error.code === "CONNECTION_FAILED"
        ? "Check that the todo server is running and the base URL is correct"
        : undefined,
    );
  }

  return new CLIError(
    error instanceof Error ? error.message : String(error),
    ExitCode.GENERAL_ERROR,
  );
}

// ============================================
// Error Handler
// ============================================

/**
 * Print an error (and its hint) to stderr and exit with its code.
 */
export function handleError(error: unknown): never {
  const cliError = toCLIError(error);

  console.error(`Error: ${cliError.message}`);
  if (cliError.hint) {
    console.error(`Hint: ${cliError.hint}`);
  }

  process.exit(cliError.code);
}
