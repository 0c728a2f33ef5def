/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { NotFoundError } from "@runstore/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;
  /** The message was already written to stderr */
  reported: boolean;

  constructor(
    message: string,
    options?: { exitCode?: number; cause?: unknown; reported?: boolean }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
    this.reported = options?.reported ?? false;
  }
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/database/unknown error
 * - 2: experiment not found
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError || error instanceof CommanderError) {
    return error.exitCode;
  }

  if (error instanceof NotFoundError) {
    return 2;
  }

  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (error instanceof AggregateError) {
      for (const inner of error.errors) {
        message += `\n  - ${inner instanceof Error ? inner.message : String(inner)}`;
      }
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
