/**
 * Error types for experiment store operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Database and connectivity failures are not wrapped; they propagate as thrown
 */

import type { ObjectId } from "mongodb";
import type { ValidationIssue } from "./types.js";

/**
 * Base class for all experiment store errors
 */
export abstract class RunStoreError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a document or filter fails shaping or schema rules
 */
export class ValidationError extends RunStoreError {
  readonly code = "VALIDATION_ERROR";

  constructor(
    public readonly issues: ValidationIssue[],
    options?: ErrorOptions
  ) {
    const summary = issues.map((issue) => issue.message).join("; ");
    super(`Invalid experiment document: ${summary}`, options);
  }
}

/**
 * Thrown when an experiment identifier is malformed
 */
export class InvalidIdentifierError extends RunStoreError {
  readonly code = "INVALID_ID";

  constructor(
    public readonly value: unknown,
    options?: ErrorOptions
  ) {
    super(`Invalid experiment id: ${describe(value)}`, options);
  }
}

/**
 * Thrown when a mutating operation matches no non-deleted experiment
 */
export class NotFoundError extends RunStoreError {
  readonly code = "ENOENT";

  constructor(
    public readonly id: ObjectId,
    options?: ErrorOptions
  ) {
    super(`Experiment not found: ${id.toHexString()}`, options);
  }
}

/**
 * Thrown when an argument is outside its accepted set
 */
export class InvalidArgumentError extends RunStoreError {
  readonly code = "INVALID_ARGUMENT";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Thrown when a cascading soft-delete fails part way through.
 * Marks already applied stay in effect.
 */
export class PartialDeletionError extends RunStoreError {
  readonly code = "PARTIAL_DELETE";

  constructor(
    public readonly root: ObjectId,
    /** Experiments flagged as deleted before the failure */
    public readonly marked: ObjectId[],
    /** Experiments queued but never reached */
    public readonly pending: ObjectId[],
    options?: ErrorOptions
  ) {
    super(
      `Deletion of ${root.toHexString()} stopped after marking ${marked.length} experiment(s)`,
      options
    );
  }
}

function describe(value: unknown): string {
  if (typeof value === "string") {
    return `"${value.length > 64 ? `${value.slice(0, 64)}...` : value}"`;
  }
  if (value === null || value === undefined) {
    return String(value);
  }
  return typeof value === "object" ? (value.constructor?.name ?? "object") : String(value);
}
