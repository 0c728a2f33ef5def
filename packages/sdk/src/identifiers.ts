/**
 * Identifier parsing and the `id` ⇄ `_id` rename at the storage boundary
 *
 * Callers see `id`; the database keys documents by `_id`. The two names never
 * coexist in a document that crosses the boundary.
 */

import { ObjectId } from "mongodb";
import { InvalidIdentifierError } from "./errors.js";
import type { ExperimentDoc, ExperimentId, StoredExperiment } from "./types.js";

/** Caller-facing identifier field */
export const ID_FIELD = "id";

/** Database primary key field */
export const DB_ID_FIELD = "_id";

const HEX_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

/**
 * Check whether a value is an identifier in native or string form
 */
export function isExperimentId(value: unknown): value is ExperimentId | string {
  return value instanceof ObjectId || (typeof value === "string" && HEX_ID_PATTERN.test(value));
}

/**
 * Parse an experiment identifier
 * @param value - ObjectId or 24 hex digit string
 * @throws {InvalidIdentifierError} If the value is not a well-formed identifier
 */
export function parseExperimentId(value: unknown): ExperimentId {
  if (value instanceof ObjectId) {
    return value;
  }
  if (typeof value === "string" && HEX_ID_PATTERN.test(value)) {
    return ObjectId.createFromHexString(value);
  }
  throw new InvalidIdentifierError(value);
}

/**
 * Remove both identifier fields from a document
 * @returns A copy without `id` and `_id`
 */
export function stripIdentifier<T extends Record<string, unknown>>(doc: T): Omit<T, "id" | "_id"> {
  const { id: _id, _id: _dbId, ...rest } = doc;
  return rest;
}

/**
 * Rename the caller identifier field to the database key
 * @returns A copy with `id` moved to `_id`; a caller `id` wins over a stray `_id`
 */
export function toDatabaseDoc<T extends Record<string, unknown>>(doc: T): Record<string, unknown> {
  if (!(ID_FIELD in doc)) {
    return { ...doc };
  }
  const { id, ...rest } = doc;
  return { ...rest, _id: id };
}

/**
 * Rename the database key back to the caller identifier field
 * @returns A copy with `_id` moved to `id`, or null for a missing document
 */
export function fromDatabaseDoc(doc: StoredExperiment): ExperimentDoc;
export function fromDatabaseDoc(doc: StoredExperiment | null): ExperimentDoc | null;
export function fromDatabaseDoc(doc: StoredExperiment | null): ExperimentDoc | null {
  if (doc === null) {
    return null;
  }
  const { _id, ...rest } = doc;
  return { ...rest, id: _id };
}

/**
 * Rename sort keys that use the caller identifier name
 */
export function toDatabaseField(field: string): string {
  return field === ID_FIELD ? DB_ID_FIELD : field;
}
