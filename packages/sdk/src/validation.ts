/**
 * Shaping and validation of experiment documents, update payloads and filters
 *
 * Shaping converts identifier fields to ObjectId and timestamp fields to Date.
 * The functions here never mutate their input.
 */

import { InvalidArgumentError, ValidationError } from "./errors.js";
import { isExperimentId, parseExperimentId } from "./identifiers.js";
import { ExperimentSchemaValidator } from "./schema/validator.js";
import type {
  ExperimentFields,
  ExperimentInput,
  FinalStatus,
  Filter,
  ValidationIssue,
  ValidationMode,
} from "./types.js";

/**
 * Fields holding experiment identifiers
 */
export const IDENTIFIER_FIELDS: ReadonlySet<string> = new Set(["id", "_id", "parent_id"]);

/**
 * Fields holding UTC timestamps
 */
export const TIMESTAMP_FIELDS: ReadonlySet<string> = new Set([
  "start_time",
  "stop_time",
  "heartbeat",
]);

/**
 * Statuses accepted when finishing an experiment
 */
export const FINAL_STATUSES: readonly FinalStatus[] = ["COMPLETED", "FAILED"];

/**
 * Filter operators whose operand is a single value
 */
const SCALAR_OPERATORS = new Set(["$eq", "$ne", "$gt", "$gte", "$lt", "$lte"]);

/**
 * Filter operators whose operand is a list of values
 */
const LIST_OPERATORS = new Set(["$in", "$nin"]);

/**
 * ISO-8601 date or date-time, with optional zone designator
 */
const ISO_TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?)?$/;

let schemaValidator: ExperimentSchemaValidator | null = null;

function getSchemaValidator(): ExperimentSchemaValidator {
  schemaValidator ??= new ExperimentSchemaValidator();
  return schemaValidator;
}

/**
 * Convert a timestamp in Date, ISO-8601 string or epoch milliseconds form to a Date
 * @returns The Date, or null if the value is not a valid timestamp
 */
export function toUtcDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? new Date(value) : null;
  }
  if (typeof value === "string") {
    const match = ISO_TIMESTAMP_PATTERN.exec(value.trim());
    if (!match) {
      return null;
    }
    const [, date, time, zone] = match;
    // Timestamps without a zone designator are UTC
    const offset = zone === undefined ? "Z" : zone.replace(/^([+-]\d{2})(\d{2})$/, "$1:$2");
    const text = time === undefined ? `${date}` : `${date}T${time}${offset}`;
    const ms = Date.parse(text);
    return Number.isNaN(ms) ? null : new Date(ms);
  }
  return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isOperatorObject(value: unknown): value is Record<string, unknown> {
  if (!isPlainObject(value)) {
    return false;
  }
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every((key) => key.startsWith("$"));
}

/**
 * Shape a single field value
 * @returns The shaped value; issues are appended for values that cannot be shaped
 */
function shapeValue(
  field: string,
  value: unknown,
  pointer: string,
  issues: ValidationIssue[]
): unknown {
  if (IDENTIFIER_FIELDS.has(field)) {
    if (isExperimentId(value)) {
      return parseExperimentId(value);
    }
    issues.push({
      code: "identifier",
      pointer,
      message: `${pointer} must be an experiment id`,
    });
    return value;
  }

  if (TIMESTAMP_FIELDS.has(field)) {
    const date = toUtcDate(value);
    if (date === null) {
      issues.push({
        code: "timestamp",
        pointer,
        message: `${pointer} must be a Date, an ISO-8601 timestamp or epoch milliseconds`,
      });
      return value;
    }
    return date;
  }

  return value;
}

/**
 * Shape the operand of a field-level filter condition
 */
function shapeCondition(
  field: string,
  cond: unknown,
  pointer: string,
  issues: ValidationIssue[]
): unknown {
  // null matches missing fields; it needs no shaping
  if (cond === null) {
    return cond;
  }
  if (!isOperatorObject(cond)) {
    return shapeValue(field, cond, pointer, issues);
  }

  const shaped: Record<string, unknown> = {};
  for (const [op, operand] of Object.entries(cond)) {
    const opPointer = `${pointer}/${op}`;
    if (SCALAR_OPERATORS.has(op) && operand !== null) {
      shaped[op] = shapeValue(field, operand, opPointer, issues);
    } else if (LIST_OPERATORS.has(op) && Array.isArray(operand)) {
      shaped[op] = operand.map((item, i) =>
        item === null ? item : shapeValue(field, item, `${opPointer}/${i}`, issues)
      );
    } else {
      shaped[op] = operand;
    }
  }
  return shaped;
}

/**
 * Shape a query filter, recursing into logical operators
 */
function shapeFilter(filter: Filter, pointer: string, issues: ValidationIssue[]): Filter {
  const shaped: Filter = {};
  for (const [key, value] of Object.entries(filter)) {
    const keyPointer = `${pointer}/${key}`;
    if ((key === "$and" || key === "$or") && Array.isArray(value)) {
      shaped[key] = value.map((sub: unknown, i) =>
        isPlainObject(sub) ? shapeFilter(sub, `${keyPointer}/${i}`, issues) : sub
      );
    } else if (key === "$not" && isPlainObject(value)) {
      shaped[key] = shapeFilter(value, keyPointer, issues);
    } else if (value !== undefined) {
      shaped[key] = shapeCondition(key, value, keyPointer, issues);
    }
  }
  return shaped;
}

/**
 * Shape and validate an experiment document or update payload
 * @param candidate - Caller-supplied fields
 * @param mode - "full" for a new document, "partial" for update fields
 * @returns A shaped copy of the candidate
 * @throws {ValidationError} If any field cannot be shaped or fails the schema
 */
export function validateExperimentDoc(
  candidate: ExperimentInput,
  mode: "full" | "partial"
): ExperimentFields;
/**
 * Shape a query filter
 * @throws {ValidationError} If an identifier or timestamp operand is malformed
 */
export function validateExperimentDoc(candidate: ExperimentInput, mode: "filter"): Filter;
export function validateExperimentDoc(
  candidate: ExperimentInput,
  mode: ValidationMode
): ExperimentFields | Filter {
  if (!isPlainObject(candidate)) {
    throw new ValidationError([
      { code: "type", pointer: "", message: "document must be an object" },
    ]);
  }

  const issues: ValidationIssue[] = [];

  if (mode === "filter") {
    const filter = shapeFilter(candidate, "", issues);
    if (issues.length > 0) {
      throw new ValidationError(issues);
    }
    return filter;
  }

  const shaped: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(candidate)) {
    // undefined fields are dropped rather than stored
    if (value === undefined) {
      continue;
    }
    shaped[field] = shapeValue(field, value, `/${field}`, issues);
  }
  if (issues.length > 0) {
    throw new ValidationError(issues);
  }

  const result = getSchemaValidator().check(shaped, mode === "partial");
  if (!result.ok) {
    throw new ValidationError(result.issues);
  }
  return result.doc;
}

/**
 * Check that a status ends an experiment
 * @throws {InvalidArgumentError} If the status is not COMPLETED or FAILED
 */
export function assertFinalStatus(status: unknown): FinalStatus {
  const match = FINAL_STATUSES.find((s) => s === status);
  if (match === undefined) {
    throw new InvalidArgumentError(
      `Invalid status: ${JSON.stringify(status)}. Expected one of: ${FINAL_STATUSES.join(", ")}`
    );
  }
  return match;
}
