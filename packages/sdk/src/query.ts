/**
 * Mango query evaluation engine
 *
 * Evaluates filters and sort specifications against in-process documents.
 * ObjectId and Date values compare by value, the way the database compares them.
 */

import { ObjectId } from "mongodb";
import type { Filter, SortSpec } from "./types.js";

type Doc = Record<string, unknown>;

/**
 * Get a nested value from an object using dot-path notation
 * @param obj - Object to get value from
 * @param path - Dot-separated path (e.g., "exc_info.hostname")
 * @returns Value at path, or undefined if not found
 */
export function getPath(obj: unknown, path: string): unknown {
  return path.split(".").reduce<unknown>((o, k) => {
    if (o === null || typeof o !== "object") return undefined;
    return Reflect.get(o, k);
  }, obj);
}

/**
 * Value equality with ObjectId and Date compared by value
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a instanceof ObjectId && b instanceof ObjectId) {
    return a.equals(b);
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  return a === b;
}

/**
 * Convert a value to something the relational operators can order
 */
function orderable(value: unknown): unknown {
  if (value instanceof Date) return value.getTime();
  if (value instanceof ObjectId) return value.toHexString();
  return value;
}

function compareSameType(a: unknown, b: unknown): number | null {
  const x = orderable(a);
  const y = orderable(b);
  if (typeof x === "number" && typeof y === "number") return x < y ? -1 : x > y ? 1 : 0;
  if (typeof x === "string" && typeof y === "string") return x < y ? -1 : x > y ? 1 : 0;
  if (typeof x === "boolean" && typeof y === "boolean") return x === y ? 0 : x ? 1 : -1;
  return null;
}

function relational(val: unknown, rhs: unknown, test: (cmp: number) => boolean): boolean {
  if (val === undefined || val === null) return false;
  const cmp = compareSameType(val, rhs);
  return cmp !== null && test(cmp);
}

function typeName(val: unknown): string {
  if (Array.isArray(val)) return "array";
  if (val === null) return "null";
  if (val instanceof Date) return "date";
  if (val instanceof ObjectId) return "objectId";
  return typeof val;
}

function isOperatorObject(cond: unknown): cond is Record<string, unknown> {
  if (cond === null || typeof cond !== "object" || Array.isArray(cond)) return false;
  if (cond instanceof Date || cond instanceof ObjectId) return false;
  const keys = Object.keys(cond);
  return keys.length > 0 && keys.every((k) => k.startsWith("$"));
}

/**
 * Literal equality; a literal matches an array field that contains it
 */
function matchLiteral(val: unknown, cond: unknown): boolean {
  // null matches both null and missing fields
  if (cond === null) {
    return val === null || val === undefined;
  }
  if (Array.isArray(val) && !Array.isArray(cond)) {
    return val.some((item) => valuesEqual(item, cond));
  }
  return valuesEqual(val, cond);
}

/**
 * Evaluate a field-level condition
 * @param val - Actual field value
 * @param cond - Condition to test (operator object or literal value)
 * @returns true if condition matches
 */
function matchField(val: unknown, cond: unknown): boolean {
  if (!isOperatorObject(cond)) {
    return matchLiteral(val, cond);
  }

  for (const [op, rhs] of Object.entries(cond)) {
    switch (op) {
      case "$eq":
        if (!matchLiteral(val, rhs)) return false;
        break;
      case "$ne":
        if (matchLiteral(val, rhs)) return false;
        break;
      case "$in":
        if (!Array.isArray(rhs) || !rhs.some((r) => matchLiteral(val, r))) return false;
        break;
      case "$nin":
        if (!Array.isArray(rhs) || rhs.some((r) => matchLiteral(val, r))) return false;
        break;
      case "$gt":
        if (!relational(val, rhs, (c) => c > 0)) return false;
        break;
      case "$gte":
        if (!relational(val, rhs, (c) => c >= 0)) return false;
        break;
      case "$lt":
        if (!relational(val, rhs, (c) => c < 0)) return false;
        break;
      case "$lte":
        if (!relational(val, rhs, (c) => c <= 0)) return false;
        break;
      case "$exists": {
        const exists = val !== undefined;
        if (exists !== rhs) return false;
        break;
      }
      case "$type":
        if (typeName(val) !== rhs) return false;
        break;
      default:
        throw new Error(`Unknown operator: ${op}`);
    }
  }
  return true;
}

/**
 * Test if a document matches a Mango filter
 * @param doc - Document to test
 * @param filter - Mango filter object
 * @returns true if document matches filter
 */
export function matches(doc: Doc, filter: Filter): boolean {
  for (const [key, value] of Object.entries(filter)) {
    if (key === "$and") {
      if (!Array.isArray(value)) {
        throw new Error("$and operator requires an array of filters");
      }
      if (!value.every((f: Filter) => matches(doc, f))) {
        return false;
      }
      continue;
    }

    if (key === "$or") {
      if (!Array.isArray(value)) {
        throw new Error("$or operator requires an array of filters");
      }
      if (!value.some((f: Filter) => matches(doc, f))) {
        return false;
      }
      continue;
    }

    if (key === "$not") {
      if (!isFilter(value)) {
        throw new Error("$not operator requires a filter");
      }
      if (matches(doc, value)) {
        return false;
      }
      continue;
    }

    if (!matchField(getPath(doc, key), value)) {
      return false;
    }
  }

  return true;
}

function isFilter(value: unknown): value is Filter {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Compare two values for sorting
 * Handles mixed types by type precedence
 * @returns -1, 0, or 1
 */
export function compareValues(a: unknown, b: unknown): number {
  // Handle undefined/null
  if (a == null && b == null) return 0;
  if (a == null) return -1;
  if (b == null) return 1;

  const same = compareSameType(a, b);
  if (same !== null) return same;

  // Mixed types - use type precedence: null < number < string < object < boolean < date
  const typePrecedence: Record<string, number> = {
    number: 1,
    string: 2,
    object: 3,
    array: 4,
    objectId: 5,
    boolean: 6,
    date: 7,
  };

  return (typePrecedence[typeName(a)] ?? 8) - (typePrecedence[typeName(b)] ?? 8);
}

/**
 * Sort documents according to sort specification
 * @param docs - Documents to sort (mutates array)
 * @param sort - Ordered [field, direction] pairs
 */
export function sortDocuments<T extends Doc>(docs: T[], sort?: SortSpec): void {
  if (!sort || sort.length === 0) {
    return;
  }

  docs.sort((a, b) => {
    for (const [field, direction] of sort) {
      const cmp = compareValues(getPath(a, field), getPath(b, field));
      if (cmp !== 0) {
        return direction === 1 ? cmp : -cmp;
      }
    }
    return 0;
  });
}

/**
 * Apply pagination to documents
 * @param docs - Documents to paginate
 * @param skip - Number to skip (default: 0)
 * @param limit - Maximum to return (default: unlimited)
 * @returns Paginated slice
 */
export function paginate<T>(docs: T[], skip = 0, limit?: number): T[] {
  const end = limit !== undefined && limit > 0 ? skip + limit : undefined;
  return docs.slice(skip, end);
}
