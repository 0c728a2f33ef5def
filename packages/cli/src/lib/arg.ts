/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import type { SortSpec } from "@runstore/sdk";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  // Enforce reasonable max to prevent runaway queries
  if (parsed > 10000) {
    throw new InvalidArgumentError(`${name} must be <= 10000`);
  }

  return parsed;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Check that a parsed value is a JSON object
 */
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Parse a JSON object argument
 */
export function parseJsonObject(value: string, source: string): Record<string, unknown> {
  const parsed = parseJson(value, source);
  if (!isJsonObject(parsed)) {
    throw new InvalidArgumentError(`${source} must be a JSON object`);
  }
  return parsed;
}

/**
 * Parse a sort specification: "field:asc,other:desc"
 * A field without a direction sorts ascending.
 */
export function parseSort(value: string, name: string): SortSpec {
  const spec: SortSpec = [];
  for (const part of value.split(",")) {
    const [field = "", direction = "asc", ...rest] = part.trim().split(":");
    if (!field || rest.length > 0) {
      throw new InvalidArgumentError(`${name} entries must look like field:asc or field:desc`);
    }
    switch (direction.toLowerCase()) {
      case "asc":
        spec.push([field, 1]);
        break;
      case "desc":
        spec.push([field, -1]);
        break;
      default:
        throw new InvalidArgumentError(`${name} direction must be asc or desc, got "${direction}"`);
    }
  }
  return spec;
}
