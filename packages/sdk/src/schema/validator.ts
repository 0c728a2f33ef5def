/**
 * Schema validator with error normalization
 */

import AjvModule from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";
import type { ExperimentFields, ValidationIssue, ValidationIssueCode } from "../types.js";
import { EXPERIMENT_SCHEMA, EXPERIMENT_UPDATE_SCHEMA } from "./experiment.js";

const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

/**
 * Result of a schema check
 */
export type SchemaCheck =
  | { ok: true; doc: ExperimentFields }
  | { ok: false; issues: ValidationIssue[] };

/**
 * Validates shaped experiment documents against the experiment JSON Schema.
 * Schemas are compiled once per validator.
 */
export class ExperimentSchemaValidator {
  #full: ValidateFunction<ExperimentFields>;
  #partial: ValidateFunction<ExperimentFields>;

  constructor() {
    const ajv = new Ajv({ allErrors: true, strict: true });
    // Standard formats (uri) from ajv-formats
    addFormats(ajv);

    this.#full = ajv.compile<ExperimentFields>(EXPERIMENT_SCHEMA);
    this.#partial = ajv.compile<ExperimentFields>(EXPERIMENT_UPDATE_SCHEMA);
  }

  /**
   * Check a shaped document
   * @param doc - Document with identifiers and timestamps already shaped
   * @param partial - Whether this is a partial update (no required fields)
   */
  check(doc: Record<string, unknown>, partial: boolean): SchemaCheck {
    const validator = partial ? this.#partial : this.#full;
    if (validator(doc)) {
      return { ok: true, doc };
    }
    return { ok: false, issues: this.#normalizeErrors(validator.errors ?? []) };
  }

  /**
   * Normalize Ajv errors to ValidationIssue format
   */
  #normalizeErrors(ajvErrors: ErrorObject[]): ValidationIssue[] {
    return ajvErrors.map((err) => ({
      code: this.#mapErrorCode(err.keyword),
      pointer: this.#buildPointer(err),
      message: this.#formatErrorMessage(err),
    }));
  }

  /**
   * Build JSON Pointer from Ajv error
   */
  #buildPointer(err: ErrorObject): string {
    const base = err.instancePath ?? "";

    // For required errors, append the missing property name
    if (err.keyword === "required" && typeof err.params.missingProperty === "string") {
      return `${base}/${err.params.missingProperty}`;
    }

    return base;
  }

  /**
   * Map Ajv error keyword to ValidationIssueCode
   */
  #mapErrorCode(keyword: string): ValidationIssueCode {
    switch (keyword) {
      case "required":
        return "required";
      case "type":
        return "type";
      case "enum":
        return "enum";
      case "format":
        return "format";
      case "minimum":
        return "minimum";
      case "minLength":
        return "minLength";
      default:
        return "custom";
    }
  }

  /**
   * Format error message with context
   */
  #formatErrorMessage(err: ErrorObject): string {
    const path = err.instancePath || "document";

    switch (err.keyword) {
      case "required":
        return `${path} is missing required property: ${err.params.missingProperty}`;
      case "type":
        return `${path} must be ${err.params.type}`;
      case "enum":
        return `${path} must be one of: ${err.params.allowedValues.join(", ")}`;
      case "format":
        return `${path} must match format "${err.params.format}"`;
      case "minimum":
        return `${path} must be >= ${err.params.limit}`;
      case "minLength":
        return `${path} must be at least ${err.params.limit} characters`;
      default:
        return err.message || `Validation failed at ${path}`;
    }
  }
}
