/**
 * JSON Schema for experiment documents
 *
 * Identifier and timestamp fields are not described here: they are shaped into
 * ObjectId and Date values before the schema runs.
 */

import type { SchemaObject } from "ajv";

export const EXPERIMENT_STATUSES = ["RUNNING", "COMPLETED", "FAILED"] as const;

const objectMap: SchemaObject = { type: "object" };

const properties: Record<string, SchemaObject> = {
  name: { type: "string", minLength: 1 },
  description: { type: "string" },
  tags: { type: "array", items: { type: "string" } },
  status: { type: "string", enum: [...EXPERIMENT_STATUSES] },
  error: {
    type: "object",
    properties: {
      message: { type: "string" },
      traceback: { type: "string" },
    },
    required: ["message"],
  },
  exit_code: { type: "integer" },
  storage_dir: { type: "string" },
  storage_size: { type: "integer", minimum: 0 },
  exc_info: {
    type: "object",
    properties: {
      hostname: { type: "string" },
      pid: { type: "integer", minimum: 0 },
      work_dir: { type: "string" },
      env: { type: "object", additionalProperties: { type: "string" } },
    },
  },
  webui: { type: "object", additionalProperties: { type: "string", format: "uri" } },
  fingerprint: { type: "string" },
  args: {
    anyOf: [{ type: "string" }, { type: "array", items: { type: "string" } }],
  },
  config: objectMap,
  default_config: objectMap,
  result: objectMap,
  deleted: { type: "boolean" },
};

/**
 * Schema for a complete new document
 */
export const EXPERIMENT_SCHEMA: SchemaObject = {
  $id: "runstore/experiment",
  type: "object",
  properties,
  required: ["name"],
};

/**
 * Schema for a set of fields merged into an existing document
 */
export const EXPERIMENT_UPDATE_SCHEMA: SchemaObject = {
  $id: "runstore/experiment-update",
  type: "object",
  properties,
};
