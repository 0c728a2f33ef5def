/**
 * Core types for the experiment store
 */

import type { ObjectId } from "mongodb";

/**
 * Experiment identifier. Round-trips through its 24 hex digit string form.
 */
export type ExperimentId = ObjectId;

/**
 * Lifecycle status. RUNNING is initial; COMPLETED and FAILED are terminal.
 */
export type ExperimentStatus = "RUNNING" | "COMPLETED" | "FAILED";

/**
 * Statuses accepted by `setFinished`
 */
export type FinalStatus = Exclude<ExperimentStatus, "RUNNING">;

/**
 * Failure detail recorded alongside a FAILED status
 */
export interface ExperimentError {
  /** Short message describing the failure */
  message: string;
  /** Full traceback, optional */
  traceback?: string;
}

/**
 * Where and how the experiment program was executed
 */
export interface ExecutionInfo {
  hostname?: string;
  pid?: number;
  work_dir?: string;
  env?: Record<string, string>;
}

/**
 * Fields of an experiment document after shaping.
 *
 * Every named field is optional; any other field is kept verbatim.
 */
export interface ExperimentFields {
  parent_id?: ExperimentId;
  name?: string;
  description?: string;
  tags?: string[];
  start_time?: Date;
  stop_time?: Date;
  heartbeat?: Date;
  status?: ExperimentStatus;
  error?: ExperimentError;
  exit_code?: number;
  storage_dir?: string;
  storage_size?: number;
  exc_info?: ExecutionInfo;
  /** Web servers exposed by the experiment: name → URI */
  webui?: Record<string, string>;
  fingerprint?: string;
  args?: string | string[];
  config?: Record<string, unknown>;
  default_config?: Record<string, unknown>;
  result?: Record<string, unknown>;
  /** Soft-delete flag; absent or false means visible */
  deleted?: boolean;
  [field: string]: unknown;
}

/**
 * Experiment document as handed to callers
 */
export interface ExperimentDoc extends ExperimentFields {
  id: ExperimentId;
  name: string;
}

/**
 * Experiment document as persisted (primary key under `_id`)
 */
export interface StoredExperiment extends ExperimentFields {
  _id: ExperimentId;
  name: string;
}

/**
 * Caller-supplied document or update payload, before shaping.
 * Identifier and timestamp fields may still be in their string forms.
 */
export type ExperimentInput = Record<string, unknown>;

/**
 * Mango-style query filter: field → literal or operator object
 */
export type Filter = Record<string, unknown>;

/**
 * Sort direction (1 = ascending, -1 = descending)
 */
export type SortDirection = 1 | -1;

/**
 * Ordered sort specification: [[field, direction], ...]
 */
export type SortSpec = Array<[field: string, direction: SortDirection]>;

/**
 * Index key specification: ordered [[field, direction], ...] pairs
 */
export type IndexKeySpec = Array<[field: string, direction: SortDirection]>;

/**
 * Index metadata reported by a collection
 */
export interface IndexInfo {
  name: string;
  key: IndexKeySpec;
}

/**
 * Options for a collection scan
 */
export interface FindOptions {
  sort?: SortSpec;
  skip?: number;
  limit?: number;
}

/**
 * Outcome of a single-document update
 */
export interface UpdateOutcome {
  matchedCount: number;
  modifiedCount: number;
}

/**
 * The database operations the store issues.
 *
 * Filters and documents use the storage field names (`_id`, not `id`).
 */
export interface ExperimentCollection {
  /** Existing index metadata, including the primary key index */
  listIndexes(): Promise<IndexInfo[]>;

  /** Create several indexes in one call; returns their names */
  createIndexes(specs: IndexKeySpec[]): Promise<string[]>;

  findOne(filter: Filter): Promise<StoredExperiment | null>;

  /** Lazily iterate matching documents */
  find(filter: Filter, options?: FindOptions): AsyncIterable<StoredExperiment>;

  /** Insert a document and return its assigned identifier */
  insertOne(doc: ExperimentFields): Promise<ExperimentId>;

  /** Apply `$set` semantics to the first matching document */
  updateOne(filter: Filter, fields: ExperimentFields): Promise<UpdateOutcome>;

  /** Remove the first matching document; returns the number removed */
  deleteOne(filter: Filter): Promise<number>;

  /** Release backend resources */
  close(): Promise<void>;
}

/**
 * Options for iterating experiment documents
 */
export interface IterDocsOptions {
  /** Query filter; caller field names (`id`) are accepted */
  filter?: ExperimentInput;
  /** Number of documents to skip at the front */
  skip?: number;
  /** Maximum number of documents to yield */
  limit?: number;
  /** Sort order (default: heartbeat descending) */
  sortBy?: SortSpec;
  /** Include soft-deleted documents (default: false) */
  includeDeleted?: boolean;
}

/**
 * Configuration options for opening a store
 */
export interface StoreOptions {
  /** Backend collection holding the experiment documents */
  collection: ExperimentCollection;
  /** Clock used for default and forced timestamps (default: () => new Date()) */
  now?: () => Date;
  /** Logger receiving store events (default: shared logger) */
  logger?: StoreLogger;
}

/**
 * Minimal logger surface the store writes to
 */
export interface StoreLogger {
  debug(event: string, data?: LogData): void;
  info(event: string, data?: LogData): void;
  warn(event: string, data?: LogData): void;
  error(event: string, data?: LogData): void;
}

/**
 * Structured data attached to a log entry
 */
export interface LogData {
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Validation modes
 * - full: a complete new document (`name` required)
 * - partial: a set of fields to merge into an existing document
 * - filter: a query filter (shaping only, operator objects allowed)
 */
export type ValidationMode = "full" | "partial" | "filter";

/**
 * Validation issue codes
 */
export type ValidationIssueCode =
  | "required"
  | "type"
  | "enum"
  | "format"
  | "identifier"
  | "timestamp"
  | "minimum"
  | "minLength"
  | "custom";

/**
 * A single validation failure with a JSON Pointer to the field
 */
export interface ValidationIssue {
  /** Error code categorizing the failure */
  code: ValidationIssueCode;
  /** JSON Pointer to the failing field (e.g., "/exc_info/pid") */
  pointer: string;
  /** Human-readable error message */
  message: string;
}

/**
 * Experiment store
 */
export interface Store {
  /** The backend collection */
  readonly collection: ExperimentCollection;

  /**
   * Ensure the secondary indexes exist. Runs at most once per store instance
   * after the first success.
   */
  ensureIndexes(): Promise<void>;

  /**
   * Get an experiment by id
   * @returns The document, or null if it does not exist or is soft-deleted
   */
  get(id: ExperimentId | string): Promise<ExperimentDoc | null>;

  /**
   * Create an experiment
   * @returns The assigned identifier
   */
  create(name: string, fields?: ExperimentInput): Promise<ExperimentId>;

  /** Merge fields into an existing, non-deleted experiment */
  update(id: ExperimentId | string, fields: ExperimentInput): Promise<void>;

  /** Set the heartbeat to now, merging any other fields */
  setHeartbeat(id: ExperimentId | string, fields?: ExperimentInput): Promise<void>;

  /** Set a terminal status; stop_time and heartbeat become now */
  setFinished(id: ExperimentId | string, status: string, fields?: ExperimentInput): Promise<void>;

  /**
   * Soft-delete an experiment and all its descendants
   * @returns Identifiers marked, root first, depth-first
   */
  markDelete(id: ExperimentId | string): Promise<ExperimentId[]>;

  /**
   * Physically remove experiments
   * @returns Number of documents removed
   */
  completeDeletion(ids: Iterable<ExperimentId | string>): Promise<number>;

  /** Lazily iterate experiments */
  iterDocs(options?: IterDocsOptions): AsyncGenerator<ExperimentDoc, void, undefined>;

  /** Fetch experiments into an array */
  fetchDocs(options?: IterDocsOptions): Promise<ExperimentDoc[]>;

  /** Release the backend */
  close(): Promise<void>;
}
