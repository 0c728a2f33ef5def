/**
 * runstore SDK
 *
 * Metadata store for machine-learning experiment runs, backed by MongoDB
 */

// Re-export types
export type {
  ExperimentId,
  ExperimentStatus,
  FinalStatus,
  ExperimentError,
  ExecutionInfo,
  ExperimentFields,
  ExperimentDoc,
  StoredExperiment,
  ExperimentInput,
  Filter,
  SortDirection,
  SortSpec,
  IndexKeySpec,
  IndexInfo,
  FindOptions,
  UpdateOutcome,
  ExperimentCollection,
  IterDocsOptions,
  StoreOptions,
  StoreLogger,
  LogData,
  ValidationMode,
  ValidationIssueCode,
  ValidationIssue,
  Store,
} from "./types.js";

// Re-export utilities
export {
  ID_FIELD,
  DB_ID_FIELD,
  isExperimentId,
  parseExperimentId,
  stripIdentifier,
  toDatabaseDoc,
  fromDatabaseDoc,
  toDatabaseField,
} from "./identifiers.js";
export {
  IDENTIFIER_FIELDS,
  TIMESTAMP_FIELDS,
  FINAL_STATUSES,
  toUtcDate,
  validateExperimentDoc,
  assertFinalStatus,
} from "./validation.js";
export { matches, sortDocuments, paginate, getPath, compareValues } from "./query.js";
export { EXPERIMENT_INDEXES, IndexManager, missingIndexes, sameKeySpec } from "./indexes.js";
export type { IndexState } from "./indexes.js";

// Re-export schema components
export { EXPERIMENT_SCHEMA, EXPERIMENT_UPDATE_SCHEMA, EXPERIMENT_STATUSES } from "./schema/experiment.js";
export { ExperimentSchemaValidator } from "./schema/validator.js";
export type { SchemaCheck } from "./schema/validator.js";

// Re-export errors
export {
  RunStoreError,
  ValidationError,
  InvalidIdentifierError,
  NotFoundError,
  InvalidArgumentError,
  PartialDeletionError,
} from "./errors.js";

// Re-export observability
export { Logger, logger, resolveLogLevel } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { OperationMetrics, IndexEnsureMetrics } from "./observability/metrics.js";

// Backends
export { MemoryExperimentCollection, indexName } from "./backends/memory.js";
export { MongoExperimentCollection, connectStore } from "./backends/mongo.js";
export type {
  MongoCollectionOptions,
  MongoCollectionHandle,
  MongoCursor,
  ConnectOptions,
} from "./backends/mongo.js";

export { openStore, DEFAULT_SORT } from "./store.js";
