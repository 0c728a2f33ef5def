/**
 * Main store implementation
 */

import type {
  ExperimentCollection,
  ExperimentDoc,
  ExperimentFields,
  ExperimentId,
  ExperimentInput,
  Filter,
  IterDocsOptions,
  SortDirection,
  SortSpec,
  Store,
  StoreLogger,
  StoreOptions,
} from "./types.js";
import { IndexManager } from "./indexes.js";
import {
  fromDatabaseDoc,
  parseExperimentId,
  stripIdentifier,
  toDatabaseDoc,
  toDatabaseField,
} from "./identifiers.js";
import { assertFinalStatus, validateExperimentDoc } from "./validation.js";
import { InvalidArgumentError, NotFoundError, PartialDeletionError } from "./errors.js";
import { logger as defaultLogger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";

/**
 * Sort applied by iterDocs when none is given: most recent heartbeat first
 */
export const DEFAULT_SORT: SortSpec = [["heartbeat", -1]];

const NOT_DELETED = { $ne: true } as const;

/**
 * Experiment store over a collection port
 *
 * Identifiers and arguments are checked before anything reaches the
 * collection. Indexes are ensured lazily by the first operation that touches
 * the database.
 *
 * @example
 * ```typescript
 * const store = openStore({ collection: new MemoryExperimentCollection() });
 *
 * const id = await store.create('train-v1', { tags: ['baseline'] });
 * await store.setHeartbeat(id);
 * await store.setFinished(id, 'COMPLETED', { result: { accuracy: 0.91 } });
 *
 * for await (const doc of store.iterDocs({ filter: { status: 'COMPLETED' } })) {
 *   console.log(doc.id.toHexString(), doc.name);
 * }
 * ```
 */
class RunStore implements Store {
  #collection: ExperimentCollection;
  #indexes: IndexManager;
  #now: () => Date;
  #logger: StoreLogger;
  #closed = false;

  constructor(options: StoreOptions) {
    this.#collection = options.collection;
    this.#now = options.now ?? (() => new Date());
    this.#logger = options.logger ?? defaultLogger;
    this.#indexes = new IndexManager(options.collection, { logger: this.#logger });
  }

  get collection(): ExperimentCollection {
    return this.#collection;
  }

  /**
   * Time an operation into the metrics collector
   */
  async #run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const startTime = performance.now();
    let success = false;
    try {
      const result = await fn();
      success = true;
      return result;
    } finally {
      const duration = performance.now() - startTime;
      metrics.recordOperation(operation, duration, success);
      this.#logger.debug(`store.${operation}`, {
        details: { durationMs: duration.toFixed(2), ok: success },
      });
    }
  }

  async ensureIndexes(): Promise<void> {
    await this.#run("ensureIndexes", () => this.#indexes.ensure());
  }

  async get(id: ExperimentId | string): Promise<ExperimentDoc | null> {
    return this.#run("get", async () => {
      const _id = parseExperimentId(id);
      await this.#indexes.ensure();
      const doc = await this.#collection.findOne({ _id, deleted: NOT_DELETED });
      return fromDatabaseDoc(doc);
    });
  }

  async create(name: string, fields: ExperimentInput = {}): Promise<ExperimentId> {
    return this.#run("create", async () => {
      const candidate: ExperimentInput = { ...stripIdentifier(fields), name };
      candidate.start_time ??= this.#now();
      candidate.heartbeat ??= candidate.start_time;
      candidate.status ??= "RUNNING";

      const doc = validateExperimentDoc(candidate, "full");
      await this.#indexes.ensure();
      const id = await this.#collection.insertOne(doc);

      this.#logger.info("experiment.create", {
        details: { id: id.toHexString(), name },
      });
      return id;
    });
  }

  async update(id: ExperimentId | string, fields: ExperimentInput): Promise<void> {
    await this.#run("update", async () => {
      const _id = parseExperimentId(id);
      rejectStatusField(fields, "update");
      const doc = validateExperimentDoc(stripIdentifier(fields), "partial");
      await this.#updateExisting(_id, doc, "experiment.update");
    });
  }

  async setHeartbeat(id: ExperimentId | string, fields: ExperimentInput = {}): Promise<void> {
    await this.#run("setHeartbeat", async () => {
      const _id = parseExperimentId(id);
      rejectStatusField(fields, "setHeartbeat");
      const doc = validateExperimentDoc(
        { ...stripIdentifier(fields), heartbeat: this.#now() },
        "partial"
      );
      await this.#updateExisting(_id, doc);
    });
  }

  async setFinished(
    id: ExperimentId | string,
    status: string,
    fields: ExperimentInput = {}
  ): Promise<void> {
    await this.#run("setFinished", async () => {
      const _id = parseExperimentId(id);
      const finalStatus = assertFinalStatus(status);
      const now = this.#now();
      const doc = validateExperimentDoc(
        { ...stripIdentifier(fields), status: finalStatus, stop_time: now, heartbeat: now },
        "partial"
      );
      await this.#updateExisting(_id, doc, "experiment.finish");
    });
  }

  /**
   * Merge fields into a visible experiment
   * @throws {NotFoundError} If no non-deleted experiment has this id
   */
  async #updateExisting(_id: ExperimentId, doc: ExperimentFields, event?: string): Promise<void> {
    const fieldNames = Object.keys(doc);
    if (fieldNames.length === 0) {
      return;
    }

    await this.#indexes.ensure();
    const { matchedCount } = await this.#collection.updateOne(
      { _id, deleted: NOT_DELETED },
      doc
    );
    if (matchedCount === 0) {
      throw new NotFoundError(_id);
    }

    if (event) {
      this.#logger.info(event, {
        details: { id: _id.toHexString(), fields: fieldNames },
      });
    }
  }

  /**
   * Soft-delete an experiment and its descendants, depth-first
   *
   * Each node is flagged before its children are looked up, so a child that
   * is already deleted is still walked. A node that does not exist ends its
   * branch.
   *
   * @throws {PartialDeletionError} If the walk fails after marking at least one node
   */
  async markDelete(id: ExperimentId | string): Promise<ExperimentId[]> {
    return this.#run("markDelete", async () => {
      const root = parseExperimentId(id);
      await this.#indexes.ensure();

      const marked: ExperimentId[] = [];
      const stack: ExperimentId[] = [root];
      let inFlight: ExperimentId | null = null;

      try {
        for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
          inFlight = current;
          const { matchedCount } = await this.#collection.updateOne(
            { _id: current },
            { deleted: true }
          );
          if (matchedCount === 0) {
            inFlight = null;
            continue;
          }
          marked.push(current);
          inFlight = null;

          const children: ExperimentId[] = [];
          for await (const child of this.#collection.find({ parent_id: current })) {
            children.push(child._id);
          }
          // First child on top of the stack
          stack.push(...children.reverse());
        }
      } catch (err) {
        // Nothing marked yet: the failure is the caller's to handle as is
        if (marked.length === 0) {
          throw err;
        }
        const pending = [...(inFlight ? [inFlight] : []), ...[...stack].reverse()];
        this.#logger.error("experiment.mark_delete.failed", {
          message: err instanceof Error ? err.message : String(err),
          details: { id: root.toHexString(), marked: marked.length, pending: pending.length },
        });
        throw new PartialDeletionError(root, marked, pending, { cause: err });
      }

      this.#logger.info("experiment.mark_delete", {
        details: { id: root.toHexString(), marked: marked.length },
      });
      return marked;
    });
  }

  /**
   * Physically remove experiments, deleted-flag or not
   *
   * All deletes run concurrently and are awaited before reporting. A single
   * failure is rethrown as is; several are wrapped in an AggregateError.
   */
  async completeDeletion(ids: Iterable<ExperimentId | string>): Promise<number> {
    return this.#run("completeDeletion", async () => {
      const unique = new Map<string, ExperimentId>();
      for (const value of ids) {
        const _id = parseExperimentId(value);
        unique.set(_id.toHexString(), _id);
      }
      if (unique.size === 0) {
        return 0;
      }

      await this.#indexes.ensure();
      const results = await Promise.allSettled(
        [...unique.values()].map((_id) => this.#collection.deleteOne({ _id }))
      );

      let removed = 0;
      const failures: unknown[] = [];
      for (const result of results) {
        if (result.status === "fulfilled") {
          removed += result.value;
        } else {
          failures.push(result.reason);
        }
      }

      this.#logger.info("experiment.complete_deletion", {
        details: { requested: unique.size, removed, failed: failures.length },
      });

      if (failures.length === 1) {
        throw failures[0];
      }
      if (failures.length > 1) {
        throw new AggregateError(failures, `${failures.length} of ${unique.size} deletions failed`);
      }
      return removed;
    });
  }

  /**
   * Lazily iterate experiments
   *
   * Arguments are checked when iteration starts.
   *
   * @throws {ValidationError} If the filter holds a malformed id or timestamp
   * @throws {InvalidArgumentError} If skip or limit is not an integer
   */
  async *iterDocs(options: IterDocsOptions = {}): AsyncGenerator<ExperimentDoc, void, undefined> {
    const skip = checkCount("skip", options.skip);
    const limit = checkCount("limit", options.limit);
    const shaped = validateExperimentDoc(options.filter ?? {}, "filter");
    const query = excludeDeleted(toDatabaseDoc(shaped), options.includeDeleted ?? false);
    const sort = (options.sortBy ?? DEFAULT_SORT).map(
      ([field, direction]): [string, SortDirection] => [toDatabaseField(field), direction]
    );

    await this.#indexes.ensure();
    for await (const doc of this.#collection.find(query, { sort, skip, limit })) {
      yield fromDatabaseDoc(doc);
    }
  }

  async fetchDocs(options: IterDocsOptions = {}): Promise<ExperimentDoc[]> {
    return this.#run("fetchDocs", async () => {
      const docs: ExperimentDoc[] = [];
      for await (const doc of this.iterDocs(options)) {
        docs.push(doc);
      }
      return docs;
    });
  }

  async close(): Promise<void> {
    if (this.#closed) {
      return;
    }
    this.#closed = true;
    await this.#collection.close();
  }
}

/**
 * Terminal statuses are set through setFinished only; RUNNING passes through
 */
function rejectStatusField(fields: ExperimentInput, operation: string): void {
  if (fields.status !== undefined && fields.status !== "RUNNING") {
    throw new InvalidArgumentError(
      `${operation} cannot change status; use setFinished with COMPLETED or FAILED`
    );
  }
}

/**
 * Validate skip/limit; zero and negative counts mean "not applied"
 */
function checkCount(name: string, value: number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError(`${name} must be an integer, got ${value}`);
  }
  return value > 0 ? value : undefined;
}

function excludeDeleted(query: Filter, includeDeleted: boolean): Filter {
  if (includeDeleted) {
    return query;
  }
  if ("deleted" in query) {
    return { $and: [query, { deleted: NOT_DELETED }] };
  }
  return { ...query, deleted: NOT_DELETED };
}

/**
 * Open an experiment store
 *
 * @param options - Store configuration options
 * @param options.collection - Backend collection (required)
 * @param options.now - Clock for default and forced timestamps (default: system clock)
 * @param options.logger - Logger for store events (default: shared logger)
 * @returns Store instance ready for operations
 */
export function openStore(options: StoreOptions): Store {
  return new RunStore(options);
}
