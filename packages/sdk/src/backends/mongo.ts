/**
 * MongoDB-backed experiment collection
 */

import { MongoClient, MongoServerError, ObjectId } from "mongodb";
import type { Document, IndexDescription, MongoClientOptions } from "mongodb";
import { openStore } from "../store.js";
import type {
  ExperimentCollection,
  ExperimentFields,
  ExperimentId,
  Filter,
  FindOptions,
  IndexInfo,
  IndexKeySpec,
  SortDirection,
  Store,
  StoreLogger,
  StoredExperiment,
  UpdateOutcome,
} from "../types.js";

function isStoredExperiment(doc: Document): doc is StoredExperiment {
  return doc._id instanceof ObjectId && typeof doc.name === "string";
}

function toStoredExperiment(doc: Document): StoredExperiment {
  if (!isStoredExperiment(doc)) {
    throw new TypeError(`Malformed experiment document: ${String(doc._id)}`);
  }
  return doc;
}

function isSortDirection(value: unknown): value is SortDirection {
  return value === 1 || value === -1;
}

/**
 * Convert raw index metadata to IndexInfo.
 * Indexes with non-directional keys (text, hashed, geo) are skipped.
 */
function toIndexInfo(raw: Document): IndexInfo[] {
  const name: unknown = raw.name;
  const key: unknown = raw.key;
  if (typeof name !== "string" || key === null || typeof key !== "object") {
    return [];
  }
  const spec: IndexKeySpec = [];
  for (const [field, direction] of Object.entries(key)) {
    if (!isSortDirection(direction)) {
      return [];
    }
    spec.push([field, direction]);
  }
  return [{ name, key: spec }];
}

function isNamespaceNotFound(err: unknown): boolean {
  return err instanceof MongoServerError && err.code === 26; // NamespaceNotFound (not exported by the driver)
}

/**
 * Cursor operations the adapter uses
 */
export interface MongoCursor extends AsyncIterable<Document> {
  sort(sort: Map<string, SortDirection>): MongoCursor;
  skip(value: number): MongoCursor;
  limit(value: number): MongoCursor;
}

/**
 * Collection operations the adapter uses; a driver `Collection` satisfies it
 */
export interface MongoCollectionHandle {
  listIndexes(): { toArray(): Promise<Document[]> };
  createIndexes(indexes: IndexDescription[]): Promise<string[]>;
  findOne(filter: Document): Promise<Document | null>;
  find(filter: Document): MongoCursor;
  insertOne(doc: Document): Promise<unknown>;
  updateOne(
    filter: Document,
    update: Document
  ): Promise<{ matchedCount: number; modifiedCount: number }>;
  deleteOne(filter: Document): Promise<{ deletedCount: number }>;
}

export interface MongoCollectionOptions {
  /** Client closed together with the collection; omit when the caller owns it */
  client?: MongoClient;
}

export class MongoExperimentCollection implements ExperimentCollection {
  #collection: MongoCollectionHandle;
  #client: MongoClient | null;

  constructor(collection: MongoCollectionHandle, options: MongoCollectionOptions = {}) {
    this.#collection = collection;
    this.#client = options.client ?? null;
  }

  /**
   * List directional indexes; a collection that does not exist yet has none
   */
  async listIndexes(): Promise<IndexInfo[]> {
    let raw: Document[];
    try {
      raw = await this.#collection.listIndexes().toArray();
    } catch (err) {
      if (isNamespaceNotFound(err)) {
        return [];
      }
      throw err;
    }
    return raw.flatMap(toIndexInfo);
  }

  async createIndexes(specs: IndexKeySpec[]): Promise<string[]> {
    return this.#collection.createIndexes(specs.map((spec) => ({ key: new Map(spec) })));
  }

  async findOne(filter: Filter): Promise<StoredExperiment | null> {
    const query: Document = filter;
    const doc = await this.#collection.findOne(query);
    return doc === null ? null : toStoredExperiment(doc);
  }

  async *find(filter: Filter, options: FindOptions = {}): AsyncGenerator<StoredExperiment> {
    const query: Document = filter;
    let cursor = this.#collection.find(query);
    if (options.sort && options.sort.length > 0) {
      cursor = cursor.sort(new Map(options.sort));
    }
    if (options.skip !== undefined && options.skip > 0) {
      cursor = cursor.skip(options.skip);
    }
    if (options.limit !== undefined && options.limit > 0) {
      cursor = cursor.limit(options.limit);
    }
    for await (const doc of cursor) {
      yield toStoredExperiment(doc);
    }
  }

  async insertOne(doc: ExperimentFields): Promise<ExperimentId> {
    const _id = doc._id instanceof ObjectId ? doc._id : new ObjectId();
    await this.#collection.insertOne({ ...doc, _id });
    return _id;
  }

  async updateOne(filter: Filter, fields: ExperimentFields): Promise<UpdateOutcome> {
    const query: Document = filter;
    const update: Document = { $set: fields };
    const result = await this.#collection.updateOne(query, update);
    return { matchedCount: result.matchedCount, modifiedCount: result.modifiedCount };
  }

  async deleteOne(filter: Filter): Promise<number> {
    const query: Document = filter;
    const result = await this.#collection.deleteOne(query);
    return result.deletedCount;
  }

  async close(): Promise<void> {
    const client = this.#client;
    this.#client = null;
    if (client) {
      await client.close();
    }
  }
}

export interface ConnectOptions {
  /** MongoDB connection string */
  uri: string;
  /** Database name */
  database: string;
  /** Collection holding the experiment documents */
  collection: string;
  now?: () => Date;
  logger?: StoreLogger;
  clientOptions?: MongoClientOptions;
}

/**
 * Connect to MongoDB and open a store that owns the client
 *
 * @example
 * ```typescript
 * const store = await connectStore({
 *   uri: 'mongodb://127.0.0.1:27017',
 *   database: 'runstore',
 *   collection: 'experiments',
 * });
 * const id = await store.create('train-v1', { tags: ['baseline'] });
 * await store.close();
 * ```
 */
export async function connectStore(options: ConnectOptions): Promise<Store> {
  const client = new MongoClient(options.uri, options.clientOptions);
  await client.connect();
  const collection = new MongoExperimentCollection(
    client.db(options.database).collection(options.collection),
    { client }
  );
  return openStore({ collection, now: options.now, logger: options.logger });
}
