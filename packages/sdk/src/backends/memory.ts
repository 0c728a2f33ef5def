/**
 * In-process experiment collection
 *
 * Keeps documents in insertion order and evaluates filters, sorts and
 * pagination with the Mango engine in query.ts. Values are copied on the way
 * in and out, so callers never share state with the stored documents.
 */

import { ObjectId } from "mongodb";
import { matches, paginate, sortDocuments } from "../query.js";
import type {
  ExperimentCollection,
  ExperimentFields,
  ExperimentId,
  Filter,
  FindOptions,
  IndexInfo,
  IndexKeySpec,
  StoredExperiment,
  UpdateOutcome,
} from "../types.js";

const PRIMARY_INDEX: IndexInfo = { name: "_id_", key: [["_id", 1]] };

function cloneValue(value: unknown): unknown {
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  // ObjectId instances are never mutated
  if (value instanceof ObjectId) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (value !== null && typeof value === "object") {
    const copy: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      copy[key] = cloneValue(item);
    }
    return copy;
  }
  return value;
}

function cloneFields(doc: ExperimentFields): ExperimentFields {
  const copy: ExperimentFields = {};
  for (const [key, value] of Object.entries(doc)) {
    if (value !== undefined) {
      copy[key] = cloneValue(value);
    }
  }
  return copy;
}

function cloneStored(doc: StoredExperiment): StoredExperiment {
  return { ...cloneFields(doc), _id: doc._id, name: doc.name };
}

/**
 * Database-style index name: field_direction pairs joined by underscores
 */
export function indexName(spec: IndexKeySpec): string {
  return spec.map(([field, direction]) => `${field}_${direction}`).join("_");
}

export class MemoryExperimentCollection implements ExperimentCollection {
  #docs: StoredExperiment[] = [];
  #indexes: IndexInfo[] = [PRIMARY_INDEX];
  #createIndexCalls: IndexKeySpec[][] = [];
  #closed = false;

  /**
   * Specs passed to each createIndexes call, in call order
   */
  get createIndexCalls(): IndexKeySpec[][] {
    return this.#createIndexCalls.map((call) => call.map((spec) => [...spec]));
  }

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Number of stored documents, deleted or not
   */
  get size(): number {
    return this.#docs.length;
  }

  async listIndexes(): Promise<IndexInfo[]> {
    return this.#indexes.map((info) => ({ name: info.name, key: [...info.key] }));
  }

  async createIndexes(specs: IndexKeySpec[]): Promise<string[]> {
    this.#createIndexCalls.push(specs.map((spec) => [...spec]));
    return specs.map((spec) => {
      const name = indexName(spec);
      if (!this.#indexes.some((info) => info.name === name)) {
        this.#indexes.push({ name, key: [...spec] });
      }
      return name;
    });
  }

  async findOne(filter: Filter): Promise<StoredExperiment | null> {
    const doc = this.#docs.find((candidate) => matches(candidate, filter));
    return doc ? cloneStored(doc) : null;
  }

  async *find(filter: Filter, options: FindOptions = {}): AsyncGenerator<StoredExperiment> {
    const results = this.#docs.filter((doc) => matches(doc, filter));
    sortDocuments(results, options.sort);
    for (const doc of paginate(results, options.skip, options.limit)) {
      yield cloneStored(doc);
    }
  }

  async insertOne(doc: ExperimentFields): Promise<ExperimentId> {
    const name = doc.name;
    if (typeof name !== "string") {
      throw new TypeError("Experiment document requires a name");
    }
    const _id = doc._id instanceof ObjectId ? doc._id : new ObjectId();
    if (this.#docs.some((existing) => existing._id.equals(_id))) {
      throw new Error(`Duplicate key: _id ${_id.toHexString()}`);
    }
    this.#docs.push({ ...cloneFields(doc), _id, name });
    return _id;
  }

  /**
   * Top-level `$set`. Every match counts as modified.
   */
  async updateOne(filter: Filter, fields: ExperimentFields): Promise<UpdateOutcome> {
    const index = this.#docs.findIndex((doc) => matches(doc, filter));
    const current = this.#docs[index];
    if (current === undefined) {
      return { matchedCount: 0, modifiedCount: 0 };
    }
    this.#docs[index] = {
      ...current,
      ...cloneFields(fields),
      _id: current._id,
      name: typeof fields.name === "string" ? fields.name : current.name,
    };
    return { matchedCount: 1, modifiedCount: 1 };
  }

  async deleteOne(filter: Filter): Promise<number> {
    const index = this.#docs.findIndex((doc) => matches(doc, filter));
    if (index === -1) {
      return 0;
    }
    this.#docs.splice(index, 1);
    return 1;
  }

  async close(): Promise<void> {
    this.#closed = true;
  }
}
