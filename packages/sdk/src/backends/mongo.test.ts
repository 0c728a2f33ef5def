import { describe, it, expect, vi } from "vitest";
import { MongoClient, MongoServerError, ObjectId } from "mongodb";
import type { Document, IndexDescription } from "mongodb";
import { MongoExperimentCollection } from "./mongo.js";
import type { MongoCollectionHandle, MongoCursor } from "./mongo.js";
import { EXPERIMENT_INDEXES } from "../indexes.js";
import { Logger } from "../observability/logs.js";
import { openStore } from "../store.js";
import type { SortDirection, StoredExperiment } from "../types.js";

class StubCursor implements MongoCursor {
  sorts: Array<Array<[string, SortDirection]>> = [];
  skips: number[] = [];
  limits: number[] = [];

  constructor(private readonly docs: Document[]) {}

  sort(sort: Map<string, SortDirection>): MongoCursor {
    this.sorts.push([...sort.entries()]);
    return this;
  }

  skip(value: number): MongoCursor {
    this.skips.push(value);
    return this;
  }

  limit(value: number): MongoCursor {
    this.limits.push(value);
    return this;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Document> {
    yield* this.docs;
  }
}

/**
 * Records what the adapter sends to the driver
 */
class StubCollection implements MongoCollectionHandle {
  indexes: Document[] = [];
  listError: Error | null = null;
  createIndexCalls: IndexDescription[][] = [];
  found: Document | null = null;
  cursor = new StubCursor([]);
  filters: Document[] = [];
  inserted: Document[] = [];
  updates: Array<{ filter: Document; update: Document }> = [];
  matchedCount = 1;

  listIndexes(): { toArray(): Promise<Document[]> } {
    return {
      toArray: async () => {
        if (this.listError) throw this.listError;
        return this.indexes;
      },
    };
  }

  async createIndexes(indexes: IndexDescription[]): Promise<string[]> {
    this.createIndexCalls.push(indexes);
    return indexes.map((_, i) => `index_${i}`);
  }

  async findOne(filter: Document): Promise<Document | null> {
    this.filters.push(filter);
    return this.found;
  }

  find(filter: Document): MongoCursor {
    this.filters.push(filter);
    return this.cursor;
  }

  async insertOne(doc: Document): Promise<unknown> {
    this.inserted.push(doc);
    return { acknowledged: true, insertedId: doc._id };
  }

  async updateOne(
    filter: Document,
    update: Document
  ): Promise<{ matchedCount: number; modifiedCount: number }> {
    this.updates.push({ filter, update });
    return { matchedCount: this.matchedCount, modifiedCount: this.matchedCount };
  }

  async deleteOne(filter: Document): Promise<{ deletedCount: number }> {
    this.filters.push(filter);
    return { deletedCount: 1 };
  }
}

function keyEntries(description: IndexDescription): unknown {
  return description.key instanceof Map ? [...description.key.entries()] : description.key;
}

function namespaceNotFound(): MongoServerError {
  return new MongoServerError({
    message: "ns does not exist: runstore.experiments",
    code: 26,
    codeName: "NamespaceNotFound",
  });
}

describe("MongoExperimentCollection", () => {
  describe("listIndexes()", () => {
    it("should convert directional indexes in key order", async () => {
      const stub = new StubCollection();
      stub.indexes = [
        { v: 2, key: { _id: 1 }, name: "_id_" },
        { v: 2, key: { start_time: -1, name: 1 }, name: "start_time_-1_name_1" },
        { v: 2, key: { _fts: "text", _ftsx: 1 }, name: "description_text" },
        { v: 2, key: { parent_id: "hashed" }, name: "parent_id_hashed" },
      ];

      const indexes = await new MongoExperimentCollection(stub).listIndexes();

      expect(indexes).toEqual([
        { name: "_id_", key: [["_id", 1]] },
        {
          name: "start_time_-1_name_1",
          key: [
            ["start_time", -1],
            ["name", 1],
          ],
        },
      ]);
    });

    it("should report no indexes for a collection that does not exist yet", async () => {
      const stub = new StubCollection();
      stub.listError = namespaceNotFound();

      expect(await new MongoExperimentCollection(stub).listIndexes()).toEqual([]);
    });

    it("should rethrow other server errors", async () => {
      const stub = new StubCollection();
      const unauthorized = new MongoServerError({ message: "not authorized", code: 13 });
      stub.listError = unauthorized;

      await expect(new MongoExperimentCollection(stub).listIndexes()).rejects.toBe(unauthorized);
    });

    it("should let the first create on a fresh database through", async () => {
      const stub = new StubCollection();
      stub.listError = namespaceNotFound();
      const logger = new Logger();
      logger.setEnabled(false);
      const store = openStore({ collection: new MongoExperimentCollection(stub), logger });

      const id = await store.create("train-v1");

      expect(stub.createIndexCalls).toHaveLength(1);
      expect(stub.createIndexCalls[0]).toHaveLength(EXPERIMENT_INDEXES.length);
      expect(stub.inserted).toHaveLength(1);
      expect(stub.inserted[0]?._id).toBe(id);
      expect(stub.inserted[0]?.name).toBe("train-v1");
    });
  });

  describe("createIndexes()", () => {
    it("should send each spec as an ordered key map", async () => {
      const stub = new StubCollection();

      const names = await new MongoExperimentCollection(stub).createIndexes([
        [["heartbeat", -1]],
        [
          ["name", 1],
          ["start_time", -1],
        ],
      ]);

      expect(names).toEqual(["index_0", "index_1"]);
      expect(stub.createIndexCalls[0]?.map(keyEntries)).toEqual([
        [["heartbeat", -1]],
        [
          ["name", 1],
          ["start_time", -1],
        ],
      ]);
    });
  });

  describe("find()", () => {
    it("should forward sort, skip and limit", async () => {
      const stub = new StubCollection();
      const doc = { _id: new ObjectId(), name: "train" };
      stub.cursor = new StubCursor([doc]);
      const collection = new MongoExperimentCollection(stub);

      const docs: StoredExperiment[] = [];
      for await (const found of collection.find(
        { status: "RUNNING" },
        {
          sort: [
            ["heartbeat", -1],
            ["name", 1],
          ],
          skip: 5,
          limit: 10,
        }
      )) {
        docs.push(found);
      }

      expect(docs).toEqual([doc]);
      expect(stub.filters).toEqual([{ status: "RUNNING" }]);
      expect(stub.cursor.sorts).toEqual([
        [
          ["heartbeat", -1],
          ["name", 1],
        ],
      ]);
      expect(stub.cursor.skips).toEqual([5]);
      expect(stub.cursor.limits).toEqual([10]);
    });

    it("should leave out empty sort and zero counts", async () => {
      const stub = new StubCollection();
      const collection = new MongoExperimentCollection(stub);

      for await (const found of collection.find({}, { sort: [], skip: 0, limit: 0 })) {
        expect(found).toBeUndefined();
      }

      expect(stub.cursor.sorts).toEqual([]);
      expect(stub.cursor.skips).toEqual([]);
      expect(stub.cursor.limits).toEqual([]);
    });

    it("should reject malformed documents", async () => {
      const stub = new StubCollection();
      stub.cursor = new StubCursor([{ _id: new ObjectId(), name: 5 }]);
      const collection = new MongoExperimentCollection(stub);

      const drain = async () => {
        for await (const found of collection.find({})) {
          expect(found).toBeUndefined();
        }
      };

      await expect(drain()).rejects.toThrow(TypeError);
    });
  });

  describe("findOne()", () => {
    it("should reject a document without an ObjectId", async () => {
      const stub = new StubCollection();
      stub.found = { _id: "abc", name: "train" };

      await expect(new MongoExperimentCollection(stub).findOne({})).rejects.toThrow(
        "Malformed experiment document: abc"
      );
    });

    it("should return null when nothing matches", async () => {
      expect(await new MongoExperimentCollection(new StubCollection()).findOne({})).toBeNull();
    });
  });

  describe("insertOne()", () => {
    it("should generate the id on the client", async () => {
      const stub = new StubCollection();

      const id = await new MongoExperimentCollection(stub).insertOne({ name: "train" });

      expect(id).toBeInstanceOf(ObjectId);
      expect(stub.inserted).toEqual([{ name: "train", _id: id }]);
    });

    it("should keep an id that is already set", async () => {
      const stub = new StubCollection();
      const _id = new ObjectId();

      expect(await new MongoExperimentCollection(stub).insertOne({ _id, name: "train" })).toBe(_id);
    });
  });

  describe("updateOne()", () => {
    it("should merge fields with $set", async () => {
      const stub = new StubCollection();
      const _id = new ObjectId();

      const outcome = await new MongoExperimentCollection(stub).updateOne(
        { _id },
        { description: "tuned" }
      );

      expect(outcome).toEqual({ matchedCount: 1, modifiedCount: 1 });
      expect(stub.updates).toEqual([{ filter: { _id }, update: { $set: { description: "tuned" } } }]);
    });

    it("should report zero matches", async () => {
      const stub = new StubCollection();
      stub.matchedCount = 0;

      const outcome = await new MongoExperimentCollection(stub).updateOne({}, { deleted: true });

      expect(outcome.matchedCount).toBe(0);
    });
  });

  describe("deleteOne()", () => {
    it("should return the deleted count", async () => {
      const stub = new StubCollection();
      const _id = new ObjectId();

      expect(await new MongoExperimentCollection(stub).deleteOne({ _id })).toBe(1);
      expect(stub.filters).toEqual([{ _id }]);
    });
  });

  describe("close()", () => {
    // Constructing a client and handles does not connect
    const client = new MongoClient("mongodb://127.0.0.1:27017");
    const handle = client.db("runstore_test").collection("experiments");

    it("should close an owned client once", async () => {
      const close = vi.spyOn(client, "close").mockResolvedValue(undefined);
      const collection = new MongoExperimentCollection(handle, { client });

      await collection.close();
      await collection.close();

      expect(close).toHaveBeenCalledTimes(1);
      close.mockRestore();
    });

    it("should leave a caller-owned client open", async () => {
      const close = vi.spyOn(client, "close").mockResolvedValue(undefined);
      const collection = new MongoExperimentCollection(handle);

      await collection.close();

      expect(close).not.toHaveBeenCalled();
      close.mockRestore();
    });
  });
});
