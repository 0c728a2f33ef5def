import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ObjectId } from "mongodb";
import { openStore } from "./store.js";
import { MemoryExperimentCollection } from "./backends/memory.js";
import { Logger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";
import {
  InvalidArgumentError,
  InvalidIdentifierError,
  NotFoundError,
  PartialDeletionError,
  ValidationError,
} from "./errors.js";
import { EXPERIMENT_INDEXES } from "./indexes.js";
import type { Store } from "./types.js";

const T0 = new Date("2024-05-01T12:00:00.000Z");
const MISSING = "64b0000000000000000000ff";

describe("Store CRUD operations", () => {
  let collection: MemoryExperimentCollection;
  let store: Store;
  let now: Date;

  beforeEach(() => {
    now = T0;
    collection = new MemoryExperimentCollection();
    const logger = new Logger();
    logger.setEnabled(false);
    store = openStore({ collection, now: () => now, logger });
  });

  afterEach(async () => {
    await store.close();
  });

  const advance = (ms: number) => {
    now = new Date(now.getTime() + ms);
  };

  describe("create()", () => {
    it("should store a new experiment with defaults", async () => {
      const id = await store.create("train-v1");

      const doc = await store.get(id);
      expect(doc).toEqual({
        id,
        name: "train-v1",
        start_time: T0,
        heartbeat: T0,
        status: "RUNNING",
      });
      expect(doc && "deleted" in doc).toBe(false);
    });

    it("should default the heartbeat to a given start time", async () => {
      const id = await store.create("train", { start_time: "2024-04-30T08:00:00Z" });

      const doc = await store.get(id);
      expect(doc?.start_time).toEqual(new Date("2024-04-30T08:00:00Z"));
      expect(doc?.heartbeat).toEqual(doc?.start_time);
    });

    it("should ignore caller identifiers", async () => {
      const id = await store.create("train", { id: MISSING, _id: MISSING, tags: ["a"] });

      expect(id.toHexString()).not.toBe(MISSING);
      expect(await store.get(MISSING)).toBeNull();
      expect((await store.get(id))?.tags).toEqual(["a"]);
    });

    it("should allow duplicate names", async () => {
      const first = await store.create("sweep");
      const second = await store.create("sweep");

      expect(first.equals(second)).toBe(false);
      expect(collection.size).toBe(2);
    });

    it("should store a parent given as a hex string", async () => {
      const parent = await store.create("parent");
      const child = await store.create("child", { parent_id: parent.toHexString() });

      const doc = await store.get(child);
      expect(doc?.parent_id).toEqual(parent);
    });

    it("should reject an invalid document without writing", async () => {
      await expect(store.create("", { tags: ["a"] })).rejects.toThrow(ValidationError);
      expect(collection.size).toBe(0);
      expect(collection.createIndexCalls).toHaveLength(0);
    });

    it("should ensure indexes before the first insert", async () => {
      await store.create("train");
      await store.create("train");

      expect(collection.createIndexCalls).toEqual([EXPERIMENT_INDEXES]);
    });
  });

  describe("get()", () => {
    it("should reject a malformed id before touching the database", async () => {
      const findSpy = vi.spyOn(collection, "findOne");

      await expect(store.get("not-an-id")).rejects.toThrow(InvalidIdentifierError);
      expect(findSpy).not.toHaveBeenCalled();
      expect(collection.createIndexCalls).toHaveLength(0);
    });

    it("should return null for an unknown id", async () => {
      expect(await store.get(MISSING)).toBeNull();
    });

    it("should return null for a soft-deleted experiment", async () => {
      const id = await store.create("train");
      await store.markDelete(id);

      expect(await store.get(id)).toBeNull();
    });

    it("should return copies", async () => {
      const id = await store.create("train", { tags: ["a"] });

      const first = await store.get(id);
      first?.tags?.push("b");

      expect((await store.get(id))?.tags).toEqual(["a"]);
    });
  });

  describe("update()", () => {
    it("should merge fields", async () => {
      const id = await store.create("train", { description: "first", tags: ["a"] });

      await store.update(id, { description: "second", config: { lr: 0.1 } });

      const doc = await store.get(id);
      expect(doc?.description).toBe("second");
      expect(doc?.tags).toEqual(["a"]);
      expect(doc?.config).toEqual({ lr: 0.1 });
    });

    it("should throw NotFoundError for an unknown id", async () => {
      await expect(store.update(MISSING, { description: "x" })).rejects.toThrow(
        `Experiment not found: ${MISSING}`
      );
    });

    it("should throw NotFoundError for a soft-deleted experiment", async () => {
      const id = await store.create("train");
      await store.markDelete(id);

      await expect(store.update(id, { description: "x" })).rejects.toThrow(NotFoundError);
    });

    it("should treat an empty payload as a no-op", async () => {
      const updateSpy = vi.spyOn(collection, "updateOne");

      await store.update(MISSING, { id: MISSING });

      expect(updateSpy).not.toHaveBeenCalled();
    });

    it("should refuse to change the status", async () => {
      const id = await store.create("train");

      await expect(store.update(id, { status: "COMPLETED" })).rejects.toThrow(InvalidArgumentError);
      expect((await store.get(id))?.status).toBe("RUNNING");
    });

    it("should let a RUNNING status through", async () => {
      const id = await store.create("train");

      await store.update(id, { status: "RUNNING", description: "resumed" });

      const doc = await store.get(id);
      expect(doc?.status).toBe("RUNNING");
      expect(doc?.description).toBe("resumed");
    });

    it("should reject invalid fields", async () => {
      const id = await store.create("train");

      await expect(store.update(id, { storage_size: -5 })).rejects.toThrow(ValidationError);
    });
  });

  describe("setHeartbeat()", () => {
    it("should move the heartbeat to now", async () => {
      const id = await store.create("train");
      advance(30_000);

      await store.setHeartbeat(id, { storage_size: 1024 });

      const doc = await store.get(id);
      expect(doc?.heartbeat).toEqual(new Date("2024-05-01T12:00:30.000Z"));
      expect(doc?.start_time).toEqual(T0);
      expect(doc?.storage_size).toBe(1024);
    });

    it("should override a caller heartbeat", async () => {
      const id = await store.create("train");
      advance(1_000);

      await store.setHeartbeat(id, { heartbeat: "2000-01-01T00:00:00Z" });

      expect((await store.get(id))?.heartbeat).toEqual(now);
    });

    it("should throw NotFoundError for an unknown id", async () => {
      await expect(store.setHeartbeat(MISSING)).rejects.toThrow(NotFoundError);
    });

    it("should accept RUNNING but refuse a terminal status", async () => {
      const id = await store.create("train");

      await store.setHeartbeat(id, { status: "RUNNING" });
      await expect(store.setHeartbeat(id, { status: "FAILED" })).rejects.toThrow(
        InvalidArgumentError
      );
      expect((await store.get(id))?.status).toBe("RUNNING");
    });
  });

  describe("setFinished()", () => {
    it("should set the status and stop time", async () => {
      const id = await store.create("train");
      advance(60_000);

      await store.setFinished(id, "COMPLETED", { result: { accuracy: 0.9 } });

      const doc = await store.get(id);
      const end = new Date("2024-05-01T12:01:00.000Z");
      expect(doc?.status).toBe("COMPLETED");
      expect(doc?.stop_time).toEqual(end);
      expect(doc?.heartbeat).toEqual(end);
      expect(doc?.result).toEqual({ accuracy: 0.9 });
    });

    it("should record the failure detail", async () => {
      const id = await store.create("train");

      await store.setFinished(id, "FAILED", { error: { message: "OOM" }, exit_code: 137 });

      const doc = await store.get(id);
      expect(doc?.status).toBe("FAILED");
      expect(doc?.error).toEqual({ message: "OOM" });
      expect(doc?.exit_code).toBe(137);
    });

    it("should reject a non-terminal status before touching the database", async () => {
      const updateSpy = vi.spyOn(collection, "updateOne");

      await expect(store.setFinished(MISSING, "RUNNING")).rejects.toThrow(InvalidArgumentError);
      await expect(store.setFinished(MISSING, "completed")).rejects.toThrow(InvalidArgumentError);
      expect(updateSpy).not.toHaveBeenCalled();
    });

    it("should throw NotFoundError for an unknown id", async () => {
      await expect(store.setFinished(MISSING, "COMPLETED")).rejects.toThrow(NotFoundError);
    });
  });

  describe("close()", () => {
    it("should close the collection once", async () => {
      const closeSpy = vi.spyOn(collection, "close");

      await store.close();
      await store.close();

      expect(closeSpy).toHaveBeenCalledTimes(1);
      expect(collection.closed).toBe(true);
    });
  });

  describe("metrics", () => {
    it("should record each operation", async () => {
      metrics.reset();

      const id = await store.create("train");
      await expect(store.update(MISSING, { description: "x" })).rejects.toThrow(NotFoundError);
      await store.get(id);

      expect(metrics.getMetrics("create")?.successCount).toBe(1);
      expect(metrics.getMetrics("update")?.failureCount).toBe(1);
      expect(metrics.getMetrics("get")?.durationMs).toHaveLength(1);
    });
  });
});

describe("Cascading delete", () => {
  let collection: MemoryExperimentCollection;
  let store: Store;

  beforeEach(() => {
    collection = new MemoryExperimentCollection();
    const logger = new Logger();
    logger.setEnabled(false);
    store = openStore({ collection, logger });
  });

  /**
   * root
   * ├── c1
   * │   └── g
   * └── c2
   */
  async function seedTree() {
    const root = await store.create("root");
    const c1 = await store.create("c1", { parent_id: root });
    const c2 = await store.create("c2", { parent_id: root });
    const g = await store.create("g", { parent_id: c1 });
    return { root, c1, c2, g };
  }

  describe("markDelete()", () => {
    it("should mark the subtree depth-first, root first", async () => {
      const { root, c1, c2, g } = await seedTree();

      const marked = await store.markDelete(root);

      expect(marked.map((id) => id.toHexString())).toEqual(
        [root, c1, g, c2].map((id) => id.toHexString())
      );
      for (const id of [root, c1, c2, g]) {
        expect(await store.get(id)).toBeNull();
      }
      expect(collection.size).toBe(4);
    });

    it("should only mark the subtree of an inner node", async () => {
      const { root, c1, c2, g } = await seedTree();

      const marked = await store.markDelete(c1.toHexString());

      expect(marked).toEqual([c1, g]);
      expect(await store.get(root)).not.toBeNull();
      expect(await store.get(c2)).not.toBeNull();
    });

    it("should return an empty list for an unknown root", async () => {
      expect(await store.markDelete(MISSING)).toEqual([]);
    });

    it("should re-walk an already deleted subtree", async () => {
      const { root, c1, c2, g } = await seedTree();
      await store.markDelete(c1);

      const marked = await store.markDelete(root);

      expect(marked).toEqual([root, c1, g, c2]);
    });

    it("should reject a malformed id", async () => {
      await expect(store.markDelete("xyz")).rejects.toThrow(InvalidIdentifierError);
    });

    it("should report progress when the walk fails", async () => {
      const { root, c1, c2, g } = await seedTree();
      const updateOne = collection.updateOne.bind(collection);
      vi.spyOn(collection, "updateOne").mockImplementation(async (filter, fields) => {
        if (filter._id instanceof ObjectId && filter._id.equals(g)) {
          throw new Error("connection reset");
        }
        return updateOne(filter, fields);
      });

      const failure = await store.markDelete(root).catch((err: unknown) => err);

      expect(failure).toBeInstanceOf(PartialDeletionError);
      if (!(failure instanceof PartialDeletionError)) return;
      expect(failure.marked).toEqual([root, c1]);
      expect(failure.pending).toEqual([g, c2]);
      expect(failure.cause).toBeInstanceOf(Error);
      expect(failure.message).toBe(
        `Deletion of ${root.toHexString()} stopped after marking 2 experiment(s)`
      );
      // Marks already applied stay in effect
      expect(await store.get(c1)).toBeNull();
      expect(await store.get(c2)).not.toBeNull();
    });

    it("should rethrow a failure on the root unchanged", async () => {
      const { root } = await seedTree();
      const reset = new Error("connection reset");
      vi.spyOn(collection, "updateOne").mockRejectedValue(reset);

      const failure = await store.markDelete(root).catch((err: unknown) => err);

      expect(failure).toBe(reset);
      expect(await store.get(root)).not.toBeNull();
    });
  });

  describe("completeDeletion()", () => {
    it("should remove documents and be idempotent", async () => {
      const { root } = await seedTree();
      const marked = await store.markDelete(root);

      expect(await store.completeDeletion(marked)).toBe(4);
      expect(await store.completeDeletion(marked)).toBe(0);
      expect(collection.size).toBe(0);
    });

    it("should remove documents that were never soft-deleted", async () => {
      const id = await store.create("train");

      expect(await store.completeDeletion([id])).toBe(1);
    });

    it("should count duplicates once", async () => {
      const id = await store.create("train");

      expect(await store.completeDeletion([id, id.toHexString()])).toBe(1);
    });

    it("should validate every id before deleting", async () => {
      const id = await store.create("train");
      const deleteSpy = vi.spyOn(collection, "deleteOne");

      await expect(store.completeDeletion([id, "bad"])).rejects.toThrow(InvalidIdentifierError);
      expect(deleteSpy).not.toHaveBeenCalled();
      expect(await store.get(id)).not.toBeNull();
    });

    it("should return zero for no ids", async () => {
      expect(await store.completeDeletion([])).toBe(0);
    });

    it("should finish the other deletes when one fails", async () => {
      const a = await store.create("a");
      const b = await store.create("b");
      const deleteOne = collection.deleteOne.bind(collection);
      vi.spyOn(collection, "deleteOne").mockImplementation(async (filter) => {
        if (filter._id instanceof ObjectId && filter._id.equals(a)) {
          throw new Error("write conflict");
        }
        return deleteOne(filter);
      });

      await expect(store.completeDeletion([a, b])).rejects.toThrow("write conflict");
      expect(collection.size).toBe(1);
    });

    it("should aggregate several failures", async () => {
      const a = await store.create("a");
      const b = await store.create("b");
      vi.spyOn(collection, "deleteOne").mockRejectedValue(new Error("write conflict"));

      const failure = await store.completeDeletion([a, b]).catch((err: unknown) => err);

      expect(failure).toBeInstanceOf(AggregateError);
      if (!(failure instanceof AggregateError)) return;
      expect(failure.errors).toHaveLength(2);
      expect(failure.message).toBe("2 of 2 deletions failed");
    });
  });
});

describe("Query operations", () => {
  let store: Store;
  let clock: number;

  beforeEach(() => {
    clock = T0.getTime();
    const logger = new Logger();
    logger.setEnabled(false);
    store = openStore({
      collection: new MemoryExperimentCollection(),
      // Each call is one second later than the previous one
      now: () => new Date((clock += 1_000)),
      logger,
    });
  });

  describe("iterDocs()", () => {
    it("should yield most recent heartbeat first by default", async () => {
      await store.create("a");
      await store.create("b");
      await store.create("c");

      const names: string[] = [];
      for await (const doc of store.iterDocs()) {
        names.push(doc.name);
      }
      expect(names).toEqual(["c", "b", "a"]);
    });

    it("should hide soft-deleted experiments unless asked", async () => {
      const a = await store.create("a");
      await store.create("b");
      await store.markDelete(a);

      expect((await store.fetchDocs()).map((d) => d.name)).toEqual(["b"]);
      const all = await store.fetchDocs({ includeDeleted: true, sortBy: [["name", 1]] });
      expect(all.map((d) => [d.name, d.deleted])).toEqual([
        ["a", true],
        ["b", undefined],
      ]);
    });

    it("should keep the deleted filter when the caller filters on deleted", async () => {
      const a = await store.create("a");
      await store.markDelete(a);

      expect(await store.fetchDocs({ filter: { deleted: true } })).toEqual([]);
      expect(
        (await store.fetchDocs({ filter: { deleted: true }, includeDeleted: true })).map(
          (d) => d.name
        )
      ).toEqual(["a"]);
    });

    it("should filter by caller id and hex strings", async () => {
      const a = await store.create("a");
      await store.create("b");

      const docs = await store.fetchDocs({ filter: { id: a.toHexString() } });

      expect(docs.map((d) => d.id)).toEqual([a]);
    });

    it("should filter children by parent", async () => {
      const parent = await store.create("parent");
      await store.create("c1", { parent_id: parent });
      await store.create("c2", { parent_id: parent });
      await store.create("other");

      const docs = await store.fetchDocs({
        filter: { parent_id: parent.toHexString() },
        sortBy: [["start_time", 1]],
      });

      expect(docs.map((d) => d.name)).toEqual(["c1", "c2"]);
    });

    it("should sort by id", async () => {
      const ids = [await store.create("a"), await store.create("b")];
      const expected = [...ids].sort((x, y) => x.toHexString().localeCompare(y.toHexString()));

      const docs = await store.fetchDocs({ sortBy: [["id", 1]] });

      expect(docs.map((d) => d.id)).toEqual(expected);
    });

    it("should apply skip and limit", async () => {
      for (const name of ["a", "b", "c", "d"]) {
        await store.create(name);
      }

      const docs = await store.fetchDocs({ sortBy: [["name", 1]], skip: 1, limit: 2 });

      expect(docs.map((d) => d.name)).toEqual(["b", "c"]);
    });

    it("should ignore zero skip and limit", async () => {
      await store.create("a");
      await store.create("b");

      expect(await store.fetchDocs({ skip: 0, limit: 0 })).toHaveLength(2);
    });

    it("should reject a fractional limit", async () => {
      await expect(store.fetchDocs({ limit: 1.5 })).rejects.toThrow(InvalidArgumentError);
    });

    it("should reject a malformed id in the filter", async () => {
      await expect(store.fetchDocs({ filter: { parent_id: "nope" } })).rejects.toThrow(
        ValidationError
      );
    });

    it("should stop early without reading the rest", async () => {
      for (const name of ["a", "b", "c"]) {
        await store.create(name);
      }

      const names: string[] = [];
      for await (const doc of store.iterDocs({ sortBy: [["name", 1]] })) {
        names.push(doc.name);
        if (names.length === 2) break;
      }

      expect(names).toEqual(["a", "b"]);
    });
  });

  describe("worked flow", () => {
    it("should cascade a parent delete to its fold", async () => {
      const e1 = await store.create("train-v1");
      const e2 = await store.create("train-v1-fold0", { parent_id: e1 });

      expect(await store.markDelete(e1)).toEqual([e1, e2]);
      expect(await store.get(e1)).toBeNull();
      expect(await store.get(e2)).toBeNull();

      const docs = await store.fetchDocs({ includeDeleted: true, sortBy: [["start_time", 1]] });
      expect(docs.map((d) => [d.name, d.deleted])).toEqual([
        ["train-v1", true],
        ["train-v1-fold0", true],
      ]);
    });
  });
});
