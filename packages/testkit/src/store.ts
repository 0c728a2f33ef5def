/**
 * In-memory store harness
 */

import { Logger, MemoryExperimentCollection, openStore } from "@runstore/sdk";
import type { ExperimentId, Store, StoreOptions } from "@runstore/sdk";

/**
 * Options for an in-memory store
 */
export interface MemoryStoreOptions extends Partial<Omit<StoreOptions, "collection">> {
  /** Collection to reuse, e.g. across several stores (default: a fresh one) */
  collection?: MemoryExperimentCollection;
}

/**
 * Open a store over an in-memory collection with logging silenced
 */
export function createMemoryStore(options: MemoryStoreOptions = {}): {
  store: Store;
  collection: MemoryExperimentCollection;
} {
  const collection = options.collection ?? new MemoryExperimentCollection();
  const logger = options.logger ?? silentLogger();
  return { store: openStore({ now: options.now, collection, logger }), collection };
}

function silentLogger(): Logger {
  const logger = new Logger();
  logger.setEnabled(false);
  return logger;
}

/**
 * Execute a function with an in-memory store, closing it after
 * @param fn - Function to execute with the store
 * @param options - Optional store options
 * @returns Result of fn
 */
export async function withMemoryStore<T>(
  fn: (store: Store, collection: MemoryExperimentCollection) => Promise<T>,
  options?: MemoryStoreOptions
): Promise<T> {
  const { store, collection } = createMemoryStore(options);

  let fnError: unknown;
  try {
    return await fn(store, collection);
  } catch (err) {
    fnError = err;
    throw err;
  } finally {
    let cleanupError: unknown;
    try {
      await store.close();
    } catch (err) {
      cleanupError = err;
    }
    if (!fnError && cleanupError) {
      // eslint-disable-next-line no-unsafe-finally
      throw cleanupError;
    }
  }
}

/**
 * Nested experiment names: each key becomes an experiment, its value its children
 */
export interface TreeSpec {
  [name: string]: TreeSpec;
}

/**
 * Create a tree of experiments, parents before children, siblings in key order
 * @returns Identifiers by experiment name
 *
 * @example
 * ```typescript
 * const ids = await seedTree(store, { root: { c1: { g: {} }, c2: {} } });
 * await store.markDelete(ids.root);
 * ```
 */
export async function seedTree(
  store: Store,
  tree: TreeSpec,
  parent?: ExperimentId
): Promise<Record<string, ExperimentId>> {
  const ids: Record<string, ExperimentId> = {};
  // Create siblings first so they keep key order in natural order
  const created: Array<[ExperimentId, TreeSpec]> = [];
  for (const [name, children] of Object.entries(tree)) {
    const id = await store.create(name, parent ? { parent_id: parent } : {});
    ids[name] = id;
    created.push([id, children]);
  }
  for (const [id, children] of created) {
    Object.assign(ids, await seedTree(store, children, id));
  }
  return ids;
}
