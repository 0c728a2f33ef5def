/**
 * Index manager for the experiment collection
 *
 * Invariants:
 * - Required indexes are declared as exact key specifications
 * - An index counts as present only if its key specification matches exactly
 *   (same fields, same order, same directions)
 * - Missing indexes are created in a single bulk call
 * - The ensured state moves "pending" → "ensured" once per manager and is never reset
 *
 * Not safe across store instances sharing a collection: two managers may both
 * see an index as missing. Index creation is idempotent on the database side.
 */

import type { ExperimentCollection, IndexInfo, IndexKeySpec, StoreLogger } from "./types.js";
import { logger as defaultLogger } from "./observability/logs.js";
import { metrics } from "./observability/metrics.js";

/**
 * Secondary indexes every experiment collection carries
 */
export const EXPERIMENT_INDEXES: readonly IndexKeySpec[] = [
  [["parent_id", 1]],
  [["name", 1]],
  [["tags", 1]],
  [["status", 1]],
  [["fingerprint", 1]],
  [["args", 1]],
  [["deleted", 1]],
  [["start_time", -1]],
  [["stop_time", -1]],
  [["heartbeat", -1]],
];

/**
 * Lifecycle of the ensured state
 */
export type IndexState = "pending" | "ensured";

/**
 * Compare two key specifications for exact structural equality
 */
export function sameKeySpec(a: IndexKeySpec, b: IndexKeySpec): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every(([field, direction], i) => {
    const other = b[i];
    return other !== undefined && other[0] === field && other[1] === direction;
  });
}

/**
 * Compute required key specifications not present among existing indexes
 * @param existing - Index metadata reported by the collection
 * @param required - Key specifications that must exist
 * @returns Missing key specifications, in declaration order
 */
export function missingIndexes(
  existing: readonly IndexInfo[],
  required: readonly IndexKeySpec[]
): IndexKeySpec[] {
  return required.filter((spec) => !existing.some((info) => sameKeySpec(info.key, spec)));
}

/**
 * Ensures the experiment indexes exist on a collection, at most once
 */
export class IndexManager {
  #collection: ExperimentCollection;
  #required: readonly IndexKeySpec[];
  #logger: StoreLogger;
  #state: IndexState = "pending";

  constructor(
    collection: ExperimentCollection,
    options: { required?: readonly IndexKeySpec[]; logger?: StoreLogger } = {}
  ) {
    this.#collection = collection;
    this.#required = options.required ?? EXPERIMENT_INDEXES;
    this.#logger = options.logger ?? defaultLogger;
  }

  get state(): IndexState {
    return this.#state;
  }

  /**
   * Create any missing indexes. No-op once ensured.
   *
   * Concurrent first calls may both run; the state is not locked.
   * Failures propagate and leave the state pending.
   */
  async ensure(): Promise<void> {
    if (this.#state === "ensured") {
      return;
    }

    const startTime = performance.now();
    this.#logger.info("index.ensure.start", {
      details: { required: this.#required.length },
    });

    const existing = await this.#collection.listIndexes();
    const missing = missingIndexes(existing, this.#required);
    if (missing.length > 0) {
      await this.#collection.createIndexes(missing);
    }

    this.#state = "ensured";

    const duration = performance.now() - startTime;
    metrics.recordIndexEnsure(duration, missing.length);
    this.#logger.info("index.ensure.end", {
      details: { durationMs: duration.toFixed(2), created: missing.length },
    });
  }
}
