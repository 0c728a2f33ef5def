/**
 * Test helpers for runstore
 */

export { createManualClock, measure } from "./clock.js";
export type { ManualClock } from "./clock.js";
export { createMemoryStore, withMemoryStore, seedTree } from "./store.js";
export type { MemoryStoreOptions, TreeSpec } from "./store.js";
