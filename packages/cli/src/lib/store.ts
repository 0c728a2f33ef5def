/**
 * Store adapter for CLI
 * Opens a store per command and closes it afterwards
 */

import { Logger, connectStore, resolveLogLevel } from "@runstore/sdk";
import type { Store } from "@runstore/sdk";
import type { ConnectionConfig } from "./env.js";

/**
 * Opens a store for resolved connection settings
 */
export type StoreOpener = (config: ConnectionConfig) => Promise<Store>;

/**
 * Connect to MongoDB with the resolved settings
 * Store events stay off stdout unless RUNSTORE_LOG_LEVEL asks for them.
 */
export const openCliStore: StoreOpener = (config) =>
  connectStore({
    uri: config.uri,
    database: config.database,
    collection: config.collection,
    logger: new Logger(resolveLogLevel(process.env.RUNSTORE_LOG_LEVEL ?? "warn")),
    clientOptions: { serverSelectionTimeoutMS: 5000 },
  });

/**
 * Execute a function with an open store, closing it after
 * A close failure is reported only when fn succeeded.
 */
export async function withStore<T>(
  open: StoreOpener,
  config: ConnectionConfig,
  fn: (store: Store) => Promise<T>
): Promise<T> {
  const store = await open(config);
  let result: T;
  try {
    result = await fn(store);
  } catch (err) {
    await store.close().catch((closeErr: unknown) => {
      process.stderr.write(
        `Error closing store: ${closeErr instanceof Error ? closeErr.message : String(closeErr)}\n`
      );
    });
    throw err;
  }
  await store.close();
  return result;
}
