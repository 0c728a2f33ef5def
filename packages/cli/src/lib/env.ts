/**
 * Environment and configuration resolution
 */

import { z } from "zod";
import { CliError } from "./errors.js";

export const DEFAULT_URI = "mongodb://127.0.0.1:27017";
export const DEFAULT_DATABASE = "runstore";
export const DEFAULT_COLLECTION = "experiments";

const ConnectionSchema = z.object({
  uri: z
    .string()
    .regex(/^mongodb(\+srv)?:\/\//, "must start with mongodb:// or mongodb+srv://"),
  database: z
    .string()
    .min(1)
    .max(63)
    .regex(/^[^/\\. "$]+$/, "must not contain / \\ . space \" or $"),
  collection: z
    .string()
    .min(1)
    .refine((name) => !name.includes("$"), "must not contain $")
    .refine((name) => !name.startsWith("system."), "must not start with system."),
});

export type ConnectionConfig = z.infer<typeof ConnectionSchema>;

/**
 * Connection flags as given on the command line
 */
export type ConnectionFlags = {
  uri?: string;
  db?: string;
  collection?: string;
};

/**
 * Treat empty or blank variables as unset
 */
function fromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Resolve connection settings
 * Priority: CLI option > environment variable > default
 * @throws {CliError} If a resolved setting is invalid
 */
export function resolveConnection(
  flags: ConnectionFlags = {},
  env: NodeJS.ProcessEnv = process.env
): ConnectionConfig {
  const result = ConnectionSchema.safeParse({
    uri: flags.uri ?? fromEnv(env, "RUNSTORE_MONGO_URI") ?? DEFAULT_URI,
    database: flags.db ?? fromEnv(env, "RUNSTORE_DB") ?? DEFAULT_DATABASE,
    collection: flags.collection ?? fromEnv(env, "RUNSTORE_COLLECTION") ?? DEFAULT_COLLECTION,
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")} ${issue.message}`)
      .join("; ");
    throw new CliError(`Invalid connection settings: ${details}`);
  }
  return result.data;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.RUNSTORE_CLI_DEBUG === "1";
}
