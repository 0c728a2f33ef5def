/**
 * runstore command definitions
 */

import { Command } from "commander";
import type { ExperimentDoc, SortSpec, Store } from "@runstore/sdk";
import { resolveConnection } from "./lib/env.js";
import type { ConnectionFlags } from "./lib/env.js";
import { parseJsonObject, parseNonNegativeInt, parseSort } from "./lib/arg.js";
import { isStdinTTY, promptConfirm, readPayload } from "./lib/io.js";
import type { PayloadOptions } from "./lib/io.js";
import { colorize, printIds, printJson } from "./lib/render.js";
import { CliError, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { openCliStore, withStore } from "./lib/store.js";
import type { StoreOpener } from "./lib/store.js";
import { emitStoreMetrics, withTiming } from "./lib/telemetry.js";

/**
 * What the commands need from their surroundings
 */
export interface CliContext {
  /** Open a store for the resolved connection settings */
  openStore: StoreOpener;
  /** Whether confirmation prompts can be shown */
  isInteractive(): boolean;
  /** Ask a yes/no question */
  confirm(question: string): Promise<boolean>;
  /** Environment used for connection settings */
  env: NodeJS.ProcessEnv;
}

export const defaultContext: CliContext = {
  openStore: openCliStore,
  isInteractive: isStdinTTY,
  confirm: promptConfirm,
  env: process.env,
};

type GlobalOptions = ConnectionFlags & {
  verbose?: boolean;
  quiet?: boolean;
};

interface GetOptions {
  raw?: boolean;
}

interface RemoveOptions {
  force?: boolean;
  purge?: boolean;
}

interface ListOptions {
  filter?: Record<string, unknown>;
  skip?: number;
  limit?: number;
  sort?: SortSpec;
  includeDeleted?: boolean;
  raw?: boolean;
}

function addPayloadOptions(command: Command): Command {
  return command
    .option("--file <path>", "Read fields from a JSON file")
    .option("--data <json>", "Inline JSON fields");
}

/**
 * Build the runstore program
 * @param version - Version reported by --version
 * @param context - Store opener, prompt and environment
 */
export function createProgram(version: string, context: CliContext = defaultContext): Command {
  const program = new Command();

  // Configure error output with color; parse errors surface as reported CliErrors
  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .exitOverride((err) => {
      throw new CliError(err.message, { exitCode: err.exitCode, cause: err, reported: true });
    });

  // Global options
  program
    .name("runstore")
    .description("runstore - experiment run metadata store backed by MongoDB")
    .version(version)
    .option("--uri <uri>", "MongoDB connection string")
    .option("--db <name>", "Database name")
    .option("--collection <name>", "Collection holding experiments")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  /**
   * Run a command body against an open store
   */
  const run = <T>(label: string, fn: (store: Store) => Promise<T>): Promise<T> =>
    withTiming(`cli.${label}`, async () => {
      const config = resolveConnection(globals(), context.env);
      try {
        return await withStore(context.openStore, config, fn);
      } finally {
        emitStoreMetrics([
          "ensureIndexes",
          "get",
          "create",
          "update",
          "setHeartbeat",
          "setFinished",
          "markDelete",
          "completeDeletion",
          "fetchDocs",
        ]);
      }
    });

  const say = (message: string): void => {
    if (!globals().quiet) {
      console.log(message);
    }
  };

  // Create command
  addPayloadOptions(
    program.command("create <name>").description("Create an experiment (status RUNNING)")
  ).action(async (name: string, options: PayloadOptions) => {
    const fields = await readPayload(options);
    const id = await run("create", (store) => store.create(name, fields));
    console.log(id.toHexString());
  });

  // Get command
  program
    .command("get <id>")
    .description("Retrieve an experiment")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (id: string, options: GetOptions) => {
      const doc = await run("get", (store) => store.get(id));

      if (doc === null) {
        throw new CliError(`Experiment not found: ${id}`, { exitCode: 2 });
      }

      printJson(doc, { raw: options.raw });
    });

  // Update command
  addPayloadOptions(
    program.command("update <id>").description("Merge fields into an experiment")
  ).action(async (id: string, options: PayloadOptions) => {
    const fields = await readPayload(options, { required: true });
    await run("update", (store) => store.update(id, fields));
    say(`Updated ${id}`);
  });

  // Heartbeat command
  addPayloadOptions(
    program.command("heartbeat <id>").description("Set the heartbeat to now, merging any fields")
  ).action(async (id: string, options: PayloadOptions) => {
    const fields = await readPayload(options);
    await run("heartbeat", (store) => store.setHeartbeat(id, fields));
    say(`Heartbeat ${id}`);
  });

  // Finish command
  addPayloadOptions(
    program
      .command("finish <id> <status>")
      .description("Finish an experiment with COMPLETED or FAILED")
  ).action(async (id: string, status: string, options: PayloadOptions) => {
    const fields = await readPayload(options);
    await run("finish", (store) => store.setFinished(id, status, fields));
    say(`Finished ${id} (${status})`);
  });

  // Remove command
  program
    .command("rm <id>")
    .description("Soft-delete an experiment and its descendants")
    .option("--force", "Skip the confirmation prompt")
    .option("--purge", "Also remove the documents physically")
    .action(async (id: string, options: RemoveOptions) => {
      // Require confirmation unless --force
      if (!options.force) {
        if (!context.isInteractive()) {
          throw new CliError("Use --force to confirm removal in non-interactive mode");
        }
        const verb = options.purge ? "Permanently delete" : "Delete";
        if (!(await context.confirm(`${verb} ${id} and all its descendants?`))) {
          throw new CliError("Aborted by user");
        }
      }

      const { marked, removed } = await run("rm", async (store) => {
        const marked = await store.markDelete(id);
        const removed = options.purge ? await store.completeDeletion(marked) : undefined;
        return { marked, removed };
      });

      printIds(marked);
      if (removed !== undefined) {
        say(`Deleted ${removed} experiment(s)`);
      }
    });

  // Purge command
  program
    .command("purge <ids...>")
    .description("Permanently remove experiments")
    .action(async (ids: string[]) => {
      const removed = await run("purge", (store) => store.completeDeletion(ids));
      say(`Deleted ${removed} experiment(s)`);
    });

  // List command
  program
    .command("ls")
    .description("List experiments, most recent heartbeat first")
    .option("--filter <json>", "Query filter as a JSON object", (val) =>
      parseJsonObject(val, "--filter")
    )
    .option("--skip <n>", "Skip N results", (val) => parseNonNegativeInt(val, "--skip"))
    .option("--limit <n>", "Maximum results", (val) => parseNonNegativeInt(val, "--limit"))
    .option("--sort <spec>", "Sort as field:asc|desc pairs, comma separated", (val) =>
      parseSort(val, "--sort")
    )
    .option("--include-deleted", "Include soft-deleted experiments")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (options: ListOptions) => {
      const docs: ExperimentDoc[] = await run("ls", (store) =>
        store.fetchDocs({
          filter: options.filter,
          skip: options.skip,
          limit: options.limit,
          sortBy: options.sort,
          includeDeleted: options.includeDeleted,
        })
      );

      // Always output as JSON array
      printJson(docs, { raw: options.raw });
    });

  // Ensure-indexes command
  program
    .command("ensure-indexes")
    .description("Create any missing secondary indexes")
    .action(async () => {
      await run("ensure-indexes", (store) => store.ensureIndexes());
      say("Indexes ensured");
    });

  return program;
}

/**
 * Parse and run a command line
 * @param args - User arguments (without the node and script paths)
 * @returns Process exit code
 */
export async function runCli(
  args: string[],
  version: string,
  context: CliContext = defaultContext
): Promise<number> {
  const program = createProgram(version, context);
  try {
    await program.parseAsync(args, { from: "user" });
    return 0;
  } catch (err) {
    const exitCode = mapSdkErrorToExitCode(err);
    if (err instanceof CliError && err.reported) {
      return exitCode;
    }

    const opts = program.opts<GlobalOptions>();
    console.error(`Error: ${formatCliError(err, opts.verbose)}`);
    return exitCode;
  }
}
