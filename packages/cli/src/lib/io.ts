/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import { CliError } from "./errors.js";
import { isJsonObject, parseJson, parseJsonObject } from "./arg.js";

/**
 * Read a JSON object from a file
 */
export async function readJsonFromFile(filePath: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new CliError(`Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
  const parsed = parseJson(content, `file ${filePath}`);
  if (!isJsonObject(parsed)) {
    throw new CliError(`file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Payload options shared by the writing commands
 */
export interface PayloadOptions {
  file?: string;
  data?: string;
}

/**
 * Read a JSON payload from --file or --data
 * @returns The payload, or an empty object when neither is given
 */
export async function readPayload(
  options: PayloadOptions,
  { required = false }: { required?: boolean } = {}
): Promise<Record<string, unknown>> {
  if (options.file !== undefined && options.data !== undefined) {
    throw new CliError("Cannot use both --file and --data; choose one");
  }
  if (options.file !== undefined) {
    return readJsonFromFile(options.file);
  }
  if (options.data !== undefined) {
    return parseJsonObject(options.data, "--data");
  }
  if (required) {
    throw new CliError("No input provided. Use --file or --data");
  }
  return {};
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}

/**
 * Ask a yes/no question on stderr
 * @returns true only for an explicit "y" or "yes"
 */
export async function promptConfirm(question: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  });
  try {
    const answer = (await rl.question(`${question} (y/N) `)).trim().toLowerCase();
    return answer === "y" || answer === "yes";
  } finally {
    rl.close();
  }
}
