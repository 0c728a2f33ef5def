/**
 * Output rendering helpers
 */

import type { ExperimentId } from "@runstore/sdk";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout
 * Identifiers render as hex strings and timestamps as ISO-8601.
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  console.log(json);
}

/**
 * Print identifiers to stdout, one per line
 */
export function printIds(ids: readonly ExperimentId[]): void {
  for (const id of ids) {
    console.log(id.toHexString());
  }
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
