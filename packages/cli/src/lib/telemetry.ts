/**
 * Telemetry and observability helpers
 */

import { metrics } from "@runstore/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Emit the store's own timings for the given operations
 */
export function emitStoreMetrics(operations: readonly string[]): void {
  for (const operation of operations) {
    const recorded = metrics.getMetrics(operation);
    if (!recorded) continue;
    emitMetric(`store.${operation}`, {
      ok: recorded.successCount,
      failed: recorded.failureCount,
      p95_ms: metrics.getP95Duration(operation).toFixed(2),
    });
  }
  const indexes = metrics.getIndexMetrics();
  if (indexes.runs > 0) {
    emitMetric("store.ensureIndexes", { runs: indexes.runs, created: indexes.created });
  }
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = performance.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = performance.now() - start;
    emitMetric(label, {
      duration_ms: duration.toFixed(2),
      success,
    });
  }
}
