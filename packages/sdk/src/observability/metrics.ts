/**
 * Metrics tracking for store operations
 */

export interface OperationMetrics {
  successCount: number;
  failureCount: number;
  durationMs: number[];
}

export interface IndexEnsureMetrics {
  runs: number;
  created: number;
  durationMs: number[];
}

/** Samples kept per series */
const WINDOW = 100;

function pushSample(samples: number[], value: number): void {
  samples.push(value);
  if (samples.length > WINDOW) {
    samples.shift();
  }
}

class MetricsCollector {
  #operations = new Map<string, OperationMetrics>();
  #indexes: IndexEnsureMetrics = { runs: 0, created: 0, durationMs: [] };

  /**
   * Get or create metrics for an operation
   */
  #getMetrics(operation: string): OperationMetrics {
    let metrics = this.#operations.get(operation);
    if (!metrics) {
      metrics = { successCount: 0, failureCount: 0, durationMs: [] };
      this.#operations.set(operation, metrics);
    }
    return metrics;
  }

  /**
   * Record one call of a store operation
   */
  recordOperation(operation: string, ms: number, success: boolean): void {
    const metrics = this.#getMetrics(operation);
    if (success) {
      metrics.successCount++;
    } else {
      metrics.failureCount++;
    }
    pushSample(metrics.durationMs, ms);
  }

  /**
   * Record an index ensurance pass
   */
  recordIndexEnsure(ms: number, created: number): void {
    this.#indexes.runs++;
    this.#indexes.created += created;
    pushSample(this.#indexes.durationMs, ms);
  }

  /**
   * Get metrics for an operation
   */
  getMetrics(operation: string): OperationMetrics | undefined {
    return this.#operations.get(operation);
  }

  /**
   * Get index ensurance metrics
   */
  getIndexMetrics(): IndexEnsureMetrics {
    return { ...this.#indexes, durationMs: [...this.#indexes.durationMs] };
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  /**
   * Get p95 duration of an operation
   */
  getP95Duration(operation: string): number {
    return this.getP95(this.#operations.get(operation)?.durationMs ?? []);
  }

  /**
   * Reset metrics for an operation, or all metrics
   */
  reset(operation?: string): void {
    if (operation) {
      this.#operations.delete(operation);
    } else {
      this.#operations.clear();
      this.#indexes = { runs: 0, created: 0, durationMs: [] };
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
