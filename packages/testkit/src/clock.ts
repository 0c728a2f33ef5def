/**
 * Clock utilities for deterministic tests
 */

/**
 * A clock that only moves when told to
 */
export interface ManualClock {
  /** Current time; pass as the store's `now` option */
  now(): Date;
  /** Move forward by a number of milliseconds */
  advance(ms: number): Date;
  /** Jump to an absolute time */
  set(time: Date | string | number): Date;
}

/**
 * Create a manual clock
 * @param start - Initial time (default: 2024-01-01T00:00:00Z)
 *
 * @example
 * ```typescript
 * const clock = createManualClock();
 * const store = openStore({ collection, now: clock.now });
 * clock.advance(30_000);
 * ```
 */
export function createManualClock(start: Date | string | number = "2024-01-01T00:00:00Z"): ManualClock {
  let current = new Date(start).getTime();
  if (Number.isNaN(current)) {
    throw new RangeError(`Invalid clock start: ${String(start)}`);
  }

  return {
    now: () => new Date(current),
    advance(ms: number): Date {
      current += ms;
      return new Date(current);
    },
    set(time: Date | string | number): Date {
      const next = new Date(time).getTime();
      if (Number.isNaN(next)) {
        throw new RangeError(`Invalid clock time: ${String(time)}`);
      }
      current = next;
      return new Date(current);
    },
  };
}

/**
 * Measure execution time of a function
 * @returns Tuple of [result, duration in ms]
 */
export async function measure<T>(fn: () => Promise<T>): Promise<[T, number]> {
  const start = performance.now();
  const result = await fn();
  return [result, performance.now() - start];
}
