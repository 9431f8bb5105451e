/**
 * Math Utilities
 *
 * Small numeric helpers shared by the scoring agents and the aggregation
 * engine.
 */

/**
 * Calculates the mean (average) of an array of numbers.
 * Returns 0 for empty arrays.
 *
 * @example
 * mean([1, 2, 3, 4, 5]) // returns 3
 * mean([]) // returns 0
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, val) => sum + val, 0) / values.length;
}

/**
 * Population standard deviation of an array of numbers.
 * Returns 0 for arrays with < 2 elements.
 *
 * @example
 * stddev([1, 2, 3, 4, 5]) // returns ~1.414
 * stddev([5]) // returns 0
 */
export function stddev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squareDiffs = values.map((v) => Math.pow(v - avg, 2));
  return Math.sqrt(mean(squareDiffs));
}

/**
 * Logistic function, maps any real number onto (0, 1).
 *
 * @example
 * sigmoid(0) // returns 0.5
 */
export function sigmoid(z: number): number {
  return 1 / (1 + Math.exp(-z));
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Rounds a number to a specified number of decimal places.
 *
 * @example
 * round(3.14159, 2) // returns 3.14
 */
export function round(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

export function round2(value: number): number {
  return round(value, 2);
}

export function round3(value: number): number {
  return round(value, 3);
}

/** Percentage of `part` in `total`, 0 when total is 0. */
export function percentOf(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

/**
 * Groups items by a derived key, preserving first-seen key order.
 */
export function groupBy<T>(
  items: readonly T[],
  keyFn: (item: T) => string,
): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyFn(item);
    const list = groups.get(key);
    if (list) {
      list.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

export function countWhere<T>(items: readonly T[], condition: (item: T) => boolean): number {
  let count = 0;
  for (const item of items) {
    if (condition(item)) count++;
  }
  return count;
}
