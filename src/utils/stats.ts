import { InvalidValueError } from '../errors.js';

export function valueAt(sorted: readonly number[], index: number): number {
  const v = sorted[index];
  if (v === undefined) throw new RangeError(`Index ${index} out of range for ${sorted.length} values`);
  return v;
}

export function sortAscending(values: readonly number[]): number[] {
  for (const v of values) {
    if (!Number.isFinite(v) || v < 0) throw new InvalidValueError(v, 'size');
  }
  return [...values].sort((a, b) => a - b);
}

/**
 * Picks the point `multiplier/divisor` of the way through a sorted list.
 *
 * When `n * multiplier` divides evenly the boundary falls between two elements
 * and their mean is returned; otherwise the element at `floor(n * multiplier / divisor)`
 * is taken as is. There is no linear interpolation, so tiny samples are coarse:
 * with two values the quartiles collapse onto min and max.
 */
export function splitQuantile(sorted: readonly number[], multiplier: number, divisor: number): number {
  const scaled = sorted.length * multiplier;
  const idx = Math.floor(scaled / divisor);
  if (scaled % divisor === 0) {
    return (valueAt(sorted, idx - 1) + valueAt(sorted, idx)) / 2;
  }
  return valueAt(sorted, idx);
}
