import { EmptyInputError } from '../errors.js';
import type { Distribution } from '../types.js';
import { sortAscending, splitQuantile, valueAt } from '../utils/stats.js';

export function calculateDistribution(sizes: readonly number[]): Distribution {
  if (sizes.length === 0) throw new EmptyInputError();

  const sorted = sortAscending(sizes);
  return {
    min: valueAt(sorted, 0),
    lowerQuartile: splitQuantile(sorted, 1, 4),
    median: splitQuantile(sorted, 1, 2),
    upperQuartile: splitQuantile(sorted, 3, 4),
    max: valueAt(sorted, sorted.length - 1),
  };
}
