import type { ByteFormatter, Distribution } from '../types.js';

export function formatDistributionLines(dist: Distribution, formatBytes: ByteFormatter): string[] {
  // Quartiles and median may fall between two sizes; report whole bytes.
  return [
    `Smallest: ${formatBytes(dist.min)}`,
    `Lower Quartile: ${formatBytes(Math.round(dist.lowerQuartile))}`,
    `Median: ${formatBytes(Math.round(dist.median))}`,
    `Upper Quartile: ${formatBytes(Math.round(dist.upperQuartile))}`,
    `Largest: ${formatBytes(dist.max)}`,
  ];
}
