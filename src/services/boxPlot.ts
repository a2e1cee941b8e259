import type { ByteFormatter, CanvasGeometry, Distribution } from '../types.js';

export const LIGHT_SHADE = '░';
export const MEDIUM_SHADE = '▒';
export const DARK_SHADE = '▓';

export interface CanvasOptions {
  fallbackColumns?: number;
  labelMargin?: number;
}

export interface BoxPlotOptions {
  /** Value drawn at the right edge of the canvas. */
  maxValue: number;
  width: number;
}

export function resolveCanvasWidth(columns: number | undefined, opts: CanvasOptions = {}): CanvasGeometry {
  const fallbackColumns = opts.fallbackColumns ?? 80;
  const labelMargin = opts.labelMargin ?? 40;

  const width = (columns ?? fallbackColumns) - labelMargin;
  if (width >= 1) return { width, degraded: false };
  return { width: 1, degraded: true };
}

export function columnFor(value: number, maxValue: number, width: number): number {
  if (!Number.isFinite(maxValue) || maxValue <= 0) return 0;
  const col = Math.round((value / maxValue) * width);
  if (!Number.isFinite(col)) return 0;
  return Math.min(width, Math.max(0, col));
}

export function renderBoxPlotBar(dist: Distribution, opts: BoxPlotOptions): string {
  const width = Math.max(1, Math.floor(opts.width));
  const col = (value: number) => columnFor(value, opts.maxValue, width);
  const pMin = col(dist.min);
  const pLower = col(dist.lowerQuartile);
  const pMedian = col(dist.median);
  const pUpper = col(dist.upperQuartile);
  const pMax = col(dist.max);

  const cells = Array.from({ length: width }, () => ' ');
  const paint = (glyph: string, from: number, to: number) => {
    for (let i = from; i < Math.min(to, width); i++) cells[i] = glyph;
  };

  paint(LIGHT_SHADE, pMin, pLower);
  paint(MEDIUM_SHADE, pLower, pMedian);
  paint(MEDIUM_SHADE, pMedian, pUpper);
  paint(LIGHT_SHADE, pUpper, pMax);
  // The median column is always drawn, even on top of another boundary.
  cells[Math.min(pMedian, width - 1)] = DARK_SHADE;

  return cells.join('');
}

export function renderBoxPlot(dist: Distribution, opts: BoxPlotOptions & { formatBytes: ByteFormatter }): string {
  const bar = renderBoxPlotBar(dist, opts);
  return `Smallest: ${opts.formatBytes(dist.min)} ${bar} Largest: ${opts.formatBytes(dist.max)}`;
}
