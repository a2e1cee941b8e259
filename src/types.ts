/** Five-number summary of a set of file sizes, in bytes. */
export interface Distribution {
  readonly min: number;
  readonly lowerQuartile: number;
  readonly median: number;
  readonly upperQuartile: number;
  readonly max: number;
}

export type ByteFormatter = (bytes: number) => string;

export interface TerminalGeometry {
  /** Current column count, or undefined when output is not an interactive terminal. */
  columns(): number | undefined;
}

export interface CanvasGeometry {
  width: number;
  /** True when the terminal was too narrow and the width was clamped. */
  degraded: boolean;
}

export interface ScanResult {
  sizes: number[];
  filesSeen: number;
  skippedEntries: number;
}
