import path from 'node:path';

import { config } from './config.js';
import { UnreadablePathError } from './errors.js';
import { logger } from './logger.js';
import { renderBoxPlot, resolveCanvasWidth } from './services/boxPlot.js';
import { calculateDistribution } from './services/distribution.js';
import { formatDistributionLines } from './services/report.js';
import { collectFileSizes } from './services/scanner.js';
import { stdoutGeometry } from './services/terminal.js';
import type { TerminalGeometry } from './types.js';
import { formatBytes } from './utils/format.js';

export const USAGE = 'Usage: filesize-dist <path>';

export interface TextSink {
  write(chunk: string): unknown;
}

export interface CliIo {
  stdout: TextSink;
  stderr: TextSink;
  terminal?: TerminalGeometry;
}

/** Runs one scan for `argv` (arguments after the script name) and returns the exit code. */
export async function run(argv: readonly string[], io: CliIo): Promise<number> {
  const target = argv[0];
  if (!target) {
    io.stderr.write(`${USAGE}\n`);
    return 1;
  }

  const root = path.resolve(target);
  const threshold = config.scan.minFileBytes;
  let sizes: number[];
  try {
    ({ sizes } = await collectFileSizes(root, { minBytesExclusive: threshold }));
  } catch (err) {
    if (!(err instanceof UnreadablePathError)) throw err;
    io.stderr.write(`${err.message}\n`);
    return 1;
  }
  if (sizes.length === 0) {
    io.stderr.write(`No files found larger than ${threshold} bytes in ${root}\n`);
    return 1;
  }

  const dist = calculateDistribution(sizes);
  logger.debug({ distribution: dist, sample_size: sizes.length }, 'distribution computed');

  const terminal = io.terminal ?? stdoutGeometry();
  const canvas = resolveCanvasWidth(terminal.columns(), {
    fallbackColumns: config.plot.fallbackColumns,
    labelMargin: config.plot.labelMargin,
  });
  if (canvas.degraded) {
    logger.warn({ labelMargin: config.plot.labelMargin }, 'terminal too narrow, plotting on a single column');
  }

  const lines = [
    ...formatDistributionLines(dist, formatBytes),
    renderBoxPlot(dist, { maxValue: dist.max, width: canvas.width, formatBytes }),
  ];
  io.stdout.write(`${lines.join('\n')}\n`);
  return 0;
}
