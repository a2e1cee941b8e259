import type { Dirent, Stats } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { UnreadablePathError } from '../errors.js';
import { logger } from '../logger.js';
import type { ScanResult } from '../types.js';

export interface ScanOptions {
  /** Only files strictly larger than this are kept. */
  minBytesExclusive: number;
}

/**
 * Walks `root` and collects sizes of regular files above the threshold.
 * Unreadable entries below the root are logged and skipped; an unreadable root
 * rejects with UnreadablePathError.
 */
export async function collectFileSizes(root: string, opts: ScanOptions): Promise<ScanResult> {
  const result: ScanResult = { sizes: [], filesSeen: 0, skippedEntries: 0 };

  const record = (size: number) => {
    result.filesSeen++;
    if (size > opts.minBytesExclusive) result.sizes.push(size);
  };

  async function walk(dirAbs: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dirAbs, { withFileTypes: true });
    } catch (err) {
      if (dirAbs === root) throw new UnreadablePathError(root, err);
      result.skippedEntries++;
      logger.warn({ err, dir: dirAbs }, 'failed to read directory');
      return;
    }

    for (const ent of entries) {
      const absPath = path.join(dirAbs, ent.name);
      if (ent.isDirectory()) {
        await walk(absPath);
        continue;
      }
      // Symlinks, sockets and the like are not measured.
      if (!ent.isFile()) continue;

      try {
        const st = await fs.stat(absPath);
        record(st.size);
      } catch (err) {
        result.skippedEntries++;
        logger.warn({ err, file: absPath }, 'failed to stat file');
      }
    }
  }

  let rootStat: Stats;
  try {
    rootStat = await fs.stat(root);
  } catch (err) {
    throw new UnreadablePathError(root, err);
  }

  if (rootStat.isFile()) {
    record(rootStat.size);
  } else if (rootStat.isDirectory()) {
    await walk(root);
  }

  logger.debug(
    { root, files_seen: result.filesSeen, kept: result.sizes.length, skipped: result.skippedEntries },
    'scan finished',
  );
  return result;
}
