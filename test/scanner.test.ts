import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';

import { UnreadablePathError } from '../src/errors.js';
import { collectFileSizes } from '../src/services/scanner.js';

let root: string;

async function writeSized(relPath: string, bytes: number): Promise<void> {
  const abs = path.join(root, relPath);
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, Buffer.alloc(bytes));
}

beforeAll(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'filesize-dist-'));
  await writeSized('a.bin', 5000);
  await writeSized('b.bin', 100);
  await writeSized('nested/c.bin', 4097);
  await writeSized('nested/deeper/d.bin', 4096);
  await writeSized('nested/deeper/e.bin', 8192);
  await fs.symlink(path.join(root, 'a.bin'), path.join(root, 'link.bin'));
});

afterEach(() => {
  vi.restoreAllMocks();
});

function accessDenied(): Error {
  return Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
}

afterAll(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe('collectFileSizes', () => {
  it('keeps regular files strictly above the threshold', async () => {
    const result = await collectFileSizes(root, { minBytesExclusive: 4096 });
    expect([...result.sizes].sort((a, b) => a - b)).toEqual([4097, 5000, 8192]);
    expect(result.filesSeen).toBe(5);
    expect(result.skippedEntries).toBe(0);
  });

  it('measures a file given as the root', async () => {
    const result = await collectFileSizes(path.join(root, 'a.bin'), { minBytesExclusive: 4096 });
    expect(result.sizes).toEqual([5000]);
  });

  it('rejects when the root cannot be read', async () => {
    await expect(collectFileSizes(path.join(root, 'missing'), { minBytesExclusive: 0 })).rejects.toThrow(
      UnreadablePathError,
    );
  });

  it('skips a subdirectory it cannot list and keeps its siblings', async () => {
    const realReaddir = fs.readdir;
    // First call lists the root, the second one is nested/.
    const spy = vi.spyOn(fs, 'readdir').mockImplementationOnce(realReaddir).mockRejectedValueOnce(accessDenied());

    const result = await collectFileSizes(root, { minBytesExclusive: 4096 });
    expect(spy).toHaveBeenCalledTimes(2);
    expect(result).toEqual({ sizes: [5000], filesSeen: 2, skippedEntries: 1 });
  });

  it('rejects when the root directory cannot be listed', async () => {
    vi.spyOn(fs, 'readdir').mockRejectedValueOnce(accessDenied());
    await expect(collectFileSizes(root, { minBytesExclusive: 4096 })).rejects.toThrow(UnreadablePathError);
  });

  it('skips a file it cannot stat', async () => {
    const realStat = fs.stat;
    // First call stats the root itself.
    vi.spyOn(fs, 'stat').mockImplementationOnce(realStat).mockRejectedValueOnce(accessDenied());

    const result = await collectFileSizes(root, { minBytesExclusive: 4096 });
    expect(result.filesSeen).toBe(4);
    expect(result.skippedEntries).toBe(1);
  });
});
