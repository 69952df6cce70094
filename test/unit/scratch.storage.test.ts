import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ScratchStorage } from '../../src/core/pipeline/scratch.storage';
import { StorageError } from '../../src/core/errors';

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

describe('ScratchStorage', () => {
  it('should create a run directory and remove it on dispose', async () => {
    const storage = await ScratchStorage.create(os.tmpdir());
    expect(await exists(storage.directory)).toBe(true);
    expect(path.basename(storage.directory).startsWith('hls-fetch-')).toBe(true);

    await storage.dispose();

    expect(await exists(storage.directory)).toBe(false);
  });

  it('should release every file of a segment', async () => {
    const storage = await ScratchStorage.create(os.tmpdir());
    try {
      const scratch = storage.allocate('segment-3');
      const raw = scratch.file('raw');
      const plain = scratch.file('plain');
      await fs.writeFile(raw, 'a');
      await fs.writeFile(plain, 'b');

      expect(scratch.allocated).toEqual([raw, plain]);
      expect(path.basename(raw)).toBe('segment-3.raw');

      await scratch.release();

      expect(scratch.allocated).toEqual([]);
      expect(await exists(raw)).toBe(false);
      expect(await exists(plain)).toBe(false);
    } finally {
      await storage.dispose();
    }
  });

  it('should release paths that were never written', async () => {
    const storage = await ScratchStorage.create(os.tmpdir());
    try {
      const scratch = storage.allocate('segment-0');
      scratch.file('raw');
      await expect(scratch.release()).resolves.toBeUndefined();
    } finally {
      await storage.dispose();
    }
  });

  it('should fail when the parent directory does not exist', async () => {
    await expect(ScratchStorage.create(path.join(os.tmpdir(), 'does-not-exist-hls-fetch', 'nested')))
      .rejects.toBeInstanceOf(StorageError);
  });
});
