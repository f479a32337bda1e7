import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { StorageError } from '@wexport/utils';
import { DiskArtifactStore } from '../../src/warehouse/disk-artifact-store.js';

const encoder = new TextEncoder();

describe('DiskArtifactStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(join(tmpdir(), 'wexport-store-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('creates the output directory and writes artifacts byte-for-byte', async () => {
    const store = new DiskArtifactStore(join(root, 'csv'));
    await store.prepare();

    const paths = await store.writeAll([
      { name: 'orders_2024_01.csv', bytes: encoder.encode('"A"\r\n"1"\r\n') },
      { name: 'orders.zip', bytes: Uint8Array.from([80, 75, 5, 6]) },
    ]);

    expect(paths).toEqual([join(root, 'csv', 'orders_2024_01.csv'), join(root, 'csv', 'orders.zip')]);
    expect(await fs.readFile(join(root, 'csv', 'orders_2024_01.csv'), 'utf8')).toBe('"A"\r\n"1"\r\n');
    expect([...(await fs.readFile(join(root, 'csv', 'orders.zip')))]).toEqual([80, 75, 5, 6]);
  });

  it('keeps existing files unless asked to clean', async () => {
    const directory = join(root, 'csv');
    await fs.mkdir(join(directory, 'old'), { recursive: true });
    await fs.writeFile(join(directory, 'stale.csv'), 'x');
    const store = new DiskArtifactStore(directory);

    await store.prepare();
    expect((await fs.readdir(directory)).sort()).toEqual(['old', 'stale.csv']);

    await store.prepare({ clean: true });
    expect(await fs.readdir(directory)).toEqual([]);
  });

  it('refuses names that would leave the directory', async () => {
    const store = new DiskArtifactStore(root);

    await expect(store.write({ name: '../escape.csv', bytes: new Uint8Array() })).rejects.toThrow(
      StorageError
    );
    expect(() => store.pathFor('nested/file.csv')).toThrow('Invalid artifact name: nested/file.csv');
  });

  it('reports write failures as StorageError', async () => {
    const store = new DiskArtifactStore(join(root, 'missing'));

    await expect(
      store.write({ name: 'orders_full.csv', bytes: new Uint8Array() })
    ).rejects.toBeInstanceOf(StorageError);
  });
});
