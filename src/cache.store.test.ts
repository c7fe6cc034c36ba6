import { mkdtemp, readFile, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { FileCacheStore, MemoryCacheStore } from './cache.store';

const kasha = { text: 'Каша', romanized: 'Kasha', translated: 'Porridge', audioFile: 'RT_VOCAB0000.wav', scriptKey: 'abc' };
const mir = { text: 'Мир', romanized: 'Mir', translated: 'Peace' };

describe('FileCacheStore', () => {
  it('starts empty when the file does not exist', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'cache-'));
    await expect(new FileCacheStore(join(dir, 'cache.json')).load()).resolves.toEqual([]);
  });

  it('merges saved entries by term text', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'cache-'));
    const path = join(dir, 'nested', 'cache.json');
    const store = new FileCacheStore(path);

    await store.save([kasha, mir]);
    await store.save([{ ...mir, translated: 'World' }]);

    expect(await store.load()).toEqual([kasha, { ...mir, translated: 'World' }]);
    expect(JSON.parse(await readFile(path, 'utf-8')).version).toBe(1);
  });

  it('refuses a file that is not a cache', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'cache-'));
    const path = join(dir, 'cache.json');
    await writeFile(path, JSON.stringify({ version: 2, entries: [] }), 'utf-8');

    await expect(new FileCacheStore(path).load()).rejects.toThrow(`Cache file ${path} is not a valid cache`);
  });
});

describe('MemoryCacheStore', () => {
  it('returns copies of what was saved', async () => {
    const store = new MemoryCacheStore([mir]);
    await store.save([kasha]);

    const entries = await store.load();
    expect(entries).toEqual([mir, kasha]);
    entries[0].translated = 'changed';
    expect((await store.load())[0].translated).toBe('Peace');
  });
});
