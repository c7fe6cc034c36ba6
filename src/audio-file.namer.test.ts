import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { AudioFileNamer } from './audio-file.namer';

describe('AudioFileNamer', () => {
  it('hands out padded, increasing names', () => {
    const namer = new AudioFileNamer('RT_VOCAB', 7);
    expect([namer.next(), namer.next(), namer.next()]).toEqual(['RT_VOCAB0007', 'RT_VOCAB0008', 'RT_VOCAB0009']);
    expect(namer.peek).toBe(10);
    expect(namer.names).toEqual(['RT_VOCAB0007', 'RT_VOCAB0008', 'RT_VOCAB0009']);
  });

  it('shares one counter across prefixes', () => {
    const namer = new AudioFileNamer('A_', 0, 2);
    expect([namer.next(), namer.next('B_'), namer.next()]).toEqual(['A_00', 'B_01', 'A_02']);
  });

  it('does not truncate indices wider than the padding', () => {
    expect(new AudioFileNamer('X', 12345).next()).toBe('X12345');
  });

  it('refuses a negative start', () => {
    expect(() => new AudioFileNamer('X', -1)).toThrow(RangeError);
    expect(() => new AudioFileNamer('X', 1.5)).toThrow(RangeError);
  });

  it('finds the highest index for a prefix only', () => {
    const names = ['RT_VOCAB0003.wav', 'RT_VOCAB0011.mp3', 'rt_vocab0004', 'RT_VOCAB_OLD0099.wav', 'notes.txt'];
    expect(AudioFileNamer.highestIndex('RT_VOCAB', names)).toBe(11);
    expect(AudioFileNamer.highestIndex('NONE', names)).toBeUndefined();
  });
});

describe('AudioFileNamer.isNamed', () => {
  it('matches the exact prefix followed by an index', () => {
    expect(AudioFileNamer.isNamed('RU_DECK', 'RU_DECK0003.wav')).toBe(true);
    expect(AudioFileNamer.isNamed('OTHER', 'RU_DECK0003.wav')).toBe(false);
    expect(AudioFileNamer.isNamed('RU', 'RU_DECK0003.wav')).toBe(false);
    expect(AudioFileNamer.isNamed('ru_deck', 'RU_DECK0003.wav')).toBe(false);
  });
});

describe('AudioFileNamer.resume', () => {
  it('continues after files already in the media directory', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'media-'));
    await writeFile(join(dir, 'RT_VOCAB0002.wav'), '');
    await writeFile(join(dir, 'RT_VOCAB0005.wav'), '');

    const namer = await AudioFileNamer.resume(dir, 'RT_VOCAB');
    expect(namer.next()).toBe('RT_VOCAB0006');
  });

  it('counts filenames known from earlier runs', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'media-'));
    const namer = await AudioFileNamer.resume(dir, 'RT_VOCAB', { knownFiles: ['RT_VOCAB0009.wav'] });
    expect(namer.next()).toBe('RT_VOCAB0010');
  });

  it('starts at the base when nothing exists yet', async () => {
    const missing = join(tmpdir(), 'no-such-media-dir', 'media');
    expect((await AudioFileNamer.resume(missing, 'RT_VOCAB')).next()).toBe('RT_VOCAB0000');
    expect((await AudioFileNamer.resume(missing, 'RT_VOCAB', { base: 1, padWidth: 1 })).next()).toBe('RT_VOCAB1');
  });

  it('prefers an explicit start index over the directory', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'media-'));
    await writeFile(join(dir, 'RT_VOCAB0005.wav'), '');

    const namer = await AudioFileNamer.resume(dir, 'RT_VOCAB', { startIndex: 100, padWidth: 2 });
    expect(namer.next()).toBe('RT_VOCAB100');
  });
});
