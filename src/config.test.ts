import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { loadServiceConfig, parsePipelineOptions, voiceConfigFor } from './config';
import { ConfigError } from './errors';

describe('parsePipelineOptions', () => {
  it('fills in defaults', () => {
    expect(parsePipelineOptions({ soundfilePrefix: 'RT_VOCAB' })).toEqual({
      soundfilePrefix: 'RT_VOCAB',
      padWidth: 4,
      romanize: false,
      speakingRate: 1,
      pitch: 0,
      volumeGainDb: 0,
      concurrency: 4,
      commaPolicy: 'split',
      sectionNotes: false,
      headers: true,
      audioField: 'sound-tag',
      leadInMs: 1200,
      repeatMs: 650,
      translationMs: 1200,
    });
  });

  it('accepts string values from forms and the command line', () => {
    const options = parsePipelineOptions({ soundfilePrefix: 'X', soundfileIndex: '12', romanize: 'true', speakingRate: '0.8' });
    expect(options.soundfileIndex).toBe(12);
    expect(options.romanize).toBe(true);
    expect(options.speakingRate).toBe(0.8);
  });

  it('lists every invalid field', () => {
    try {
      parsePipelineOptions({ soundfilePrefix: 'RT VOCAB', speakingRate: 5 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.issues).toEqual([
        'soundfilePrefix: soundfilePrefix may only contain letters, digits, "_" and "-"',
        'speakingRate: Number must be less than or equal to 4',
      ]);
    }
  });

  it('builds the voice config from the options', () => {
    const options = parsePipelineOptions({ soundfilePrefix: 'X', pitch: -2, repeatMs: 400 });
    const voice = voiceConfigFor(options);
    expect(voice.prosody).toEqual({ speakingRate: 1, pitch: -2, volumeGainDb: 0 });
    expect(voice.gaps).toEqual({ leadInMs: 1200, repeatMs: 400, translationMs: 1200 });
    expect(voice.nativeA.name).toBe('Kore');
  });
});

describe('loadServiceConfig', () => {
  it('uses the shared key for both services', () => {
    const config = loadServiceConfig({ GEMINI_API_KEY: 'test-secret', PORT: '4000' });
    expect(config.translationApiKey).toBe('test-secret');
    expect(config.speechApiKey).toBe('test-secret');
    expect(config.port).toBe(4000);
    expect(config.sourceLanguage).toBe('Russian');
    expect(config.voices.target).toEqual({ name: 'Puck', language: 'en-US' });
  });

  it('reads credentials from files', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'creds-'));
    const path = join(dir, 'speech.key');
    await writeFile(path, 'test-speech-secret\n', 'utf-8');

    const config = loadServiceConfig({ GEMINI_API_KEY: 'test-secret', SPEECH_CREDENTIALS: path });
    expect(config.speechApiKey).toBe('test-speech-secret');
    expect(config.translationApiKey).toBe('test-secret');
  });

  it('fails before any work when credentials are missing', () => {
    expect(() => loadServiceConfig({})).toThrow(ConfigError);
    expect(() => loadServiceConfig({})).toThrow('TRANSLATION_CREDENTIALS: set GEMINI_API_KEY or a credentials file path');
  });
});
