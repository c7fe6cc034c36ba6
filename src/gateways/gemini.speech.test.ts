import { describe, expect, it } from 'vitest';
import { VoiceSegment } from '../types';
import { deliveryPrompt } from './gemini.speech';

const segment = (prosody: VoiceSegment['prosody']): VoiceSegment => ({
  role: 'native-a',
  voice: 'Kore',
  language: 'ru-RU',
  text: 'Каша',
  prosody,
  offsetMs: 1200,
});

describe('deliveryPrompt', () => {
  it('asks for plain delivery at default prosody', () => {
    expect(deliveryPrompt(segment({ speakingRate: 1, pitch: 0, volumeGainDb: 6 }))).toBe('Say this clearly: Каша');
  });

  it('describes rate and pitch changes', () => {
    expect(deliveryPrompt(segment({ speakingRate: 0.85, pitch: -2, volumeGainDb: 0 })))
      .toBe('Say this clearly at 85% of normal speed and with the pitch lowered by 2 semitones: Каша');
    expect(deliveryPrompt(segment({ speakingRate: 1, pitch: 3, volumeGainDb: 0 })))
      .toBe('Say this clearly with the pitch raised by 3 semitones: Каша');
  });
});
