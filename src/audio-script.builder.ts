import { createHash } from 'crypto';
import { Prosody, PronunciationScript, ScriptGaps, SegmentRole, Term, TranslationResult, VoiceConfig, VoiceProfile, VoiceSegment } from './types';

export const DEFAULT_GAPS: ScriptGaps = { leadInMs: 1200, repeatMs: 650, translationMs: 1200 };

export const DEFAULT_PROSODY: Prosody = { speakingRate: 1, pitch: 0, volumeGainDb: 0 };

export const DEFAULT_VOICES: Pick<VoiceConfig, 'nativeA' | 'nativeB' | 'target'> = {
    nativeA: { name: 'Kore', language: 'ru-RU' },
    nativeB: { name: 'Charon', language: 'ru-RU' },
    target: { name: 'Puck', language: 'en-US' },
};

export function defaultVoiceConfig(prosody: Partial<Prosody> = {}): VoiceConfig {
    return {
        ...DEFAULT_VOICES,
        prosody: { ...DEFAULT_PROSODY, ...prosody },
        gaps: { ...DEFAULT_GAPS },
    };
}

/**
 * Drill pattern: the term by two native voices, then its translation by the
 * target-language voice. Pure, so timing can be checked without a synthesizer.
 */
export function buildPronunciationScript(term: Term, translation: TranslationResult, config: VoiceConfig): PronunciationScript {
    const { gaps } = config;
    for (const [name, value] of Object.entries(gaps)) {
        if (!Number.isFinite(value) || value < 0) {
            throw new RangeError(`Gap ${name} must be a non-negative number of milliseconds, got ${value}`);
        }
    }

    return {
        segments: [
            segment('native-a', config.nativeA, config.prosody, term.text, gaps.leadInMs),
            segment('native-b', config.nativeB, config.prosody, term.text, gaps.repeatMs),
            segment('target', config.target, config.prosody, translation.translated, gaps.translationMs),
        ],
    };
}

function segment(role: SegmentRole, voice: VoiceProfile, prosody: Prosody, text: string, offsetMs: number): VoiceSegment {
    return {
        role,
        voice: voice.name,
        language: voice.language,
        text,
        prosody: { ...prosody, ...voice.prosody },
        offsetMs,
    };
}

/** Stable digest of everything that affects the rendered audio. */
export function scriptKey(script: PronunciationScript): string {
    const canonical = script.segments.map(s => [
        s.role, s.voice, s.language, s.text,
        s.prosody.speakingRate, s.prosody.pitch, s.prosody.volumeGainDb,
        s.offsetMs,
    ]);
    return createHash('sha256').update(JSON.stringify(canonical)).digest('hex').slice(0, 16);
}
