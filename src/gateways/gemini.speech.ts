import { GoogleGenAI, Modality } from '@google/genai';
import { SynthesisUnavailable } from '../errors';
import { VoiceSegment } from '../types';
import { SpeechClient } from './speech.gateway';

export interface GeminiSpeechOptions {
    apiKey: string;
    model?: string;
}

/**
 * Speaking rate and pitch are not request parameters for Gemini voices, so
 * they travel as delivery instructions. Volume is applied to the samples by
 * the gateway.
 */
export function deliveryPrompt(segment: VoiceSegment): string {
    const hints: string[] = [];
    const { speakingRate, pitch } = segment.prosody;
    if (speakingRate !== 1) hints.push(`at ${Math.round(speakingRate * 100)}% of normal speed`);
    if (pitch !== 0) hints.push(`with the pitch ${pitch > 0 ? 'raised' : 'lowered'} by ${Math.abs(pitch)} semitones`);
    const manner = hints.length ? ` ${hints.join(' and ')}` : '';
    return `Say this clearly${manner}: ${segment.text}`;
}

export class GeminiSpeechClient implements SpeechClient {
    public readonly sampleRate = 24000;
    private readonly ai: GoogleGenAI;
    private readonly model: string;

    constructor(options: GeminiSpeechOptions) {
        this.ai = new GoogleGenAI({ apiKey: options.apiKey });
        this.model = options.model ?? 'gemini-2.5-flash-preview-tts';
    }

    public async synthesizeSegment(segment: VoiceSegment, signal: AbortSignal): Promise<Buffer> {
        const response = await this.ai.models.generateContent({
            model: this.model,
            contents: [{ parts: [{ text: deliveryPrompt(segment) }] }],
            config: {
                abortSignal: signal,
                responseModalities: [Modality.AUDIO],
                speechConfig: {
                    languageCode: segment.language,
                    voiceConfig: { prebuiltVoiceConfig: { voiceName: segment.voice } },
                },
            },
        });

        const data = response.candidates?.[0]?.content?.parts?.[0]?.inlineData?.data;
        if (!data) throw new SynthesisUnavailable(`Empty audio response for "${segment.text}" (${segment.voice})`);
        return Buffer.from(data, 'base64');
    }
}
