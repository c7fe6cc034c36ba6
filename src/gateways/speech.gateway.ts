import { scriptKey } from '../audio-script.builder';
import { SynthesisRejected, SynthesisUnavailable } from '../errors';
import { PronunciationScript, VoiceSegment } from '../types';
import { classifyServiceError } from './classify';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from './retry';

const BYTES_PER_SAMPLE = 2;

export interface SpeechClient {
    /** Sample rate of the PCM the client returns. */
    readonly sampleRate: number;
    /** Renders one segment as 16-bit little-endian mono PCM. */
    synthesizeSegment(segment: VoiceSegment, signal: AbortSignal): Promise<Buffer>;
}

/**
 * Renders a script as a single WAV asset. Each segment is requested on its
 * own and laid end to end with exactly `offsetMs` of silence before it, so
 * the timing in the file is the timing in the script.
 */
export class SpeechGateway {
    public readonly extension = 'wav';
    private readonly cache = new Map<string, Promise<Buffer>>();

    constructor(
        private readonly client: SpeechClient,
        private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    ) {}

    public synthesize(script: PronunciationScript, cancel?: AbortSignal): Promise<Buffer> {
        const key = scriptKey(script);
        const cached = this.cache.get(key);
        if (cached) return cached;

        const pending = this.render(script, cancel);
        this.cache.set(key, pending);
        pending.catch(() => {
            if (this.cache.get(key) === pending) this.cache.delete(key);
        });
        return pending;
    }

    private async render(script: PronunciationScript, cancel?: AbortSignal): Promise<Buffer> {
        const { sampleRate } = this.client;
        const voiced = await Promise.all(script.segments.map(segment => this.renderSegment(segment, cancel)));

        const parts: Buffer[] = [];
        script.segments.forEach((segment, i) => {
            parts.push(silence(segment.offsetMs, sampleRate));
            parts.push(applyGain(voiced[i], segment.prosody.volumeGainDb));
        });
        return encodeWav(Buffer.concat(parts), sampleRate);
    }

    private async renderSegment(segment: VoiceSegment, cancel?: AbortSignal): Promise<Buffer> {
        const pcm = await withRetry(
            signal => this.client.synthesizeSegment(segment, signal),
            error => classifyServiceError(error, SynthesisUnavailable, SynthesisRejected),
            this.policy,
            cancel,
        );
        if (pcm.length === 0) throw new SynthesisRejected(`No audio returned for "${segment.text}" (${segment.voice})`);
        return pcm.length % BYTES_PER_SAMPLE ? pcm.subarray(0, pcm.length - 1) : pcm;
    }
}

export function silence(ms: number, sampleRate: number): Buffer {
    return Buffer.alloc(Math.round((ms * sampleRate) / 1000) * BYTES_PER_SAMPLE);
}

export function applyGain(pcm: Buffer, gainDb: number): Buffer {
    if (gainDb === 0) return pcm;
    const factor = 10 ** (gainDb / 20);
    const out = Buffer.alloc(pcm.length);
    for (let i = 0; i < pcm.length; i += BYTES_PER_SAMPLE) {
        const scaled = Math.round(pcm.readInt16LE(i) * factor);
        out.writeInt16LE(Math.max(-32768, Math.min(32767, scaled)), i);
    }
    return out;
}

export function encodeWav(pcm: Buffer, sampleRate: number): Buffer {
    const header = Buffer.alloc(44);
    header.write('RIFF', 0, 'ascii');
    header.writeUInt32LE(36 + pcm.length, 4);
    header.write('WAVE', 8, 'ascii');
    header.write('fmt ', 12, 'ascii');
    header.writeUInt32LE(16, 16);
    header.writeUInt16LE(1, 20); // PCM
    header.writeUInt16LE(1, 22); // mono
    header.writeUInt32LE(sampleRate, 24);
    header.writeUInt32LE(sampleRate * BYTES_PER_SAMPLE, 28);
    header.writeUInt16LE(BYTES_PER_SAMPLE, 32);
    header.writeUInt16LE(16, 34);
    header.write('data', 36, 'ascii');
    header.writeUInt32LE(pcm.length, 40);
    return Buffer.concat([header, pcm]);
}
