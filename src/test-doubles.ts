import { RetryPolicy } from './gateways/retry';
import { SpeechClient } from './gateways/speech.gateway';
import { TranslationClient } from './gateways/translation.gateway';
import { TranslationResult, VoiceSegment } from './types';

/** No waiting between attempts, so retry paths run instantly under test. */
export const FAST_RETRY: RetryPolicy = { attempts: 3, backoff: { type: 'fixed', delay: 0 }, timeout: 1000 };

const wait = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

type Reply = TranslationResult | Error;

/**
 * Answers from a dictionary; unknown words get `rom:<text>` / `tr:<text>`.
 * A list of replies is consumed one per call, the last one repeating.
 */
export class FakeTranslationClient implements TranslationClient {
    public readonly calls: string[] = [];

    constructor(
        private readonly replies: Record<string, Reply | Reply[]> = {},
        private readonly delays: Record<string, number> = {},
    ) {}

    public async requestTranslation(text: string): Promise<TranslationResult> {
        const attempt = this.calls.filter(t => t === text).length;
        this.calls.push(text);
        if (this.delays[text]) await wait(this.delays[text]);

        const configured = this.replies[text];
        const reply = Array.isArray(configured) ? configured[Math.min(attempt, configured.length - 1)] : configured;
        if (reply instanceof Error) throw reply;
        return reply ?? { romanized: `rom:${text}`, translated: `tr:${text}` };
    }
}

/** Returns four samples of `amplitude` per segment at 1 kHz, so 1 ms of silence is one sample. */
export class FakeSpeechClient implements SpeechClient {
    public readonly sampleRate = 1000;
    public readonly calls: VoiceSegment[] = [];

    constructor(
        private readonly failures: Record<string, Error> = {},
        private readonly amplitude = 1000,
    ) {}

    public async synthesizeSegment(segment: VoiceSegment): Promise<Buffer> {
        this.calls.push(segment);
        const failure = this.failures[segment.text];
        if (failure) throw failure;

        const pcm = Buffer.alloc(8);
        for (let i = 0; i < pcm.length; i += 2) pcm.writeInt16LE(this.amplitude, i);
        return pcm;
    }
}
