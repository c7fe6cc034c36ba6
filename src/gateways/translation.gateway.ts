import { TranslationRejected, TranslationUnavailable } from '../errors';
import { Term, TranslationResult } from '../types';
import { classifyServiceError } from './classify';
import { DEFAULT_RETRY_POLICY, RetryPolicy, withRetry } from './retry';

export interface TranslationClient {
    requestTranslation(text: string, signal: AbortSignal): Promise<TranslationResult>;
}

/**
 * Caches one lookup per term text for the life of the pipeline. Concurrent
 * callers for the same text share the in-flight request; a failed lookup is
 * evicted so a later call can try again.
 */
export class TranslationGateway {
    private readonly cache = new Map<string, Promise<TranslationResult>>();

    constructor(
        private readonly client: TranslationClient,
        private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    ) {}

    public prime(text: string, result: TranslationResult): void {
        if (!this.cache.has(text)) this.cache.set(text, Promise.resolve({ ...result }));
    }

    public translate(term: Term, cancel?: AbortSignal): Promise<TranslationResult> {
        const cached = this.cache.get(term.text);
        if (cached) return cached;

        const pending = withRetry(
            signal => this.client.requestTranslation(term.text, signal),
            error => classifyServiceError(error, TranslationUnavailable, TranslationRejected),
            this.policy,
            cancel,
        );
        this.cache.set(term.text, pending);
        pending.catch(() => {
            if (this.cache.get(term.text) === pending) this.cache.delete(term.text);
        });
        return pending;
    }

    public async romanize(term: Term, cancel?: AbortSignal): Promise<string> {
        return (await this.translate(term, cancel)).romanized;
    }
}
