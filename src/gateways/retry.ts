import { RunCancelled, isTransient } from '../errors';

export interface RetryPolicy {
    attempts: number;
    backoff: { type: 'exponential' | 'fixed'; delay: number };
    /** Upper bound for a single request, in milliseconds. */
    timeout: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    attempts: 3,
    backoff: { type: 'exponential', delay: 500 },
    timeout: 30_000,
};

export class RequestTimeout extends Error {
    constructor(ms: number) {
        super(`Request timed out after ${ms}ms`);
        this.name = 'RequestTimeout';
    }
}

export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
    policy.backoff.type === 'exponential' ? policy.backoff.delay * 2 ** (attempt - 1) : policy.backoff.delay;

/** Resolves after `ms`, or as soon as `signal` fires. */
const sleep = (ms: number, signal?: AbortSignal) => new Promise<void>(resolve => {
    if (signal?.aborted) return resolve();
    const onAbort = () => {
        clearTimeout(timer);
        resolve();
    };
    const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
});

/**
 * Runs `request` with a per-attempt timeout. The request receives an abort
 * signal that fires when its attempt times out.
 */
export async function withTimeout<T>(request: (signal: AbortSignal) => Promise<T>, ms: number): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new RequestTimeout(ms));
        }, ms);
    });
    try {
        return await Promise.race([request(controller.signal), timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Retries only transient failures. `classify` maps whatever the request threw
 * (SDK errors, timeouts) onto the pipeline's error types. Once `cancel` fires
 * no further attempt is started; an attempt already in flight runs to its
 * own timeout.
 */
export async function withRetry<T>(
    request: (signal: AbortSignal) => Promise<T>,
    classify: (error: unknown) => Error,
    policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    cancel?: AbortSignal,
): Promise<T> {
    let attempt = 0;
    while (true) {
        if (cancel?.aborted) throw new RunCancelled();
        attempt++;
        try {
            return await withTimeout(request, policy.timeout);
        } catch (raw) {
            const error = classify(raw);
            if (!isTransient(error) || attempt >= policy.attempts) throw error;
            await sleep(backoffDelay(policy, attempt), cancel);
        }
    }
}
