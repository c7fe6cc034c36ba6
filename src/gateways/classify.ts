import { PipelineError } from '../errors';
import { RequestTimeout } from './retry';

type ErrorClass = new (message: string, options?: { cause?: unknown }) => PipelineError;

/** HTTP status carried by the Gemini SDK errors (`GoogleGenerativeAIFetchError`, `ApiError`). */
export function statusOf(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

/**
 * Rate limits, server errors, timeouts and network failures are transient;
 * any other client error means the service will never accept this input.
 */
export function classifyServiceError(error: unknown, unavailable: ErrorClass, rejected: ErrorClass): PipelineError {
    if (error instanceof PipelineError) return error;
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof RequestTimeout) return new unavailable(message, { cause: error });

    const status = statusOf(error);
    if (status !== undefined && status >= 400 && status < 500 && status !== 408 && status !== 429) {
        return new rejected(`Service rejected the request (${status}): ${message}`, { cause: error });
    }
    return new unavailable(status ? `Service unavailable (${status}): ${message}` : message, { cause: error });
}
