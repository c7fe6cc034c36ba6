export class PipelineError extends Error {
    constructor(public readonly code: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ConfigError extends PipelineError {
    constructor(public readonly issues: string[]) {
        super('CONFIG_ERROR', `Invalid configuration:\n- ${issues.join('\n- ')}`);
    }
}

export class InputFormatError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('INPUT_FORMAT', message, options);
    }
}

/** Transient gateway failure; the call may succeed if retried. */
export class TranslationUnavailable extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('TRANSLATION_UNAVAILABLE', message, options);
    }
}

export class TranslationRejected extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('TRANSLATION_REJECTED', message, options);
    }
}

export class SynthesisUnavailable extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('SYNTHESIS_UNAVAILABLE', message, options);
    }
}

export class SynthesisRejected extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('SYNTHESIS_REJECTED', message, options);
    }
}

export class IncompleteRecord extends PipelineError {
    constructor(term: string, missing: string[]) {
        super('INCOMPLETE_RECORD', `Record for "${term}" is missing ${missing.join(' and ')}`);
    }
}

export class UnsafeFieldValue extends PipelineError {
    constructor(public readonly value: string, delimiter: string) {
        super('UNSAFE_FIELD_VALUE', `Field value ${JSON.stringify(value)} contains "${delimiter}" or a line break`);
    }
}

export class RunCancelled extends PipelineError {
    constructor() {
        super('CANCELLED', 'Run was cancelled before this term finished');
    }
}

export const isTransient = (error: unknown): boolean =>
    error instanceof TranslationUnavailable || error instanceof SynthesisUnavailable;

export const describeError = (error: unknown): { code: string; message: string } => {
    if (error instanceof PipelineError) return { code: error.code, message: error.message };
    if (error instanceof Error) return { code: 'UNEXPECTED', message: error.message };
    return { code: 'UNEXPECTED', message: String(error) };
};
