import { readFile } from 'fs/promises';
import { InputFormatError } from './errors';
import { CommaPolicy, Term } from './types';

export interface ParseOptions {
    commaPolicy?: CommaPolicy;
    /** Use the most recent `#` comment as the notes of the terms below it. */
    sectionNotes?: boolean;
}

const BOM = '\uFEFF';

/**
 * Reads a term list as UTF-8. Anything that cannot be read or decoded is an
 * input error, which aborts the run.
 */
export async function readTermSource(path: string): Promise<string> {
    let bytes: Buffer;
    try {
        bytes = await readFile(path);
    } catch (error) {
        throw new InputFormatError(`Cannot read term list ${path}`, { cause: error });
    }
    return decodeTermSource(bytes, path);
}

export function decodeTermSource(bytes: Uint8Array, label = 'input'): string {
    try {
        return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (error) {
        throw new InputFormatError(`${label} is not valid UTF-8 text`, { cause: error });
    }
}

/**
 * Lazily yields unique terms in first-seen order. The returned iterable can be
 * walked any number of times; each walk parses the content again.
 */
export function parseTerms(content: string, options: ParseOptions = {}): Iterable<Term> {
    return { [Symbol.iterator]: () => walk(content, options) };
}

function* walk(content: string, { commaPolicy = 'split', sectionNotes = false }: ParseOptions): Generator<Term> {
    const seen = new Set<string>();
    let section: string | undefined;
    const text = content.startsWith(BOM) ? content.slice(1) : content;

    for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (!line) continue;
        if (line.startsWith('#')) {
            const heading = line.slice(1).trim();
            section = heading || undefined;
            continue;
        }

        const variants = line.split(',').map(v => v.trim()).filter(v => v.length > 0);
        const texts = commaPolicy === 'group' ? [variants.join(', ')] : variants;

        for (const termText of texts) {
            if (!termText || seen.has(termText)) continue;
            seen.add(termText);
            yield sectionNotes && section ? { text: termText, notes: section } : { text: termText };
        }
    }
}
