import { UnsafeFieldValue } from './errors';
import { FlashcardRecord } from './types';

export interface TableOptions {
    delimiter?: string;
    /** `sound-tag` writes `[sound:file]`, which Anki plays; `filename` writes the name alone. */
    audioField?: 'sound-tag' | 'filename';
    /** Emit Anki import headers (`#separator:` and friends) above the rows. */
    headers?: boolean;
    noteType?: string;
    deck?: string;
}

export interface RejectedRecord {
    record: FlashcardRecord;
    error: UnsafeFieldValue;
}

export interface TableOutput {
    output: string;
    rows: number;
    rejected: RejectedRecord[];
}

const SEPARATOR_NAMES: Record<string, string> = { ';': 'Semicolon', ',': 'Comma', '\t': 'Tab', '|': 'Pipe', ':': 'Colon' };

/**
 * The import format has no escaping, so a field that contains the delimiter
 * or a line break is refused rather than written.
 */
export class TableWriter {
    private readonly delimiter: string;

    constructor(private readonly options: TableOptions = {}) {
        this.delimiter = options.delimiter ?? ';';
    }

    public assertSafe(values: string[]): void {
        for (const value of values) {
            if (value.includes(this.delimiter) || /[\r\n]/.test(value)) {
                throw new UnsafeFieldValue(value, this.delimiter);
            }
        }
    }

    public fields(record: FlashcardRecord): string[] {
        const audio = this.options.audioField === 'filename' ? record.audioFile : `[sound:${record.audioFile}]`;
        return [record.term.text, record.translation.romanized, audio, record.translation.translated, record.notes];
    }

    public write(records: Iterable<FlashcardRecord>): TableOutput {
        const lines = this.headerLines();
        const rejected: RejectedRecord[] = [];
        let rows = 0;

        for (const record of records) {
            const fields = this.fields(record);
            try {
                this.assertSafe(fields);
            } catch (error) {
                if (!(error instanceof UnsafeFieldValue)) throw error;
                rejected.push({ record, error });
                continue;
            }
            lines.push(fields.join(this.delimiter));
            rows++;
        }
        return { output: lines.length ? `${lines.join('\n')}\n` : '', rows, rejected };
    }

    private headerLines(): string[] {
        if (!this.options.headers) return [];
        const lines = [`#separator:${SEPARATOR_NAMES[this.delimiter] ?? this.delimiter}`, '#html:false'];
        if (this.options.noteType) lines.push(`#notetype:${this.options.noteType}`);
        if (this.options.deck) lines.push(`#deck:${this.options.deck}`);
        return lines;
    }
}
