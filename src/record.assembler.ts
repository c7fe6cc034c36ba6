import { IncompleteRecord } from './errors';
import { AudioAsset, FlashcardRecord, Term, TranslationResult } from './types';

export interface AssemblerOptions {
    /** When off the romanization field is left empty. */
    romanize: boolean;
}

export class RecordAssembler {
    constructor(private readonly options: AssemblerOptions = { romanize: true }) {}

    public assemble(
        term: Term,
        translation: TranslationResult | undefined,
        audio: AudioAsset | undefined,
        notes: string = term.notes ?? '',
    ): FlashcardRecord {
        if (!translation || !audio?.filename) {
            const missing = [!translation && 'translation', !audio?.filename && 'audio'].filter(
                (field): field is string => typeof field === 'string',
            );
            throw new IncompleteRecord(term.text, missing);
        }

        return {
            term,
            translation: {
                romanized: this.options.romanize ? translation.romanized : '',
                translated: translation.translated,
            },
            audioFile: audio.filename,
            notes,
        };
    }
}
