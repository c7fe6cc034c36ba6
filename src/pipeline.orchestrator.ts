import { access, mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { AudioFileNamer } from './audio-file.namer';
import { buildPronunciationScript, scriptKey } from './audio-script.builder';
import { CacheStore } from './cache.store';
import { IncompleteRecord, PipelineError, RunCancelled, UnsafeFieldValue, describeError } from './errors';
import { SpeechGateway } from './gateways/speech.gateway';
import { TranslationGateway } from './gateways/translation.gateway';
import { RecordAssembler } from './record.assembler';
import { TableOptions, TableWriter } from './table.writer';
import { ParseOptions, parseTerms, readTermSource } from './term.parser';
import {
    AudioAsset, CacheEntry, FailedTerm, FlashcardRecord, PronunciationScript, RunPhase, RunSummary, Term, TermState,
    TranslationResult, VoiceConfig,
} from './types';

export type TermSource = { path: string } | { content: string };

export interface PipelineDependencies {
    translation: TranslationGateway;
    speech: SpeechGateway;
    cache?: CacheStore;
    onStage?: (stage: string, phase: RunPhase) => void;
}

export interface RunOptions {
    input: TermSource;
    outputPath: string;
    mediaDir: string;
    soundfilePrefix: string;
    soundfileIndex?: number;
    padWidth?: number;
    romanize: boolean;
    concurrency: number;
    voice: VoiceConfig;
    parse?: ParseOptions;
    table?: TableOptions;
    signal?: AbortSignal;
    verbose?: boolean;
}

interface TermProgress {
    term: Term;
    state: TermState;
    translation?: TranslationResult;
    script?: PronunciationScript;
    scriptKey?: string;
    payload?: Buffer;
    reusedAudio?: string;
    record?: FlashcardRecord;
    failure?: FailedTerm;
}

async function runPool<T>(items: T[], limit: number, worker: (item: T) => Promise<void>): Promise<void> {
    let cursor = 0;
    const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
        while (cursor < items.length) {
            const item = items[cursor++];
            await worker(item);
        }
    });
    await Promise.all(lanes);
}

async function fileExists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
        throw error;
    }
}

/**
 * Drives a run through parsing, resolving (translate, then synthesize, per
 * term and concurrently), assembling and writing. A term that fails is
 * dropped from the table and reported; only I/O on the input, output, media
 * directory or cache aborts the run.
 */
export class PipelineOrchestrator {
    private phase: RunPhase = 'parsing';

    constructor(private readonly deps: PipelineDependencies) {}

    public get currentPhase(): RunPhase {
        return this.phase;
    }

    public async run(options: RunOptions): Promise<RunSummary> {
        const { signal } = options;
        const writer = new TableWriter(options.table);
        const assembler = new RecordAssembler({ romanize: options.romanize });

        this.enter('parsing', 'Reading term list...');
        const content = 'path' in options.input ? await readTermSource(options.input.path) : options.input.content;
        const progress: TermProgress[] = [...parseTerms(content, options.parse)].map(term => ({ term, state: 'pending' }));
        this.log(options, `${progress.length} unique terms`);

        const cached = new Map((await this.deps.cache?.load() ?? []).map(entry => [entry.text, entry]));
        for (const entry of cached.values()) {
            this.deps.translation.prime(entry.text, { romanized: entry.romanized, translated: entry.translated });
        }

        this.enter('resolving', `Resolving ${progress.length} terms...`);
        let settled = 0;
        await runPool(progress, options.concurrency, async item => {
            await this.resolve(item, options, cached.get(item.term.text));
            settled++;
            this.deps.onStage?.(`Resolved ${settled} of ${progress.length}`, 'resolving');
        });

        this.enter('assembling', 'Assembling flashcards...');
        await mkdir(options.mediaDir, { recursive: true });
        const knownFiles = [...cached.values()].flatMap(entry => (entry.audioFile ? [entry.audioFile] : []));
        const namer = await AudioFileNamer.resume(options.mediaDir, options.soundfilePrefix, {
            startIndex: options.soundfileIndex,
            padWidth: options.padWidth,
            knownFiles,
        });
        for (const item of progress) {
            if (item.state === 'resolved') await this.assemble(item, options, namer, writer, assembler);
        }

        this.enter('writing', 'Writing import table...');
        const table = writer.write(progress.flatMap(item => (item.record ? [item.record] : [])));
        for (const { record, error } of table.rejected) {
            const item = progress.find(p => p.term.text === record.term.text);
            if (item) this.fail(item, error);
        }
        await mkdir(dirname(options.outputPath), { recursive: true });
        await writeFile(options.outputPath, table.output, 'utf-8');
        await this.deps.cache?.save(progress.flatMap(item => this.cacheEntry(item)));

        const status = signal?.aborted ? 'cancelled' : 'done';
        this.enter(status, status === 'done' ? 'Done' : 'Cancelled');

        const summary: RunSummary = {
            status,
            outputPath: options.outputPath,
            processed: table.rows,
            records: progress.flatMap(item => (item.state === 'assembled' && item.record ? [item.record] : [])),
            failed: progress.flatMap(item => (item.failure ? [item.failure] : [])),
        };
        console.log(`[pipeline] ${summary.processed} flashcards written to ${summary.outputPath}, ${summary.failed.length} failed.`);
        return summary;
    }

    private async resolve(item: TermProgress, options: RunOptions, cached: CacheEntry | undefined): Promise<void> {
        const { term } = item;
        try {
            if (options.signal?.aborted) throw new RunCancelled();
            item.state = 'translating';
            item.translation = await this.deps.translation.translate(term, options.signal);
            this.log(options, `${term.text} => ${item.translation.translated}`);

            item.script = buildPronunciationScript(term, item.translation, options.voice);
            item.scriptKey = scriptKey(item.script);

            if (cached?.audioFile && cached.scriptKey === item.scriptKey
                && AudioFileNamer.isNamed(options.soundfilePrefix, cached.audioFile)
                && await fileExists(join(options.mediaDir, cached.audioFile))) {
                item.reusedAudio = cached.audioFile;
            } else {
                if (options.signal?.aborted) throw new RunCancelled();
                item.state = 'synthesizing';
                item.payload = await this.deps.speech.synthesize(item.script, options.signal);
            }
            item.state = 'resolved';
        } catch (error) {
            this.fail(item, error);
        }
    }

    private async assemble(
        item: TermProgress, options: RunOptions, namer: AudioFileNamer, writer: TableWriter, assembler: RecordAssembler,
    ): Promise<void> {
        const { term, translation } = item;
        let record: FlashcardRecord;
        try {
            if (translation) {
                const romanized = options.romanize ? translation.romanized : '';
                writer.assertSafe([term.text, romanized, translation.translated, term.notes ?? '']);
            }
            let asset: AudioAsset | undefined;
            if (translation && item.reusedAudio) {
                asset = { filename: item.reusedAudio, script: item.script };
            } else if (translation && item.payload) {
                asset = { filename: `${namer.next()}.${this.deps.speech.extension}`, payload: item.payload, script: item.script };
            }
            record = assembler.assemble(term, translation, asset);
        } catch (error) {
            if (error instanceof UnsafeFieldValue || error instanceof IncompleteRecord) {
                this.fail(item, error);
                return;
            }
            throw error;
        }

        if (item.payload) await writeFile(join(options.mediaDir, record.audioFile), item.payload);
        item.record = record;
        item.state = 'assembled';
    }

    private cacheEntry(item: TermProgress): CacheEntry[] {
        if (!item.translation) return [];
        const entry: CacheEntry = { text: item.term.text, ...item.translation };
        if (item.state === 'assembled' && item.record) {
            entry.audioFile = item.record.audioFile;
            entry.scriptKey = item.scriptKey;
        }
        return [entry];
    }

    private fail(item: TermProgress, error: unknown): void {
        const { code, message } = describeError(error);
        item.failure = { text: item.term.text, stage: item.state, code, message };
        item.state = 'failed';
        item.record = undefined;
        console.error(`[pipeline] "${item.term.text}" failed while ${item.failure.stage}: ${message}`);
        if (!(error instanceof PipelineError)) console.error(error);
    }

    private enter(phase: RunPhase, stage: string): void {
        this.phase = phase;
        this.deps.onStage?.(stage, phase);
    }

    private log(options: RunOptions, message: string): void {
        if (options.verbose) console.log(`[pipeline] ${message}`);
    }
}
