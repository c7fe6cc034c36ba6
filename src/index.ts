import { CacheStore } from './cache.store';
import { PipelineOptions, ServiceConfig, voiceConfigFor } from './config';
import { GeminiSpeechClient } from './gateways/gemini.speech';
import { GeminiTranslationClient } from './gateways/gemini.translation';
import { SpeechGateway } from './gateways/speech.gateway';
import { TranslationGateway } from './gateways/translation.gateway';
import { PipelineDependencies, PipelineOrchestrator, RunOptions, TermSource } from './pipeline.orchestrator';

export * from './types';
export * from './errors';
export { parseTerms, readTermSource } from './term.parser';
export { buildPronunciationScript, defaultVoiceConfig, scriptKey } from './audio-script.builder';
export { AudioFileNamer } from './audio-file.namer';
export { RecordAssembler } from './record.assembler';
export { TableWriter } from './table.writer';
export { FileCacheStore, MemoryCacheStore } from './cache.store';
export type { CacheStore } from './cache.store';
export { TranslationGateway, SpeechGateway, PipelineOrchestrator };
export type { TranslationClient } from './gateways/translation.gateway';
export type { SpeechClient } from './gateways/speech.gateway';
export type { RunOptions, TermSource } from './pipeline.orchestrator';
export { loadServiceConfig, parsePipelineOptions } from './config';

export function createGateways(config: ServiceConfig): Pick<PipelineDependencies, 'translation' | 'speech'> {
    return {
        translation: new TranslationGateway(new GeminiTranslationClient({
            apiKey: config.translationApiKey,
            model: config.translationModel,
            sourceLanguage: config.sourceLanguage,
            targetLanguage: config.targetLanguage,
            romanizationSystem: config.romanizationSystem,
        })),
        speech: new SpeechGateway(new GeminiSpeechClient({ apiKey: config.speechApiKey, model: config.speechModel })),
    };
}

export interface RunTarget {
    input: TermSource;
    outputPath: string;
    mediaDir: string;
    signal?: AbortSignal;
    verbose?: boolean;
}

/** Maps validated options onto the orchestrator's run options. */
export function toRunOptions(options: PipelineOptions, target: RunTarget, voices?: ServiceConfig['voices']): RunOptions {
    return {
        ...target,
        soundfilePrefix: options.soundfilePrefix,
        soundfileIndex: options.soundfileIndex,
        padWidth: options.padWidth,
        romanize: options.romanize,
        concurrency: options.concurrency,
        voice: voiceConfigFor(options, voices),
        parse: { commaPolicy: options.commaPolicy, sectionNotes: options.sectionNotes },
        table: { headers: options.headers, audioField: options.audioField, deck: options.deck, noteType: options.noteType },
    };
}

export function createPipeline(
    config: ServiceConfig,
    extras: { cache?: CacheStore; onStage?: PipelineDependencies['onStage'] } = {},
): PipelineOrchestrator {
    return new PipelineOrchestrator({ ...createGateways(config), ...extras });
}
