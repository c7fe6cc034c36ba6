import { readFileSync } from 'fs';
import { z } from 'zod';
import { DEFAULT_GAPS, DEFAULT_VOICES } from './audio-script.builder';
import { ConfigError } from './errors';
import { VoiceConfig } from './types';

const numeric = (schema: z.ZodNumber) => z.preprocess(v => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v), schema);
const flag = z.preprocess(v => (typeof v === 'string' ? ['1', 'true', 'yes', 'on'].includes(v.toLowerCase()) : v), z.boolean());

export const PipelineOptionsSchema = z.object({
    soundfilePrefix: z.string().regex(/^[\w-]+$/, 'soundfilePrefix may only contain letters, digits, "_" and "-"'),
    soundfileIndex: numeric(z.number().int().nonnegative()).optional(),
    padWidth: numeric(z.number().int().min(1).max(8)).default(4),
    romanize: flag.default(false),
    speakingRate: numeric(z.number().min(0.25).max(4)).default(1),
    pitch: numeric(z.number().min(-20).max(20)).default(0),
    volumeGainDb: numeric(z.number().min(-96).max(16)).default(0),
    concurrency: numeric(z.number().int().min(1).max(32)).default(4),
    commaPolicy: z.enum(['split', 'group']).default('split'),
    sectionNotes: flag.default(false),
    headers: flag.default(true),
    audioField: z.enum(['sound-tag', 'filename']).default('sound-tag'),
    deck: z.string().min(1).optional(),
    noteType: z.string().min(1).optional(),
    leadInMs: numeric(z.number().int().nonnegative()).default(DEFAULT_GAPS.leadInMs),
    repeatMs: numeric(z.number().int().nonnegative()).default(DEFAULT_GAPS.repeatMs),
    translationMs: numeric(z.number().int().nonnegative()).default(DEFAULT_GAPS.translationMs),
});

export type PipelineOptions = z.infer<typeof PipelineOptionsSchema>;

const EnvSchema = z.object({
    GEMINI_API_KEY: z.string().optional(),
    TRANSLATION_CREDENTIALS: z.string().optional(),
    SPEECH_CREDENTIALS: z.string().optional(),
    TRANSLATION_MODEL: z.string().optional(),
    SPEECH_MODEL: z.string().optional(),
    SOURCE_LANGUAGE: z.string().default('Russian'),
    TARGET_LANGUAGE: z.string().default('English'),
    ROMANIZATION_SYSTEM: z.string().default('BGN/PCGN'),
    NATIVE_VOICE_A: z.string().default(DEFAULT_VOICES.nativeA.name),
    NATIVE_VOICE_B: z.string().default(DEFAULT_VOICES.nativeB.name),
    TARGET_VOICE: z.string().default(DEFAULT_VOICES.target.name),
    SOURCE_LANGUAGE_CODE: z.string().default(DEFAULT_VOICES.nativeA.language),
    TARGET_LANGUAGE_CODE: z.string().default(DEFAULT_VOICES.target.language),
    MEDIA_DIR: z.string().default('./media'),
    OUTPUT_DIR: z.string().default('./output'),
    PORT: numeric(z.number().int().positive()).default(3001),
    REDIS_HOST: z.string().default('127.0.0.1'),
    REDIS_PORT: numeric(z.number().int().positive()).default(6379),
    MONGODB_URI: z.string().optional(),
});

export interface ServiceConfig {
    translationApiKey: string;
    speechApiKey: string;
    translationModel?: string;
    speechModel?: string;
    sourceLanguage: string;
    targetLanguage: string;
    romanizationSystem: string;
    voices: Pick<VoiceConfig, 'nativeA' | 'nativeB' | 'target'>;
    mediaDir: string;
    outputDir: string;
    port: number;
    redis: { host: string; port: number };
    mongodbUri?: string;
}

const issuesOf = (error: z.ZodError) =>
    error.issues.map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message));

export function parsePipelineOptions(input: unknown): PipelineOptions {
    const parsed = PipelineOptionsSchema.safeParse(input);
    if (!parsed.success) throw new ConfigError(issuesOf(parsed.error));
    return parsed.data;
}

function readCredential(path: string | undefined, fallback: string | undefined, label: string, issues: string[]): string {
    if (path) {
        try {
            return readFileSync(path, 'utf-8').trim();
        } catch (error) {
            issues.push(`${label}: cannot read credentials file ${path} (${error instanceof Error ? error.message : error})`);
            return '';
        }
    }
    if (fallback) return fallback;
    issues.push(`${label}: set GEMINI_API_KEY or a credentials file path`);
    return '';
}

/** Credentials are read once here and handed to the gateway constructors. */
export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) throw new ConfigError(issuesOf(parsed.error));
    const e = parsed.data;

    const issues: string[] = [];
    const translationApiKey = readCredential(e.TRANSLATION_CREDENTIALS, e.GEMINI_API_KEY, 'TRANSLATION_CREDENTIALS', issues);
    const speechApiKey = readCredential(e.SPEECH_CREDENTIALS, e.GEMINI_API_KEY, 'SPEECH_CREDENTIALS', issues);
    if (issues.length) throw new ConfigError(issues);

    return {
        translationApiKey,
        speechApiKey,
        translationModel: e.TRANSLATION_MODEL,
        speechModel: e.SPEECH_MODEL,
        sourceLanguage: e.SOURCE_LANGUAGE,
        targetLanguage: e.TARGET_LANGUAGE,
        romanizationSystem: e.ROMANIZATION_SYSTEM,
        voices: {
            nativeA: { name: e.NATIVE_VOICE_A, language: e.SOURCE_LANGUAGE_CODE },
            nativeB: { name: e.NATIVE_VOICE_B, language: e.SOURCE_LANGUAGE_CODE },
            target: { name: e.TARGET_VOICE, language: e.TARGET_LANGUAGE_CODE },
        },
        mediaDir: e.MEDIA_DIR,
        outputDir: e.OUTPUT_DIR,
        port: e.PORT,
        redis: { host: e.REDIS_HOST, port: e.REDIS_PORT },
        mongodbUri: e.MONGODB_URI,
    };
}

export function voiceConfigFor(options: PipelineOptions, voices: ServiceConfig['voices'] = DEFAULT_VOICES): VoiceConfig {
    return {
        ...voices,
        prosody: { speakingRate: options.speakingRate, pitch: options.pitch, volumeGainDb: options.volumeGainDb },
        gaps: { leadInMs: options.leadInMs, repeatMs: options.repeatMs, translationMs: options.translationMs },
    };
}
