import {
    GoogleGenerativeAI, HarmBlockThreshold, HarmCategory, ResponseSchema, SchemaType,
} from '@google/generative-ai';
import { z } from 'zod';
import { TranslationRejected, TranslationUnavailable } from '../errors';
import { TranslationResult } from '../types';
import { TranslationClient } from './translation.gateway';

const safetySettings = [
    { category: HarmCategory.HARM_CATEGORY_HARASSMENT, threshold: HarmBlockThreshold.BLOCK_NONE },
    { category: HarmCategory.HARM_CATEGORY_HATE_SPEECH, threshold: HarmBlockThreshold.BLOCK_NONE },
    { category: HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT, threshold: HarmBlockThreshold.BLOCK_NONE },
    { category: HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT, threshold: HarmBlockThreshold.BLOCK_NONE },
];

const responseSchema: ResponseSchema = {
    type: SchemaType.OBJECT,
    properties: {
        romanized: { type: SchemaType.STRING },
        translated: { type: SchemaType.STRING },
        spellingError: { type: SchemaType.STRING, nullable: true },
    },
    required: ['romanized', 'translated'],
};

export const TranslationReplySchema = z.object({
    romanized: z.string(),
    translated: z.string().trim().min(1),
    spellingError: z.string().nullish(),
});

export interface GeminiTranslationOptions {
    apiKey: string;
    model?: string;
    sourceLanguage: string;
    targetLanguage: string;
    romanizationSystem?: string;
}

export class GeminiTranslationClient implements TranslationClient {
    private readonly ai: GoogleGenerativeAI;
    private readonly modelName: string;

    constructor(private readonly options: GeminiTranslationOptions) {
        this.ai = new GoogleGenerativeAI(options.apiKey);
        this.modelName = options.model ?? 'gemini-2.5-flash';
    }

    public async requestTranslation(text: string, signal: AbortSignal): Promise<TranslationResult> {
        const model = this.ai.getGenerativeModel({
            model: this.modelName,
            safetySettings,
            systemInstruction: this.getSystemPrompt(),
            generationConfig: { responseMimeType: 'application/json', responseSchema },
        });
        const result = await model.generateContent(
            `Process this ${this.options.sourceLanguage} text: ${JSON.stringify(text)}`,
            { signal },
        );

        const blockReason = result.response.promptFeedback?.blockReason;
        if (blockReason) throw new TranslationRejected(`Request for "${text}" was blocked (${blockReason})`);

        return parseTranslationReply(text, result.response.text());
    }

    private getSystemPrompt = () => `You are a ${this.options.sourceLanguage} linguistic expert preparing vocabulary flashcards.
    For the ${this.options.sourceLanguage} word or phrase you receive:
    1. Verify its spelling. If it is misspelled, explain the problem briefly in 'spellingError' and leave 'romanized' and 'translated' empty.
    2. Otherwise set 'spellingError' to null.
    3. ROMANIZED: a Latin transliteration using the ${this.options.romanizationSystem ?? 'BGN/PCGN'} system.
    4. TRANSLATED: the most common ${this.options.targetLanguage} translation, short enough for a flashcard. Never use semicolons or line breaks.
    Respond with a single JSON object: \`{ "romanized": string, "translated": string, "spellingError": string | null }\`.`;
}

export function parseTranslationReply(text: string, reply: string): TranslationResult {
    let json: unknown;
    try {
        json = JSON.parse(reply);
    } catch (error) {
        throw new TranslationUnavailable(`Malformed translation reply for "${text}"`, { cause: error });
    }

    const candidate = z.object({ spellingError: z.string().nullish() }).safeParse(json);
    if (candidate.success && candidate.data.spellingError) {
        throw new TranslationRejected(`Spelling error in "${text}": ${candidate.data.spellingError}`);
    }

    const parsed = TranslationReplySchema.safeParse(json);
    if (!parsed.success) {
        throw new TranslationUnavailable(`Unexpected translation reply for "${text}": ${parsed.error.issues[0]?.message}`);
    }
    return { romanized: parsed.data.romanized.trim(), translated: parsed.data.translated };
}
