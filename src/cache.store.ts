import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { CacheEntry } from './types';

export interface CacheStore {
    load(): Promise<CacheEntry[]>;
    /** Upserts by term text; entries not mentioned are kept. */
    save(entries: CacheEntry[]): Promise<void>;
}

const CacheEntrySchema = z.object({
    text: z.string().min(1),
    romanized: z.string(),
    translated: z.string(),
    audioFile: z.string().optional(),
    scriptKey: z.string().optional(),
});

const CacheFileSchema = z.object({
    version: z.literal(1),
    entries: z.array(CacheEntrySchema),
});

/** JSON file cache used by the CLI between runs over the same term list. */
export class FileCacheStore implements CacheStore {
    constructor(private readonly path: string) {}

    public async load(): Promise<CacheEntry[]> {
        let raw: string;
        try {
            raw = await readFile(this.path, 'utf-8');
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
            throw error;
        }

        const parsed = CacheFileSchema.safeParse(JSON.parse(raw));
        if (!parsed.success) {
            throw new Error(`Cache file ${this.path} is not a valid cache: ${parsed.error.issues[0]?.message}`);
        }
        return parsed.data.entries;
    }

    public async save(entries: CacheEntry[]): Promise<void> {
        const merged = new Map((await this.load()).map(entry => [entry.text, entry]));
        for (const entry of entries) merged.set(entry.text, entry);

        await mkdir(dirname(this.path), { recursive: true });
        const tmp = `${this.path}.tmp`;
        await writeFile(tmp, JSON.stringify({ version: 1, entries: [...merged.values()] }, null, 2), 'utf-8');
        await rename(tmp, this.path);
    }
}

/** Process-local store, for the job worker without MongoDB and for tests. */
export class MemoryCacheStore implements CacheStore {
    private readonly entries = new Map<string, CacheEntry>();

    constructor(seed: CacheEntry[] = []) {
        for (const entry of seed) this.entries.set(entry.text, entry);
    }

    public async load(): Promise<CacheEntry[]> {
        return [...this.entries.values()].map(entry => ({ ...entry }));
    }

    public async save(entries: CacheEntry[]): Promise<void> {
        for (const entry of entries) this.entries.set(entry.text, { ...entry });
    }
}
