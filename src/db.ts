import mongoose from 'mongoose';
import { CacheStore } from './cache.store';
import { CacheEntry } from './types';

export const connectDB = async (uri: string) => {
    try {
        await mongoose.connect(uri);
        console.log('[db] MongoDB connected successfully.');
    } catch (err) {
        console.error('[db] MongoDB connection error:', err instanceof Error ? err.message : err);
        throw err;
    }
};

const termCacheSchema = new mongoose.Schema<CacheEntry>({
    text: { type: String, required: true, unique: true },
    romanized: { type: String, default: '' },
    translated: { type: String, required: true },
    audioFile: { type: String },
    scriptKey: { type: String },
}, { timestamps: true });

export const TermCacheModel = mongoose.model<CacheEntry>('TermCache', termCacheSchema);

/** Term cache shared by every worker that talks to the same database. */
export class MongoCacheStore implements CacheStore {
    public async load(): Promise<CacheEntry[]> {
        const docs = await TermCacheModel.find().lean();
        return docs.map(doc => ({
            text: doc.text,
            romanized: doc.romanized,
            translated: doc.translated,
            ...(doc.audioFile ? { audioFile: doc.audioFile } : {}),
            ...(doc.scriptKey ? { scriptKey: doc.scriptKey } : {}),
        }));
    }

    public async save(entries: CacheEntry[]): Promise<void> {
        if (!entries.length) return;
        await TermCacheModel.bulkWrite(entries.map(entry => ({
            updateOne: { filter: { text: entry.text }, update: { $set: entry }, upsert: true },
        })));
    }
}
