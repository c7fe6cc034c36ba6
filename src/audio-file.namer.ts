import { readdir } from 'fs/promises';

export interface NamerOptions {
    /** Caller-supplied first index; skips the directory scan. */
    startIndex?: number;
    /** First index when nothing has been assigned before. */
    base?: number;
    padWidth?: number;
    /** Filenames assigned by earlier runs that may no longer be on disk. */
    knownFiles?: Iterable<string>;
}

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Owned, monotonically increasing counter for audio filenames. Increments are
 * synchronous, so concurrent workers on the event loop never observe the same
 * index.
 */
export class AudioFileNamer {
    private nextIndex: number;
    private readonly assigned: string[] = [];

    constructor(
        private readonly prefix: string,
        startIndex = 0,
        private readonly padWidth = 4,
    ) {
        if (!Number.isInteger(startIndex) || startIndex < 0) {
            throw new RangeError(`Start index must be a non-negative integer, got ${startIndex}`);
        }
        this.nextIndex = startIndex;
    }

    /** Starts after the highest index already used for `prefix` in `mediaDir` or `knownFiles`. */
    public static async resume(mediaDir: string, prefix: string, options: NamerOptions = {}): Promise<AudioFileNamer> {
        const padWidth = options.padWidth ?? 4;
        if (options.startIndex !== undefined) return new AudioFileNamer(prefix, options.startIndex, padWidth);

        let files: string[] = [];
        try {
            files = await readdir(mediaDir);
        } catch (error) {
            if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
        }

        const highest = AudioFileNamer.highestIndex(prefix, [...files, ...(options.knownFiles ?? [])]);
        const start = highest === undefined ? options.base ?? 0 : highest + 1;
        return new AudioFileNamer(prefix, start, padWidth);
    }

    public static highestIndex(prefix: string, filenames: Iterable<string>): number | undefined {
        const pattern = AudioFileNamer.pattern(prefix, 'i');
        let highest: number | undefined;
        for (const name of filenames) {
            const match = pattern.exec(name);
            if (!match) continue;
            const index = parseInt(match[1], 10);
            if (highest === undefined || index > highest) highest = index;
        }
        return highest;
    }

    /** True when `filename` is `{prefix}{digits}`, with the prefix matched exactly. */
    public static isNamed(prefix: string, filename: string): boolean {
        return AudioFileNamer.pattern(prefix).test(filename);
    }

    private static pattern(prefix: string, flags = ''): RegExp {
        return new RegExp(`^${escapeRegExp(prefix)}(\\d+)(\\.\\w+)?$`, flags);
    }

    public next(prefix: string = this.prefix): string {
        const index = this.nextIndex++;
        const name = `${prefix}${String(index).padStart(this.padWidth, '0')}`;
        this.assigned.push(name);
        return name;
    }

    public get peek(): number {
        return this.nextIndex;
    }

    public get names(): readonly string[] {
        return this.assigned;
    }
}
