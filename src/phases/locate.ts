import * as path from 'node:path';
import * as Logging from '@/logging';
import * as Storage from '@/util/storage';
import type { ProcessedSet } from '@/state';
import type { TranscriptJob } from '@/pipeline/types';

export interface LocateConfig {
    watchDirectory: string;
    extensions: string[];
    /** Files that live in the watch directory but are not transcripts */
    exclude?: string[];
    processed: ProcessedSet;
    storage?: Storage.Utility;
    clock?: () => Date;
}

export interface Instance {
    /** New transcripts sorted by filename. `skip` holds filenames to pass over this session. */
    locate(skip?: ReadonlySet<string>): Promise<TranscriptJob[]>;
    read(filePath: string): Promise<TranscriptJob>;
}

export const create = (config: LocateConfig): Instance => {
    const logger = Logging.getLogger();
    const storage = config.storage ?? Storage.create({ log: logger.debug.bind(logger) });
    const clock = config.clock ?? (() => new Date());
    const excluded = new Set((config.exclude ?? []).map(file => path.resolve(file)));
    const patterns = config.extensions.map(extension => `*${extension}`);

    const read = async (filePath: string): Promise<TranscriptJob> => {
        const text = await storage.readFile(filePath);
        return {
            filename: path.basename(filePath),
            path: path.resolve(filePath),
            text,
            discoveredAt: clock(),
        };
    };

    const locate = async (skip: ReadonlySet<string> = new Set()): Promise<TranscriptJob[]> => {
        if (!await storage.isDirectory(config.watchDirectory)) {
            logger.warn('Watch directory %s does not exist', config.watchDirectory);
            return [];
        }

        const files = await storage.listFiles(config.watchDirectory, patterns);
        const jobs: TranscriptJob[] = [];
        for (const file of files) {
            const filename = path.basename(file);
            if (excluded.has(path.resolve(file)) || skip.has(filename)) {
                continue;
            }
            if (await config.processed.has(filename)) {
                logger.debug('Skipping %s, already processed', filename);
                continue;
            }
            jobs.push(await read(file));
        }

        if (jobs.length > 0) {
            logger.verbose('Found %d new transcript(s) in %s', jobs.length, config.watchDirectory);
        }
        return jobs;
    };

    return { locate, read };
};
