/**
 * Processed Set
 *
 * The durable record of which transcript filenames already produced a
 * bundle. Stored as `{ filename: isoTimestamp }`; the older plain array of
 * filenames is still read and gets rewritten as a map on the next write.
 */

import * as path from 'node:path';
import { z } from 'zod';
import { PROCESSED_SET_FILE_NAME } from '@/constants';
import { getLogger } from '@/logging';
import * as Storage from '@/util/storage';
import { createSerial } from '@/util/serial';

export class StateError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StateError';
    }
}

const LEGACY_TIMESTAMP = new Date(0).toISOString();

const ProcessedFileSchema = z.union([
    z.record(z.string(), z.string()),
    z.array(z.string()).transform(names => Object.fromEntries(names.map(name => [name, LEGACY_TIMESTAMP]))),
]);

export type ProcessedEntries = Record<string, string>;

export interface Instance {
    readonly filePath: string;
    has(filename: string): Promise<boolean>;
    mark(filename: string, at?: Date): Promise<void>;
    remove(filename: string): Promise<boolean>;
    list(): Promise<ProcessedEntries>;
}

export interface ProcessedSetConfig {
    directory: string;
    storage?: Storage.Utility;
}

export const create = (config: ProcessedSetConfig): Instance => {
    const logger = getLogger();
    const storage = config.storage ?? Storage.create({ log: logger.debug.bind(logger) });
    const filePath = path.join(config.directory, PROCESSED_SET_FILE_NAME);
    const serial = createSerial();

    const read = async (): Promise<ProcessedEntries> => {
        if (!await storage.exists(filePath)) {
            return {};
        }
        let raw: unknown;
        try {
            raw = JSON.parse(await storage.readFile(filePath));
        } catch (error: unknown) {
            throw new StateError(`Could not read ${filePath}`, { cause: error });
        }
        const parsed = ProcessedFileSchema.safeParse(raw);
        if (!parsed.success) {
            throw new StateError(`Unexpected contents in ${filePath}: ${parsed.error.message}`);
        }
        return parsed.data;
    };

    const write = async (entries: ProcessedEntries): Promise<void> => {
        await storage.writeFileAtomic(filePath, JSON.stringify(entries, null, 2) + '\n');
    };

    const has = async (filename: string): Promise<boolean> => {
        const entries = await serial(read);
        return Object.prototype.hasOwnProperty.call(entries, filename);
    };

    const mark = (filename: string, at: Date = new Date()): Promise<void> => serial(async () => {
        const entries = await read();
        entries[filename] = at.toISOString();
        await write(entries);
        logger.verbose('Marked %s as processed', filename);
    });

    const remove = (filename: string): Promise<boolean> => serial(async () => {
        const entries = await read();
        if (!Object.prototype.hasOwnProperty.call(entries, filename)) {
            return false;
        }
        delete entries[filename];
        await write(entries);
        return true;
    });

    const list = (): Promise<ProcessedEntries> => serial(read);

    return { filePath, has, mark, remove, list };
};
