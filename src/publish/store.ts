/**
 * Poller Store
 *
 * Persists Publish Trigger States in one JSON file keyed by bundle id.
 * Every mutation is a read-modify-write done under an in-process queue and
 * written with temp file + rename, so a status check and its update are
 * never interleaved with another poller's.
 */

import * as path from 'node:path';
import { z } from 'zod';
import { POLLER_STATE_FILE_NAME } from '@/constants';
import { getLogger } from '@/logging';
import { StateError } from '../state';
import { createSerial } from '@/util/serial';
import * as Storage from '@/util/storage';
import { PublishStatus, PublishTriggerState } from './types';

const ThreadRefSchema = z.object({
    channel: z.string(),
    threadTs: z.string(),
    messageTs: z.string(),
});

const PublishOutcomeSchema = z.object({
    postId: z.number(),
    postUrl: z.string(),
    editUrl: z.string(),
    videoUrl: z.string(),
    videoTitle: z.string(),
});

const PublishResultSchema = z.discriminatedUnion('ok', [
    z.object({ ok: z.literal(true), at: z.string(), outcome: PublishOutcomeSchema }),
    z.object({
        ok: z.literal(false),
        at: z.string(),
        stage: z.enum(['configuration', 'bundle', 'video', 'connection', 'category', 'media', 'post']),
        message: z.string(),
    }),
]);

export const PublishTriggerStateSchema = z.object({
    bundleId: z.string(),
    bundlePath: z.string(),
    title: z.string(),
    thread: ThreadRefSchema,
    createdAt: z.string(),
    deadline: z.string(),
    status: z.enum(['pending', 'triggered', 'expired']),
    triggeredAt: z.string().optional(),
    expiredAt: z.string().optional(),
    result: PublishResultSchema.optional(),
});

const StateFileSchema = z.record(z.string(), PublishTriggerStateSchema);

type StateFile = Record<string, PublishTriggerState>;

export type StatePatch = Partial<Pick<PublishTriggerState, 'triggeredAt' | 'expiredAt' | 'result'>>;

export interface Instance {
    readonly filePath: string;
    create(state: PublishTriggerState): Promise<void>;
    get(bundleId: string): Promise<PublishTriggerState | undefined>;
    list(): Promise<PublishTriggerState[]>;
    remove(bundleId: string): Promise<boolean>;
    /** Compare-and-set on status; false when the current status is not `from` */
    transition(bundleId: string, from: PublishStatus, to: PublishStatus, patch?: StatePatch): Promise<boolean>;
    update(bundleId: string, patch: StatePatch): Promise<boolean>;
}

export interface StoreConfig {
    directory: string;
    storage?: Storage.Utility;
}

export const create = (config: StoreConfig): Instance => {
    const logger = getLogger();
    const storage = config.storage ?? Storage.create({ log: logger.debug.bind(logger) });
    const filePath = path.join(config.directory, POLLER_STATE_FILE_NAME);
    const serial = createSerial();

    const read = async (): Promise<StateFile> => {
        if (!await storage.exists(filePath)) {
            return {};
        }
        let raw: unknown;
        try {
            raw = JSON.parse(await storage.readFile(filePath));
        } catch (error: unknown) {
            throw new StateError(`Could not read ${filePath}`, { cause: error });
        }
        const parsed = StateFileSchema.safeParse(raw);
        if (!parsed.success) {
            throw new StateError(`Unexpected contents in ${filePath}: ${parsed.error.message}`);
        }
        return parsed.data;
    };

    const write = async (states: StateFile): Promise<void> => {
        await storage.writeFileAtomic(filePath, JSON.stringify(states, null, 2) + '\n');
    };

    const add = (state: PublishTriggerState): Promise<void> => serial(async () => {
        const states = await read();
        if (states[state.bundleId]) {
            throw new StateError(`A publish poller for ${state.bundleId} already exists`);
        }
        states[state.bundleId] = state;
        await write(states);
    });

    const get = (bundleId: string): Promise<PublishTriggerState | undefined> =>
        serial(async () => (await read())[bundleId]);

    const list = (): Promise<PublishTriggerState[]> =>
        serial(async () => Object.values(await read()).sort((a, b) => a.createdAt.localeCompare(b.createdAt)));

    const remove = (bundleId: string): Promise<boolean> => serial(async () => {
        const states = await read();
        if (!states[bundleId]) {
            return false;
        }
        delete states[bundleId];
        await write(states);
        return true;
    });

    const transition = (bundleId: string, from: PublishStatus, to: PublishStatus, patch: StatePatch = {}): Promise<boolean> =>
        serial(async () => {
            const states = await read();
            const current = states[bundleId];
            if (!current || current.status !== from) {
                logger.debug('Refusing %s -> %s for %s (currently %s)', from, to, bundleId, current?.status ?? 'missing');
                return false;
            }
            states[bundleId] = { ...current, ...patch, status: to };
            await write(states);
            return true;
        });

    const update = (bundleId: string, patch: StatePatch): Promise<boolean> => serial(async () => {
        const states = await read();
        const current = states[bundleId];
        if (!current) {
            return false;
        }
        states[bundleId] = { ...current, ...patch };
        await write(states);
        return true;
    });

    return { filePath, create: add, get, list, remove, transition, update };
};
