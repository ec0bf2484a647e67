/**
 * Poller Supervisor
 *
 * Owns the running publish pollers: one independent task per bundle,
 * started when a bundle is written or reattached from the store after a
 * restart.
 */

import { getLogger } from '@/logging';
import type { NotificationChannel } from '../notify';
import type { Sleep } from '../util/sleep';
import * as Poller from './poller';
import * as Store from './store';
import { Clock, Publisher, PublishTriggerState } from './types';

export interface SupervisorConfig {
    store: Store.Instance;
    channel: NotificationChannel;
    publisher: Publisher;
    interval: number;
    emoji: string;
    command: string;
    timeoutHours: number;
    clock?: Clock;
    sleep?: Sleep;
}

export interface Instance {
    /** Persist a new pending state and start polling for it */
    start(state: PublishTriggerState): Promise<void>;
    /** Reattach every pending state in the store; returns how many were started */
    resume(): Promise<number>;
    active(): string[];
    waitForAll(): Promise<Map<string, Poller.RunResult>>;
    /** Abort every running poller; persisted states stay pending */
    stopAll(): void;
}

interface Handle {
    controller: AbortController;
    done: Promise<Poller.RunResult>;
}

export const create = (config: SupervisorConfig): Instance => {
    const logger = getLogger();
    const handles = new Map<string, Handle>();
    const results = new Map<string, Poller.RunResult>();

    const attach = (state: PublishTriggerState): void => {
        if (handles.has(state.bundleId)) {
            logger.debug('Publish poller for %s is already running', state.bundleId);
            return;
        }
        const controller = new AbortController();
        const poller = Poller.create({
            state,
            store: config.store,
            channel: config.channel,
            publisher: config.publisher,
            interval: config.interval,
            emoji: config.emoji,
            command: config.command,
            timeoutHours: config.timeoutHours,
            clock: config.clock,
            sleep: config.sleep,
            signal: controller.signal,
        });
        const done = poller.run().then(result => {
            results.set(state.bundleId, result);
            handles.delete(state.bundleId);
            logger.verbose('Publish poller for %s finished: %s', state.bundleId, result);
            return result;
        });
        handles.set(state.bundleId, { controller, done });
    };

    const start = async (state: PublishTriggerState): Promise<void> => {
        await config.store.create(state);
        attach(state);
        logger.info('Waiting up to %d hours for a publish request for %s', config.timeoutHours, state.bundleId);
    };

    const resume = async (): Promise<number> => {
        const pending = (await config.store.list()).filter(state => state.status === 'pending');
        for (const state of pending) {
            attach(state);
        }
        if (pending.length > 0) {
            logger.info('Resumed %d publish poller(s)', pending.length);
        }
        return pending.length;
    };

    const waitForAll = async (): Promise<Map<string, Poller.RunResult>> => {
        while (handles.size > 0) {
            await Promise.all([...handles.values()].map(handle => handle.done));
        }
        return new Map(results);
    };

    const stopAll = (): void => {
        for (const handle of handles.values()) {
            handle.controller.abort();
        }
    };

    return {
        start,
        resume,
        active: () => [...handles.keys()],
        waitForAll,
        stopAll,
    };
};
