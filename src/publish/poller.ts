/**
 * Publish Trigger Poller
 *
 * Watches one job thread for the publish signal (a reaction on the
 * completion message or a reply with the publish command) until the
 * deadline. The pending -> triggered transition is a compare-and-set in the
 * store, so the publisher runs at most once per bundle no matter how many
 * signals arrive or how many pollers are attached.
 */

import { POLLER_PROGRESS_EVERY } from '@/constants';
import { getLogger } from '@/logging';
import { Messages, NotificationChannel, ThreadRef } from '../notify';
import { sleep as defaultSleep, Sleep } from '../util/sleep';
import * as Store from './store';
import { Clock, PublishError, PublishOutcome, Publisher, PublishTriggerState } from './types';

export type TickResult = 'waiting' | 'cancelled' | 'superseded' | 'expired' | 'published' | 'failed';
export type RunResult = Exclude<TickResult, 'waiting'> | 'stopped';

export interface PollerConfig {
    state: PublishTriggerState;
    store: Store.Instance;
    channel: NotificationChannel;
    publisher: Publisher;
    /** Seconds between polls */
    interval: number;
    emoji: string;
    command: string;
    timeoutHours: number;
    clock?: Clock;
    sleep?: Sleep;
    signal?: AbortSignal;
}

export interface Instance {
    readonly bundleId: string;
    tick(): Promise<TickResult>;
    run(): Promise<RunResult>;
}

const formatRemaining = (ms: number): string => {
    const minutes = Math.max(0, Math.round(ms / 60000));
    return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
};

export const create = (config: PollerConfig): Instance => {
    const logger = getLogger();
    const clock = config.clock ?? (() => new Date());
    const sleep = config.sleep ?? defaultSleep;
    const { bundleId, thread, title } = config.state;
    const deadline = new Date(config.state.deadline);
    const command = config.command.trim().toLowerCase();

    // Replies at or before the completion message are not publish requests
    let replyCursor = thread.messageTs;
    let polls = 0;

    const notify = async (text: string): Promise<void> => {
        try {
            await config.channel.post(text, thread);
        } catch (error: unknown) {
            logger.warn('Could not post to the thread for %s: %s', bundleId, error instanceof Error ? error.message : String(error));
        }
    };

    const replyRequestsPublish = async (target: ThreadRef): Promise<boolean> => {
        for (;;) {
            const reply = await config.channel.pollReply(target, replyCursor);
            if (!reply) {
                return false;
            }
            replyCursor = reply.ts;
            if (reply.text.trim().toLowerCase() === command) {
                logger.info('Publish requested by reply for %s', bundleId);
                return true;
            }
        }
    };

    const signalled = async (): Promise<boolean> => {
        if (await config.channel.pollReaction(thread, config.emoji)) {
            logger.info('Publish requested by :%s: reaction for %s', config.emoji, bundleId);
            return true;
        }
        return replyRequestsPublish(thread);
    };

    const publish = async (): Promise<TickResult> => {
        await notify(Messages.publishing(title));
        let outcome: PublishOutcome;
        try {
            outcome = await config.publisher.publish(config.state.bundlePath, title);
        } catch (error: unknown) {
            const publishError = error instanceof PublishError
                ? error
                : new PublishError('post', error instanceof Error ? error.message : String(error), { cause: error });
            logger.error('Publishing %s failed during %s: %s', bundleId, publishError.stage, publishError.message);
            await config.store.update(bundleId, {
                result: { ok: false, at: clock().toISOString(), stage: publishError.stage, message: publishError.message },
            });
            await notify(Messages.publishFailed(publishError.stage, publishError.message));
            return 'failed';
        }

        logger.info('Published %s as draft %d: %s', bundleId, outcome.postId, outcome.editUrl);
        await config.store.update(bundleId, { result: { ok: true, at: clock().toISOString(), outcome } });
        await notify(Messages.published(outcome));
        return 'published';
    };

    const tick = async (): Promise<TickResult> => {
        polls += 1;

        const current = await config.store.get(bundleId);
        if (!current) {
            logger.info('Publish poller for %s was removed, stopping', bundleId);
            return 'cancelled';
        }
        if (current.status !== 'pending') {
            logger.debug('Publish poller for %s is already %s', bundleId, current.status);
            return 'superseded';
        }

        const now = clock();
        if (now.getTime() >= deadline.getTime()) {
            if (!await config.store.transition(bundleId, 'pending', 'expired', { expiredAt: now.toISOString() })) {
                return 'superseded';
            }
            logger.info('Publish poller for %s expired', bundleId);
            await notify(Messages.pollerExpired(title, config.timeoutHours));
            return 'expired';
        }

        if (!await signalled()) {
            if (polls % POLLER_PROGRESS_EVERY === 0) {
                logger.info('Still waiting to publish %s (%s left)', bundleId, formatRemaining(deadline.getTime() - now.getTime()));
            }
            return 'waiting';
        }

        if (!await config.store.transition(bundleId, 'pending', 'triggered', { triggeredAt: now.toISOString() })) {
            logger.info('Publish for %s was already triggered elsewhere', bundleId);
            return 'superseded';
        }
        return publish();
    };

    const run = async (): Promise<RunResult> => {
        logger.verbose('Publish poller for %s started, deadline %s', bundleId, config.state.deadline);
        for (;;) {
            if (config.signal?.aborted) {
                return 'stopped';
            }
            let result: TickResult;
            try {
                result = await tick();
            } catch (error: unknown) {
                // State file trouble is treated as "no event yet" and retried next interval
                logger.error('Publish poller for %s could not check its state: %s', bundleId, error instanceof Error ? error.message : String(error));
                result = 'waiting';
            }
            if (result !== 'waiting') {
                return result;
            }
            await sleep(config.interval * 1000, config.signal);
        }
    };

    return { bundleId, tick, run };
};
