/**
 * Title prompter over a notification channel thread. Polls for replies at a
 * fixed interval with no timeout; the abort signal is the way out.
 */

import { getLogger } from '@/logging';
import { Messages, NotificationChannel, ThreadRef } from '../notify';
import { sleep as defaultSleep, Sleep } from '../util/sleep';
import { parseSelectionInput } from './input';
import { SelectionInput, TitleCandidateSet, TitlePrompter } from './types';

export interface ChannelPrompterConfig {
    channel: NotificationChannel;
    thread: ThreadRef;
    /** Seconds between reply polls */
    replyPollInterval: number;
    sleep?: Sleep;
}

export const create = (config: ChannelPrompterConfig): TitlePrompter => {
    const logger = getLogger();
    const sleep = config.sleep ?? defaultSleep;

    const present = async (set: TitleCandidateSet, signal?: AbortSignal): Promise<SelectionInput> => {
        const count = set.titles.length;
        const posted = await config.channel.post(Messages.titlesReady(set.titles, set.round), config.thread);
        let since = posted.messageTs;
        logger.info('Waiting for a title selection in %s...', config.channel.name);

        for (;;) {
            if (signal?.aborted) {
                return { kind: 'cancel' };
            }

            const reply = await config.channel.pollReply(config.thread, since);
            if (reply) {
                since = reply.ts;
                const input = parseSelectionInput(reply.text, count);
                if (input.kind !== 'invalid') {
                    logger.verbose('Received %s from %s', input.kind, config.channel.name);
                    return input;
                }
                logger.info('Ignoring reply "%s": %s', reply.text, input.reason);
                await config.channel.post(Messages.invalidReply(count), config.thread);
                continue;
            }

            await sleep(config.replyPollInterval * 1000, signal);
        }
    };

    return { present };
};
