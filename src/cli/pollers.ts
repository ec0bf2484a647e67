/* eslint-disable no-console */
import { Command } from 'commander';
import { ConfigError } from '@/config';
import { getLogger } from '@/logging';
import type { PublishTriggerState } from '@/publish';
import { createChannel, createPollerSupervisor, createPublishing } from '@/showrunner';
import { interruptSignal, loadConfig, runAction } from './options';

export const formatState = (state: PublishTriggerState): string => {
    const columns = [state.bundleId, state.status, `deadline ${state.deadline}`];
    const result = state.result;
    if (result && result.ok) {
        columns.push(`draft ${result.outcome.editUrl}`);
    } else if (result) {
        columns.push(`failed during ${result.stage}: ${result.message}`);
    }
    return columns.join('  ');
};

export const registerPollerCommands = (program: Command): void => {
    const pollers = program
        .command('pollers')
        .description('Inspect and reattach publish pollers');

    pollers
        .command('list')
        .description('List persisted publish pollers')
        .action(runAction(async (_options: unknown, command: Command) => {
            const [config, secure] = await loadConfig(command);
            const { store } = createPublishing(config, secure);
            const states = await store.list();
            if (states.length === 0) {
                console.log('No publish pollers.');
                return;
            }
            for (const state of states) {
                console.log(formatState(state));
            }
        }));

    pollers
        .command('resume')
        .description('Resume every pending publish poller and wait for them')
        .action(runAction(async (_options: unknown, command: Command) => {
            const logger = getLogger();
            const [config, secure] = await loadConfig(command);
            const channel = createChannel(config, secure);
            if (!channel) {
                throw new ConfigError('Publish pollers need a notification channel. Set channel.enabled, channel.channelId and SLACK_BOT_TOKEN');
            }

            const { store, publisher } = createPublishing(config, secure);
            const supervisor = createPollerSupervisor(config, channel, store, publisher);
            const signal = interruptSignal();
            signal.addEventListener('abort', () => supervisor.stopAll(), { once: true });

            if (await supervisor.resume() === 0) {
                logger.info('No pending publish pollers.');
                return;
            }
            const results = await supervisor.waitForAll();
            for (const [bundleId, result] of results) {
                logger.info('%s: %s', bundleId, result);
            }
        }));
};
