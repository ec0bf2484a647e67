import { Command } from 'commander';
import { z } from 'zod';
import { ConfigError } from '@/config';
import { getLogger } from '@/logging';
import { createChannel } from '@/showrunner';
import { sleep } from '@/util/sleep';
import { interruptSignal, loadConfig, runAction } from './options';

const TestChannelOptionsSchema = z.object({
    wait: z.boolean().default(false),
});

export const registerChannelCommands = (program: Command): void => {
    program
        .command('test-channel')
        .description('Post a test message to the notification channel')
        .option('--wait', 'wait for one reply in the test thread')
        .action(runAction(async (options: unknown, command: Command) => {
            const logger = getLogger();
            const { wait } = TestChannelOptionsSchema.parse(options);
            const [config, secure] = await loadConfig(command);

            const channel = createChannel(config, secure);
            if (!channel) {
                throw new ConfigError('No notification channel. Set channel.enabled, channel.channelId and SLACK_BOT_TOKEN');
            }

            const thread = await channel.testConnection();
            logger.info('Posted a test message to %s (thread %s)', thread.channel, thread.threadTs);
            if (!wait) {
                return;
            }

            const signal = interruptSignal();
            logger.info('Waiting for a reply in the thread...');
            while (!signal.aborted) {
                const reply = await channel.pollReply(thread, thread.messageTs);
                if (reply) {
                    logger.info('Received reply: %s', reply.text);
                    await channel.post(`:wave: Got your reply: ${reply.text}`, thread);
                    return;
                }
                await sleep(config.channel.replyPollInterval * 1000, signal);
            }
        }));
};
