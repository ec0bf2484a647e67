/**
 * Runtime assembly
 *
 * Builds the collaborators a command needs from the merged configuration
 * and runs the long-lived loops (watch, one-shot processing).
 */

import * as path from 'node:path';
import { Config, ConfigError, SecureConfig } from '@/config';
import { getLogger } from '@/logging';
import * as Generation from '@/generation';
import { createSlack, NotificationChannel } from '@/notify';
import * as Output from '@/output';
import * as Locate from '@/phases/locate';
import * as Pipeline from '@/pipeline';
import {
    createPublisher,
    createStore,
    createSupervisor,
    HttpFetch,
    PollerStore,
    PollerSupervisor,
    Publisher,
} from '@/publish';
import type { TitlePrompter } from '@/selection';
import { createProcessedSet, ProcessedSet } from '@/state';
import { sleep as defaultSleep, Sleep } from '@/util/sleep';
import * as Storage from '@/util/storage';

export interface Runtime {
    config: Config;
    channel?: NotificationChannel;
    processed: ProcessedSet;
    store: PollerStore;
    publisher: Publisher;
    /** Present when a channel is active and publishing is enabled */
    supervisor?: PollerSupervisor;
    coordinator: Pipeline.Instance;
    locator: Locate.Instance;
}

export interface RuntimeOptions {
    signal?: AbortSignal;
    /** Replaces the Slack client, mainly for tests */
    channel?: NotificationChannel;
    generator?: Generation.Instance;
    prompter?: TitlePrompter;
    fetch?: HttpFetch;
    sleep?: Sleep;
    storage?: Storage.Utility;
}

/**
 * The configured notification channel, or undefined when selection should
 * happen in the terminal.
 */
export const createChannel = (config: Config, secure: SecureConfig): NotificationChannel | undefined => {
    const logger = getLogger();
    if (!config.channel.enabled || config.forceCli) {
        return undefined;
    }
    if (!secure.slackBotToken) {
        logger.warn('Slack is enabled but SLACK_BOT_TOKEN is not set, selecting titles in the terminal');
        return undefined;
    }
    if (!config.channel.channelId) {
        logger.warn('Slack is enabled but channel.channelId is empty, selecting titles in the terminal');
        return undefined;
    }
    return createSlack({ botToken: secure.slackBotToken, channelId: config.channel.channelId });
};

export const createPublishing = (config: Config, secure: SecureConfig, options: RuntimeOptions = {}) => {
    const store = createStore({ directory: config.outputDirectory, storage: options.storage });
    const publisher = createPublisher({ publish: config.publish, secure, fetch: options.fetch, storage: options.storage });
    return { store, publisher };
};

export const createPollerSupervisor = (
    config: Config,
    channel: NotificationChannel,
    store: PollerStore,
    publisher: Publisher,
    options: RuntimeOptions = {},
): PollerSupervisor => createSupervisor({
    store,
    channel,
    publisher,
    interval: config.poller.interval,
    emoji: config.poller.emoji,
    command: config.poller.command,
    timeoutHours: config.poller.timeoutHours,
    sleep: options.sleep,
});

const readExamples = async (storage: Storage.Utility, examplesFile?: string): Promise<string | undefined> => {
    if (!examplesFile) {
        return undefined;
    }
    if (!await storage.exists(examplesFile)) {
        getLogger().warn('Examples file %s not found, writing without examples', examplesFile);
        return undefined;
    }
    const examples = (await storage.readFile(examplesFile)).trim();
    return examples.length > 0 ? examples : undefined;
};

export const createRuntime = async (config: Config, secure: SecureConfig, options: RuntimeOptions = {}): Promise<Runtime> => {
    const logger = getLogger();
    const storage = options.storage ?? Storage.create({ log: logger.debug.bind(logger) });

    if (!options.generator && !secure.openaiApiKey) {
        throw new ConfigError('OPENAI_API_KEY environment variable is not set');
    }
    const generator = options.generator ?? Generation.create({ model: config.model, apiKey: secure.openaiApiKey });

    await storage.createDirectory(config.outputDirectory);

    const channel = options.channel ?? createChannel(config, secure);
    const processed = createProcessedSet({ directory: config.outputDirectory, storage });
    const { store, publisher } = createPublishing(config, secure, { ...options, storage });

    let supervisor: PollerSupervisor | undefined;
    if (channel && config.publish.enabled) {
        supervisor = createPollerSupervisor(config, channel, store, publisher, options);
    } else if (config.publish.enabled) {
        logger.warn('Publishing is enabled but there is no notification channel to trigger it from');
    }

    const coordinator = Pipeline.create({
        generator,
        output: Output.create({
            outputDirectory: config.outputDirectory,
            articleHeadlinePrefix: config.articleHeadlinePrefix,
            descriptionTemplate: config.descriptionTemplate,
            storage,
        }),
        processed,
        showName: config.showName,
        examples: await readExamples(storage, config.examplesFile),
        channel,
        replyPollInterval: config.channel.replyPollInterval,
        prompter: options.prompter,
        supervisor,
        poller: config.poller,
        sleep: options.sleep,
        signal: options.signal,
    });

    const locator = Locate.create({
        watchDirectory: config.watchDirectory,
        extensions: config.extensions,
        exclude: [config.descriptionTemplate, config.examplesFile].filter((file): file is string => !!file),
        processed,
        storage,
    });

    logger.verbose('Titles are selected in %s', channel ? channel.name : 'the terminal');
    return { config, channel, processed, store, publisher, supervisor, coordinator, locator };
};

/**
 * Scan the watch directory until the signal aborts. Files that fail or are
 * cancelled are not picked up again until the next start.
 */
export const watch = async (runtime: Runtime, signal: AbortSignal, sleep: Sleep = defaultSleep): Promise<void> => {
    const logger = getLogger();
    const { config } = runtime;
    const sessionSkip = new Set<string>();

    await runtime.supervisor?.resume();
    logger.info('Watching %s for %s every %d seconds', config.watchDirectory, config.extensions.join(', '), config.watchInterval);

    while (!signal.aborted) {
        try {
            const jobs = await runtime.locator.locate(sessionSkip);
            for (const job of jobs) {
                if (signal.aborted) {
                    break;
                }
                const result = await runtime.coordinator.process(job);
                if (result.status === 'failed' || result.status === 'cancelled') {
                    sessionSkip.add(job.filename);
                }
            }
        } catch (error: unknown) {
            logger.error('Scan of %s failed: %s', config.watchDirectory, error instanceof Error ? error.message : String(error));
        }
        await sleep(config.watchInterval * 1000, signal);
    }

    logger.info('Stopping. Pending publish pollers are kept and resume on the next start.');
    runtime.supervisor?.stopAll();
    await runtime.supervisor?.waitForAll();
};

/**
 * Process one file. With `wait`, stays until its publish poller finishes.
 */
export const processFile = async (runtime: Runtime, filePath: string, wait: boolean): Promise<Pipeline.RunResult> => {
    const logger = getLogger();
    const job = await runtime.locator.read(path.resolve(filePath));
    const result = await runtime.coordinator.process(job);

    if (result.status === 'failed') {
        throw result.error;
    }
    if (result.status === 'completed' && result.publishState && runtime.supervisor) {
        if (wait) {
            logger.info('Waiting for a publish request. Press Ctrl+C to stop; the poller resumes with "pollers resume".');
            await runtime.supervisor.waitForAll();
        } else {
            runtime.supervisor.stopAll();
            await runtime.supervisor.waitForAll();
            logger.info('Publish poller saved; run "pollers resume" to wait for the trigger');
        }
    }
    return result;
};
