/**
 * Run Coordinator
 *
 * Takes one transcript from discovery to a written bundle:
 * selection, description, teaser, article, bundle, processed mark and
 * finally the hand-off to a publish poller. Jobs run strictly one at a
 * time in call order.
 */

import * as Logging from '../logging';
import { GenerationContext } from '../generation/types';
import { Messages, ThreadRef } from '../notify';
import type { EpisodeOutputBundle } from '../output';
import { parseArticle, parseDescription, parseTeaser, parseTitles } from '../parsing';
import type { GenerationResult, ParseWarning, TitleFields } from '../parsing/types';
import type { PollerSupervisor } from '../publish';
import type { PublishTriggerState } from '../publish/types';
import * as Selection from '../selection';
import type { TitlePrompter, Transition } from '../selection/types';
import * as Dates from '../util/dates';
import { createSerial } from '../util/serial';
import { CoordinatorConfig, RunResult, TranscriptJob } from './types';

export interface Instance {
    process(job: TranscriptJob): Promise<RunResult>;
    inFlight(): string[];
}

const toError = (error: unknown): Error => error instanceof Error ? error : new Error(String(error));

export const create = (config: CoordinatorConfig): Instance => {
    const logger = Logging.getLogger();
    const clock = config.clock ?? (() => new Date());
    const serial = createSerial();
    const pending = new Set<string>();

    const logWarnings = (warnings: ParseWarning[]): void => {
        for (const warning of warnings) {
            logger.warn('%s', warning.message);
        }
    };

    /** Post to the job thread when there is one, otherwise log the text */
    const createNotifier = (thread?: ThreadRef) => async (text: string): Promise<ThreadRef | undefined> => {
        if (!config.channel || !thread) {
            logger.info('%s', text);
            return undefined;
        }
        try {
            return await config.channel.post(text, thread);
        } catch (error: unknown) {
            logger.warn('Could not post to %s: %s', config.channel.name, toError(error).message);
            return undefined;
        }
    };

    const createPrompter = (thread?: ThreadRef): TitlePrompter => {
        if (config.channel && thread) {
            return Selection.createChannelPrompter({
                channel: config.channel,
                thread,
                replyPollInterval: config.replyPollInterval,
                sleep: config.sleep,
            });
        }
        return config.prompter ?? Selection.createCliPrompter();
    };

    /** Bind a pending publish state to the completion message and start its poller */
    const handOff = async (
        bundle: EpisodeOutputBundle,
        completion: ThreadRef,
        supervisor: PollerSupervisor,
    ): Promise<PublishTriggerState> => {
        const createdAt = clock();
        const state: PublishTriggerState = {
            bundleId: bundle.id,
            bundlePath: bundle.path,
            title: bundle.title,
            thread: completion,
            createdAt: createdAt.toISOString(),
            deadline: Dates.addHours(createdAt, config.poller.timeoutHours).toISOString(),
            status: 'pending',
        };
        await supervisor.start(state);
        return state;
    };

    const run = async (job: TranscriptJob): Promise<RunResult> => {
        if (await config.processed.has(job.filename)) {
            logger.info('Skipping %s, already processed', job.filename);
            return { status: 'skipped', filename: job.filename, reason: 'processed' };
        }

        logger.info('Processing transcript %s (%d characters)', job.filename, job.text.length);

        let thread: ThreadRef | undefined;
        const context: GenerationContext = {
            transcript: job.text,
            showName: config.showName,
            today: Dates.isoDay(clock()),
            examples: config.examples,
        };

        try {
            if (config.channel) {
                thread = await config.channel.post(Messages.started(job.filename));
            }
            const notify = createNotifier(thread);

            const titleRounds: GenerationResult<TitleFields>[] = [];
            const machine = Selection.create({
                generateTitles: async (feedback?: string) => {
                    const result = parseTitles(await config.generator.generate('titles', { ...context, feedback }));
                    logWarnings(result.warnings);
                    titleRounds.push(result);
                    return result.fields.titles;
                },
                prompter: createPrompter(thread),
                signal: config.signal,
                onTransition: async (transition: Transition) => {
                    if (transition.to === 'REGENERATING' && transition.feedback) {
                        await notify(Messages.regenerating(transition.feedback));
                    } else if (transition.to === 'CONFIRMED' && transition.title) {
                        await notify(Messages.selectionConfirmed(transition.title));
                    }
                },
            });

            const outcome = await machine.run();
            if (outcome.status === 'cancelled') {
                logger.info('Title selection for %s cancelled after %d round(s)', job.filename, outcome.rounds);
                await notify(Messages.cancelled(job.filename));
                return { status: 'cancelled', filename: job.filename };
            }

            const title = outcome.title;
            logger.info('Selected title: %s', title);

            const description = parseDescription(await config.generator.generate('description', { ...context, title }));
            const hook = description.present.hook ? description.fields.hook : undefined;
            const teaser = parseTeaser(await config.generator.generate('teaser', { ...context, title, hook }));
            const article = parseArticle(await config.generator.generate('article', {
                ...context,
                title,
                hook,
                teaser: teaser.present.teaser ? teaser.fields.teaser : undefined,
            }));

            const warnings = [...description.warnings, ...teaser.warnings, ...article.warnings];
            logWarnings(warnings);

            const bundle = await config.output.writeBundle({
                source: job.filename,
                title,
                titleRounds,
                description,
                teaser,
                article,
                createdAt: clock(),
            });

            await config.processed.mark(job.filename, clock());

            let publishState: PublishTriggerState | undefined;
            if (config.channel && thread && config.supervisor) {
                try {
                    const completion = await config.channel.post(
                        Messages.completed(job.filename, bundle.path, warnings, config.poller),
                        thread,
                    );
                    publishState = await handOff(bundle, completion, config.supervisor);
                } catch (error: unknown) {
                    const message = toError(error).message;
                    logger.error('Could not start the publish poller for %s: %s', bundle.id, message);
                    await notify(Messages.publishUnavailable(bundle.path, message));
                }
            } else {
                await notify(Messages.completed(job.filename, bundle.path, warnings));
            }

            return { status: 'completed', filename: job.filename, bundle, warnings, publishState };
        } catch (error: unknown) {
            const failure = toError(error);
            logger.error('Failed to process %s: %s', job.filename, failure.message);
            await createNotifier(thread)(Messages.failed(job.filename, failure.message));
            return { status: 'failed', filename: job.filename, error: failure };
        }
    };

    const process = async (job: TranscriptJob): Promise<RunResult> => {
        if (pending.has(job.filename)) {
            logger.warn('%s is already queued, ignoring', job.filename);
            return { status: 'skipped', filename: job.filename, reason: 'in-flight' };
        }
        pending.add(job.filename);
        try {
            return await serial(() => run(job));
        } finally {
            pending.delete(job.filename);
        }
    };

    return {
        process,
        inFlight: () => [...pending],
    };
};
