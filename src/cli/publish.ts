import * as path from 'node:path';
import { Command } from 'commander';
import { getLogger } from '@/logging';
import { findLatestBundle } from '@/output';
import { PublishError } from '@/publish';
import { createPublishing } from '@/showrunner';
import * as Storage from '@/util/storage';
import { loadConfig, runAction } from './options';

export const registerPublishCommand = (program: Command): void => {
    program
        .command('publish [bundleDir]')
        .description('Create the WordPress draft for a bundle now, e.g. to retry a failed publish (default: the newest bundle)')
        .action(runAction(async (bundleDir: string | undefined, _options: unknown, command: Command) => {
            const logger = getLogger();
            const [config, secure] = await loadConfig(command);
            const { store, publisher } = createPublishing(config, secure);

            const target = bundleDir
                ?? await findLatestBundle(config.outputDirectory, Storage.create({ log: logger.debug.bind(logger) }));
            if (!target) {
                throw new PublishError('bundle', `No bundles found in ${config.outputDirectory}`);
            }
            if (!bundleDir) {
                logger.info('Publishing the newest bundle %s', target);
            }

            const bundlePath = path.resolve(target);
            const bundleId = path.basename(bundlePath);
            const tracked = await store.get(bundleId);

            try {
                const outcome = await publisher.publish(bundlePath, tracked?.title);
                if (tracked) {
                    await store.update(bundleId, { result: { ok: true, at: new Date().toISOString(), outcome } });
                }
                logger.info('Draft created: %s', outcome.editUrl);
                logger.info('Video: %s', outcome.videoUrl);
            } catch (error: unknown) {
                if (tracked && error instanceof PublishError) {
                    await store.update(bundleId, {
                        result: { ok: false, at: new Date().toISOString(), stage: error.stage, message: error.message },
                    });
                }
                throw error;
            }
        }));
};
