/**
 * Shared flags, configuration loading and error handling for every command.
 */

import { Command } from 'commander';
import { z } from 'zod';
import { configure } from '@/arguments';
import { Config, SecureConfig } from '@/config';
import { getLogger, setLogLevel } from '@/logging';
import { PublishError } from '@/publish';

const ArgsSchema = z.object({
    configDirectory: z.string().optional(),
    watchDirectory: z.string().optional(),
    outputDirectory: z.string().optional(),
    model: z.string().optional(),
    verbose: z.boolean().optional(),
    debug: z.boolean().optional(),
    cli: z.boolean().optional(),
});

export const addSharedOptions = (program: Command): Command => program
    .option('--config-directory <dir>', 'directory holding config.yaml')
    .option('--watch-directory <dir>', 'directory to watch for transcripts')
    .option('--output-directory <dir>', 'directory for bundles and state files')
    .option('--model <model>', 'model used for generation')
    .option('--verbose', 'verbose logging')
    .option('--debug', 'debug logging')
    .option('--cli', 'always select titles in the terminal');

const applyLogLevel = (flags: { verbose?: boolean; debug?: boolean }): void => {
    if (flags.debug) {
        setLogLevel('debug');
    } else if (flags.verbose) {
        setLogLevel('verbose');
    }
};

/**
 * Merge defaults, config file and the flags given to this command (or its
 * parents).
 */
export const loadConfig = async (command: Command): Promise<[Config, SecureConfig]> => {
    const args = ArgsSchema.parse(command.optsWithGlobals());
    applyLogLevel(args);
    const [config, secure] = await configure(args);
    applyLogLevel(config);
    return [config, secure];
};

/** Abort signal fired by the first Ctrl+C */
export const interruptSignal = (): AbortSignal => {
    const controller = new AbortController();
    process.once('SIGINT', () => {
        getLogger().info('Interrupted, shutting down...');
        controller.abort();
    });
    return controller.signal;
};

export const describeError = (error: unknown): string => {
    if (error instanceof PublishError) {
        return `Publishing failed during ${error.stage}: ${error.message}`;
    }
    return error instanceof Error ? error.message : String(error);
};

export const runAction = <A extends unknown[]>(action: (...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
        try {
            await action(...args);
        } catch (error: unknown) {
            const logger = getLogger();
            logger.error('Exiting due to Error: %s', describeError(error));
            if (error instanceof Error && error.stack) {
                logger.debug('%s', error.stack);
            }
            process.exit(1);
        }
    };
