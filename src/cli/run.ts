import { Command } from 'commander';
import { z } from 'zod';
import { getLogger } from '@/logging';
import { createRuntime, processFile, watch } from '@/showrunner';
import { interruptSignal, loadConfig, runAction } from './options';

const ProcessOptionsSchema = z.object({
    wait: z.boolean().default(true),
});

export const registerRunCommands = (program: Command): void => {
    program
        .command('watch')
        .description('Watch the transcript folder and process new files one at a time')
        .action(runAction(async (_options: unknown, command: Command) => {
            const [config, secure] = await loadConfig(command);
            const signal = interruptSignal();
            const runtime = await createRuntime(config, secure, { signal });
            await watch(runtime, signal);
        }));

    program
        .command('process <file>')
        .description('Process a single transcript')
        .option('--no-wait', 'do not wait for the publish trigger after the bundle is written')
        .action(runAction(async (file: string, options: unknown, command: Command) => {
            const { wait } = ProcessOptionsSchema.parse(options);
            const [config, secure] = await loadConfig(command);
            const signal = interruptSignal();
            const runtime = await createRuntime(config, secure, { signal });
            const result = await processFile(runtime, file, wait);
            getLogger().info('%s: %s', result.filename, result.status);
        }));
};
