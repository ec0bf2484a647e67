/**
 * CLI Entry Point
 */

import { Command } from 'commander';
import { PROGRAM_NAME, VERSION } from '../constants';
import { registerChannelCommands } from './channel';
import { addSharedOptions } from './options';
import { registerPollerCommands } from './pollers';
import { registerPublishCommand } from './publish';
import { registerRunCommands } from './run';

export const createProgram = (): Command => {
    const program = new Command();

    program
        .name(PROGRAM_NAME)
        .version(VERSION)
        .description('Turn show transcripts into titles, descriptions, teasers and articles');

    addSharedOptions(program);
    registerRunCommands(program);
    registerChannelCommands(program);
    registerPollerCommands(program);
    registerPublishCommand(program);

    program.addHelpText('after', `
Examples:
  ${PROGRAM_NAME} watch                         Process transcripts as they arrive
  ${PROGRAM_NAME} process ep12.txt --no-wait    Process one file and exit
  ${PROGRAM_NAME} test-channel --wait           Check the Slack connection
  ${PROGRAM_NAME} pollers list                  Show publish pollers
  ${PROGRAM_NAME} publish outputs/ep12_20250101_120000
`);

    return program;
};

export const runCLI = async (argv: string[] = process.argv): Promise<void> => {
    await createProgram().parseAsync(argv);
};
