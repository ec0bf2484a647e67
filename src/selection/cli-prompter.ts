/**
 * Terminal title prompter. Asks for confirmation before accepting a pick;
 * a bare `f` opens a follow-up question for feedback or a custom title.
 */

import * as readline from 'readline';
import { parseSelectionInput } from './input';
import { toTitleCase } from './title-case';
import { SelectionInput, TitleCandidateSet, TitlePrompter } from './types';

export type Ask = (question: string) => Promise<string>;

export interface CliPrompterOptions {
    /** Replaces the readline prompt, mostly for tests */
    ask?: Ask;
    write?: (text: string) => void;
}

const createReadlineAsk = (): { ask: Ask; close: () => void } => {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        terminal: true,
    });
    const ask = (question: string): Promise<string> => new Promise(resolve => {
        rl.question(question, answer => resolve(answer.trim()));
    });
    return { ask, close: () => rl.close() };
};

const write = (text: string) => process.stdout.write(text + '\n');

export const create = (options: CliPrompterOptions = {}): TitlePrompter => {
    const out = options.write ?? write;

    const askUntilAnswered = async (ask: Ask, set: TitleCandidateSet, signal?: AbortSignal): Promise<SelectionInput> => {
        const count = set.titles.length;
        for (;;) {
            if (signal?.aborted) {
                return { kind: 'cancel' };
            }

            let answer = await ask(`Select a title (1-${count}), 'f' for feedback, 'TITLE: ...' for your own, 'q' to quit: `);
            if (answer.trim().toLowerCase() === 'f') {
                const followUp = (await ask('What should change? (or TITLE: Your Title): ')).trim();
                answer = /^title:/i.test(followUp) || followUp.length === 0 ? followUp : `f ${followUp}`;
            }

            const input = parseSelectionInput(answer, count);
            if (input.kind === 'invalid') {
                out(`  ${input.reason}`);
                continue;
            }

            if (input.kind === 'select' || input.kind === 'custom') {
                const title = input.kind === 'select' ? set.titles[input.index] : toTitleCase(input.title);
                const confirmation = await ask(`Use "${title}"? (y/n): `);
                if (confirmation.trim().toLowerCase() !== 'y') {
                    continue;
                }
            }
            return input;
        }
    };

    const present = async (set: TitleCandidateSet, signal?: AbortSignal): Promise<SelectionInput> => {
        out('');
        out(set.round > 1 ? `New title options (round ${set.round}):` : 'Title options:');
        set.titles.forEach((title, index) => out(`  ${index + 1}. ${title}`));
        out('');

        if (options.ask) {
            return askUntilAnswered(options.ask, set, signal);
        }

        const terminal = createReadlineAsk();
        try {
            return await askUntilAnswered(terminal.ask, set, signal);
        } finally {
            terminal.close();
        }
    };

    return { present };
};
