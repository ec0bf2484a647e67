/**
 * Title Selection State Machine
 *
 * GENERATING -> PRESENTED -> { REGENERATING -> PRESENTED, CONFIRMED, CANCELLED }
 *
 * The machine never presents an empty set: a generation that yields no
 * titles fails the selection with a GenerationError.
 */

import { getLogger } from '@/logging';
import { GenerationError } from '../generation/types';
import { toTitleCase } from './title-case';
import {
    MachineConfig,
    SelectionOutcome,
    SelectionState,
    TitleCandidateSet,
    Transition,
} from './types';

export interface Instance {
    run(): Promise<SelectionOutcome>;
    getState(): SelectionState;
}

export const create = (config: MachineConfig): Instance => {
    const logger = getLogger();
    let state: SelectionState = 'GENERATING';

    const moveTo = async (to: SelectionState, detail: Omit<Transition, 'from' | 'to'> = {}): Promise<void> => {
        const from = state;
        state = to;
        logger.debug('Title selection %s -> %s', from, to);
        await config.onTransition?.({ from, to, ...detail });
    };

    const generate = async (feedback?: string): Promise<string[]> => {
        const titles = await config.generateTitles(feedback);
        if (titles.length === 0) {
            throw new GenerationError('titles', 'The model returned no title candidates');
        }
        return titles;
    };

    const run = async (): Promise<SelectionOutcome> => {
        let set: TitleCandidateSet = { titles: await generate(), round: 1 };

        for (;;) {
            await moveTo('PRESENTED', { set });
            if (config.signal?.aborted) {
                await moveTo('CANCELLED');
                return { status: 'cancelled', rounds: set.round };
            }

            const input = await config.prompter.present(set, config.signal);
            switch (input.kind) {
                case 'select': {
                    const title = set.titles[input.index];
                    if (title === undefined) {
                        logger.warn('Selection %d is out of range, presenting the titles again', input.index + 1);
                        continue;
                    }
                    await moveTo('CONFIRMED', { title });
                    return { status: 'confirmed', title, rounds: set.round };
                }
                case 'custom': {
                    const title = toTitleCase(input.title);
                    await moveTo('CONFIRMED', { title });
                    return { status: 'confirmed', title, rounds: set.round };
                }
                case 'feedback': {
                    await moveTo('REGENERATING', { feedback: input.feedback });
                    set = { titles: await generate(input.feedback), feedback: input.feedback, round: set.round + 1 };
                    break;
                }
                case 'cancel': {
                    await moveTo('CANCELLED');
                    return { status: 'cancelled', rounds: set.round };
                }
                case 'invalid': {
                    logger.info('%s', input.reason);
                    break;
                }
            }
        }
    };

    return {
        run,
        getState: () => state,
    };
};
