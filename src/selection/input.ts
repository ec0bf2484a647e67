import { SelectionInput } from './types';

const CANCEL_WORDS = new Set(['q', 'quit', 'cancel']);

const invalid = (reason: string): SelectionInput => ({ kind: 'invalid', reason });

/**
 * Interpret one operator answer against a set of `count` candidates.
 */
export const parseSelectionInput = (text: string, count: number): SelectionInput => {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
        return invalid('Empty response');
    }

    const lower = trimmed.toLowerCase();
    if (CANCEL_WORDS.has(lower)) {
        return { kind: 'cancel' };
    }

    if (/^\d+$/.test(trimmed)) {
        const choice = Number.parseInt(trimmed, 10);
        if (choice < 1 || choice > count) {
            return invalid(`Choose a number between 1 and ${count}`);
        }
        return { kind: 'select', index: choice - 1 };
    }

    const custom = trimmed.match(/^title:(.*)$/is);
    if (custom) {
        const title = custom[1].trim();
        return title.length > 0 ? { kind: 'custom', title } : invalid('Custom title is empty');
    }

    if (lower === 'f') {
        return invalid('Feedback is empty');
    }

    const feedback = trimmed.match(/^f\s+(.+)$/is);
    return { kind: 'feedback', feedback: feedback ? feedback[1].trim() : trimmed };
};
