/**
 * Title Selection Types
 */

export type SelectionState = 'GENERATING' | 'PRESENTED' | 'REGENERATING' | 'CONFIRMED' | 'CANCELLED';

export interface TitleCandidateSet {
    titles: string[];
    /** Feedback that produced this set, if it came from a regeneration */
    feedback?: string;
    /** 1 for the first set, incremented on every regeneration */
    round: number;
}

export type SelectionInput =
    | { kind: 'select'; index: number }
    | { kind: 'custom'; title: string }
    | { kind: 'feedback'; feedback: string }
    | { kind: 'cancel' }
    | { kind: 'invalid'; reason: string };

/**
 * Shows a candidate set to the operator and returns their answer.
 * Implementations re-ask on their own when they can; an `invalid` answer
 * makes the machine present the same set again.
 */
export interface TitlePrompter {
    present(set: TitleCandidateSet, signal?: AbortSignal): Promise<SelectionInput>;
}

export type SelectionOutcome =
    | { status: 'confirmed'; title: string; rounds: number }
    | { status: 'cancelled'; rounds: number };

export interface Transition {
    from: SelectionState;
    to: SelectionState;
    set?: TitleCandidateSet;
    feedback?: string;
    title?: string;
}

export interface MachineConfig {
    /** Produce a fresh candidate list; feedback is only ever the latest round's */
    generateTitles(feedback?: string): Promise<string[]>;
    prompter: TitlePrompter;
    signal?: AbortSignal;
    onTransition?(transition: Transition): Promise<void> | void;
}
