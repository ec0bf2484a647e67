/**
 * Content Generation Types
 */

export type StepKind = 'titles' | 'description' | 'teaser' | 'article';

export interface GenerationContext {
    transcript: string;
    showName: string;
    /** ISO date (YYYY-MM-DD) injected so the model does not assume a stale year */
    today: string;
    /** Latest operator feedback; only ever the most recent round */
    feedback?: string;
    /** Confirmed title, required by every step after titles */
    title?: string;
    /** Hook from the description step, reused verbatim by later steps */
    hook?: string;
    /** Teaser text, reused verbatim by the article step */
    teaser?: string;
    /** Newsletter examples for style matching */
    examples?: string;
}

export interface GenerationConfig {
    model: string;
    apiKey?: string;
    /** Overrides of the per-step completion budgets */
    tokenBudgets?: Partial<Record<StepKind, number>>;
}

export class GenerationError extends Error {
    readonly step: StepKind;

    constructor(step: StepKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'GenerationError';
        this.step = step;
    }
}
