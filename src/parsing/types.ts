/**
 * Response Parsing Types
 */

import type { StepKind } from '../generation/types';

export type ParseWarningCode = 'missing_field' | 'incomplete_keywords';

/**
 * A non-fatal problem found while parsing a model response. Warnings are
 * logged, surfaced in the completion message and stored with the bundle.
 */
export interface ParseWarning {
    code: ParseWarningCode;
    field: string;
    message: string;
}

export interface TitleFields {
    titles: string[];
}

export interface DescriptionFields {
    hook: string;
    keyTopics: string;
    timestamps: string;
    panelists: string;
    keywords: string;
}

export interface TeaserFields {
    teaser: string;
}

export interface ArticleFields {
    article: string;
}

export interface StepFields {
    titles: TitleFields;
    description: DescriptionFields;
    teaser: TeaserFields;
    article: ArticleFields;
}

export interface GenerationResult<F extends object> {
    step: StepKind;
    raw: string;
    fields: F;
    present: Record<keyof F, boolean>;
    warnings: ParseWarning[];
}
