/**
 * Output Bundle Types
 */

import type { Utility } from '../util/storage';
import type {
    ArticleFields,
    DescriptionFields,
    GenerationResult,
    TeaserFields,
    TitleFields,
} from '../parsing/types';

export interface OutputConfig {
    outputDirectory: string;
    articleHeadlinePrefix: string;
    /** Path to a description template; the built-in one is used when absent */
    descriptionTemplate?: string;
    storage?: Utility;
}

export interface BundleInput {
    /** Transcript filename the bundle was generated from */
    source: string;
    title: string;
    /** Every title round, oldest first */
    titleRounds: GenerationResult<TitleFields>[];
    description: GenerationResult<DescriptionFields>;
    teaser: GenerationResult<TeaserFields>;
    article: GenerationResult<ArticleFields>;
    createdAt: Date;
}

export interface EpisodeOutputBundle {
    id: string;
    path: string;
    createdAt: Date;
    title: string;
    files: string[];
}

export class BundleError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'BundleError';
    }
}
