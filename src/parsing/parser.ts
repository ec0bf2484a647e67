/**
 * Response Parser
 *
 * Turns raw model text into typed fields. Each step has strict primary
 * anchors (the headers the prompts ask for) and a tolerant fallback for
 * responses that decorate or re-case them. A field that cannot be found is
 * returned empty with a warning; nothing is ever filled in.
 */

import { MAX_TITLE_CANDIDATES } from '@/constants';
import type { StepKind } from '../generation/types';
import { stripMarkup, stripWrappingQuotes } from './markup';
import {
    ArticleFields,
    DescriptionFields,
    GenerationResult,
    ParseWarning,
    StepFields,
    TeaserFields,
    TitleFields,
} from './types';

const MIN_KEYWORD_ITEMS = 3;
const MIN_KEYWORDS_LENGTH = 15;

const missingField = (field: string): ParseWarning => ({
    code: 'missing_field',
    field,
    message: `No ${field} found in the response`,
});

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// Header with optional heading hashes and bold/underline around the name or colon
const decoratedHeader = (name: string): RegExp => {
    const words = name.split(/[ _]/).map(escapeRegExp).join('[ _]');
    return new RegExp(`^[ \\t]*(?:#{1,6}[ \\t]*)?(?:\\*\\*|__)?[ \\t]*${words}[ \\t]*(?:\\*\\*|__)?[ \\t]*:[ \\t]*(?:\\*\\*|__)?`, 'im');
};

interface HeaderMatch {
    start: number;
    contentStart: number;
}

const findHeader = (raw: string, primary: RegExp, fallback: RegExp): HeaderMatch | undefined => {
    const match = raw.match(primary) ?? raw.match(fallback);
    if (!match || match.index === undefined) {
        return undefined;
    }
    return { start: match.index, contentStart: match.index + match[0].length };
};

// Titles

const PRIMARY_TITLE = /^[ \t]*(?:\*\*)?TITLE[ \t]*\d+[ \t]*:(?:\*\*)?[ \t]*(.+)$/gm;
const NUMBERED_TITLE = /^[ \t]*\d+[.)][ \t]+(.+)$/gm;

const cleanTitle = (title: string): string => stripWrappingQuotes(stripMarkup(title).trim());

export const parseTitles = (raw: string): GenerationResult<TitleFields> => {
    let lines = [...raw.matchAll(PRIMARY_TITLE)].map(match => match[1]);
    if (lines.length === 0) {
        lines = [...raw.matchAll(NUMBERED_TITLE)].map(match => match[1]);
    }

    const titles = lines
        .map(cleanTitle)
        .filter(title => title.length > 0)
        .slice(0, MAX_TITLE_CANDIDATES);

    return {
        step: 'titles',
        raw,
        fields: { titles },
        present: { titles: titles.length > 0 },
        warnings: titles.length > 0 ? [] : [missingField('titles')],
    };
};

// Description

interface SectionSpec<K extends string> {
    field: K;
    primary: RegExp;
    fallback: RegExp;
}

const DESCRIPTION_SECTIONS: SectionSpec<keyof DescriptionFields>[] = [
    { field: 'hook', primary: /^HOOK:/m, fallback: decoratedHeader('hook') },
    { field: 'keyTopics', primary: /^KEY_TOPICS:/m, fallback: decoratedHeader('key topics') },
    { field: 'timestamps', primary: /^TIMESTAMPS:/m, fallback: decoratedHeader('timestamps') },
    { field: 'panelists', primary: /^PANELISTS:/m, fallback: decoratedHeader('panelists') },
    { field: 'keywords', primary: /^KEYWORDS:/m, fallback: decoratedHeader('keywords') },
];

// Sections from other steps that end a description section if a model runs on
const FOREIGN_HEADERS = [/^[ \t]*(?:\*\*)?NEWSLETTER TEASER:/im, /^[ \t]*(?:\*\*)?(?:LINKEDIN\/)?BLOG POST:/im];

export const cleanKeywords = (section: string): string => {
    const firstLine = stripMarkup(section.replace(/#/g, '')).trim().split('\n')[0] ?? '';
    return firstLine.trim().replace(/\s*\d+\.\s*$/, '');
};

const keywordsComplete = (keywords: string): boolean => {
    const items = keywords.split(',').map(item => item.trim()).filter(item => item.length > 0);
    return items.length >= MIN_KEYWORD_ITEMS && keywords.length >= MIN_KEYWORDS_LENGTH;
};

export const parseDescription = (raw: string): GenerationResult<DescriptionFields> => {
    const headers = DESCRIPTION_SECTIONS.map(section => ({
        field: section.field,
        match: findHeader(raw, section.primary, section.fallback),
    }));

    const boundaries = [
        ...headers.flatMap(header => header.match ? [header.match.start] : []),
        ...FOREIGN_HEADERS.flatMap(pattern => {
            const match = raw.match(pattern);
            return match?.index !== undefined ? [match.index] : [];
        }),
    ];

    const sectionText = (match: HeaderMatch): string => {
        const end = Math.min(raw.length, ...boundaries.filter(boundary => boundary > match.start));
        return raw.slice(match.contentStart, end).trim();
    };

    const fields: DescriptionFields = { hook: '', keyTopics: '', timestamps: '', panelists: '', keywords: '' };
    const present: Record<keyof DescriptionFields, boolean> = {
        hook: false, keyTopics: false, timestamps: false, panelists: false, keywords: false,
    };
    const warnings: ParseWarning[] = [];

    for (const { field, match } of headers) {
        const text = match ? sectionText(match) : '';
        const value = field === 'keywords' ? cleanKeywords(text) : stripMarkup(text).trim();
        fields[field] = value;
        present[field] = value.length > 0;
        if (!present[field]) {
            warnings.push(missingField(field));
        }
    }

    if (!keywordsComplete(fields.keywords)) {
        warnings.push({
            code: 'incomplete_keywords',
            field: 'keywords',
            message: `Keywords look incomplete: "${fields.keywords}"`,
        });
    }

    return { step: 'description', raw, fields, present, warnings };
};

// Teaser

const PRIMARY_TEASER = /NEWSLETTER TEASER:(?:\*\*|__)?/;
const FALLBACK_TEASER = /teaser[ \t]*:(?:\*\*|__)?/i;

export const parseTeaser = (raw: string): GenerationResult<TeaserFields> => {
    const match = findHeader(raw, PRIMARY_TEASER, FALLBACK_TEASER);
    const teaser = match ? raw.slice(match.contentStart).trim() : '';
    return {
        step: 'teaser',
        raw,
        fields: { teaser },
        present: { teaser: teaser.length > 0 },
        warnings: teaser.length > 0 ? [] : [missingField('teaser')],
    };
};

// Article

const PRIMARY_ARTICLE = /^[ \t]*(?:LINKEDIN\/BLOG POST|BLOG POST|ARTICLE):(?:\*\*|__)?/m;
const FALLBACK_ARTICLE = /^[^\n]*\b(?:newsletter|article|blog|post)\b[^\n]*:[ \t]*(?:\*\*|__)?[ \t]*$/im;

export const parseArticle = (raw: string): GenerationResult<ArticleFields> => {
    const match = findHeader(raw, PRIMARY_ARTICLE, FALLBACK_ARTICLE);
    const article = match ? raw.slice(match.contentStart).trim() : '';
    return {
        step: 'article',
        raw,
        fields: { article },
        present: { article: article.length > 0 },
        warnings: article.length > 0 ? [] : [missingField('article')],
    };
};

type Parsers = { [S in StepKind]: (raw: string) => GenerationResult<StepFields[S]> };

const PARSERS: Parsers = {
    titles: parseTitles,
    description: parseDescription,
    teaser: parseTeaser,
    article: parseArticle,
};

export const parse = <S extends StepKind>(step: S, raw: string): GenerationResult<StepFields[S]> => PARSERS[step](raw);
