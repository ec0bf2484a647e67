import { describe, it, expect } from 'vitest';
import * as Parsing from '../../src/parsing';

const DESCRIPTION = `HOOK:
What happens when **three CTOs** argue about agents?

KEY_TOPICS:
• Agent reliability
• Cost of [inference](https://example.com)

TIMESTAMPS:
00:00 - Introduction
12:30 - Coming up: the lightning round

PANELISTS:
• Dana Lee - CTO, Acme

KEYWORDS:
#AI agents, #LLM costs, developer tools, cloud 3.
extra line`;

describe('Response Parser', () => {
    describe('titles', () => {
        it('should read TITLE n: lines, strip markup and quotes, and keep at most five', () => {
            const raw = [
                'Here are options:',
                'TITLE 1: Why AI Agents Fail',
                'TITLE 2: **The Cost of Cloud**',
                'TITLE 3: "Quoted Title"',
                'TITLE 4: Four',
                'TITLE 5: Five',
                'TITLE 6: Six',
            ].join('\n');

            const result = Parsing.parseTitles(raw);

            expect(result.fields.titles).toEqual(['Why AI Agents Fail', 'The Cost of Cloud', 'Quoted Title', 'Four', 'Five']);
            expect(result.present).toEqual({ titles: true });
            expect(result.warnings).toEqual([]);
        });

        it('should fall back to numbered list lines', () => {
            const result = Parsing.parseTitles('1. First Option\n2) Second Option');

            expect(result.fields.titles).toEqual(['First Option', 'Second Option']);
        });

        it('should record a missing field when no titles are found', () => {
            const result = Parsing.parseTitles('I cannot help with that.');

            expect(result.fields.titles).toEqual([]);
            expect(result.present.titles).toBe(false);
            expect(result.warnings).toEqual([
                { code: 'missing_field', field: 'titles', message: 'No titles found in the response' },
            ]);
        });
    });

    describe('description', () => {
        it('should split sections on the exact headers and clean each field', () => {
            const result = Parsing.parseDescription(DESCRIPTION);

            expect(result.fields).toEqual({
                hook: 'What happens when three CTOs argue about agents?',
                keyTopics: '• Agent reliability\n• Cost of inference',
                timestamps: '00:00 - Introduction\n12:30 - Coming up: the lightning round',
                panelists: '• Dana Lee - CTO, Acme',
                keywords: 'AI agents, LLM costs, developer tools, cloud',
            });
            expect(result.warnings).toEqual([]);
        });

        it('should accept decorated and re-cased headers', () => {
            const raw = [
                '**Hook:** Big claims about cloud.',
                '## Key Topics:',
                '- Pricing',
                '**Timestamps**:',
                '00:00 - Intro',
                'Panelists:',
                '• Sam',
                'Keywords: cloud, pricing, finops',
            ].join('\n');

            const result = Parsing.parseDescription(raw);

            expect(result.fields).toEqual({
                hook: 'Big claims about cloud.',
                keyTopics: '- Pricing',
                timestamps: '00:00 - Intro',
                panelists: '• Sam',
                keywords: 'cloud, pricing, finops',
            });
            expect(result.warnings).toEqual([]);
        });

        it('should record both a missing field and incomplete keywords when keywords are absent', () => {
            const raw = 'HOOK:\nA hook.\nKEY_TOPICS:\n• One\nTIMESTAMPS:\n00:00 - Intro\nPANELISTS:\n• Sam';

            const result = Parsing.parseDescription(raw);

            expect(result.fields.keywords).toBe('');
            expect(result.present.keywords).toBe(false);
            expect(result.warnings.map(warning => [warning.code, warning.field])).toEqual([
                ['missing_field', 'keywords'],
                ['incomplete_keywords', 'keywords'],
            ]);
        });

        it('should flag keywords with too few items', () => {
            const result = Parsing.parseDescription('HOOK:\nA hook.\nKEYWORDS:\nai, ml');

            expect(result.fields.hook).toBe('A hook.');
            expect(result.fields.keywords).toBe('ai, ml');
            expect(result.present).toEqual({
                hook: true, keyTopics: false, timestamps: false, panelists: false, keywords: true,
            });
            expect(result.warnings.map(warning => [warning.code, warning.field])).toEqual([
                ['missing_field', 'keyTopics'],
                ['missing_field', 'timestamps'],
                ['missing_field', 'panelists'],
                ['incomplete_keywords', 'keywords'],
            ]);
        });

        it('should stop a section at a header from another step', () => {
            const result = Parsing.parseDescription('PANELISTS:\n• Sam\nNEWSLETTER TEASER:\nSomething else');

            expect(result.fields.panelists).toBe('• Sam');
        });
    });

    describe('teaser', () => {
        it('should keep the teaser markup byte for byte', () => {
            const teaser = '**Dana Lee** says *agents are interns*. [Watch the discussion →]({{YOUTUBE_URL}})';

            const result = Parsing.parseTeaser(`NEWSLETTER TEASER:\n${teaser}\n`);

            expect(result.fields.teaser).toBe(teaser);
            expect(result.warnings).toEqual([]);
        });

        it('should fall back to a case-insensitive teaser header', () => {
            expect(Parsing.parseTeaser('Teaser: Short text').fields.teaser).toBe('Short text');
        });

        it('should return an empty teaser with a warning when there is no header', () => {
            const result = Parsing.parseTeaser('nothing here');

            expect(result.fields.teaser).toBe('');
            expect(result.warnings).toEqual([
                { code: 'missing_field', field: 'teaser', message: 'No teaser found in the response' },
            ]);
        });
    });

    describe('article', () => {
        it('should take everything after the blog post header', () => {
            const result = Parsing.parseArticle('BLOG POST:\n## Old headline\n\nBody with **bold**.');

            expect(result.fields.article).toBe('## Old headline\n\nBody with **bold**.');
        });

        it('should accept the combined LinkedIn header', () => {
            expect(Parsing.parseArticle('LINKEDIN/BLOG POST:\nBody').fields.article).toBe('Body');
        });

        it('should fall back to any header line about an article', () => {
            const result = Parsing.parseArticle('Here is your newsletter article:\nBody text');

            expect(result.fields.article).toBe('Body text');
            expect(result.present.article).toBe(true);
        });
    });

    it('should dispatch on the step name', () => {
        const result = Parsing.parse('teaser', 'NEWSLETTER TEASER: Hi');

        expect(result.step).toBe('teaser');
        expect(result.fields.teaser).toBe('Hi');
    });

    describe('stripMarkup', () => {
        it('should remove emphasis, code and link syntax', () => {
            expect(Parsing.stripMarkup('**Bold** and *it* and __u__ and `code` [link](http://x)'))
                .toBe('Bold and it and u and code link');
        });

        it('should remove heading hashes', () => {
            expect(Parsing.stripMarkup('## Heading')).toBe('Heading');
        });

        it('should strip a link whose URL has parentheses', () => {
            expect(Parsing.stripMarkup('See [Foo](https://en.wikipedia.org/wiki/Foo_(bar)) today'))
                .toBe('See Foo today');
        });
    });
});
