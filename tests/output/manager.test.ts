import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import * as Output from '../../src/output';
import type { BundleInput } from '../../src/output';
import { BUNDLE_FILES } from '../../src/constants';
import * as Parsing from '../../src/parsing';
import * as Storage from '../../src/util/storage';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        verbose: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

const createdAt = new Date('2025-03-04T05:06:07Z');

const input = (overrides: Partial<BundleInput> = {}): BundleInput => ({
    source: 'ep12.txt',
    title: 'Why Roadmaps Lie',
    titleRounds: [{
        step: 'titles',
        raw: 'TITLE 1: Why Roadmaps Lie',
        fields: { titles: ['Why Roadmaps Lie'] },
        present: { titles: true },
        warnings: [],
    }],
    description: {
        step: 'description',
        raw: 'HOOK: ...',
        fields: {
            hook: 'Roadmaps promise certainty.',
            keyTopics: '• Planning theatre',
            timestamps: '00:00 - Introduction',
            panelists: '• Ada Park - PM Lead',
            keywords: 'roadmaps, planning, product management',
        },
        present: { hook: true, keyTopics: true, timestamps: true, panelists: true, keywords: true },
        warnings: [],
    },
    teaser: {
        step: 'teaser',
        raw: 'NEWSLETTER TEASER: ...',
        fields: { teaser: '**Ada Park** on roadmaps. [Watch the discussion →]({{YOUTUBE_URL}})' },
        present: { teaser: true },
        warnings: [],
    },
    article: {
        step: 'article',
        raw: 'BLOG POST: ...',
        fields: { article: '☕️ First Cup: Why Roadmaps Lie\n\n**Ada Park** opened the panel.' },
        present: { article: true },
        warnings: [],
    },
    createdAt,
    ...overrides,
});

describe('Output Manager', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'showrunner-output-test-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    describe('bundleId', () => {
        it('joins the transcript stem and the creation timestamp', () => {
            expect(Output.bundleId('ep12.txt', createdAt)).toBe('ep12_20250304_050607');
        });
    });

    describe('fillTemplate', () => {
        it('replaces every placeholder', () => {
            const filled = Output.fillTemplate('{{HOOK}}|{{KEY_TOPICS}}|{{TIMESTAMPS}}|{{PANELISTS}}|{{KEYWORDS}}', {
                hook: 'h',
                keyTopics: 'k',
                timestamps: 't',
                panelists: 'p',
                keywords: 'w',
            });
            expect(filled).toBe('h|k|t|p|w');
        });
    });

    describe('withHeadline', () => {
        const prefix = '☕️ First Cup: ';

        it('replaces the model headline line', () => {
            expect(Output.withHeadline('☕️ First Cup: Old\n\nBody text.', prefix, 'New'))
                .toBe('## ☕️ First Cup: New\n\nBody text.');
        });

        it('replaces a headline that repeats the title', () => {
            expect(Output.withHeadline('**Why Roadmaps Lie**\n\nBody text.', prefix, 'Why Roadmaps Lie'))
                .toBe('## ☕️ First Cup: Why Roadmaps Lie\n\nBody text.');
        });

        it('keeps an article that opens with bold text', () => {
            expect(Output.withHeadline('**Ada** said hi.', '', 'New')).toBe('## New\n\n**Ada** said hi.');
        });

        it('keeps the opening paragraph of an article without a headline', () => {
            const article = Parsing.parseArticle(
                "BLOG POST:\nThis week's panel tackled **AI agents** and why teams [ship them](https://x.test) too early.\n\nSecond paragraph with *a quote*.",
            ).fields.article;

            expect(Output.withHeadline(article, 'First Cup: ', 'T')).toBe(
                "## First Cup: T\n\nThis week's panel tackled **AI agents** and why teams [ship them](https://x.test) too early.\n\nSecond paragraph with *a quote*.",
            );
        });
    });

    describe('findLatestBundle', () => {
        it('picks the bundle with the newest timestamp', async () => {
            await fs.mkdir(path.join(tempDir, 'ep12_20250304_050607'));
            await fs.mkdir(path.join(tempDir, 'ep9_20250305_010000'));
            await fs.mkdir(path.join(tempDir, 'zz_20250101_000000'));
            await fs.mkdir(path.join(tempDir, '.tmp-ep13_20250306_000000-abcd'));
            await fs.mkdir(path.join(tempDir, 'notes'));

            expect(await Output.findLatestBundle(tempDir, Storage.create()))
                .toBe(path.join(tempDir, 'ep9_20250305_010000'));
        });

        it('returns undefined when there are no bundles', async () => {
            expect(await Output.findLatestBundle(tempDir, Storage.create())).toBeUndefined();
            expect(await Output.findLatestBundle(path.join(tempDir, 'missing'), Storage.create())).toBeUndefined();
        });
    });

    describe('writeBundle', () => {
        it('writes all six files into the bundle directory', async () => {
            const manager = Output.create({ outputDirectory: tempDir, articleHeadlinePrefix: '☕️ First Cup: ' });
            const bundle = await manager.writeBundle(input());

            expect(bundle.id).toBe('ep12_20250304_050607');
            expect(bundle.path).toBe(path.join(tempDir, 'ep12_20250304_050607'));
            expect([...bundle.files].sort()).toEqual(Object.values(BUNDLE_FILES).sort());

            const read = (name: string) => fs.readFile(path.join(bundle.path, name), 'utf-8');
            expect(await read(BUNDLE_FILES.title)).toBe('=== SELECTED TITLE ===\n\nWhy Roadmaps Lie\n');
            expect(await read(BUNDLE_FILES.keywords))
                .toBe('=== KEYWORDS (comma-separated) ===\n\nroadmaps, planning, product management\n');
            expect(await read(BUNDLE_FILES.teaser))
                .toBe('**Ada Park** on roadmaps. [Watch the discussion →]({{YOUTUBE_URL}})\n');
            expect(await read(BUNDLE_FILES.article))
                .toBe('## ☕️ First Cup: Why Roadmaps Lie\n\n**Ada Park** opened the panel.\n');

            const description = await read(BUNDLE_FILES.description);
            expect(description.startsWith('Roadmaps promise certainty.\n\n• Planning theatre\n')).toBe(true);
            expect(description).toContain('Keywords: roadmaps, planning, product management');

            const raw = JSON.parse(await read(BUNDLE_FILES.raw));
            expect(raw.source).toBe('ep12.txt');
            expect(raw.description.present.hook).toBe(true);
            expect(raw.titles).toHaveLength(1);
        });

        it('leaves no temporary directory behind', async () => {
            const manager = Output.create({ outputDirectory: tempDir, articleHeadlinePrefix: '' });
            await manager.writeBundle(input());
            expect(await fs.readdir(tempDir)).toEqual(['ep12_20250304_050607']);
        });

        it('uses a template file when one is configured', async () => {
            const templatePath = path.join(tempDir, 'template.txt');
            await fs.writeFile(templatePath, 'HOOK={{HOOK}}');
            const output = path.join(tempDir, 'out');
            const manager = Output.create({ outputDirectory: output, articleHeadlinePrefix: '', descriptionTemplate: templatePath });

            const bundle = await manager.writeBundle(input());
            expect(await fs.readFile(path.join(bundle.path, BUNDLE_FILES.description), 'utf-8'))
                .toBe('HOOK=Roadmaps promise certainty.');
        });

        it('refuses to overwrite an existing bundle', async () => {
            await fs.mkdir(path.join(tempDir, 'ep12_20250304_050607'));
            const manager = Output.create({ outputDirectory: tempDir, articleHeadlinePrefix: '' });

            await expect(manager.writeBundle(input())).rejects.toBeInstanceOf(Output.BundleError);
            expect(await fs.readdir(tempDir)).toEqual(['ep12_20250304_050607']);
        });

        it('removes the temporary directory when a write fails', async () => {
            const storage = Storage.create();
            const manager = Output.create({
                outputDirectory: tempDir,
                articleHeadlinePrefix: '',
                storage: { ...storage, writeFile: () => Promise.reject(new Error('disk full')) },
            });

            await expect(manager.writeBundle(input())).rejects.toThrow('Could not write bundle ep12_20250304_050607: disk full');
            expect(await fs.readdir(tempDir)).toEqual([]);
        });
    });
});
