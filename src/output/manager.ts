/**
 * Output Manager
 *
 * Writes an episode bundle into a hidden temporary directory and renames it
 * into place, so a bundle directory is either complete or absent.
 */

import * as path from 'node:path';
import { randomBytes } from 'node:crypto';
import {
    BUNDLE_FILES,
    BUNDLE_TEMP_PREFIX,
    BUNDLE_TIMESTAMP_FORMAT,
    DEFAULT_DESCRIPTION_TEMPLATE,
} from '../constants';
import * as Logging from '../logging';
import * as Dates from '../util/dates';
import * as Storage from '../util/storage';
import type { DescriptionFields } from '../parsing/types';
import { BundleError, BundleInput, EpisodeOutputBundle, OutputConfig } from './types';

export interface ManagerInstance {
    bundleId(source: string, createdAt: Date): string;
    writeBundle(input: BundleInput): Promise<EpisodeOutputBundle>;
}

export const bundleId = (source: string, createdAt: Date): string => {
    const stem = path.parse(source).name;
    return `${stem}_${Dates.format(createdAt, BUNDLE_TIMESTAMP_FORMAT)}`;
};

const BUNDLE_ID = /_(\d{8}_\d{6})$/;

/**
 * The newest bundle directory in `outputDirectory`, by the timestamp in its
 * name, or undefined when there is none.
 */
export const findLatestBundle = async (outputDirectory: string, storage: Storage.Utility): Promise<string | undefined> => {
    if (!await storage.isDirectory(outputDirectory)) {
        return undefined;
    }
    let latest: { name: string; stamp: string } | undefined;
    for (const name of await storage.listDirectories(outputDirectory)) {
        const match = name.match(BUNDLE_ID);
        if (match && (!latest || match[1] >= latest.stamp)) {
            latest = { name, stamp: match[1] };
        }
    }
    return latest ? path.join(outputDirectory, latest.name) : undefined;
};

export const fillTemplate = (template: string, fields: DescriptionFields): string =>
    template
        .replaceAll('{{HOOK}}', fields.hook)
        .replaceAll('{{KEY_TOPICS}}', fields.keyTopics)
        .replaceAll('{{TIMESTAMPS}}', fields.timestamps)
        .replaceAll('{{PANELISTS}}', fields.panelists)
        .replaceAll('{{Panelists}}', fields.panelists)
        .replaceAll('{{KEYWORDS}}', fields.keywords);

const HEADLINE_MARKER = '☕️';

/**
 * A line is the model's own headline when it is a markdown heading, opens
 * with the headline marker or prefix, or is exactly the confirmed title.
 */
const isHeadline = (line: string, prefix: string, title: string): boolean => {
    if (line.length === 0) {
        return false;
    }
    const bare = line.replace(/^[#*_\s]+|[*_\s]+$/g, '').toLowerCase();
    const trimmedPrefix = prefix.trim().toLowerCase();
    return line.startsWith('#')
        || bare.startsWith(HEADLINE_MARKER)
        || (trimmedPrefix.length > 0 && bare.startsWith(trimmedPrefix))
        || bare === title.toLowerCase();
};

/**
 * Drop the headline lines the model put above the article and put
 * `prefix + title` in their place.
 */
export const withHeadline = (article: string, prefix: string, title: string): string => {
    const lines = article.trimStart().split('\n');
    while (lines.length > 0 && isHeadline(lines[0].trim(), prefix, title)) {
        lines.shift();
    }
    return `## ${prefix}${title}\n\n${lines.join('\n').trimStart()}`;
};

export const create = (config: OutputConfig): ManagerInstance => {
    const logger = Logging.getLogger();
    const storage = config.storage ?? Storage.create({ log: logger.debug.bind(logger) });

    const loadTemplate = async (): Promise<string> => {
        if (config.descriptionTemplate && await storage.exists(config.descriptionTemplate)) {
            logger.debug('Using description template %s', config.descriptionTemplate);
            return storage.readFile(config.descriptionTemplate);
        }
        if (config.descriptionTemplate) {
            logger.warn('Description template %s not found, using the built-in one', config.descriptionTemplate);
        }
        return DEFAULT_DESCRIPTION_TEMPLATE;
    };

    const render = async (input: BundleInput): Promise<Record<string, string>> => {
        const description = input.description.fields;
        const responses = {
            source: input.source,
            title: input.title,
            createdAt: input.createdAt.toISOString(),
            titles: input.titleRounds,
            description: input.description,
            teaser: input.teaser,
            article: input.article,
        };

        return {
            [BUNDLE_FILES.title]: `=== SELECTED TITLE ===\n\n${input.title}\n`,
            [BUNDLE_FILES.description]: fillTemplate(await loadTemplate(), description),
            [BUNDLE_FILES.keywords]: `=== KEYWORDS (comma-separated) ===\n\n${description.keywords}\n`,
            [BUNDLE_FILES.teaser]: `${input.teaser.fields.teaser}\n`,
            [BUNDLE_FILES.article]: `${withHeadline(input.article.fields.article, config.articleHeadlinePrefix, input.title)}\n`,
            [BUNDLE_FILES.raw]: `${JSON.stringify(responses, null, 2)}\n`,
        };
    };

    const writeBundle = async (input: BundleInput): Promise<EpisodeOutputBundle> => {
        const id = bundleId(input.source, input.createdAt);
        const target = path.join(config.outputDirectory, id);

        if (await storage.exists(target)) {
            throw new BundleError(`Bundle already exists: ${target}`);
        }

        const files = await render(input);
        const tempDir = path.join(config.outputDirectory, `${BUNDLE_TEMP_PREFIX}${id}-${randomBytes(4).toString('hex')}`);

        try {
            await storage.createDirectory(tempDir);
            for (const [name, content] of Object.entries(files)) {
                await storage.writeFile(path.join(tempDir, name), content);
            }
            if (await storage.exists(target)) {
                throw new BundleError(`Bundle already exists: ${target}`);
            }
            await storage.rename(tempDir, target);
        } catch (error: unknown) {
            await storage.removeDirectory(tempDir);
            if (error instanceof BundleError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            throw new BundleError(`Could not write bundle ${id}: ${message}`, { cause: error });
        }

        logger.info('Bundle written to %s', target);
        return {
            id,
            path: target,
            createdAt: input.createdAt,
            title: input.title,
            files: Object.keys(files),
        };
    };

    return { bundleId, writeBundle };
};
