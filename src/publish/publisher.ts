/**
 * Publisher
 *
 * Turns a finished bundle into a WordPress draft: finds the episode's video,
 * uploads its thumbnail as the featured image, converts the article and
 * creates the post. Every failure is a PublishError naming the stage.
 */

import * as path from 'node:path';
import { BUNDLE_FILES } from '@/constants';
import type { PublishConfig, SecureConfig } from '@/config';
import { getLogger } from '@/logging';
import * as Storage from '@/util/storage';
import { markdownToHtml } from './markdown';
import { findVideo } from './video';
import * as WordPress from './wordpress';
import { HttpFetch, PublishError, PublishOutcome, Publisher } from './types';

export interface PublisherConfig {
    publish: PublishConfig;
    secure: SecureConfig;
    fetch?: HttpFetch;
    storage?: Storage.Utility;
}

export const mediaFilename = (prefix: string, title: string): string => {
    const safeTitle = title
        .replace(/[^\w\s-]/g, '')
        .trim()
        .replace(/[-\s]+/g, '-')
        .slice(0, 50);
    return `${prefix}-${safeTitle}.jpg`;
};

/** First non-empty line of SELECTED_TITLE.txt that is not an underline */
export const readTitle = (content: string): string | undefined =>
    content.split('\n').map(line => line.trim()).find(line => line.length > 0 && !line.startsWith('='));

export const create = (config: PublisherConfig): Publisher => {
    const logger = getLogger();
    const storage = config.storage ?? Storage.create({ log: logger.debug.bind(logger) });
    const http = config.fetch ?? fetch;

    const readBundle = async (bundlePath: string, titleHint?: string): Promise<{ title: string; article: string }> => {
        const titlePath = path.join(bundlePath, BUNDLE_FILES.title);
        const articlePath = path.join(bundlePath, BUNDLE_FILES.article);

        const title = await storage.exists(titlePath)
            ? readTitle(await storage.readFile(titlePath)) ?? titleHint
            : titleHint;
        if (!title) {
            throw new PublishError('bundle', `No title found in ${bundlePath}`);
        }
        if (!await storage.exists(articlePath)) {
            throw new PublishError('bundle', `Article not found: ${articlePath}`);
        }
        return { title, article: await storage.readFile(articlePath) };
    };

    const uploadThumbnail = async (wordpress: WordPress.Instance, thumbnailUrl: string, title: string): Promise<number | undefined> => {
        try {
            const response = await http(thumbnailUrl);
            if (!response.ok) {
                logger.warn('Could not download thumbnail (%d), publishing without a featured image', response.status);
                return undefined;
            }
            const image = await response.arrayBuffer();
            return await wordpress.uploadMedia(image, mediaFilename(config.publish.categorySlug, title), 'image/jpeg');
        } catch (error: unknown) {
            logger.warn('Could not upload thumbnail, publishing without a featured image: %s', error instanceof Error ? error.message : String(error));
            return undefined;
        }
    };

    const publish = async (bundlePath: string, titleHint?: string): Promise<PublishOutcome> => {
        const { siteUrl } = config.publish;
        const { wpUsername, wpAppPassword } = config.secure;
        if (!siteUrl || !wpUsername || !wpAppPassword) {
            throw new PublishError('configuration', 'WordPress is not configured. Set publish.siteUrl, WP_USERNAME and WP_APP_PASSWORD');
        }

        const { title, article } = await readBundle(bundlePath, titleHint);
        logger.info('Publishing %s', title);

        const video = await findVideo({
            apiKey: config.secure.youtubeApiKey,
            playlistId: config.publish.playlistId,
            fetch: http,
        }, title);
        logger.info('Found video: %s (%s)', video.title, video.url);

        const wordpress = WordPress.create({ siteUrl, username: wpUsername, appPassword: wpAppPassword, fetch: http });
        const user = await wordpress.testConnection();
        logger.verbose('Connected to WordPress as %s', user);

        const categoryId = await wordpress.findOrCreateCategory(config.publish.categoryName, config.publish.categorySlug);
        const featuredMedia = await uploadThumbnail(wordpress, video.thumbnailUrl, title);

        const post = await wordpress.createDraft({
            title: `${config.publish.postTitlePrefix}${title}`,
            content: markdownToHtml(article, video.url),
            categories: [categoryId],
            featuredMedia,
        });

        return {
            postId: post.id,
            postUrl: post.link,
            editUrl: wordpress.editUrl(post.id),
            videoUrl: video.url,
            videoTitle: video.title,
        };
    };

    return { publish };
};
