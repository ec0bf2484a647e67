/**
 * Finds the published video for a bundle in a YouTube playlist.
 */

import { z } from 'zod';
import { YOUTUBE_API_BASE } from '@/constants';
import { getLogger } from '@/logging';
import { HttpFetch, PublishError } from './types';

export interface VideoInfo {
    videoId: string;
    title: string;
    publishedAt: string;
    url: string;
    thumbnailUrl: string;
}

export interface VideoLookupConfig {
    apiKey?: string;
    playlistId: string;
    fetch?: HttpFetch;
}

const PlaylistItemsSchema = z.object({
    items: z.array(z.object({
        snippet: z.object({
            title: z.string(),
            publishedAt: z.string(),
            resourceId: z.object({ videoId: z.string() }),
        }),
    })).default([]),
});

const normalize = (text: string): string =>
    text.toLowerCase().replace(/[^a-z0-9]+/g, ' ').trim();

export const titlesMatch = (videoTitle: string, hint: string): boolean => {
    const video = normalize(videoTitle);
    const wanted = normalize(hint);
    return wanted.length > 0 && (video.includes(wanted) || (video.length > 0 && wanted.includes(video)));
};

/**
 * The playlist video whose title matches the hint, otherwise the most
 * recently published one.
 */
export const findVideo = async (config: VideoLookupConfig, titleHint?: string): Promise<VideoInfo> => {
    const logger = getLogger();
    if (!config.apiKey || !config.playlistId) {
        throw new PublishError('configuration', 'YouTube lookup needs YOUTUBE_API_KEY and publish.playlistId');
    }

    const http = config.fetch ?? fetch;
    const url = new URL(`${YOUTUBE_API_BASE}/playlistItems`);
    url.searchParams.set('part', 'snippet');
    url.searchParams.set('playlistId', config.playlistId);
    url.searchParams.set('maxResults', '25');
    url.searchParams.set('key', config.apiKey);

    let body: unknown;
    try {
        const response = await http(url);
        if (!response.ok) {
            throw new PublishError('video', `YouTube API returned ${response.status}`);
        }
        body = await response.json();
    } catch (error: unknown) {
        if (error instanceof PublishError) {
            throw error;
        }
        throw new PublishError('video', `YouTube API request failed: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }

    const parsed = PlaylistItemsSchema.safeParse(body);
    if (!parsed.success) {
        throw new PublishError('video', `Unexpected YouTube API response: ${parsed.error.message}`);
    }

    const videos = parsed.data.items
        .map(item => ({
            videoId: item.snippet.resourceId.videoId,
            title: item.snippet.title,
            publishedAt: item.snippet.publishedAt,
            url: `https://youtu.be/${item.snippet.resourceId.videoId}`,
            thumbnailUrl: `https://img.youtube.com/vi/${item.snippet.resourceId.videoId}/maxresdefault.jpg`,
        }))
        .sort((a, b) => b.publishedAt.localeCompare(a.publishedAt));

    if (videos.length === 0) {
        throw new PublishError('video', `No videos found in playlist ${config.playlistId}`);
    }

    const match = titleHint ? videos.find(video => titlesMatch(video.title, titleHint)) : undefined;
    if (!match) {
        logger.warn('No video matches "%s", using the most recent: %s', titleHint ?? '', videos[0].title);
    }
    return match ?? videos[0];
};
