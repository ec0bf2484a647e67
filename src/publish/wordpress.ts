/**
 * WordPress REST client
 *
 * Only what publishing a draft needs. Authenticates with an application
 * password over Basic auth.
 */

import { z } from 'zod';
import { HTTP_USER_AGENT } from '@/constants';
import { HttpFetch, PublishError, PublishStage } from './types';

export interface WordPressConfig {
    siteUrl: string;
    username: string;
    appPassword: string;
    fetch?: HttpFetch;
}

export interface DraftPost {
    title: string;
    content: string;
    categories: number[];
    featuredMedia?: number;
}

export interface CreatedPost {
    id: number;
    link: string;
}

export interface Instance {
    testConnection(): Promise<string>;
    findOrCreateCategory(name: string, slug: string): Promise<number>;
    uploadMedia(data: ArrayBuffer, filename: string, contentType: string): Promise<number>;
    createDraft(post: DraftPost): Promise<CreatedPost>;
    editUrl(postId: number): string;
}

interface RequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string | ArrayBuffer;
}

const UserSchema = z.object({ name: z.string().optional() });
const CategoriesSchema = z.array(z.object({ id: z.number(), name: z.string() }));
const CreatedSchema = z.object({ id: z.number(), link: z.string().optional() });

export const create = (config: WordPressConfig): Instance => {
    const http = config.fetch ?? fetch;
    const apiBase = `${config.siteUrl}/wp-json/wp/v2`;
    const authorization = `Basic ${Buffer.from(`${config.username}:${config.appPassword}`).toString('base64')}`;

    const request = async <T extends z.ZodTypeAny>(
        stage: PublishStage,
        pathname: string,
        schema: T,
        init: RequestOptions = {},
    ): Promise<z.infer<T>> => {
        let response: Response;
        try {
            response = await http(`${apiBase}${pathname}`, {
                method: init.method ?? 'GET',
                headers: {
                    'Authorization': authorization,
                    'User-Agent': HTTP_USER_AGENT,
                    ...init.headers,
                },
                body: init.body,
            });
        } catch (error: unknown) {
            throw new PublishError(stage, `WordPress request failed: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
        }

        if (!response.ok) {
            const text = await response.text();
            throw new PublishError(stage, `WordPress returned ${response.status}: ${text.slice(0, 200)}`);
        }

        const parsed = schema.safeParse(await response.json());
        if (!parsed.success) {
            throw new PublishError(stage, `Unexpected WordPress response: ${parsed.error.message}`);
        }
        return parsed.data;
    };

    const testConnection = async (): Promise<string> => {
        const user = await request('connection', '/users/me', UserSchema);
        return user.name ?? 'unknown user';
    };

    const findOrCreateCategory = async (name: string, slug: string): Promise<number> => {
        const categories = await request('category', `/categories?search=${encodeURIComponent(name)}`, CategoriesSchema);
        const existing = categories.find(category => category.name.toLowerCase() === name.toLowerCase());
        if (existing) {
            return existing.id;
        }
        const created = await request('category', '/categories', CreatedSchema, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ name, slug }),
        });
        return created.id;
    };

    const uploadMedia = async (data: ArrayBuffer, filename: string, contentType: string): Promise<number> => {
        const created = await request('media', '/media', CreatedSchema, {
            method: 'POST',
            headers: {
                'Content-Disposition': `attachment; filename="${filename}"`,
                'Content-Type': contentType,
            },
            body: data,
        });
        return created.id;
    };

    const createDraft = async (post: DraftPost): Promise<CreatedPost> => {
        const created = await request('post', '/posts', CreatedSchema, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({
                title: post.title,
                content: post.content,
                status: 'draft',
                format: 'standard',
                categories: post.categories,
                ...(post.featuredMedia !== undefined ? { featured_media: post.featuredMedia } : {}),
            }),
        });
        return { id: created.id, link: created.link ?? '' };
    };

    const editUrl = (postId: number): string => `${config.siteUrl}/wp-admin/post.php?post=${postId}&action=edit`;

    return { testConnection, findOrCreateCategory, uploadMedia, createDraft, editUrl };
};
