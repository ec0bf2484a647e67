import { ErrorCode, WebClient } from '@slack/web-api';
import { z } from 'zod';
import { getLogger } from '@/logging';
import { ChannelError, NotificationChannel, Reply, ThreadRef } from './types';

export interface SlackConfig {
    botToken: string;
    channelId: string;
}

const PostResponseSchema = z.object({
    ok: z.boolean(),
    error: z.string().optional(),
    channel: z.string().optional(),
    ts: z.string(),
});

const RepliesResponseSchema = z.object({
    ok: z.boolean(),
    error: z.string().optional(),
    messages: z.array(z.object({
        ts: z.string(),
        text: z.string().optional(),
        user: z.string().optional(),
        bot_id: z.string().optional(),
    })).default([]),
    response_metadata: z.object({ next_cursor: z.string().optional() }).optional(),
});

const ReactionsResponseSchema = z.object({
    ok: z.boolean(),
    error: z.string().optional(),
    message: z.object({
        reactions: z.array(z.object({
            name: z.string(),
            count: z.number().optional(),
        })).default([]),
    }).optional(),
});

const PlatformErrorSchema = z.object({
    code: z.literal(ErrorCode.PlatformError),
    data: z.object({ error: z.string() }),
});

// Slack reports the expected "nothing here yet" case for reactions as an error
const SILENT_ERRORS = new Set(['no_reaction']);

const platformErrorCode = (error: unknown): string | undefined => {
    const parsed = PlatformErrorSchema.safeParse(error);
    return parsed.success ? parsed.data.data.error : undefined;
};

const toChannelError = (method: string, error: unknown): ChannelError => {
    if (error instanceof ChannelError) {
        return error;
    }
    const code = platformErrorCode(error);
    const message = error instanceof Error ? error.message : String(error);
    return new ChannelError(method, `Slack ${method} failed: ${code ?? message}`, code);
};

const validate = <T extends z.ZodTypeAny>(method: string, schema: T, response: unknown): z.infer<T> => {
    const parsed = schema.safeParse(response);
    if (!parsed.success) {
        throw new ChannelError(method, `Unexpected response from Slack ${method}: ${parsed.error.message}`);
    }
    return parsed.data;
};

const isNewer = (ts: string, since?: string): boolean => since === undefined || Number(ts) > Number(since);

export const create = (config: SlackConfig): NotificationChannel => {
    const logger = getLogger();
    const client = new WebClient(config.botToken);

    const post = async (text: string, thread?: ThreadRef): Promise<ThreadRef> => {
        try {
            const response = validate('chat.postMessage', PostResponseSchema, await client.chat.postMessage({
                channel: thread?.channel ?? config.channelId,
                text,
                ...(thread ? { thread_ts: thread.threadTs } : {}),
                unfurl_links: false,
                unfurl_media: false,
            }));
            if (!response.ok) {
                throw new ChannelError('chat.postMessage', `Slack chat.postMessage failed: ${response.error ?? 'unknown'}`, response.error);
            }
            const channel = response.channel ?? thread?.channel ?? config.channelId;
            return {
                channel,
                threadTs: thread?.threadTs ?? response.ts,
                messageTs: response.ts,
            };
        } catch (error: unknown) {
            const channelError = toChannelError('chat.postMessage', error);
            logger.error('%s', channelError.message);
            throw channelError;
        }
    };

    const pollReply = async (thread: ThreadRef, since?: string): Promise<Reply | null> => {
        try {
            let cursor: string | undefined;
            do {
                const response = validate('conversations.replies', RepliesResponseSchema, await client.conversations.replies({
                    channel: thread.channel,
                    ts: thread.threadTs,
                    oldest: since,
                    cursor,
                    limit: 100,
                }));
                if (!response.ok) {
                    throw new ChannelError('conversations.replies', `Slack conversations.replies failed: ${response.error ?? 'unknown'}`, response.error);
                }
                const reply = response.messages.find(message =>
                    message.ts !== thread.threadTs &&
                    message.user !== undefined &&
                    message.bot_id === undefined &&
                    isNewer(message.ts, since));
                if (reply) {
                    return { text: (reply.text ?? '').trim(), ts: reply.ts, user: reply.user };
                }
                cursor = response.response_metadata?.next_cursor || undefined;
            } while (cursor);
            return null;
        } catch (error: unknown) {
            logger.warn('%s', toChannelError('conversations.replies', error).message);
            return null;
        }
    };

    const pollReaction = async (thread: ThreadRef, symbol: string): Promise<boolean> => {
        try {
            const response = validate('reactions.get', ReactionsResponseSchema, await client.reactions.get({
                channel: thread.channel,
                timestamp: thread.messageTs,
            }));
            if (!response.ok) {
                throw new ChannelError('reactions.get', `Slack reactions.get failed: ${response.error ?? 'unknown'}`, response.error);
            }
            return (response.message?.reactions ?? []).some(reaction => reaction.name === symbol);
        } catch (error: unknown) {
            const channelError = toChannelError('reactions.get', error);
            if (!channelError.code || !SILENT_ERRORS.has(channelError.code)) {
                logger.warn('%s', channelError.message);
            }
            return false;
        }
    };

    const testConnection = async (): Promise<ThreadRef> =>
        post(':white_check_mark: showrunner can post to this channel. Reply in this thread to test replies.');

    return {
        name: 'slack',
        post,
        pollReply,
        pollReaction,
        testConnection,
    };
};
