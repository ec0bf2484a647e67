import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as Notify from '../../src/notify';
import { ChannelError } from '../../src/notify';

// Hoisted mocks - must be defined before vi.mock factories
const mockPostMessage = vi.hoisted(() => vi.fn());
const mockReplies = vi.hoisted(() => vi.fn());
const mockReactionsGet = vi.hoisted(() => vi.fn());
const mockLogger = vi.hoisted(() => ({
    debug: vi.fn(),
    verbose: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
}));

vi.mock('@slack/web-api', () => ({
    WebClient: class {
        chat = { postMessage: mockPostMessage };
        conversations = { replies: mockReplies };
        reactions = { get: mockReactionsGet };
    },
    ErrorCode: { PlatformError: 'slack_webapi_platform_error' },
}));

vi.mock('../../src/logging', () => ({
    getLogger: () => mockLogger,
}));

const platformError = (code: string) =>
    Object.assign(new Error(`An API error occurred: ${code}`), {
        code: 'slack_webapi_platform_error',
        data: { ok: false, error: code },
    });

const thread = { channel: 'C123', threadTs: '1700000000.000100', messageTs: '1700000050.000100' };

describe('Slack notification channel', () => {
    let channel: Notify.NotificationChannel;

    beforeEach(() => {
        vi.clearAllMocks();
        channel = Notify.createSlack({ botToken: 'test-secret', channelId: 'C123' });
    });

    describe('post', () => {
        it('should start a new thread when no thread is given', async () => {
            mockPostMessage.mockResolvedValue({ ok: true, channel: 'C123', ts: '1700000000.000100' });

            const ref = await channel.post('hello');

            expect(ref).toEqual({ channel: 'C123', threadTs: '1700000000.000100', messageTs: '1700000000.000100' });
            expect(mockPostMessage).toHaveBeenCalledWith({
                channel: 'C123',
                text: 'hello',
                unfurl_links: false,
                unfurl_media: false,
            });
        });

        it('should reply in the thread and move messageTs to the new message', async () => {
            mockPostMessage.mockResolvedValue({ ok: true, channel: 'C123', ts: '1700000099.000100' });

            const ref = await channel.post('done', thread);

            expect(ref).toEqual({ channel: 'C123', threadTs: thread.threadTs, messageTs: '1700000099.000100' });
            expect(mockPostMessage.mock.calls[0][0].thread_ts).toBe(thread.threadTs);
        });

        it('should raise a ChannelError when Slack rejects the message', async () => {
            mockPostMessage.mockRejectedValue(platformError('channel_not_found'));

            await expect(channel.post('hello')).rejects.toThrow(ChannelError);
            expect(mockLogger.error).toHaveBeenCalledWith('%s', 'Slack chat.postMessage failed: channel_not_found');
        });

        it('should raise a ChannelError for a response without a timestamp', async () => {
            mockPostMessage.mockResolvedValue({ ok: true });

            await expect(channel.post('hello')).rejects.toThrow(/Unexpected response from Slack chat.postMessage/);
        });
    });

    describe('pollReply', () => {
        it('should skip the root message and bot messages', async () => {
            mockReplies.mockResolvedValue({
                ok: true,
                messages: [
                    { ts: thread.threadTs, text: 'root', user: 'U1' },
                    { ts: '1700000010.000100', text: 'bot says hi', user: 'U2', bot_id: 'B1' },
                    { ts: '1700000020.000100', text: '  2  ', user: 'U1' },
                ],
            });

            const reply = await channel.pollReply(thread);

            expect(reply).toEqual({ text: '2', ts: '1700000020.000100', user: 'U1' });
        });

        it('should only return replies newer than since', async () => {
            mockReplies.mockResolvedValue({
                ok: true,
                messages: [
                    { ts: thread.threadTs, text: 'root', user: 'U1' },
                    { ts: '1700000020.000100', text: 'old', user: 'U1' },
                    { ts: '1700000030.000100', text: 'publish', user: 'U1' },
                ],
            });

            const reply = await channel.pollReply(thread, '1700000020.000100');

            expect(reply?.text).toBe('publish');
        });

        it('should ask only for replies after since and follow the cursor', async () => {
            mockReplies
                .mockResolvedValueOnce({
                    ok: true,
                    messages: [{ ts: thread.threadTs, text: 'root', user: 'U1' }],
                    response_metadata: { next_cursor: 'page-2' },
                })
                .mockResolvedValueOnce({
                    ok: true,
                    messages: [{ ts: '1700000130.000100', text: 'publish', user: 'U1' }],
                    response_metadata: { next_cursor: '' },
                });

            const reply = await channel.pollReply(thread, '1700000120.000100');

            expect(reply?.text).toBe('publish');
            expect(mockReplies).toHaveBeenNthCalledWith(1, {
                channel: 'C123', ts: thread.threadTs, oldest: '1700000120.000100', cursor: undefined, limit: 100,
            });
            expect(mockReplies).toHaveBeenNthCalledWith(2, {
                channel: 'C123', ts: thread.threadTs, oldest: '1700000120.000100', cursor: 'page-2', limit: 100,
            });
        });

        it('should return null when there is no reply', async () => {
            mockReplies.mockResolvedValue({ ok: true, messages: [{ ts: thread.threadTs, text: 'root', user: 'U1' }] });

            expect(await channel.pollReply(thread)).toBeNull();
        });

        it('should treat a malformed response as no reply', async () => {
            mockReplies.mockResolvedValue({ ok: true, messages: 'nope' });

            expect(await channel.pollReply(thread)).toBeNull();
            expect(mockLogger.warn).toHaveBeenCalledTimes(1);
        });

        it('should treat a thrown error as no reply', async () => {
            mockReplies.mockRejectedValue(new Error('socket hang up'));

            expect(await channel.pollReply(thread)).toBeNull();
            expect(mockLogger.warn).toHaveBeenCalledWith('%s', 'Slack conversations.replies failed: socket hang up');
        });
    });

    describe('pollReaction', () => {
        it('should look for the reaction on the latest message', async () => {
            mockReactionsGet.mockResolvedValue({
                ok: true,
                message: { reactions: [{ name: 'eyes', count: 1 }, { name: 'outbox_tray', count: 1 }] },
            });

            expect(await channel.pollReaction(thread, 'outbox_tray')).toBe(true);
            expect(mockReactionsGet).toHaveBeenCalledWith({ channel: 'C123', timestamp: thread.messageTs });
        });

        it('should return false when the reaction is absent', async () => {
            mockReactionsGet.mockResolvedValue({ ok: true, message: { reactions: [{ name: 'eyes' }] } });

            expect(await channel.pollReaction(thread, 'outbox_tray')).toBe(false);
        });

        it('should stay silent on no_reaction', async () => {
            mockReactionsGet.mockRejectedValue(platformError('no_reaction'));

            expect(await channel.pollReaction(thread, 'outbox_tray')).toBe(false);
            expect(mockLogger.warn).not.toHaveBeenCalled();
        });

        it('should log other errors', async () => {
            mockReactionsGet.mockRejectedValue(platformError('invalid_auth'));

            expect(await channel.pollReaction(thread, 'outbox_tray')).toBe(false);
            expect(mockLogger.warn).toHaveBeenCalledWith('%s', 'Slack reactions.get failed: invalid_auth');
        });
    });
});
