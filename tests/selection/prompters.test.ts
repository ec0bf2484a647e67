import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import * as Selection from '../../src/selection';
import { Messages } from '../../src/notify';
import type { NotificationChannel, Reply, ThreadRef } from '../../src/notify';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        debug: vi.fn(),
        verbose: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

const SET: Selection.TitleCandidateSet = { titles: ['One', 'Two', 'Three'], round: 1 };

describe('CLI prompter', () => {
    const scripted = (answers: string[]) => {
        const questions: string[] = [];
        const ask = vi.fn(async (question: string) => {
            questions.push(question);
            return answers.shift() ?? 'q';
        });
        return { ask, questions };
    };

    it('should return a pick once it is confirmed', async () => {
        const { ask, questions } = scripted(['2', 'y']);
        const prompter = Selection.createCliPrompter({ ask, write: vi.fn() });

        expect(await prompter.present(SET)).toEqual({ kind: 'select', index: 1 });
        expect(questions[1]).toBe('Use "Two"? (y/n): ');
    });

    it('should ask again when a pick is not confirmed', async () => {
        const { ask } = scripted(['2', 'n', '3', 'y']);
        const prompter = Selection.createCliPrompter({ ask, write: vi.fn() });

        expect(await prompter.present(SET)).toEqual({ kind: 'select', index: 2 });
    });

    it('should ask for feedback after a bare f', async () => {
        const { ask, questions } = scripted(['f', 'shorter please']);
        const prompter = Selection.createCliPrompter({ ask, write: vi.fn() });

        expect(await prompter.present(SET)).toEqual({ kind: 'feedback', feedback: 'shorter please' });
        expect(questions[1]).toBe('What should change? (or TITLE: Your Title): ');
    });

    it('should accept a custom title from the feedback prompt and confirm it title-cased', async () => {
        const { ask, questions } = scripted(['f', 'TITLE: my own title', 'y']);
        const prompter = Selection.createCliPrompter({ ask, write: vi.fn() });

        expect(await prompter.present(SET)).toEqual({ kind: 'custom', title: 'my own title' });
        expect(questions[2]).toBe('Use "My Own Title"? (y/n): ');
    });

    it('should explain an invalid answer and keep asking', async () => {
        const { ask } = scripted(['0', 'q']);
        const write = vi.fn();
        const prompter = Selection.createCliPrompter({ ask, write });

        expect(await prompter.present(SET)).toEqual({ kind: 'cancel' });
        expect(write).toHaveBeenCalledWith('  Choose a number between 1 and 3');
    });
});

describe('Channel prompter', () => {
    const thread: ThreadRef = { channel: 'C1', threadTs: '100.000000', messageTs: '100.000000' };
    let post: Mock<(text: string, thread?: ThreadRef) => Promise<ThreadRef>>;
    let pollReply: Mock<(thread: ThreadRef, since?: string) => Promise<Reply | null>>;
    let channel: NotificationChannel;
    let sleep: Mock<(ms: number, signal?: AbortSignal) => Promise<void>>;

    const reply = (text: string, ts: string): Reply => ({ text, ts, user: 'U1' });

    beforeEach(() => {
        post = vi.fn<(text: string, thread?: ThreadRef) => Promise<ThreadRef>>(async () => ({ ...thread, messageTs: '110.000000' }));
        pollReply = vi.fn<(thread: ThreadRef, since?: string) => Promise<Reply | null>>(async () => null);
        channel = {
            name: 'slack',
            post,
            pollReply,
            pollReaction: vi.fn(async () => false),
            testConnection: vi.fn(async () => thread),
        };
        sleep = vi.fn<(ms: number, signal?: AbortSignal) => Promise<void>>(async () => undefined);
    });

    it('should post the candidates and poll until a valid reply arrives', async () => {
        pollReply
            .mockResolvedValueOnce(null)
            .mockResolvedValueOnce(reply('9', '120.000000'))
            .mockResolvedValueOnce(reply('2', '130.000000'));
        const prompter = Selection.createChannelPrompter({ channel, thread, replyPollInterval: 5, sleep });

        const input = await prompter.present(SET);

        expect(input).toEqual({ kind: 'select', index: 1 });
        expect(post).toHaveBeenNthCalledWith(1, Messages.titlesReady(SET.titles, 1), thread);
        expect(post).toHaveBeenNthCalledWith(2, Messages.invalidReply(3), thread);
        expect(pollReply.mock.calls).toEqual([
            [thread, '110.000000'],
            [thread, '110.000000'],
            [thread, '120.000000'],
        ]);
        expect(sleep).toHaveBeenCalledTimes(1);
        expect(sleep).toHaveBeenCalledWith(5000, undefined);
    });

    it('should cancel when the signal aborts', async () => {
        const controller = new AbortController();
        controller.abort();
        const prompter = Selection.createChannelPrompter({ channel, thread, replyPollInterval: 5, sleep });

        expect(await prompter.present(SET, controller.signal)).toEqual({ kind: 'cancel' });
        expect(pollReply).not.toHaveBeenCalled();
    });
});
