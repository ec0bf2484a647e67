/**
 * Notification Channel Types
 *
 * A channel is a threaded conversation with the operator. Every job gets one
 * thread; all status messages, the title prompt and the publish prompt go
 * into it.
 */

export interface ThreadRef {
    channel: string;
    /** Timestamp of the thread's root message */
    threadTs: string;
    /** Most recent message posted by us; reactions are checked on this one */
    messageTs: string;
}

export interface Reply {
    text: string;
    ts: string;
    user?: string;
}

export interface NotificationChannel {
    readonly name: string;
    /** Post a message, as a new thread when no thread is given */
    post(text: string, thread?: ThreadRef): Promise<ThreadRef>;
    /** Oldest human reply in the thread newer than `since`, or null */
    pollReply(thread: ThreadRef, since?: string): Promise<Reply | null>;
    /** Whether `symbol` has been added as a reaction to thread.messageTs */
    pollReaction(thread: ThreadRef, symbol: string): Promise<boolean>;
    testConnection(): Promise<ThreadRef>;
}

export class ChannelError extends Error {
    readonly method: string;
    readonly code?: string;

    constructor(method: string, message: string, code?: string) {
        super(message);
        this.name = 'ChannelError';
        this.method = method;
        this.code = code;
    }
}
