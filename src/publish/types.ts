/**
 * Publish Trigger Types
 */

import type { ThreadRef } from '../notify/types';

export type PublishStatus = 'pending' | 'triggered' | 'expired';

export type PublishStage = 'configuration' | 'bundle' | 'video' | 'connection' | 'category' | 'media' | 'post';

export interface PublishOutcome {
    postId: number;
    postUrl: string;
    editUrl: string;
    videoUrl: string;
    videoTitle: string;
}

export type PublishResult =
    | { ok: true; at: string; outcome: PublishOutcome }
    | { ok: false; at: string; stage: PublishStage; message: string };

export interface PublishTriggerState {
    bundleId: string;
    bundlePath: string;
    title: string;
    thread: ThreadRef;
    createdAt: string;
    /** createdAt + timeoutHours */
    deadline: string;
    status: PublishStatus;
    triggeredAt?: string;
    expiredAt?: string;
    result?: PublishResult;
}

export class PublishError extends Error {
    readonly stage: PublishStage;

    constructor(stage: PublishStage, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PublishError';
        this.stage = stage;
    }
}

export interface Publisher {
    publish(bundlePath: string, titleHint?: string): Promise<PublishOutcome>;
}

export type Clock = () => Date;

export type HttpFetch = (url: string | URL, init?: RequestInit) => Promise<Response>;
