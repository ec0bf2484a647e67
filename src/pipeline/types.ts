/**
 * Run Coordinator Types
 */

import type * as Generation from '../generation';
import type { NotificationChannel } from '../notify/types';
import type { ManagerInstance as OutputManager, EpisodeOutputBundle } from '../output';
import type { ParseWarning } from '../parsing/types';
import type { PollerSupervisor } from '../publish';
import type { Clock, PublishTriggerState } from '../publish/types';
import type { TitlePrompter } from '../selection/types';
import type { ProcessedSet } from '../state';
import type { Sleep } from '../util/sleep';

/** One transcript file, read once and identified by its filename */
export interface TranscriptJob {
    filename: string;
    path: string;
    text: string;
    discoveredAt: Date;
}

export type RunResult =
    | { status: 'skipped'; filename: string; reason: 'processed' | 'in-flight' }
    | { status: 'cancelled'; filename: string }
    | {
        status: 'completed';
        filename: string;
        bundle: EpisodeOutputBundle;
        warnings: ParseWarning[];
        publishState?: PublishTriggerState;
    }
    | { status: 'failed'; filename: string; error: Error };

export interface PublishPromptConfig {
    emoji: string;
    command: string;
    timeoutHours: number;
}

export interface CoordinatorConfig {
    generator: Generation.Instance;
    output: OutputManager;
    processed: ProcessedSet;
    showName: string;
    /** Newsletter examples passed to the teaser and article steps */
    examples?: string;
    /** Active notification channel; titles are selected in the terminal without one */
    channel?: NotificationChannel;
    replyPollInterval: number;
    /** Terminal prompter used when there is no channel */
    prompter?: TitlePrompter;
    /** Present only when publishing is enabled */
    supervisor?: PollerSupervisor;
    poller: PublishPromptConfig;
    clock?: Clock;
    sleep?: Sleep;
    signal?: AbortSignal;
}
