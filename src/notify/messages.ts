/**
 * Message texts for the job thread. Every terminal state has its own
 * wording so the operator can tell them apart at a glance.
 */

import type { ParseWarning } from '../parsing/types';

export interface PublishPrompt {
    emoji: string;
    command: string;
    timeoutHours: number;
}

export interface PublishedPost {
    postUrl: string;
    editUrl: string;
    videoUrl: string;
}

export const started = (filename: string): string =>
    `:clapper: Processing transcript *${filename}*`;

export const titlesReady = (titles: string[], round: number): string => [
    round > 1 ? `:sparkles: New title options (round ${round}):` : ':sparkles: Title options:',
    '',
    ...titles.map((title, index) => `${index + 1}. ${title}`),
    '',
    'Reply in this thread with:',
    `• a number (1-${titles.length}) to pick a title`,
    '• `f <feedback>` for new options',
    '• `TITLE: Your Own Title` for a custom title',
    '• `cancel` to stop',
].join('\n');

export const invalidReply = (count: number): string => [
    ':warning: Invalid response. Please reply with:',
    `• A number (1-${count})`,
    "• 'f <feedback>' for new options",
    "• 'TITLE: Your Title'",
    "• 'cancel'",
].join('\n');

export const regenerating = (feedback: string): string =>
    `:arrows_counterclockwise: Generating new titles based on: _${feedback}_`;

export const selectionConfirmed = (title: string): string =>
    `:white_check_mark: Title selected: *${title}*\nGenerating description, teaser and article...`;

export const completed = (
    filename: string,
    bundlePath: string,
    warnings: ParseWarning[],
    publish?: PublishPrompt,
): string => {
    const lines = [`:tada: Finished *${filename}*`, `Output: \`${bundlePath}\``];
    if (warnings.length > 0) {
        lines.push('', ':warning: Check these before publishing:');
        lines.push(...warnings.map(warning => `• ${warning.message}`));
    }
    if (publish) {
        lines.push(
            '',
            `React with :${publish.emoji}: to this message or reply \`${publish.command}\` to create the WordPress draft.`,
            `This expires in ${publish.timeoutHours} hours.`,
        );
    }
    return lines.join('\n');
};

export const failed = (filename: string, message: string): string =>
    `:x: Failed to process *${filename}*: ${message}`;

export const cancelled = (filename: string): string =>
    `:no_entry_sign: Cancelled *${filename}*. It will be picked up again on the next start.`;

export const publishing = (title: string): string =>
    `:outbox_tray: Publishing *${title}* to WordPress...`;

export const published = (post: PublishedPost): string => [
    ':white_check_mark: Draft created.',
    `Edit: ${post.editUrl}`,
    `Preview: ${post.postUrl}`,
    `Video: ${post.videoUrl}`,
].join('\n');

export const publishFailed = (stage: string, message: string): string =>
    `:x: Publishing failed during ${stage}: ${message}\nRetry with \`showrunner publish <bundle>\`.`;

export const publishUnavailable = (bundlePath: string, message: string): string =>
    `:warning: The publish trigger above is not active (${message}). Run \`showrunner publish ${bundlePath}\` to create the draft.`;

export const pollerExpired = (title: string, timeoutHours: number): string =>
    `:hourglass: No publish request for *${title}* within ${timeoutHours} hours. Stopped waiting.`;
