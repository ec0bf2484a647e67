/**
 * Configuration schema
 *
 * Non-secret settings come from defaults, the YAML config file and CLI flags
 * (see arguments.ts). Secrets only ever come from the environment.
 */

import { z } from 'zod';

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export const ChannelConfigSchema = z.object({
    enabled: z.boolean(),
    channelId: z.string(),
    replyPollInterval: z.number().positive(),
});

export const PollerConfigSchema = z.object({
    interval: z.number().positive(),
    timeoutHours: z.number().positive(),
    emoji: z.string().min(1),
    command: z.string().min(1),
});

export const PublishConfigSchema = z.object({
    enabled: z.boolean(),
    siteUrl: z.string(),
    categoryName: z.string().min(1),
    categorySlug: z.string().min(1),
    postTitlePrefix: z.string(),
    playlistId: z.string(),
});

export const ConfigSchema = z.object({
    configDirectory: z.string().min(1),
    watchDirectory: z.string().min(1),
    outputDirectory: z.string().min(1),
    extensions: z.array(z.string().min(1)).min(1),
    watchInterval: z.number().positive(),
    model: z.string().min(1),
    showName: z.string().min(1),
    articleHeadlinePrefix: z.string(),
    descriptionTemplate: z.string().optional(),
    examplesFile: z.string().optional(),
    verbose: z.boolean(),
    debug: z.boolean(),
    forceCli: z.boolean(),
    channel: ChannelConfigSchema,
    poller: PollerConfigSchema,
    publish: PublishConfigSchema,
});

export const FileConfigSchema = ConfigSchema.omit({ configDirectory: true }).deepPartial();

export const SecureConfigSchema = z.object({
    openaiApiKey: z.string().optional(),
    slackBotToken: z.string().optional(),
    wpUsername: z.string().optional(),
    wpAppPassword: z.string().optional(),
    youtubeApiKey: z.string().optional(),
});

export type ChannelConfig = z.infer<typeof ChannelConfigSchema>;
export type PollerConfig = z.infer<typeof PollerConfigSchema>;
export type PublishConfig = z.infer<typeof PublishConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type FileConfig = z.infer<typeof FileConfigSchema>;
export type SecureConfig = z.infer<typeof SecureConfigSchema>;

/**
 * Options as commander hands them over. Only flags the user actually
 * passed are present.
 */
export interface Args {
    configDirectory?: string;
    watchDirectory?: string;
    outputDirectory?: string;
    model?: string;
    verbose?: boolean;
    debug?: boolean;
    cli?: boolean;
}

export const formatIssues = (error: z.ZodError): string =>
    error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
