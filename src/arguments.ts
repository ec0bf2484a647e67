import * as path from 'node:path';
import * as yaml from 'js-yaml';
import { SHOWRUNNER_DEFAULTS, DEFAULT_CONFIG_FILE_NAME } from '@/constants';
import {
    Args,
    Config,
    ConfigError,
    ConfigSchema,
    FileConfig,
    FileConfigSchema,
    SecureConfig,
    SecureConfigSchema,
    formatIssues,
} from '@/config';
import { getLogger } from '@/logging';
import * as Storage from '@/util/storage';

/**
 * Read <configDirectory>/config.yaml. A missing file is not an error; an
 * unparseable or invalid one is.
 */
export const readConfigFile = async (configDirectory: string): Promise<FileConfig> => {
    const logger = getLogger();
    const storage = Storage.create({ log: logger.debug.bind(logger) });
    const configPath = path.join(configDirectory, DEFAULT_CONFIG_FILE_NAME);

    if (!await storage.exists(configPath)) {
        logger.debug('No config file at %s, using defaults', configPath);
        return {};
    }

    let raw: unknown;
    try {
        raw = yaml.load(await storage.readFile(configPath));
    } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Could not parse ${configPath}: ${message}`);
    }

    if (raw === undefined || raw === null) {
        return {};
    }

    const parsed = FileConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration in ${configPath}: ${formatIssues(parsed.error)}`);
    }
    logger.debug('Loaded configuration from %s', configPath);
    return parsed.data;
};

const normalizeExtension = (extension: string): string =>
    extension.startsWith('.') ? extension.toLowerCase() : `.${extension.toLowerCase()}`;

export const readSecureConfig = (env: NodeJS.ProcessEnv = process.env): SecureConfig => {
    return SecureConfigSchema.parse({
        openaiApiKey: env.OPENAI_API_KEY || undefined,
        slackBotToken: env.SLACK_BOT_TOKEN || undefined,
        wpUsername: env.WP_USERNAME || undefined,
        wpAppPassword: env.WP_APP_PASSWORD || undefined,
        youtubeApiKey: env.YOUTUBE_API_KEY || undefined,
    });
};

/**
 * Merge configuration: defaults -> config file -> CLI flags (highest precedence),
 * then validate the result.
 */
export const configure = async (args: Args, env: NodeJS.ProcessEnv = process.env): Promise<[Config, SecureConfig]> => {
    const logger = getLogger();
    logger.debug('Command Line Options: %s', JSON.stringify(args));

    const configDirectory = args.configDirectory ?? SHOWRUNNER_DEFAULTS.configDirectory;
    const fileValues = await readConfigFile(configDirectory);

    const cliValues: Partial<Config> = {};
    if (args.watchDirectory !== undefined) cliValues.watchDirectory = args.watchDirectory;
    if (args.outputDirectory !== undefined) cliValues.outputDirectory = args.outputDirectory;
    if (args.model !== undefined) cliValues.model = args.model;
    if (args.verbose !== undefined) cliValues.verbose = args.verbose;
    if (args.debug !== undefined) cliValues.debug = args.debug;
    if (args.cli !== undefined) cliValues.forceCli = args.cli;

    const merged = {
        ...SHOWRUNNER_DEFAULTS,
        ...fileValues,
        ...cliValues,
        configDirectory,
        channel: { ...SHOWRUNNER_DEFAULTS.channel, ...fileValues.channel },
        poller: { ...SHOWRUNNER_DEFAULTS.poller, ...fileValues.poller },
        publish: { ...SHOWRUNNER_DEFAULTS.publish, ...fileValues.publish },
    };

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
    }

    const config: Config = {
        ...parsed.data,
        extensions: parsed.data.extensions.map(normalizeExtension),
        publish: {
            ...parsed.data.publish,
            siteUrl: parsed.data.publish.siteUrl.replace(/\/+$/, ''),
        },
    };

    const secureConfig = readSecureConfig(env);

    logger.debug('Final configuration: %s', JSON.stringify(config, null, 2));
    return [config, secureConfig];
};
