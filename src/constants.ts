export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__ __GIT_COMMIT_DATE__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'showrunner';

export const DEFAULT_CONFIG_DIR = `./.${PROGRAM_NAME}`;
export const DEFAULT_CONFIG_FILE_NAME = 'config.yaml';

export const DEFAULT_WATCH_DIRECTORY = './transcripts';
export const DEFAULT_OUTPUT_DIRECTORY = './outputs';
export const DEFAULT_TRANSCRIPT_EXTENSIONS = ['.txt', '.md', '.json'];
export const DEFAULT_WATCH_INTERVAL_SECONDS = 10;

// State files live in the output directory, next to the bundles they describe
export const PROCESSED_SET_FILE_NAME = '.processed_transcripts.json';
export const POLLER_STATE_FILE_NAME = '.publish_pollers.json';
export const BUNDLE_TEMP_PREFIX = '.tmp-';
export const BUNDLE_TIMESTAMP_FORMAT = 'YYYYMMDD_HHmmss';

export const DEFAULT_MODEL = 'gpt-4o';
export const DEFAULT_SHOW_NAME = 'the show';
export const DEFAULT_ARTICLE_HEADLINE_PREFIX = '☕️ First Cup: ';

export const MAX_TITLE_CANDIDATES = 5;

// Per-step completion budgets (max_completion_tokens)
export const STEP_TOKEN_BUDGETS = {
    titles: 2000,
    description: 6000,
    teaser: 800,
    article: 2500,
} as const;

export const DEFAULT_REPLY_POLL_INTERVAL_SECONDS = 5;
export const DEFAULT_PUBLISH_POLL_INTERVAL_SECONDS = 60;
export const DEFAULT_PUBLISH_TIMEOUT_HOURS = 24;
export const DEFAULT_PUBLISH_EMOJI = 'outbox_tray';
export const DEFAULT_PUBLISH_COMMAND = 'publish';
export const POLLER_PROGRESS_EVERY = 10;

export const DEFAULT_POST_TITLE_PREFIX = 'First Cup: ';
export const DEFAULT_CATEGORY_NAME = 'First Cup';
export const DEFAULT_CATEGORY_SLUG = 'first-cup';
export const YOUTUBE_API_BASE = 'https://www.googleapis.com/youtube/v3';
export const YOUTUBE_URL_PLACEHOLDER = '{{YOUTUBE_URL}}';
export const HTTP_USER_AGENT = `${PROGRAM_NAME}/1.0`;

export const BUNDLE_FILES = {
    title: 'SELECTED_TITLE.txt',
    description: 'youtube_description.txt',
    keywords: 'keywords.txt',
    teaser: 'newsletter_teaser.txt',
    article: 'blog_post.md',
    raw: 'raw_responses.json',
} as const;

export const DEFAULT_DESCRIPTION_TEMPLATE = `{{HOOK}}

{{KEY_TOPICS}}

⏱️ TIMESTAMPS:
{{TIMESTAMPS}}

🎙️ PANELISTS:
{{PANELISTS}}

---

Keywords: {{KEYWORDS}}
`;

export const SHOWRUNNER_DEFAULTS = {
    configDirectory: DEFAULT_CONFIG_DIR,
    watchDirectory: DEFAULT_WATCH_DIRECTORY,
    outputDirectory: DEFAULT_OUTPUT_DIRECTORY,
    extensions: DEFAULT_TRANSCRIPT_EXTENSIONS,
    watchInterval: DEFAULT_WATCH_INTERVAL_SECONDS,
    model: DEFAULT_MODEL,
    showName: DEFAULT_SHOW_NAME,
    articleHeadlinePrefix: DEFAULT_ARTICLE_HEADLINE_PREFIX,
    verbose: false,
    debug: false,
    forceCli: false,
    channel: {
        enabled: false,
        channelId: '',
        replyPollInterval: DEFAULT_REPLY_POLL_INTERVAL_SECONDS,
    },
    poller: {
        interval: DEFAULT_PUBLISH_POLL_INTERVAL_SECONDS,
        timeoutHours: DEFAULT_PUBLISH_TIMEOUT_HOURS,
        emoji: DEFAULT_PUBLISH_EMOJI,
        command: DEFAULT_PUBLISH_COMMAND,
    },
    publish: {
        enabled: false,
        siteUrl: '',
        categoryName: DEFAULT_CATEGORY_NAME,
        categorySlug: DEFAULT_CATEGORY_SLUG,
        postTitlePrefix: DEFAULT_POST_TITLE_PREFIX,
        playlistId: '',
    },
};
