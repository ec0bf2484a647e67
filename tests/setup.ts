// Bundle names and poller deadlines are formatted in local time
process.env.TZ = 'UTC';

// Tests never see real credentials
for (const key of ['OPENAI_API_KEY', 'SLACK_BOT_TOKEN', 'WP_USERNAME', 'WP_APP_PASSWORD', 'YOUTUBE_API_KEY']) {
    delete process.env[key];
}
