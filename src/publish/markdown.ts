import { YOUTUBE_URL_PLACEHOLDER } from '@/constants';

const BLOCK_START = /^<(?:h[1-6]|p|ul|ol|li|blockquote|div|figure|table)\b/i;

/**
 * Convert the article's markdown to the HTML the WordPress editor expects:
 * links, bold, italics, `##` headings and blank-line paragraphs. The video
 * placeholder is replaced first so it can sit inside a link.
 */
export const markdownToHtml = (markdown: string, videoUrl: string): string => {
    let html = markdown
        .split(YOUTUBE_URL_PLACEHOLDER).join(videoUrl)
        .split('{YOUTUBE_URL}').join(videoUrl);

    html = html.replace(/\[([^\]]+)\]\(([^)]+)\)/g, '<a href="$2">$1</a>');
    html = html.replace(/\*\*([^*]+)\*\*/g, '<strong>$1</strong>');
    html = html.replace(/(?<![*<])\*([^*\n]+)\*(?![*>])/g, '<em>$1</em>');

    html = html
        .split(/\n{2,}/)
        .map(paragraph => paragraph.trim())
        .filter(paragraph => paragraph.length > 0)
        .map(paragraph => paragraph.startsWith('#') || BLOCK_START.test(paragraph) ? paragraph : `<p>${paragraph}</p>`)
        .join('\n\n');

    return html.replace(/^## (.+)$/gm, '<h2>$1</h2>');
};
