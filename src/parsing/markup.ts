/**
 * Remove markdown emphasis, inline code, heading hashes and link syntax,
 * keeping the visible text.
 */
export const stripMarkup = (text: string): string => text
    .replace(/\[([^\]]+)\]\((?:[^()]|\([^()]*\))*\)/g, '$1')
    .replace(/\*\*(.+?)\*\*/g, '$1')
    .replace(/__(.+?)__/g, '$1')
    .replace(/\*([^*\n]+)\*/g, '$1')
    .replace(/(?<!\w)_([^_\n]+)_(?!\w)/g, '$1')
    .replace(/`([^`\n]+)`/g, '$1')
    .replace(/^[ \t]*#{1,6}[ \t]+/gm, '')
    .replace(/\*\*|__/g, '');

const WRAPPING_QUOTES = /^["'“”‘’](.*)["'“”‘’]$/s;

export const stripWrappingQuotes = (text: string): string => {
    const match = text.match(WRAPPING_QUOTES);
    return match ? match[1].trim() : text;
};
