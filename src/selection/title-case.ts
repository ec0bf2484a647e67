const LOWERCASE_WORDS = new Set([
    'a', 'an', 'and', 'as', 'at', 'but', 'by', 'for', 'in', 'of',
    'on', 'or', 'the', 'to', 'with', 'vs', 'via',
]);

const capitalize = (word: string): string =>
    word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();

/**
 * Title-case a custom title. Small words stay lower-case unless they are
 * the first or last word.
 */
export const toTitleCase = (text: string): string => {
    const words = text.split(/\s+/).filter(word => word.length > 0);
    if (words.length === 0) {
        return text;
    }
    return words.map((word, index) => {
        if (index === 0 || index === words.length - 1) {
            return capitalize(word);
        }
        return LOWERCASE_WORDS.has(word.toLowerCase()) ? word.toLowerCase() : capitalize(word);
    }).join(' ');
};
