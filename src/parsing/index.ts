export * from './types';
export { parse, parseTitles, parseDescription, parseTeaser, parseArticle, cleanKeywords } from './parser';
export { stripMarkup, stripWrappingQuotes } from './markup';
