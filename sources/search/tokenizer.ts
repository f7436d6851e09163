/**
 * Text normalization for the lexical index
 */

import type { BookmarkView } from '../engine/document';

/**
 * Lowercase runs of letters and digits
 */
export function tokenize(text: string): string[] {
    return text
        .toLowerCase()
        .split(/[^\p{L}\p{N}]+/u)
        .filter((token) => token.length > 0);
}

/**
 * Tokens of a URL without its scheme and a leading `www.`
 */
export function tokenizeUrl(url: string): string[] {
    const stripped = url
        .trim()
        .replace(/^[a-z][a-z0-9+.-]*:\/\//i, '')
        .replace(/^www\./i, '');
    return tokenize(stripped);
}

/**
 * Every indexed token of a bookmark: title, url and tags
 */
export function bookmarkTokens(view: Pick<BookmarkView, 'title' | 'url' | 'tags'>): string[] {
    return [
        ...tokenize(view.title ?? ''),
        ...tokenizeUrl(view.url),
        ...view.tags.flatMap(tokenize),
    ];
}
