import { STOPWORDS } from './stopwords.js';

const TOKEN_RE = /[a-z0-9]+/g;

/**
 * Split text into lowercase tokens: maximal runs of ASCII letters and digits.
 * Every other character is a separator.
 */
export function tokenize(text: string): string[] {
    if (!text) return [];
    return text.toLowerCase().match(TOKEN_RE) ?? [];
}

/**
 * Drop single-character tokens and stopwords.
 */
export function normalizeTokens(tokens: Iterable<string>, stopwords: ReadonlySet<string> = STOPWORDS): string[] {
    const out: string[] = [];
    for (const token of tokens) {
        if (token.length <= 1) continue;
        if (stopwords.has(token)) continue;
        out.push(token);
    }
    return out;
}
