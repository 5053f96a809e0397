import natural from 'natural';

/**
 * Porter stemming of a single lowercase token.
 * Pure string transform; no dictionary lookups.
 */
export function stem(token: string): string {
    return natural.PorterStemmer.stem(token);
}
