import { STOPWORDS } from './stopwords.js';

/**
 * Tokenize text into an array of lowercase tokens.
 * - Lowercase
 * - Split on whitespace, punctuation and hyphens
 * - Remove stopwords
 * - Remove single-character tokens and pure numbers
 * - No stemming (deterministic)
 */
export function tokenize(text: string, stopwords: ReadonlySet<string> = STOPWORDS): string[] {
    if (!text) return [];

    return text
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s]/gu, ' ')
        .split(/\s+/)
        .filter((token) =>
            token.length > 1 &&
            !stopwords.has(token) &&
            !/^\d+$/.test(token)
        );
}

/**
 * Build the n-grams of a token stream for every length in [min, max].
 * N-grams are joined by a single space.
 */
export function ngrams(tokens: readonly string[], [min, max]: [number, number]): string[] {
    const grams: string[] = [];

    for (let n = Math.max(1, min); n <= max; n++) {
        for (let i = 0; i + n <= tokens.length; i++) {
            grams.push(tokens.slice(i, i + n).join(' '));
        }
    }

    return grams;
}
