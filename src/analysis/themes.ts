import { vectorize } from '../nlp/tfidf.js';
import { factorize } from './nmf.js';
import { getLogger } from '../utils/logger.js';
import {
    DEFAULT_THEME_OPTIONS,
    type ThemeEmptyReason,
    type ThemeExtraction,
    type ThemeOptions,
} from '../types/index.js';

/**
 * Discover latent themes in a batch of aggregated paper texts.
 *
 * Vectorizes the texts into TF-IDF weights, factors the matrix with seeded
 * NMF, and summarizes each theme row by its highest-weighted terms. Never
 * throws: an empty corpus, an empty vocabulary or a failed factorization
 * each come back as an `empty` result with a logged warning.
 */
export function extractThemes(
    texts: readonly string[],
    options: Partial<ThemeOptions> = {}
): ThemeExtraction {
    const opts: ThemeOptions = { ...DEFAULT_THEME_OPTIONS, ...options };

    if (texts.length === 0) {
        return empty('empty-corpus', { documents: 0 });
    }

    const matrix = vectorize(texts, opts);
    if (matrix.vocabulary.length === 0) {
        return empty('empty-vocabulary', { documents: texts.length, minDf: opts.minDf, maxDf: opts.maxDf });
    }

    try {
        const { H, iterations, reconstructionError } = factorize(matrix.rows, {
            components: opts.themeCount,
            maxIterations: opts.maxIterations,
            seed: opts.seed,
            tolerance: opts.tolerance,
        });

        const themes = H.map((weights, index) => ({
            label: `Theme ${index + 1}`,
            keywords: topTerms(weights, matrix.vocabulary, opts.keywordsPerTheme),
        }));

        getLogger().info(
            { themes: themes.length, vocabulary: matrix.vocabulary.length, iterations, reconstructionError },
            'Themes extracted'
        );

        return { status: 'ok', themes };
    } catch (error) {
        return empty('factorization-failed', {
            error: error instanceof Error ? error.message : String(error),
        });
    }
}

/**
 * Pick the `count` largest-weighted terms of one theme row, highest first.
 * Equal weights keep vocabulary order.
 */
export function topTerms(weights: readonly number[], vocabulary: readonly string[], count: number): string[] {
    return weights
        .map((weight, index) => ({ weight, index }))
        .sort((a, b) => b.weight - a.weight || a.index - b.index)
        .slice(0, count)
        .map(({ index }) => vocabulary[index])
        .filter((term): term is string => term !== undefined);
}

function empty(reason: ThemeEmptyReason, details: Record<string, unknown>): ThemeExtraction {
    getLogger().warn({ reason, ...details }, 'No themes extracted');
    return { status: 'empty', reason, themes: [] };
}
