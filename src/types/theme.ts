/**
 * One latent topic discovered by factorizing the term-weight matrix.
 */
export interface Theme {
    /** Positional label, e.g. "Theme 1" */
    label: string;

    /** Top-weighted terms, highest first */
    keywords: string[];
}

/**
 * Why the theme extractor produced no themes.
 */
export type ThemeEmptyReason = 'empty-corpus' | 'empty-vocabulary' | 'factorization-failed';

/**
 * Result of theme extraction. Callers branch on `status` instead of
 * catching errors; `themes` is always present.
 */
export type ThemeExtraction =
    | { status: 'ok'; themes: Theme[] }
    | { status: 'empty'; reason: ThemeEmptyReason; themes: [] };

/**
 * Corpus-wide reference statistics.
 */
export interface ReferenceStats {
    totalReferences: number;
    commonReferences: ReadonlySet<string>;
    avgReferencesPerPaper: number;
}
