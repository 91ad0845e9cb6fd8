/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Theme extraction configuration (vectorizer + factorization).
 */
export interface ThemeOptions {
    /** Number of latent themes (K) */
    themeCount: number;
    /** Keywords reported per theme */
    keywordsPerTheme: number;
    /** Vocabulary cap */
    maxFeatures: number;
    /** Drop terms present in more than this proportion of documents */
    maxDf: number;
    /** Drop terms present in fewer than this many documents */
    minDf: number;
    /** Smallest and largest n-gram length */
    ngramRange: [number, number];
    /** Also drop generic academic boilerplate terms */
    academicStopwords: boolean;
    maxIterations: number;
    seed: number;
    /** Relative error improvement below which factorization stops */
    tolerance: number;
}

/**
 * Per-paper summary rules.
 */
export interface SummaryOptions {
    abstractMaxChars: number;
    unknownTitle: string;
    missingAbstract: string;
}

/**
 * Ingestion (extraction collaborator) configuration.
 */
export interface IngestionConfig {
    grobidUrl: string;
    /** Pause between extraction calls */
    requestDelayMs: number;
    /** Per-request timeout */
    timeout: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface LitSynthConfig {
    // Input: a directory of PDFs or a previously saved papers file
    input: string;
    papersFile?: string;

    // Output
    outDir: string;
    savePapers?: string;
    commentaryFile?: string;

    // Cache
    cacheDir: string;
    noCache: boolean;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    ingestion: IngestionConfig;
    themes: ThemeOptions;
    summary: SummaryOptions;
}

/**
 * Default theme extraction values.
 */
export const DEFAULT_THEME_OPTIONS: ThemeOptions = {
    themeCount: 5,
    keywordsPerTheme: 9,
    maxFeatures: 1000,
    maxDf: 0.95,
    minDf: 2,
    ngramRange: [1, 2],
    academicStopwords: false,
    maxIterations: 400,
    seed: 42,
    tolerance: 1e-4,
};

export const DEFAULT_SUMMARY_OPTIONS: SummaryOptions = {
    abstractMaxChars: 500,
    unknownTitle: 'Unknown Title',
    missingAbstract: 'No abstract available',
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: LitSynthConfig = {
    input: './input',
    outDir: './output',
    cacheDir: '.litsynth-cache',
    noCache: false,
    logLevel: 'info',
    jsonLogs: false,
    ingestion: {
        grobidUrl: 'http://localhost:8070',
        requestDelayMs: 1000,
        timeout: 120000,
    },
    themes: DEFAULT_THEME_OPTIONS,
    summary: DEFAULT_SUMMARY_OPTIONS,
};
