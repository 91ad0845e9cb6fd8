/**
 * Core data model for one ingested document.
 * Produced by an extraction collaborator and frozen on construction;
 * the analysis stages only ever read it.
 */
export interface Paper {
    /** Paper title (empty when extraction found none) */
    readonly title: string;

    /** Abstract text (empty when extraction found none) */
    readonly abstract: string;

    /** Full body text */
    readonly body: string;

    /** Reference titles in extraction order (duplicates allowed) */
    readonly references: readonly string[];

    /** File the paper was extracted from, for logging only */
    readonly source: string | null;
}

/**
 * Raw paper data from a collaborator before normalization.
 * Every field may be absent; `createPaper()` fills the gaps.
 */
export interface RawPaperRecord {
    title?: string | null;
    abstract?: string | null;
    body?: string | null;
    references?: readonly string[] | null;
    source?: string | null;
}

/**
 * Per-paper entry of the report: title plus a truncated abstract.
 */
export interface PaperSummary {
    title: string;
    abstract: string;
}

/**
 * Normalize a raw record into an immutable Paper.
 */
export function createPaper(raw: RawPaperRecord): Paper {
    return Object.freeze({
        title: raw.title ?? '',
        abstract: raw.abstract ?? '',
        body: raw.body ?? '',
        references: Object.freeze([...(raw.references ?? [])]),
        source: raw.source ?? null,
    });
}
