import type { PaperSummary } from './paper.js';
import type { ReferenceStats, Theme, ThemeExtraction } from './theme.js';

/**
 * Final aggregate of one analysis run. Frozen after synthesis.
 */
export interface AnalysisReport {
    readonly totalPapers: number;
    readonly themes: readonly Theme[];
    /** Which variant the theme extractor produced */
    readonly themeStatus: ThemeExtraction['status'];
    readonly referenceStats: ReferenceStats;
    readonly papersSummary: readonly PaperSummary[];
    readonly generatedAt: Date;
    /** `YYYY-MM-DD HH:MM:SS`, local time */
    readonly timestamp: string;
}

/**
 * Static domain commentary interpolated around the report's data.
 * Nothing here is computed; it is supplied by the user or the defaults.
 */
export interface Commentary {
    title: string;
    researchArea: string;
    timePeriod: string;
    sections: CommentarySection[];
    conclusion: string;
}

export interface CommentarySection {
    heading: string;
    items: string[];
}

/**
 * Outcome of writing one output artifact.
 */
export type ArtifactResult =
    | { ok: true; artifact: ArtifactKind; path: string }
    | { ok: false; artifact: ArtifactKind; path: string; error: string };

export type ArtifactKind = 'review-json' | 'narrative-report' | 'papers-file';
