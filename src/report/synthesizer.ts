import { format } from 'date-fns';
import type { Corpus } from '../storage/corpus.js';
import {
    DEFAULT_SUMMARY_OPTIONS,
    type AnalysisReport,
    type Paper,
    type PaperSummary,
    type ReferenceStats,
    type SummaryOptions,
    type ThemeExtraction,
} from '../types/index.js';

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

export interface SynthesisInput {
    corpus: Corpus;
    themes: ThemeExtraction;
    referenceStats: ReferenceStats;
    /** Clock override, mainly for tests */
    now?: Date;
    options?: Partial<SummaryOptions>;
}

/**
 * Assemble the final report. Pure aggregation: no analysis happens here,
 * only summary defaulting, truncation and timestamping.
 */
export function synthesizeReport(input: SynthesisInput): AnalysisReport {
    const options: SummaryOptions = { ...DEFAULT_SUMMARY_OPTIONS, ...input.options };
    const generatedAt = input.now ?? new Date();

    return Object.freeze({
        totalPapers: input.corpus.size,
        themes: Object.freeze([...input.themes.themes]),
        themeStatus: input.themes.status,
        referenceStats: input.referenceStats,
        papersSummary: Object.freeze(input.corpus.toArray().map((paper) => summarizePaper(paper, options))),
        generatedAt,
        timestamp: format(generatedAt, TIMESTAMP_FORMAT),
    });
}

/**
 * Title (or the unknown-title default) plus the abstract cut to
 * `abstractMaxChars` characters with a trailing "..." when it is longer.
 */
export function summarizePaper(
    paper: Pick<Paper, 'title' | 'abstract'>,
    options: SummaryOptions = DEFAULT_SUMMARY_OPTIONS
): PaperSummary {
    return {
        title: paper.title ? paper.title : options.unknownTitle,
        abstract: paper.abstract
            ? truncate(paper.abstract, options.abstractMaxChars)
            : options.missingAbstract,
    };
}

/**
 * Cut text to `max` characters (code points, so surrogate pairs stay whole).
 */
export function truncate(text: string, max: number): string {
    const chars = Array.from(text);
    if (chars.length <= max) return text;
    return chars.slice(0, max).join('') + '...';
}
