import { ngrams, tokenize } from './tokenizer.js';
import { resolveStopwords } from './stopwords.js';
import { getLogger } from '../utils/logger.js';
import type { ThemeOptions } from '../types/index.js';

export type VectorizerOptions = Pick<
    ThemeOptions,
    'maxFeatures' | 'maxDf' | 'minDf' | 'ngramRange' | 'academicStopwords'
>;

/**
 * Dense document × term TF-IDF matrix.
 * Identical input produces identical output.
 */
export interface TermMatrix {
    /** Column index → term, sorted alphabetically */
    vocabulary: string[];
    /** One L2-normalized row per input document, in input order */
    rows: number[][];
    /** Term → document frequency, for the kept vocabulary only */
    df: Map<string, number>;
}

/**
 * Vectorize a batch of documents into TF-IDF weights over unigrams and bigrams.
 *
 * Pruning happens on document frequency first (terms above `maxDf` of the
 * documents or below `minDf` documents are dropped), then the vocabulary is
 * capped at `maxFeatures` by corpus-wide count. Weights are raw counts times
 * the smoothed idf `ln((1 + n) / (1 + df)) + 1`, rows L2-normalized.
 *
 * An empty vocabulary is a valid result; callers decide what it means.
 */
export function vectorize(texts: readonly string[], options: VectorizerOptions): TermMatrix {
    const stopwords = resolveStopwords(options.academicStopwords);
    const counts: Array<Map<string, number>> = [];
    const df = new Map<string, number>();
    const totals = new Map<string, number>();

    for (const text of texts) {
        const tf = new Map<string, number>();
        for (const gram of ngrams(tokenize(text, stopwords), options.ngramRange)) {
            tf.set(gram, (tf.get(gram) ?? 0) + 1);
        }
        counts.push(tf);

        for (const [term, count] of tf) {
            df.set(term, (df.get(term) ?? 0) + 1);
            totals.set(term, (totals.get(term) ?? 0) + count);
        }
    }

    const n = texts.length;
    const maxDocCount = options.maxDf * n;

    let kept = Array.from(df.entries())
        .filter(([, termDf]) => termDf <= maxDocCount && termDf >= options.minDf)
        .map(([term]) => term);

    if (kept.length > options.maxFeatures) {
        kept = kept
            .sort((a, b) => (totals.get(b) ?? 0) - (totals.get(a) ?? 0) || compareTerms(a, b))
            .slice(0, options.maxFeatures);
    }

    const vocabulary = kept.sort(compareTerms);
    const column = new Map(vocabulary.map((term, index) => [term, index]));
    const keptDf = new Map(vocabulary.map((term) => [term, df.get(term) ?? 0]));

    const rows = counts.map((tf) => {
        const row = new Array<number>(vocabulary.length).fill(0);
        for (const [term, count] of tf) {
            const index = column.get(term);
            if (index === undefined) continue;
            const idf = Math.log((1 + n) / (1 + (keptDf.get(term) ?? 0))) + 1;
            row[index] = count * idf;
        }
        return normalizeRow(row);
    });

    getLogger().debug(
        { documents: n, candidateTerms: df.size, vocabulary: vocabulary.length },
        'TF-IDF matrix built'
    );

    return { vocabulary, rows, df: keptDf };
}

function normalizeRow(row: number[]): number[] {
    let norm = 0;
    for (const value of row) norm += value * value;
    if (norm === 0) return row;

    norm = Math.sqrt(norm);
    return row.map((value) => value / norm);
}

function compareTerms(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}
