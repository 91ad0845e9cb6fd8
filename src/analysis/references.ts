import type { Paper, ReferenceStats } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Compute corpus-wide reference statistics in one pass.
 *
 * The first paper seeds the common set with its references; each later
 * paper can only shrink it. A paper with an empty reference list therefore
 * empties the common set for the whole corpus.
 */
export function analyzeReferences(papers: Iterable<Pick<Paper, 'references'>>): ReferenceStats {
    let total = 0;
    let count = 0;
    let common: Set<string> | null = null;

    for (const paper of papers) {
        count++;
        total += paper.references.length;

        if (common === null) {
            common = new Set(paper.references);
        } else {
            const current = new Set(paper.references);
            for (const reference of common) {
                if (!current.has(reference)) common.delete(reference);
            }
        }
    }

    const stats: ReferenceStats = {
        totalReferences: total,
        commonReferences: common ?? new Set<string>(),
        avgReferencesPerPaper: count > 0 ? total / count : 0,
    };

    getLogger().info(
        { papers: count, totalReferences: total, commonReferences: stats.commonReferences.size },
        'Reference analysis complete'
    );

    return stats;
}
