import type { RawPaperRecord } from '../types/index.js';

/**
 * Build the analyzable text of one paper: title, abstract and body joined
 * by single spaces. Missing fields count as empty strings. No case-folding
 * or cleanup happens here; the vectorizer owns that.
 */
export function aggregateText(paper: Pick<RawPaperRecord, 'title' | 'abstract' | 'body'>): string {
    return `${paper.title ?? ''} ${paper.abstract ?? ''} ${paper.body ?? ''}`;
}

/**
 * Aggregate every paper, preserving corpus order.
 */
export function aggregateCorpus(
    papers: Iterable<Pick<RawPaperRecord, 'title' | 'abstract' | 'body'>>
): string[] {
    const texts: string[] = [];
    for (const paper of papers) {
        texts.push(aggregateText(paper));
    }
    return texts;
}
