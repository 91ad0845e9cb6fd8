import { createPaper, CorpusSealedError, type Paper, type RawPaperRecord } from '../types/index.js';

/**
 * In-memory paper store for one analysis run.
 *
 * Append-only while ingesting; `seal()` ends ingestion, after which the
 * corpus is read-only. Each stage receives the corpus explicitly, so no
 * state outlives the run.
 */
export class Corpus implements Iterable<Paper> {
    private readonly papers: Paper[] = [];
    private sealed = false;

    constructor(papers: Iterable<Paper | RawPaperRecord> = []) {
        for (const paper of papers) {
            this.append(paper);
        }
    }

    /**
     * Add a paper. Raw records are normalized and frozen first.
     */
    append(paper: Paper | RawPaperRecord): Paper {
        if (this.sealed) throw new CorpusSealedError();

        const frozen = createPaper(paper);
        this.papers.push(frozen);
        return frozen;
    }

    /**
     * Mark ingestion as finished. Returns `this` for chaining.
     */
    seal(): this {
        this.sealed = true;
        return this;
    }

    get isSealed(): boolean {
        return this.sealed;
    }

    get size(): number {
        return this.papers.length;
    }

    get(index: number): Paper | undefined {
        return this.papers[index];
    }

    toArray(): readonly Paper[] {
        return [...this.papers];
    }

    [Symbol.iterator](): Iterator<Paper> {
        return this.papers[Symbol.iterator]();
    }
}
