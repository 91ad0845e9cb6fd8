import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { Corpus } from '../storage/corpus.js';
import { ConfigError } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const rawPaperSchema = z.object({
    title: z.string().nullish(),
    abstract: z.string().nullish(),
    body: z.string().nullish(),
    references: z.array(z.string()).nullish(),
    source: z.string().nullish(),
});

const papersFileSchema = z.array(rawPaperSchema);

/**
 * Load a JSON array of previously extracted papers into a sealed corpus.
 *
 * @throws ConfigError when the file is unreadable or not an array of paper records
 */
export function loadPapersFile(path: string): Corpus {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new ConfigError(
            `Cannot read papers file: ${error instanceof Error ? error.message : String(error)}`,
            path
        );
    }

    const parsed = papersFileSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .slice(0, 5)
            .map((i) => `${i.path.join('.')}: ${i.message}`)
            .join('; ');
        throw new ConfigError(`Invalid papers file: ${issues}`, path);
    }

    const corpus = new Corpus(parsed.data).seal();
    getLogger().info({ path, papers: corpus.size }, 'Loaded papers file');
    return corpus;
}

/**
 * Write a corpus as a JSON array so it can be re-analyzed without
 * extracting the PDFs again.
 */
export function savePapersFile(corpus: Corpus, path: string): void {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, renderPapersFile(corpus), 'utf-8');
    getLogger().info({ path, papers: corpus.size }, 'Saved papers file');
}

export function renderPapersFile(corpus: Corpus): string {
    return JSON.stringify(corpus.toArray(), null, 2);
}
