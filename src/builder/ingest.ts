import { readdirSync, statSync } from 'node:fs';
import { basename, join } from 'node:path';
import { Corpus } from '../storage/corpus.js';
import { ExtractionUnavailableError, type ExtractionService } from '../types/index.js';
import { sleep } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

export interface IngestOptions {
    /** Pause between extraction calls */
    delayMs?: number;
    /** Replaceable for tests */
    wait?: (ms: number) => Promise<void>;
}

export interface IngestionSummary {
    found: number;
    ingested: number;
    failed: Array<{ file: string; reason: string }>;
}

export interface IngestionResult {
    corpus: Corpus;
    summary: IngestionSummary;
}

/**
 * List the PDF files of a directory, sorted by name. A missing input
 * directory is logged and yields no files.
 */
export function listPdfFiles(dir: string): string[] {
    if (!statSync(dir, { throwIfNoEntry: false })?.isDirectory()) {
        getLogger().error({ dir }, 'Input directory not found');
        return [];
    }

    return readdirSync(dir, { withFileTypes: true })
        .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.pdf'))
        .map((entry) => entry.name)
        .sort()
        .map((name) => join(dir, name));
}

/**
 * Extract every PDF in a directory into a sealed corpus.
 *
 * Files are processed one at a time with a fixed pause between calls.
 * A file that fails to extract is logged and skipped; only an unreachable
 * service before the first file aborts the run.
 *
 * @throws ExtractionUnavailableError when the service health check fails
 */
export async function ingestDirectory(
    dir: string,
    service: ExtractionService,
    options: IngestOptions = {}
): Promise<IngestionResult> {
    const { delayMs = 1000, wait = sleep } = options;
    const files = listPdfFiles(dir);
    getLogger().info({ dir, found: files.length }, 'Found PDF files');

    const corpus = new Corpus();
    const summary: IngestionSummary = { found: files.length, ingested: 0, failed: [] };

    if (files.length === 0) {
        return { corpus: corpus.seal(), summary };
    }

    if (!(await service.isAvailable())) {
        throw new ExtractionUnavailableError(
            `${service.name} is not responding; check that the service is running`,
            service.name
        );
    }

    for (const [index, file] of files.entries()) {
        const name = basename(file);

        try {
            const result = await service.extract(file);
            if (result.ok) {
                corpus.append(result.paper);
                summary.ingested++;
                getLogger().info({ file: name, progress: `${index + 1}/${files.length}` }, 'Processed PDF');
            } else {
                summary.failed.push({ file: name, reason: result.reason });
                getLogger().error({ file: name, reason: result.reason }, 'Extraction failed, skipping');
            }
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            summary.failed.push({ file: name, reason });
            getLogger().error({ file: name, reason }, 'Extraction threw, skipping');
        }

        if (index < files.length - 1 && delayMs > 0) {
            await wait(delayMs);
        }
    }

    getLogger().info(
        { found: summary.found, ingested: summary.ingested, failed: summary.failed.length },
        'Ingestion complete'
    );

    return { corpus: corpus.seal(), summary };
}
