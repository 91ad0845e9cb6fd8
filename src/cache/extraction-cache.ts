import { mkdirSync, existsSync, readFileSync, writeFileSync, readdirSync, statSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { Paper, RawPaperRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

const entrySchema = z.object({
    timestamp: z.number(),
    source: z.string(),
    paper: z.object({
        title: z.string(),
        abstract: z.string(),
        body: z.string(),
        references: z.array(z.string()),
    }),
});

/**
 * File-system cache of extraction results.
 * Stores one JSON file per document in a configurable cache directory.
 *
 * Cache key = SHA-256 of the PDF bytes, so a renamed file still hits.
 * TTL = 30 days by default.
 */
export class ExtractionCache {
    private cacheDir: string;
    private ttlMs: number;
    private enabled: boolean;

    constructor(options: {
        cacheDir?: string;
        ttlDays?: number;
        enabled?: boolean;
    } = {}) {
        this.cacheDir = options.cacheDir ?? '.litsynth-cache';
        this.ttlMs = (options.ttlDays ?? 30) * 24 * 60 * 60 * 1000;
        this.enabled = options.enabled ?? true;

        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
            getLogger().debug({ cacheDir: this.cacheDir }, 'Cache initialized');
        }
    }

    /**
     * Deterministic cache key for a document's contents.
     */
    static keyFor(content: Uint8Array): string {
        return createHash('sha256').update(content).digest('hex');
    }

    /**
     * Get a cached extraction, or null if not found, expired or unreadable.
     */
    get(key: string): RawPaperRecord | null {
        if (!this.enabled) return null;

        const filePath = this.pathFor(key);
        if (!existsSync(filePath)) return null;

        try {
            const entry = entrySchema.safeParse(JSON.parse(readFileSync(filePath, 'utf-8')));
            if (!entry.success) {
                getLogger().debug({ key }, 'Ignoring malformed cache entry');
                return null;
            }

            if (Date.now() - entry.data.timestamp > this.ttlMs) {
                getLogger().debug({ key }, 'Cache expired');
                return null;
            }

            getLogger().debug({ key, source: entry.data.source }, 'Cache hit');
            return entry.data.paper;
        } catch (error) {
            getLogger().debug({ key, error }, 'Cache entry unreadable');
            return null;
        }
    }

    /**
     * Store an extraction result.
     */
    set(key: string, source: string, paper: Pick<Paper, 'title' | 'abstract' | 'body' | 'references'>): void {
        if (!this.enabled) return;

        try {
            const entry = {
                timestamp: Date.now(),
                source,
                paper: {
                    title: paper.title,
                    abstract: paper.abstract,
                    body: paper.body,
                    references: [...paper.references],
                },
            };
            writeFileSync(this.pathFor(key), JSON.stringify(entry), 'utf-8');
        } catch (error) {
            getLogger().warn({ error }, 'Failed to write cache entry');
        }
    }

    /**
     * Entry count and total size on disk.
     */
    getStats(): { enabled: boolean; directory: string; entries: number; bytes: number } {
        let entries = 0;
        let bytes = 0;

        if (existsSync(this.cacheDir)) {
            for (const file of readdirSync(this.cacheDir)) {
                if (!file.endsWith('.json')) continue;
                entries++;
                bytes += statSync(join(this.cacheDir, file)).size;
            }
        }

        return { enabled: this.enabled, directory: this.cacheDir, entries, bytes };
    }

    /**
     * Remove every cached entry.
     */
    clear(): void {
        rmSync(this.cacheDir, { recursive: true, force: true });
        if (this.enabled) mkdirSync(this.cacheDir, { recursive: true });
    }

    private pathFor(key: string): string {
        return join(this.cacheDir, `${key}.json`);
    }
}
