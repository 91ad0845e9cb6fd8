import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync, existsSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { ingestDirectory, listPdfFiles } from '../builder/ingest.js';
import { analyzeCorpus, runPipeline } from '../builder/pipeline.js';
import { mergeConfig, loadEnvVars, resolveConfig, isLogLevel } from '../utils/config.js';
import { Corpus } from '../storage/corpus.js';
import { getLogger } from '../utils/logger.js';
import { REVIEW_JSON_FILE, NARRATIVE_REPORT_FILE } from '../exporters/export.js';
import {
    createPaper,
    ConfigError,
    DEFAULT_CONFIG,
    ExtractionUnavailableError,
    type ExtractionResult,
    type ExtractionService,
    type LitSynthConfig,
} from '../types/index.js';

/**
 * In-process stand-in for GROBID. Files without a scripted outcome
 * extract to a paper titled after the file.
 */
class FakeExtractionService implements ExtractionService {
    readonly name = 'Fake';
    readonly calls: string[] = [];

    constructor(
        private readonly available = true,
        private readonly outcomes: Record<string, ExtractionResult | Error> = {}
    ) {}

    async isAvailable(): Promise<boolean> {
        return this.available;
    }

    async extract(pdfPath: string): Promise<ExtractionResult> {
        const name = basename(pdfPath);
        this.calls.push(name);
        const outcome = this.outcomes[name];
        if (outcome instanceof Error) throw outcome;
        return outcome ?? { ok: true, paper: createPaper({ title: name, references: ['Shared'] }) };
    }
}

const PAPERS = [
    { title: 'Neural network training', abstract: 'Gradient methods.', references: ['A', 'B'] },
    { title: 'Neural network inference', abstract: 'Hardware methods.', references: ['A'] },
    { title: 'Protein structure', abstract: 'Folding prediction.', references: ['A', 'C'] },
    { title: 'Protein structure dynamics', abstract: 'Simulation methods.', references: ['A'] },
];

describe('Ingestion', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'litsynth-ingest-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    function touch(...names: string[]): void {
        for (const name of names) writeFileSync(join(dir, name), 'placeholder');
    }

    it('should list PDF files by name, ignoring other files', () => {
        touch('b.pdf', 'a.PDF', 'notes.txt', 'c.pdf');
        expect(listPdfFiles(dir).map((f) => basename(f))).toEqual(['a.PDF', 'b.pdf', 'c.pdf']);
    });

    it('should skip failed documents and keep going', async () => {
        touch('a.pdf', 'b.pdf', 'c.pdf');
        const service = new FakeExtractionService(true, {
            'b.pdf': { ok: false, reason: 'bad scan' },
            'c.pdf': new Error('boom'),
        });
        const wait = vi.fn(async (_ms: number) => {});

        const { corpus, summary } = await ingestDirectory(dir, service, { delayMs: 5, wait });

        expect(service.calls).toEqual(['a.pdf', 'b.pdf', 'c.pdf']);
        expect(corpus.isSealed).toBe(true);
        expect([...corpus].map((p) => p.title)).toEqual(['a.pdf']);
        expect(summary).toEqual({
            found: 3,
            ingested: 1,
            failed: [
                { file: 'b.pdf', reason: 'bad scan' },
                { file: 'c.pdf', reason: 'boom' },
            ],
        });
        expect(wait).toHaveBeenCalledTimes(2);
        expect(wait).toHaveBeenCalledWith(5);
    });

    it('should abort when the service is unavailable', async () => {
        touch('a.pdf');
        const service = new FakeExtractionService(false);

        await expect(ingestDirectory(dir, service, { delayMs: 0 })).rejects.toBeInstanceOf(ExtractionUnavailableError);
        expect(service.calls).toEqual([]);
    });

    it('should return an empty corpus for an empty directory without a health check', async () => {
        const service = new FakeExtractionService(false);
        const healthCheck = vi.spyOn(service, 'isAvailable');

        const { corpus, summary } = await ingestDirectory(dir, service);

        expect(corpus.size).toBe(0);
        expect(summary).toEqual({ found: 0, ingested: 0, failed: [] });
        expect(healthCheck).not.toHaveBeenCalled();
    });

    it('should treat a missing input directory as an empty corpus', async () => {
        const service = new FakeExtractionService();
        const healthCheck = vi.spyOn(service, 'isAvailable');

        const { corpus, summary } = await ingestDirectory(join(dir, 'no-such-dir'), service);

        expect(listPdfFiles(join(dir, 'no-such-dir'))).toEqual([]);
        expect(corpus.isSealed).toBe(true);
        expect(corpus.size).toBe(0);
        expect(summary).toEqual({ found: 0, ingested: 0, failed: [] });
        expect(healthCheck).not.toHaveBeenCalled();
        expect(service.calls).toEqual([]);
    });
});

describe('Pipeline', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'litsynth-pipeline-'));
    });

    afterEach(() => {
        vi.restoreAllMocks();
        rmSync(dir, { recursive: true, force: true });
    });

    function config(overrides: Partial<LitSynthConfig> = {}): LitSynthConfig {
        return mergeConfig({ outDir: join(dir, 'out'), noCache: true }, overrides);
    }

    it('should analyze a corpus end to end and seal it', () => {
        const corpus = new Corpus(PAPERS);
        const { report, themes } = analyzeCorpus(corpus, config(), new Date(2024, 0, 2, 3, 4, 5));

        expect(corpus.isSealed).toBe(true);
        expect(themes.status).toBe('ok');
        expect(report.totalPapers).toBe(4);
        expect(report.themes).toHaveLength(5);
        expect(report.referenceStats.totalReferences).toBe(6);
        expect([...report.referenceStats.commonReferences]).toEqual(['A']);
        expect(report.referenceStats.avgReferencesPerPaper).toBe(1.5);
        expect(report.timestamp).toBe('2024-01-02 03:04:05');
    });

    it('should produce a report for an empty corpus', () => {
        const { report, themes } = analyzeCorpus(new Corpus(), config());

        expect(themes).toEqual({ status: 'empty', reason: 'empty-corpus', themes: [] });
        expect(report.totalPapers).toBe(0);
        expect(report.referenceStats.avgReferencesPerPaper).toBe(0);
    });

    it('should run from a papers file and write both artifacts', async () => {
        const papersFile = join(dir, 'papers.json');
        writeFileSync(papersFile, JSON.stringify(PAPERS));

        const outcome = await runPipeline(config({ papersFile }));

        expect(outcome.ingestion).toBeNull();
        expect(outcome.artifacts.every((a) => a.ok)).toBe(true);
        const review: unknown = JSON.parse(readFileSync(join(dir, 'out', REVIEW_JSON_FILE), 'utf-8'));
        expect(review).toMatchObject({ total_papers: 4 });
        expect(existsSync(join(dir, 'out', NARRATIVE_REPORT_FILE))).toBe(true);
    });

    it('should log each written artifact exactly once', async () => {
        const papersFile = join(dir, 'papers.json');
        writeFileSync(papersFile, JSON.stringify(PAPERS));
        const info = vi.spyOn(getLogger(), 'info');

        await runPipeline(config({ papersFile }));

        const written = info.mock.calls.filter((call) => call[1] === 'Artifact written');
        expect(written).toHaveLength(2);
    });

    it('should ingest PDFs through the service and save the papers', async () => {
        const input = join(dir, 'pdfs');
        mkdirSync(input);
        writeFileSync(join(input, 'one.pdf'), 'placeholder');
        writeFileSync(join(input, 'two.pdf'), 'placeholder');
        const savePapers = join(dir, 'saved', 'papers.json');

        const outcome = await runPipeline(
            config({ input, savePapers, ingestion: { ...DEFAULT_CONFIG.ingestion, requestDelayMs: 0 } }),
            new FakeExtractionService()
        );

        expect(outcome.ingestion).toEqual({ found: 2, ingested: 2, failed: [] });
        expect(outcome.report.papersSummary.map((p) => p.title)).toEqual(['one.pdf', 'two.pdf']);
        expect([...outcome.report.referenceStats.commonReferences]).toEqual(['Shared']);
        expect(existsSync(savePapers)).toBe(true);
        expect(outcome.artifacts.map((a) => a.artifact)).toEqual(['papers-file', 'review-json', 'narrative-report']);
        expect(outcome.artifacts[0]).toEqual({ ok: true, artifact: 'papers-file', path: savePapers });
    });

    it('should report a failed papers save without stopping the analysis', async () => {
        const input = join(dir, 'pdfs');
        mkdirSync(input);
        writeFileSync(join(input, 'one.pdf'), 'placeholder');
        const blocker = join(dir, 'blocker');
        writeFileSync(blocker, 'a regular file');
        const savePapers = join(blocker, 'papers.json');

        const outcome = await runPipeline(
            config({ input, savePapers, ingestion: { ...DEFAULT_CONFIG.ingestion, requestDelayMs: 0 } }),
            new FakeExtractionService()
        );

        expect(outcome.ingestion).toEqual({ found: 1, ingested: 1, failed: [] });
        expect(outcome.artifacts[0]).toMatchObject({ ok: false, artifact: 'papers-file', path: savePapers });
        expect(outcome.artifacts.slice(1).every((a) => a.ok)).toBe(true);
        expect(existsSync(savePapers)).toBe(false);
        const review: unknown = JSON.parse(readFileSync(join(dir, 'out', REVIEW_JSON_FILE), 'utf-8'));
        expect(review).toMatchObject({ total_papers: 1 });
    });

    it('should fail fast on an invalid commentary file', async () => {
        const commentaryFile = join(dir, 'commentary.json');
        writeFileSync(commentaryFile, '{}');
        const service = new FakeExtractionService();

        await expect(runPipeline(config({ commentaryFile }), service)).rejects.toBeInstanceOf(ConfigError);
        expect(service.calls).toEqual([]);
    });
});

describe('Configuration', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'litsynth-config-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should start from the defaults', () => {
        expect(mergeConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should merge nested sections key by key', () => {
        const merged = mergeConfig({ themes: { themeCount: 3 } }, { themes: { seed: 7 }, outDir: 'x' });
        expect(merged.themes.themeCount).toBe(3);
        expect(merged.themes.seed).toBe(7);
        expect(merged.themes.maxDf).toBe(0.95);
        expect(merged.outDir).toBe('x');
    });

    it('should not let undefined values override', () => {
        const merged = mergeConfig({ outDir: 'a', themes: { seed: 1 } }, { outDir: undefined, themes: { seed: undefined } });
        expect(merged.outDir).toBe('a');
        expect(merged.themes.seed).toBe(1);
    });

    it('should not mutate the defaults', () => {
        mergeConfig({ themes: { themeCount: 2 }, ingestion: { requestDelayMs: 0 } });
        expect(DEFAULT_CONFIG.themes.themeCount).toBe(5);
        expect(DEFAULT_CONFIG.ingestion.requestDelayMs).toBe(1000);
    });

    it('should read the GROBID URL and log level from the environment', () => {
        expect(loadEnvVars({ GROBID_URL: 'http://grobid.test:8070', LITSYNTH_LOG_LEVEL: 'debug' })).toEqual({
            ingestion: { grobidUrl: 'http://grobid.test:8070' },
            logLevel: 'debug',
        });
        expect(loadEnvVars({ LITSYNTH_LOG_LEVEL: 'loud' })).toEqual({});
    });

    it('should apply CLI flags over environment over config file', async () => {
        writeFileSync(
            join(dir, 'litsynth.config.json'),
            JSON.stringify({ outDir: 'file-out', logLevel: 'warn', themes: { themeCount: 7 } })
        );

        const resolved = await resolveConfig(
            { outDir: 'cli-out' },
            { searchFrom: dir, env: { LITSYNTH_LOG_LEVEL: 'error' } }
        );

        expect(resolved.outDir).toBe('cli-out');
        expect(resolved.logLevel).toBe('error');
        expect(resolved.themes.themeCount).toBe(7);
        expect(resolved.themes.keywordsPerTheme).toBe(9);
    });

    it('should use the defaults when no config file exists', async () => {
        expect(await resolveConfig({}, { searchFrom: dir, env: {} })).toEqual(DEFAULT_CONFIG);
    });

    it('should reject unknown keys in the config file', async () => {
        writeFileSync(join(dir, 'litsynth.config.json'), JSON.stringify({ outdir: 'typo' }));
        await expect(resolveConfig({}, { searchFrom: dir, env: {} })).rejects.toBeInstanceOf(ConfigError);
    });

    it('should recognize log levels', () => {
        expect(isLogLevel('debug')).toBe(true);
        expect(isLogLevel('verbose')).toBe(false);
    });
});
