import type { Corpus } from '../storage/corpus.js';
import { aggregateCorpus } from '../nlp/aggregate.js';
import { extractThemes } from '../analysis/themes.js';
import { analyzeReferences } from '../analysis/references.js';
import { synthesizeReport } from '../report/synthesizer.js';
import { loadCommentary } from '../report/commentary.js';
import { writeArtifacts, writePapersFile } from '../exporters/export.js';
import { ingestDirectory, type IngestionSummary } from './ingest.js';
import { GrobidClient } from '../sources/grobid.js';
import { loadPapersFile } from '../sources/papers-file.js';
import { ExtractionCache } from '../cache/extraction-cache.js';
import type {
    AnalysisReport,
    ArtifactResult,
    ExtractionService,
    LitSynthConfig,
    ThemeExtraction,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';

export interface AnalysisOutcome {
    report: AnalysisReport;
    themes: ThemeExtraction;
}

export interface LoadedCorpus {
    corpus: Corpus;
    ingestion: IngestionSummary | null;
    /** Result of the --save-papers write, when one was requested */
    savedPapers: ArtifactResult | null;
}

export interface PipelineOutcome extends AnalysisOutcome {
    ingestion: IngestionSummary | null;
    artifacts: ArtifactResult[];
}

/**
 * Run the analysis stages over a loaded corpus:
 *
 * 1. Aggregate per-paper text
 * 2. Extract themes (TF-IDF + NMF)
 * 3. Analyze references
 * 4. Synthesize the report
 *
 * Theme extraction and reference analysis report problems as result values,
 * so an empty or degenerate corpus still produces a report.
 */
export function analyzeCorpus(
    corpus: Corpus,
    config: Pick<LitSynthConfig, 'themes' | 'summary'>,
    now?: Date
): AnalysisOutcome {
    if (!corpus.isSealed) corpus.seal();

    getLogger().info({ papers: corpus.size }, 'Starting analysis');

    const texts = aggregateCorpus(corpus);
    const themes = extractThemes(texts, config.themes);
    const referenceStats = analyzeReferences(corpus);

    const report = synthesizeReport({
        corpus,
        themes,
        referenceStats,
        now,
        options: config.summary,
    });

    return { report, themes };
}

/**
 * Load the corpus from the configured source: a saved papers file when one
 * is given, otherwise the PDF input directory through the extraction service.
 */
export async function loadCorpus(
    config: LitSynthConfig,
    service?: ExtractionService
): Promise<LoadedCorpus> {
    if (config.papersFile) {
        return { corpus: loadPapersFile(config.papersFile), ingestion: null, savedPapers: null };
    }

    const extractor = service ?? createExtractionService(config);
    const { corpus, summary } = await ingestDirectory(config.input, extractor, {
        delayMs: config.ingestion.requestDelayMs,
    });

    const savedPapers = config.savePapers ? writePapersFile(corpus, config.savePapers) : null;

    return { corpus, ingestion: summary, savedPapers };
}

/**
 * Full run: load the corpus, analyze it and write both artifacts. A
 * requested papers file is listed first among the artifacts.
 *
 * @throws ExtractionUnavailableError if the extraction service is down
 * @throws ConfigError if the papers or commentary file is invalid
 */
export async function runPipeline(
    config: LitSynthConfig,
    service?: ExtractionService
): Promise<PipelineOutcome> {
    const startTime = Date.now();

    // Fail on a bad commentary file before spending time on extraction
    const commentary = loadCommentary(config.commentaryFile);

    const { corpus, ingestion, savedPapers } = await loadCorpus(config, service);
    const { report, themes } = analyzeCorpus(corpus, config);
    const artifacts = writeArtifacts(report, commentary, config.outDir);
    if (savedPapers) artifacts.unshift(savedPapers);

    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    getLogger().info(
        {
            papers: report.totalPapers,
            themes: report.themes.length,
            artifactsWritten: artifacts.filter((a) => a.ok).length,
            elapsed: `${elapsed}s`,
        },
        'Analysis complete'
    );

    return { report, themes, ingestion, artifacts };
}

/**
 * Build the default extraction service from configuration.
 */
export function createExtractionService(config: LitSynthConfig): ExtractionService {
    return new GrobidClient({
        baseUrl: config.ingestion.grobidUrl,
        timeout: config.ingestion.timeout,
        cache: new ExtractionCache({ cacheDir: config.cacheDir, enabled: !config.noCache }),
    });
}
