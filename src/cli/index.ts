import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, isLogLevel, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { runPipeline, createExtractionService } from '../builder/pipeline.js';
import { ingestDirectory } from '../builder/ingest.js';
import { savePapersFile } from '../sources/papers-file.js';
import { GrobidClient } from '../sources/grobid.js';
import { ExtractionCache } from '../cache/extraction-cache.js';
import { ConfigError, ExtractionUnavailableError, type LitSynthConfig, type LogLevel } from '../types/index.js';

const VERSION = '1.0.0';

interface CommonOptions {
    grobidUrl?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

interface AnalyzeOptions extends CommonOptions {
    input?: string;
    papers?: string;
    out?: string;
    delay?: number;
    themes?: number;
    keywords?: number;
    seed?: number;
    maxIter?: number;
    commentary?: string;
    savePapers?: string;
    cache: boolean;
}

interface ExtractOptions extends CommonOptions {
    input: string;
    out: string;
    delay?: number;
    cache: boolean;
}

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

function parsePositiveInteger(value: string): number {
    const parsed = parseInteger(value);
    if (parsed < 1) {
        throw new InvalidArgumentError('Must be at least 1.');
    }
    return parsed;
}

function parseNonNegativeInteger(value: string): number {
    const parsed = parseInteger(value);
    if (parsed < 0) {
        throw new InvalidArgumentError('Must not be negative.');
    }
    return parsed;
}

function parseLogLevel(value: string): LogLevel {
    if (!isLogLevel(value)) {
        throw new ConfigError(`Invalid log level: ${value}. Valid: debug, info, warn, error`);
    }
    return value;
}

function commonOverrides(opts: CommonOptions): ConfigOverrides {
    return {
        logLevel: opts.logLevel === undefined ? undefined : parseLogLevel(opts.logLevel),
        jsonLogs: opts.jsonLogs,
        ingestion: { grobidUrl: opts.grobidUrl },
    };
}

/**
 * Resolve configuration and set up the logger and HTTP client for a command.
 */
async function setup(overrides: ConfigOverrides): Promise<LitSynthConfig> {
    const config = await resolveConfig(overrides);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    getHttpClient({ timeout: config.ingestion.timeout, version: VERSION });
    return config;
}

/**
 * Log a fatal error and exit with status 1.
 */
function fail(error: unknown, message: string): never {
    const logger = getLogger();
    if (error instanceof ExtractionUnavailableError) {
        logger.error({ service: error.service }, error.message);
    } else if (error instanceof ConfigError) {
        logger.error({ path: error.path }, error.message);
    } else {
        logger.error({ error }, message);
    }
    process.exit(1);
}

const program = new Command();

program
    .name('litsynth')
    .description('Extract themes and reference statistics from a corpus of research papers.')
    .version(VERSION);

// ─── ANALYZE command ──────────────────────────────────────

program
    .command('analyze')
    .description('Ingest papers, extract themes and write the review artifacts')
    .option('-i, --input <dir>', 'Directory of PDF files')
    .option('--papers <file>', 'Analyze a saved papers JSON file instead of PDFs')
    .option('-o, --out <dir>', 'Output directory for the artifacts')
    .option('--grobid-url <url>', 'GROBID service base URL')
    .option('--delay <ms>', 'Pause between extraction calls', parseNonNegativeInteger)
    .option('--themes <k>', 'Number of themes to extract', parsePositiveInteger)
    .option('--keywords <n>', 'Keywords per theme', parsePositiveInteger)
    .option('--seed <n>', 'Factorization seed', parseInteger)
    .option('--max-iter <n>', 'Factorization iteration cap', parsePositiveInteger)
    .option('--commentary <file>', 'Commentary template for the narrative report')
    .option('--save-papers <file>', 'Also write the extracted papers as JSON')
    .option('--no-cache', 'Disable the extraction cache')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: AnalyzeOptions) => {
        try {
            const config = await setup({
                ...commonOverrides(opts),
                input: opts.input,
                papersFile: opts.papers,
                outDir: opts.out,
                commentaryFile: opts.commentary,
                savePapers: opts.savePapers,
                noCache: opts.cache ? undefined : true,
                ingestion: { grobidUrl: opts.grobidUrl, requestDelayMs: opts.delay },
                themes: {
                    themeCount: opts.themes,
                    keywordsPerTheme: opts.keywords,
                    seed: opts.seed,
                    maxIterations: opts.maxIter,
                },
            });

            const outcome = await runPipeline(config);
            if (outcome.artifacts.some((a) => !a.ok)) {
                process.exitCode = 1;
            }
        } catch (error) {
            fail(error, 'Analysis failed');
        }
    });

// ─── EXTRACT command ──────────────────────────────────────

program
    .command('extract')
    .description('Extract PDFs through GROBID and save the papers as JSON')
    .requiredOption('-i, --input <dir>', 'Directory of PDF files')
    .requiredOption('-o, --out <file>', 'Output papers JSON file')
    .option('--grobid-url <url>', 'GROBID service base URL')
    .option('--delay <ms>', 'Pause between extraction calls', parseNonNegativeInteger)
    .option('--no-cache', 'Disable the extraction cache')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: ExtractOptions) => {
        try {
            const config = await setup({
                ...commonOverrides(opts),
                input: opts.input,
                noCache: opts.cache ? undefined : true,
                ingestion: { grobidUrl: opts.grobidUrl, requestDelayMs: opts.delay },
            });

            const { corpus, summary } = await ingestDirectory(config.input, createExtractionService(config), {
                delayMs: config.ingestion.requestDelayMs,
            });
            savePapersFile(corpus, opts.out);

            if (summary.failed.length > 0) {
                getLogger().warn({ failed: summary.failed.map((f) => f.file) }, 'Some files could not be extracted');
            }
        } catch (error) {
            fail(error, 'Extraction failed');
        }
    });

// ─── CHECK command ────────────────────────────────────────

program
    .command('check')
    .description('Check that the GROBID service is reachable')
    .option('--grobid-url <url>', 'GROBID service base URL')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: CommonOptions) => {
        try {
            const config = await setup(commonOverrides(opts));
            const client = new GrobidClient({
                baseUrl: config.ingestion.grobidUrl,
                timeout: config.ingestion.timeout,
            });

            if (await client.isAvailable()) {
                getLogger().info({ url: config.ingestion.grobidUrl }, 'GROBID is alive');
            } else {
                getLogger().error({ url: config.ingestion.grobidUrl }, 'GROBID is not responding');
                process.exitCode = 1;
            }
        } catch (error) {
            fail(error, 'Check failed');
        }
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the extraction cache')
    .argument('<action>', 'Action: clear | stats')
    .action(async (action: string) => {
        try {
            const config = await setup({});
            const cache = new ExtractionCache({ cacheDir: config.cacheDir });

            switch (action) {
                case 'clear':
                    cache.clear();
                    console.log('Cache cleared.');
                    break;
                case 'stats': {
                    const stats = cache.getStats();
                    console.log(`Cache: ${stats.entries} entries, ${(stats.bytes / 1024).toFixed(1)} KB in ${stats.directory}`);
                    break;
                }
                default:
                    console.error(`Unknown action: ${action}. Valid: clear, stats`);
                    process.exitCode = 1;
            }
        } catch (error) {
            fail(error, 'Cache command failed');
        }
    });

await program.parseAsync();
