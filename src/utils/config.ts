import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { ConfigError, DEFAULT_CONFIG, type LitSynthConfig, type LogLevel } from '../types/index.js';
import { getLogger } from './logger.js';

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

/**
 * Shape accepted in litsynth.config.json. Every key is optional.
 */
const fileConfigSchema = z
    .object({
        input: z.string(),
        papersFile: z.string(),
        outDir: z.string(),
        savePapers: z.string(),
        commentaryFile: z.string(),
        cacheDir: z.string(),
        noCache: z.boolean(),
        logLevel: logLevelSchema,
        jsonLogs: z.boolean(),
        ingestion: z
            .object({
                grobidUrl: z.string().url(),
                requestDelayMs: z.number().int().nonnegative(),
                timeout: z.number().int().positive(),
            })
            .partial(),
        themes: z
            .object({
                themeCount: z.number().int().positive(),
                keywordsPerTheme: z.number().int().positive(),
                maxFeatures: z.number().int().positive(),
                maxDf: z.number().gt(0).max(1),
                minDf: z.number().int().nonnegative(),
                ngramRange: z.tuple([z.number().int().positive(), z.number().int().positive()]),
                academicStopwords: z.boolean(),
                maxIterations: z.number().int().positive(),
                seed: z.number().int(),
                tolerance: z.number().nonnegative(),
            })
            .partial(),
        summary: z
            .object({
                abstractMaxChars: z.number().int().positive(),
                unknownTitle: z.string(),
                missingAbstract: z.string(),
            })
            .partial(),
    })
    .partial()
    .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Config overrides as produced by the CLI: nested sections may be partial.
 */
export type ConfigOverrides = Omit<Partial<LitSynthConfig>, 'ingestion' | 'themes' | 'summary'> & {
    ingestion?: Partial<LitSynthConfig['ingestion']>;
    themes?: Partial<LitSynthConfig['themes']>;
    summary?: Partial<LitSynthConfig['summary']>;
};

/**
 * Load configuration from litsynth.config.json using cosmiconfig.
 * Returns null if no config file is found.
 *
 * @throws ConfigError when the file exists but does not validate
 */
async function loadConfigFile(searchFrom?: string): Promise<FileConfig | null> {
    const explorer = cosmiconfig('litsynth', {
        searchPlaces: ['litsynth.config.json'],
    });

    const result = await explorer.search(searchFrom).catch((error: unknown) => {
        throw new ConfigError(`Failed to read config file: ${error instanceof Error ? error.message : String(error)}`);
    });

    if (!result || result.isEmpty) return null;

    const parsed = fileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigError(`Invalid config file: ${issues}`, result.filepath);
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    const grobidUrl = env['GROBID_URL'];
    if (grobidUrl) {
        overrides.ingestion = { grobidUrl };
    }

    const level = logLevelSchema.safeParse(env['LITSYNTH_LOG_LEVEL']);
    if (level.success) {
        overrides.logLevel = level.data;
    }

    return overrides;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<LitSynthConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return mergeConfig(fileConfig ?? {}, envConfig, cliFlags);
}

/**
 * Layer overrides onto the defaults, later sources winning.
 * Nested sections are merged key by key; undefined values never override.
 */
export function mergeConfig(...layers: ConfigOverrides[]): LitSynthConfig {
    let merged: LitSynthConfig = {
        ...DEFAULT_CONFIG,
        ingestion: { ...DEFAULT_CONFIG.ingestion },
        themes: { ...DEFAULT_CONFIG.themes },
        summary: { ...DEFAULT_CONFIG.summary },
    };

    for (const layer of layers) {
        const { ingestion, themes, summary, ...flat } = layer;
        merged = {
            ...merged,
            ...definedOnly(flat),
            ingestion: { ...merged.ingestion, ...definedOnly(ingestion ?? {}) },
            themes: { ...merged.themes, ...definedOnly(themes ?? {}) },
            summary: { ...merged.summary, ...definedOnly(summary ?? {}) },
        };
    }

    return merged;
}

function definedOnly<T extends object>(value: T): Partial<T> {
    const out: Partial<T> = {};
    for (const key in value) {
        if (Object.hasOwn(value, key) && value[key] !== undefined) out[key] = value[key];
    }
    return out;
}

export function isLogLevel(value: unknown): value is LogLevel {
    return logLevelSchema.safeParse(value).success;
}
