/**
 * Barrel export for all shared types.
 */
export { createPaper } from './paper.js';
export type { Paper, RawPaperRecord, PaperSummary } from './paper.js';
export type { Theme, ThemeExtraction, ThemeEmptyReason, ReferenceStats } from './theme.js';
export type {
    AnalysisReport,
    Commentary,
    CommentarySection,
    ArtifactResult,
    ArtifactKind,
} from './report.js';
export { DEFAULT_CONFIG, DEFAULT_THEME_OPTIONS, DEFAULT_SUMMARY_OPTIONS } from './config.js';
export type {
    LitSynthConfig,
    LogLevel,
    ThemeOptions,
    SummaryOptions,
    IngestionConfig,
} from './config.js';
export type {
    ExtractionService,
    ExtractionServiceOptions,
    ExtractionResult,
} from './extraction-service.js';
export {
    ExtractionUnavailableError,
    FactorizationError,
    ConfigError,
    CorpusSealedError,
} from './errors.js';
