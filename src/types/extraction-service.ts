import type { Paper } from './paper.js';

/**
 * Outcome of extracting one document. Failures are values, not exceptions,
 * so a batch can skip them and keep going.
 */
export type ExtractionResult =
    | { ok: true; paper: Paper }
    | { ok: false; reason: string };

/**
 * Interface for document-extraction services (GROBID, etc.).
 * Each service turns a PDF file into a normalized Paper.
 */
export interface ExtractionService {
    /** Human-readable service name */
    readonly name: string;

    /**
     * Check that the service is reachable before a batch starts.
     */
    isAvailable(): Promise<boolean>;

    /**
     * Extract a single PDF file.
     * @param pdfPath - Path to the PDF on disk
     */
    extract(pdfPath: string): Promise<ExtractionResult>;
}

/**
 * Options for extraction service initialization.
 */
export interface ExtractionServiceOptions {
    /** Base URL of the service */
    baseUrl?: string;

    /** Request timeout in milliseconds */
    timeout?: number;
}
