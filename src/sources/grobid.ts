import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import {
    createPaper,
    type ExtractionResult,
    type ExtractionService,
    type ExtractionServiceOptions,
} from '../types/index.js';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { ExtractionCache } from '../cache/extraction-cache.js';
import { getLogger } from '../utils/logger.js';
import { parseTei } from './tei.js';

const GROBID_DEFAULT_URL = 'http://localhost:8070';

export interface GrobidClientOptions extends ExtractionServiceOptions {
    httpClient?: HttpClient;
    cache?: ExtractionCache;
}

/**
 * GROBID extraction service.
 * Sends each PDF to `processFulltextDocument` and parses the TEI response.
 *
 * @see https://grobid.readthedocs.io/en/latest/Grobid-service/
 */
export class GrobidClient implements ExtractionService {
    readonly name = 'GROBID';
    private readonly baseUrl: string;
    private readonly timeout: number;
    private readonly httpClient: HttpClient;
    private readonly cache: ExtractionCache | undefined;

    constructor(options: GrobidClientOptions = {}) {
        this.baseUrl = (options.baseUrl ?? process.env['GROBID_URL'] ?? GROBID_DEFAULT_URL).replace(/\/+$/, '');
        this.timeout = options.timeout ?? 120000;
        this.httpClient = options.httpClient ?? getHttpClient();
        this.cache = options.cache;
        getLogger().debug({ baseUrl: this.baseUrl }, 'GROBID client initialized');
    }

    async isAvailable(): Promise<boolean> {
        try {
            const response = await this.httpClient.get<string>(`${this.baseUrl}/api/isalive`, {
                source: 'grobid',
                timeout: 10000,
            });
            return response.ok;
        } catch (error) {
            getLogger().error(
                { baseUrl: this.baseUrl, error: error instanceof Error ? error.message : String(error) },
                'GROBID health check failed'
            );
            return false;
        }
    }

    async extract(pdfPath: string): Promise<ExtractionResult> {
        let content: Buffer;
        try {
            content = await readFile(pdfPath);
        } catch (error) {
            return { ok: false, reason: `Cannot read ${pdfPath}: ${errorMessage(error)}` };
        }

        const key = ExtractionCache.keyFor(content);
        const cached = this.cache?.get(key);
        if (cached) {
            return { ok: true, paper: createPaper({ ...cached, source: pdfPath }) };
        }

        const form = new FormData();
        form.append('input', new Blob([new Uint8Array(content)], { type: 'application/pdf' }), basename(pdfPath));

        let xml: string;
        try {
            const response = await this.httpClient.post<string>(
                `${this.baseUrl}/api/processFulltextDocument`,
                form,
                { source: 'grobid', timeout: this.timeout, headers: { Accept: 'application/xml' } }
            );
            xml = typeof response.data === 'string' ? response.data : '';
        } catch (error) {
            const reason = error instanceof HttpError && error.status > 0
                ? `GROBID returned HTTP ${error.status}`
                : `GROBID request failed: ${errorMessage(error)}`;
            return { ok: false, reason };
        }

        const record = parseTei(xml);
        if (!record) {
            return { ok: false, reason: 'GROBID response is not valid TEI XML' };
        }

        const paper = createPaper({ ...record, source: pdfPath });
        this.cache?.set(key, pdfPath, paper);
        getLogger().debug({ pdfPath, references: paper.references.length }, 'Extracted text content');

        return { ok: true, paper };
    }
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
