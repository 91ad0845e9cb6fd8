import { getLogger } from './logger.js';

const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

const MAX_RETRIES = 3;
const INITIAL_BACKOFF_MS = 1000;
const MAX_BACKOFF_MS = 30000;

interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Per-service rate limits. GROBID handles one document at a time, with room
 * for a health check alongside.
 */
const RATE_LIMITS: Record<string, RateLimit> = {
    grobid: { tokensPerSecond: 2, maxBurst: 2 },
};

const DEFAULT_RATE_LIMIT: RateLimit = { tokensPerSecond: 5, maxBurst: 5 };

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill = Date.now();

    constructor(private readonly limit: RateLimit) {
        this.tokens = limit.maxBurst;
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens < 1) {
            await sleep(((1 - this.tokens) / this.limit.tokensPerSecond) * 1000);
            this.refill();
        }
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.limit.maxBurst, this.tokens + elapsed * this.limit.tokensPerSecond);
        this.lastRefill = now;
    }
}

export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    /** Objects are sent as JSON; FormData is sent as multipart */
    body?: string | object | FormData;
    timeout?: number;
    /** Rate-limit bucket */
    source?: string;
}

export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
}

/**
 * HTTP error with classification. `status` is 0 for network failures
 * and timeouts.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

interface RawResponse<T> {
    response: Response;
    data: T;
}

/**
 * Shared HTTP client with per-service rate limiting and retry.
 */
export class HttpClient {
    private readonly buckets = new Map<string, TokenBucket>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeout = options.timeout ?? 30000;
        this.userAgent = `litsynth/${options.version ?? '1.0.0'}`;
    }

    /**
     * Send a request, retrying retryable statuses and network errors with
     * exponential backoff.
     *
     * @throws HttpError on a non-2xx response, a timeout or a network failure
     */
    async request<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const { method = 'GET', timeout = this.defaultTimeout, source = 'default' } = options;
        const { headers, body } = this.encode(options);

        await this.bucketFor(source).acquire();

        for (let attempt = 0; ; attempt++) {
            let raw: RawResponse<T>;
            try {
                raw = await this.send<T>(url, { method, headers, body }, timeout);
            } catch (error) {
                const errorCode = networkErrorCode(error);
                const retryable = errorCode !== undefined && RETRYABLE_ERROR_CODES.has(errorCode);

                if (retryable && attempt < MAX_RETRIES) {
                    const backoff = backoffFor(attempt);
                    getLogger().warn({ errorCode, attempt: attempt + 1, backoffMs: backoff, url }, 'Retryable network error, backing off');
                    await sleep(backoff);
                    continue;
                }

                if (error instanceof Error && error.name === 'AbortError') {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }
                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            }

            const { response, data } = raw;
            if (response.ok) {
                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });
                return { status: response.status, headers: responseHeaders, data, ok: true };
            }

            const retryable = RETRYABLE_STATUS_CODES.has(response.status);
            if (retryable && attempt < MAX_RETRIES) {
                const backoff = parseRetryAfter(response.headers.get('retry-after')) ?? backoffFor(attempt);
                getLogger().warn({ status: response.status, attempt: attempt + 1, backoffMs: backoff, url }, 'Retryable HTTP error, backing off');
                await sleep(backoff);
                continue;
            }

            throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, retryable, data);
        }
    }

    async get<T = unknown>(url: string, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'GET' });
    }

    async post<T = unknown>(
        url: string,
        body: HttpRequestOptions['body'],
        options?: Omit<HttpRequestOptions, 'method' | 'body'>
    ): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'POST', body });
    }

    /**
     * One fetch plus body read under an abort timer. The timer is cleared
     * however the attempt ends.
     */
    private async send<T>(url: string, init: RequestInit, timeout: number): Promise<RawResponse<T>> {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), timeout);

        try {
            const response = await fetch(url, { ...init, signal: controller.signal });
            const contentType = response.headers.get('content-type') ?? '';
            const data = contentType.includes('application/json')
                ? ((await response.json()) as T)
                : ((await response.text()) as T);
            return { response, data };
        } finally {
            clearTimeout(timer);
        }
    }

    private encode(options: HttpRequestOptions): { headers: Record<string, string>; body: string | FormData | undefined } {
        const headers: Record<string, string> = { 'User-Agent': this.userAgent, ...options.headers };
        const { body } = options;

        if (body === undefined || typeof body === 'string' || body instanceof FormData) {
            // fetch sets the multipart boundary itself
            return { headers, body };
        }

        headers['Content-Type'] = headers['Content-Type'] ?? 'application/json';
        return { headers, body: JSON.stringify(body) };
    }

    private bucketFor(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            bucket = new TokenBucket(RATE_LIMITS[source] ?? DEFAULT_RATE_LIMIT);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }
}

/**
 * Sleep for the specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Exponential backoff with up to 50% jitter */
function backoffFor(attempt: number): number {
    const exponential = INITIAL_BACKOFF_MS * 2 ** attempt;
    return Math.min(MAX_BACKOFF_MS, exponential + Math.random() * exponential * 0.5);
}

/**
 * Retry-After as delta seconds or an HTTP date, in milliseconds.
 */
function parseRetryAfter(header: string | null): number | null {
    if (!header) return null;

    const seconds = Number(header);
    if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);

    const date = Date.parse(header);
    return Number.isNaN(date) ? null : Math.max(0, date - Date.now());
}

/**
 * Pull a system error code out of a fetch failure. undici wraps socket
 * errors in a TypeError whose `cause` carries the code.
 */
function networkErrorCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    if ('cause' in error) return networkErrorCode(error.cause);
    return undefined;
}

let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client, created on first use.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}
