import type { z } from 'zod';
import { FetchExhaustedError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);

export type Sleep = (ms: number) => Promise<void>;

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number,
        private readonly sleep: Sleep
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Wait until a token is available
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await this.sleep(waitMs);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, RateLimit> = {
    s2: { tokensPerSecond: 1, maxBurst: 1 },    // 1/s on the shared pool and for keyed clients
    default: { tokensPerSecond: 5, maxBurst: 5 },
};

/**
 * HTTP request options. The schema validates the decoded JSON body; a body
 * that fails it counts as a transient failure and is retried.
 */
export interface HttpRequestOptions<T> {
    schema: z.ZodType<T, z.ZodTypeDef, unknown>;
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: object;
    timeout?: number;
    source?: string;  // For per-source rate limiting
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T> {
    status: number;
    headers: Record<string, string>;
    data: T;
}

/**
 * HTTP error with classification.
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

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    /** Retries after the first attempt */
    maxRetries?: number;
    initialBackoffMs?: number;
    maxBackoffMs?: number;
    rateLimits?: Record<string, RateLimit>;
    sleep?: Sleep;
}

type AttemptOutcome<T> =
    | { kind: 'ok'; response: HttpResponse<T> }
    | { kind: 'retry'; error: HttpError; retryAfterMs: number | null };

/**
 * Centralized HTTP client with per-source rate limiting and retry logic.
 * Requests are sequential per caller; every retry re-acquires a rate token.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly maxRetries: number;
    private readonly initialBackoff: number;
    private readonly maxBackoff: number;
    private readonly rateLimits: Record<string, RateLimit>;
    private readonly sleep: Sleep;

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeout = options.timeout ?? 30000;
        this.userAgent = `citeload/${options.version ?? '0.1.0'}`;
        this.maxRetries = options.maxRetries ?? 3;
        this.initialBackoff = options.initialBackoffMs ?? 1000;
        this.maxBackoff = options.maxBackoffMs ?? 30000;
        this.rateLimits = { ...RATE_LIMITS, ...options.rateLimits };
        this.sleep = options.sleep ?? sleep;
    }

    /**
     * Make an HTTP request with rate limiting and retry.
     * @throws HttpError on a non-retryable status
     * @throws FetchExhaustedError once `maxRetries` retries have failed
     */
    async request<T>(url: string, options: HttpRequestOptions<T>): Promise<HttpResponse<T>> {
        const logger = getLogger();
        const { source = 'default' } = options;
        const bucket = this.getBucket(source);

        let lastError: HttpError | null = null;

        for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
            await bucket.acquire();
            this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

            const outcome = await this.attempt(url, options);
            if (outcome.kind === 'ok') {
                return outcome.response;
            }

            lastError = outcome.error;
            if (attempt < this.maxRetries) {
                const backoff = outcome.retryAfterMs ?? this.calculateBackoff(attempt);
                logger.warn(
                    { status: outcome.error.status, attempt: attempt + 1, backoffMs: Math.round(backoff), url, reason: outcome.error.message },
                    'Retryable request failure, backing off'
                );
                await this.sleep(backoff);
            }
        }

        throw new FetchExhaustedError(url, this.maxRetries + 1, lastError);
    }

    /**
     * Convenience method for GET requests.
     */
    async get<T>(url: string, options: Omit<HttpRequestOptions<T>, 'method' | 'body'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'GET' });
    }

    /**
     * Convenience method for POST requests with a JSON body.
     */
    async post<T>(url: string, body: object, options: Omit<HttpRequestOptions<T>, 'method' | 'body'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'POST', body });
    }

    /**
     * Attempts made for a source, retries included.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    private async attempt<T>(url: string, options: HttpRequestOptions<T>): Promise<AttemptOutcome<T>> {
        const { method = 'GET', headers = {}, body, timeout = this.defaultTimeout, schema } = options;

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };
        if (body) {
            requestHeaders['Content-Type'] = 'application/json';
        }

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        let response: Response;
        let text: string;
        try {
            response = await fetch(url, {
                method,
                headers: requestHeaders,
                body: body ? JSON.stringify(body) : undefined,
                signal: controller.signal,
            });
            text = await response.text();
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                return { kind: 'retry', error: new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true), retryAfterMs: null };
            }

            // Anything thrown by the transport is transient; only HTTP statuses decide otherwise
            return { kind: 'retry', error: new HttpError(networkErrorMessage(error), 0, true), retryAfterMs: null };
        } finally {
            clearTimeout(timeoutId);
        }

        // Build headers map
        const responseHeaders: Record<string, string> = {};
        response.headers.forEach((value, key) => {
            responseHeaders[key] = value;
        });

        if (!response.ok) {
            const retryable = RETRYABLE_STATUS_CODES.has(response.status);
            const error = new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, retryable, text);
            if (!retryable) {
                throw error;
            }
            return { kind: 'retry', error, retryAfterMs: this.parseRetryAfter(response.headers.get('retry-after')) };
        }

        let decoded: unknown;
        try {
            decoded = JSON.parse(text);
        } catch {
            return { kind: 'retry', error: new HttpError(`Malformed JSON response from ${url}`, response.status, true, text), retryAfterMs: null };
        }

        const parsed = schema.safeParse(decoded);
        if (!parsed.success) {
            const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
            return { kind: 'retry', error: new HttpError(`Malformed response from ${url}: ${issues}`, response.status, true, decoded), retryAfterMs: null };
        }

        return { kind: 'ok', response: { status: response.status, headers: responseHeaders, data: parsed.data } };
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = this.rateLimits[source] ?? this.rateLimits['default'] ?? { tokensPerSecond: 5, maxBurst: 5 };
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst, this.sleep);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return Math.min(this.maxBackoff, seconds * 1000);

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.min(this.maxBackoff, Math.max(0, date.getTime() - Date.now()));
        }

        return null;
    }

    private calculateBackoff(attempt: number): number {
        // Exponential backoff with jitter
        const exponential = this.initialBackoff * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(this.maxBackoff, exponential + jitter);
    }
}

/**
 * undici reports transport failures as `TypeError: fetch failed` with the
 * socket error as its cause.
 */
function networkErrorMessage(error: unknown): string {
    const message = error instanceof Error ? error.message : String(error);
    const code = errorCode(error) ?? (error instanceof Error ? errorCode(error.cause) : undefined);
    return code ? `Network error: ${message} (${code})` : `Network error: ${message}`;
}

function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Sleep for the specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
