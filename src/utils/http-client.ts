import { getLogger, type Logger } from './logger.js';
import { sleep as realSleep, type SleepFn } from './sleep.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);

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
        private readonly sleep: SleepFn
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
        this.tokens = Math.max(0, this.tokens - 1);
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, { tokensPerSecond: number; maxBurst: number }> = {
    openalex: { tokensPerSecond: 10, maxBurst: 10 },  // 10/s with polite pool
    scholar: { tokensPerSecond: 0.5, maxBurst: 1 },   // Profile pages, jittered on top
    serpapi: { tokensPerSecond: 1, maxBurst: 1 },
    default: { tokensPerSecond: 5, maxBurst: 5 },
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    source?: string;  // For per-source rate limiting
    /** Overrides the client's retry count for this request */
    retries?: number;
    /** Checked against a failed response; true ends the request without retry */
    abortWhen?: (status: number, body: string) => boolean;
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * HTTP error with classification.
 * `status` is 0 for transport failures (network error, timeout).
 * `aborted` is set when the request's `abortWhen` matched the response.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown,
        public readonly aborted = false
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * HTTP client construction options.
 */
export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
    /** Retries after the first attempt (default 1) */
    maxRetries?: number;
    /** Fixed wait before each retry (default 2000 ms) */
    retryBackoffMs?: number;
    sleep?: SleepFn;
    logger?: Logger;
}

/**
 * Centralized HTTP client with per-source rate limiting and bounded,
 * fixed-backoff retry of transport failures.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly maxRetries: number;
    private readonly retryBackoffMs: number;
    private readonly sleep: SleepFn;
    private readonly logger: Logger;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '1.0.0';
        const email = options?.email ?? 'scholarank@example.com';
        this.userAgent = `scholarank/${version} (mailto:${email})`;
        this.maxRetries = options?.maxRetries ?? 1;
        this.retryBackoffMs = options?.retryBackoffMs ?? 2000;
        this.sleep = options?.sleep ?? realSleep;
        this.logger = options?.logger ?? getLogger();
    }

    /**
     * GET a JSON document. The body is returned untyped; callers read it
     * through the safe field extractors.
     */
    async getJson(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<unknown>> {
        return this.request(url, options, async (response) => {
            const text = await response.text();
            try {
                const parsed: unknown = JSON.parse(text);
                return parsed;
            } catch {
                throw new HttpError(`Malformed JSON body from ${url}`, response.status, false, text.slice(0, 200));
            }
        });
    }

    /**
     * GET a text document (HTML pages).
     */
    async getText(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<string>> {
        return this.request(url, options, (response) => response.text());
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    /**
     * Make a GET request with rate limiting and retry.
     */
    private async request<T>(
        url: string,
        options: HttpRequestOptions,
        parse: (response: Response) => Promise<T>
    ): Promise<HttpResponse<T>> {
        const {
            headers = {},
            timeout = this.defaultTimeout,
            source = 'default',
            retries = this.maxRetries,
            abortWhen,
        } = options;

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        let lastError: HttpError | null = null;

        for (let attempt = 0; attempt <= retries; attempt++) {
            if (attempt > 0 && lastError) {
                this.logger.warn(
                    { status: lastError.status, attempt, backoffMs: this.retryBackoffMs, url },
                    'Retryable HTTP failure, backing off'
                );
                await this.sleep(this.retryBackoffMs);
            }

            // Acquire rate limit token
            await this.getBucket(source).acquire();
            this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

            // The timer also covers reading the body
            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);

            try {
                const response = await fetch(url, {
                    method: 'GET',
                    headers: requestHeaders,
                    signal: controller.signal,
                });

                if (!response.ok) {
                    const body = await response.text().catch(() => '');
                    const error = toStatusError(response, body, abortWhen);
                    if (!error.retryable) throw error;
                    lastError = error;
                    continue;
                }

                const data = await parse(response);

                // Build headers map
                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                return { status: response.status, headers: responseHeaders, data, ok: true };
            } catch (error) {
                if (error instanceof HttpError) throw error;
                lastError = toTransportError(error, url, timeout);
            } finally {
                clearTimeout(timeoutId);
            }
        }

        throw lastError ?? new HttpError(`Max retries exceeded for ${url}`, 0, false);
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = RATE_LIMITS[source] ?? { tokensPerSecond: 5, maxBurst: 5 };
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst, this.sleep);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }
}

/**
 * Classify a non-2xx response.
 */
function toStatusError(
    response: Response,
    body: string,
    abortWhen?: (status: number, body: string) => boolean
): HttpError {
    const message = `HTTP ${response.status}: ${response.statusText}`;
    if (abortWhen?.(response.status, body)) {
        return new HttpError(message, response.status, false, body.slice(0, 500), true);
    }
    return new HttpError(message, response.status, RETRYABLE_STATUS_CODES.has(response.status), body.slice(0, 500));
}

/**
 * Classify a value thrown while fetching or reading a body (network error,
 * DNS failure, dropped connection, abort).
 */
function toTransportError(error: unknown, url: string, timeout: number): HttpError {
    if (error instanceof Error && error.name === 'AbortError') {
        return new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
    }

    const cause = error instanceof Error ? error.cause : undefined;
    const code = typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string'
        ? ` (${cause.code})`
        : '';

    return new HttpError(
        `Network error${code}: ${error instanceof Error ? error.message : String(error)}`,
        0,
        true
    );
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
