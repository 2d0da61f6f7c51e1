import type { PaperScoutConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

const INITIAL_BACKOFF_MS = 1000;
const MAX_BACKOFF_MS = 30000;

/**
 * Query-string parameters. Undefined values are left out.
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Gateway construction options.
 */
export interface HttpClientOptions {
    /** Requests per second across every caller of this client (default 1) */
    rateLimitPerSecond?: number;
    timeoutMs?: number;
    maxRetries?: number;
    userAgent?: string;
    /** Contact email appended to the User-Agent */
    email?: string;
}

/**
 * Per-request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeoutMs?: number;
    /** Provider label for request counting */
    source?: string;
}

/**
 * Successful (2xx) response.
 */
export interface HttpSuccess<T> {
    ok: true;
    status: number;
    headers: Record<string, string>;
    data: T;
}

/**
 * Failure signal: non-2xx status, transport error, timeout, or unreadable body.
 */
export interface HttpFailure {
    ok: false;
    error: HttpError;
}

export type HttpResult<T> = HttpSuccess<T> | HttpFailure;

/**
 * HTTP error with classification. `status` is 0 for transport failures.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly url?: string
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

type SendOutcome = { ok: true; response: Response } | HttpFailure;

/**
 * Rate-limited HTTP gateway shared by every provider adapter.
 *
 * Enforces one minimum interval between consecutive calls on this instance,
 * whichever provider makes them. The last-call timestamp is taken before the
 * request goes out, so failed calls are throttled like successful ones.
 * No method rejects: failures come back as `{ ok: false, error }`.
 */
export class HttpClient {
    private readonly minIntervalMs: number;
    private readonly defaultTimeout: number;
    private readonly maxRetries: number;
    private readonly userAgent: string;
    private lastCallAt = 0;
    private gate: Promise<void> = Promise.resolve();
    private requestCounts = new Map<string, number>();
    private retries = 0;

    constructor(options: HttpClientOptions = {}) {
        const rate = Math.max(options.rateLimitPerSecond ?? 1, 0.1);
        this.minIntervalMs = 1000 / rate;
        this.defaultTimeout = options.timeoutMs ?? 30000;
        this.maxRetries = options.maxRetries ?? 3;
        const agent = options.userAgent ?? 'paperscout/1.0';
        this.userAgent = options.email ? `${agent} (mailto:${options.email})` : agent;
    }

    /**
     * GET a JSON or text resource.
     */
    async get<T = unknown>(url: string, params?: QueryParams, options: HttpRequestOptions = {}): Promise<HttpResult<T>> {
        const outcome = await this.send(buildUrl(url, params), { method: 'GET' }, options);
        if (!outcome.ok) return outcome;
        return this.readBody<T>(outcome.response, url);
    }

    /**
     * POST a JSON body and read a JSON or text response.
     */
    async post<T = unknown>(url: string, body: unknown, options: HttpRequestOptions = {}): Promise<HttpResult<T>> {
        const outcome = await this.send(
            url,
            {
                method: 'POST',
                body: JSON.stringify(body),
                headers: { 'Content-Type': 'application/json' },
            },
            options
        );
        if (!outcome.ok) return outcome;
        return this.readBody<T>(outcome.response, url);
    }

    /**
     * GET raw bytes (artifact downloads).
     */
    async getBinary(url: string, options: HttpRequestOptions = {}): Promise<HttpResult<Buffer>> {
        const outcome = await this.send(url, { method: 'GET' }, options);
        if (!outcome.ok) return outcome;

        const { response } = outcome;
        try {
            const data = Buffer.from(await response.arrayBuffer());
            return { ok: true, status: response.status, headers: headersToRecord(response.headers), data };
        } catch (error) {
            return this.fail(new HttpError(`Failed to read body: ${describeError(error)}`, response.status, false, url));
        }
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
     * Total retries performed by this client since construction.
     */
    getRetryCount(): number {
        return this.retries;
    }

    // ─── Private helpers ──────────────────────────────────────

    /**
     * Wait for this caller's turn, then stamp the call time.
     * Turns are chained so concurrent callers still see one timestamp.
     */
    private throttle(): Promise<void> {
        const turn = this.gate.then(async () => {
            const waitMs = this.lastCallAt + this.minIntervalMs - Date.now();
            if (waitMs > 0) {
                await sleep(waitMs);
            }
            this.lastCallAt = Date.now();
        });
        this.gate = turn;
        return turn;
    }

    private async send(url: string, init: RequestInit, options: HttpRequestOptions): Promise<SendOutcome> {
        const { timeoutMs = this.defaultTimeout, source = 'default' } = options;
        const headers: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...toHeaderRecord(init.headers),
            ...options.headers,
        };

        for (let attempt = 0; ; attempt++) {
            await this.throttle();
            this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

            let response: Response;
            try {
                response = await fetch(url, { ...init, headers, signal: controller.signal });
            } catch (error) {
                const code = errorCode(error);
                const retryable = code ? RETRYABLE_ERROR_CODES.has(code) : false;

                if (retryable && attempt < this.maxRetries) {
                    const backoff = calculateBackoff(attempt);
                    getLogger().warn({ errorCode: code, attempt: attempt + 1, backoffMs: backoff, url }, 'Retryable network error, backing off');
                    this.retries++;
                    await sleep(backoff);
                    continue;
                }

                if (error instanceof Error && error.name === 'AbortError') {
                    return this.fail(new HttpError(`Request timeout after ${timeoutMs}ms`, 0, false, url));
                }
                return this.fail(new HttpError(`Network error: ${describeError(error)}`, 0, retryable, url));
            } finally {
                clearTimeout(timeoutId);
            }

            if (response.ok) {
                return { ok: true, response };
            }

            const retryable = RETRYABLE_STATUS_CODES.has(response.status);
            if (retryable && attempt < this.maxRetries) {
                const backoff = parseRetryAfter(response.headers.get('retry-after')) ?? calculateBackoff(attempt);
                getLogger().warn(
                    { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                    'Retryable HTTP error, backing off'
                );
                this.retries++;
                await sleep(backoff);
                continue;
            }

            return this.fail(new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, retryable, url));
        }
    }

    private async readBody<T>(response: Response, url: string): Promise<HttpResult<T>> {
        try {
            const contentType = response.headers.get('content-type') ?? '';
            let data: T;
            if (contentType.includes('json')) {
                data = (await response.json()) as T;
            } else {
                data = (await response.text()) as T;
            }
            return { ok: true, status: response.status, headers: headersToRecord(response.headers), data };
        } catch (error) {
            return this.fail(new HttpError(`Malformed response body: ${describeError(error)}`, response.status, false, url));
        }
    }

    private fail(error: HttpError): HttpFailure {
        getLogger().warn({ url: error.url, status: error.status, error: error.message }, 'HTTP request failed');
        return { ok: false, error };
    }
}

/**
 * Build a gateway from the resolved configuration.
 */
export function createHttpClient(config: Pick<PaperScoutConfig, 'rateLimitPerSecond' | 'timeoutMs' | 'maxRetries' | 'userAgent' | 'contactEmail'>): HttpClient {
    return new HttpClient({
        rateLimitPerSecond: config.rateLimitPerSecond,
        timeoutMs: config.timeoutMs,
        maxRetries: config.maxRetries,
        userAgent: config.userAgent,
        email: config.contactEmail || undefined,
    });
}

/**
 * Append query parameters to a URL.
 */
export function buildUrl(url: string, params?: QueryParams): string {
    if (!params) return url;
    const target = new URL(url);
    for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
            target.searchParams.set(key, String(value));
        }
    }
    return target.toString();
}

function parseRetryAfter(header: string | null): number | null {
    if (!header) return null;

    // Try parsing as seconds
    const seconds = parseInt(header, 10);
    if (!isNaN(seconds)) return seconds * 1000;

    // Try parsing as HTTP date
    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.max(0, date.getTime() - Date.now());
    }

    return null;
}

function calculateBackoff(attempt: number): number {
    // Exponential backoff with jitter
    const exponential = INITIAL_BACKOFF_MS * Math.pow(2, attempt);
    const jitter = Math.random() * exponential * 0.5;
    return Math.min(MAX_BACKOFF_MS, exponential + jitter);
}

function headersToRecord(headers: Headers): Record<string, string> {
    const record: Record<string, string> = {};
    headers.forEach((value, key) => {
        record[key] = value;
    });
    return record;
}

function toHeaderRecord(headers: RequestInit['headers']): Record<string, string> {
    if (!headers) return {};
    return headersToRecord(new Headers(headers));
}

/**
 * Node's fetch reports socket errors as `TypeError: fetch failed` with the errno on `cause`.
 */
function errorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    const source = error.cause instanceof Error ? error.cause : error;
    return 'code' in source && typeof source.code === 'string' ? source.code : undefined;
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
