import axios, { AxiosError, AxiosInstance, AxiosResponse } from 'axios';
import * as http from 'http';
import * as https from 'https';

import { NetworkError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { RateLimiter, Sleeper, sleep } from '../../utils/rate_limiter';
import { FetchOptions, FetchResult, PageFetcher } from './page_fetcher';

// Connection pooling - reuse TCP connections across workers
const httpAgent = new http.Agent({ keepAlive: true, maxSockets: 25, maxFreeSockets: 10 });
const httpsAgent = new https.Agent({ keepAlive: true, maxSockets: 25, maxFreeSockets: 10, rejectUnauthorized: false });

const USER_AGENTS = [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_4) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36 Edg/124.0.0.0',
];

const RETRYABLE_STATUSES = new Set([429, 503]);
const RETRYABLE_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'EAI_AGAIN', 'ERR_NETWORK', 'EPIPE']);

export interface HttpFetcherOptions {
    client?: AxiosInstance;
    limiter?: RateLimiter;
    timeoutMs?: number;
    headTimeoutMs?: number;
    retries?: number;
    baseDelayMs?: number;
    sleeper?: Sleeper;
}

function randomUserAgent(): string {
    return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)] ?? USER_AGENTS[0] ?? '';
}

function defaultHeaders(): Record<string, string> {
    return {
        'User-Agent': randomUserAgent(),
        'Accept-Language': 'it-IT,it;q=0.9,en-US;q=0.8,en;q=0.7',
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    };
}

function responseUrlOf(request: unknown): string | undefined {
    if (typeof request !== 'object' || request === null || !('res' in request)) return undefined;
    const res = request.res;
    if (typeof res !== 'object' || res === null || !('responseUrl' in res)) return undefined;
    return typeof res.responseUrl === 'string' ? res.responseUrl : undefined;
}

function isTransient(error: unknown): boolean {
    if (error instanceof NetworkError) return error.retryable;
    if (error instanceof AxiosError) {
        if (!error.response) return true;
        return error.code !== undefined && RETRYABLE_CODES.has(error.code);
    }
    return false;
}

/**
 * Plain HTTP fetcher. Every status is accepted as a response; only
 * connection errors, timeouts, 429 and 503 are retried.
 */
export class HttpFetcher implements PageFetcher {
    private readonly client: AxiosInstance;
    private readonly limiter?: RateLimiter;
    private readonly timeoutMs: number;
    private readonly headTimeoutMs: number;
    private readonly retries: number;
    private readonly baseDelayMs: number;
    private readonly sleeper: Sleeper;

    constructor(options: HttpFetcherOptions = {}) {
        this.client = options.client ?? axios.create({ httpAgent, httpsAgent });
        this.limiter = options.limiter;
        this.timeoutMs = options.timeoutMs ?? 12000;
        this.headTimeoutMs = options.headTimeoutMs ?? 5000;
        this.retries = options.retries ?? 2;
        this.baseDelayMs = options.baseDelayMs ?? 600;
        this.sleeper = options.sleeper ?? sleep;
    }

    async get(url: string, options: FetchOptions = {}): Promise<FetchResult | null> {
        const retries = options.retries ?? this.retries;
        const timeoutMs = options.timeoutMs ?? this.timeoutMs;

        try {
            return await this.withRetry(url, retries, async () => {
                const resp = await this.client.get<unknown>(url, {
                    timeout: timeoutMs,
                    headers: defaultHeaders(),
                    maxRedirects: 5,
                    validateStatus: () => true,
                    responseType: 'text',
                    decompress: true,
                });
                if (RETRYABLE_STATUSES.has(resp.status)) {
                    throw new NetworkError(`HTTP ${resp.status}`, url, resp.status);
                }
                return this.toResult(url, resp);
            });
        } catch (e) {
            Logger.debug(`[HttpFetcher] giving up: ${e instanceof Error ? e.message : String(e)}`, { url });
            return null;
        }
    }

    async head(url: string): Promise<number | null> {
        try {
            await this.limiter?.acquire();
            const resp = await this.client.head(url, {
                timeout: this.headTimeoutMs,
                headers: defaultHeaders(),
                maxRedirects: 5,
                validateStatus: () => true,
            });
            return resp.status;
        } catch (e) {
            Logger.debug(`[HttpFetcher] HEAD failed: ${e instanceof Error ? e.message : String(e)}`, { url });
            return null;
        }
    }

    private toResult(url: string, resp: AxiosResponse<unknown>): FetchResult {
        const body = typeof resp.data === 'string' ? resp.data : resp.data == null ? '' : String(resp.data);
        const contentType = resp.headers['content-type'];
        return {
            url,
            finalUrl: responseUrlOf(resp.request) ?? url,
            status: resp.status,
            body,
            contentType: typeof contentType === 'string' ? contentType : '',
        };
    }

    private async withRetry<T>(url: string, retries: number, fn: () => Promise<T>): Promise<T> {
        let lastErr: unknown = null;
        for (let i = 0; i <= retries; i++) {
            try {
                await this.limiter?.acquire();
                return await fn();
            } catch (e) {
                lastErr = e;
                if (i === retries || !isTransient(e)) break;
                const delayMs = this.baseDelayMs * Math.pow(2, i);
                const jitter = Math.random() * this.baseDelayMs * 0.5;
                Logger.debug(`[HttpFetcher] transient failure, retry ${i + 1}/${retries} in ${Math.round(delayMs + jitter)}ms`, { url });
                await this.sleeper(delayMs + jitter);
            }
        }
        throw lastErr instanceof Error ? lastErr : new Error(String(lastErr));
    }
}
