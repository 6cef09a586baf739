import axios, { AxiosInstance } from 'axios';

import { Logger } from '../../utils/logger';
import { RateLimiter } from '../../utils/rate_limiter';
import { FetchResult, PageFetcher } from './page_fetcher';

export interface ReaderProxyOptions {
    /** e.g. https://r.jina.ai */
    baseUrl: string;
    apiKey?: string;
    timeoutMs?: number;
    limiter?: RateLimiter;
    client?: AxiosInstance;
}

/**
 * 📖 Rendered-page fallback: asks a reader proxy to load the page in a real
 * browser and hand back the resulting HTML.
 */
export class ReaderProxyFetcher implements PageFetcher {
    private readonly client: AxiosInstance;
    private readonly baseUrl: string;

    constructor(private readonly options: ReaderProxyOptions) {
        this.client = options.client ?? axios.create();
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    }

    async get(url: string): Promise<FetchResult | null> {
        const headers: Record<string, string> = { 'X-Return-Format': 'html' };
        if (this.options.apiKey) headers.Authorization = `Bearer ${this.options.apiKey}`;

        try {
            await this.options.limiter?.acquire();
            const r = await this.client.get<unknown>(`${this.baseUrl}/${url}`, {
                timeout: this.options.timeoutMs ?? 30000,
                headers,
                responseType: 'text',
                validateStatus: () => true,
            });
            if (r.status >= 400) {
                Logger.warn(`[ReaderProxy] HTTP ${r.status}`, { url });
                return null;
            }
            return {
                url,
                finalUrl: url,
                status: r.status,
                body: typeof r.data === 'string' ? r.data : '',
                contentType: 'text/html',
            };
        } catch (e) {
            Logger.logError('[ReaderProxy] render failed', e, { url });
            return null;
        }
    }

    // The proxy has no cheap HEAD equivalent.
    async head(): Promise<number | null> {
        return null;
    }
}
