import { Logger } from '../../utils/logger';

export interface FetchResult {
    url: string;
    /** URL after redirects. */
    finalUrl: string;
    status: number;
    body: string;
    contentType: string;
}

export interface FetchOptions {
    /** Extra attempts after the first one for transient failures. */
    retries?: number;
    timeoutMs?: number;
}

/**
 * "Give me the body for this URL" capability used by scoring, contact
 * discovery and email extraction. `null` is the normal failure indicator.
 */
export interface PageFetcher {
    get(url: string, options?: FetchOptions): Promise<FetchResult | null>;
    /** Status of a HEAD request (redirects followed), `null` when unreachable. */
    head(url: string): Promise<number | null>;
}

const BLOCKED_STATUSES = new Set([401, 403, 429, 503]);

export function looksBlocked(result: FetchResult | null): boolean {
    if (!result) return true;
    if (BLOCKED_STATUSES.has(result.status)) return true;
    return result.status === 200 && result.body.trim().length === 0;
}

/**
 * Primary fetcher first; secondary (rendered copy) only when the primary
 * comes back empty or blocked.
 */
export class FallbackFetcher implements PageFetcher {
    constructor(private readonly primary: PageFetcher, private readonly secondary: PageFetcher) {}

    async get(url: string, options?: FetchOptions): Promise<FetchResult | null> {
        const first = await this.primary.get(url, options);
        if (!looksBlocked(first)) return first;

        Logger.debug(`[FallbackFetcher] primary blocked or empty (${first?.status ?? 'no response'}), trying fallback`, { url });
        const second = await this.secondary.get(url, options);
        return second ?? first;
    }

    async head(url: string): Promise<number | null> {
        const status = await this.primary.head(url);
        if (status !== null) return status;
        return this.secondary.head(url);
    }
}
