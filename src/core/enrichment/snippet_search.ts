import axios, { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';

import { Logger } from '../../utils/logger';
import { RateLimiter } from '../../utils/rate_limiter';

export interface SearchSnippet {
    title: string;
    snippet: string;
    url: string;
}

const HTML_ENDPOINT = 'https://html.duckduckgo.com/html/';
const LITE_ENDPOINT = 'https://lite.duckduckgo.com/lite/';

const HEADERS = {
    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
    'Accept-Language': 'it-IT,it;q=0.9,en-US;q=0.8,en;q=0.7',
    'Content-Type': 'application/x-www-form-urlencoded',
};

// DDG wraps result links as //duckduckgo.com/l/?uddg=<encoded target>
function unwrapRedirect(href: string): string {
    try {
        const parsed = new URL(href, 'https://duckduckgo.com');
        const target = parsed.searchParams.get('uddg');
        return target ?? parsed.toString();
    } catch {
        return href;
    }
}

/**
 * Web search returning ranked title/snippet/url triples. The HTML endpoint
 * is tried first, the lite endpoint second; no results is a normal outcome.
 */
export class SnippetSearch {
    private readonly client: AxiosInstance;

    constructor(private readonly options: { client?: AxiosInstance; limiter?: RateLimiter; maxResults?: number } = {}) {
        this.client = options.client ?? axios.create({ timeout: 15000 });
    }

    async search(query: string): Promise<SearchSnippet[]> {
        const max = this.options.maxResults ?? 8;
        for (const [endpoint, parse] of [
            [HTML_ENDPOINT, SnippetSearch.parseHtmlResults],
            [LITE_ENDPOINT, SnippetSearch.parseLiteResults],
        ] as const) {
            try {
                await this.options.limiter?.acquire();
                const res = await this.client.post<unknown>(endpoint, new URLSearchParams({ q: query, kl: 'it-it' }).toString(), {
                    headers: HEADERS,
                    responseType: 'text',
                    validateStatus: () => true,
                });
                if (res.status !== 200 || typeof res.data !== 'string') {
                    Logger.warn(`[SnippetSearch] ${endpoint} answered HTTP ${res.status}`);
                    continue;
                }
                const results = parse(res.data).slice(0, max);
                if (results.length > 0) return results;
            } catch (e) {
                Logger.logError('[SnippetSearch] request failed', e, { url: endpoint });
            }
        }
        return [];
    }

    static parseHtmlResults(html: string): SearchSnippet[] {
        const $ = cheerio.load(html);
        const out: SearchSnippet[] = [];
        $('div.result').each((_, el) => {
            const link = $(el).find('a.result__a').first();
            const title = link.text().trim();
            const href = link.attr('href');
            if (!title || !href) return;
            out.push({
                title,
                snippet: $(el).find('.result__snippet').first().text().replace(/\s+/g, ' ').trim(),
                url: unwrapRedirect(href),
            });
        });
        return out;
    }

    static parseLiteResults(html: string): SearchSnippet[] {
        const $ = cheerio.load(html);
        const snippets = $('td.result-snippet')
            .map((_, el) => $(el).text().replace(/\s+/g, ' ').trim())
            .get();
        const out: SearchSnippet[] = [];
        $('a.result-link').each((i, el) => {
            const title = $(el).text().trim();
            const href = $(el).attr('href');
            if (!title || !href) return;
            out.push({ title, snippet: snippets[i] ?? '', url: unwrapRedirect(href) });
        });
        return out;
    }
}
