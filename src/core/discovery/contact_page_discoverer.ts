import * as cheerio from 'cheerio';
import type { Element } from 'cheerio';

import { spacedText } from '../../utils/html';
import { Logger } from '../../utils/logger';
import { UrlNormalizer } from '../../utils/url_normalizer';
import { PageFetcher } from '../fetch/page_fetcher';

export const CONTACT_KEYS = [
    'contact', 'contacts', 'contact-us', 'contactus',
    'contatto', 'contatti', 'contattaci',
    'chi-siamo', 'chisiamo', 'about', 'azienda', 'company',
    'dove-siamo', 'dovesiamo', 'assistenza',
];

const HREF_CONTACT_KEYS = ['contatto', 'contatti', 'contattaci', 'contact', 'contact-us', 'contacts', 'contactus'];
const TEXT_CONTACT_KEYS = ['contatti', 'contatto', 'contattaci', 'contact'];
const ABOUT_KEYS = ['chi-siamo', 'chisiamo', 'about', 'azienda', 'company'];

export const FALLBACK_SLUGS = [
    '/contatti', '/contatti/', '/contatto', '/contattaci',
    '/contact', '/contacts', '/contact-us', '/contactus',
    '/chi-siamo', '/about', '/azienda', '/company', '/dove-siamo', '/assistenza',
];

const DEFAULT_SITEMAP_PATHS = ['/sitemap.xml', '/sitemap_index.xml', '/sitemap-index.xml', '/wp-sitemap.xml', '/sitemap.php'];

const SKIP_EXTENSIONS = new Set([
    'png', 'jpg', 'jpeg', 'gif', 'webp', 'svg', 'ico', 'pdf', 'zip', 'rar', '7z',
    'mp4', 'mov', 'avi', 'mp3', 'wav', 'css', 'js', 'json', 'xml',
]);

const SITEMAP_SCORE = 4;
const STRONG_SCORE = 3;
const SLUG_SCORE = 1;

export interface DiscoveryLimits {
    maxSitemaps: number;
    maxUrls: number;
    /** Below this many strong candidates the slug fallback is appended. */
    strongThreshold: number;
    /** Sitemap traversal stops once this many leaf candidates are collected. */
    sitemapCandidateStop: number;
}

export const DEFAULT_DISCOVERY_LIMITS: DiscoveryLimits = {
    maxSitemaps: 30,
    maxUrls: 20000,
    strongThreshold: 8,
    sitemapCandidateStop: 20,
};

export interface ContactCandidate {
    url: string;
    score: number;
}

export interface ParsedSitemap {
    kind: 'index' | 'urlset';
    locs: string[];
}

const localName = (name: string) => (name.split(':').pop() ?? name).toLowerCase();

export function isAssetUrl(url: string): boolean {
    try {
        const path = new URL(url).pathname.toLowerCase();
        const dot = path.lastIndexOf('.');
        if (dot === -1 || dot < path.lastIndexOf('/')) return false;
        return SKIP_EXTENSIONS.has(path.slice(dot + 1));
    } catch {
        return true;
    }
}

/** Fragment dropped; trailing slash removed except on the root path. */
export function canonicalUrl(url: string): string | null {
    try {
        const parsed = new URL(url);
        parsed.hash = '';
        if (parsed.pathname !== '/') {
            parsed.pathname = parsed.pathname.replace(/\/+$/, '') || '/';
        }
        return parsed.toString();
    } catch {
        return null;
    }
}

// Pages before generic sitemaps before blog posts.
function sitemapPriority(url: string): number {
    const lower = url.toLowerCase();
    if (lower.includes('page-sitemap') || lower.includes('pages-sitemap') || lower.includes('wp-sitemap-posts-page')) return 0;
    if (lower.includes('post-sitemap') || lower.includes('wp-sitemap-posts-post')) return 2;
    return 1;
}

function resolve(href: string, base: string): string | null {
    try {
        return new URL(href, base).toString();
    } catch {
        return null;
    }
}

/**
 * 🔎 Finds the pages of a site most likely to carry contact details:
 * robots.txt sitemaps first, then homepage links, then conventional slugs.
 * Every fetch may fail; a failed source is skipped.
 */
export class ContactPageDiscoverer {
    private readonly limits: DiscoveryLimits;

    constructor(private readonly fetcher: PageFetcher, limits: Partial<DiscoveryLimits> = {}) {
        this.limits = { ...DEFAULT_DISCOVERY_LIMITS, ...limits };
    }

    async discover(siteUrl: string): Promise<string[]> {
        const scored = await this.discoverScored(siteUrl);
        return scored.map((c) => c.url);
    }

    async discoverScored(siteUrl: string): Promise<ContactCandidate[]> {
        const root = UrlNormalizer.rootOf(siteUrl);
        if (!root) return [];
        let base: string = root;

        const candidates = new Map<string, ContactCandidate>();
        const add = (url: string, score: number) => {
            const canonical = canonicalUrl(url);
            if (!canonical) return;
            const existing = candidates.get(canonical);
            if (!existing || existing.score < score) {
                candidates.set(canonical, { url: canonical, score });
            }
        };

        // 1. robots.txt
        const robots = await this.readRobots(base);
        base = robots.base;

        // 2-3. sitemap BFS
        const seeds = robots.sitemaps.length > 0
            ? robots.sitemaps
            : DEFAULT_SITEMAP_PATHS.map((p) => resolve(p, base)).filter((u): u is string => u !== null);
        for (const url of await this.crawlSitemaps(seeds, base)) {
            add(url, SITEMAP_SCORE);
        }

        // 4. homepage links
        const home = await this.fetcher.get(base, { retries: 1 });
        if (home && home.status < 400) {
            const redirected = UrlNormalizer.rootOf(home.finalUrl);
            if (redirected && redirected !== base) {
                Logger.debug(`[ContactDiscovery] homepage redirected to ${redirected}`, { url: base });
                base = redirected;
            }
            for (const link of ContactPageDiscoverer.scoreHomepageLinks(home.body, base)) {
                add(link.url, link.score);
            }
        }

        // 5. slug fallback
        const strong = [...candidates.values()].filter((c) => c.score >= STRONG_SCORE).length;
        if (strong < this.limits.strongThreshold) {
            for (const slug of FALLBACK_SLUGS) {
                const url = resolve(slug, base);
                if (url) add(url, SLUG_SCORE);
            }
        }

        // 6. order
        return [...candidates.values()].sort((a, b) => b.score - a.score || a.url.length - b.url.length);
    }

    /** Sitemap URLs listed in robots.txt; adopts the redirected origin when robots.txt moves. */
    private async readRobots(base: string): Promise<{ base: string; sitemaps: string[] }> {
        const robotsUrl = resolve('/robots.txt', base);
        if (!robotsUrl) return { base, sitemaps: [] };

        const res = await this.fetcher.get(robotsUrl, { retries: 1 });
        if (!res) return { base, sitemaps: [] };

        let effectiveBase = base;
        const redirected = UrlNormalizer.rootOf(res.finalUrl);
        if (redirected && redirected !== base) {
            Logger.debug(`[ContactDiscovery] robots.txt redirected to ${redirected}`, { url: robotsUrl });
            effectiveBase = redirected;
        }
        if (res.status !== 200) return { base: effectiveBase, sitemaps: [] };

        const sitemaps: string[] = [];
        for (const line of res.body.split(/\r?\n/)) {
            const match = /^\s*sitemap\s*:\s*(\S+)/i.exec(line);
            const url = match?.[1] ? resolve(match[1], effectiveBase) : null;
            if (url && !sitemaps.includes(url)) sitemaps.push(url);
        }
        return { base: effectiveBase, sitemaps };
    }

    private async crawlSitemaps(seeds: string[], base: string): Promise<string[]> {
        const queue = seeds.map((url, order) => ({ url, priority: sitemapPriority(url), order }));
        const visited = new Set<string>();
        const found: string[] = [];
        let fetched = 0;
        let scanned = 0;
        let order = queue.length;

        while (queue.length > 0 && fetched < this.limits.maxSitemaps && scanned < this.limits.maxUrls) {
            queue.sort((a, b) => a.priority - b.priority || a.order - b.order);
            const next = queue.shift();
            if (!next || visited.has(next.url)) continue;
            visited.add(next.url);

            fetched++;
            const res = await this.fetcher.get(next.url, { retries: 1 });
            if (!res || res.status !== 200 || !res.body.trim()) continue;

            const sitemap = ContactPageDiscoverer.parseSitemap(res.body);
            if (sitemap.kind === 'index') {
                for (const child of sitemap.locs) {
                    const url = resolve(child, base);
                    if (url && !visited.has(url)) queue.push({ url, priority: sitemapPriority(url), order: order++ });
                }
                continue;
            }

            for (const loc of sitemap.locs) {
                if (++scanned > this.limits.maxUrls) break;
                const url = resolve(loc, base);
                if (!url || !UrlNormalizer.isSameDomain(url, base) || isAssetUrl(url)) continue;
                const path = new URL(url).pathname.toLowerCase();
                if (CONTACT_KEYS.some((k) => path.includes(k))) found.push(url);
            }
            if (found.length >= this.limits.sitemapCandidateStop) break;
        }

        return found;
    }

    /** Falls back to a `<loc>` regex when the document is not well-formed XML. */
    static parseSitemap(xml: string): ParsedSitemap {
        let kind: ParsedSitemap['kind'] = 'urlset';
        const locs: string[] = [];

        try {
            const $ = cheerio.load(xml, { xmlMode: true });
            const root = $.root().children().get(0);
            if (root && localName(root.name) === 'sitemapindex') kind = 'index';

            $<Element, string>('*').each((_, el) => {
                if (localName(el.name) !== 'loc') return;
                const parent = el.parent;
                const parentName = parent && 'name' in parent ? localName(parent.name) : '';
                if (parentName !== 'url' && parentName !== 'sitemap') return;
                const text = $(el).text().trim();
                if (text) locs.push(text);
            });
        } catch (e) {
            Logger.debug(`[ContactDiscovery] sitemap parse failed: ${e instanceof Error ? e.message : String(e)}`);
        }

        if (locs.length === 0) {
            for (const match of xml.matchAll(/<loc>\s*([^<\s]+)\s*<\/loc>/gi)) {
                if (match[1]) locs.push(match[1].replace(/&amp;/g, '&'));
            }
        }
        return { kind, locs };
    }

    /** +3 contact keyword in href, +2 in anchor text, +1 about/company keyword in href. */
    static scoreHomepageLinks(html: string, base: string): ContactCandidate[] {
        const $ = cheerio.load(html);
        const out: ContactCandidate[] = [];

        $('a[href]').each((_, el) => {
            const href = ($(el).attr('href') ?? '').trim();
            if (!href || href.startsWith('#') || /^(mailto|tel|javascript):/i.test(href)) return;

            const url = resolve(href, base);
            if (!url || !UrlNormalizer.isSameDomain(url, base) || isAssetUrl(url)) return;

            const hrefLower = href.toLowerCase();
            const text = spacedText($(el)).toLowerCase();
            let score = 0;
            if (HREF_CONTACT_KEYS.some((k) => hrefLower.includes(k))) score += 3;
            if (TEXT_CONTACT_KEYS.some((k) => text.includes(k))) score += 2;
            if (ABOUT_KEYS.some((k) => hrefLower.includes(k))) score += 1;
            if (score > 0) out.push({ url, score });
        });

        return out;
    }
}
