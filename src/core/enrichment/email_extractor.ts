import * as cheerio from 'cheerio';

import { FilterLists, loadFilterLists } from '../../config/catalog';
import { spacedText } from '../../utils/html';
import { Logger } from '../../utils/logger';
import { UrlNormalizer } from '../../utils/url_normalizer';
import { ContactPageDiscoverer } from '../discovery/contact_page_discoverer';
import { PageFetcher } from '../fetch/page_fetcher';

export const LINKEDIN_PREFIX = 'LINKEDIN:';

const SLUG_FALLBACK = [
    '/contatti', '/contatto', '/contattaci', '/contattaci/', '/contatti/',
    '/contact', '/contacts', '/contact-us', '/contactus',
    '/chi-siamo', '/chisiamo', '/about', '/about-us', '/azienda', '/company',
    '/privacy', '/legal',
];

const EMAIL_RE = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const STRICT_EMAIL_RE = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const LINKEDIN_RE = /https?:\/\/(?:[a-z]{2,3}\.)?(?:www\.)?linkedin\.com\/(?:in|company)\/[a-zA-Z0-9%_-]+\/?/gi;
const DATA_EMAIL_RE = /data-email\s*=\s*["']([^"']+)["']/gi;
const JSON_EMAIL_RE = /"email"\s*:\s*"([^"]+)"/gi;

const LOCAL_PART_IGNORE = [
    /^[a-f0-9]{24,}$/,
    /^[a-z0-9]{30,}$/,
    /^(noreply|no-reply|donotreply|do-not-reply|unsubscribe|mailer-daemon|postmaster|abuse|bounces?|devnull|null)$/,
    /privacy|gdpr|legal|copyright/i,
];

// "logo@2x.png" and friends look like addresses to the regex.
const ASSET_TLDS = new Set(['png', 'jpg', 'jpeg', 'gif', 'svg', 'webp', 'ico', 'css', 'js', 'bmp', 'tif', 'tiff']);

/** Obfuscation spellings replaced before any regex runs; order matters. */
const OBFUSCATIONS: Array<[RegExp, string]> = [
    [/\s*\[at\]\s*/gi, '@'],
    [/\s*\(at\)\s*/gi, '@'],
    [/\s*\[chiocciola\]\s*/gi, '@'],
    [/\s+at\s+/gi, '@'],
    [/\s*\[dot\]\s*/gi, '.'],
    [/\s*\(dot\)\s*/gi, '.'],
    [/\s*\[punto\]\s*/gi, '.'],
    [/\s*\(punto\)\s*/gi, '.'],
    [/\s+dot\s+/gi, '.'],
    [/\s+punto\s+/gi, '.'],
    [/\s*@\s*/g, '@'],
    // inside a domain a lowercase label may follow "@acme. it"; "fine. Inizio" stays a sentence
    [/(@[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*)\s*\.\s+([a-z]{2,6})\b/g, '$1.$2'],
    [/([A-Za-z0-9-])\s+\.\s*([A-Za-z0-9])/g, '$1.$2'],
];

export type EmailZone = 'footer' | 'contact' | 'mailto' | 'page';

export interface ZonedHarvest {
    footer: string[];
    contact: string[];
    mailto: string[];
    page: string[];
    linkedin: string[];
}

export interface ExtractOptions {
    disableSlugFallback?: boolean;
}

export interface EmailExtractorOptions {
    maxPages?: number;
    attempts?: number;
    filters?: FilterLists;
}

export function normalizeObfuscation(html: string): string {
    return OBFUSCATIONS.reduce((text, [pattern, replacement]) => text.replace(pattern, replacement), html);
}

/** Splits a tagged result list back into addresses and LinkedIn URLs. */
export function partitionContacts(items: string[]): { emails: string[]; linkedin: string[] } {
    const emails: string[] = [];
    const linkedin: string[] = [];
    for (const item of items) {
        if (item.startsWith(LINKEDIN_PREFIX)) linkedin.push(item.slice(LINKEDIN_PREFIX.length));
        else emails.push(item);
    }
    return { emails, linkedin };
}

/**
 * 📬 Crawls a site's likely contact pages and returns addresses ordered by
 * where they were found (footer, contact section, mailto, anywhere), followed
 * by LinkedIn links tagged with LINKEDIN_PREFIX.
 */
export class EmailExtractor {
    private readonly ignoredDomains: Set<string>;
    private readonly freeMailDomains: Set<string>;
    private readonly maxPages: number;
    private readonly attempts: number;

    constructor(
        private readonly fetcher: PageFetcher,
        private readonly discoverer: ContactPageDiscoverer,
        options: EmailExtractorOptions = {}
    ) {
        const filters = options.filters ?? loadFilterLists();
        this.ignoredDomains = new Set(filters.ignoredEmailDomains.map((d) => d.toLowerCase()));
        this.freeMailDomains = new Set(filters.freeMailDomains.map((d) => d.toLowerCase()));
        this.maxPages = options.maxPages ?? 25;
        this.attempts = options.attempts ?? 3;
    }

    async extract(siteUrl: string, options: ExtractOptions = {}): Promise<string[]> {
        if (!/^https?:\/\//i.test(siteUrl.trim())) return [];
        const base = siteUrl.trim();

        const pages = await this.candidatePages(base, options.disableSlugFallback ?? false);
        const harvest: ZonedHarvest = { footer: [], contact: [], mailto: [], page: [], linkedin: [] };

        for (const page of pages) {
            const res = await this.fetcher.get(page, { retries: this.attempts - 1 });
            if (!res || res.status !== 200 || !res.body) {
                Logger.debug(`[EmailExtractor] skipping page (${res?.status ?? 'no response'})`, { url: page });
                continue;
            }
            const zones = this.harvestPage(res.body);
            harvest.footer.push(...zones.footer);
            harvest.contact.push(...zones.contact);
            harvest.mailto.push(...zones.mailto);
            harvest.page.push(...zones.page);
            harvest.linkedin.push(...zones.linkedin);
        }

        return this.finalize(harvest);
    }

    /** Raw zone candidates of one HTML page, after obfuscation normalization. */
    harvestPage(rawHtml: string): ZonedHarvest {
        const html = normalizeObfuscation(rawHtml);
        const $ = cheerio.load(html);
        const zones: ZonedHarvest = { footer: [], contact: [], mailto: [], page: [], linkedin: [] };

        $('footer').each((_, el) => {
            zones.footer.push(...this.findEmails(spacedText($(el))), ...this.findEmails($.html(el)));
        });

        $('div, section').each((_, el) => {
            const cls = ($(el).attr('class') ?? '').toLowerCase();
            if (cls.includes('contact') || cls.includes('contatti')) {
                zones.contact.push(...this.findEmails(spacedText($(el))));
            }
        });

        $('a[href]').each((_, el) => {
            const href = $(el).attr('href') ?? '';
            if (!/^mailto:/i.test(href)) return;
            const target = safeDecode(href.slice('mailto:'.length)).split('?')[0] ?? '';
            for (const address of target.split(/[,;]/)) {
                const cleaned = this.cleanEmail(address);
                if (cleaned) zones.mailto.push(cleaned);
            }
        });

        const pageText = spacedText($.root());
        zones.page.push(...this.findEmails(pageText), ...this.findEmails(html));
        for (const re of [DATA_EMAIL_RE, JSON_EMAIL_RE]) {
            for (const match of html.matchAll(re)) {
                const cleaned = match[1] ? this.cleanEmail(match[1]) : '';
                if (cleaned) zones.page.push(cleaned);
            }
        }

        for (const source of [pageText, html]) {
            for (const match of source.matchAll(LINKEDIN_RE)) {
                zones.linkedin.push(match[0]);
            }
        }

        return zones;
    }

    /**
     * Truncates at `?`/whitespace, strips `mailto:`/`email`/`e-mail` prefixes,
     * collapses repeated TLDs and lowercases. Empty string when nothing usable is left.
     */
    cleanEmail(raw: string): string {
        let email = (raw.trim().split(/[?\s]/)[0] ?? '').replace(/^mailto:/i, '');
        email = email.replace(/[^\w.@-]/g, '').replace(/[.,;:)]+$/, '');
        email = email.replace(/^e-?mail/i, '').toLowerCase();

        const parts = email.split('@');
        if (parts.length !== 2) return '';
        const [local = '', domain = ''] = parts;
        const labels = domain.split('.');
        while (labels.length > 2 && labels[labels.length - 1] === labels[labels.length - 2]) {
            labels.pop();
        }
        return `${local}@${labels.join('.')}`;
    }

    isValidEmail(email: string): boolean {
        if (!email || email.length > 254 || !STRICT_EMAIL_RE.test(email)) return false;
        const [local = '', domain = ''] = email.toLowerCase().split('@');
        if (local.length < 3) return false;
        if (this.isIgnoredDomain(domain)) return false;
        if (ASSET_TLDS.has(domain.split('.').pop() ?? '')) return false;
        return !LOCAL_PART_IGNORE.some((re) => re.test(local));
    }

    isFreeMail(email: string): boolean {
        const domain = email.split('@')[1] ?? '';
        return this.freeMailDomains.has(domain);
    }

    private isIgnoredDomain(domain: string): boolean {
        if (this.ignoredDomains.has(domain)) return true;
        for (const ignored of this.ignoredDomains) {
            if (domain.endsWith(`.${ignored}`)) return true;
        }
        return false;
    }

    private findEmails(text: string): string[] {
        const out: string[] = [];
        for (const match of text.matchAll(EMAIL_RE)) {
            const cleaned = this.cleanEmail(match[0]);
            if (cleaned) out.push(cleaned);
        }
        return out;
    }

    private async candidatePages(base: string, disableSlugFallback: boolean): Promise<string[]> {
        let discovered: string[] = [];
        try {
            discovered = await this.discoverer.discover(base);
        } catch (e) {
            Logger.logError('[EmailExtractor] contact discovery failed', e, { url: base });
        }

        const relative = [''];
        const absolute = discovered.filter((u) => UrlNormalizer.isSameDomain(u, base));
        if (absolute.length === 0 && !disableSlugFallback) relative.push(...SLUG_FALLBACK);

        const pages: string[] = [];
        for (const candidate of [...relative, ...absolute]) {
            let url: string;
            try {
                url = new URL(candidate, base).toString();
            } catch {
                continue;
            }
            if (!pages.includes(url)) pages.push(url);
            if (pages.length >= this.maxPages) break;
        }
        return pages;
    }

    private finalize(harvest: ZonedHarvest): string[] {
        const seen = new Set<string>();
        const ordered: string[] = [];
        for (const zone of [harvest.footer, harvest.contact, harvest.mailto, harvest.page]) {
            for (const email of zone) {
                const key = email.toLowerCase();
                if (seen.has(key) || !this.isValidEmail(key)) continue;
                seen.add(key);
                ordered.push(key);
            }
        }

        const corporate = ordered.filter((e) => !this.isFreeMail(e));
        const emails = corporate.length > 0 ? corporate : ordered;

        const seenLinks = new Set<string>();
        const linkedin: string[] = [];
        for (const link of harvest.linkedin) {
            const key = link.toLowerCase().replace(/\/+$/, '');
            if (seenLinks.has(key)) continue;
            seenLinks.add(key);
            linkedin.push(`${LINKEDIN_PREFIX}${link.replace(/\/+$/, '')}`);
        }

        return [...emails, ...linkedin];
    }
}

function safeDecode(value: string): string {
    try {
        return decodeURIComponent(value);
    } catch {
        return value;
    }
}
