import * as cheerio from 'cheerio';

import { IndustryCatalog, IndustryProfile, getIndustryProfile } from '../../config/catalog';
import { spacedText, visibleText } from '../../utils/html';
import { Logger } from '../../utils/logger';
import { TextCleaner } from '../../utils/text_cleaner';
import { UrlNormalizer } from '../../utils/url_normalizer';
import { FetchResult, PageFetcher } from '../fetch/page_fetcher';

export type ConfidenceTier = 'alta' | 'media' | 'bassa';

/** Snippet scoring: 0-100 score with a confidence tier. */
export interface TextRelevanceResult {
    relevant: boolean;
    score: number;
    category: string;
    confidence: ConfidenceTier;
    reason: string;
    positiveHits: number;
    negativeHits: number;
}

export interface WebsiteScores {
    positive: number;
    negative: number;
    total: number;
}

/** Website scoring: confidence in [0, 1]; `scores` only when page content was analysed. */
export interface WebsiteRelevanceResult {
    relevant: boolean;
    confidence: number;
    category: string;
    reason: string;
    scores: WebsiteScores | null;
}

export interface WeightedTextScore extends WebsiteScores {
    positiveMatches: number;
    negativeMatches: number;
    lengthFactor: number;
}

export interface ScorerOptions {
    minScore?: number;
    websiteThreshold?: number;
    negativeWeight?: number;
    domainMatchConfidence?: number;
}

export const UNKNOWN_CATEGORY = 'unknown';
export const NOT_RELEVANT_CATEGORY = 'non_pertinente';

function countOccurrences(haystack: string, needle: string): number {
    if (!needle) return 0;
    let count = 0;
    let from = haystack.indexOf(needle);
    while (from !== -1) {
        count++;
        from = haystack.indexOf(needle, from + needle.length);
    }
    return count;
}

const round2 = (n: number) => Math.round(n * 100) / 100;
const clamp = (n: number, lo: number, hi: number) => Math.min(hi, Math.max(lo, n));

/**
 * Keyword-based relevance of a company to one industry vertical.
 * Both entry points are deterministic for a given input and profile.
 */
export class RelevanceScorer {
    readonly industry: string;
    private readonly positive: string[];
    private readonly negative: string[];
    private readonly minScore: number;
    private readonly websiteThreshold: number;
    private readonly negativeWeight: number;
    private readonly domainMatchConfidence: number;

    /** Throws ConfigurationError when the industry is not in the catalog. */
    constructor(industry: string, catalog: IndustryCatalog, private readonly fetcher: PageFetcher, options: ScorerOptions = {}) {
        const profile: IndustryProfile = getIndustryProfile(catalog, industry);
        this.industry = industry;
        this.positive = profile.positive.map((k) => k.toLowerCase());
        this.negative = profile.negative.map((k) => k.toLowerCase());
        this.minScore = options.minScore ?? profile.minScore ?? 20;
        this.websiteThreshold = options.websiteThreshold ?? 3.0;
        this.negativeWeight = options.negativeWeight ?? 1.5;
        this.domainMatchConfidence = options.domainMatchConfidence ?? 0.8;
    }

    /**
     * Scores a text blob by keyword presence: each keyword counts once
     * however often it appears.
     */
    analyzeText(text: string): TextRelevanceResult {
        const normalized = TextCleaner.forMatching(text);
        const positiveHits = this.positive.filter((k) => normalized.includes(k)).length;
        const negativeHits = this.negative.filter((k) => normalized.includes(k)).length;

        const rawScore = positiveHits * 12 - negativeHits * 18;
        const score = clamp(50 + rawScore, 0, 100);
        const relevant = score >= this.minScore && positiveHits >= Math.max(1, negativeHits);

        let confidence: ConfidenceTier = 'bassa';
        if (score >= 70 && positiveHits >= 3 && negativeHits === 0) {
            confidence = 'alta';
        } else if (score >= 40 && positiveHits >= 2) {
            confidence = 'media';
        }

        return {
            relevant,
            score,
            category: relevant ? this.industry : NOT_RELEVANT_CATEGORY,
            confidence,
            reason: `pos_hits=${positiveHits}, neg_hits=${negativeHits}, score=${score}`,
            positiveHits,
            negativeHits,
        };
    }

    async analyzeWebsite(url: string): Promise<WebsiteRelevanceResult> {
        if (!url || !url.trim()) {
            return { relevant: false, confidence: 0, category: UNKNOWN_CATEGORY, reason: 'URL non valido o mancante', scores: null };
        }

        const target = UrlNormalizer.normalize(url);
        const domainKeyword = this.domainKeyword(target);
        if (domainKeyword) {
            return {
                relevant: true,
                confidence: this.domainMatchConfidence,
                category: this.industry,
                reason: `Il dominio contiene la parola chiave "${domainKeyword}"`,
                scores: null,
            };
        }

        const page = await this.fetchPage(target);
        if (!page) {
            return { relevant: false, confidence: 0.5, category: UNKNOWN_CATEGORY, reason: 'Sito non raggiungibile', scores: null };
        }

        const weighted = RelevanceScorer.weightedText(page.body);
        const score = this.scoreWeightedText(weighted);
        const relevant = score.total >= this.websiteThreshold && score.positiveMatches >= Math.max(1, score.negativeMatches);
        const confidence = round2(clamp(0.5 + score.total / 20, 0.5, 1.0));

        let reason: string;
        if (relevant) {
            reason = score.positive > 8
                ? `Rilevato contenuto pertinente al settore ${this.industry} con alto numero di riferimenti specifici`
                : `Rilevato contenuto pertinente al settore ${this.industry} con riferimenti sufficienti`;
        } else {
            reason = `Contenuto insufficiente relativo al settore ${this.industry}`;
        }

        return {
            relevant,
            confidence,
            category: relevant ? this.industry : NOT_RELEVANT_CATEGORY,
            reason,
            scores: { positive: round2(score.positive), negative: round2(score.negative), total: round2(score.total) },
        };
    }

    /**
     * Occurrence counts over an already weighted, lowercased text, normalized
     * by length so long pages do not win on volume alone. Values are unrounded.
     */
    scoreWeightedText(weighted: string): WeightedTextScore {
        const positiveMatches = this.positive.reduce((sum, k) => sum + countOccurrences(weighted, k), 0);
        const negativeMatches = this.negative.reduce((sum, k) => sum + countOccurrences(weighted, k), 0);
        const lengthFactor = Math.min(1.0, 2000 / Math.max(weighted.length, 500));
        const positive = positiveMatches * lengthFactor;
        const negative = negativeMatches * lengthFactor;
        const total = positive - negative * this.negativeWeight;

        return { positiveMatches, negativeMatches, lengthFactor, positive, negative, total };
    }

    /** Meta text (title, description, keywords, h1-h3) twice, then the body text. */
    static weightedText(html: string): string {
        const $ = cheerio.load(html);
        const meta = [
            $('title').first().text(),
            $('meta[name="description"]').attr('content') ?? '',
            $('meta[name="keywords"]').attr('content') ?? '',
            $('h1, h2, h3')
                .map((_, el) => spacedText($(el)))
                .get()
                .join(' '),
        ]
            .join(' ')
            .replace(/\s+/g, ' ')
            .trim()
            .toLowerCase();
        const full = visibleText($).toLowerCase();
        return `${meta} ${meta} ${full}`;
    }

    private domainKeyword(url: string): string | null {
        const domain = UrlNormalizer.extractDomain(url);
        const tokens = (domain.match(/[a-z]+/gi) ?? []).join(' ').toLowerCase();
        if (!tokens) return null;
        return this.positive.find((k) => tokens.includes(k)) ?? null;
    }

    private async fetchPage(url: string): Promise<FetchResult | null> {
        const attempts = [url];
        if (url.startsWith('https://')) attempts.push(`http://${url.slice('https://'.length)}`);

        for (const attempt of attempts) {
            const page = await this.fetcher.get(attempt);
            if (page && page.status < 400 && page.body.trim()) return page;
            Logger.debug(`[RelevanceScorer] no usable page (${page?.status ?? 'no response'})`, { url: attempt });
        }
        return null;
    }
}
