import * as path from 'path';

import { Config } from '../config';
import { loadFilterLists, loadIndustryCatalog } from '../config/catalog';
import { RelevanceScorer } from '../core/analysis/relevance_scorer';
import { ContactPageDiscoverer } from '../core/discovery/contact_page_discoverer';
import { AdminFinder, AdminNameOracle, OpenAICompletionClient } from '../core/enrichment/admin_finder';
import { EmailExtractor } from '../core/enrichment/email_extractor';
import { SnippetSearch } from '../core/enrichment/snippet_search';
import { FallbackFetcher, PageFetcher } from '../core/fetch/page_fetcher';
import { HttpFetcher } from '../core/fetch/http_fetcher';
import { ReaderProxyFetcher } from '../core/fetch/reader_proxy_fetcher';
import { CheckpointStore } from '../storage/checkpoint';
import { CsvSink } from '../storage/csv_sink';
import { DedupLedger } from '../storage/dedup_ledger';
import { ConfigurationError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { SlidingWindowRateLimiter } from '../utils/rate_limiter';
import { EnrichmentOrchestrator } from './enrichment_orchestrator';

export interface Services {
    limiter: SlidingWindowRateLimiter;
    fetcher: PageFetcher;
    scorer: RelevanceScorer;
    extractor: EmailExtractor;
}

export function buildLimiter(config: Config): SlidingWindowRateLimiter {
    return new SlidingWindowRateLimiter({ maxCalls: config.RATE_LIMIT_MAX_CALLS, periodMs: config.RATE_LIMIT_PERIOD_MS });
}

export function buildFetcher(config: Config, limiter: SlidingWindowRateLimiter): PageFetcher {
    const http = new HttpFetcher({
        limiter,
        timeoutMs: config.HTTP_TIMEOUT_MS,
        retries: config.RETRY_ATTEMPTS,
        baseDelayMs: config.RETRY_BASE_DELAY_MS,
    });
    if (!config.READER_PROXY_URL) return http;

    Logger.info(`[Factory] rendered-page fallback enabled via ${config.READER_PROXY_URL}`);
    return new FallbackFetcher(
        http,
        new ReaderProxyFetcher({ baseUrl: config.READER_PROXY_URL, apiKey: config.READER_PROXY_API_KEY, limiter })
    );
}

/**
 * Scoring and extraction stack for one industry; throws on an unknown industry.
 * Pass the run's limiter so discovery and enrichment share one request budget.
 */
export function buildServices(config: Config, industry: string, limiter = buildLimiter(config)): Services {
    const fetcher = buildFetcher(config, limiter);
    const scorer = new RelevanceScorer(industry, loadIndustryCatalog(), fetcher, {
        minScore: config.RELEVANCE_MIN_SCORE,
        websiteThreshold: config.RELEVANCE_WEBSITE_THRESHOLD,
        negativeWeight: config.RELEVANCE_NEGATIVE_WEIGHT,
    });
    return { limiter, fetcher, scorer, extractor: buildExtractor(config, fetcher) };
}

export function buildExtractor(config: Config, fetcher: PageFetcher): EmailExtractor {
    return new EmailExtractor(fetcher, new ContactPageDiscoverer(fetcher), {
        maxPages: config.MAX_CONTACT_PAGES,
        filters: loadFilterLists(),
    });
}

export function buildAdminFinder(config: Config, limiter?: SlidingWindowRateLimiter): AdminFinder {
    if (!config.ADMIN_LLM_API_KEY) {
        throw new ConfigurationError('ADMIN_LLM_API_KEY is required for administrator lookups');
    }
    const client = new OpenAICompletionClient({
        apiKey: config.ADMIN_LLM_API_KEY,
        baseURL: config.ADMIN_LLM_BASE_URL,
        model: config.ADMIN_LLM_MODEL,
    });
    return new AdminFinder(new SnippetSearch({ limiter }), new AdminNameOracle(client));
}

export interface OrchestratorSetup {
    industry: string;
    outputPath: string;
    withAdmin?: boolean;
    disableSlugFallback?: boolean;
    limiter?: SlidingWindowRateLimiter;
}

export async function buildOrchestrator(config: Config, setup: OrchestratorSetup): Promise<EnrichmentOrchestrator> {
    const services = buildServices(config, setup.industry, setup.limiter);
    const ledger = await DedupLedger.load(setup.outputPath);
    const sink = new CsvSink(setup.outputPath, { backupEvery: config.BACKUP_EVERY });
    const checkpointPath = path.join(path.dirname(setup.outputPath), `${path.basename(setup.outputPath, '.csv')}_checkpoint.json`);

    return new EnrichmentOrchestrator(
        {
            scorer: services.scorer,
            extractor: services.extractor,
            fetcher: services.fetcher,
            ledger,
            sink,
            checkpoint: new CheckpointStore(checkpointPath),
            adminFinder: setup.withAdmin ? buildAdminFinder(config, services.limiter) : undefined,
        },
        {
            withAdmin: setup.withAdmin,
            disableSlugFallback: setup.disableSlugFallback,
            bigCompanyKeywords: loadFilterLists().bigCompanyKeywords,
            checkpointEvery: config.CHECKPOINT_EVERY,
        }
    );
}
