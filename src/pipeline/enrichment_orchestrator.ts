import pLimit from 'p-limit';

import { loadFilterLists } from '../config/catalog';
import { WebsiteRelevanceResult } from '../core/analysis/relevance_scorer';
import { AdminLookup } from '../core/enrichment/admin_finder';
import { ExtractOptions, partitionContacts } from '../core/enrichment/email_extractor';
import { PageFetcher } from '../core/fetch/page_fetcher';
import { CheckpointStore } from '../storage/checkpoint';
import { AppendOutcome, CsvSink } from '../storage/csv_sink';
import { DedupLedger, buildDedupKey } from '../storage/dedup_ledger';
import { CompanyRecord, RawCompany, emptyEnrichment } from '../types';
import { Logger } from '../utils/logger';
import { Sleeper, jitteredSleep, sleep } from '../utils/rate_limiter';
import { TextCleaner } from '../utils/text_cleaner';
import { UrlNormalizer } from '../utils/url_normalizer';
import { CandidateState, PipelineMetrics, RunSummary, TerminalState } from './metrics';

export interface WebsiteScorer {
    analyzeWebsite(url: string): Promise<WebsiteRelevanceResult>;
}

export interface ContactExtractor {
    extract(url: string, options?: ExtractOptions): Promise<string[]>;
}

export interface AdminLookupService {
    lookup(companyName: string, comune?: string): Promise<AdminLookup>;
}

export interface OrchestratorDeps {
    scorer: WebsiteScorer;
    extractor: ContactExtractor;
    /** Used for the HEAD reachability check before extraction. */
    fetcher: PageFetcher;
    ledger: DedupLedger;
    sink: CsvSink;
    adminFinder?: AdminLookupService;
    checkpoint?: CheckpointStore;
    metrics?: PipelineMetrics;
}

export interface OrchestratorOptions {
    withAdmin?: boolean;
    disableSlugFallback?: boolean;
    bigCompanyKeywords?: string[];
    /** Pause between candidates, per worker. */
    delayMs?: [number, number];
    checkpointEvery?: number;
    sleeper?: Sleeper;
}

export interface CandidateOutcome {
    state: TerminalState;
    trail: CandidateState[];
    record: CompanyRecord | null;
    persistence?: AppendOutcome;
    error?: string;
}

// Anything shorter cannot be a scheme://host URL.
const MIN_SITE_LENGTH = 6;

/**
 * ⚙️ Per-candidate state machine:
 * RECEIVED → big-company filter → URL clean → dedup → score → (emails) → CSV.
 * A candidate's failure is logged and counted, never rethrown.
 */
export class EnrichmentOrchestrator {
    private readonly bigCompanyKeywords: string[];
    private readonly metrics: PipelineMetrics;
    private readonly sleeper: Sleeper;
    private readonly checkpointQueue = pLimit(1);
    private persistedSinceCheckpoint = 0;
    private stopped = false;

    constructor(private readonly deps: OrchestratorDeps, private readonly options: OrchestratorOptions = {}) {
        this.bigCompanyKeywords = (options.bigCompanyKeywords ?? loadFilterLists().bigCompanyKeywords).map((k) => k.toLowerCase());
        this.metrics = deps.metrics ?? new PipelineMetrics();
        this.sleeper = options.sleeper ?? sleep;
    }

    isBigCompany(name: string): boolean {
        const lower = name.toLowerCase();
        return this.bigCompanyKeywords.some((k) => lower.includes(k));
    }

    /** Stops handing out new candidates; in-flight ones finish normally. */
    stop(): void {
        this.stopped = true;
    }

    get isStopped(): boolean {
        return this.stopped;
    }

    async process(raw: RawCompany): Promise<CandidateOutcome> {
        const started = Date.now();
        const outcome = await this.advance(raw);
        this.metrics.record(outcome.state, Date.now() - started, {
            relevant: outcome.record?.pertinenza ?? false,
            withEmail: (outcome.record?.email ?? '') !== '',
        });
        return outcome;
    }

    async runSequential(records: RawCompany[]): Promise<RunSummary> {
        await this.deps.sink.open();
        for (const raw of records) {
            if (this.stopped) break;
            const outcome = await this.process(raw);
            await this.afterCandidate(outcome);
        }
        await this.finish();
        return this.metrics.getSummary();
    }

    async runParallel(records: RawCompany[], concurrency = 10): Promise<RunSummary> {
        await this.deps.sink.open();
        const limit = pLimit(Math.max(1, concurrency));
        const tasks = records.map((raw) =>
            limit(async () => {
                if (this.stopped) return;
                const outcome = await this.process(raw);
                await this.afterCandidate(outcome);
            })
        );
        await Promise.all(tasks);
        await this.finish();
        return this.metrics.getSummary();
    }

    private async advance(raw: RawCompany): Promise<CandidateOutcome> {
        const trail: CandidateState[] = [CandidateState.RECEIVED];
        const done = (state: TerminalState, record: CompanyRecord | null, extra: Partial<CandidateOutcome> = {}): CandidateOutcome => {
            trail.push(state);
            return { state, trail, record, ...extra };
        };

        if (this.isBigCompany(raw.nome)) {
            Logger.debug(`[Orchestrator] big company skipped: ${raw.nome}`, { company_name: raw.nome });
            return done(CandidateState.SKIPPED_BIG_COMPANY, null);
        }

        const site = EnrichmentOrchestrator.cleanSite(raw.sito_web);
        trail.push(CandidateState.URL_CLEANED);

        const key = buildDedupKey({ nome: raw.nome, comune: raw.comune, sito_web: site });
        if (!this.deps.ledger.claim(key)) {
            Logger.debug(`[Orchestrator] duplicate skipped: ${raw.nome} (${raw.comune})`, { company_name: raw.nome });
            return done(CandidateState.SKIPPED_DUPLICATE, null);
        }

        const record = emptyEnrichment({
            ...raw,
            nome: raw.nome.trim(),
            sito_web: site,
            indirizzo: TextCleaner.clean(raw.indirizzo),
            telefono: TextCleaner.clean(raw.telefono),
        });

        try {
            if (this.options.withAdmin && this.deps.adminFinder && !record.contatto) {
                const admin = await this.deps.adminFinder.lookup(record.nome, record.comune);
                record.contatto = admin.name;
            }

            if (!site) {
                const persistence = await this.persist(record);
                if (persistence === 'lost') {
                    this.deps.ledger.release(key);
                    return done(CandidateState.FAILED, record, { persistence, error: 'record could not be written' });
                }
                this.deps.ledger.add(key);
                return done(CandidateState.NO_SITE, record, { persistence });
            }
            trail.push(CandidateState.SITE_CHECKED);

            const relevance = await this.deps.scorer.analyzeWebsite(site);
            record.pertinenza = relevance.relevant;
            record.categoria = relevance.category;
            record.confidenza_analisi = relevance.confidence;
            trail.push(CandidateState.SCORED);

            if (relevance.relevant) {
                const status = await this.deps.fetcher.head(site);
                if (status !== null && status < 500) {
                    const { emails, linkedin } = partitionContacts(
                        await this.deps.extractor.extract(site, { disableSlugFallback: this.options.disableSlugFallback })
                    );
                    record.email = emails.join(', ');
                    record.linkedin = linkedin.join(', ');
                    trail.push(CandidateState.EMAILS_EXTRACTED);
                } else {
                    Logger.info(`[Orchestrator] site unreachable (${status ?? 'no response'}), skipping extraction`, {
                        company_name: record.nome,
                        url: site,
                    });
                }
            }

            const persistence = await this.persist(record);
            if (persistence === 'lost') {
                this.deps.ledger.release(key);
                return done(CandidateState.FAILED, record, { persistence, error: 'record could not be written' });
            }
            this.deps.ledger.add(key);
            Logger.info(`[Orchestrator] ${record.nome}: pertinenza=${record.pertinenza} email=${record.email || '-'}`, {
                company_name: record.nome,
                url: site,
            });
            return done(CandidateState.PERSISTED, record, { persistence });
        } catch (e) {
            this.deps.ledger.release(key);
            Logger.logError(`[Orchestrator] enrichment failed for ${record.nome}`, e, { company_name: record.nome, url: site });
            return done(CandidateState.FAILED, record, { error: e instanceof Error ? e.message : String(e) });
        }
    }

    /**
     * Bare `scheme://host` or '' when there is no usable site: empty input,
     * map redirect residue, or something that does not parse as http(s).
     */
    static cleanSite(raw: string): string {
        const cleaned = UrlNormalizer.clean(raw.trim());
        if (cleaned.length < MIN_SITE_LENGTH || !/^https?:\/\//.test(cleaned)) return '';
        if (UrlNormalizer.isMapArtifact(cleaned)) return '';
        return cleaned;
    }

    private async persist(record: CompanyRecord): Promise<AppendOutcome> {
        const outcome = await this.deps.sink.append(record);
        if (outcome !== 'lost') this.persistedSinceCheckpoint++;
        return outcome;
    }

    private async afterCandidate(outcome: CandidateOutcome): Promise<void> {
        const every = this.options.checkpointEvery ?? 25;
        if (this.deps.checkpoint && this.persistedSinceCheckpoint >= every) {
            this.persistedSinceCheckpoint = 0;
            await this.saveCheckpoint();
        }
        // skipped candidates cost no requests, so no politeness pause
        if (outcome.state === CandidateState.SKIPPED_BIG_COMPANY || outcome.state === CandidateState.SKIPPED_DUPLICATE) return;
        const [min, max] = this.options.delayMs ?? [50, 200];
        await jitteredSleep(min, max, this.sleeper);
    }

    private async saveCheckpoint(): Promise<void> {
        const checkpoint = this.deps.checkpoint;
        if (!checkpoint) return;
        await this.checkpointQueue(() => checkpoint.save(this.deps.ledger.snapshot()));
    }

    private async finish(): Promise<void> {
        await this.deps.sink.close();
        await this.saveCheckpoint();
        const summary = this.metrics.getSummary();
        Logger.info(
            `🏁 run finished: ${summary.total} candidates, ${summary.persisted + summary.noSite} written, ` +
                `${summary.skippedDuplicate} duplicates, ${summary.skippedBigCompany} big companies, ${summary.failed} failed`
        );
    }
}
