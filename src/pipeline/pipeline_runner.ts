import { RawCompany } from '../types';
import { Logger } from '../utils/logger';
import { DiscoveryProvider } from '../core/discovery/google_places_provider';
import { Geocoder, filterComuni } from '../core/discovery/geo';
import { PlacesDetailsCache } from '../core/discovery/places_details_cache';
import { ProcessedComuniLog } from '../storage/checkpoint';
import { EnrichmentOrchestrator } from './enrichment_orchestrator';
import { RunSummary } from './metrics';

export interface RunnerOptions {
    keywords: string[];
    radiusKm: number;
    parallel: boolean;
    concurrency: number;
    limitComuni?: number;
    shuffle?: boolean;
}

export interface RunnerDeps {
    provider: DiscoveryProvider;
    geocoder: Geocoder;
    orchestrator: EnrichmentOrchestrator;
    comuniLog: ProcessedComuniLog;
    placesCache?: PlacesDetailsCache;
}

const identity = (r: RawCompany) => `${r.nome.trim().toLowerCase()}|${r.comune.trim().toLowerCase()}`;

/**
 * 🏁 Whole run: for every comune not yet processed, discover candidates for
 * each industry keyword and hand them to the orchestrator.
 */
export class PipelineRunner {
    constructor(private readonly deps: RunnerDeps) {}

    async run(comuni: string[], options: RunnerOptions): Promise<RunSummary | null> {
        await this.deps.comuniLog.load();
        await this.deps.placesCache?.load();

        const pending = filterComuni(comuni, {
            exclude: (c) => options.keywords.every((k) => this.deps.comuniLog.has(c, k)),
            shuffle: options.shuffle,
            limit: options.limitComuni,
        });
        Logger.info(`[Runner] ${pending.length}/${comuni.length} comuni to process (${this.deps.provider.name})`);

        let summary: RunSummary | null = null;
        try {
            for (const comune of pending) {
                if (this.deps.orchestrator.isStopped) break;

                const center = await this.deps.geocoder.locate(comune);
                if (!center) continue;

                for (const keyword of options.keywords) {
                    if (this.deps.orchestrator.isStopped) break;
                    if (this.deps.comuniLog.has(comune, keyword)) continue;

                    const raw = await this.deps.provider.search({ comune, keyword, center, radiusKm: options.radiusKm });
                    const batch = PipelineRunner.dedupeBatch(raw);
                    Logger.info(`[Runner] ${comune} / "${keyword}": ${batch.length} candidates`, { comune });

                    summary = options.parallel
                        ? await this.deps.orchestrator.runParallel(batch, options.concurrency)
                        : await this.deps.orchestrator.runSequential(batch);

                    if (!this.deps.orchestrator.isStopped) {
                        await this.deps.comuniLog.mark(comune, keyword);
                    }
                }
            }
        } finally {
            await this.deps.placesCache?.save();
        }
        return summary;
    }

    /** First occurrence of each (nome, comune) in a discovery batch. */
    static dedupeBatch(records: RawCompany[]): RawCompany[] {
        const seen = new Set<string>();
        return records.filter((r) => {
            const id = identity(r);
            if (seen.has(id)) return false;
            seen.add(id);
            return true;
        });
    }
}
