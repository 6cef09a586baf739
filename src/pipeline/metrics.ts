export enum CandidateState {
    RECEIVED = 'RECEIVED',
    SKIPPED_BIG_COMPANY = 'SKIPPED_BIG_COMPANY',
    URL_CLEANED = 'URL_CLEANED',
    SKIPPED_DUPLICATE = 'SKIPPED_DUPLICATE',
    NO_SITE = 'NO_SITE',
    SITE_CHECKED = 'SITE_CHECKED',
    SCORED = 'SCORED',
    EMAILS_EXTRACTED = 'EMAILS_EXTRACTED',
    PERSISTED = 'PERSISTED',
    FAILED = 'FAILED',
}

export type TerminalState =
    | CandidateState.SKIPPED_BIG_COMPANY
    | CandidateState.SKIPPED_DUPLICATE
    | CandidateState.NO_SITE
    | CandidateState.PERSISTED
    | CandidateState.FAILED;

export interface RunSummary {
    total: number;
    persisted: number;
    noSite: number;
    skippedBigCompany: number;
    skippedDuplicate: number;
    failed: number;
    relevant: number;
    withEmail: number;
    avgLatencyMs: number;
}

/** Per-run counters, one `record` per candidate that reached a terminal state. */
export class PipelineMetrics {
    private readonly stats = {
        total: 0,
        persisted: 0,
        noSite: 0,
        skippedBigCompany: 0,
        skippedDuplicate: 0,
        failed: 0,
        relevant: 0,
        withEmail: 0,
        totalLatency: 0,
    };

    record(state: TerminalState, latencyMs: number, flags: { relevant?: boolean; withEmail?: boolean } = {}): void {
        this.stats.total++;
        this.stats.totalLatency += latencyMs;
        switch (state) {
            case CandidateState.PERSISTED:
                this.stats.persisted++;
                break;
            case CandidateState.NO_SITE:
                this.stats.noSite++;
                break;
            case CandidateState.SKIPPED_BIG_COMPANY:
                this.stats.skippedBigCompany++;
                break;
            case CandidateState.SKIPPED_DUPLICATE:
                this.stats.skippedDuplicate++;
                break;
            case CandidateState.FAILED:
                this.stats.failed++;
                break;
        }
        if (flags.relevant) this.stats.relevant++;
        if (flags.withEmail) this.stats.withEmail++;
    }

    getSummary(): RunSummary {
        const { totalLatency, ...counts } = this.stats;
        return {
            ...counts,
            avgLatencyMs: this.stats.total > 0 ? Math.round(totalLatency / this.stats.total) : 0,
        };
    }
}
