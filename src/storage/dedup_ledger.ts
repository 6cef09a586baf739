import * as fs from 'fs';
import { parse } from 'csv-parse/sync';

import { Logger } from '../utils/logger';
import { UrlNormalizer } from '../utils/url_normalizer';

export interface DedupKey {
    nome: string;
    comune: string;
    site: string;
}

export function buildDedupKey(record: { nome: string; comune: string; sito_web: string }): DedupKey {
    return {
        nome: record.nome.trim().toLowerCase(),
        comune: record.comune.trim().toLowerCase(),
        site: UrlNormalizer.keySite(record.sito_web),
    };
}

export function serializeKey(key: DedupKey): string {
    return `${key.nome}|${key.comune}|${key.site}`;
}

// Identity used for matching: name and municipality. The site is kept in the
// full key for the record but a company listed with and without a site, or
// under two spellings of the same site, is still one company.
function identityOf(key: DedupKey): string {
    return `${key.nome}|${key.comune}`;
}

function field(row: unknown, name: string): string {
    if (typeof row !== 'object' || row === null || !(name in row)) return '';
    const value: unknown = Reflect.get(row, name);
    return typeof value === 'string' ? value : '';
}

/**
 * In-memory record of what the output file already holds. Rebuilt from the
 * CSV at startup; `claim` reserves a key for a candidate still in flight so
 * two workers never enrich the same company.
 */
export class DedupLedger {
    private readonly keys = new Set<string>();
    private readonly identities = new Set<string>();
    private readonly inFlight = new Set<string>();

    static async load(outputPath: string): Promise<DedupLedger> {
        const ledger = new DedupLedger();
        let content: string;
        try {
            content = await fs.promises.readFile(outputPath, 'utf-8');
        } catch (e) {
            if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
                Logger.info(`[Ledger] no existing output at ${outputPath}, starting fresh`);
            } else {
                Logger.logError('[Ledger] cannot read existing output, starting fresh', e, { path: outputPath });
            }
            return ledger;
        }

        try {
            const rows: unknown = parse(content, {
                columns: true,
                bom: true,
                skip_empty_lines: true,
                relax_column_count: true,
                trim: true,
            });
            if (Array.isArray(rows)) {
                for (const row of rows) {
                    const nome = field(row, 'nome');
                    if (!nome) continue;
                    ledger.add(buildDedupKey({ nome, comune: field(row, 'comune'), sito_web: field(row, 'sito_web') }));
                }
            }
        } catch (e) {
            Logger.logError('[Ledger] malformed output file, ignoring its history', e, { path: outputPath });
            return new DedupLedger();
        }

        Logger.info(`[Ledger] loaded ${ledger.size} processed companies from ${outputPath}`);
        return ledger;
    }

    get size(): number {
        return this.identities.size;
    }

    contains(key: DedupKey): boolean {
        return this.identities.has(identityOf(key));
    }

    add(key: DedupKey): void {
        this.keys.add(serializeKey(key));
        this.identities.add(identityOf(key));
        this.inFlight.delete(identityOf(key));
    }

    /**
     * Check-and-reserve in one synchronous step. `false` when the company is
     * already persisted or another worker holds it.
     */
    claim(key: DedupKey): boolean {
        const id = identityOf(key);
        if (this.identities.has(id) || this.inFlight.has(id)) return false;
        this.inFlight.add(id);
        return true;
    }

    release(key: DedupKey): void {
        this.inFlight.delete(identityOf(key));
    }

    /** Serialized keys of every persisted company, for checkpoints. */
    snapshot(): string[] {
        return [...this.keys].sort();
    }
}
