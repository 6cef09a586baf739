import { parse } from 'csv-parse/sync';
import { createObjectCsvWriter } from 'csv-writer';
import * as fs from 'fs';
import * as path from 'path';

import { ConfigurationError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { AdminLookupService } from './enrichment_orchestrator';

export type AdminStatus = 'ok' | 'not_found' | 'error' | 'skip';

export interface AdminPassOptions {
    /** Look up rows that already carry a contatto too. */
    force?: boolean;
    checkpointEvery?: number;
    limit?: number;
}

export interface AdminPassSummary {
    total: number;
    ok: number;
    notFound: number;
    error: number;
    skipped: number;
}

type Row = Record<string, string>;

function toRows(raw: unknown): Row[] {
    if (!Array.isArray(raw)) return [];
    const rows: Row[] = [];
    for (const item of raw) {
        if (typeof item !== 'object' || item === null) continue;
        const row: Row = {};
        for (const [k, v] of Object.entries(item)) row[k] = typeof v === 'string' ? v : '';
        rows.push(row);
    }
    return rows;
}

/**
 * Second pass over a finished output CSV: fills `contatto` with the
 * administrator's name and records the outcome in `admin_status`.
 */
export class AdminPass {
    constructor(private readonly finder: AdminLookupService) {}

    async run(inputPath: string, outputPath: string, options: AdminPassOptions = {}): Promise<AdminPassSummary> {
        let content: string;
        try {
            content = await fs.promises.readFile(inputPath, 'utf-8');
        } catch (e) {
            throw new ConfigurationError(`Input CSV not readable: ${inputPath} (${e instanceof Error ? e.message : String(e)})`);
        }

        const rows = toRows(parse(content, { columns: true, bom: true, skip_empty_lines: true, relax_column_count: true }));
        const firstRow = rows[0];
        const columns = firstRow ? Object.keys(firstRow) : [];
        for (const col of ['contatto', 'admin_status']) {
            if (!columns.includes(col)) columns.push(col);
        }

        const summary: AdminPassSummary = { total: rows.length, ok: 0, notFound: 0, error: 0, skipped: 0 };
        const every = options.checkpointEvery ?? 5;
        let looked = 0;

        for (const [i, row] of rows.entries()) {
            const name = (row.nome ?? '').trim();
            const overLimit = options.limit !== undefined && looked >= options.limit;
            let status: AdminStatus;

            if (!name || overLimit || ((row.contatto ?? '').trim() !== '' && !options.force)) {
                status = 'skip';
                summary.skipped++;
            } else {
                looked++;
                const result = await this.finder.lookup(name, row.comune ?? '');
                status = result.status;
                if (result.status === 'ok') {
                    row.contatto = result.name;
                    summary.ok++;
                } else if (result.status === 'not_found') {
                    summary.notFound++;
                } else {
                    summary.error++;
                }
                Logger.info(`[AdminPass] ${i + 1}/${rows.length} ${name}: ${status}${result.name ? ` (${result.name})` : ''}`, {
                    company_name: name,
                });
            }
            row.admin_status = status;

            if ((i + 1) % every === 0) await this.write(outputPath, columns, rows);
        }

        await this.write(outputPath, columns, rows);
        Logger.info(`[AdminPass] done: ${summary.ok} found, ${summary.notFound} not found, ${summary.error} errors, ${summary.skipped} skipped`);
        return summary;
    }

    private async write(file: string, columns: string[], rows: Row[]): Promise<void> {
        await fs.promises.mkdir(path.dirname(file), { recursive: true });
        const writer = createObjectCsvWriter({
            path: file,
            header: columns.map((id) => ({ id, title: id })),
            append: false,
        });
        await writer.writeRecords(rows);
    }
}
