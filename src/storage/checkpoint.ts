import { parse } from 'csv-parse/sync';
import { createObjectCsvWriter } from 'csv-writer';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import { Logger } from '../utils/logger';

const CheckpointSchema = z.object({
    updatedAt: z.string(),
    processed: z.array(z.string()),
});

export type Checkpoint = z.infer<typeof CheckpointSchema>;

/**
 * JSON snapshot of processed keys for coarse resume. Written to a temp file
 * and renamed so a crash mid-write leaves the previous snapshot intact.
 */
export class CheckpointStore {
    constructor(readonly file: string) {}

    async save(processed: string[]): Promise<void> {
        const payload: Checkpoint = { updatedAt: new Date().toISOString(), processed };
        const tmp = `${this.file}.tmp`;
        try {
            await fs.promises.mkdir(path.dirname(this.file), { recursive: true });
            await fs.promises.writeFile(tmp, JSON.stringify(payload, null, 2), 'utf-8');
            await fs.promises.rename(tmp, this.file);
        } catch (e) {
            Logger.logError('[Checkpoint] save failed', e, { path: this.file });
        }
    }

    async load(): Promise<Checkpoint | null> {
        let raw: string;
        try {
            raw = await fs.promises.readFile(this.file, 'utf-8');
        } catch {
            return null;
        }
        try {
            const result = CheckpointSchema.safeParse(JSON.parse(raw));
            if (result.success) return result.data;
            Logger.warn('[Checkpoint] ignoring malformed checkpoint', { path: this.file });
        } catch (e) {
            Logger.logError('[Checkpoint] ignoring unreadable checkpoint', e, { path: this.file });
        }
        return null;
    }
}

const comuneKey = (comune: string, keyword: string) => `${comune.trim().toLowerCase()}|${keyword.trim().toLowerCase()}`;

/** CSV log of (comune, keyword) searches already completed. */
export class ProcessedComuniLog {
    private readonly done = new Set<string>();

    constructor(readonly file: string) {}

    async load(): Promise<void> {
        let content: string;
        try {
            content = await fs.promises.readFile(this.file, 'utf-8');
        } catch {
            return;
        }
        try {
            const rows: unknown = parse(content, { bom: true, skip_empty_lines: true, relax_column_count: true, from_line: 2 });
            if (!Array.isArray(rows)) return;
            for (const row of rows) {
                if (Array.isArray(row) && typeof row[0] === 'string') {
                    this.done.add(comuneKey(row[0], typeof row[1] === 'string' ? row[1] : ''));
                }
            }
        } catch (e) {
            Logger.logError('[ComuniLog] malformed log, ignoring it', e, { path: this.file });
        }
    }

    has(comune: string, keyword: string): boolean {
        return this.done.has(comuneKey(comune, keyword));
    }

    async mark(comune: string, keyword: string): Promise<void> {
        this.done.add(comuneKey(comune, keyword));
        try {
            await fs.promises.mkdir(path.dirname(this.file), { recursive: true });
            const exists = fs.existsSync(this.file);
            const writer = createObjectCsvWriter({
                path: this.file,
                header: [
                    { id: 'comune', title: 'comune' },
                    { id: 'keyword', title: 'keyword' },
                    { id: 'timestamp', title: 'timestamp' },
                ],
                append: exists,
            });
            await writer.writeRecords([{ comune, keyword, timestamp: new Date().toISOString() }]);
        } catch (e) {
            Logger.logError('[ComuniLog] cannot record processed comune', e, { comune });
        }
    }
}
