import { Mutex } from 'async-mutex';
import { parse } from 'csv-parse/sync';
import { createObjectCsvWriter } from 'csv-writer';
import * as fs from 'fs';
import * as path from 'path';

import { CompanyRecord, OUTPUT_COLUMNS, toCsvRow } from '../types';
import { PersistenceError } from '../utils/errors';
import { Logger } from '../utils/logger';

type CsvWriter = ReturnType<typeof createObjectCsvWriter>;

export type AppendOutcome = 'written' | 'emergency' | 'lost';

export interface CsvSinkOptions {
    /** Copy the output to `<name>_backup.csv` every N successful appends. */
    backupEvery?: number;
}

function siblingPath(file: string, suffix: string): string {
    const ext = path.extname(file);
    const stem = ext ? file.slice(0, -ext.length) : file;
    return `${stem}${suffix}${ext || '.csv'}`;
}

const describeError = (e: unknown) => (e instanceof Error ? e.message : String(e));

/**
 * Header of an existing file: the first non-blank line, provided it names at
 * least one known output column. `null` for a headerless file.
 */
async function readHeader(file: string): Promise<string[] | null> {
    const handle = await fs.promises.open(file, 'r');
    try {
        const buffer = Buffer.alloc(64 * 1024);
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
        const head = buffer.subarray(0, bytesRead).toString('utf-8');
        const firstLine = head.split(/\r?\n/).find((line) => line.trim() !== '');
        if (!firstLine) return null;

        const rows: unknown = parse(firstLine, { bom: true, relax_quotes: true });
        const header: unknown = Array.isArray(rows) ? rows[0] : null;
        if (!Array.isArray(header)) return null;

        const columns = header
            .filter((h): h is string => typeof h === 'string' && h.trim() !== '')
            .map((h) => h.trim());
        const known: readonly string[] = OUTPUT_COLUMNS;
        return columns.some((c) => known.includes(c)) ? columns : null;
    } finally {
        await handle.close();
    }
}

async function ensureTrailingNewline(file: string, size: number): Promise<void> {
    const handle = await fs.promises.open(file, 'r');
    try {
        const last = Buffer.alloc(1);
        await handle.read(last, 0, 1, size - 1);
        if (last.toString('utf-8') !== '\n') {
            await fs.promises.appendFile(file, '\n', 'utf-8');
        }
    } finally {
        await handle.close();
    }
}

async function sizeOf(file: string): Promise<number> {
    let stat: fs.Stats;
    try {
        stat = await fs.promises.stat(file);
    } catch (e) {
        if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return 0;
        throw new PersistenceError(`Cannot inspect output file: ${describeError(e)}`, file);
    }
    if (!stat.isFile()) throw new PersistenceError('Output path is not a regular file', file);
    return stat.size;
}

/**
 * Opens (or creates) a CSV for appending. A non-empty file is never
 * rewritten: it keeps its own column order, or the standard columns when its
 * header cannot be read.
 */
async function openWriter(file: string): Promise<{ writer: CsvWriter; columns: string[] }> {
    try {
        await fs.promises.mkdir(path.dirname(file), { recursive: true });
    } catch (e) {
        throw new PersistenceError(`Cannot create output directory: ${describeError(e)}`, file);
    }

    const size = await sizeOf(file);
    let columns: string[] = [...OUTPUT_COLUMNS];

    if (size > 0) {
        let existing: string[] | null = null;
        try {
            existing = await readHeader(file);
        } catch (e) {
            Logger.logError('[CsvSink] unreadable header', e, { path: file });
        }
        if (existing) {
            columns = existing;
        } else {
            Logger.warn('[CsvSink] no usable header in existing file, appending with standard columns', { path: file });
        }
        try {
            await ensureTrailingNewline(file, size);
        } catch (e) {
            throw new PersistenceError(`Cannot prepare output file for append: ${describeError(e)}`, file);
        }
    }

    const writer = createObjectCsvWriter({
        path: file,
        header: columns.map((id) => ({ id, title: id })),
        append: size > 0,
        encoding: 'utf8',
    });
    return { writer, columns };
}

/**
 * 💾 Append-only output CSV. One row per call, serialized through a mutex;
 * a failed write is redirected to `<name>_emergency_backup.csv`.
 */
export class CsvSink {
    private readonly lock = new Mutex();
    private readonly backupEvery: number;
    private writer: CsvWriter | null = null;
    private emergencyWriter: CsvWriter | null = null;
    private written = 0;
    private columnsInFile: string[] = [];

    readonly backupPath: string;
    readonly emergencyPath: string;

    constructor(readonly outputPath: string, options: CsvSinkOptions = {}) {
        this.backupEvery = options.backupEvery ?? 10;
        this.backupPath = siblingPath(outputPath, '_backup');
        this.emergencyPath = siblingPath(outputPath, '_emergency_backup');
    }

    get appended(): number {
        return this.written;
    }

    get columns(): string[] {
        return [...this.columnsInFile];
    }

    /** Throws PersistenceError when the output path cannot be used. */
    async open(): Promise<void> {
        await this.lock.runExclusive(async () => {
            await this.ensureWriter();
        });
    }

    async append(record: CompanyRecord): Promise<AppendOutcome> {
        return this.lock.runExclusive(async () => {
            const row = toCsvRow(record);
            try {
                const writer = await this.ensureWriter();
                await writer.writeRecords([row]);
                this.written++;
                await this.maybeBackup();
                return 'written';
            } catch (e) {
                Logger.logError('[CsvSink] append failed, writing emergency copy', e, {
                    company_name: record.nome,
                    path: this.outputPath,
                });
            }

            try {
                if (!this.emergencyWriter) {
                    this.emergencyWriter = (await openWriter(this.emergencyPath)).writer;
                }
                await this.emergencyWriter.writeRecords([row]);
                return 'emergency';
            } catch (e) {
                Logger.fatal(`[CsvSink] record lost: ${record.nome}`, {
                    company_name: record.nome,
                    url: record.sito_web,
                    error: e instanceof Error ? e : new Error(String(e)),
                });
                return 'lost';
            }
        });
    }

    /** Resolves once no append is in progress. */
    async close(): Promise<void> {
        await this.lock.waitForUnlock();
    }

    /** Caller must hold the lock. */
    private async ensureWriter(): Promise<CsvWriter> {
        if (this.writer) return this.writer;
        const { writer, columns } = await openWriter(this.outputPath);
        this.writer = writer;
        this.columnsInFile = columns;
        const missing = OUTPUT_COLUMNS.filter((c) => !columns.includes(c));
        if (missing.length > 0) {
            Logger.warn(`[CsvSink] existing header lacks columns ${missing.join(', ')}; they will not be written`, { path: this.outputPath });
        }
        return writer;
    }

    private async maybeBackup(): Promise<void> {
        if (this.written % this.backupEvery !== 0) return;
        try {
            await fs.promises.copyFile(this.outputPath, this.backupPath);
            Logger.debug(`[CsvSink] backup after ${this.written} rows`, { path: this.backupPath });
        } catch (e) {
            Logger.logError('[CsvSink] backup copy failed', e, { path: this.backupPath });
        }
    }
}
