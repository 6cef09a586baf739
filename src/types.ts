import { z } from 'zod';

/**
 * One discovered business. Text fields use '' for "checked, nothing found";
 * nothing in a record is ever null or missing.
 */
export interface CompanyRecord {
    comune: string;
    keyword: string;
    nome: string;
    indirizzo: string;
    telefono: string;
    sito_web: string;
    email: string;
    linkedin: string;
    pertinenza: boolean;
    categoria: string;
    confidenza_analisi: number;
    contatto: string;
    num_recensioni: number;
    tipo: string;
    distanza_km: string;
}

export type CsvRow = Record<keyof CompanyRecord, string>;

export const OUTPUT_COLUMNS: ReadonlyArray<keyof CompanyRecord> = [
    'comune',
    'keyword',
    'nome',
    'indirizzo',
    'telefono',
    'sito_web',
    'email',
    'linkedin',
    'pertinenza',
    'categoria',
    'confidenza_analisi',
    'contatto',
    'num_recensioni',
    'tipo',
    'distanza_km',
];

const text = z
    .union([z.string(), z.number(), z.null(), z.undefined()])
    .transform((v) => (v === null || v === undefined ? '' : String(v).trim()));

/** Shape the discovery collaborators hand over: only `nome` is required. */
export const RawCompanySchema = z.object({
    comune: text,
    keyword: text,
    nome: z.string().trim().min(1, 'nome is required'),
    indirizzo: text,
    telefono: text,
    sito_web: text,
    num_recensioni: z
        .union([z.number(), z.string(), z.null(), z.undefined()])
        .transform((v) => {
            const n = typeof v === 'number' ? v : Number.parseInt(String(v ?? '').replace(/\D/g, ''), 10);
            return Number.isFinite(n) ? n : 0;
        }),
    tipo: text,
    distanza_km: text,
    contatto: text,
});

export type RawCompany = z.infer<typeof RawCompanySchema>;

export function emptyEnrichment(raw: RawCompany): CompanyRecord {
    return {
        ...raw,
        email: '',
        linkedin: '',
        pertinenza: false,
        categoria: 'unknown',
        confidenza_analisi: 0,
    };
}

export function toCsvRow(record: CompanyRecord): CsvRow {
    return {
        comune: record.comune,
        keyword: record.keyword,
        nome: record.nome,
        indirizzo: record.indirizzo,
        telefono: record.telefono,
        sito_web: record.sito_web,
        email: record.email,
        linkedin: record.linkedin,
        pertinenza: record.pertinenza ? 'true' : 'false',
        categoria: record.categoria,
        confidenza_analisi: String(record.confidenza_analisi),
        contatto: record.contatto,
        num_recensioni: String(record.num_recensioni),
        tipo: record.tipo,
        distanza_km: record.distanza_km,
    };
}
