import * as fs from 'fs';
import { z } from 'zod';

import { ConfigurationError } from '../utils/errors';

const IndustryProfileSchema = z.object({
    searchKeywords: z.array(z.string().min(1)).min(1),
    positive: z.array(z.string().min(1)).min(1),
    negative: z.array(z.string().min(1)).default([]),
    minScore: z.number().min(0).max(100).optional(),
});

const IndustryCatalogSchema = z.record(IndustryProfileSchema);

const FilterListsSchema = z.object({
    bigCompanyKeywords: z.array(z.string().min(1)),
    ignoredEmailDomains: z.array(z.string().min(1)),
    freeMailDomains: z.array(z.string().min(1)),
});

export type IndustryProfile = z.infer<typeof IndustryProfileSchema>;
export type IndustryCatalog = Record<string, IndustryProfile>;
export type FilterLists = z.infer<typeof FilterListsSchema>;

const DATA_DIR = new URL('../../data/', import.meta.url);

function readJson(file: string | URL): unknown {
    try {
        return JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigurationError(`Cannot read ${file.toString()}: ${reason}`);
    }
}

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, label: string): T {
    const result = schema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigurationError(`Invalid ${label}: ${issues}`);
    }
    return result.data;
}

let industries: IndustryCatalog | null = null;
let filters: FilterLists | null = null;

/** Keyword sets per vertical, from `data/industries.json` unless a path is given. */
export function loadIndustryCatalog(file?: string): IndustryCatalog {
    if (!file && industries) return industries;
    const catalog = parseOrThrow(IndustryCatalogSchema, readJson(file ?? new URL('industries.json', DATA_DIR)), 'industry catalog');
    if (!file) industries = catalog;
    return catalog;
}

export function loadFilterLists(file?: string): FilterLists {
    if (!file && filters) return filters;
    const lists = parseOrThrow(FilterListsSchema, readJson(file ?? new URL('filters.json', DATA_DIR)), 'filter lists');
    if (!file) filters = lists;
    return lists;
}

export function getIndustryProfile(catalog: IndustryCatalog, industry: string): IndustryProfile {
    const profile = catalog[industry];
    if (!profile) {
        const known = Object.keys(catalog).sort().join(', ');
        throw new ConfigurationError(`Unknown industry "${industry}". Known industries: ${known}`);
    }
    return profile;
}
