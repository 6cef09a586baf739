import axios, { AxiosInstance } from 'axios';
import { parse } from 'csv-parse/sync';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import { ConfigurationError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { RateLimiter } from '../../utils/rate_limiter';

export interface GeoPoint {
    lat: number;
    lon: number;
}

const EARTH_RADIUS_KM = 6371;

export function haversineKm(a: GeoPoint, b: GeoPoint): number {
    const toRad = (deg: number) => (deg * Math.PI) / 180;
    const dLat = toRad(b.lat - a.lat);
    const dLon = toRad(b.lon - a.lon);
    const h = Math.sin(dLat / 2) ** 2 + Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLon / 2) ** 2;
    return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

export function clampRadiusKm(radiusKm: number): number {
    if (!Number.isFinite(radiusKm)) return 5;
    return Math.min(10, Math.max(2, radiusKm));
}

/**
 * Municipality names from a CSV (`denominazione_ita` or `comune` column) or a
 * text file with one name per line. Duplicates are dropped, order kept.
 */
export function loadComuni(file: string): string[] {
    let content: string;
    try {
        content = fs.readFileSync(file, 'utf-8');
    } catch (e) {
        throw new ConfigurationError(`Comuni file not readable: ${file} (${e instanceof Error ? e.message : String(e)})`);
    }

    let names: string[];
    if (path.extname(file).toLowerCase() === '.csv') {
        const rows: unknown = parse(content, { columns: true, bom: true, skip_empty_lines: true, relax_column_count: true, trim: true });
        names = [];
        if (Array.isArray(rows)) {
            for (const row of rows) {
                if (typeof row !== 'object' || row === null) continue;
                const value: unknown = Reflect.get(row, 'denominazione_ita') ?? Reflect.get(row, 'comune');
                if (typeof value === 'string') names.push(value);
            }
        }
        if (names.length === 0) {
            throw new ConfigurationError(`Comuni CSV ${file} needs a "denominazione_ita" or "comune" column`);
        }
    } else {
        names = content.split(/\r?\n/);
    }

    const seen = new Set<string>();
    return names
        .map((n) => n.trim())
        .filter((n) => {
            const key = n.toLowerCase();
            if (!n || n.startsWith('#') || seen.has(key)) return false;
            seen.add(key);
            return true;
        });
}

export function filterComuni(
    comuni: string[],
    options: { exclude?: (comune: string) => boolean; shuffle?: boolean; limit?: number } = {}
): string[] {
    let out = options.exclude ? comuni.filter((c) => !options.exclude?.(c)) : [...comuni];
    if (options.shuffle) {
        for (let i = out.length - 1; i > 0; i--) {
            const j = Math.floor(Math.random() * (i + 1));
            const tmp = out[i];
            const other = out[j];
            if (tmp === undefined || other === undefined) continue;
            out[i] = other;
            out[j] = tmp;
        }
    }
    if (options.limit !== undefined && options.limit > 0) out = out.slice(0, options.limit);
    return out;
}

const NominatimResultSchema = z.array(z.object({ lat: z.coerce.number(), lon: z.coerce.number() }));

export interface Geocoder {
    locate(comune: string): Promise<GeoPoint | null>;
}

/** OpenStreetMap Nominatim lookup, restricted to Italy. */
export class NominatimGeocoder implements Geocoder {
    private readonly client: AxiosInstance;
    private readonly cache = new Map<string, GeoPoint | null>();

    constructor(private readonly options: { client?: AxiosInstance; limiter?: RateLimiter; userAgent?: string } = {}) {
        this.client = options.client ?? axios.create({ timeout: 10000 });
    }

    async locate(comune: string): Promise<GeoPoint | null> {
        const key = comune.trim().toLowerCase();
        const cached = this.cache.get(key);
        if (cached !== undefined) return cached;

        let point: GeoPoint | null = null;
        try {
            await this.options.limiter?.acquire();
            const res = await this.client.get<unknown>('https://nominatim.openstreetmap.org/search', {
                params: { q: `${comune}, Italia`, format: 'json', limit: 1, countrycodes: 'it' },
                headers: { 'User-Agent': this.options.userAgent ?? 'lead-enricher/1.0' },
            });
            const parsed = NominatimResultSchema.safeParse(res.data);
            const first = parsed.success ? parsed.data[0] : undefined;
            if (first) point = { lat: first.lat, lon: first.lon };
            else Logger.warn(`[Geocoder] no coordinates for ${comune}`, { comune });
        } catch (e) {
            Logger.logError('[Geocoder] lookup failed', e, { comune });
        }

        this.cache.set(key, point);
        return point;
    }
}
