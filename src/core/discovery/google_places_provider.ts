import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';

import { RawCompany, RawCompanySchema } from '../../types';
import { Logger } from '../../utils/logger';
import { RateLimiter, Sleeper, jitteredSleep, sleep } from '../../utils/rate_limiter';
import { GeoPoint, clampRadiusKm, haversineKm } from './geo';
import { PlacesDetailsCache } from './places_details_cache';

const NEARBY_URL = 'https://maps.googleapis.com/maps/api/place/nearbysearch/json';
const DETAILS_URL = 'https://maps.googleapis.com/maps/api/place/details/json';
const MAX_PAGES = 3;
// Google rejects a next_page_token used sooner than this.
const PAGE_TOKEN_DELAY_MS = 2000;

const PlaceSchema = z.object({
    place_id: z.string().optional(),
    name: z.string().default(''),
    vicinity: z.string().optional(),
    formatted_address: z.string().optional(),
    user_ratings_total: z.number().optional(),
    types: z.array(z.string()).default([]),
    geometry: z.object({ location: z.object({ lat: z.number(), lng: z.number() }) }).optional(),
});

const NearbyResponseSchema = z.object({
    status: z.string(),
    error_message: z.string().optional(),
    results: z.array(PlaceSchema).default([]),
    next_page_token: z.string().optional(),
});

const DetailsResponseSchema = z.object({
    status: z.string(),
    result: z.object({ website: z.string().optional() }).optional(),
});

export interface SearchArea {
    comune: string;
    keyword: string;
    center: GeoPoint;
    radiusKm: number;
}

/** Source of raw candidates for one municipality + search keyword. */
export interface DiscoveryProvider {
    readonly name: string;
    search(area: SearchArea): Promise<RawCompany[]>;
}

export interface PlacesProviderOptions {
    apiKey: string;
    cache: PlacesDetailsCache;
    client?: AxiosInstance;
    limiter?: RateLimiter;
    fetchDetails?: boolean;
    perQueryLimit?: number;
    sleeper?: Sleeper;
}

/**
 * 🗺️ Google Places Nearby Search + Details. Websites come from Details and
 * are remembered in the injected cache.
 */
export class GooglePlacesProvider implements DiscoveryProvider {
    readonly name = 'google_places';
    private readonly client: AxiosInstance;
    private readonly sleeper: Sleeper;
    readonly counters = { nearby: 0, details: 0, cacheHits: 0 };

    constructor(private readonly options: PlacesProviderOptions) {
        this.client = options.client ?? axios.create({ timeout: 20000, headers: { Accept: 'application/json' } });
        this.sleeper = options.sleeper ?? sleep;
    }

    async search(area: SearchArea): Promise<RawCompany[]> {
        const radiusM = Math.round(clampRadiusKm(area.radiusKm) * 1000);
        const out: RawCompany[] = [];
        const seen = new Set<string>();
        let pageToken: string | undefined;

        Logger.info(`[Places] "${area.keyword}" in ${area.comune} (${radiusM} m)`, { comune: area.comune });

        for (let page = 0; page < MAX_PAGES; page++) {
            if (pageToken) await this.sleeper(PAGE_TOKEN_DELAY_MS);

            const params: Record<string, string | number> = {
                key: this.options.apiKey,
                location: `${area.center.lat},${area.center.lon}`,
                radius: radiusM,
                keyword: area.keyword,
            };
            if (pageToken) params.pagetoken = pageToken;

            let data: z.infer<typeof NearbyResponseSchema>;
            try {
                await this.options.limiter?.acquire();
                const res = await this.client.get<unknown>(NEARBY_URL, { params });
                this.counters.nearby++;
                const parsed = NearbyResponseSchema.safeParse(res.data);
                if (!parsed.success) {
                    Logger.warn('[Places] unexpected Nearby Search payload', { comune: area.comune });
                    break;
                }
                data = parsed.data;
            } catch (e) {
                Logger.logError('[Places] Nearby Search failed', e, { comune: area.comune });
                break;
            }

            if (data.status !== 'OK' && data.status !== 'ZERO_RESULTS') {
                Logger.warn(`[Places] status ${data.status}: ${data.error_message ?? ''}`, { comune: area.comune });
                break;
            }

            for (const place of data.results) {
                if (this.options.perQueryLimit !== undefined && out.length >= this.options.perQueryLimit) break;
                if (place.place_id) {
                    if (seen.has(place.place_id)) continue;
                    seen.add(place.place_id);
                }

                const website = place.place_id && this.options.fetchDetails !== false ? await this.website(place.place_id) : '';
                const location = place.geometry?.location;
                const distance = location ? haversineKm(area.center, { lat: location.lat, lon: location.lng }) : null;

                const parsed = RawCompanySchema.safeParse({
                    comune: area.comune,
                    keyword: area.keyword,
                    nome: place.name,
                    indirizzo: place.vicinity ?? place.formatted_address ?? '',
                    telefono: '',
                    sito_web: website,
                    num_recensioni: place.user_ratings_total ?? 0,
                    tipo: place.types.join(','),
                    distanza_km: distance === null ? '' : distance.toFixed(2),
                });
                if (parsed.success) out.push(parsed.data);
            }

            if (this.options.perQueryLimit !== undefined && out.length >= this.options.perQueryLimit) break;
            pageToken = data.next_page_token;
            if (!pageToken) break;
        }

        await jitteredSleep(500, 1200, this.sleeper);
        return out;
    }

    private async website(placeId: string): Promise<string> {
        const cached = this.options.cache.get(placeId);
        if (cached) {
            this.counters.cacheHits++;
            return cached;
        }

        try {
            await this.options.limiter?.acquire();
            const res = await this.client.get<unknown>(DETAILS_URL, {
                params: { key: this.options.apiKey, place_id: placeId, fields: 'website' },
            });
            this.counters.details++;
            const parsed = DetailsResponseSchema.safeParse(res.data);
            const website = parsed.success && parsed.data.status === 'OK' ? parsed.data.result?.website ?? '' : '';
            if (website) this.options.cache.set(placeId, website);
            return website;
        } catch (e) {
            Logger.logError('[Places] Details failed', e, { place_id: placeId });
            return '';
        }
    }
}
