import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import { Logger } from '../../utils/logger';

const CacheFileSchema = z.record(z.object({ website: z.string() }));

/**
 * place_id → website lookups already paid for. Owned by whoever creates it;
 * nothing is read or written until `load`/`save` are called.
 */
export class PlacesDetailsCache {
    private entries = new Map<string, string>();
    private dirty = false;

    constructor(readonly file: string) {}

    async load(): Promise<void> {
        let raw: string;
        try {
            raw = await fs.promises.readFile(this.file, 'utf-8');
        } catch {
            return;
        }
        try {
            const parsed = CacheFileSchema.safeParse(JSON.parse(raw));
            if (!parsed.success) {
                Logger.warn('[PlacesCache] malformed cache file ignored', { path: this.file });
                return;
            }
            this.entries = new Map(Object.entries(parsed.data).map(([id, v]) => [id, v.website]));
            Logger.debug(`[PlacesCache] ${this.entries.size} entries loaded`, { path: this.file });
        } catch (e) {
            Logger.logError('[PlacesCache] unreadable cache file ignored', e, { path: this.file });
        }
    }

    get(placeId: string): string | undefined {
        return this.entries.get(placeId);
    }

    set(placeId: string, website: string): void {
        if (!website || this.entries.get(placeId) === website) return;
        this.entries.set(placeId, website);
        this.dirty = true;
    }

    get size(): number {
        return this.entries.size;
    }

    /** Writes only when something changed since the last load/save. */
    async save(): Promise<void> {
        if (!this.dirty) return;
        const payload = Object.fromEntries([...this.entries].map(([id, website]) => [id, { website }]));
        try {
            await fs.promises.mkdir(path.dirname(this.file), { recursive: true });
            await fs.promises.writeFile(this.file, JSON.stringify(payload, null, 2), 'utf-8');
            this.dirty = false;
        } catch (e) {
            Logger.logError('[PlacesCache] save failed', e, { path: this.file });
        }
    }
}
