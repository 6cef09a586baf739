import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { GooglePlacesProvider } from '../../src/core/discovery/google_places_provider';
import { PlacesDetailsCache } from '../../src/core/discovery/places_details_cache';
import { stubClient } from '../helpers/axios_stub';

const NEARBY = 'https://maps.googleapis.com/maps/api/place/nearbysearch/json';
const DETAILS = 'https://maps.googleapis.com/maps/api/place/details/json';

const area = { comune: 'Terni', keyword: 'fotovoltaico', center: { lat: 42.5636, lon: 12.6427 }, radiusKm: 20 };

describe('PlacesDetailsCache', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'places-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('persists entries across instances', async () => {
    const file = path.join(dir, 'cache.json');
    const cache = new PlacesDetailsCache(file);
    cache.set('p1', 'https://acme.it');
    await cache.save();

    const reloaded = new PlacesDetailsCache(file);
    await reloaded.load();
    expect(reloaded.get('p1')).toBe('https://acme.it');
    expect(reloaded.size).toBe(1);
  });

  it('writes nothing when unchanged', async () => {
    const file = path.join(dir, 'cache.json');
    const cache = new PlacesDetailsCache(file);
    cache.set('p1', '');
    await cache.save();
    expect(fs.existsSync(file)).toBe(false);
  });

  it('ignores a malformed file', async () => {
    const file = path.join(dir, 'cache.json');
    fs.writeFileSync(file, JSON.stringify({ p1: 'https://acme.it' }));
    const cache = new PlacesDetailsCache(file);
    await cache.load();
    expect(cache.size).toBe(0);
  });
});

describe('GooglePlacesProvider', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'places-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('pages through Nearby Search and resolves websites through Details and the cache', async () => {
    const { client, seen } = stubClient((config) => {
      if (config.url === NEARBY) {
        if (config.params.pagetoken === 'tok') {
          return { status: 200, data: { status: 'OK', results: [{ place_id: 'p3', name: 'Verdi Tetti' }] } };
        }
        return {
          status: 200,
          data: {
            status: 'OK',
            next_page_token: 'tok',
            results: [
              {
                place_id: 'p1',
                name: 'Rossi Solare',
                vicinity: 'Via Roma 1, Terni',
                user_ratings_total: 12,
                types: ['electrician', 'store'],
                geometry: { location: { lat: 42.5636, lng: 12.6427 } },
              },
              { place_id: 'p2', name: 'Bianchi Impianti', formatted_address: 'Via Po 2, Terni' },
              { place_id: 'p1', name: 'Rossi Solare' },
            ],
          },
        };
      }
      if (config.url === DETAILS && config.params.place_id === 'p1') {
        return { status: 200, data: { status: 'OK', result: { website: 'https://rossisolare.it' } } };
      }
      return { status: 200, data: { status: 'OK', result: {} } };
    });
    const cache = new PlacesDetailsCache(path.join(dir, 'cache.json'));
    cache.set('p3', 'https://verditetti.it');
    const slept: number[] = [];
    const provider = new GooglePlacesProvider({
      apiKey: 'test-secret',
      cache,
      client,
      sleeper: async (ms) => {
        slept.push(ms);
      },
    });

    const found = await provider.search(area);

    expect(found).toEqual([
      {
        comune: 'Terni',
        keyword: 'fotovoltaico',
        nome: 'Rossi Solare',
        indirizzo: 'Via Roma 1, Terni',
        telefono: '',
        sito_web: 'https://rossisolare.it',
        num_recensioni: 12,
        tipo: 'electrician,store',
        distanza_km: '0.00',
        contatto: '',
      },
      {
        comune: 'Terni',
        keyword: 'fotovoltaico',
        nome: 'Bianchi Impianti',
        indirizzo: 'Via Po 2, Terni',
        telefono: '',
        sito_web: '',
        num_recensioni: 0,
        tipo: '',
        distanza_km: '',
        contatto: '',
      },
      {
        comune: 'Terni',
        keyword: 'fotovoltaico',
        nome: 'Verdi Tetti',
        indirizzo: '',
        telefono: '',
        sito_web: 'https://verditetti.it',
        num_recensioni: 0,
        tipo: '',
        distanza_km: '',
        contatto: '',
      },
    ]);
    expect(provider.counters).toEqual({ nearby: 2, details: 2, cacheHits: 1 });
    expect(cache.get('p1')).toBe('https://rossisolare.it');
    expect(seen[0]?.params).toMatchObject({ radius: 10000, location: '42.5636,12.6427', keyword: 'fotovoltaico' });
    expect(slept[0]).toBe(2000);
    expect(slept).toHaveLength(2);
  });

  it('stops on an error status', async () => {
    const { client, seen } = stubClient(() => ({ status: 200, data: { status: 'REQUEST_DENIED', error_message: 'bad key' } }));
    const provider = new GooglePlacesProvider({
      apiKey: 'test-secret',
      cache: new PlacesDetailsCache(path.join(dir, 'cache.json')),
      client,
      sleeper: async () => {},
    });

    expect(await provider.search(area)).toEqual([]);
    expect(seen).toHaveLength(1);
  });

  it('honours the per-query limit', async () => {
    const { client } = stubClient((config) =>
      config.url === NEARBY
        ? {
            status: 200,
            data: { status: 'OK', next_page_token: 'tok', results: [{ name: 'Alfa Tetti' }, { name: 'Bravo Tetti' }] },
          }
        : { status: 200, data: { status: 'NOT_FOUND' } }
    );
    const provider = new GooglePlacesProvider({
      apiKey: 'test-secret',
      cache: new PlacesDetailsCache(path.join(dir, 'cache.json')),
      client,
      perQueryLimit: 1,
      sleeper: async () => {},
    });

    const found = await provider.search(area);
    expect(found.map((r) => r.nome)).toEqual(['Alfa Tetti']);
    expect(provider.counters.nearby).toBe(1);
  });
});
