import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { GeoPoint, Geocoder } from '../../src/core/discovery/geo';
import { DiscoveryProvider, SearchArea } from '../../src/core/discovery/google_places_provider';
import { EnrichmentOrchestrator } from '../../src/pipeline/enrichment_orchestrator';
import { PipelineRunner } from '../../src/pipeline/pipeline_runner';
import { ProcessedComuniLog } from '../../src/storage/checkpoint';
import { CsvSink } from '../../src/storage/csv_sink';
import { DedupLedger } from '../../src/storage/dedup_ledger';
import { RawCompany } from '../../src/types';
import { FakeFetcher } from '../helpers/fake_fetcher';
import { rawCompany } from '../helpers/records';
import { StubExtractor, StubScorer } from '../helpers/stubs';

class FakeProvider implements DiscoveryProvider {
  readonly name = 'fake';
  readonly calls: string[] = [];
  constructor(private readonly results: Record<string, RawCompany[]>) {}
  async search(area: SearchArea): Promise<RawCompany[]> {
    this.calls.push(`${area.comune}/${area.keyword}`);
    return this.results[`${area.comune}/${area.keyword}`] ?? [];
  }
}

class FakeGeocoder implements Geocoder {
  async locate(comune: string): Promise<GeoPoint | null> {
    return comune === 'Atlantide' ? null : { lat: 42.5, lon: 12.6 };
  }
}

const KEYWORDS = ['fotovoltaico', 'pannelli solari'];
const RESULTS: Record<string, RawCompany[]> = {
  'Terni/fotovoltaico': [
    rawCompany({ nome: 'Acme Srl', sito_web: 'https://acme.it' }),
    rawCompany({ nome: 'acme srl', sito_web: 'https://acme.it' }),
    rawCompany({ nome: 'Beta Tetti', sito_web: 'https://betatetti.it' }),
  ],
  'Terni/pannelli solari': [rawCompany({ nome: 'Acme Srl', keyword: 'pannelli solari', sito_web: 'https://acme.it' })],
};

describe('PipelineRunner', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'runner-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function orchestrator() {
    return new EnrichmentOrchestrator(
      {
        scorer: new StubScorer(),
        extractor: new StubExtractor(),
        fetcher: new FakeFetcher(),
        ledger: new DedupLedger(),
        sink: new CsvSink(path.join(dir, 'out.csv')),
      },
      { bigCompanyKeywords: [], delayMs: [0, 0] }
    );
  }

  const logFile = () => path.join(dir, 'comuni_elaborati.csv');

  it('discovers and enriches every comune/keyword pair once', async () => {
    const provider = new FakeProvider(RESULTS);
    const comuniLog = new ProcessedComuniLog(logFile());
    const runner = new PipelineRunner({ provider, geocoder: new FakeGeocoder(), orchestrator: orchestrator(), comuniLog });

    const summary = await runner.run(['Terni', 'Narni', 'Atlantide'], {
      keywords: KEYWORDS,
      radiusKm: 5,
      parallel: false,
      concurrency: 1,
    });

    expect(provider.calls).toEqual(['Terni/fotovoltaico', 'Terni/pannelli solari', 'Narni/fotovoltaico', 'Narni/pannelli solari']);
    expect(summary).toMatchObject({ total: 3, persisted: 2, skippedDuplicate: 1 });
    expect(comuniLog.has('terni', 'Fotovoltaico')).toBe(true);
    expect(comuniLog.has('Atlantide', 'fotovoltaico')).toBe(false);
  });

  it('skips comuni already recorded in the log', async () => {
    const first = new ProcessedComuniLog(logFile());
    await new PipelineRunner({
      provider: new FakeProvider(RESULTS),
      geocoder: new FakeGeocoder(),
      orchestrator: orchestrator(),
      comuniLog: first,
    }).run(['Terni', 'Narni'], { keywords: KEYWORDS, radiusKm: 5, parallel: true, concurrency: 2 });

    const provider = new FakeProvider(RESULTS);
    await new PipelineRunner({
      provider,
      geocoder: new FakeGeocoder(),
      orchestrator: orchestrator(),
      comuniLog: new ProcessedComuniLog(logFile()),
    }).run(['Terni', 'Narni', 'Orvieto'], { keywords: KEYWORDS, radiusKm: 5, parallel: false, concurrency: 1 });

    expect(provider.calls).toEqual(['Orvieto/fotovoltaico', 'Orvieto/pannelli solari']);
  });

  it('does nothing once the orchestrator is stopped', async () => {
    const stopped = orchestrator();
    stopped.stop();
    const provider = new FakeProvider(RESULTS);
    const comuniLog = new ProcessedComuniLog(logFile());

    const summary = await new PipelineRunner({ provider, geocoder: new FakeGeocoder(), orchestrator: stopped, comuniLog }).run(
      ['Terni'],
      { keywords: KEYWORDS, radiusKm: 5, parallel: false, concurrency: 1 }
    );

    expect(summary).toBeNull();
    expect(provider.calls).toEqual([]);
    expect(fs.existsSync(logFile())).toBe(false);
  });

  it('drops repeated names within one discovery batch', () => {
    expect(PipelineRunner.dedupeBatch(RESULTS['Terni/fotovoltaico'] ?? []).map((r) => r.nome)).toEqual(['Acme Srl', 'Beta Tetti']);
  });
});
