import { describe, expect, it } from 'vitest';
import { IndustryCatalog, loadIndustryCatalog } from '../../src/config/catalog';
import { RelevanceScorer } from '../../src/core/analysis/relevance_scorer';
import { ConfigurationError } from '../../src/utils/errors';
import { FakeFetcher, html } from '../helpers/fake_fetcher';

const catalog: IndustryCatalog = {
  fotovoltaico: {
    searchKeywords: ['fotovoltaico'],
    positive: ['fotovoltaico', 'pannelli', 'inverter', 'accumulo', 'impianto', 'energia solare', 'kwh', 'kwp'],
    negative: ['riparazione elettrodomestici', 'negozio', 'rivendita', 'ecommerce', 'supermercato'],
  },
};

const scorerWith = (fetcher = new FakeFetcher()) => new RelevanceScorer('fotovoltaico', catalog, fetcher);

describe('RelevanceScorer.analyzeText', () => {
  it('scores a clearly relevant snippet with high confidence', () => {
    const result = scorerWith().analyzeText('impianto fotovoltaico da 6kwp con accumulo');
    expect(result).toEqual({
      relevant: true,
      score: 98,
      category: 'fotovoltaico',
      confidence: 'alta',
      reason: 'pos_hits=4, neg_hits=0, score=98',
      positiveHits: 4,
      negativeHits: 0,
    });
  });

  it('rejects a snippet that only matches negative keywords', () => {
    const result = scorerWith().analyzeText('Negozio di elettrodomestici');
    expect(result.relevant).toBe(false);
    expect(result.score).toBe(32);
    expect(result.category).toBe('non_pertinente');
    expect(result.confidence).toBe('bassa');
  });

  it('counts each keyword once however often it appears', () => {
    const result = scorerWith().analyzeText('inverter inverter inverter');
    expect(result.positiveHits).toBe(1);
    expect(result.score).toBe(62);
  });

  it('never lowers the score when a positive keyword is added', () => {
    const scorer = scorerWith();
    const base = scorer.analyzeText('ditta di pannelli');
    const more = scorer.analyzeText('ditta di pannelli e inverter');
    expect(more.score).toBeGreaterThanOrEqual(base.score);
  });

  it('is deterministic', () => {
    const scorer = scorerWith();
    const text = 'rivendita pannelli e accumulo';
    expect(scorer.analyzeText(text)).toEqual(scorer.analyzeText(text));
  });
});

describe('RelevanceScorer.analyzeWebsite', () => {
  it('rejects an empty URL without fetching', async () => {
    const fetcher = new FakeFetcher();
    const result = await scorerWith(fetcher).analyzeWebsite('  ');
    expect(result).toEqual({ relevant: false, confidence: 0, category: 'unknown', reason: 'URL non valido o mancante', scores: null });
    expect(fetcher.requested).toEqual([]);
  });

  it('accepts a domain containing a positive keyword without fetching', async () => {
    const fetcher = new FakeFetcher();
    const result = await scorerWith(fetcher).analyzeWebsite('https://www.fotovoltaicorossi.it');
    expect(result.relevant).toBe(true);
    expect(result.confidence).toBe(0.8);
    expect(result.reason).toBe('Il dominio contiene la parola chiave "fotovoltaico"');
    expect(fetcher.requested).toEqual([]);
  });

  it('reports an unreachable site after trying https and http', async () => {
    const fetcher = new FakeFetcher();
    const result = await scorerWith(fetcher).analyzeWebsite('https://rossi.it');
    expect(result).toEqual({ relevant: false, confidence: 0.5, category: 'unknown', reason: 'Sito non raggiungibile', scores: null });
    expect(fetcher.requested).toEqual(['https://rossi.it', 'http://rossi.it']);
  });

  it('scores page content by keyword occurrences', async () => {
    const fetcher = new FakeFetcher().set('http://rossi.it', {
      body: html('<p>Installiamo impianto fotovoltaico con inverter e accumulo</p>', 'Rossi Lavori'),
    });
    const result = await scorerWith(fetcher).analyzeWebsite('rossi.it');
    expect(result).toEqual({
      relevant: true,
      confidence: 0.7,
      category: 'fotovoltaico',
      reason: 'Rilevato contenuto pertinente al settore fotovoltaico con riferimenti sufficienti',
      scores: { positive: 4, negative: 0, total: 4 },
    });
  });

  it('marks a site with only negative content as not relevant', async () => {
    const fetcher = new FakeFetcher().set('https://bianchi.it', {
      body: html('<p>Negozio di elettrodomestici</p>', 'Bianchi Casa'),
    });
    const result = await scorerWith(fetcher).analyzeWebsite('https://bianchi.it');
    expect(result).toEqual({
      relevant: false,
      confidence: 0.5,
      category: 'non_pertinente',
      reason: 'Contenuto insufficiente relativo al settore fotovoltaico',
      scores: { positive: 0, negative: 1, total: -1.5 },
    });
  });

  it('applies the threshold to the unrounded total', async () => {
    const body = `${'fotovoltaico '.repeat(3)}${'x'.repeat(1962)}`;
    const fetcher = new FakeFetcher().set('https://rossi.it', { body: html(`<p>${body}</p>`) });
    const result = await scorerWith(fetcher).analyzeWebsite('https://rossi.it');
    expect(result).toEqual({
      relevant: false,
      confidence: 0.65,
      category: 'non_pertinente',
      reason: 'Contenuto insufficiente relativo al settore fotovoltaico',
      scores: { positive: 3, negative: 0, total: 3 },
    });
  });

  it('accepts a total exactly at the threshold', async () => {
    const body = `${'fotovoltaico '.repeat(3)}${'x'.repeat(1959)}`;
    const fetcher = new FakeFetcher().set('https://rossi.it', { body: html(`<p>${body}</p>`) });
    const result = await scorerWith(fetcher).analyzeWebsite('https://rossi.it');
    expect(result.relevant).toBe(true);
    expect(result.confidence).toBe(0.65);
    expect(result.scores).toEqual({ positive: 3, negative: 0, total: 3 });
  });

  it('returns the same result for the same page', async () => {
    const fetcher = new FakeFetcher().set('https://rossi.it', {
      body: html('<h2>Pannelli e inverter</h2><p>Rivendita e impianto</p>', 'Rossi'),
    });
    const scorer = scorerWith(fetcher);
    expect(await scorer.analyzeWebsite('https://rossi.it')).toEqual(await scorer.analyzeWebsite('https://rossi.it'));
  });

  it('never lowers the total when a positive occurrence is added', () => {
    const scorer = scorerWith();
    const base = scorer.scoreWeightedText('pannelli negozio');
    const more = scorer.scoreWeightedText('pannelli inverter negozio');
    expect(base.total).toBe(-0.5);
    expect(more.total).toBe(0.5);
  });

  it('weights title and headings twice', () => {
    const weighted = RelevanceScorer.weightedText(html('<h1>Inverter</h1><p>testo</p>', 'Casa'));
    expect(scorerWith().scoreWeightedText(weighted).positiveMatches).toBe(3);
  });
});

describe('RelevanceScorer configuration', () => {
  it('throws on an unknown industry', () => {
    expect(() => new RelevanceScorer('astronautica', catalog, new FakeFetcher())).toThrow(ConfigurationError);
  });

  it('ships a catalog with the fotovoltaico vertical', () => {
    expect(loadIndustryCatalog().fotovoltaico?.positive).toContain('inverter');
  });
});
