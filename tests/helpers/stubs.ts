import { WebsiteRelevanceResult } from '../../src/core/analysis/relevance_scorer';
import { ExtractOptions } from '../../src/core/enrichment/email_extractor';
import { ContactExtractor, WebsiteScorer } from '../../src/pipeline/enrichment_orchestrator';

export const RELEVANT: WebsiteRelevanceResult = {
  relevant: true,
  confidence: 0.9,
  category: 'fotovoltaico',
  reason: 'test',
  scores: { positive: 5, negative: 0, total: 5 },
};

export const NOT_RELEVANT: WebsiteRelevanceResult = {
  relevant: false,
  confidence: 0.5,
  category: 'non_pertinente',
  reason: 'test',
  scores: { positive: 0, negative: 1, total: -1.5 },
};

export class StubScorer implements WebsiteScorer {
  readonly calls: string[] = [];
  constructor(private readonly answer: (url: string) => WebsiteRelevanceResult = () => RELEVANT) {}
  async analyzeWebsite(url: string): Promise<WebsiteRelevanceResult> {
    this.calls.push(url);
    return this.answer(url);
  }
}

export class StubExtractor implements ContactExtractor {
  readonly calls: Array<{ url: string; options?: ExtractOptions }> = [];
  constructor(private readonly found: string[] = ['info@acme.it']) {}
  async extract(url: string, options?: ExtractOptions): Promise<string[]> {
    this.calls.push({ url, options });
    return this.found;
  }
}
