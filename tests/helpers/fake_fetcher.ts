import { FetchOptions, FetchResult, PageFetcher } from '../../src/core/fetch/page_fetcher';

export interface FakePage {
  status?: number;
  body: string;
  finalUrl?: string;
  contentType?: string;
}

/** In-memory PageFetcher keyed by exact URL; unknown URLs come back as null. */
export class FakeFetcher implements PageFetcher {
  readonly requested: string[] = [];
  readonly heads: string[] = [];
  headStatus: number | null = 200;

  constructor(private readonly pages: Record<string, FakePage> = {}) {}

  set(url: string, page: FakePage): this {
    this.pages[url] = page;
    return this;
  }

  async get(url: string, _options?: FetchOptions): Promise<FetchResult | null> {
    this.requested.push(url);
    const page = this.pages[url];
    if (!page) return null;
    return {
      url,
      finalUrl: page.finalUrl ?? url,
      status: page.status ?? 200,
      body: page.body,
      contentType: page.contentType ?? 'text/html',
    };
  }

  async head(url: string): Promise<number | null> {
    this.heads.push(url);
    return this.headStatus;
  }
}

export const html = (body: string, title = '') =>
  `<html><head><title>${title}</title></head><body>${body}</body></html>`;
