import { describe, expect, it } from 'vitest';
import {
  ContactPageDiscoverer,
  FALLBACK_SLUGS,
  canonicalUrl,
  isAssetUrl,
} from '../../src/core/discovery/contact_page_discoverer';
import { FakeFetcher, html } from '../helpers/fake_fetcher';

const urlset = (locs: string[]) =>
  `<?xml version="1.0" encoding="UTF-8"?><urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">${locs
    .map((l) => `<url><loc>${l}</loc></url>`)
    .join('')}</urlset>`;

const index = (locs: string[]) =>
  `<?xml version="1.0" encoding="UTF-8"?><sitemapindex>${locs.map((l) => `<sitemap><loc>${l}</loc></sitemap>`).join('')}</sitemapindex>`;

describe('ContactPageDiscoverer', () => {
  it('walks robots.txt sitemaps, page sitemaps before post sitemaps', async () => {
    const fetcher = new FakeFetcher({
      'https://acme.it/robots.txt': { body: 'User-agent: *\nSitemap: https://acme.it/sitemap_index.xml\n', contentType: 'text/plain' },
      'https://acme.it/sitemap_index.xml': { body: index(['https://acme.it/post-sitemap.xml', 'https://acme.it/page-sitemap.xml']) },
      'https://acme.it/page-sitemap.xml': {
        body: urlset([
          'https://acme.it/contatti/',
          'https://acme.it/servizi',
          'https://acme.it/logo-contatti.png',
          'https://other.it/contact',
        ]),
      },
      'https://acme.it/post-sitemap.xml': { body: urlset(['https://acme.it/blog/chi-siamo-storia']) },
    });

    const scored = await new ContactPageDiscoverer(fetcher).discoverScored('https://acme.it');

    expect(fetcher.requested.slice(0, 4)).toEqual([
      'https://acme.it/robots.txt',
      'https://acme.it/sitemap_index.xml',
      'https://acme.it/page-sitemap.xml',
      'https://acme.it/post-sitemap.xml',
    ]);
    expect(scored.slice(0, 2)).toEqual([
      { url: 'https://acme.it/contatti', score: 4 },
      { url: 'https://acme.it/blog/chi-siamo-storia', score: 4 },
    ]);
    // /contatti and /contatti/ collapse onto the sitemap hit
    expect(scored).toHaveLength(2 + FALLBACK_SLUGS.length - 2);
    expect(scored.map((c) => c.url)).not.toContain('https://acme.it/servizi');
  });

  it('scores homepage links when no sitemap is available', async () => {
    const fetcher = new FakeFetcher({
      'https://acme.it/': {
        body: html(
          '<a href="/contatti">Contatti</a>' +
            '<a href="/chi-siamo">Chi siamo</a>' +
            '<a href="https://facebook.com/contact">Facebook</a>' +
            '<a href="mailto:info@acme.it">Scrivici</a>' +
            '<a href="/brochure-contatti.pdf">Brochure</a>'
        ),
      },
    });

    const scored = await new ContactPageDiscoverer(fetcher).discoverScored('acme.it');

    expect(scored[0]).toEqual({ url: 'https://acme.it/contatti', score: 5 });
    expect(scored.find((c) => c.url === 'https://acme.it/chi-siamo')).toEqual({ url: 'https://acme.it/chi-siamo', score: 1 });
    expect(scored.map((c) => c.url)).not.toContain('https://acme.it/brochure-contatti.pdf');
    expect(fetcher.requested).toContain('https://acme.it/sitemap.xml');
  });

  it('adopts the origin robots.txt redirects to', async () => {
    const fetcher = new FakeFetcher({
      'https://acme.it/robots.txt': { body: '', finalUrl: 'https://www.acme.it/robots.txt' },
    });

    const urls = await new ContactPageDiscoverer(fetcher).discover('https://acme.it');

    expect(fetcher.requested).toContain('https://www.acme.it/sitemap.xml');
    expect(fetcher.requested).toContain('https://www.acme.it/');
    expect(urls).toContain('https://www.acme.it/contatti');
  });

  it('skips the slug fallback once enough strong candidates exist', async () => {
    const pages = ['contatti', 'contatto', 'contact', 'contacts', 'about', 'azienda', 'company', 'assistenza'];
    const fetcher = new FakeFetcher({
      'https://acme.it/sitemap.xml': { body: urlset(pages.map((p) => `https://acme.it/${p}`)) },
    });

    const scored = await new ContactPageDiscoverer(fetcher).discoverScored('https://acme.it');

    expect(scored).toHaveLength(8);
    expect(scored.every((c) => c.score === 4)).toBe(true);
  });

  it('returns nothing for an unusable site URL', async () => {
    expect(await new ContactPageDiscoverer(new FakeFetcher()).discover('')).toEqual([]);
  });
});

describe('ContactPageDiscoverer.parseSitemap', () => {
  it('reads page locs and ignores image locs', () => {
    const xml =
      '<?xml version="1.0"?><urlset><url><loc>https://acme.it/a</loc>' +
      '<image:image><image:loc>https://acme.it/i.png</image:loc></image:image></url></urlset>';
    expect(ContactPageDiscoverer.parseSitemap(xml)).toEqual({ kind: 'urlset', locs: ['https://acme.it/a'] });
  });

  it('recognizes sitemap indexes', () => {
    expect(ContactPageDiscoverer.parseSitemap(index(['https://acme.it/s1.xml']))).toEqual({
      kind: 'index',
      locs: ['https://acme.it/s1.xml'],
    });
  });

  it('falls back to a regex on loose markup', () => {
    expect(ContactPageDiscoverer.parseSitemap('garbage <loc>https://acme.it/x</loc>').locs).toEqual(['https://acme.it/x']);
  });
});

describe('URL helpers', () => {
  it('canonicalizes fragments and trailing slashes', () => {
    expect(canonicalUrl('https://acme.it/contatti/#form')).toBe('https://acme.it/contatti');
    expect(canonicalUrl('https://acme.it')).toBe('https://acme.it/');
    expect(canonicalUrl('not a url')).toBeNull();
  });

  it('detects asset URLs by extension', () => {
    expect(isAssetUrl('https://acme.it/logo.PNG')).toBe(true);
    expect(isAssetUrl('https://acme.it/v1.2/contatti')).toBe(false);
  });
});
