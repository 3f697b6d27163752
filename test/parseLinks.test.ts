import { describe, expect, it } from 'vitest';

import { parseLinks } from '../src/fetching/parsing/parseLinks.js';
import { parseSitemapXml } from '../src/fetching/parsing/parseSitemap.js';

describe('parseLinks', () => {
  it('returns unique href values', () => {
    const html = `
      <html>
        <body>
          <a href="/a">A</a>
          <a href="/a">Duplicate</a>
          <a href="/b">B</a>
        </body>
      </html>
    `;

    const links = parseLinks(html);
    expect(links.sort()).toEqual(['/a', '/b']);
  });

  it('ignores anchors without href attributes and in-page fragments', () => {
    const html = `
      <html>
        <body>
          <a>No href</a>
          <a href="">Empty</a>
          <a href="#install">Fragment</a>
          <a href="  /c  ">Trimmed</a>
        </body>
      </html>
    `;

    const links = parseLinks(html);
    expect(links).toEqual(['/c']);
  });
});

describe('parseSitemapXml', () => {
  it('reads loc entries in order without duplicates', () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
      <urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
        <url><loc> https://example.com/a </loc></url>
        <url><loc>https://example.com/b</loc><lastmod>2024-01-01</lastmod></url>
        <url><loc>https://example.com/a</loc></url>
      </urlset>`;

    expect(parseSitemapXml(xml)).toEqual(['https://example.com/a', 'https://example.com/b']);
  });

  it('returns an empty list when the document has no url entries', () => {
    expect(parseSitemapXml('<urlset></urlset>')).toEqual([]);
  });
});
