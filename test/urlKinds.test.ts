import { describe, expect, it } from 'vitest';

import {
  extractMarkdownLinksWithText,
  isBinaryFile,
  isLinkCollectionFile,
  isLlmsTxt,
  isSitemap,
  isTextFile,
} from '../src/url/urlKinds.js';

describe('url kinds', () => {
  it('recognises text and markdown files', () => {
    expect(isTextFile('https://docs.example.com/llms.txt')).toBe(true);
    expect(isTextFile('https://docs.example.com/guide.md?raw=1')).toBe(true);
    expect(isTextFile('https://docs.example.com/guide')).toBe(false);
  });

  it('recognises llms files', () => {
    expect(isLlmsTxt('https://docs.example.com/llms-full.txt')).toBe(true);
    expect(isLlmsTxt('https://docs.example.com/notes.txt')).toBe(false);
  });

  it('recognises sitemaps', () => {
    expect(isSitemap('https://docs.example.com/sitemap.xml')).toBe(true);
    expect(isSitemap('https://docs.example.com/sitemap_index.xml')).toBe(true);
    expect(isSitemap('https://docs.example.com/feed.xml')).toBe(false);
  });

  it('recognises binary files by extension only in the last segment', () => {
    expect(isBinaryFile('https://docs.example.com/img/logo.PNG')).toBe(true);
    expect(isBinaryFile('https://docs.example.com/v1.2/page')).toBe(false);
    expect(isBinaryFile('https://docs.example.com/page')).toBe(false);
  });
});

describe('isLinkCollectionFile', () => {
  it('accepts well-known names regardless of content', () => {
    expect(isLinkCollectionFile('https://docs.example.com/llms.txt', '')).toBe(true);
  });

  it('accepts files dominated by markdown links', () => {
    const content = ['# Index', ...[1, 2, 3, 4, 5].map((n) => `- [Page ${n}](/page-${n})`)].join('\n');

    expect(isLinkCollectionFile('https://docs.example.com/index.md', content)).toBe(true);
  });

  it('rejects prose with a few links', () => {
    const content = 'Intro text.\n\nSee [one](/one) and [two](/two).\n\nMore prose.';

    expect(isLinkCollectionFile('https://docs.example.com/readme.md', content)).toBe(false);
  });
});

describe('extractMarkdownLinksWithText', () => {
  it('resolves links against the file and keeps the first text per target', () => {
    const content =
      '[Guide](/guide) and [Again](/guide) [Mail](mailto:team@example.com) [Abs](https://other.example.org/x "Title")';

    expect(extractMarkdownLinksWithText(content, 'https://docs.example.com/index.md')).toEqual([
      { url: 'https://docs.example.com/guide', text: 'Guide' },
      { url: 'https://other.example.org/x', text: 'Abs' },
    ]);
  });
});
