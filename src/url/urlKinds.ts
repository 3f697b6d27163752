const TEXT_FILE_PATTERN = /\.(txt|md|mdx|markdown)$/i;
const SITEMAP_PATTERN = /sitemap[^/]*\.xml$/i;
const LINK_COLLECTION_NAMES = new Set(['llms.txt', 'links.txt', 'links.md']);
const BINARY_EXTENSIONS = new Set([
  '.pdf',
  '.png',
  '.jpg',
  '.jpeg',
  '.gif',
  '.svg',
  '.webp',
  '.ico',
  '.zip',
  '.tar',
  '.gz',
  '.tgz',
  '.rar',
  '.7z',
  '.exe',
  '.dmg',
  '.mp3',
  '.mp4',
  '.woff',
  '.woff2',
]);
const MARKDOWN_LINK_PATTERN = /\[([^\]]*)\]\(\s*<?([^)\s>]+)>?(?:\s+"[^"]*")?\s*\)/g;
const MIN_COLLECTION_LINKS = 5;

export interface MarkdownLink {
  url: string;
  text: string;
}

export function isTextFile(url: string): boolean {
  return TEXT_FILE_PATTERN.test(pathnameOf(url));
}

export function isLlmsTxt(url: string): boolean {
  return /llms[^/]*\.txt$/i.test(pathnameOf(url));
}

export function isSitemap(url: string): boolean {
  return SITEMAP_PATTERN.test(pathnameOf(url));
}

export function isBinaryFile(url: string): boolean {
  const pathname = pathnameOf(url).toLowerCase();
  const dot = pathname.lastIndexOf('.');
  if (dot === -1 || dot < pathname.lastIndexOf('/')) {
    return false;
  }

  return BINARY_EXTENSIONS.has(pathname.slice(dot));
}

/**
 * Link collections are text files that mostly list other pages: well-known
 * names such as llms.txt, or files where link lines dominate.
 */
export function isLinkCollectionFile(url: string, content: string): boolean {
  const pathname = pathnameOf(url);
  const fileName = pathname.slice(pathname.lastIndexOf('/') + 1).toLowerCase();
  if (LINK_COLLECTION_NAMES.has(fileName)) {
    return true;
  }

  const lines = content.split('\n').filter((line) => line.trim().length > 0);
  if (lines.length === 0) {
    return false;
  }

  const linkLines = lines.filter((line) => /\[[^\]]*\]\([^)]+\)/.test(line));
  return linkLines.length >= MIN_COLLECTION_LINKS && linkLines.length * 2 >= lines.length;
}

/** Absolute http(s) markdown links, first link text wins for repeated targets. */
export function extractMarkdownLinksWithText(content: string, baseUrl: string): MarkdownLink[] {
  const links = new Map<string, string>();

  for (const match of content.matchAll(MARKDOWN_LINK_PATTERN)) {
    const [, text = '', href = ''] = match;
    let resolved: URL;
    try {
      resolved = new URL(href, baseUrl);
    } catch {
      continue;
    }

    if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
      continue;
    }

    if (!links.has(resolved.href)) {
      links.set(resolved.href, text.trim());
    }
  }

  return [...links.entries()].map(([url, text]) => ({ url, text }));
}

function pathnameOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url.split(/[?#]/, 1)[0] ?? url;
  }
}
