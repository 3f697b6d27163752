import pLimit from 'p-limit';

import { DEFAULT_SERVICE_OPTIONS } from '../config.js';
import { createFetchError } from '../errors.js';
import type { CancellationToken } from '../jobs/cancellation.js';
import { getLogger, type LoggerLike } from '../logger.js';
import { NOOP_PROGRESS } from '../progress/progressCallback.js';
import type {
  BatchFetchOptions,
  ContentFetcher,
  CrawledDocument,
  FetchOptions,
  RecursiveFetchOptions,
} from '../types.js';
import { normalizeUrl } from '../url/normalizeUrl.js';
import { isSameHost } from '../url/sameHost.js';
import { isBinaryFile } from '../url/urlKinds.js';
import { reportIngestError } from '../util/errorHandler.js';
import { fetchPageWithRetry, type FetchOutcome } from './network/fetchPageWithRetry.js';
import { extractContent } from './parsing/extractContent.js';
import { parseLinks } from './parsing/parseLinks.js';
import { parseSitemapXml } from './parsing/parseSitemap.js';
import { CrawlQueue } from './state/queue.js';

export interface HttpContentFetcherOptions {
  requestTimeoutMs?: number;
  maxConcurrent?: number;
  maxDepth?: number;
  logger?: LoggerLike;
}

interface CrawledPage {
  finalUrl: string;
  document?: CrawledDocument;
  html?: string;
}

/** {@link ContentFetcher} over global fetch, cheerio and p-limit. */
export class HttpContentFetcher implements ContentFetcher {
  private readonly requestTimeoutMs: number;
  private readonly maxConcurrent: number;
  private readonly maxDepth: number;
  private readonly logger: LoggerLike;

  constructor(options: HttpContentFetcherOptions = {}) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_SERVICE_OPTIONS.requestTimeoutMs;
    this.maxConcurrent = options.maxConcurrent ?? DEFAULT_SERVICE_OPTIONS.maxConcurrent;
    this.maxDepth = options.maxDepth ?? DEFAULT_SERVICE_OPTIONS.maxDepth;
    this.logger = options.logger ?? getLogger();
  }

  async fetchSingle(url: string, options: FetchOptions = {}): Promise<CrawledDocument> {
    const progress = options.progress ?? NOOP_PROGRESS;
    await progress.report(0, `Fetching ${url}`, { currentUrl: url, totalPages: 1, processedPages: 0 });

    const outcome = await this.fetchOrThrow(url, options.token);
    const document = toDocument(outcome, options.isDocumentationSite ?? false);

    await progress.report(100, `Fetched ${url}`, { currentUrl: url, totalPages: 1, processedPages: 1 });
    return document;
  }

  async fetchMarkdownFile(url: string, options: FetchOptions = {}): Promise<CrawledDocument[]> {
    const progress = options.progress ?? NOOP_PROGRESS;
    await progress.report(0, `Fetching text file ${url}`, { currentUrl: url });

    const outcome = await this.fetchOrThrow(url, options.token);
    const markdown = outcome.body ?? '';

    await progress.report(100, `Fetched text file ${url}`, { currentUrl: url, processedPages: 1 });
    if (!markdown.trim()) {
      return [];
    }

    return [
      {
        url: outcome.url,
        markdown,
        title: fileName(outcome.url),
        status: outcome.status ?? undefined,
        contentType: outcome.contentType,
      },
    ];
  }

  async parseSitemap(sitemapUrl: string, options: FetchOptions = {}): Promise<string[]> {
    const outcome = await this.fetchOrThrow(sitemapUrl, options.token);
    const urls = parseSitemapXml(outcome.body ?? '');
    this.logger.info({ sitemapUrl, urls: urls.length }, 'Parsed sitemap');
    return urls;
  }

  async fetchBatch(urls: readonly string[], options: BatchFetchOptions = {}): Promise<CrawledDocument[]> {
    const { token, linkTextFallbacks } = options;
    const progress = options.progress ?? NOOP_PROGRESS;
    const total = urls.length;
    if (total === 0) {
      return [];
    }

    const limit = pLimit(options.maxConcurrent ?? this.maxConcurrent);
    let completed = 0;

    const results = await Promise.all(
      urls.map((url) =>
        limit(async () => {
          token?.throwIfCancelled({ url });
          const page = await this.crawlPage(url, options);
          completed += 1;

          await progress.report((completed / total) * 100, `Crawled ${completed}/${total} pages`, {
            currentUrl: url,
            processedPages: completed,
            totalPages: total,
          });

          const linkText = linkTextFallbacks?.get(url);
          if (page.document && linkText) {
            return {
              ...page.document,
              title: page.document.title ?? linkText,
              linkText,
            };
          }
          return page.document;
        }),
      ),
    );

    return results.filter(isDocument);
  }

  /** Breadth-first, same-host crawl. Depth 0 holds the start URLs. */
  async fetchRecursive(
    startUrls: readonly string[],
    options: RecursiveFetchOptions = {},
  ): Promise<CrawledDocument[]> {
    const { token, maxPages } = options;
    const progress = options.progress ?? NOOP_PROGRESS;
    const maxDepth = options.maxDepth ?? this.maxDepth;
    const limit = pLimit(options.maxConcurrent ?? this.maxConcurrent);
    const queue = new CrawlQueue(startUrls.map((url) => normalizeUrl(url) ?? url));
    const documents: CrawledDocument[] = [];
    let visited = 0;

    for (let depth = 0; depth <= maxDepth && queue.pending > 0; depth += 1) {
      token?.throwIfCancelled({ depth });

      const remaining = maxPages === undefined ? Infinity : maxPages - visited;
      const level = queue.dequeueLevel(depth).slice(0, Math.max(0, remaining));
      if (level.length === 0) {
        break;
      }

      let levelDone = 0;
      const pages = await Promise.all(
        level.map((item) =>
          limit(async () => {
            token?.throwIfCancelled({ url: item.url, depth });
            const page = await this.crawlPage(item.url, options);
            visited += 1;
            levelDone += 1;

            const percent = ((depth + levelDone / level.length) / (maxDepth + 1)) * 100;
            await progress.report(percent, `Crawled ${visited} pages (depth ${depth})`, {
              currentUrl: item.url,
              processedPages: visited,
              depth,
            });
            return page;
          }),
        ),
      );

      for (const page of pages) {
        if (page.document) {
          documents.push(page.document);
        }
        queue.markVisited(normalizeUrl(page.finalUrl) ?? page.finalUrl);
        if (depth < maxDepth && page.html) {
          this.enqueueLinks(queue, page.finalUrl, page.html, depth + 1);
        }
      }
    }

    await progress.report(100, `Recursive crawl finished with ${documents.length} pages`, {
      processedPages: visited,
      totalPages: visited,
    });
    return documents;
  }

  private async fetchOrThrow(url: string, token?: CancellationToken): Promise<FetchOutcome> {
    const outcome = await fetchPageWithRetry(url, this.requestTimeoutMs, token);
    if (!outcome.ok) {
      throw createFetchError(
        `Failed to fetch ${url}: ${outcome.failureReason ?? 'Request failed'}`,
        { url, status: outcome.status },
        { severity: 'fatal', cause: outcome.error },
      );
    }
    return outcome;
  }

  private async crawlPage(url: string, options: FetchOptions): Promise<CrawledPage> {
    const outcome = await fetchPageWithRetry(url, this.requestTimeoutMs, options.token);

    if (!outcome.ok) {
      reportIngestError(
        outcome.error ??
          createFetchError(`HTTP failure: ${outcome.failureReason ?? 'Request failed'}`, {
            status: outcome.status,
          }),
        { stage: 'fetch', url },
        { throwOnFatal: false, logger: this.logger },
      );
      return { finalUrl: outcome.url };
    }

    let document: CrawledDocument;
    try {
      document = toDocument(outcome, options.isDocumentationSite ?? false);
    } catch (error) {
      reportIngestError(error, { stage: 'parse', url }, {
        defaultKind: 'parse',
        defaultSeverity: 'recoverable',
        throwOnFatal: false,
        logger: this.logger,
      });
      return { finalUrl: outcome.url };
    }

    if (!document.markdown.trim()) {
      this.logger.debug({ url }, 'Skipping page without extractable content');
      return { finalUrl: outcome.url, html: htmlBody(outcome) };
    }

    return { finalUrl: outcome.url, document, html: htmlBody(outcome) };
  }

  private enqueueLinks(queue: CrawlQueue, pageUrl: string, html: string, depth: number): void {
    let rawLinks: string[];
    try {
      rawLinks = parseLinks(html);
    } catch (error) {
      reportIngestError(error, { stage: 'parse', url: pageUrl }, {
        defaultKind: 'parse',
        defaultSeverity: 'recoverable',
        throwOnFatal: false,
        logger: this.logger,
      });
      return;
    }

    const base = new URL(pageUrl);
    for (const rawLink of rawLinks) {
      const normalized = normalizeUrl(rawLink, base);
      if (!normalized || !isSameHost(base, normalized) || isBinaryFile(normalized)) {
        continue;
      }
      queue.enqueueIfNew(normalized, depth);
    }
  }
}

function toDocument(outcome: FetchOutcome, isDocumentationSite: boolean): CrawledDocument {
  const body = outcome.body ?? '';
  const base = {
    url: outcome.url,
    status: outcome.status ?? undefined,
    contentType: outcome.contentType,
  };

  if (!isHtml(outcome.contentType)) {
    return { ...base, markdown: body, title: fileName(outcome.url) };
  }

  const { title, markdown } = extractContent(body, { preferMainContent: isDocumentationSite });
  return { ...base, markdown, title };
}

function htmlBody(outcome: FetchOutcome): string | undefined {
  return isHtml(outcome.contentType) ? outcome.body : undefined;
}

function isHtml(contentType: string | undefined): boolean {
  const lowered = contentType?.toLowerCase() ?? '';
  return lowered.includes('text/html') || lowered.includes('application/xhtml+xml');
}

function fileName(url: string): string | undefined {
  try {
    const segments = new URL(url).pathname.split('/').filter(Boolean);
    return segments.at(-1);
  } catch {
    return undefined;
  }
}

function isDocument(value: CrawledDocument | undefined): value is CrawledDocument {
  return value !== undefined;
}
