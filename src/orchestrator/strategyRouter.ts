import { createValidationError } from '../errors.js';
import { getLogger, type LoggerLike } from '../logger.js';
import type {
  ContentFetcher,
  CrawlStrategy,
  CrawledDocument,
  CrawlType,
  FetchResult,
  JobOptions,
} from '../types.js';
import type { CancellationToken } from '../jobs/cancellation.js';
import type { ProgressCallback } from '../progress/progressCallback.js';
import { isSelfLink } from '../url/isSelfLink.js';
import {
  extractMarkdownLinksWithText,
  isBinaryFile,
  isLinkCollectionFile,
  isLlmsTxt,
  isSitemap,
  isTextFile,
  type MarkdownLink,
} from '../url/urlKinds.js';

export const CRAWL_STRATEGIES: readonly CrawlStrategy[] = [
  'single',
  'batch',
  'recursive',
  'sitemap',
  'auto',
];

export function isCrawlStrategy(value: string): value is CrawlStrategy {
  return CRAWL_STRATEGIES.some((strategy) => strategy === value);
}

export interface RouteRequest {
  url: string;
  strategy: CrawlStrategy;
  options: JobOptions;
  fetcher: ContentFetcher;
  progress: ProgressCallback;
  token: CancellationToken;
  isDocumentationSite: boolean;
  defaultMaxDepth: number;
  logger?: LoggerLike;
}

/** Runs the fetcher calls a strategy needs and names the crawl that happened. */
export async function routeByStrategy(request: RouteRequest): Promise<FetchResult> {
  const { url, strategy, options, fetcher, progress, token, isDocumentationSite } = request;
  const common = {
    token,
    progress,
    isDocumentationSite,
    maxConcurrent: options.maxConcurrent,
  };

  switch (strategy) {
    case 'single': {
      const document = await fetcher.fetchSingle(url, common);
      return { documents: [document], crawlType: 'single_page' };
    }
    case 'batch': {
      const urls = options.urls && options.urls.length > 0 ? options.urls : [url];
      const documents = await fetcher.fetchBatch(urls, common);
      return { documents, crawlType: 'batch' };
    }
    case 'recursive':
      return {
        documents: await fetcher.fetchRecursive([url], {
          ...common,
          maxDepth: options.maxDepth ?? request.defaultMaxDepth,
          maxPages: options.maxPages,
        }),
        crawlType: 'recursive',
      };
    case 'sitemap':
      return crawlSitemap(request);
    case 'auto':
      return crawlByUrlType(request);
    default:
      throw createValidationError(`Unknown crawl strategy: ${String(strategy)}`, { strategy });
  }
}

async function crawlByUrlType(request: RouteRequest): Promise<FetchResult> {
  const { url } = request;

  if (isTextFile(url)) {
    return crawlTextFile(request);
  }

  if (isSitemap(url)) {
    return crawlSitemap(request);
  }

  return routeByStrategy({ ...request, strategy: 'recursive' });
}

async function crawlSitemap(request: RouteRequest): Promise<FetchResult> {
  const { url, fetcher, token, progress, isDocumentationSite, options } = request;
  const pageUrls = await fetcher.parseSitemap(url, { token });

  if (pageUrls.length === 0) {
    return { documents: [], crawlType: 'sitemap' };
  }

  token.throwIfCancelled({ url });
  const documents = await fetcher.fetchBatch(pageUrls, {
    token,
    progress,
    isDocumentationSite,
    maxConcurrent: options.maxConcurrent,
  });
  return { documents, crawlType: 'sitemap' };
}

async function crawlTextFile(request: RouteRequest): Promise<FetchResult> {
  const { url, fetcher, token, progress } = request;
  const logger = request.logger ?? getLogger();
  const crawlType: CrawlType = isLlmsTxt(url) ? 'llms_txt' : 'text_file';
  const documents = await fetcher.fetchMarkdownFile(url, { token, progress });

  const first = documents[0];
  if (first && isLinkCollectionFile(url, first.markdown)) {
    return crawlLinkCollection(request, first.markdown, documents, crawlType);
  }

  logger.info({ url, documents: documents.length }, 'Text file crawl completed');
  return { documents, crawlType };
}

async function crawlLinkCollection(
  request: RouteRequest,
  content: string,
  originals: CrawledDocument[],
  fallbackType: CrawlType,
): Promise<FetchResult> {
  const { url, fetcher, token, progress, isDocumentationSite, options } = request;
  const logger = request.logger ?? getLogger();
  const links = filterCollectionLinks(extractMarkdownLinksWithText(content, url), url, logger);

  if (links.length === 0) {
    logger.info({ url }, 'No crawlable links found in link collection');
    return { documents: originals, crawlType: fallbackType };
  }

  token.throwIfCancelled({ url });
  logger.info({ url, links: links.length }, 'Crawling links extracted from link collection');

  const batch = await fetcher.fetchBatch(
    links.map((link) => link.url),
    {
      token,
      progress,
      isDocumentationSite,
      maxConcurrent: options.maxConcurrent,
      linkTextFallbacks: new Map(links.map((link) => [link.url, link.text])),
    },
  );

  return { documents: [...originals, ...batch], crawlType: 'link_collection' };
}

export function filterCollectionLinks(
  links: MarkdownLink[],
  baseUrl: string,
  logger: LoggerLike = getLogger(),
): MarkdownLink[] {
  const withoutSelf = links.filter((link) => !isSelfLink(link.url, baseUrl));
  const crawlable = withoutSelf.filter((link) => !isBinaryFile(link.url));

  const selfLinks = links.length - withoutSelf.length;
  const binaries = withoutSelf.length - crawlable.length;
  if (selfLinks > 0 || binaries > 0) {
    logger.debug({ baseUrl, selfLinks, binaries }, 'Filtered link collection entries');
  }

  return crawlable;
}
