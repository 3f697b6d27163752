import type { CancellationToken } from './jobs/cancellation.js';
import type { ProgressCallback } from './progress/progressCallback.js';

export type CrawlStrategy = 'single' | 'batch' | 'recursive' | 'sitemap' | 'auto';

export type CrawlType =
  | 'single_page'
  | 'text_file'
  | 'llms_txt'
  | 'link_collection'
  | 'sitemap'
  | 'batch'
  | 'recursive';

export type PipelineStage = 'initialize' | 'fetch' | 'process' | 'extract' | 'finalize';

export type TerminalStatus = 'completed' | 'cancelled' | 'failed';

export type ProgressStatus = PipelineStage | TerminalStatus | 'pending';

export type SourceStatus = 'pending' | 'processing' | 'completed' | 'failed';

export interface CrawledDocument {
  url: string;
  markdown: string;
  title?: string;
  status?: number;
  contentType?: string;
  /** Link text that pointed at this document, when it came from a link collection. */
  linkText?: string;
}

export interface FetchResult {
  documents: CrawledDocument[];
  crawlType: CrawlType;
}

export interface JobOptions {
  /** Overrides the derived job id; used when the caller already owns an id. */
  jobId?: string;
  /** Extra URLs for the batch strategy. Defaults to the job URL alone. */
  urls?: string[];
  maxDepth?: number;
  maxConcurrent?: number;
  maxPages?: number;
  extractCodeExamples?: boolean;
  knowledgeType?: string;
  tags?: string[];
}

export interface FetchOptions {
  token?: CancellationToken;
  progress?: ProgressCallback;
  maxConcurrent?: number;
  isDocumentationSite?: boolean;
}

export interface BatchFetchOptions extends FetchOptions {
  /** Link text keyed by URL, used as the title fallback of fetched documents. */
  linkTextFallbacks?: ReadonlyMap<string, string>;
}

export interface RecursiveFetchOptions extends FetchOptions {
  maxDepth?: number;
  maxPages?: number;
}

/** One method per crawl strategy; implementations may suspend on network I/O. */
export interface ContentFetcher {
  fetchSingle(url: string, options?: FetchOptions): Promise<CrawledDocument>;
  fetchMarkdownFile(url: string, options?: FetchOptions): Promise<CrawledDocument[]>;
  parseSitemap(sitemapUrl: string, options?: FetchOptions): Promise<string[]>;
  fetchBatch(urls: readonly string[], options?: BatchFetchOptions): Promise<CrawledDocument[]>;
  fetchRecursive(
    startUrls: readonly string[],
    options?: RecursiveFetchOptions,
  ): Promise<CrawledDocument[]>;
}

export interface SiteDetector {
  isDocumentationSite(url: string): boolean;
}

export interface SourceRecord {
  sourceId: string;
  url: string;
  displayName: string;
  status: SourceStatus;
  knowledgeType?: string;
  tags: string[];
  wordCount: number;
  updatedAt: string;
}

export interface SourceInput {
  sourceId: string;
  url: string;
  displayName: string;
  status: SourceStatus;
  knowledgeType?: string;
  tags?: string[];
}

export interface DocumentChunk {
  url: string;
  chunkIndex: number;
  content: string;
  metadata: Record<string, unknown>;
}

export interface CodeExample {
  url: string;
  language: string;
  code: string;
  context: string;
}

export interface Repository {
  upsertSource(input: SourceInput): Promise<SourceRecord>;
  getSource(sourceId: string): Promise<SourceRecord | undefined>;
  updateSourceStatus(sourceId: string, status: SourceStatus): Promise<void>;
  storeChunks(sourceId: string, chunks: readonly DocumentChunk[]): Promise<number>;
  storeCodeExamples(sourceId: string, examples: readonly CodeExample[]): Promise<number>;
}

export interface ProcessRequest {
  sourceId: string;
  sourceUrl: string;
  displayName: string;
  crawlType: CrawlType;
  documents: readonly CrawledDocument[];
  options: JobOptions;
  progress: ProgressCallback;
  token: CancellationToken;
}

export interface ProcessResult {
  sourceId: string;
  /** Chunks produced from the documents. */
  chunkCount: number;
  /** Chunks the repository acknowledged. */
  chunksStored: number;
  urlToFullDocument: ReadonlyMap<string, string>;
}

export interface DocumentProcessor {
  process(request: ProcessRequest): Promise<ProcessResult>;
}

export interface ExtractRequest {
  sourceId: string;
  documents: readonly CrawledDocument[];
  urlToFullDocument: ReadonlyMap<string, string>;
  progress: ProgressCallback;
  token: CancellationToken;
}

export interface CodeExampleExtractor {
  extract(request: ExtractRequest): Promise<number>;
}

export type ProgressDetails = Record<string, unknown>;

export interface ProgressStart {
  url: string;
  status: ProgressStatus;
  progress: number;
  message: string;
}

export interface CompletionPayload {
  chunks: number;
  codeExamples: number;
  processed: number;
  total: number;
  sourceId: string;
  crawlType: CrawlType;
}

/**
 * Observable surface a client polls. `progress` is null on liveness-only
 * updates, which carry no new percentage.
 */
export interface ProgressSink {
  start(initial: ProgressStart): Promise<void>;
  update(
    status: ProgressStatus,
    progress: number | null,
    message: string,
    details?: ProgressDetails,
  ): Promise<void>;
  complete(payload: CompletionPayload): Promise<void>;
  error(message: string): Promise<void>;
}

export interface JobOutcome {
  jobId: string;
  state: TerminalStatus;
  sourceId?: string;
  summary?: CompletionPayload;
  error?: string;
}

export interface StartResult {
  jobId: string;
  alreadyRunning: boolean;
}

export type Clock = () => number;
