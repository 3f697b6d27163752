import { createHash } from 'node:crypto';

import { resolveServiceOptions, type ServiceConfig, type ServiceOptions } from '../config.js';
import { createValidationError } from '../errors.js';
import { getLogger } from '../logger.js';
import { isCrawlStrategy } from '../orchestrator/strategyRouter.js';
import { StageOrchestrator } from '../orchestrator/stageOrchestrator.js';
import { ProgressMapper } from '../progress/progressMapper.js';
import { ProgressStore, type ProgressSnapshot } from '../progress/progressTracker.js';
import type {
  BatchFetchOptions,
  Clock,
  CodeExampleExtractor,
  ContentFetcher,
  CrawlStrategy,
  CrawledDocument,
  DocumentProcessor,
  FetchOptions,
  JobOptions,
  JobOutcome,
  RecursiveFetchOptions,
  Repository,
  SiteDetector,
  StartResult,
} from '../types.js';
import { normalizeUrl } from '../url/normalizeUrl.js';
import { JobHandle } from './jobHandle.js';
import { JobRegistry } from './registry.js';

export interface IngestServiceDependencies {
  repository: Repository;
  fetcher: ContentFetcher;
  siteDetector: SiteDetector;
  processor: DocumentProcessor;
  codeExtractor: CodeExampleExtractor;
  registry?: JobRegistry;
  progressStore?: ProgressStore;
  options?: ServiceConfig;
  clock?: Clock;
}

/** Same URL and strategy always yield the same id, so repeated starts collide. */
export function deriveJobId(url: string, strategy: CrawlStrategy): string {
  const normalized = normalizeUrl(url) ?? url;
  return createHash('sha256').update(`${strategy}:${normalized}`).digest('hex').slice(0, 16);
}

/**
 * Entry point for callers: starts orchestrated jobs, cancels them, and serves
 * their progress. Direct fetch operations bypass orchestration entirely.
 */
export class IngestService {
  readonly options: ServiceOptions;
  private readonly deps: IngestServiceDependencies;
  private readonly registry: JobRegistry;
  private readonly progressStore: ProgressStore;
  private readonly clock: Clock;
  private readonly outcomes = new Map<string, JobOutcome>();

  constructor(deps: IngestServiceDependencies) {
    this.deps = deps;
    this.options = resolveServiceOptions(deps.options);
    this.clock = deps.clock ?? Date.now;
    this.registry = deps.registry ?? new JobRegistry();
    this.progressStore = deps.progressStore ?? new ProgressStore(this.clock);
  }

  async start(
    url: string,
    strategy: string = 'auto',
    options: JobOptions = {},
  ): Promise<StartResult> {
    const startUrl = validateStartUrl(url);
    if (!isCrawlStrategy(strategy)) {
      throw createValidationError(`Unsupported crawl strategy: ${strategy}`, { strategy });
    }
    validateJobOptions(options);

    const jobId = options.jobId ?? deriveJobId(startUrl, strategy);
    const handle = new JobHandle(jobId, startUrl, strategy, this.clock);

    if (!(await this.registry.register(jobId, handle))) {
      getLogger().info({ jobId, url: startUrl }, 'Crawl already running for job');
      return { jobId, alreadyRunning: true };
    }

    try {
      this.outcomes.delete(jobId);
      const orchestrator = new StageOrchestrator({
        jobId,
        url: startUrl,
        strategy,
        options: {
          ...options,
          maxConcurrent: options.maxConcurrent ?? this.options.maxConcurrent,
          maxPages: options.maxPages ?? this.options.maxPages,
        },
        repository: this.deps.repository,
        fetcher: this.deps.fetcher,
        siteDetector: this.deps.siteDetector,
        processor: this.deps.processor,
        codeExtractor: this.deps.codeExtractor,
        sink: this.progressStore.create(jobId),
        mapper: new ProgressMapper(this.options.stageWeights),
        token: handle.token,
        lifecycle: handle.lifecycle,
        heartbeatIntervalMs: this.options.heartbeatIntervalMs,
        defaultMaxDepth: this.options.maxDepth,
        clock: this.clock,
      });

      handle.attach(this.runJob(handle, orchestrator));
    } catch (error) {
      await this.registry.unregister(jobId, handle);
      throw error;
    }

    return { jobId, alreadyRunning: false };
  }

  /** Fires the job's token. Returns false for unknown or already cancelled jobs. */
  cancel(jobId: string, reason?: string): boolean {
    const handle = this.registry.lookup(jobId);
    if (!handle) {
      return false;
    }

    const fired = handle.token.cancel(reason);
    if (fired) {
      getLogger().info({ jobId, reason }, 'Cancellation requested');
    }
    return fired;
  }

  cancelAll(reason?: string): number {
    return this.registry
      .activeJobIds()
      .reduce((count, jobId) => (this.cancel(jobId, reason) ? count + 1 : count), 0);
  }

  isCancelled(jobId: string): boolean {
    if (this.registry.lookup(jobId)?.token.isCancelled()) {
      return true;
    }
    return this.outcomes.get(jobId)?.state === 'cancelled';
  }

  isRunning(jobId: string): boolean {
    return this.registry.lookup(jobId) !== undefined;
  }

  getProgress(jobId: string): ProgressSnapshot | undefined {
    return this.progressStore.snapshot(jobId);
  }

  activeJobIds(): string[] {
    return this.registry.activeJobIds();
  }

  /** Resolves with the terminal outcome; undefined for ids this service never ran. */
  async waitFor(jobId: string): Promise<JobOutcome | undefined> {
    const completion = this.registry.lookup(jobId)?.completion;
    if (completion) {
      return completion;
    }
    return this.outcomes.get(jobId);
  }

  /**
   * Drops the retained outcome and progress of a finished job. Returns false
   * while the job is still running or when nothing was kept for it.
   */
  forget(jobId: string): boolean {
    if (this.registry.lookup(jobId)) {
      return false;
    }

    const hadOutcome = this.outcomes.delete(jobId);
    const hadProgress = this.progressStore.delete(jobId);
    return hadOutcome || hadProgress;
  }

  async fetchSingle(url: string, options?: FetchOptions): Promise<CrawledDocument> {
    options?.token?.throwIfCancelled({ url, operation: 'fetchSingle' });
    return this.deps.fetcher.fetchSingle(url, options);
  }

  async fetchMarkdownFile(url: string, options?: FetchOptions): Promise<CrawledDocument[]> {
    options?.token?.throwIfCancelled({ url, operation: 'fetchMarkdownFile' });
    return this.deps.fetcher.fetchMarkdownFile(url, options);
  }

  async parseSitemap(sitemapUrl: string, options?: FetchOptions): Promise<string[]> {
    options?.token?.throwIfCancelled({ url: sitemapUrl, operation: 'parseSitemap' });
    return this.deps.fetcher.parseSitemap(sitemapUrl, options);
  }

  async fetchBatch(urls: readonly string[], options?: BatchFetchOptions): Promise<CrawledDocument[]> {
    options?.token?.throwIfCancelled({ urls: urls.length, operation: 'fetchBatch' });
    return this.deps.fetcher.fetchBatch(urls, options);
  }

  async fetchRecursive(
    startUrls: readonly string[],
    options?: RecursiveFetchOptions,
  ): Promise<CrawledDocument[]> {
    options?.token?.throwIfCancelled({ urls: startUrls.length, operation: 'fetchRecursive' });
    return this.deps.fetcher.fetchRecursive(startUrls, {
      ...options,
      maxDepth: options?.maxDepth ?? this.options.maxDepth,
    });
  }

  private async runJob(handle: JobHandle, orchestrator: StageOrchestrator): Promise<JobOutcome> {
    try {
      const outcome = await orchestrator.run();
      this.outcomes.set(handle.jobId, outcome);
      return outcome;
    } finally {
      await this.registry.unregister(handle.jobId, handle);
    }
  }
}

function validateStartUrl(raw: string): string {
  let url: URL;

  try {
    url = new URL(raw);
  } catch {
    throw createValidationError(`Invalid URL: ${raw}`, { url: raw });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw createValidationError('URL must use http or https protocol.', {
      protocol: url.protocol,
      url: raw,
    });
  }

  return url.href;
}

function validateJobOptions(options: JobOptions): void {
  for (const url of options.urls ?? []) {
    validateStartUrl(url);
  }

  if (options.jobId !== undefined && options.jobId.trim() === '') {
    throw createValidationError('jobId must not be blank.', { jobId: options.jobId });
  }

  assertInteger(options.maxDepth, 'maxDepth', 0);
  assertInteger(options.maxConcurrent, 'maxConcurrent', 1);
  assertInteger(options.maxPages, 'maxPages', 1);
}

function assertInteger(value: number | undefined, field: string, min: number): void {
  if (value === undefined) {
    return;
  }

  if (!Number.isInteger(value) || value < min) {
    throw createValidationError(`${field} must be an integer of at least ${min}.`, {
      field,
      value,
    });
  }
}
