import {
  createFetchError,
  createStorageError,
  ensureIngestError,
  IngestError,
  isCancellationError,
  type ErrorKind,
} from '../errors.js';
import type { CancellationToken } from '../jobs/cancellation.js';
import { STAGE_STATES, type JobStateMachine } from '../jobs/jobState.js';
import { getJobLogger, type LoggerLike } from '../logger.js';
import { HeartbeatSink } from '../progress/heartbeat.js';
import { createProgressCallback, type ProgressCallback } from '../progress/progressCallback.js';
import type { ProgressMapper } from '../progress/progressMapper.js';
import type {
  Clock,
  CodeExampleExtractor,
  CompletionPayload,
  ContentFetcher,
  CrawlStrategy,
  DocumentProcessor,
  FetchResult,
  JobOptions,
  JobOutcome,
  PipelineStage,
  ProcessResult,
  ProgressDetails,
  ProgressSink,
  Repository,
  SiteDetector,
} from '../types.js';
import { deriveSourceId, extractDisplayName } from '../url/sourceId.js';
import { reportIngestError } from '../util/errorHandler.js';
import { routeByStrategy } from './strategyRouter.js';

export interface OrchestrationConfig {
  readonly jobId: string;
  readonly url: string;
  readonly strategy: CrawlStrategy;
  readonly options: Readonly<JobOptions>;
  readonly repository: Repository;
  readonly fetcher: ContentFetcher;
  readonly siteDetector: SiteDetector;
  readonly processor: DocumentProcessor;
  readonly codeExtractor: CodeExampleExtractor;
  readonly sink?: ProgressSink;
  readonly mapper: ProgressMapper;
  readonly token: CancellationToken;
  readonly lifecycle: JobStateMachine;
  readonly heartbeatIntervalMs: number;
  readonly defaultMaxDepth: number;
  readonly clock?: Clock;
}

export function createOrchestrationConfig(config: OrchestrationConfig): OrchestrationConfig {
  return Object.freeze({
    ...config,
    options: Object.freeze({ ...config.options }),
  });
}

const STAGE_ERROR_KINDS: Readonly<Record<PipelineStage, ErrorKind>> = {
  initialize: 'storage',
  fetch: 'fetch',
  process: 'process',
  extract: 'extract',
  finalize: 'storage',
};

export const CANCELLED_MESSAGE = 'Crawl operation was cancelled by user';

/**
 * Drives one job through initialize → fetch → process → extract → finalize.
 *
 * `run()` never rejects: cancellation and failures are converted into sink
 * notifications and a terminal {@link JobOutcome}. Removing the job from the
 * registry is left to the caller.
 */
export class StageOrchestrator {
  private readonly config: OrchestrationConfig;
  private readonly logger: LoggerLike;
  private readonly sink: HeartbeatSink | undefined;
  private stage: PipelineStage = 'initialize';
  private sourceId: string | undefined;
  private displayName = '';

  constructor(config: OrchestrationConfig) {
    this.config = createOrchestrationConfig(config);
    this.logger = getJobLogger(config.jobId);
    this.sink = config.sink
      ? new HeartbeatSink(config.sink, {
          intervalMs: config.heartbeatIntervalMs,
          clock: config.clock,
          logger: this.logger,
        })
      : undefined;
  }

  get currentStage(): PipelineStage {
    return this.stage;
  }

  async run(): Promise<JobOutcome> {
    const { jobId, url, strategy } = this.config;
    this.logger.info({ url, strategy }, 'Starting crawl orchestration');
    this.sink?.startTimer(() => this.config.mapper.getCurrentStage());

    try {
      const summary = await this.execute();
      this.logger.info({ sourceId: summary.sourceId, chunks: summary.chunks }, 'Crawl completed');
      return { jobId, state: 'completed', sourceId: summary.sourceId, summary };
    } catch (error) {
      if (this.isCancellation(error)) {
        return await this.handleCancellation();
      }
      return await this.handleFailure(error);
    } finally {
      this.sink?.stopTimer();
    }
  }

  private async execute(): Promise<CompletionPayload> {
    await this.runStage('initialize', () => this.initialize());
    const fetched = await this.runStage('fetch', () => this.fetch());
    const stored = await this.runStage('process', () => this.processDocuments(fetched));
    const codeExamples = await this.runStage('extract', () =>
      this.extractCodeExamples(fetched, stored),
    );
    return this.runStage('finalize', () => this.finalize(fetched, stored, codeExamples));
  }

  private async runStage<T>(stage: PipelineStage, body: () => Promise<T>): Promise<T> {
    this.config.token.throwIfCancelled({ jobId: this.config.jobId, stage });
    this.stage = stage;
    this.config.lifecycle.transition(STAGE_STATES[stage]);
    this.logger.debug({ stage, sourceId: this.sourceId }, 'Entering stage');

    try {
      const result = await body();
      await this.sink?.pulse(stage);
      return result;
    } catch (error) {
      throw this.isCancellation(error) ? error : this.withStageContext(error, stage);
    }
  }

  private withStageContext(error: unknown, stage: PipelineStage): IngestError {
    const ingestError = ensureIngestError(error, { kind: STAGE_ERROR_KINDS[stage] });
    return new IngestError({
      message: ingestError.message,
      kind: ingestError.kind,
      severity: ingestError.severity,
      details: {
        ...ingestError.details,
        stage,
        jobId: this.config.jobId,
        sourceId: this.sourceId,
      },
      cause: ingestError.cause ?? ingestError,
    });
  }

  private async initialize(): Promise<string> {
    const { url, repository, options, token } = this.config;
    const sourceId = deriveSourceId(url);
    this.displayName = extractDisplayName(url);

    await this.sink?.start({
      url,
      status: 'initialize',
      progress: 0,
      message: `Starting crawl of ${url}`,
    });

    await repository.upsertSource({
      sourceId,
      url,
      displayName: this.displayName,
      status: 'pending',
      knowledgeType: options.knowledgeType,
      tags: options.tags,
    });
    this.sourceId = sourceId;
    this.logger.info({ sourceId, displayName: this.displayName }, 'Derived source identifier');

    await this.reportMapped('initialize', 100, `Starting crawl of ${url}`, {
      currentUrl: url,
      sourceId,
    });
    token.throwIfCancelled({ jobId: this.config.jobId, stage: 'initialize' });
    return sourceId;
  }

  private async fetch(): Promise<FetchResult> {
    const { url, strategy, options, fetcher, siteDetector, token } = this.config;
    const isDocumentationSite = siteDetector.isDocumentationSite(url);

    await this.reportMapped('fetch', 0, `Analyzing URL type for ${url}`, {
      totalPages: 1,
      processedPages: 0,
      isDocumentationSite,
    });

    const result = await routeByStrategy({
      url,
      strategy,
      options,
      fetcher,
      token,
      isDocumentationSite,
      progress: this.callbackFor('fetch'),
      defaultMaxDepth: this.config.defaultMaxDepth,
      logger: this.logger,
    });
    token.throwIfCancelled({ jobId: this.config.jobId, stage: 'fetch' });

    if (result.documents.length === 0) {
      throw createFetchError('No content was crawled from the provided URL', { url }, {
        severity: 'fatal',
      });
    }

    await this.reportMapped('fetch', 100, `Processing ${result.crawlType} content`, {
      crawlType: result.crawlType,
      totalPages: result.documents.length,
      processedPages: result.documents.length,
    });
    return result;
  }

  private async processDocuments(fetched: FetchResult): Promise<ProcessResult> {
    const { url, repository, processor, options, token } = this.config;
    const sourceId = this.requireSourceId();
    const totalPages = fetched.documents.length;

    await repository.updateSourceStatus(sourceId, 'processing');
    await this.reportMapped('process', 0, 'Processing crawled content', { totalPages });

    const result = await processor.process({
      sourceId,
      sourceUrl: url,
      displayName: this.displayName,
      crawlType: fetched.crawlType,
      documents: fetched.documents,
      options,
      progress: this.callbackFor('process'),
      token,
    });

    if (result.chunkCount > 0 && result.chunksStored === 0) {
      throw createStorageError(
        `Failed to store documents: ${result.chunkCount} chunks processed but 0 stored`,
        { url, sourceId },
      );
    }

    this.sourceId = result.sourceId;
    await this.reportMapped('process', 100, `Stored ${result.chunksStored} chunks`, {
      sourceId: result.sourceId,
      chunksStored: result.chunksStored,
      totalPages,
    });
    return result;
  }

  private async extractCodeExamples(fetched: FetchResult, stored: ProcessResult): Promise<number> {
    const { options, codeExtractor, token } = this.config;

    if (options.extractCodeExamples === false || stored.chunksStored === 0) {
      await this.reportMapped('extract', 100, 'Code extraction skipped', { codeExamplesFound: 0 });
      return 0;
    }

    await this.reportMapped('extract', 0, 'Starting code extraction...');

    let count: number;
    try {
      count = await codeExtractor.extract({
        sourceId: stored.sourceId,
        documents: fetched.documents,
        urlToFullDocument: stored.urlToFullDocument,
        progress: this.callbackFor('extract'),
        token,
      });
    } catch (error) {
      if (this.isCancellation(error)) {
        throw error;
      }

      const extractError = ensureIngestError(error, { kind: 'extract', severity: 'recoverable' });
      if (extractError.kind !== 'extract') {
        throw extractError;
      }

      reportIngestError(
        extractError,
        { stage: 'extract', jobId: this.config.jobId, sourceId: stored.sourceId },
        { throwOnFatal: false, logger: this.logger },
      );
      await this.reportMapped(
        'extract',
        100,
        `Code extraction failed: ${extractError.message}. Continuing crawl without code examples.`,
        { codeExamplesFound: 0 },
      );
      return 0;
    }

    await this.reportMapped('extract', 100, `Extracted ${count} code examples`, {
      codeExamplesFound: count,
    });
    return count;
  }

  private async finalize(
    fetched: FetchResult,
    stored: ProcessResult,
    codeExamples: number,
  ): Promise<CompletionPayload> {
    const { repository } = this.config;
    const sourceId = stored.sourceId;

    await this.reportMapped('finalize', 0, 'Finalizing crawl results...', {
      chunksStored: stored.chunksStored,
      codeExamplesFound: codeExamples,
    });

    await repository.updateSourceStatus(sourceId, 'completed');
    const persisted = await repository.getSource(sourceId);
    if (persisted?.status !== 'completed') {
      throw createStorageError('Source status update to completed did not persist', {
        sourceId,
        actual: persisted?.status ?? 'missing',
      });
    }

    const payload: CompletionPayload = {
      chunks: stored.chunksStored,
      codeExamples,
      processed: fetched.documents.length,
      total: fetched.documents.length,
      sourceId,
      crawlType: fetched.crawlType,
    };

    await this.reportMapped(
      'finalize',
      100,
      `Crawl completed: ${payload.chunks} chunks, ${payload.codeExamples} code examples`,
      {
        chunksStored: payload.chunks,
        codeExamplesFound: payload.codeExamples,
        processedPages: payload.processed,
        totalPages: payload.total,
      },
    );
    await this.sink?.complete(payload);
    this.config.lifecycle.transition('completed');
    return payload;
  }

  private async handleCancellation(): Promise<JobOutcome> {
    const { jobId, lifecycle, mapper } = this.config;
    this.sink?.stopTimer();
    if (lifecycle.canTransition('cancelled')) {
      lifecycle.transition('cancelled');
    }

    this.logger.info({ stage: this.stage, sourceId: this.sourceId }, 'Crawl operation cancelled');

    try {
      await this.sink?.update('cancelled', mapper.mapProgress('cancelled', 0), CANCELLED_MESSAGE, {
        cancelled: true,
        stage: this.stage,
      });
    } catch (error) {
      this.logger.warn({ err: error }, 'Failed to report cancellation to the progress sink');
    }

    return { jobId, state: 'cancelled', sourceId: this.sourceId };
  }

  private async handleFailure(error: unknown): Promise<JobOutcome> {
    const { jobId, url, lifecycle, mapper, repository } = this.config;
    this.sink?.stopTimer();
    const ingestError: IngestError = ensureIngestError(error, {
      kind: STAGE_ERROR_KINDS[this.stage],
    });

    if (lifecycle.canTransition('failed')) {
      lifecycle.transition('failed');
    }

    reportIngestError(
      ingestError,
      { jobId, stage: this.stage, sourceId: this.sourceId, url },
      { throwOnFatal: false, logger: this.logger },
    );
    mapper.mapProgress('failed', 0);

    if (this.sourceId) {
      try {
        await repository.updateSourceStatus(this.sourceId, 'failed');
      } catch (statusError) {
        this.logger.warn(
          { err: statusError, sourceId: this.sourceId },
          'Failed to mark source as failed',
        );
      }
    }

    try {
      await this.sink?.error(`Crawl failed: ${ingestError.message}`);
    } catch (sinkError) {
      this.logger.warn({ err: sinkError }, 'Failed to report failure to the progress sink');
    }

    return { jobId, state: 'failed', sourceId: this.sourceId, error: ingestError.message };
  }

  private isCancellation(error: unknown): boolean {
    if (isCancellationError(error)) {
      return true;
    }

    return (
      this.config.token.isCancelled() && error instanceof Error && error.name === 'AbortError'
    );
  }

  private callbackFor(stage: PipelineStage): ProgressCallback {
    return createProgressCallback(this.sink, this.config.mapper, stage);
  }

  private async reportMapped(
    stage: PipelineStage,
    stageLocalPercent: number,
    message: string,
    details?: ProgressDetails,
  ): Promise<void> {
    const progress = this.config.mapper.mapProgress(stage, stageLocalPercent);
    await this.sink?.update(stage, progress, message, details);
  }

  private requireSourceId(): string {
    if (!this.sourceId) {
      throw createStorageError('Source identifier was not initialised', {
        jobId: this.config.jobId,
      });
    }
    return this.sourceId;
  }
}
