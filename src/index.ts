import { resolveServiceOptions, type ServiceConfig } from './config.js';
import { HttpContentFetcher } from './fetching/httpContentFetcher.js';
import { DocumentationSiteDetector } from './fetching/siteDetector.js';
import { IngestService, type IngestServiceDependencies } from './jobs/ingestService.js';
import { configureLogger } from './logger.js';
import { ChunkingDocumentProcessor } from './processing/chunkingProcessor.js';
import { FencedCodeExampleExtractor } from './processing/codeExampleExtractor.js';
import { InMemoryRepository } from './storage/memoryRepository.js';

export type CreateIngestServiceOptions = ServiceConfig &
  Partial<Omit<IngestServiceDependencies, 'options'>>;

/**
 * Wires an {@link IngestService}. Collaborators that are not supplied fall back
 * to the reference implementations.
 */
export function createIngestService(config: CreateIngestServiceOptions = {}): IngestService {
  const {
    repository: suppliedRepository,
    fetcher,
    siteDetector,
    processor,
    codeExtractor,
    registry,
    progressStore,
    clock,
    ...serviceConfig
  } = config;
  const options = resolveServiceOptions(serviceConfig);
  if (serviceConfig.logLevel !== undefined) {
    configureLogger({ level: options.logLevel });
  }

  const repository = suppliedRepository ?? new InMemoryRepository(clock);

  return new IngestService({
    repository,
    fetcher:
      fetcher ??
      new HttpContentFetcher({
        requestTimeoutMs: options.requestTimeoutMs,
        maxConcurrent: options.maxConcurrent,
        maxDepth: options.maxDepth,
      }),
    siteDetector: siteDetector ?? new DocumentationSiteDetector(),
    processor: processor ?? new ChunkingDocumentProcessor(repository, { chunkSize: options.chunkSize }),
    codeExtractor: codeExtractor ?? new FencedCodeExampleExtractor(repository),
    registry,
    progressStore,
    clock,
    options,
  });
}

export { DEFAULT_SERVICE_OPTIONS, DEFAULT_STAGE_WEIGHTS, readEnvOverrides, resolveServiceOptions } from './config.js';
export type { ServiceConfig, ServiceOptions, StageBand, StageWeights } from './config.js';
export * from './errors.js';
export { HttpContentFetcher } from './fetching/httpContentFetcher.js';
export { DocumentationSiteDetector } from './fetching/siteDetector.js';
export { CancellationToken } from './jobs/cancellation.js';
export { IngestService, deriveJobId } from './jobs/ingestService.js';
export type { IngestServiceDependencies } from './jobs/ingestService.js';
export { JobHandle } from './jobs/jobHandle.js';
export { JobRegistry } from './jobs/registry.js';
export { JobStateMachine, type JobState } from './jobs/jobState.js';
export { configureLogger, getLogger, setLoggerInstance, type LoggerLike } from './logger.js';
export { StageOrchestrator, type OrchestrationConfig } from './orchestrator/stageOrchestrator.js';
export { routeByStrategy, isCrawlStrategy, CRAWL_STRATEGIES } from './orchestrator/strategyRouter.js';
export { ChunkingDocumentProcessor, chunkMarkdown } from './processing/chunkingProcessor.js';
export { FencedCodeExampleExtractor } from './processing/codeExampleExtractor.js';
export { HEARTBEAT_MESSAGE, HeartbeatSink } from './progress/heartbeat.js';
export { NOOP_PROGRESS, createProgressCallback, type ProgressCallback } from './progress/progressCallback.js';
export { ProgressMapper } from './progress/progressMapper.js';
export { InMemoryProgressTracker, ProgressStore, type ProgressSnapshot } from './progress/progressTracker.js';
export { InMemoryRepository } from './storage/memoryRepository.js';
export { isSelfLink } from './url/isSelfLink.js';
export type * from './types.js';
