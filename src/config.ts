import { createConfigurationError } from './errors.js';
import type { PipelineStage } from './types.js';

export type StageBand = readonly [start: number, end: number];

export type StageWeights = Readonly<Record<PipelineStage, StageBand>>;

export const PIPELINE_STAGES: readonly PipelineStage[] = [
  'initialize',
  'fetch',
  'process',
  'extract',
  'finalize',
];

export const DEFAULT_STAGE_WEIGHTS: StageWeights = {
  initialize: [0, 5],
  fetch: [5, 40],
  process: [40, 70],
  extract: [70, 90],
  finalize: [90, 100],
};

export interface ServiceOptions {
  heartbeatIntervalMs: number;
  maxConcurrent: number;
  requestTimeoutMs: number;
  maxDepth: number;
  maxPages?: number;
  chunkSize: number;
  stageWeights: StageWeights;
  logLevel: string;
}

export type ServiceConfig = Partial<ServiceOptions>;

export const DEFAULT_SERVICE_OPTIONS: ServiceOptions = {
  heartbeatIntervalMs: 30_000,
  maxConcurrent: 8,
  requestTimeoutMs: 10_000,
  maxDepth: 2,
  maxPages: undefined,
  chunkSize: 5_000,
  stageWeights: DEFAULT_STAGE_WEIGHTS,
  logLevel: 'silent',
};

export function resolveServiceOptions(config: ServiceConfig = {}): ServiceOptions {
  const options: ServiceOptions = {
    ...DEFAULT_SERVICE_OPTIONS,
    ...config,
  };

  options.heartbeatIntervalMs = coercePositiveInteger(
    config.heartbeatIntervalMs ?? DEFAULT_SERVICE_OPTIONS.heartbeatIntervalMs,
    'heartbeat-interval-ms',
  );
  options.maxConcurrent = coercePositiveInteger(
    config.maxConcurrent ?? DEFAULT_SERVICE_OPTIONS.maxConcurrent,
    'max-concurrent',
  );
  options.requestTimeoutMs = coercePositiveInteger(
    config.requestTimeoutMs ?? DEFAULT_SERVICE_OPTIONS.requestTimeoutMs,
    'request-timeout-ms',
  );
  options.maxDepth = coerceNonNegativeInteger(
    config.maxDepth ?? DEFAULT_SERVICE_OPTIONS.maxDepth,
    'max-depth',
  );
  options.chunkSize = coercePositiveInteger(
    config.chunkSize ?? DEFAULT_SERVICE_OPTIONS.chunkSize,
    'chunk-size',
  );

  if (config.maxPages !== undefined) {
    options.maxPages = coercePositiveInteger(config.maxPages, 'max-pages');
  }

  options.stageWeights = config.stageWeights ?? DEFAULT_STAGE_WEIGHTS;
  validateStageWeights(options.stageWeights);
  options.logLevel = config.logLevel ?? DEFAULT_SERVICE_OPTIONS.logLevel;

  return options;
}

/**
 * Reads service overrides from the environment. Unset or blank variables are
 * skipped; malformed numbers fail fast.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const overrides: ServiceConfig = {};

  const heartbeat = readNumber(env, 'INGEST_HEARTBEAT_INTERVAL_MS');
  if (heartbeat !== undefined) {
    overrides.heartbeatIntervalMs = heartbeat;
  }

  const maxConcurrent = readNumber(env, 'INGEST_MAX_CONCURRENT');
  if (maxConcurrent !== undefined) {
    overrides.maxConcurrent = maxConcurrent;
  }

  const timeout = readNumber(env, 'INGEST_REQUEST_TIMEOUT_MS');
  if (timeout !== undefined) {
    overrides.requestTimeoutMs = timeout;
  }

  const logLevel = env.INGEST_LOG_LEVEL?.trim();
  if (logLevel) {
    overrides.logLevel = logLevel;
  }

  return overrides;
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${name} must be a finite number.`, { name, value: raw });
  }

  return parsed;
}

export function coercePositiveInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

export function coerceNonNegativeInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw createConfigurationError(`${field} must be zero or a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

export function validateStageWeights(weights: StageWeights): void {
  let previousEnd = 0;

  for (const stage of PIPELINE_STAGES) {
    const band = weights[stage];
    const [start, end] = band;

    if (!Number.isFinite(start) || !Number.isFinite(end) || start < 0 || end > 100) {
      throw createConfigurationError(`Stage band for ${stage} must lie within 0-100.`, {
        stage,
        band,
      });
    }

    if (start > end) {
      throw createConfigurationError(`Stage band for ${stage} starts after it ends.`, {
        stage,
        band,
      });
    }

    if (start < previousEnd) {
      throw createConfigurationError(`Stage band for ${stage} overlaps the previous stage.`, {
        stage,
        band,
        previousEnd,
      });
    }

    previousEnd = end;
  }
}
