import {
  IngestError,
  ensureIngestError,
  type ErrorKind,
  type ErrorSeverity,
} from '../errors.js';
import { getLogger, type LoggerLike } from '../logger.js';

export interface ErrorContext extends Record<string, unknown> {
  stage?: string;
  jobId?: string;
  sourceId?: string;
  url?: string;
  attempt?: number;
}

export interface ErrorHandlingOptions {
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  throwOnFatal?: boolean;
  logger?: LoggerLike;
}

export function reportIngestError(
  error: unknown,
  context: ErrorContext = {},
  options: ErrorHandlingOptions = {},
): IngestError {
  const ingestError = ensureIngestError(error, {
    kind: options.defaultKind ?? 'internal',
    severity: options.defaultSeverity,
    details: context,
  });

  const mergedDetails: Record<string, unknown> = {
    ...(ingestError.details ?? {}),
    ...context,
  };

  const message = buildLogMessage(ingestError, mergedDetails);
  const logger = options.logger ?? getLogger();
  const shouldThrow = options.throwOnFatal ?? true;

  if (ingestError.severity === 'fatal') {
    logger.error({ err: ingestError, ...mergedDetails }, message);
    if (shouldThrow) {
      throw ingestError;
    }
  } else {
    logger.warn({ ...mergedDetails, kind: ingestError.kind }, message);
  }

  return ingestError;
}

export function buildLogMessage(error: IngestError, details: Record<string, unknown>): string {
  const severity = error.severity ?? 'unknown';
  const parts = [`[${error.kind}/${severity}]`, error.message];
  const contextSuffix = serialiseDetails(details);

  if (contextSuffix) {
    parts.push(`(${contextSuffix})`);
  }

  return parts.join(' ');
}

function serialiseDetails(details: Record<string, unknown>): string | undefined {
  const entries = Object.entries(details).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    return undefined;
  }

  entries.sort(([a], [b]) => a.localeCompare(b));
  return entries
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(' ');
}
