export type ErrorKind =
  | 'validation'
  | 'config'
  | 'fetch'
  | 'parse'
  | 'process'
  | 'storage'
  | 'extract'
  | 'cancelled'
  | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

export interface IngestErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class IngestError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity = 'recoverable', details, cause }: IngestErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = `${capitalize(kind)}Error`;
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }
}

/** Raised at a cancellation checkpoint once a job's token has fired. */
export class JobCancelledError extends IngestError {
  constructor(details: Record<string, unknown> = {}, reason?: string) {
    super({
      message: reason ? `Crawl operation was cancelled: ${reason}` : 'Crawl operation was cancelled',
      kind: 'cancelled',
      severity: 'recoverable',
      details,
    });
    this.name = 'JobCancelledError';
  }
}

export function isIngestError(value: unknown): value is IngestError {
  return value instanceof IngestError;
}

export function isCancellationError(value: unknown): boolean {
  return isIngestError(value) && value.kind === 'cancelled';
}

export function ensureIngestError(
  error: unknown,
  fallback: Partial<IngestErrorProps> & Pick<IngestErrorProps, 'kind'> = { kind: 'internal' },
): IngestError {
  if (isIngestError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new IngestError({
    message,
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

export function createValidationError(
  message: string,
  details: Record<string, unknown> = {},
): IngestError {
  return new IngestError({ message, kind: 'validation', severity: 'fatal', details });
}

export function createConfigurationError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): IngestError {
  return new IngestError({
    message,
    kind: 'config',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createFetchError(
  message: string,
  details: Record<string, unknown> = {},
  options: { severity?: ErrorSeverity; cause?: unknown } = {},
): IngestError {
  return new IngestError({
    message,
    kind: 'fetch',
    severity: options.severity ?? 'recoverable',
    details,
    cause: options.cause,
  });
}

export function createParseError(
  message: string,
  details: Record<string, unknown> = {},
  options: { severity?: ErrorSeverity; cause?: unknown } = {},
): IngestError {
  return new IngestError({
    message,
    kind: 'parse',
    severity: options.severity ?? 'recoverable',
    details,
    cause: options.cause,
  });
}

export function createProcessError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): IngestError {
  return new IngestError({
    message,
    kind: 'process',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createStorageError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): IngestError {
  return new IngestError({
    message,
    kind: 'storage',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createExtractError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): IngestError {
  return new IngestError({
    message,
    kind: 'extract',
    severity: 'recoverable',
    details,
    cause: options.cause,
  });
}

export function createInternalError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown; severity?: ErrorSeverity } = {},
): IngestError {
  return new IngestError({
    message,
    kind: 'internal',
    severity: options.severity ?? 'fatal',
    details,
    cause: options.cause,
  });
}

function capitalize(value: string): string {
  if (!value) {
    return value;
  }
  return value.charAt(0).toUpperCase() + value.slice(1);
}
