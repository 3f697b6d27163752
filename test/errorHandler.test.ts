import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createFetchError, createInternalError } from '../src/errors.js';
import { getLogger, setLoggerInstance, type LoggerLike } from '../src/logger.js';
import { buildLogMessage, reportIngestError } from '../src/util/errorHandler.js';
import { createRecordingLogger, type LogEntry } from './helpers/fakes.js';

let entries: LogEntry[];
let previousLogger: LoggerLike;

beforeEach(() => {
  previousLogger = getLogger();
  entries = [];
  setLoggerInstance(createRecordingLogger(entries));
});

afterEach(() => {
  setLoggerInstance(previousLogger);
});

function levels(): string[] {
  return entries.map((entry) => entry.level);
}

describe('reportIngestError', () => {
  it('logs recoverable errors as warnings without throwing', () => {
    const error = createFetchError('retry later', { url: 'https://example.com' });

    expect(() => {
      reportIngestError(error, { stage: 'fetch', attempt: 1 });
    }).not.toThrow();

    expect(levels()).toEqual(['warn']);
    expect(entries[0]?.args[1]).toBe(
      '[fetch/recoverable] retry later (attempt=1 stage="fetch" url="https://example.com")',
    );
  });

  it('throws on fatal errors by default', () => {
    const fatalError = createInternalError('boom');
    expect(() => reportIngestError(fatalError, { stage: 'orchestrate' })).toThrowError(fatalError);
    expect(levels()).toEqual(['error']);
  });

  it('can suppress throwing on fatal errors when requested', () => {
    const fatalError = createInternalError('boom');
    expect(() =>
      reportIngestError(fatalError, { stage: 'orchestrate' }, { throwOnFatal: false }),
    ).not.toThrow();
    expect(levels()).toEqual(['error']);
  });

  it('wraps unknown errors as fatal internal errors', () => {
    const result = reportIngestError('oops', { stage: 'cli' }, { throwOnFatal: false });
    expect(result.kind).toBe('internal');
    expect(result.severity).toBe('fatal');
    expect(result.message).toBe('oops');
    expect(levels()).toEqual(['error']);
  });

  it('prefers an explicit logger over the active one', () => {
    const own = createRecordingLogger();
    reportIngestError(createFetchError('flaky'), { jobId: 'job-1' }, { logger: own });

    expect(own.entries).toHaveLength(1);
    expect(entries).toHaveLength(0);
  });
});

describe('buildLogMessage', () => {
  it('omits the context suffix when every value is undefined', () => {
    const error = createFetchError('offline');
    expect(buildLogMessage(error, { url: undefined })).toBe('[fetch/recoverable] offline');
  });
});
