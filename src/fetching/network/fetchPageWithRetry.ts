import { ensureIngestError, isCancellationError, type IngestError } from '../../errors.js';
import type { CancellationToken } from '../../jobs/cancellation.js';
import { fetchPage, isRetryableFetchError } from './fetchPage.js';

export interface FetchOutcome {
  ok: boolean;
  url: string;
  status: number | null;
  contentType?: string;
  body?: string;
  failureReason?: string;
  error?: IngestError;
}

const DEFAULT_MAX_RETRIES = 1;
const RETRY_BACKOFF_MS = 100;

/** Never rejects for network or HTTP failures; cancellation still propagates. */
export async function fetchPageWithRetry(
  url: string,
  timeoutMs: number,
  token?: CancellationToken,
): Promise<FetchOutcome> {
  let lastError: IngestError | undefined;

  for (let attempt = 0; attempt <= DEFAULT_MAX_RETRIES; attempt += 1) {
    try {
      const response = await fetchPage(url, { timeoutMs, token });
      const contentType = response.headers.get('content-type') ?? undefined;
      const finalUrl = response.url || url;

      if (!response.ok) {
        return {
          ok: false,
          url: finalUrl,
          status: response.status,
          contentType,
          failureReason: `HTTP ${response.status}`,
        };
      }

      return {
        ok: true,
        url: finalUrl,
        status: response.status,
        contentType,
        body: await response.text(),
      };
    } catch (error) {
      if (isCancellationError(error)) {
        throw error;
      }

      const ingestError = ensureIngestError(error, { kind: 'fetch', severity: 'recoverable' });
      lastError = ingestError;

      if (attempt === DEFAULT_MAX_RETRIES || !isRetryableFetchError(error)) {
        return {
          ok: false,
          url,
          status: null,
          failureReason: ingestError.message,
          error: ingestError,
        };
      }

      await delay(RETRY_BACKOFF_MS * (attempt + 1));
    }
  }

  return {
    ok: false,
    url,
    status: null,
    failureReason: lastError?.message ?? 'Request failed',
    error: lastError,
  };
}

async function delay(ms: number): Promise<void> {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
