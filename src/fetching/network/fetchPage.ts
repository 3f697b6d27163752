import { createFetchError, isIngestError, type IngestError } from '../../errors.js';
import type { CancellationToken } from '../../jobs/cancellation.js';

export interface FetchPageOptions {
  timeoutMs: number;
  token?: CancellationToken;
}

export const USER_AGENT = 'ingest-orchestrator/0.1';

const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN']);

/**
 * GET with a per-request timeout. The job token aborts the request as well;
 * in that case the cancellation error is thrown instead of a fetch error.
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<Response> {
  const { timeoutMs, token } = options;
  token?.throwIfCancelled({ url });

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const unsubscribe = token?.onCancel(() => controller.abort()) ?? (() => undefined);

  try {
    return await fetch(url, {
      redirect: 'follow',
      signal: controller.signal,
      headers: {
        'user-agent': USER_AGENT,
        accept: 'text/html,application/xhtml+xml,application/xml,text/plain,text/markdown,*/*;q=0.8',
      },
    });
  } catch (error) {
    token?.throwIfCancelled({ url });

    const err = error instanceof Error ? error : new Error(String(error));
    const timedOut = controller.signal.aborted && err.name === 'AbortError';
    const code = extractErrorCode(err);
    const message = timedOut ? `Request timed out after ${timeoutMs}ms` : err.message || 'Request failed';

    throw createFetchError(
      message,
      {
        url,
        timeoutMs,
        ...(code ? { code } : {}),
      },
      { cause: err },
    );
  } finally {
    clearTimeout(timeoutId);
    unsubscribe();
  }
}

export function isRetryableFetchError(error: unknown): boolean {
  if (!(error instanceof Error) || error.name === 'AbortError') {
    return false;
  }

  const code = extractErrorCode(error);
  return Boolean(code && RETRYABLE_ERROR_CODES.has(code));
}

function extractErrorCode(error: Error | IngestError): string | undefined {
  if (isIngestError(error)) {
    const detailsCode = error.details?.code;
    if (typeof detailsCode === 'string') {
      return detailsCode;
    }
  }

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  if (error.cause instanceof Error) {
    return extractErrorCode(error.cause);
  }

  return undefined;
}
