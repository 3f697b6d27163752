import { getLogger } from '../logger.js';
import { removeDefaultPort } from './normalizeUrl.js';

/**
 * True when `candidate` points back at `base`: scheme and host compared
 * case-insensitively, default ports dropped, one trailing slash ignored,
 * fragments ignored, query strings kept. Unparseable input is compared as
 * plain strings.
 */
export function isSelfLink(candidate: string, base: string): boolean {
  const normalizedCandidate = normalizeForComparison(candidate);
  const normalizedBase = normalizeForComparison(base);

  if (normalizedCandidate === null || normalizedBase === null) {
    getLogger().debug({ candidate, base }, 'Falling back to raw comparison for self-link check');
    return candidate === base;
  }

  return normalizedCandidate === normalizedBase;
}

function normalizeForComparison(raw: string): string | null {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return null;
  }

  url.hash = '';
  removeDefaultPort(url);

  const scheme = url.protocol.toLowerCase();
  const host = url.hostname.toLowerCase();
  const port = url.port ? `:${url.port}` : '';
  const path = url.pathname.endsWith('/') ? url.pathname.slice(0, -1) : url.pathname;

  return `${scheme}//${host}${port}${path}${url.search}`;
}
