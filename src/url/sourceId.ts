import { createHash } from 'node:crypto';

import { normalizeUrl } from './normalizeUrl.js';

/**
 * Stable identifier for the source behind a URL. Equivalent spellings of the
 * same URL (case, default port, trailing slash, fragment) share one id.
 */
export function deriveSourceId(url: string): string {
  const normalized = normalizeUrl(url) ?? url;
  const host = hostOf(normalized);
  const digest = createHash('sha256').update(normalized).digest('hex').slice(0, 16);
  return host ? `${host}_${digest}` : digest;
}

export function extractDisplayName(url: string): string {
  try {
    const parsed = new URL(url);
    const host = parsed.hostname.toLowerCase().replace(/^www\./, '');
    const path = parsed.pathname.replace(/\/+$/, '');
    return path && path !== '/' ? `${host}${path}` : host;
  } catch {
    return url;
  }
}

function hostOf(url: string): string | undefined {
  try {
    return new URL(url).hostname;
  } catch {
    return undefined;
  }
}
