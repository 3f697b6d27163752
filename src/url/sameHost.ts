import { removeDefaultPort } from './normalizeUrl.js';

/**
 * Recursive crawls stay on the host they started from. A leading `www.` and an
 * explicit default port do not make a different host.
 */
export function isSameHost(a: string | URL, b: string | URL): boolean {
  const left = hostKey(a);
  const right = hostKey(b);
  return left !== undefined && left === right;
}

function hostKey(value: string | URL): string | undefined {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return undefined;
  }

  removeDefaultPort(url);
  const host = url.hostname.toLowerCase().replace(/^www\./, '');
  return url.port ? `${host}:${url.port}` : host;
}
