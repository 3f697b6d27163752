import type { SiteDetector } from '../types.js';

const DOCUMENTATION_HOST_PREFIXES = ['docs.', 'doc.', 'developer.', 'developers.', 'wiki.'];
const DOCUMENTATION_HOST_SUFFIXES = ['.readthedocs.io', '.gitbook.io', '.mintlify.app'];
const DOCUMENTATION_PATH = /\/(docs?|documentation|reference|api-reference|guides?|manual)(\/|$)/i;

export class DocumentationSiteDetector implements SiteDetector {
  isDocumentationSite(url: string): boolean {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }

    const host = parsed.hostname.toLowerCase();
    if (DOCUMENTATION_HOST_PREFIXES.some((prefix) => host.startsWith(prefix))) {
      return true;
    }

    if (DOCUMENTATION_HOST_SUFFIXES.some((suffix) => host.endsWith(suffix))) {
      return true;
    }

    return DOCUMENTATION_PATH.test(parsed.pathname);
  }
}
