import { load } from 'cheerio';
import type { Element as CheerioElement } from 'domhandler';

import { createParseError } from '../../errors.js';

/** Page URLs listed in `<loc>` elements, in document order without duplicates. */
export function parseSitemapXml(xml: string): string[] {
  try {
    const $ = load(xml, { xml: true });
    const urls = new Set<string>();

    $('url > loc').each((_idx: number, element: CheerioElement) => {
      const loc = $(element).text().trim();
      if (loc) {
        urls.add(loc);
      }
    });

    return [...urls];
  } catch (error) {
    throw createParseError('Failed to parse sitemap XML', { xmlLength: xml.length }, { cause: error });
  }
}
