import { load, type CheerioAPI } from 'cheerio';
import type { Element as CheerioElement } from 'domhandler';

import { createParseError } from '../../errors.js';

export interface ExtractedContent {
  title?: string;
  markdown: string;
}

export interface ExtractContentOptions {
  /** Restrict extraction to `main`/`article` when the page has one. */
  preferMainContent?: boolean;
}

const BLOCK_SELECTOR = 'h1, h2, h3, h4, h5, h6, p, pre, li, blockquote';
const CONTAINER_SELECTOR = 'p, pre, li, blockquote';
const NOISE_SELECTOR = 'script, style, noscript, template, nav, footer, header, aside, form';
const LANGUAGE_CLASS = /(?:^|\s)(?:language|lang)-([\w#+-]+)/;

/**
 * Reduces an HTML page to markdown-ish text: headings, paragraphs, list items,
 * quotes and fenced `pre` blocks, in document order.
 */
export function extractContent(html: string, options: ExtractContentOptions = {}): ExtractedContent {
  try {
    const $ = load(html);
    const title = readTitle($);

    $(NOISE_SELECTOR).remove();
    const root = selectRoot($, options.preferMainContent ?? false);

    const blocks: string[] = [];
    root.find(BLOCK_SELECTOR).each((_idx: number, element: CheerioElement) => {
      const node = $(element);
      if (node.parent().closest(CONTAINER_SELECTOR).length > 0) {
        return;
      }

      const block = renderBlock($, element);
      if (block) {
        blocks.push(block);
      }
    });

    if (blocks.length === 0) {
      const text = collapseWhitespace(root.text());
      return { title, markdown: text };
    }

    return { title, markdown: blocks.join('\n\n') };
  } catch (error) {
    throw createParseError('Failed to extract content from HTML', { htmlLength: html.length }, {
      cause: error,
    });
  }
}

function readTitle($: CheerioAPI): string | undefined {
  const title = collapseWhitespace($('title').first().text()) || collapseWhitespace($('h1').first().text());
  return title || undefined;
}

function selectRoot($: CheerioAPI, preferMainContent: boolean) {
  if (preferMainContent) {
    const main = $('main').first();
    if (main.length > 0) {
      return main;
    }

    const article = $('article').first();
    if (article.length > 0) {
      return article;
    }
  }

  return $('body').first();
}

function renderBlock($: CheerioAPI, element: CheerioElement): string {
  const node = $(element);
  const tag = element.tagName.toLowerCase();

  if (tag === 'pre') {
    const code = node.text().replace(/\s+$/, '');
    if (!code) {
      return '';
    }
    const className = node.find('code').first().attr('class') ?? node.attr('class') ?? '';
    const language = LANGUAGE_CLASS.exec(className)?.[1] ?? '';
    return `\`\`\`${language}\n${code}\n\`\`\``;
  }

  const text = collapseWhitespace(node.text());
  if (!text) {
    return '';
  }

  const heading = /^h([1-6])$/.exec(tag);
  if (heading) {
    return `${'#'.repeat(Number(heading[1]))} ${text}`;
  }

  if (tag === 'li') {
    return `- ${text}`;
  }

  if (tag === 'blockquote') {
    return `> ${text}`;
  }

  return text;
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}
