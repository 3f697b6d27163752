import { createExtractError } from '../errors.js';
import type {
  CodeExample,
  CodeExampleExtractor,
  ExtractRequest,
  Repository,
} from '../types.js';
import { findFencedBlocks, type FencedBlock } from './markdownBlocks.js';

export interface CodeExtractorOptions {
  /** Blocks shorter than this many characters are ignored. */
  minLength?: number;
  contextLength?: number;
}

const DEFAULT_MIN_LENGTH = 40;
const DEFAULT_CONTEXT_LENGTH = 200;

export class FencedCodeExampleExtractor implements CodeExampleExtractor {
  private readonly minLength: number;
  private readonly contextLength: number;

  constructor(
    private readonly repository: Repository,
    options: CodeExtractorOptions = {},
  ) {
    this.minLength = options.minLength ?? DEFAULT_MIN_LENGTH;
    this.contextLength = options.contextLength ?? DEFAULT_CONTEXT_LENGTH;
  }

  async extract(request: ExtractRequest): Promise<number> {
    const { sourceId, documents, urlToFullDocument, progress, token } = request;
    const total = documents.length;
    let stored = 0;

    for (const [index, document] of documents.entries()) {
      token.throwIfCancelled({ url: document.url, stage: 'extract' });

      const markdown = urlToFullDocument.get(document.url) ?? document.markdown;
      const examples = this.examplesFrom(document.url, markdown);
      if (examples.length > 0) {
        stored += await this.repository.storeCodeExamples(sourceId, examples);
      }

      await progress.report(((index + 1) / total) * 100, `Extracted code from ${index + 1}/${total} documents`, {
        processedPages: index + 1,
        totalPages: total,
        codeExamplesFound: stored,
      });
    }

    return stored;
  }

  examplesFrom(url: string, markdown: string): CodeExample[] {
    let blocks: FencedBlock[];
    try {
      blocks = findFencedBlocks(markdown);
    } catch (error) {
      throw createExtractError('Failed to scan document for code blocks', { url }, { cause: error });
    }

    return blocks
      .filter((block) => block.code.trim().length >= this.minLength)
      .map((block) => ({
        url,
        language: block.language || 'text',
        code: block.code,
        context: markdown
          .slice(Math.max(0, block.start - this.contextLength), block.start)
          .trim(),
      }));
  }
}
