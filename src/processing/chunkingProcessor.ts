import { DEFAULT_SERVICE_OPTIONS, coercePositiveInteger } from '../config.js';
import type {
  DocumentChunk,
  DocumentProcessor,
  ProcessRequest,
  ProcessResult,
  Repository,
} from '../types.js';
import { splitBlocks } from './markdownBlocks.js';

export interface ChunkingProcessorOptions {
  chunkSize?: number;
}

/**
 * Packs markdown blocks greedily into chunks of at most `chunkSize`
 * characters. A single block longer than the limit is cut on line breaks,
 * then hard-cut when a line alone is too long.
 */
export function chunkMarkdown(markdown: string, chunkSize: number): string[] {
  const chunks: string[] = [];
  let current = '';

  const push = (piece: string): void => {
    const candidate = current ? `${current}\n\n${piece}` : piece;
    if (candidate.length <= chunkSize) {
      current = candidate;
      return;
    }
    if (current) {
      chunks.push(current);
    }
    current = piece;
  };

  for (const block of splitBlocks(markdown)) {
    if (block.length <= chunkSize) {
      push(block);
      continue;
    }

    for (const piece of splitOversized(block, chunkSize)) {
      push(piece);
    }
  }

  if (current) {
    chunks.push(current);
  }
  return chunks;
}

function splitOversized(block: string, chunkSize: number): string[] {
  const pieces: string[] = [];
  let current = '';

  for (const line of block.split('\n')) {
    if (line.length > chunkSize) {
      if (current) {
        pieces.push(current);
        current = '';
      }
      for (let index = 0; index < line.length; index += chunkSize) {
        pieces.push(line.slice(index, index + chunkSize));
      }
      continue;
    }

    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length > chunkSize) {
      pieces.push(current);
      current = line;
    } else {
      current = candidate;
    }
  }

  if (current) {
    pieces.push(current);
  }
  return pieces;
}

export class ChunkingDocumentProcessor implements DocumentProcessor {
  private readonly chunkSize: number;

  constructor(
    private readonly repository: Repository,
    options: ChunkingProcessorOptions = {},
  ) {
    this.chunkSize = coercePositiveInteger(
      options.chunkSize ?? DEFAULT_SERVICE_OPTIONS.chunkSize,
      'chunk-size',
    );
  }

  async process(request: ProcessRequest): Promise<ProcessResult> {
    const { sourceId, documents, progress, token, crawlType, options } = request;
    const urlToFullDocument = new Map<string, string>();
    const total = documents.length;
    let chunkCount = 0;
    let chunksStored = 0;

    for (const [index, document] of documents.entries()) {
      token.throwIfCancelled({ url: document.url, stage: 'process' });
      urlToFullDocument.set(document.url, document.markdown);

      const chunks: DocumentChunk[] = chunkMarkdown(document.markdown, this.chunkSize).map(
        (content, chunkIndex) => ({
          url: document.url,
          chunkIndex,
          content,
          metadata: {
            sourceId,
            title: document.title,
            crawlType,
            knowledgeType: options.knowledgeType,
            tags: options.tags ?? [],
            wordCount: countWords(content),
          },
        }),
      );

      chunkCount += chunks.length;
      if (chunks.length > 0) {
        chunksStored += await this.repository.storeChunks(sourceId, chunks);
      }

      await progress.report(((index + 1) / total) * 100, `Processed ${index + 1}/${total} documents`, {
        processedPages: index + 1,
        totalPages: total,
        chunksStored,
      });
    }

    return { sourceId, chunkCount, chunksStored, urlToFullDocument };
  }
}

export function countWords(text: string): number {
  const words = text.trim().split(/\s+/);
  return words[0] === '' ? 0 : words.length;
}
