import { describe, expect, it } from 'vitest';

import { isCancellationError } from '../src/errors.js';
import { CancellationToken } from '../src/jobs/cancellation.js';
import { ChunkingDocumentProcessor, chunkMarkdown, countWords } from '../src/processing/chunkingProcessor.js';
import { splitBlocks } from '../src/processing/markdownBlocks.js';
import { InMemoryRepository } from '../src/storage/memoryRepository.js';
import { recordProgress } from './helpers/fakes.js';

describe('splitBlocks', () => {
  it('keeps fenced code together across blank lines', () => {
    const markdown = 'Intro\n\n```js\nconst a = 1;\n\nconst b = 2;\n```\n\nOutro';

    expect(splitBlocks(markdown)).toEqual(['Intro', '```js\nconst a = 1;\n\nconst b = 2;\n```', 'Outro']);
  });
});

describe('chunkMarkdown', () => {
  it('packs blocks greedily up to the chunk size', () => {
    expect(chunkMarkdown('aaaa\n\nbbbb\n\ncccc', 10)).toEqual(['aaaa\n\nbbbb', 'cccc']);
  });

  it('splits an oversized block on line breaks', () => {
    expect(chunkMarkdown('line one\nline two', 10)).toEqual(['line one', 'line two']);
  });

  it('hard-cuts a single line longer than the chunk size', () => {
    expect(chunkMarkdown('abcdefghijkl', 5)).toEqual(['abcde', 'fghij', 'kl']);
  });

  it('returns nothing for blank input', () => {
    expect(chunkMarkdown(' \n\n ', 10)).toEqual([]);
  });
});

describe('countWords', () => {
  it('counts whitespace separated words', () => {
    expect(countWords('  one two\nthree ')).toBe(3);
    expect(countWords('   ')).toBe(0);
  });
});

describe('ChunkingDocumentProcessor', () => {
  const sourceId = 'docs.example.com_0123456789abcdef';

  async function createRepository(): Promise<InMemoryRepository> {
    const repository = new InMemoryRepository();
    await repository.upsertSource({
      sourceId,
      url: 'https://docs.example.com',
      displayName: 'docs.example.com',
      status: 'processing',
    });
    return repository;
  }

  it('stores chunks with their metadata and reports per document', async () => {
    const repository = await createRepository();
    const processor = new ChunkingDocumentProcessor(repository, { chunkSize: 10 });
    const progress = recordProgress();

    const result = await processor.process({
      sourceId,
      sourceUrl: 'https://docs.example.com',
      displayName: 'docs.example.com',
      crawlType: 'batch',
      documents: [
        { url: 'https://docs.example.com/one', markdown: 'aaaa\n\nbbbb\n\ncccc', title: 'One' },
        { url: 'https://docs.example.com/blank', markdown: '   ' },
      ],
      options: { knowledgeType: 'technical', tags: ['docs'] },
      progress,
      token: new CancellationToken('process'),
    });

    expect(result.chunkCount).toBe(2);
    expect(result.chunksStored).toBe(2);
    expect([...result.urlToFullDocument.keys()]).toEqual([
      'https://docs.example.com/one',
      'https://docs.example.com/blank',
    ]);
    expect(repository.listChunks(sourceId)[0]).toEqual({
      url: 'https://docs.example.com/one',
      chunkIndex: 0,
      content: 'aaaa\n\nbbbb',
      metadata: {
        sourceId,
        title: 'One',
        crawlType: 'batch',
        knowledgeType: 'technical',
        tags: ['docs'],
        wordCount: 2,
      },
    });
    expect(progress.reports).toEqual([
      { percent: 50, message: 'Processed 1/2 documents' },
      { percent: 100, message: 'Processed 2/2 documents' },
    ]);
  });

  it('stops before storing anything once cancelled', async () => {
    const repository = await createRepository();
    const processor = new ChunkingDocumentProcessor(repository);
    const token = new CancellationToken('process');
    token.cancel();

    const error = await processor
      .process({
        sourceId,
        sourceUrl: 'https://docs.example.com',
        displayName: 'docs.example.com',
        crawlType: 'single_page',
        documents: [{ url: 'https://docs.example.com/one', markdown: 'text' }],
        options: {},
        progress: recordProgress(),
        token,
      })
      .catch((caught: unknown) => caught);

    expect(isCancellationError(error)).toBe(true);
    expect(repository.listChunks(sourceId)).toEqual([]);
  });

  it('rejects a non-positive chunk size', () => {
    expect(() => new ChunkingDocumentProcessor(new InMemoryRepository(), { chunkSize: 0 })).toThrow(
      'chunk-size must be a positive integer.',
    );
  });
});
