import { describe, expect, it } from 'vitest';

import { InMemoryRepository } from '../src/storage/memoryRepository.js';
import { manualClock } from './helpers/fakes.js';

const sourceId = 'docs.example.com_0123456789abcdef';
const url = 'https://docs.example.com/guide';

describe('InMemoryRepository', () => {
  it('returns copies of stored sources', async () => {
    const repository = new InMemoryRepository(manualClock().now);
    await repository.upsertSource({
      sourceId,
      url,
      displayName: 'docs.example.com/guide',
      status: 'pending',
      tags: ['docs'],
    });

    const first = await repository.getSource(sourceId);
    first?.tags.push('mutated');

    expect(await repository.getSource(sourceId)).toEqual({
      sourceId,
      url,
      displayName: 'docs.example.com/guide',
      status: 'pending',
      knowledgeType: undefined,
      tags: ['docs'],
      wordCount: 0,
      updatedAt: '2024-01-01T00:00:00.000Z',
    });
  });

  it('keeps earlier metadata when an upsert omits it', async () => {
    const repository = new InMemoryRepository();
    await repository.upsertSource({
      sourceId,
      url,
      displayName: 'guide',
      status: 'pending',
      knowledgeType: 'technical',
      tags: ['docs'],
    });

    const record = await repository.upsertSource({ sourceId, url, displayName: 'guide', status: 'processing' });

    expect(record).toMatchObject({ status: 'processing', knowledgeType: 'technical', tags: ['docs'] });
  });

  it('updates the status and timestamp of a known source', async () => {
    const clock = manualClock();
    const repository = new InMemoryRepository(clock.now);
    await repository.upsertSource({ sourceId, url, displayName: 'guide', status: 'pending' });

    clock.advance(5_000);
    await repository.updateSourceStatus(sourceId, 'completed');

    expect(await repository.getSource(sourceId)).toMatchObject({
      status: 'completed',
      updatedAt: '2024-01-01T00:00:05.000Z',
    });
  });

  it('rejects writes for unknown sources', async () => {
    const repository = new InMemoryRepository();

    await expect(repository.updateSourceStatus('nope', 'failed')).rejects.toMatchObject({
      kind: 'storage',
      message: 'Unknown source: nope',
    });
    await expect(repository.storeChunks('nope', [])).rejects.toMatchObject({ kind: 'storage' });
  });

  it('replaces chunks stored again for the same url and index', async () => {
    const repository = new InMemoryRepository();
    await repository.upsertSource({ sourceId, url, displayName: 'guide', status: 'processing' });

    await repository.storeChunks(sourceId, [
      { url, chunkIndex: 0, content: 'one two', metadata: {} },
      { url, chunkIndex: 1, content: 'three', metadata: {} },
    ]);
    const stored = await repository.storeChunks(sourceId, [
      { url, chunkIndex: 0, content: 'alpha', metadata: {} },
    ]);

    expect(stored).toBe(1);
    expect(repository.listChunks(sourceId).map((chunk) => chunk.content)).toEqual(['three', 'alpha']);
    expect((await repository.getSource(sourceId))?.wordCount).toBe(2);
  });

  it('appends code examples per source', async () => {
    const repository = new InMemoryRepository();
    await repository.upsertSource({ sourceId, url, displayName: 'guide', status: 'processing' });

    await repository.storeCodeExamples(sourceId, [{ url, language: 'ts', code: 'a()', context: '' }]);
    await repository.storeCodeExamples(sourceId, [{ url, language: 'sh', code: 'ls', context: '' }]);

    expect(repository.listCodeExamples(sourceId).map((example) => example.language)).toEqual(['ts', 'sh']);
    expect(repository.listCodeExamples('other')).toEqual([]);
  });
});
