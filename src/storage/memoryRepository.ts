import { createStorageError } from '../errors.js';
import type {
  Clock,
  CodeExample,
  DocumentChunk,
  Repository,
  SourceInput,
  SourceRecord,
  SourceStatus,
} from '../types.js';
import { countWords } from '../processing/chunkingProcessor.js';

/** Process-local {@link Repository} for the CLI and tests. */
export class InMemoryRepository implements Repository {
  private readonly sources = new Map<string, SourceRecord>();
  private readonly chunks = new Map<string, DocumentChunk[]>();
  private readonly codeExamples = new Map<string, CodeExample[]>();

  constructor(private readonly clock: Clock = Date.now) {}

  async upsertSource(input: SourceInput): Promise<SourceRecord> {
    const existing = this.sources.get(input.sourceId);
    const record: SourceRecord = {
      sourceId: input.sourceId,
      url: input.url,
      displayName: input.displayName,
      status: input.status,
      knowledgeType: input.knowledgeType ?? existing?.knowledgeType,
      tags: input.tags ?? existing?.tags ?? [],
      wordCount: existing?.wordCount ?? 0,
      updatedAt: this.now(),
    };

    this.sources.set(input.sourceId, record);
    return { ...record, tags: [...record.tags] };
  }

  async getSource(sourceId: string): Promise<SourceRecord | undefined> {
    const record = this.sources.get(sourceId);
    return record ? { ...record, tags: [...record.tags] } : undefined;
  }

  async updateSourceStatus(sourceId: string, status: SourceStatus): Promise<void> {
    const record = this.requireSource(sourceId);
    record.status = status;
    record.updatedAt = this.now();
  }

  /** Replaces earlier chunks for the same URL and chunk index. */
  async storeChunks(sourceId: string, chunks: readonly DocumentChunk[]): Promise<number> {
    const record = this.requireSource(sourceId);
    const existing = this.chunks.get(sourceId) ?? [];
    const replaced = new Set(chunks.map((chunk) => chunkKey(chunk)));
    const kept = existing.filter((chunk) => !replaced.has(chunkKey(chunk)));

    const next = [...kept, ...chunks.map((chunk) => ({ ...chunk, metadata: { ...chunk.metadata } }))];
    this.chunks.set(sourceId, next);
    record.wordCount = next.reduce((sum, chunk) => sum + countWords(chunk.content), 0);
    record.updatedAt = this.now();
    return chunks.length;
  }

  async storeCodeExamples(sourceId: string, examples: readonly CodeExample[]): Promise<number> {
    this.requireSource(sourceId);
    const existing = this.codeExamples.get(sourceId) ?? [];
    this.codeExamples.set(sourceId, [...existing, ...examples.map((example) => ({ ...example }))]);
    return examples.length;
  }

  listChunks(sourceId: string): DocumentChunk[] {
    return [...(this.chunks.get(sourceId) ?? [])];
  }

  listCodeExamples(sourceId: string): CodeExample[] {
    return [...(this.codeExamples.get(sourceId) ?? [])];
  }

  listSources(): SourceRecord[] {
    return [...this.sources.values()].map((record) => ({ ...record, tags: [...record.tags] }));
  }

  private requireSource(sourceId: string): SourceRecord {
    const record = this.sources.get(sourceId);
    if (!record) {
      throw createStorageError(`Unknown source: ${sourceId}`, { sourceId });
    }
    return record;
  }

  private now(): string {
    return new Date(this.clock()).toISOString();
  }
}

function chunkKey(chunk: DocumentChunk): string {
  return `${chunk.url}#${chunk.chunkIndex}`;
}
