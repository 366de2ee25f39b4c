import type { Persistence } from './backup';
import type { RepoAtlasDB } from './db';
import type { RepositoryMetadata, RepositoryRecord, VectorEntry } from '@/types';

export const DEFAULT_README_BUDGET = 4000;

/** Text the embedding of a repository is computed from. */
export function toEmbeddingText(record: RepositoryRecord, readmeBudget = DEFAULT_README_BUDGET) {
  const parts = [record.name];
  if (record.description) parts.push(record.description);
  if (record.topics.length > 0) parts.push(`Topics: ${record.topics.join(', ')}`);
  if (record.readme_content) parts.push(record.readme_content.slice(0, readmeBudget));
  return parts.join('\n\n');
}

export function toMetadata(record: RepositoryRecord): RepositoryMetadata {
  return {
    name: record.name,
    full_name: record.full_name,
    description: record.description ?? '',
    created_at: record.created_at,
    topics: record.topics.join(','),
    html_url: record.html_url,
    is_local: record.local_path !== null,
    local_path: record.local_path ?? '',
    private: record.private,
    source: record.source,
    source_subtype: record.source_subtype ?? '',
  };
}

/** Rebuilds a record from an index entry alone, e.g. when the catalog is gone. */
export function fromEntry(entry: VectorEntry): RepositoryRecord {
  const { metadata } = entry;
  return {
    full_name: metadata.full_name,
    name: metadata.name,
    description: metadata.description || null,
    created_at: metadata.created_at,
    updated_at: metadata.created_at,
    pushed_at: metadata.created_at,
    private: metadata.private,
    html_url: metadata.html_url,
    clone_url: '',
    default_branch: 'main',
    topics: metadata.topics.split(',').filter(Boolean),
    local_path: metadata.is_local ? metadata.local_path : null,
    readme_content: null,
    source: metadata.source,
    source_subtype: metadata.source_subtype || null,
    change_signal: null,
    embedded_at: entry.updated_at,
    needs_embedding: false,
    last_synced_at: entry.updated_at,
  };
}

/** Cosine similarity in [-1, 1]; zero vectors score 0. */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) return 0;
  return dotProduct / magnitude;
}

export interface VectorMatch {
  id: string;
  distance: number;
  /** `1 - distance`, clamped to [0, 1]. */
  similarity: number;
  document: string;
  metadata: RepositoryMetadata;
}

/**
 * One vector per repository identity in the `vectorStore` table. Queries scan
 * every entry; catalogs are a few thousand rows at most.
 */
export class VectorIndex {
  constructor(
    private readonly db: RepoAtlasDB,
    private readonly persistence?: Persistence
  ) {}

  async upsert(record: RepositoryRecord, embedding: number[], document = toEmbeddingText(record)) {
    await this.db.vectorStore.put(this.toEntry(record, embedding, document));
    await this.persistence?.schedule();
  }

  /** Writes all vectors in one transaction; `documents` defaults to each record's embedding text. */
  async upsertBatch(records: readonly RepositoryRecord[], embeddings: number[][], documents?: string[]) {
    if (records.length !== embeddings.length) {
      throw new Error(`Got ${embeddings.length} embeddings for ${records.length} repositories`);
    }
    if (records.length === 0) return;

    const entries = records.map((record, i) =>
      this.toEntry(record, embeddings[i], documents?.[i] ?? toEmbeddingText(record))
    );
    await this.db.transaction('rw', this.db.vectorStore, async () => {
      await this.db.vectorStore.bulkPut(entries);
    });
    await this.persistence?.schedule();
  }

  /** Nearest entries first. Entries of another dimension are skipped. */
  async query(embedding: number[], nResults = 10): Promise<VectorMatch[]> {
    if (nResults <= 0) return [];
    const entries = await this.db.vectorStore.toArray();

    const matches: VectorMatch[] = [];
    for (const entry of entries) {
      if (entry.embedding.length !== embedding.length) continue;
      const distance = 1 - cosineSimilarity(embedding, entry.embedding);
      matches.push({
        id: entry.id,
        distance,
        similarity: Math.min(1, Math.max(0, 1 - distance)),
        document: entry.document,
        metadata: entry.metadata,
      });
    }

    return matches
      .sort((a, b) => a.distance - b.distance || a.id.localeCompare(b.id))
      .slice(0, nResults);
  }

  /** identity → similarity for the nearest `maxResults` entries. */
  async getSemanticScores(embedding: number[], maxResults: number) {
    const matches = await this.query(embedding, maxResults);
    return new Map(matches.map((m) => [m.id, m.similarity]));
  }

  async get(id: string) {
    return (await this.db.vectorStore.get(id)) ?? null;
  }

  async getAll() {
    return this.db.vectorStore.toArray();
  }

  async count() {
    return this.db.vectorStore.count();
  }

  async delete(id: string) {
    await this.db.vectorStore.delete(id);
    await this.persistence?.schedule();
  }

  async clear() {
    await this.db.vectorStore.clear();
    await this.persistence?.schedule();
  }

  private toEntry(record: RepositoryRecord, embedding: number[], document: string): VectorEntry {
    return {
      id: record.full_name,
      embedding: [...embedding],
      document,
      metadata: toMetadata(record),
      updated_at: new Date().toISOString(),
    };
  }
}
