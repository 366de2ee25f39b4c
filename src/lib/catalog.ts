import type { Persistence } from './backup';
import type { RepoAtlasDB } from './db';
import type { RepositoryFields, RepositoryRecord, SourceTag, StoredRepository } from '@/types';

const LAST_SYNC_KEY = 'last_sync';

/** Stored row → record, defaulting columns that older schemas lack. */
export function toRecord(row: StoredRepository): RepositoryRecord {
  return {
    ...row,
    topics: [...(row.topics ?? [])],
    source: row.source ?? 'forge',
    source_subtype: row.source_subtype ?? null,
    change_signal: row.change_signal === undefined ? (row.pushed_at ?? null) : row.change_signal,
    needs_embedding: row.needs_embedding === 1,
  };
}

const byCreatedDesc = (a: RepositoryRecord, b: RepositoryRecord) =>
  b.created_at.localeCompare(a.created_at) || a.full_name.localeCompare(b.full_name);

/**
 * Owns persisted repository state and is the only place that decides whether a
 * record needs (re-)embedding. Every write is its own transaction and resolves
 * once the snapshot holding it is on disk.
 */
export class CatalogStore {
  constructor(
    private readonly db: RepoAtlasDB,
    private readonly persistence?: Persistence
  ) {}

  private async committed() {
    await this.persistence?.schedule();
  }

  /**
   * Inserts or refreshes a record. Returns true when the record is new or its
   * change signal moved, in which case it is flagged for embedding. A null
   * signal means only existence counts as a change.
   */
  async upsert(identity: string, fields: RepositoryFields, changeSignal: string | null): Promise<boolean> {
    const now = new Date().toISOString();
    const { repositories } = this.db;

    const changed = await this.db.transaction('rw', repositories, async () => {
      const existing = await repositories.get(identity);

      if (!existing) {
        await repositories.add({
          ...fields,
          topics: [...fields.topics],
          full_name: identity,
          readme_content: null,
          change_signal: changeSignal,
          embedded_at: null,
          needs_embedding: 1,
          last_synced_at: now,
        });
        return true;
      }

      const stored = toRecord(existing);
      const localPath = fields.local_path ?? stored.local_path;

      if (changeSignal !== null && changeSignal !== stored.change_signal) {
        await repositories.put({
          ...fields,
          topics: [...fields.topics],
          full_name: identity,
          local_path: localPath,
          readme_content: stored.readme_content,
          change_signal: changeSignal,
          embedded_at: stored.embedded_at,
          needs_embedding: 1,
          last_synced_at: now,
        });
        return true;
      }

      // Same content as far as the source can tell: refresh only what the
      // embedding text does not depend on. A moved local checkout keeps its
      // existing embedding.
      await repositories.put({
        ...existing,
        source: fields.source,
        source_subtype: fields.source_subtype,
        change_signal: stored.change_signal,
        local_path: localPath,
        private: fields.private,
        html_url: fields.html_url || stored.html_url,
        clone_url: fields.clone_url || stored.clone_url,
        default_branch: fields.default_branch || stored.default_branch,
        updated_at: fields.updated_at,
        pushed_at: fields.pushed_at,
        last_synced_at: now,
      });
      return false;
    });

    await this.committed();
    return changed;
  }

  async get(identity: string) {
    const row = await this.db.repositories.get(identity);
    return row ? toRecord(row) : null;
  }

  async getAll() {
    const rows = await this.db.repositories.toArray();
    return rows.map(toRecord).sort(byCreatedDesc);
  }

  async getBySource(source: SourceTag) {
    const rows = await this.db.repositories.where('source').equals(source).toArray();
    return rows.map(toRecord).sort(byCreatedDesc);
  }

  async count() {
    return this.db.repositories.count();
  }

  async getRepositoriesNeedingEmbedding() {
    const rows = await this.db.repositories.where('needs_embedding').equals(1).toArray();
    return rows.map(toRecord).sort(byCreatedDesc);
  }

  async updateReadme(identity: string, readme: string) {
    await this.db.repositories.update(identity, { readme_content: readme });
    await this.committed();
  }

  /** Pass null after the local checkout was deleted. */
  async updateLocalPath(identity: string, localPath: string | null) {
    await this.db.repositories.update(identity, { local_path: localPath });
    await this.committed();
  }

  async markEmbedded(identity: string) {
    await this.markEmbeddedBatch([identity]);
  }

  /** Rows already marked are left alone, so repeating a call changes nothing. */
  async markEmbeddedBatch(identities: readonly string[]) {
    if (identities.length === 0) return;
    const now = new Date().toISOString();
    await this.db.transaction('rw', this.db.repositories, async () => {
      await this.db.repositories
        .where('full_name')
        .anyOf([...identities])
        .filter((row) => row.needs_embedding === 1 || row.embedded_at === null)
        .modify({ needs_embedding: 0, embedded_at: now });
    });
    await this.committed();
  }

  /** Flags everything for re-embedding. The vector index is left as is. */
  async clearAllEmbeddings() {
    await this.db.repositories.toCollection().modify({ needs_embedding: 1, embedded_at: null });
    await this.committed();
  }

  async delete(identity: string) {
    await this.db.repositories.delete(identity);
    await this.committed();
  }

  async deleteBySource(source: SourceTag) {
    const removed = await this.db.repositories.where('source').equals(source).delete();
    await this.committed();
    return removed;
  }

  async getLastSyncTime(): Promise<Date | null> {
    const row = await this.db.syncState.get(LAST_SYNC_KEY);
    if (!row) return null;
    const date = new Date(row.value);
    return Number.isNaN(date.getTime()) ? null : date;
  }

  async setLastSyncTime(date: Date) {
    await this.db.syncState.put({ id: LAST_SYNC_KEY, value: date.toISOString() });
    await this.committed();
  }
}
