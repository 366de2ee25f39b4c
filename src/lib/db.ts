import Dexie, { type Table } from 'dexie';
import { IDBFactory, IDBKeyRange } from 'fake-indexeddb';
import type { StoredRepository, SyncState, VectorEntry } from '@/types';

export const DATABASE_NAME = 'repo-atlas';

export interface DatabaseOptions {
  name?: string;
  /** Each factory is an isolated in-memory IndexedDB; tests pass their own. */
  indexedDB?: IDBFactory;
}

export class RepoAtlasDB extends Dexie {
  repositories!: Table<StoredRepository, string>;
  syncState!: Table<SyncState, string>;
  vectorStore!: Table<VectorEntry, string>;

  constructor(options: DatabaseOptions = {}) {
    super(options.name ?? DATABASE_NAME, {
      indexedDB: options.indexedDB ?? new IDBFactory(),
      IDBKeyRange,
    });
    // v1 predates multi-source support
    this.version(1).stores({
      repositories: 'full_name, created_at, needs_embedding',
      syncState: 'id',
      vectorStore: 'id',
    });
    this.version(2)
      .stores({
        repositories: 'full_name, created_at, needs_embedding, source',
      })
      .upgrade((tx) =>
        tx
          .table<Partial<StoredRepository>, string>('repositories')
          .toCollection()
          .modify((row) => {
            if (row.source === undefined) row.source = 'forge';
            if (row.source_subtype === undefined) row.source_subtype = null;
            if (row.change_signal === undefined) row.change_signal = row.pushed_at ?? null;
          })
      );
  }
}
