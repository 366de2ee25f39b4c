import { SnapshotWriteError, type Persistence } from './backup';
import type { CatalogStore } from './catalog';
import type { SyncSettings } from './config';
import { fetchReadmes, type AdapterTable } from './sources';
import { readReadme } from './vcs';
import { toEmbeddingText, type VectorIndex } from './vector';
import type {
  EmbeddingProvider,
  ProgressCallback,
  RepositoryRecord,
  SourceAdapter,
  SourceTag,
} from '@/types';

export type SyncStage = 'collect' | 'enrich' | 'embed';

export const SYNC_STAGES: readonly SyncStage[] = ['collect', 'enrich', 'embed'];

export interface SyncRunOptions {
  signal?: AbortSignal;
  /** Called with the 1-based stage number as each stage starts. */
  onStage?: (stage: number, name: SyncStage) => void;
  onProgress?: ProgressCallback;
}

export interface SyncResult {
  /** Full catalog after the cycle, `created_at` descending. */
  repositories: RepositoryRecord[];
  /** Repositories observed across all sources. */
  total: number;
  /** Observed repositories that were new or had a new change signal. */
  changed: number;
  embedded: number;
  failedBatches: number;
  cancelled: boolean;
  /** Set when the catalog could not be saved; the cycle stopped there. */
  storageError: string | null;
}

export interface SyncDependencies {
  store: CatalogStore;
  vectors: VectorIndex;
  embedder: EmbeddingProvider;
  adapters: AdapterTable;
  settings: Pick<SyncSettings, 'concurrency' | 'batchSize' | 'readmeCharBudget'>;
  persistence?: Persistence;
}

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

/** Readme lookup for records whose source is no longer configured. */
const localReadmes: Pick<SourceAdapter, 'fetchReadme'> = {
  fetchReadme: async (record) => (record.local_path ? readReadme(record.local_path) : null),
};

export class SyncOrchestrator {
  private running: Promise<SyncResult> | null = null;

  constructor(private readonly deps: SyncDependencies) {}

  get isRunning() {
    return this.running !== null;
  }

  /** One collect → enrich → embed cycle. Overlapping calls are rejected. */
  async run(options: SyncRunOptions = {}): Promise<SyncResult> {
    if (this.running) throw new Error('Sync already in progress');
    this.running = this.cycle(options);
    try {
      return await this.running;
    } finally {
      this.running = null;
    }
  }

  private async cycle(options: SyncRunOptions): Promise<SyncResult> {
    const { store } = this.deps;
    const result: SyncResult = {
      repositories: [],
      total: 0,
      changed: 0,
      embedded: 0,
      failedBatches: 0,
      cancelled: false,
      storageError: null,
    };

    try {
      await this.stages(result, options);
    } catch (err) {
      if (!(err instanceof SnapshotWriteError)) throw err;
      console.error('Sync stopped: catalog could not be saved', err);
      result.storageError = err.message;
      options.onProgress?.({ message: `Storage error: ${err.message}`, current: result.total, total: result.total });
    }

    result.repositories = await store.getAll();
    return result;
  }

  private async stages(result: SyncResult, { signal, onStage, onProgress }: SyncRunOptions) {
    const { store, persistence } = this.deps;

    onStage?.(1, 'collect');
    result.cancelled = await this.collect(result, signal, onProgress);
    if (result.cancelled) {
      onProgress?.({ message: 'Sync cancelled', current: result.total, total: result.total });
      await persistence?.flush();
      return;
    }

    onStage?.(2, 'enrich');
    const pending = await this.enrich(await store.getRepositoriesNeedingEmbedding(), onProgress);

    onStage?.(3, 'embed');
    await this.embed(pending, result, onProgress);

    await store.setLastSyncTime(new Date());
    await persistence?.flush();
    onProgress?.({
      message: `Sync complete: ${result.total} repositories, ${result.changed} changed, ${result.embedded} embedded`,
      current: result.total,
      total: result.total,
    });
  }

  /** Returns true when the signal stopped the stage. */
  private async collect(result: SyncResult, signal?: AbortSignal, onProgress?: ProgressCallback) {
    const { store, adapters } = this.deps;

    for (const adapter of adapters.values()) {
      if (signal?.aborted) return true;
      try {
        await adapter.listRepositories({
          signal,
          onProgress,
          onRepository: async ({ full_name, change_signal, ...fields }) => {
            result.total++;
            if (await store.upsert(full_name, fields, change_signal)) result.changed++;
          },
        });
      } catch (err) {
        if (err instanceof SnapshotWriteError) throw err;
        console.error(`${adapter.label} sync failed`, err);
        onProgress?.({ message: `${adapter.label} sync error: ${errorMessage(err)}`, current: 0, total: 0 });
      }
    }
    return signal?.aborted ?? false;
  }

  /** Fetches readmes per source and returns the snapshot with them filled in. */
  private async enrich(pending: RepositoryRecord[], onProgress?: ProgressCallback) {
    const { store, adapters, settings } = this.deps;
    if (pending.length === 0) return pending;

    const groups = new Map<SourceTag, RepositoryRecord[]>();
    for (const record of pending) {
      const group = groups.get(record.source);
      if (group) group.push(record);
      else groups.set(record.source, [record]);
    }

    const total = pending.length;
    let current = 0;
    onProgress?.({ message: `Fetching READMEs for ${total} repositories...`, current, total });

    const readmes = new Map<string, string>();
    for (const [tag, records] of groups) {
      const fetched = await fetchReadmes(adapters.get(tag) ?? localReadmes, records, {
        concurrency: settings.concurrency,
        onResult: async (readme, record) => {
          current++;
          if (readme) await store.updateReadme(record.full_name, readme);
          onProgress?.({ message: `Fetched README for ${record.name}`, current, total });
        },
      });
      fetched.forEach((readme, id) => readmes.set(id, readme));
    }

    return pending.map((record) => {
      const readme = readmes.get(record.full_name);
      return readme ? { ...record, readme_content: readme } : record;
    });
  }

  private async embed(pending: RepositoryRecord[], result: SyncResult, onProgress?: ProgressCallback) {
    const { store, vectors, embedder, settings } = this.deps;
    const total = pending.length;
    if (total === 0) return;

    const batchSize = Math.max(1, settings.batchSize);
    onProgress?.({ message: `Generating embeddings for ${total} repositories...`, current: 0, total });

    for (let start = 0; start < total; start += batchSize) {
      const batch = pending.slice(start, start + batchSize);
      const texts = batch.map((record) => toEmbeddingText(record, settings.readmeCharBudget));

      try {
        const embeddings = await embedder.embedBatch(texts);
        await vectors.upsertBatch(batch, embeddings, texts);
        await store.markEmbeddedBatch(batch.map((record) => record.full_name));
        result.embedded += batch.length;
      } catch (err) {
        if (err instanceof SnapshotWriteError) throw err;
        result.failedBatches++;
        console.warn('Failed to embed batch', err);
        onProgress?.({
          message: `Warning: Failed to embed batch: ${errorMessage(err)}`,
          current: start,
          total,
        });
        continue;
      }

      onProgress?.({
        message: `Embedded ${start + batch.length}/${total} repositories`,
        current: start + batch.length,
        total,
      });
    }
  }
}
