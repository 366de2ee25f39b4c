/**
 * Composition root: the one place that builds concrete clients and stores
 * from a validated configuration and wires them together.
 */

import { rm } from 'node:fs/promises';
import path from 'node:path';
import { OpenAIEmbeddingProvider } from './lib/ai';
import { SnapshotFile } from './lib/backup';
import { CatalogStore } from './lib/catalog';
import type { AppConfig } from './lib/config';
import { RepoAtlasDB } from './lib/db';
import { OctokitForgeClient, type ForgeClient } from './lib/github';
import { HttpHubClient, type HubClient } from './lib/huggingface';
import { createSemanticLookup, HybridSearchEngine } from './lib/search';
import { createAdapters, type AdapterTable } from './lib/sources';
import { SyncOrchestrator } from './lib/sync';
import { VectorIndex } from './lib/vector';
import type { EmbeddingProvider, SourceTag } from './types';

export const SNAPSHOT_FILE = 'catalog.json.gz';

/** Replacements for the network-facing pieces, used by tests. */
export interface AppOverrides {
  indexedDB?: IDBFactory;
  forge?: ForgeClient;
  hub?: HubClient;
  embedder?: EmbeddingProvider;
}

export interface ConnectionCheck {
  label: string;
  ok: boolean;
  /** `Connected as <login>` or the error message. */
  message: string;
}

export interface AppContainer {
  config: AppConfig;
  db: RepoAtlasDB;
  snapshot: SnapshotFile;
  store: CatalogStore;
  vectors: VectorIndex;
  embedder: EmbeddingProvider;
  adapters: AdapterTable;
  orchestrator: SyncOrchestrator;
  createSearchEngine(): HybridSearchEngine;
  /** Deletes a record together with its vector. */
  removeRepository(identity: string): Promise<void>;
  removeSource(tag: SourceTag): Promise<number>;
  /**
   * Removes the checkout on disk, clears the record's local path and drops its
   * vector. The record itself stays in the catalog.
   */
  deleteLocalCopy(identity: string): Promise<string>;
  /** Asks each configured remote service who the token belongs to. */
  checkConnections(): Promise<ConnectionCheck[]>;
  close(): Promise<void>;
}

export async function createApp(config: AppConfig, overrides: AppOverrides = {}): Promise<AppContainer> {
  const db = new RepoAtlasDB({ indexedDB: overrides.indexedDB });
  const snapshot = new SnapshotFile(db, path.join(config.dataDir, SNAPSHOT_FILE));
  await snapshot.load();

  const store = new CatalogStore(db, snapshot);
  const vectors = new VectorIndex(db, snapshot);
  const embedder =
    overrides.embedder ??
    new OpenAIEmbeddingProvider({
      apiKey: config.embedding.apiKey,
      baseURL: config.embedding.baseURL,
      model: config.embedding.model,
    });

  const forge = overrides.forge ?? (config.forge ? new OctokitForgeClient(config.forge.token) : undefined);
  const hub =
    overrides.hub ??
    (config.hub
      ? new HttpHubClient({
          token: config.hub.token,
          endpoint: config.hub.endpoint,
          timeoutMs: config.sync.requestTimeoutMs,
        })
      : undefined);
  const adapters = createAdapters(config, { forge, hub });

  const orchestrator = new SyncOrchestrator({
    store,
    vectors,
    embedder,
    adapters,
    settings: config.sync,
    persistence: snapshot,
  });

  return {
    config,
    db,
    snapshot,
    store,
    vectors,
    embedder,
    adapters,
    orchestrator,
    createSearchEngine: () =>
      new HybridSearchEngine(createSemanticLookup(embedder, vectors, config.search.maxResults), config.search),
    async removeRepository(identity) {
      await store.delete(identity);
      await vectors.delete(identity);
    },
    async removeSource(tag) {
      const records = await store.getBySource(tag);
      await Promise.all(records.map((record) => vectors.delete(record.full_name)));
      return store.deleteBySource(tag);
    },
    async deleteLocalCopy(identity) {
      const record = await store.get(identity);
      if (!record) throw new Error(`No repository named ${identity}`);
      if (!record.local_path) throw new Error(`${identity} has no local copy`);

      await rm(record.local_path, { recursive: true, force: true });
      await store.updateLocalPath(identity, null);
      await vectors.delete(identity);
      return record.local_path;
    },
    async checkConnections() {
      const accounts: Array<[string, () => Promise<string>]> = [];
      if (config.forge && forge) accounts.push(['GitHub', () => forge.getAuthenticatedUser()]);
      if (config.hub && hub) accounts.push(['Hugging Face', () => hub.whoami()]);

      return Promise.all(
        accounts.map(async ([label, whoami]): Promise<ConnectionCheck> => {
          try {
            return { label, ok: true, message: `Connected as ${await whoami()}` };
          } catch (err) {
            return { label, ok: false, message: err instanceof Error ? err.message : String(err) };
          }
        })
      );
    },
    async close() {
      await snapshot.flush();
      db.close();
    },
  };
}
