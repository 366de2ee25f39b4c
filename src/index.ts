export { createApp, SNAPSHOT_FILE, type AppContainer, type AppOverrides, type ConnectionCheck } from './app';
export { OpenAIEmbeddingProvider, type EmbeddingsClient } from './lib/ai';
export { SnapshotFile, SnapshotWriteError, exportAll, importSnapshot, parseSnapshot, type Persistence } from './lib/backup';
export { CatalogStore } from './lib/catalog';
export { ConfigError, loadConfig, parseConfig, type AppConfig } from './lib/config';
export { RepoAtlasDB } from './lib/db';
export { ForgeAdapter, OctokitForgeClient, type ForgeClient, type ForgeRepo } from './lib/github';
export { HttpHubClient, HubAdapter, type HubClient, type HubRepo } from './lib/huggingface';
export { LocalScanAdapter } from './lib/local';
export { runWithPool } from './lib/pool';
export {
  HybridSearchEngine,
  createSemanticLookup,
  hybridScore,
  keywordMatches,
  paginate,
  rankRepositories,
  type SearchView,
} from './lib/search';
export { createAdapters, isSourceTag, parseSourceTag, sourceTag, type AdapterTable } from './lib/sources';
export { SyncOrchestrator, type SyncResult, type SyncRunOptions } from './lib/sync';
export { detect, scan } from './lib/vcs';
export { VectorIndex, cosineSimilarity, toEmbeddingText } from './lib/vector';
export type * from './types';
