export type HubSubtype = 'dataset' | 'model' | 'space';

export type VcsKind = 'git' | 'svn' | 'hg';

export type Source =
  | { kind: 'forge' }
  | { kind: 'hub' }
  | { kind: 'local'; name: string };

export type SourceTag = 'forge' | 'hub' | `local:${string}`;

export interface RepositoryRecord {
  full_name: string;
  name: string;
  description: string | null;
  created_at: string;
  updated_at: string;
  pushed_at: string;
  private: boolean;
  html_url: string;
  clone_url: string;
  default_branch: string;
  topics: string[];
  local_path: string | null;
  readme_content: string | null;
  source: SourceTag;
  source_subtype: string | null;
  // Custom fields
  change_signal: string | null;
  embedded_at: string | null;
  needs_embedding: boolean;
  last_synced_at: string;
}

/**
 * Row layout in the `repositories` table. IndexedDB cannot index booleans, so
 * the flag is stored as 0/1. Columns added after the first schema are optional
 * because older databases and snapshots may not carry them.
 */
export interface StoredRepository
  extends Omit<RepositoryRecord, 'needs_embedding' | 'source' | 'source_subtype' | 'change_signal'> {
  needs_embedding: 0 | 1;
  source?: SourceTag;
  source_subtype?: string | null;
  change_signal?: string | null;
}

/** Everything an adapter observes about a repository. */
export type RepositoryFields = Omit<
  RepositoryRecord,
  'full_name' | 'readme_content' | 'change_signal' | 'embedded_at' | 'needs_embedding' | 'last_synced_at'
>;

export interface RawRepo extends RepositoryFields {
  full_name: string;
  /** Forge: push time. Hub and local scans: null, meaning "existence only". */
  change_signal: string | null;
}

export interface SyncState {
  id: string; // 'last_sync'
  value: string;
}

export interface RepositoryMetadata {
  name: string;
  full_name: string;
  description: string;
  created_at: string;
  topics: string;
  html_url: string;
  is_local: boolean;
  local_path: string;
  private: boolean;
  source: SourceTag;
  source_subtype: string;
}

export interface VectorEntry {
  id: string; // full_name
  embedding: number[];
  document: string;
  metadata: RepositoryMetadata;
  updated_at: string;
}

export interface ProgressUpdate {
  message: string;
  current: number;
  total: number;
}

export type ProgressCallback = (update: ProgressUpdate) => void;

export interface ListContext {
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
  /** Called once per repository as its unit completes. */
  onRepository?: (repo: RawRepo) => Promise<void>;
}

export interface SourceAdapter {
  readonly source: Source;
  readonly label: string;
  listRepositories(context?: ListContext): Promise<RawRepo[]>;
  fetchReadme(record: RepositoryRecord): Promise<string | null>;
}

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
  /** Vectors come back in input order. */
  embedBatch(texts: string[]): Promise<number[][]>;
}

export type SortColumn = 'name' | 'visibility' | 'created';
export type SortDirection = 'asc' | 'desc';
