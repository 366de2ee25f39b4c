import { runWithPool, DEFAULT_CONCURRENCY } from './pool';
import { inferPrivacy, readDescription, readReadme, scan, type RepoInfo } from './vcs';
import type { ListContext, RawRepo, RepositoryRecord, Source, SourceAdapter } from '@/types';

export interface LocalScanOptions {
  name: string;
  basePath: string;
  label?: string;
  maxDepth?: number;
  concurrency?: number;
}

/** Working copies found under one directory tree, e.g. "work" or "forks". */
export class LocalScanAdapter implements SourceAdapter {
  readonly source: Source;
  readonly label: string;

  constructor(private readonly options: LocalScanOptions) {
    this.source = { kind: 'local', name: options.name };
    this.label = options.label ?? `${options.name} repositories`;
  }

  async listRepositories(context: ListContext = {}): Promise<RawRepo[]> {
    const { signal, onProgress, onRepository } = context;
    const { basePath, name } = this.options;

    onProgress?.({ message: `Scanning ${basePath} for repositories...`, current: 0, total: 0 });
    const found = await scan(basePath, this.options.maxDepth ?? 2);
    const total = found.length;
    onProgress?.({ message: `Found ${total} repositories in ${name}`, current: 0, total });

    let current = 0;
    const { results } = await runWithPool(found, (info) => this.toRawRepo(info), {
      concurrency: this.options.concurrency ?? DEFAULT_CONCURRENCY,
      signal,
      onResult: async (raw) => {
        current++;
        onProgress?.({ message: `Syncing ${raw.name}...`, current, total });
        await onRepository?.(raw);
      },
    });
    return results;
  }

  async fetchReadme(record: RepositoryRecord) {
    return record.local_path ? readReadme(record.local_path) : null;
  }

  private async toRawRepo(info: RepoInfo): Promise<RawRepo> {
    const now = new Date().toISOString();
    return {
      full_name: `${this.options.name}:${info.name}`,
      name: info.name,
      description: await readDescription(info.root),
      created_at: now,
      updated_at: now,
      pushed_at: now,
      private: inferPrivacy(info.root),
      html_url: '',
      clone_url: info.remoteUrl ?? '',
      default_branch: 'main',
      topics: [],
      local_path: info.root,
      source: `local:${this.options.name}`,
      source_subtype: info.kind,
      change_signal: null,
    };
  }
}
