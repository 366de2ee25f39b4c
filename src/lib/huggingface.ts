import { z } from 'zod';
import { fetchWithTimeout, HttpError, type FetchFn } from './http';
import { runWithPool, DEFAULT_CONCURRENCY } from './pool';
import { inferPrivacy, readReadme, resolveLocalPath } from './vcs';
import type { HubSubtype, ListContext, RawRepo, RepositoryRecord, Source, SourceAdapter } from '@/types';

export const HUB_SUBTYPES: readonly HubSubtype[] = ['dataset', 'model', 'space'];

const MAX_TOPICS = 10;

const hubRepoSchema = z.object({
  id: z.string(),
  private: z.boolean().optional(),
  createdAt: z.string().optional(),
  lastModified: z.string().optional(),
  tags: z.array(z.string()).optional(),
  description: z.string().nullable().optional(),
  cardData: z.object({ description: z.string().optional() }).passthrough().nullable().optional(),
});

export type HubRepo = z.infer<typeof hubRepoSchema>;

export interface HubClient {
  whoami(): Promise<string>;
  listRepos(subtype: HubSubtype, author: string): Promise<HubRepo[]>;
  getReadme(subtype: HubSubtype, id: string): Promise<string | null>;
}

const LIST_PATHS: Record<HubSubtype, string> = {
  dataset: 'datasets',
  model: 'models',
  space: 'spaces',
};

/** Prefix of a repository's web path: models live at the root. */
const WEB_PREFIX: Record<HubSubtype, string> = {
  dataset: 'datasets/',
  model: '',
  space: 'spaces/',
};

export function hubIdentity(subtype: HubSubtype, id: string) {
  return `hub:${subtype}:${id}`;
}

export function parseHubIdentity(fullName: string): { subtype: HubSubtype; id: string } | null {
  const match = /^hub:(dataset|model|space):(.+)$/.exec(fullName);
  if (!match) return null;
  const subtype = HUB_SUBTYPES.find((s) => s === match[1]);
  return subtype ? { subtype, id: match[2] } : null;
}

function nextPageUrl(link: string | null): string | null {
  if (!link) return null;
  for (const part of link.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="?next"?/.exec(part);
    if (match) return match[1];
  }
  return null;
}

export interface HttpHubClientOptions {
  token: string;
  endpoint?: string;
  timeoutMs?: number;
  fetchFn?: FetchFn;
}

export class HttpHubClient implements HubClient {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private user: string | null = null;

  constructor(private readonly options: HttpHubClientOptions) {
    this.endpoint = (options.endpoint ?? 'https://huggingface.co').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  private async request(pathname: string) {
    return this.fetchUrl(`${this.endpoint}${pathname}`);
  }

  private async fetchUrl(url: string) {
    return fetchWithTimeout(
      url,
      { headers: { Authorization: `Bearer ${this.options.token}` } },
      this.timeoutMs,
      this.fetchFn
    );
  }

  async whoami() {
    if (this.user) return this.user;
    const res = await this.request('/api/whoami-v2');
    if (!res.ok) throw new HttpError(res.status, res.url || '/api/whoami-v2');
    const body = z.object({ name: z.string() }).parse(await res.json());
    this.user = body.name;
    return body.name;
  }

  /** Follows `Link: rel="next"` until the listing is exhausted. */
  async listRepos(subtype: HubSubtype, author: string) {
    const repos: HubRepo[] = [];
    let url: string | null =
      `${this.endpoint}/api/${LIST_PATHS[subtype]}?author=${encodeURIComponent(author)}&full=true&limit=1000`;

    while (url) {
      const res: Response = await this.fetchUrl(url);
      if (!res.ok) throw new HttpError(res.status, url);
      repos.push(...z.array(hubRepoSchema).parse(await res.json()));
      url = nextPageUrl(res.headers.get('link'));
    }
    return repos;
  }

  async getReadme(subtype: HubSubtype, id: string) {
    const pathname = `/${WEB_PREFIX[subtype]}${id}/raw/main/README.md`;
    const res = await this.request(pathname);
    if (res.status === 404) return null;
    if (!res.ok) throw new HttpError(res.status, pathname);
    return res.text();
  }
}

export interface HubAdapterOptions {
  /** Up to two base directories per subtype, searched in slot order. */
  paths: Record<HubSubtype, string[]>;
  concurrency?: number;
}

export class HubAdapter implements SourceAdapter {
  readonly source: Source = { kind: 'hub' };
  readonly label = 'Hugging Face';

  constructor(
    private readonly client: HubClient,
    private readonly options: HubAdapterOptions
  ) {}

  private basePaths(subtype: HubSubtype) {
    return this.options.paths[subtype].filter(Boolean);
  }

  async listRepositories(context: ListContext = {}): Promise<RawRepo[]> {
    const { signal, onProgress, onRepository } = context;
    const author = await this.client.whoami();

    const work: Array<{ subtype: HubSubtype; repo: HubRepo }> = [];
    for (const subtype of HUB_SUBTYPES) {
      if (this.basePaths(subtype).length === 0) continue;
      onProgress?.({ message: `Fetching ${LIST_PATHS[subtype]} from Hugging Face...`, current: 0, total: 0 });
      try {
        const repos = await this.client.listRepos(subtype, author);
        repos.forEach((repo) => work.push({ subtype, repo }));
      } catch (err) {
        console.error(`Hugging Face ${LIST_PATHS[subtype]} listing failed`, err);
        const message = err instanceof Error ? err.message : String(err);
        onProgress?.({ message: `Hugging Face ${LIST_PATHS[subtype]} sync error: ${message}`, current: 0, total: 0 });
      }
    }

    const total = work.length;
    onProgress?.({ message: `Processing ${total} Hugging Face repositories...`, current: 0, total });

    let current = 0;
    const { results } = await runWithPool(work, ({ subtype, repo }) => this.toRawRepo(subtype, repo), {
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
    if (record.local_path) {
      const local = await readReadme(record.local_path);
      if (local) return local;
    }
    const parsed = parseHubIdentity(record.full_name);
    if (!parsed) return null;
    return this.client.getReadme(parsed.subtype, parsed.id);
  }

  private async toRawRepo(subtype: HubSubtype, repo: HubRepo): Promise<RawRepo> {
    const name = repo.id.split('/').pop() || repo.id;
    const localPath = await resolveLocalPath(this.basePaths(subtype), [name, repo.id.replace(/\//g, '_')]);
    const createdAt = repo.createdAt ?? new Date().toISOString();
    const updatedAt = repo.lastModified ?? createdAt;

    return {
      full_name: hubIdentity(subtype, repo.id),
      name,
      description: repo.description ?? repo.cardData?.description ?? null,
      created_at: createdAt,
      updated_at: updatedAt,
      pushed_at: updatedAt,
      private: localPath ? inferPrivacy(localPath) : (repo.private ?? false),
      html_url: `https://huggingface.co/${WEB_PREFIX[subtype]}${repo.id}`,
      clone_url: `https://huggingface.co/${WEB_PREFIX[subtype]}${repo.id}.git`,
      default_branch: 'main',
      topics: (repo.tags ?? []).slice(0, MAX_TOPICS),
      local_path: localPath,
      source: 'hub',
      source_subtype: subtype,
      change_signal: null,
    };
  }
}
