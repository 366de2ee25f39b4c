import { Octokit, RequestError } from 'octokit';
import { runWithPool, DEFAULT_CONCURRENCY } from './pool';
import { readReadme, resolveLocalPath } from './vcs';
import type { ListContext, RawRepo, RepositoryRecord, Source, SourceAdapter } from '@/types';

export interface ForgeRepo {
  name: string;
  full_name: string;
  owner: string;
  description: string | null;
  private: boolean;
  html_url: string;
  clone_url: string;
  default_branch: string;
  created_at: string | null;
  updated_at: string | null;
  pushed_at: string | null;
  topics?: string[];
}

export interface ForgeClient {
  getAuthenticatedUser(): Promise<string>;
  /** Every repository of the authenticated account, all pages. */
  listRepos(): Promise<ForgeRepo[]>;
  getTopics(repo: ForgeRepo): Promise<string[]>;
  getReadme(fullName: string): Promise<string | null>;
}

function splitFullName(fullName: string) {
  const [owner, repo] = fullName.split('/');
  if (!owner || !repo) throw new Error(`Not an owner/repo name: ${fullName}`);
  return { owner, repo };
}

export class OctokitForgeClient implements ForgeClient {
  private readonly octokit: Octokit;

  constructor(token: string) {
    this.octokit = new Octokit({ auth: token });
  }

  async getAuthenticatedUser() {
    const { data } = await this.octokit.rest.users.getAuthenticated();
    return data.login;
  }

  async listRepos(): Promise<ForgeRepo[]> {
    const repos = await this.octokit.paginate(this.octokit.rest.repos.listForAuthenticatedUser, {
      per_page: 100,
      sort: 'updated',
      direction: 'desc',
    });

    return repos.map((repo) => ({
      name: repo.name,
      full_name: repo.full_name,
      owner: repo.owner.login,
      description: repo.description,
      private: repo.private,
      html_url: repo.html_url,
      clone_url: repo.clone_url,
      default_branch: repo.default_branch,
      created_at: repo.created_at ?? null,
      updated_at: repo.updated_at ?? null,
      pushed_at: repo.pushed_at ?? null,
      topics: repo.topics,
    }));
  }

  async getTopics(repo: ForgeRepo) {
    const { data } = await this.octokit.rest.repos.getAllTopics({
      owner: repo.owner,
      repo: repo.name,
    });
    return data.names;
  }

  async getReadme(fullName: string): Promise<string | null> {
    const { owner, repo } = splitFullName(fullName);
    try {
      const { data } = await this.octokit.rest.repos.getReadme({
        owner,
        repo,
        mediaType: {
          format: 'raw',
        },
      });
      // the raw media type turns the JSON body into the file itself
      return typeof data === 'string' ? data : null;
    } catch (e) {
      if (e instanceof RequestError && e.status === 404) return null;
      throw e;
    }
  }
}

export interface ForgeAdapterOptions {
  basePaths: string[];
  concurrency?: number;
}

export class ForgeAdapter implements SourceAdapter {
  readonly source: Source = { kind: 'forge' };
  readonly label = 'GitHub';

  constructor(
    private readonly client: ForgeClient,
    private readonly options: ForgeAdapterOptions
  ) {}

  async listRepositories(context: ListContext = {}): Promise<RawRepo[]> {
    const { signal, onProgress, onRepository } = context;

    onProgress?.({ message: 'Fetching repository list from GitHub...', current: 0, total: 0 });
    const repos = await this.client.listRepos();
    const total = repos.length;
    onProgress?.({ message: `Processing ${total} repositories...`, current: 0, total });

    let current = 0;
    const { results } = await runWithPool(repos, (repo) => this.toRawRepo(repo), {
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
    return this.client.getReadme(record.full_name);
  }

  private async toRawRepo(repo: ForgeRepo): Promise<RawRepo> {
    let topics: string[];
    try {
      topics = repo.topics ?? (await this.client.getTopics(repo));
    } catch (err) {
      console.warn(`Could not fetch topics for ${repo.full_name}`, err);
      topics = [];
    }

    const now = new Date().toISOString();
    const createdAt = repo.created_at ?? now;
    const pushedAt = repo.pushed_at ?? createdAt;

    return {
      full_name: repo.full_name,
      name: repo.name,
      description: repo.description,
      created_at: createdAt,
      updated_at: repo.updated_at ?? createdAt,
      pushed_at: pushedAt,
      private: repo.private,
      html_url: repo.html_url,
      clone_url: repo.clone_url,
      default_branch: repo.default_branch || 'main',
      topics,
      local_path: await resolveLocalPath(this.options.basePaths, [repo.name]),
      source: 'forge',
      source_subtype: null,
      change_signal: pushedAt,
    };
  }
}
