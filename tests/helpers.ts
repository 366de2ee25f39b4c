import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { IDBFactory } from 'fake-indexeddb';
import { RepoAtlasDB } from '@/lib/db';
import type { ForgeClient, ForgeRepo } from '@/lib/github';
import type { EmbeddingProvider, RepositoryFields, RepositoryRecord, VcsKind } from '@/types';

export function createTestDb(factory = new IDBFactory()) {
  return new RepoAtlasDB({ indexedDB: factory });
}

export function repoFields(overrides: Partial<RepositoryFields> = {}): RepositoryFields {
  return {
    name: 'widget',
    description: 'A small widget library',
    created_at: '2024-01-01T00:00:00Z',
    updated_at: '2024-01-02T00:00:00Z',
    pushed_at: '2024-01-02T00:00:00Z',
    private: false,
    html_url: 'https://github.com/octo/widget',
    clone_url: 'https://github.com/octo/widget.git',
    default_branch: 'main',
    topics: ['ui'],
    local_path: null,
    source: 'forge',
    source_subtype: null,
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<RepositoryRecord> & { full_name: string }): RepositoryRecord {
  return {
    ...repoFields(),
    readme_content: null,
    change_signal: null,
    embedded_at: null,
    needs_embedding: false,
    last_synced_at: '2024-01-03T00:00:00Z',
    ...overrides,
  };
}

export async function makeTempDir() {
  return mkdtemp(path.join(os.tmpdir(), 'repo-atlas-'));
}

const MARKER_DIRS: Record<VcsKind, string> = { git: '.git', svn: '.svn', hg: '.hg' };

/** Creates `<root>/<relative>` as a working copy with the given files. */
export async function makeRepo(
  root: string,
  relative: string,
  kind: VcsKind = 'git',
  files: Record<string, string> = {}
) {
  const dir = path.join(root, relative);
  await mkdir(path.join(dir, MARKER_DIRS[kind]), { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await mkdir(path.dirname(path.join(dir, name)), { recursive: true });
    await writeFile(path.join(dir, name), content);
  }
  return dir;
}

export function forgeRepo(name: string, overrides: Partial<ForgeRepo> = {}): ForgeRepo {
  return {
    name,
    full_name: `octo/${name}`,
    owner: 'octo',
    description: `${name} description`,
    private: false,
    html_url: `https://github.com/octo/${name}`,
    clone_url: `https://github.com/octo/${name}.git`,
    default_branch: 'main',
    created_at: '2024-01-01T00:00:00Z',
    updated_at: '2024-02-01T00:00:00Z',
    pushed_at: '2024-02-01T00:00:00Z',
    topics: [],
    ...overrides,
  };
}

export class FakeForgeClient implements ForgeClient {
  readmes = new Map<string, string>();
  readmeCalls: string[] = [];
  listError: Error | null = null;

  constructor(public repos: ForgeRepo[] = []) {}

  async getAuthenticatedUser() {
    return 'octo';
  }

  async listRepos() {
    if (this.listError) throw this.listError;
    return this.repos.map((repo) => ({ ...repo }));
  }

  async getTopics() {
    return [];
  }

  async getReadme(fullName: string) {
    this.readmeCalls.push(fullName);
    return this.readmes.get(fullName) ?? null;
  }
}

/** Deterministic 3-dimensional vectors derived from the text. */
export function fakeVector(text: string) {
  return [text.length, 1, 0];
}

export class FakeEmbedder implements EmbeddingProvider {
  calls: string[][] = [];
  failWhen: ((texts: string[]) => boolean) | null = null;

  async embed(text: string) {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]) {
    this.calls.push(texts);
    if (this.failWhen?.(texts)) throw new Error('rate limited');
    return texts.map(fakeVector);
  }
}
