import { rm } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { parseConfig } from '@/lib/config';
import { ForgeAdapter } from '@/lib/github';
import { HttpError } from '@/lib/http';
import { HttpHubClient, HubAdapter, hubIdentity, parseHubIdentity, type HubClient, type HubRepo } from '@/lib/huggingface';
import { LocalScanAdapter } from '@/lib/local';
import { createAdapters, fetchReadmes, isSourceTag, parseSourceTag, sourceTag } from '@/lib/sources';
import type { HubSubtype, RawRepo } from '@/types';
import { FakeForgeClient, forgeRepo, makeRecord, makeRepo, makeTempDir } from './helpers';

class FakeHubClient implements HubClient {
  listed: HubSubtype[] = [];
  readmeCalls: string[] = [];

  constructor(private readonly repos: Partial<Record<HubSubtype, HubRepo[]>>) {}

  async whoami() {
    return 'octo';
  }

  async listRepos(subtype: HubSubtype) {
    this.listed.push(subtype);
    return this.repos[subtype] ?? [];
  }

  async getReadme(subtype: HubSubtype, id: string) {
    this.readmeCalls.push(`${subtype}:${id}`);
    return `# ${id}`;
  }
}

const collect = () => {
  const seen: RawRepo[] = [];
  return { seen, onRepository: async (repo: RawRepo) => void seen.push(repo) };
};

describe('source adapters', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('ForgeAdapter', () => {
    it('maps forge repositories and finds local clones', async () => {
      const clone = await makeRepo(root, 'widget');
      const client = new FakeForgeClient([
        forgeRepo('widget', { topics: ['ui'] }),
        forgeRepo('gadget', { topics: undefined, pushed_at: null, default_branch: '' }),
      ]);
      const adapter = new ForgeAdapter(client, { basePaths: [root], concurrency: 2 });
      const { seen, onRepository } = collect();

      const results = await adapter.listRepositories({ onRepository });

      expect(results).toHaveLength(2);
      expect(seen).toHaveLength(2);
      const widget = results.find((r) => r.name === 'widget');
      const gadget = results.find((r) => r.name === 'gadget');
      expect(widget).toMatchObject({
        full_name: 'octo/widget',
        topics: ['ui'],
        local_path: clone,
        source: 'forge',
        change_signal: '2024-02-01T00:00:00Z',
      });
      expect(gadget).toMatchObject({
        topics: [],
        local_path: null,
        pushed_at: '2024-01-01T00:00:00Z',
        change_signal: '2024-01-01T00:00:00Z',
        default_branch: 'main',
      });
    });

    it('reports progress per repository', async () => {
      const adapter = new ForgeAdapter(new FakeForgeClient([forgeRepo('widget')]), { basePaths: [], concurrency: 1 });
      const onProgress = vi.fn();

      await adapter.listRepositories({ onProgress });

      expect(onProgress.mock.calls.map(([update]) => update.message)).toEqual([
        'Fetching repository list from GitHub...',
        'Processing 1 repositories...',
        'Syncing widget...',
      ]);
    });

    it('reads a local readme before asking the forge', async () => {
      const clone = await makeRepo(root, 'widget', 'git', { 'README.md': 'local readme' });
      const client = new FakeForgeClient();
      client.readmes.set('octo/gadget', 'remote readme');
      const adapter = new ForgeAdapter(client, { basePaths: [] });

      expect(await adapter.fetchReadme(makeRecord({ full_name: 'octo/widget', local_path: clone }))).toBe('local readme');
      expect(await adapter.fetchReadme(makeRecord({ full_name: 'octo/gadget' }))).toBe('remote readme');
      expect(client.readmeCalls).toEqual(['octo/gadget']);
    });

    it('propagates listing failures', async () => {
      const client = new FakeForgeClient();
      client.listError = new Error('Bad credentials');

      await expect(new ForgeAdapter(client, { basePaths: [] }).listRepositories()).rejects.toThrow('Bad credentials');
    });
  });

  describe('HubAdapter', () => {
    it('lists only subtypes that have base paths', async () => {
      const datasetDir = path.join(root, 'datasets');
      const local = await makeRepo(datasetDir, 'octo_reviews');
      const client = new FakeHubClient({
        dataset: [{ id: 'octo/reviews', createdAt: '2024-01-01T00:00:00Z', description: 'Review texts' }],
        model: [{ id: 'octo/bert-tiny' }],
      });
      const adapter = new HubAdapter(client, { paths: { dataset: [datasetDir], model: [], space: [] } });

      const results = await adapter.listRepositories();

      expect(client.listed).toEqual(['dataset']);
      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({
        full_name: 'hub:dataset:octo/reviews',
        name: 'reviews',
        description: 'Review texts',
        created_at: '2024-01-01T00:00:00Z',
        updated_at: '2024-01-01T00:00:00Z',
        html_url: 'https://huggingface.co/datasets/octo/reviews',
        clone_url: 'https://huggingface.co/datasets/octo/reviews.git',
        local_path: local,
        source: 'hub',
        source_subtype: 'dataset',
        change_signal: null,
      });
    });

    it('keeps the first ten tags and the remote visibility', async () => {
      const tags = Array.from({ length: 12 }, (_, i) => `tag${i}`);
      const client = new FakeHubClient({
        model: [{ id: 'octo/bert-tiny', private: true, tags, cardData: { description: 'From the card' } }],
      });
      const adapter = new HubAdapter(client, { paths: { dataset: [], model: [root], space: [] } });

      const [model] = await adapter.listRepositories();

      expect(model.topics).toEqual(tags.slice(0, 10));
      expect(model.private).toBe(true);
      expect(model.description).toBe('From the card');
      expect(model.html_url).toBe('https://huggingface.co/octo/bert-tiny');
    });

    it('keeps listing other subtypes when one fails', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const client = new FakeHubClient({ model: [{ id: 'octo/bert-tiny' }] });
      client.listRepos = async (subtype) => {
        if (subtype === 'dataset') throw new Error('Service unavailable');
        return subtype === 'model' ? [{ id: 'octo/bert-tiny' }] : [];
      };
      const adapter = new HubAdapter(client, { paths: { dataset: [root], model: [root], space: [] } });
      const onProgress = vi.fn();

      const results = await adapter.listRepositories({ onProgress });

      expect(results.map((r) => r.full_name)).toEqual(['hub:model:octo/bert-tiny']);
      expect(onProgress).toHaveBeenCalledWith({
        message: 'Hugging Face datasets sync error: Service unavailable',
        current: 0,
        total: 0,
      });
      vi.restoreAllMocks();
    });

    it('fetches readmes by the id inside the identity', async () => {
      const client = new FakeHubClient({});
      const adapter = new HubAdapter(client, { paths: { dataset: [], model: [], space: [] } });

      const readme = await adapter.fetchReadme(makeRecord({ full_name: 'hub:space:octo/demo', source: 'hub' }));

      expect(readme).toBe('# octo/demo');
      expect(client.readmeCalls).toEqual(['space:octo/demo']);
    });

    it('round-trips identities', () => {
      expect(hubIdentity('model', 'octo/bert')).toBe('hub:model:octo/bert');
      expect(parseHubIdentity('hub:model:octo/bert')).toEqual({ subtype: 'model', id: 'octo/bert' });
      expect(parseHubIdentity('octo/bert')).toBeNull();
    });
  });

  describe('HttpHubClient', () => {
    it('sends the token and parses listings', async () => {
      const fetchFn = vi.fn(async (input: string | URL, _init?: RequestInit) => {
        const url = String(input);
        if (url.endsWith('/api/whoami-v2')) return Response.json({ name: 'octo' });
        return Response.json([{ id: 'octo/bert-tiny', private: false }]);
      });
      const client = new HttpHubClient({ token: 'test-token', endpoint: 'https://hub.test/', fetchFn });

      expect(await client.whoami()).toBe('octo');
      expect(await client.whoami()).toBe('octo');
      expect(await client.listRepos('model', 'octo')).toEqual([{ id: 'octo/bert-tiny', private: false }]);

      expect(fetchFn).toHaveBeenCalledTimes(2);
      expect(fetchFn.mock.calls[1][0]).toBe('https://hub.test/api/models?author=octo&full=true&limit=1000');
      const init = fetchFn.mock.calls[0][1];
      expect(init?.headers).toEqual({ Authorization: 'Bearer test-token' });
    });

    it('follows next links across listing pages', async () => {
      const next = 'https://hub.test/api/models?author=octo&full=true&limit=1000&cursor=2';
      const fetchFn = vi.fn(async (input: string | URL, _init?: RequestInit) => {
        if (String(input) === next) return Response.json([{ id: 'octo/model-1000' }]);
        const page = Array.from({ length: 1000 }, (_, i) => ({ id: `octo/model-${i}` }));
        return Response.json(page, { headers: { Link: `<${next}>; rel="next"` } });
      });
      const client = new HttpHubClient({ token: 'test-token', endpoint: 'https://hub.test', fetchFn });

      const repos = await client.listRepos('model', 'octo');

      expect(fetchFn).toHaveBeenCalledTimes(2);
      expect(fetchFn.mock.calls[1][0]).toBe(next);
      expect(repos).toHaveLength(1001);
      expect(repos[1000].id).toBe('octo/model-1000');
    });

    it('returns null for a missing readme and throws on other errors', async () => {
      const fetchFn = vi.fn(async (input: string | URL, _init?: RequestInit) =>
        String(input).includes('missing') ? new Response('', { status: 404 }) : new Response('', { status: 500 })
      );
      const client = new HttpHubClient({ token: 'test-token', endpoint: 'https://hub.test', fetchFn });

      expect(await client.getReadme('dataset', 'octo/missing')).toBeNull();
      await expect(client.getReadme('dataset', 'octo/broken')).rejects.toBeInstanceOf(HttpError);
      expect(fetchFn.mock.calls[0][0]).toBe('https://hub.test/datasets/octo/missing/raw/main/README.md');
    });
  });

  describe('LocalScanAdapter', () => {
    it('turns working copies into records', async () => {
      const alpha = await makeRepo(root, 'alpha', 'git', {
        '.git/config': '[remote "origin"]\n\turl = https://example.com/alpha.git\n',
        'README.md': '# Alpha\nFirst project',
      });
      await makeRepo(root, 'nested/beta', 'hg');
      const adapter = new LocalScanAdapter({ name: 'work', basePath: root, concurrency: 1 });

      const results = await adapter.listRepositories();

      expect(adapter.label).toBe('work repositories');
      expect(results.map((r) => r.full_name)).toEqual(['work:alpha', 'work:beta']);
      expect(results[0]).toMatchObject({
        name: 'alpha',
        description: 'First project',
        clone_url: 'https://example.com/alpha.git',
        html_url: '',
        local_path: alpha,
        source: 'local:work',
        source_subtype: 'git',
        change_signal: null,
      });
      expect(results[1].source_subtype).toBe('hg');
      expect(await adapter.fetchReadme(makeRecord({ full_name: 'work:alpha', local_path: alpha }))).toBe(
        '# Alpha\nFirst project'
      );
    });
  });

  describe('sources', () => {
    it('converts between sources and tags', () => {
      expect(sourceTag({ kind: 'local', name: 'work' })).toBe('local:work');
      expect(parseSourceTag('local:work')).toEqual({ kind: 'local', name: 'work' });
      expect(parseSourceTag('hub')).toEqual({ kind: 'hub' });
      expect(isSourceTag('local:')).toBe(false);
      expect(isSourceTag('forge')).toBe(true);
    });

    it('builds adapters in configuration order', () => {
      const config = parseConfig({
        dataDir: root,
        embedding: { apiKey: 'test-key' },
        forge: { token: 'test-token' },
        hub: { token: 'test-token' },
        localSources: [
          { name: 'work', path: '/work', label: 'Work' },
          { name: 'forks', path: '/forks' },
        ],
      });

      const adapters = createAdapters(config, { forge: new FakeForgeClient(), hub: new FakeHubClient({}) });

      expect([...adapters.keys()]).toEqual(['forge', 'local:work', 'local:forks']);
      expect(adapters.get('local:work')?.label).toBe('Work');
    });

    it('collects readmes and skips failures', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const adapter = {
        fetchReadme: async (record: { full_name: string }) => {
          if (record.full_name === 'octo/broken') throw new Error('timeout');
          return record.full_name === 'octo/empty' ? null : `readme of ${record.full_name}`;
        },
      };

      const readmes = await fetchReadmes(adapter, [
        makeRecord({ full_name: 'octo/a' }),
        makeRecord({ full_name: 'octo/broken' }),
        makeRecord({ full_name: 'octo/empty' }),
      ]);

      expect([...readmes.entries()]).toEqual([['octo/a', 'readme of octo/a']]);
      vi.restoreAllMocks();
    });
  });
});
