import { rm, stat } from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '@/app';
import { parseConfig } from '@/lib/config';
import type { HubClient } from '@/lib/huggingface';
import { FakeEmbedder, FakeForgeClient, forgeRepo, makeRepo, makeTempDir } from './helpers';

describe('createApp', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await makeTempDir();
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  const config = () =>
    parseConfig({
      dataDir,
      forge: { token: 'test-token' },
      embedding: { apiKey: 'test-key' },
    });

  const overrides = () => {
    const forge = new FakeForgeClient([
      forgeRepo('alpha', { created_at: '2024-03-01T00:00:00Z' }),
      forgeRepo('beta', { created_at: '2024-02-01T00:00:00Z' }),
      forgeRepo('gamma', { created_at: '2024-01-01T00:00:00Z' }),
    ]);
    forge.readmes.set('octo/alpha', '# Alpha readme');
    return { forge, embedder: new FakeEmbedder() };
  };

  it('persists the catalog between runs', async () => {
    const first = await createApp(config(), overrides());
    const result = await first.orchestrator.run();
    expect(result.embedded).toBe(3);
    await first.close();

    const second = await createApp(config(), overrides());
    expect(await second.store.count()).toBe(3);
    expect(await second.vectors.count()).toBe(3);
    expect(await second.store.getRepositoriesNeedingEmbedding()).toEqual([]);

    const again = await second.orchestrator.run();
    expect(again).toMatchObject({ changed: 0, embedded: 0 });
    await second.close();
  });

  it('searches the synced catalog', async () => {
    const app = await createApp(config(), overrides());
    await app.orchestrator.run();

    const engine = app.createSearchEngine();
    engine.setRepositories(await app.store.getAll());
    engine.setQuery('alpha');
    await engine.flush();

    const view = engine.getView();
    expect(view.semanticActive).toBe(true);
    expect(view.total).toBe(3);
    expect(view.items[0].full_name).toBe('octo/alpha');

    engine.dispose();
    await app.close();
  });

  it('removes a repository together with its vector', async () => {
    const app = await createApp(config(), overrides());
    await app.orchestrator.run();

    await app.removeRepository('octo/beta');
    expect(await app.store.get('octo/beta')).toBeNull();
    expect(await app.vectors.get('octo/beta')).toBeNull();

    expect(await app.removeSource('forge')).toBe(2);
    expect(await app.vectors.count()).toBe(0);
    await app.close();
  });

  it('only builds adapters for configured sources', async () => {
    const app = await createApp(parseConfig({ dataDir, embedding: { apiKey: 'test-key' } }), {
      embedder: new FakeEmbedder(),
    });

    expect(app.adapters.size).toBe(0);
    await app.close();
  });

  it('deletes a local checkout and keeps the record', async () => {
    const root = await makeTempDir();
    try {
      const dir = await makeRepo(root, 'notes', 'git', { 'README.md': 'Personal notes' });
      const app = await createApp(
        parseConfig({ dataDir, embedding: { apiKey: 'test-key' }, localSources: [{ name: 'work', path: root }] }),
        { embedder: new FakeEmbedder() }
      );
      await app.orchestrator.run();
      expect(await app.vectors.get('work:notes')).not.toBeNull();

      expect(await app.deleteLocalCopy('work:notes')).toBe(dir);

      await expect(stat(dir)).rejects.toThrow();
      const record = await app.store.get('work:notes');
      expect(record?.local_path).toBeNull();
      expect(await app.vectors.get('work:notes')).toBeNull();
      await expect(app.deleteLocalCopy('work:notes')).rejects.toThrow('work:notes has no local copy');
      await expect(app.deleteLocalCopy('work:missing')).rejects.toThrow('No repository named work:missing');
      await app.close();
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });

  it('reports who each configured token belongs to', async () => {
    const hub: HubClient = {
      whoami: async () => {
        throw new Error('Invalid token');
      },
      listRepos: async () => [],
      getReadme: async () => null,
    };
    const app = await createApp(
      parseConfig({
        dataDir,
        forge: { token: 'test-token' },
        hub: { token: 'test-token' },
        embedding: { apiKey: 'test-key' },
      }),
      { ...overrides(), hub }
    );

    expect(await app.checkConnections()).toEqual([
      { label: 'GitHub', ok: true, message: 'Connected as octo' },
      { label: 'Hugging Face', ok: false, message: 'Invalid token' },
    ]);
    await app.close();
  });
});
