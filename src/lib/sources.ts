import type { AppConfig } from './config';
import { ForgeAdapter, type ForgeClient } from './github';
import { HubAdapter, type HubClient } from './huggingface';
import { LocalScanAdapter } from './local';
import { runWithPool, type PoolOptions } from './pool';
import type { RepositoryRecord, Source, SourceAdapter, SourceTag } from '@/types';

export function sourceTag(source: Source): SourceTag {
  switch (source.kind) {
    case 'forge':
      return 'forge';
    case 'hub':
      return 'hub';
    case 'local':
      return `local:${source.name}`;
  }
}

export function isSourceTag(value: unknown): value is SourceTag {
  return (
    typeof value === 'string' && (value === 'forge' || value === 'hub' || /^local:.+$/.test(value))
  );
}

export function parseSourceTag(tag: SourceTag): Source {
  if (tag === 'forge' || tag === 'hub') return { kind: tag };
  return { kind: 'local', name: tag.slice('local:'.length) };
}

/** Adapters in sync order, keyed by the tag their records carry. */
export type AdapterTable = Map<SourceTag, SourceAdapter>;

export interface SourceClients {
  forge?: ForgeClient;
  hub?: HubClient;
}

export function createAdapters(config: AppConfig, clients: SourceClients): AdapterTable {
  const table: AdapterTable = new Map();
  const { concurrency, scanDepth } = config.sync;

  if (config.forge && clients.forge) {
    table.set('forge', new ForgeAdapter(clients.forge, { basePaths: config.forge.basePaths, concurrency }));
  }

  const hubPaths = config.hub?.paths;
  if (hubPaths && clients.hub && [hubPaths.dataset, hubPaths.model, hubPaths.space].some((p) => p.length > 0)) {
    table.set('hub', new HubAdapter(clients.hub, { paths: hubPaths, concurrency }));
  }

  for (const local of config.localSources) {
    const adapter = new LocalScanAdapter({
      name: local.name,
      basePath: local.path,
      label: local.label,
      maxDepth: scanDepth,
      concurrency,
    });
    table.set(sourceTag(adapter.source), adapter);
  }

  return table;
}

/** Readmes keyed by full_name; records without one are left out. */
export async function fetchReadmes(
  adapter: Pick<SourceAdapter, 'fetchReadme'>,
  records: readonly RepositoryRecord[],
  options: Pick<PoolOptions<RepositoryRecord, string | null>, 'concurrency' | 'onResult'> = {}
): Promise<Map<string, string>> {
  const readmes = new Map<string, string>();
  await runWithPool(records, (record) => adapter.fetchReadme(record), {
    concurrency: options.concurrency,
    onResult: async (readme, record, index) => {
      if (readme) readmes.set(record.full_name, readme);
      await options.onResult?.(readme, record, index);
    },
  });
  return readmes;
}
