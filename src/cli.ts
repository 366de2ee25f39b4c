// Command line entry point: npm start -- <command> [options]

import { createApp, type AppContainer } from './app';
import { ConfigError, loadConfig } from './lib/config';
import { isSourceTag } from './lib/sources';
import { SYNC_STAGES } from './lib/sync';
import type { RepositoryRecord, SortColumn } from './types';

const SORT_COLUMNS: readonly SortColumn[] = ['name', 'visibility', 'created'];

interface ParsedFlags {
  page: number;
  sort?: SortColumn;
  ascending: boolean;
  publicOnly: boolean;
  privateOnly: boolean;
  yes: boolean;
  help: boolean;
  remaining: string[];
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function parseFlags(args: string[]): ParsedFlags {
  const flags: ParsedFlags = {
    page: 1,
    ascending: false,
    publicOnly: false,
    privateOnly: false,
    yes: false,
    help: false,
    remaining: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      flags.help = true;
    } else if (arg === '--page' || arg === '-p') {
      const page = parseInt(args[++i], 10);
      if (isNaN(page) || page < 1) fail(`Invalid page: ${args[i]}`);
      flags.page = page;
    } else if (arg === '--sort' || arg === '-s') {
      const column = SORT_COLUMNS.find((c) => c === args[i + 1]);
      if (!column) fail(`Invalid sort column: ${args[i + 1]}. Use one of ${SORT_COLUMNS.join(', ')}`);
      flags.sort = column;
      i++;
    } else if (arg === '--asc') {
      flags.ascending = true;
    } else if (arg === '--public') {
      flags.publicOnly = true;
    } else if (arg === '--private') {
      flags.privateOnly = true;
    } else if (arg === '--yes' || arg === '-y') {
      flags.yes = true;
    } else if (!arg.startsWith('-')) {
      flags.remaining.push(arg);
    }
  }

  return flags;
}

function formatRecord(record: RepositoryRecord) {
  const visibility = record.private ? 'private' : 'public';
  const lines = [`${record.full_name}  [${record.source}, ${visibility}]`];
  if (record.description) lines.push(`    ${record.description}`);
  if (record.local_path) lines.push(`    ${record.local_path}`);
  return lines.join('\n');
}

async function runSync(app: AppContainer) {
  const controller = new AbortController();
  const onInterrupt = () => {
    console.log('\nCancelling sync...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const result = await app.orchestrator.run({
      signal: controller.signal,
      onStage: (stage, name) => console.log(`[${stage}/${SYNC_STAGES.length}] ${name}`),
      onProgress: ({ message, current, total }) => {
        console.log(total > 0 && current > 0 ? `  ${message} (${current}/${total})` : `  ${message}`);
      },
    });

    if (result.storageError) {
      fail(`Sync stopped after ${result.total} repositories: ${result.storageError}`);
    }
    if (result.cancelled) {
      console.log(`Sync cancelled after ${result.total} repositories`);
      return;
    }
    console.log(
      `Synced ${result.total} repositories: ${result.changed} changed, ${result.embedded} embedded` +
        (result.failedBatches > 0 ? `, ${result.failedBatches} batches failed` : '')
    );
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

async function runSearch(app: AppContainer, flags: ParsedFlags) {
  const query = flags.remaining.join(' ').trim();
  if (!query) fail('Usage: search <query> [--page N] [--sort name|visibility|created] [--asc]');

  const engine = app.createSearchEngine();
  try {
    engine.setRepositories(await app.store.getAll());
    engine.setVisibility({ showPublic: !flags.privateOnly, showPrivate: !flags.publicOnly });
    if (flags.sort) engine.setSort({ column: flags.sort, direction: flags.ascending ? 'asc' : 'desc' });
    engine.setQuery(query);
    await engine.flush();
    engine.setPage(flags.page - 1);

    const view = engine.getView();
    if (view.total === 0) {
      console.log(`No repositories match "${query}"`);
      return;
    }
    console.log(
      `${view.total} results for "${query}"${view.semanticActive ? '' : ' (keyword only)'}, ` +
        `page ${view.page + 1}/${view.totalPages}\n`
    );
    view.items.forEach((record) => console.log(formatRecord(record)));
  } finally {
    engine.dispose();
  }
}

async function runStatus(app: AppContainer) {
  const [total, pending, vectors, lastSync] = await Promise.all([
    app.store.count(),
    app.store.getRepositoriesNeedingEmbedding(),
    app.vectors.count(),
    app.store.getLastSyncTime(),
  ]);

  console.log(`Repositories:      ${total}`);
  console.log(`Vectors:           ${vectors}`);
  console.log(`Needing embedding: ${pending.length}`);
  console.log(`Last sync:         ${lastSync ? lastSync.toLocaleString() : 'never'}`);
  console.log(`Sources:           ${[...app.adapters.values()].map((a) => a.label).join(', ') || 'none configured'}`);
}

async function runRemove(app: AppContainer, flags: ParsedFlags) {
  const [target] = flags.remaining;
  if (!target) fail('Usage: remove <full_name> | remove source <tag>');

  if (flags.remaining.length > 1 && target === 'source') {
    const tag = flags.remaining[1];
    if (!isSourceTag(tag)) fail(`Invalid source tag: ${tag}`);
    const removed = await app.removeSource(tag);
    console.log(`Removed ${removed} repositories from ${tag}`);
    return;
  }

  if (!(await app.store.get(target))) fail(`No repository named ${target}`);
  await app.removeRepository(target);
  console.log(`Removed ${target}`);
}

async function runDeleteLocal(app: AppContainer, flags: ParsedFlags) {
  const [target] = flags.remaining;
  if (!target) fail('Usage: delete-local <full_name> --yes');

  const record = await app.store.get(target);
  if (!record) fail(`No repository named ${target}`);
  if (!record.local_path) fail(`${target} has no local copy`);
  if (!flags.yes) {
    fail(`This permanently deletes ${record.local_path}. Run again with --yes to confirm.`);
  }

  const removed = await app.deleteLocalCopy(target);
  console.log(`Deleted ${removed}`);
}

async function runCheck(app: AppContainer) {
  const checks = await app.checkConnections();
  if (checks.length === 0) {
    console.log('No remote sources configured');
    return;
  }
  for (const { label, ok, message } of checks) {
    console.log(`${label}: ${message}`);
    if (!ok) process.exitCode = 1;
  }
}

const USAGE = `
repo-atlas - catalog your repositories and search them by meaning

Usage:
  npm start -- <command> [options]

Commands:
  sync                   Collect repositories from every source and embed changes
  search <query>         Search the catalog (keyword + semantic)
  status                 Show catalog counts and the last sync time
  clear-embeddings       Flag every repository for re-embedding
  remove <full_name>     Delete one repository
  remove source <tag>    Delete every repository of a source (forge, hub, local:<name>)
  delete-local <name>    Delete a repository's local checkout (needs --yes)
  check                  Test the GitHub and Hugging Face tokens

Search options:
  -p, --page <n>         Result page, starting at 1
  -s, --sort <column>    name, visibility or created
      --asc              Ascending column order
      --public           Public repositories only
      --private          Private repositories only
`;

async function main() {
  const [command, ...rest] = process.argv.slice(2);
  const flags = parseFlags(rest);

  if (!command || command === '--help' || command === '-h' || flags.help) {
    console.log(USAGE);
    return;
  }

  const app = await createApp(await loadConfig());
  try {
    switch (command) {
      case 'sync':
        await runSync(app);
        break;
      case 'search':
        await runSearch(app, flags);
        break;
      case 'status':
        await runStatus(app);
        break;
      case 'clear-embeddings':
        await app.store.clearAllEmbeddings();
        console.log('Every repository will be re-embedded on the next sync');
        break;
      case 'remove':
        await runRemove(app, flags);
        break;
      case 'delete-local':
        await runDeleteLocal(app, flags);
        break;
      case 'check':
        await runCheck(app);
        break;
      default:
        console.log(USAGE);
        fail(`Unknown command: ${command}`);
    }
  } finally {
    await app.close();
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    fail(err.message);
  }
  console.error('Error:', err);
  process.exit(1);
});
