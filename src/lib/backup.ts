import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { gzip, ungzip } from 'pako';
import { z } from 'zod';
import type { RepoAtlasDB } from './db';
import { isSourceTag } from './sources';
import type { SourceTag, StoredRepository, SyncState, VectorEntry } from '@/types';

const SNAPSHOT_VERSION = '1';

const sourceTagSchema = z.custom<SourceTag>(isSourceTag, 'invalid source tag');

const storedRepositorySchema = z.object({
  full_name: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  pushed_at: z.string(),
  private: z.boolean(),
  html_url: z.string(),
  clone_url: z.string(),
  default_branch: z.string(),
  topics: z.array(z.string()),
  local_path: z.string().nullable(),
  readme_content: z.string().nullable(),
  embedded_at: z.string().nullable(),
  needs_embedding: z.union([z.literal(0), z.literal(1)]),
  last_synced_at: z.string(),
  // optional: absent in snapshots written before multi-source support
  source: sourceTagSchema.optional(),
  source_subtype: z.string().nullable().optional(),
  change_signal: z.string().nullable().optional(),
}) satisfies z.ZodType<StoredRepository>;

const vectorEntrySchema = z.object({
  id: z.string(),
  embedding: z.array(z.number()),
  document: z.string(),
  metadata: z.object({
    name: z.string(),
    full_name: z.string(),
    description: z.string(),
    created_at: z.string(),
    topics: z.string(),
    html_url: z.string(),
    is_local: z.boolean(),
    local_path: z.string(),
    private: z.boolean(),
    source: sourceTagSchema,
    source_subtype: z.string(),
  }),
  updated_at: z.string(),
}) satisfies z.ZodType<VectorEntry>;

const snapshotSchema = z.object({
  version: z.string(),
  exported_at: z.string(),
  repositories: z.array(storedRepositorySchema),
  syncState: z.array(z.object({ id: z.string(), value: z.string() })),
  vectorStore: z.array(vectorEntrySchema).default([]),
});

export interface SnapshotPayload {
  version: string;
  exported_at: string;
  repositories: StoredRepository[];
  syncState: SyncState[];
  vectorStore: VectorEntry[];
}

/**
 * Hook the stores call after every committed write. The promise settles once
 * a snapshot containing that write is on disk, and rejects if it could not be
 * written.
 */
export interface Persistence {
  schedule(): Promise<void>;
  flush(): Promise<void>;
}

export class SnapshotWriteError extends Error {
  constructor(
    readonly file: string,
    cause: unknown
  ) {
    super(`Failed to write catalog snapshot ${file}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'SnapshotWriteError';
  }
}

export async function exportAll(db: RepoAtlasDB): Promise<SnapshotPayload> {
  const [repositories, syncState, vectorStore] = await Promise.all([
    db.repositories.toArray(),
    db.syncState.toArray(),
    db.vectorStore.toArray(),
  ]);

  return {
    version: SNAPSHOT_VERSION,
    exported_at: new Date().toISOString(),
    repositories,
    syncState,
    vectorStore,
  };
}

export function parseSnapshot(bytes: Uint8Array): SnapshotPayload {
  let text: string;
  try {
    text = ungzip(bytes, { to: 'string' });
  } catch {
    // plain JSON snapshot
    text = new TextDecoder().decode(bytes);
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    throw new Error('Invalid or incompatible catalog snapshot');
  }
  const parsed = snapshotSchema.safeParse(json);
  if (!parsed.success || parsed.data.version !== SNAPSHOT_VERSION) {
    throw new Error('Invalid or incompatible catalog snapshot');
  }
  return parsed.data;
}

// Same defaults as the version 2 schema upgrade.
const withSourceDefaults = (row: StoredRepository): StoredRepository => ({
  ...row,
  source: row.source ?? 'forge',
  source_subtype: row.source_subtype ?? null,
  change_signal: row.change_signal === undefined ? row.pushed_at : row.change_signal,
});

export async function importSnapshot(db: RepoAtlasDB, payload: SnapshotPayload) {
  await db.transaction('rw', db.repositories, db.syncState, db.vectorStore, async () => {
    await db.repositories.clear();
    await db.syncState.clear();
    await db.vectorStore.clear();

    if (payload.repositories.length) {
      await db.repositories.bulkPut(payload.repositories.map(withSourceDefaults));
    }
    if (payload.syncState.length) {
      await db.syncState.bulkPut(payload.syncState);
    }
    if (payload.vectorStore.length) {
      await db.vectorStore.bulkPut(payload.vectorStore);
    }
  });
}

export async function writeSnapshot(db: RepoAtlasDB, file: string) {
  const payload = await exportAll(db);
  const compressed = gzip(JSON.stringify(payload));
  await mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.${process.pid}.tmp`;
  await writeFile(tmp, compressed);
  await rename(tmp, file);
}

export async function readSnapshot(file: string): Promise<SnapshotPayload | null> {
  let bytes: Buffer;
  try {
    bytes = await readFile(file);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
  return parseSnapshot(bytes);
}

/**
 * Keeps a gzip snapshot of the whole database on disk. Writes are coalesced:
 * while one is in flight, further schedule() calls share a single follow-up
 * write, and each caller sees the outcome of the write that covers it.
 */
export class SnapshotFile implements Persistence {
  private inFlight: Promise<void> | null = null;
  private queued: Promise<void> | null = null;

  constructor(
    private readonly db: RepoAtlasDB,
    readonly file: string
  ) {}

  async load(): Promise<boolean> {
    const payload = await readSnapshot(this.file);
    if (!payload) return false;
    await importSnapshot(this.db, payload);
    return true;
  }

  schedule(): Promise<void> {
    if (this.queued) return this.queued;
    if (!this.inFlight) return this.begin();

    const queued = this.inFlight.then(
      () => this.begin(),
      () => this.begin()
    );
    this.queued = queued;
    return queued;
  }

  /** Waits for outstanding writes; rejects if one of them failed. */
  async flush() {
    let current = this.queued ?? this.inFlight;
    while (current) {
      await current;
      current = this.queued ?? this.inFlight;
    }
  }

  private begin(): Promise<void> {
    this.queued = null;
    const write: Promise<void> = writeSnapshot(this.db, this.file)
      .catch((err: unknown) => {
        throw new SnapshotWriteError(this.file, err);
      })
      .finally(() => {
        if (this.inFlight === write) this.inFlight = null;
      });
    this.inFlight = write;
    return write;
  }
}
