import { readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

const pathSlots = z.array(z.string()).max(2).default([]);

const localSourceSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'use lowercase letters, digits, "-" or "_"'),
  path: z.string().min(1),
  label: z.string().optional(),
});

export const configSchema = z.object({
  dataDir: z.string().min(1),
  forge: z
    .object({
      token: z.string().min(1),
      /** Checked in order for a local clone named like the repository. */
      basePaths: z.array(z.string()).default([]),
    })
    .optional(),
  hub: z
    .object({
      token: z.string().min(1),
      endpoint: z.string().url().default('https://huggingface.co'),
      paths: z
        .object({
          dataset: pathSlots,
          model: pathSlots,
          space: pathSlots,
        })
        .default({}),
    })
    .optional(),
  localSources: z.array(localSourceSchema).default([]),
  embedding: z.object({
    apiKey: z.string().min(1),
    baseURL: z.string().url().default('https://openrouter.ai/api/v1'),
    model: z.string().default('openai/text-embedding-3-small'),
  }),
  sync: z
    .object({
      concurrency: z.number().int().positive().default(8),
      batchSize: z.number().int().positive().default(10),
      readmeCharBudget: z.number().int().positive().default(4000),
      scanDepth: z.number().int().nonnegative().default(2),
      requestTimeoutMs: z.number().int().positive().default(30_000),
    })
    .default({}),
  search: z
    .object({
      debounceMs: z.number().int().nonnegative().default(500),
      threshold: z.number().min(0).max(1).default(0.4),
      pageSize: z.number().int().positive().default(10),
      maxResults: z.number().int().positive().default(500),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof configSchema>;
export type SyncSettings = AppConfig['sync'];
export type SearchSettings = AppConfig['search'];

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const defaultConfigDir = () => path.join(os.homedir(), '.config', 'repo-atlas');
export const defaultDataDir = () => path.join(os.homedir(), '.local', 'share', 'repo-atlas');

export function parseConfig(input: unknown): AppConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, result.error.issues);
  }
  return result.data;
}

type Settings = Record<string, unknown>;

const isObject = (value: unknown): value is Settings =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function section(settings: Settings, key: string): Settings {
  const value = settings[key];
  return isObject(value) ? value : {};
}

/** Environment variables win over the settings file. */
export function applyEnv(settings: Settings, env: NodeJS.ProcessEnv): Settings {
  const merged: Settings = { ...settings };
  merged.dataDir = env.REPO_ATLAS_DATA_DIR || merged.dataDir || defaultDataDir();

  if (env.REPO_ATLAS_GITHUB_TOKEN) {
    merged.forge = { ...section(settings, 'forge'), token: env.REPO_ATLAS_GITHUB_TOKEN };
  }
  if (env.REPO_ATLAS_HF_TOKEN) {
    merged.hub = { ...section(settings, 'hub'), token: env.REPO_ATLAS_HF_TOKEN };
  }
  if (env.REPO_ATLAS_EMBEDDING_API_KEY) {
    merged.embedding = { ...section(settings, 'embedding'), apiKey: env.REPO_ATLAS_EMBEDDING_API_KEY };
  }
  return merged;
}

export async function loadConfig(env: NodeJS.ProcessEnv = process.env): Promise<AppConfig> {
  const file = env.REPO_ATLAS_CONFIG || path.join(defaultConfigDir(), 'settings.json');

  let settings: Settings = {};
  try {
    const parsed: unknown = JSON.parse(await readFile(file, 'utf8'));
    if (!isObject(parsed)) throw new ConfigError(`${file} must contain a JSON object`);
    settings = parsed;
  } catch (err) {
    if (err instanceof ConfigError) throw err;
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
      throw new ConfigError(`Could not read ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return parseConfig(applyEnv(settings, env));
}
