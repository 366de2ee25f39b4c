import type { Dirent } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import type { VcsKind } from '@/types';

export interface RepoInfo {
  kind: VcsKind;
  root: string;
  name: string;
  remoteUrl: string | null;
}

const MARKERS: Array<{ kind: VcsKind; dir: string; remote: (root: string) => Promise<string | null> }> = [
  { kind: 'git', dir: '.git', remote: readGitRemote },
  { kind: 'svn', dir: '.svn', remote: readSvnRemote },
  { kind: 'hg', dir: '.hg', remote: readHgRemote },
];

const README_NAMES = ['README.md', 'README.MD', 'readme.md', 'README.rst', 'README.txt', 'README'];

const DESCRIPTION_MAX_LENGTH = 200;

async function isDirectory(p: string) {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

async function readText(p: string): Promise<string | null> {
  try {
    return await readFile(p, 'utf8');
  } catch {
    return null;
  }
}

/** Value of `key = value` inside `[section]` of an ini-style config. */
function iniValue(content: string, section: string, key: string): string | null {
  let inSection = false;
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.startsWith('[')) {
      inSection = line === section;
      continue;
    }
    if (!inSection) continue;
    const match = /^([^=]+?)\s*=\s*(.*)$/.exec(line);
    if (match && match[1] === key) {
      return match[2].trim() || null;
    }
  }
  return null;
}

async function readGitRemote(root: string) {
  const content = await readText(path.join(root, '.git', 'config'));
  return content ? iniValue(content, '[remote "origin"]', 'url') : null;
}

async function readHgRemote(root: string) {
  const content = await readText(path.join(root, '.hg', 'hgrc'));
  return content ? iniValue(content, '[paths]', 'default') : null;
}

// Pre-1.7 working copies only; newer ones keep this in wc.db.
async function readSvnRemote(root: string) {
  const content = await readText(path.join(root, '.svn', 'entries'));
  if (!content) return null;
  const url = content.split(/\r?\n/)[4]?.trim();
  return url && url.startsWith('http') ? url : null;
}

export async function detect(dir: string): Promise<RepoInfo | null> {
  if (!(await isDirectory(dir))) return null;

  for (const marker of MARKERS) {
    if (await exists(path.join(dir, marker.dir))) {
      return {
        kind: marker.kind,
        root: dir,
        name: path.basename(dir),
        remoteUrl: await marker.remote(dir),
      };
    }
  }
  return null;
}

/**
 * Breadth-first search for repositories under `root`, at most `maxDepth`
 * levels down. A repository's working tree is never entered.
 */
export async function scan(root: string, maxDepth = 1): Promise<RepoInfo[]> {
  const found: RepoInfo[] = [];
  const queue: Array<{ dir: string; depth: number }> = [{ dir: root, depth: 0 }];

  while (queue.length > 0) {
    const next = queue.shift();
    if (!next) break;

    const info = await detect(next.dir);
    if (info) {
      found.push(info);
      continue;
    }
    if (next.depth >= maxDepth) continue;

    let entries: Dirent[];
    try {
      entries = await readdir(next.dir, { withFileTypes: true });
    } catch {
      // unreadable or vanished
      continue;
    }

    entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
      .map((entry) => entry.name)
      .sort()
      .forEach((name) => queue.push({ dir: path.join(next.dir, name), depth: next.depth + 1 }));
  }

  return found;
}

export async function readReadme(dir: string): Promise<string | null> {
  for (const name of README_NAMES) {
    const content = await readText(path.join(dir, name));
    if (content !== null) return content;
  }
  return null;
}

export async function readDescription(dir: string): Promise<string | null> {
  const gitDescription = (await readText(path.join(dir, '.git', 'description')))?.trim();
  if (gitDescription && !gitDescription.startsWith('Unnamed repository')) {
    return gitDescription;
  }

  const readme = await readReadme(dir);
  if (!readme) return null;
  for (const raw of readme.split(/\r?\n/)) {
    const line = raw.trim();
    if (line && !line.startsWith('#')) {
      return line.slice(0, DESCRIPTION_MAX_LENGTH);
    }
  }
  return null;
}

/**
 * First `<baseDir>/<candidate>` that is a repository. Base dirs are tried in
 * the order given, then candidates in the order given.
 */
export async function resolveLocalPath(baseDirs: string[], candidates: string[]): Promise<string | null> {
  for (const base of baseDirs) {
    if (!base || !(await isDirectory(base))) continue;
    for (const candidate of candidates) {
      const dir = path.join(base, candidate);
      if (await detect(dir)) return dir;
    }
  }
  return null;
}

export function inferPrivacy(localPath: string) {
  return localPath.toLowerCase().includes('private');
}
