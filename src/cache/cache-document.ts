import { mkdirSync, renameSync, rmSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import type { FontEntry } from '../types/fonts.js';
import type { CacheMetadata, FontCacheDocument } from '../types/output.js';

export const CACHE_VERSION = 1;
export const CACHE_FILE_NAME = `fontlist-v${CACHE_VERSION}.json`;

export const DEFAULT_METADATA: CacheMetadata = {
  version: CACHE_VERSION,
  defaultFamily: { ttf: 'DejaVu Sans', afm: 'Helvetica' },
  defaultWeight: 'normal',
  defaultSize: null
};

export function buildCacheDocument(entries: readonly FontEntry[], metadata: CacheMetadata = {}): FontCacheDocument {
  return {
    entries: [...entries],
    metadata: { ...DEFAULT_METADATA, ...metadata }
  };
}

function sortKeys(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/** Pretty JSON with keys sorted at every level, so equal documents give equal bytes. */
export function serializeCacheDocument(doc: FontCacheDocument): string {
  return `${JSON.stringify(doc, sortKeys, 2)}\n`;
}

/** Writes a sibling temp file and renames it over `target`; readers never see a partial cache. */
export function writeCacheAtomically(target: string, contents: string): void {
  mkdirSync(dirname(target), { recursive: true });
  const tmp = `${target}.${process.pid}.${Date.now()}.tmp`;
  try {
    writeFileSync(tmp, contents, 'utf-8');
    renameSync(tmp, target);
  } catch (error) {
    rmSync(tmp, { force: true });
    throw error;
  }
}

export function defaultCacheDir(
  platform: NodeJS.Platform,
  env: Record<string, string | undefined>,
  home: string
): string {
  if (platform === 'win32') {
    return join(env.LOCALAPPDATA || join(home, 'AppData', 'Local'), 'fontcache-gen');
  }
  if (platform === 'darwin') {
    return join(home, 'Library', 'Caches', 'fontcache-gen');
  }
  return join(env.XDG_CACHE_HOME || join(home, '.cache'), 'fontcache-gen');
}

export function defaultCachePath(
  platform: NodeJS.Platform,
  env: Record<string, string | undefined>,
  home: string
): string {
  return join(defaultCacheDir(platform, env, home), CACHE_FILE_NAME);
}
