import { homedir } from 'os';
import { defaultCachePath } from './cache/cache-document.js';
import type { FontCacheConfig, QueryBackend } from './types/config.js';

type Env = Record<string, string | undefined>;

export const ConfigPresets = {
  /** Ask fontconfig (fc-query / fc-list); the default on Linux and macOS. */
  fontconfig: { backend: 'fontconfig' },
  /** Read font files directly, for hosts without fontconfig. */
  fontkit: { backend: 'fontkit' }
} satisfies Record<QueryBackend, Partial<FontCacheConfig>>;

export function isQueryBackend(value: string): value is QueryBackend {
  return value === 'fontconfig' || value === 'fontkit';
}

export function parseTimeout(value: string, source: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isInteger(n) || n < 0) {
    throw new Error(`Invalid ${source}: ${value} (expected a non-negative integer of milliseconds)`);
  }
  return n;
}

export function defaultConfig(
  platform: NodeJS.Platform = process.platform,
  env: Env = process.env,
  home: string = homedir()
): FontCacheConfig {
  return {
    backend: platform === 'win32' ? 'fontkit' : 'fontconfig',
    fcQuery: 'fc-query',
    fcList: 'fc-list',
    queryTimeoutMs: 120_000,
    cachePath: defaultCachePath(platform, env, home),
    metadata: {}
  };
}

export function configFromEnv(env: Env): Partial<FontCacheConfig> {
  const out: Partial<FontCacheConfig> = {};
  const {
    FONTCACHE_PATH,
    FONTCACHE_BUNDLED_DIR,
    FONTCACHE_BACKEND,
    FONTCACHE_QUERY_TIMEOUT_MS,
    FC_QUERY,
    FC_LIST
  } = env;

  if (FONTCACHE_PATH) out.cachePath = FONTCACHE_PATH;
  if (FONTCACHE_BUNDLED_DIR) out.bundledFontsDir = FONTCACHE_BUNDLED_DIR;
  if (FONTCACHE_BACKEND) {
    if (!isQueryBackend(FONTCACHE_BACKEND)) {
      throw new Error(`Invalid FONTCACHE_BACKEND: ${FONTCACHE_BACKEND} (expected fontconfig or fontkit)`);
    }
    out.backend = FONTCACHE_BACKEND;
  }
  if (FONTCACHE_QUERY_TIMEOUT_MS) {
    out.queryTimeoutMs = parseTimeout(FONTCACHE_QUERY_TIMEOUT_MS, 'FONTCACHE_QUERY_TIMEOUT_MS');
  }
  if (FC_QUERY) out.fcQuery = FC_QUERY;
  if (FC_LIST) out.fcList = FC_LIST;
  return out;
}

/** Defaults, then environment, then explicit overrides; `undefined` overrides are ignored. */
export function resolveConfig(
  overrides: Partial<FontCacheConfig> = {},
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = homedir()
): FontCacheConfig {
  const merged: FontCacheConfig = { ...defaultConfig(platform, env, home), ...configFromEnv(env) };

  if (overrides.backend !== undefined) merged.backend = overrides.backend;
  if (overrides.bundledFontsDir !== undefined) merged.bundledFontsDir = overrides.bundledFontsDir;
  if (overrides.systemFontDirs !== undefined) merged.systemFontDirs = overrides.systemFontDirs;
  if (overrides.fcQuery !== undefined) merged.fcQuery = overrides.fcQuery;
  if (overrides.fcList !== undefined) merged.fcList = overrides.fcList;
  if (overrides.queryTimeoutMs !== undefined) merged.queryTimeoutMs = overrides.queryTimeoutMs;
  if (overrides.cachePath !== undefined) merged.cachePath = overrides.cachePath;
  if (overrides.metadata !== undefined) merged.metadata = overrides.metadata;

  return merged;
}
