import type { FontEntry } from './fonts.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Companion data the cache reader expects next to the entries; passed through as given. */
export type CacheMetadata = { [key: string]: JsonValue };

export interface FontCacheDocument {
  entries: FontEntry[];
  metadata: CacheMetadata;
}
