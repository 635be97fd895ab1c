import type { CacheMetadata } from './output.js';

export type QueryBackend = 'fontconfig' | 'fontkit';

export interface FontCacheConfig {
  // Where fonts come from
  backend: QueryBackend;
  bundledFontsDir?: string;
  systemFontDirs?: string[];

  // fontconfig binaries
  fcQuery: string;
  fcList: string;
  queryTimeoutMs: number;

  // Output
  cachePath: string;
  metadata: CacheMetadata;
}
