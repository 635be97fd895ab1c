import type { Writable } from 'stream';
import type { FontCacheConfig, QueryBackend } from './types/config.js';
import type { FontCacheLogger, FontCacheResult } from './types/fonts.js';
import type { CacheMetadata } from './types/output.js';
import type { ProgressCallback } from './types/progress.js';
import { ConfigPresets, resolveConfig } from './config.js';
import { buildCacheDocument, serializeCacheDocument, writeCacheAtomically } from './cache/cache-document.js';
import { formatListing } from './cache/listing.js';
import { FontCacheError } from './fonts/errors.js';
import { normalizeEntries } from './fonts/entry-normalizer.js';
import { listBundledFonts } from './fonts/font-discovery.js';
import { FontconfigQueryService, queryFontCatalog, type FontQueryService } from './fonts/fontconfig-query.js';
import { FontkitQueryService } from './fonts/fontkit-query.js';

export interface FontCacheGeneratorOptions {
  /** Replaces the backend chosen by `config.backend`. */
  service?: FontQueryService;
  logger?: FontCacheLogger;
  onProgress?: ProgressCallback;
}

export class FontCacheGenerator {
  private config: FontCacheConfig;
  private service: FontQueryService | null;
  private readonly logger: FontCacheLogger;
  private readonly onProgress?: ProgressCallback;

  constructor(config: Partial<FontCacheConfig> = {}, options: FontCacheGeneratorOptions = {}) {
    this.config = resolveConfig(config);
    this.service = options.service ?? null;
    this.logger = options.logger ?? console;
    this.onProgress = options.onProgress;
  }

  getConfig(): Readonly<FontCacheConfig> {
    return { ...this.config };
  }

  setBackend(backend: QueryBackend): this {
    this.config.backend = backend;
    return this;
  }

  setBundledFontsDir(dir: string | undefined): this {
    this.config.bundledFontsDir = dir;
    return this;
  }

  setCachePath(path: string): this {
    this.config.cachePath = path;
    return this;
  }

  setMetadata(metadata: CacheMetadata): this {
    this.config.metadata = metadata;
    return this;
  }

  applyPreset(preset: keyof typeof ConfigPresets): this {
    const presetConfig = ConfigPresets[preset];
    if (!presetConfig) {
      throw new Error(`Unknown preset: ${preset}. Available presets: ${Object.keys(ConfigPresets).join(', ')}`);
    }
    this.config = { ...this.config, ...presetConfig };
    return this;
  }

  private createService(): FontQueryService {
    if (this.service) return this.service;
    if (this.config.backend === 'fontkit') {
      return new FontkitQueryService({ systemDirs: this.config.systemFontDirs, logger: this.logger });
    }
    return new FontconfigQueryService({
      fcQuery: this.config.fcQuery,
      fcList: this.config.fcList,
      timeoutMs: this.config.queryTimeoutMs
    });
  }

  /** Runs one full discovery, query and normalization pass. Nothing is cached between calls. */
  async generate(): Promise<FontCacheResult> {
    this.onProgress?.({ stage: 'discovery', message: this.config.bundledFontsDir });
    const bundled = listBundledFonts(this.config.bundledFontsDir);

    this.onProgress?.({ stage: 'query', message: `${bundled.length} bundled font file(s)` });
    const raw = await queryFontCatalog(this.createService(), bundled);

    this.onProgress?.({ stage: 'normalize' });
    const result = normalizeEntries(raw, { logger: this.logger });

    this.onProgress?.({ stage: 'complete', entries: result.entries.length });
    return result;
  }

  async print(out: Pick<Writable, 'write'> = process.stdout): Promise<FontCacheResult> {
    const result = await this.generate();
    out.write(formatListing(result.entries));
    return result;
  }

  /** Generates the cache and replaces the file at `config.cachePath`; returns that path. */
  async write(): Promise<string> {
    const result = await this.generate();
    const target = this.config.cachePath;
    this.onProgress?.({ stage: 'write', message: target, entries: result.entries.length });

    const contents = serializeCacheDocument(buildCacheDocument(result.entries, this.config.metadata));
    try {
      writeCacheAtomically(target, contents);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FontCacheError('write', `Cannot write font cache to ${target}: ${message}`, { cause: error });
    }
    return target;
  }

  static async generateEntries(config: Partial<FontCacheConfig> = {}, options: FontCacheGeneratorOptions = {}): Promise<FontCacheResult> {
    return new FontCacheGenerator(config, options).generate();
  }
}

export { ConfigPresets, resolveConfig, configFromEnv, defaultConfig } from './config.js';
export * from './types/index.js';
export * from './fonts/index.js';
export * from './cache/index.js';
