import * as fontkit from 'fontkit';
import type { FontCacheLogger } from '../types/fonts.js';
import { ServiceUnavailableError } from './errors.js';
import { listSystemFontFiles, systemFontDirs } from './font-discovery.js';
import { cssWeightToFc, openTypeWidthToFc } from './font-style.js';
import { ALL_FONTS, type FontQueryService, type QueryTarget } from './fontconfig-query.js';

type VariationAxisLike = {
  min: number;
  max: number;
};

export type FontLike = {
  familyName?: string;
  variationAxes?: Record<string, VariationAxisLike>;
  'OS/2'?: {
    usWeightClass?: number;
    usWidthClass?: number;
    fsSelection?: { italic?: boolean; oblique?: boolean };
  };
};

export type FontCollectionLike = {
  fonts: FontLike[];
};

export type FontOpener = (file: string) => FontLike | FontCollectionLike;

const openWithFontkit: FontOpener = (file) =>
  (fontkit as unknown as { openSync: (p: string) => FontLike | FontCollectionLike }).openSync(file);

export interface FontkitQueryOptions {
  systemDirs?: readonly string[];
  open?: FontOpener;
  logger?: FontCacheLogger;
}

function escapeValue(value: string): string {
  return value.replace(/[\\ ,]/g, '\\$&');
}

function slantCode(font: FontLike): number {
  const sel = font['OS/2']?.fsSelection;
  if (sel?.oblique) return 110;
  if (sel?.italic) return 100;
  return 0;
}

function weightField(font: FontLike): string {
  const axis = font.variationAxes?.wght;
  if (axis) return `[${cssWeightToFc(axis.min)} ${cssWeightToFc(axis.max)}]`;
  return String(cssWeightToFc(font['OS/2']?.usWeightClass ?? 400));
}

/** Renders one face in the same record format the fontconfig backend requests. */
export function formatFaceRecord(file: string, font: FontLike): string {
  const family = font.familyName ?? '';
  const width = openTypeWidthToFc(font['OS/2']?.usWidthClass ?? 5);
  return `${escapeValue(file)} ${escapeValue(family)} ${slantCode(font)} ${weightField(font)} ${width}\n`;
}

/**
 * Reads font files with fontkit for hosts without fontconfig. Explicit files
 * must be readable and named; while scanning the whole catalog, unreadable
 * files and faces without a family name are logged and left out, as fc-list does.
 */
export class FontkitQueryService implements FontQueryService {
  private readonly systemDirs: readonly string[];
  private readonly open: FontOpener;
  private readonly logger: FontCacheLogger;

  constructor(options: FontkitQueryOptions = {}) {
    this.systemDirs = options.systemDirs ?? systemFontDirs();
    this.open = options.open ?? openWithFontkit;
    this.logger = options.logger ?? console;
  }

  async query(target: QueryTarget): Promise<string> {
    if (target === ALL_FONTS) {
      return this.render(listSystemFontFiles(this.systemDirs), false);
    }
    return this.render(target, true);
  }

  private render(files: readonly string[], strict: boolean): string {
    let out = '';
    for (const file of files) {
      let faces: FontLike[];
      try {
        const opened = this.open(file);
        faces = 'fonts' in opened ? opened.fonts : [opened];
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        if (strict) {
          throw new ServiceUnavailableError('fontkit', `cannot read ${file}: ${message}`, { cause: error });
        }
        this.logger.warn(`Ignoring unreadable font ${file}: ${message}`);
        continue;
      }
      for (const face of faces) {
        if (!face.familyName) {
          if (strict) throw new ServiceUnavailableError('fontkit', `no family name in ${file}`);
          this.logger.warn(`Ignoring font without a family name ${file}`);
          continue;
        }
        out += formatFaceRecord(file, face);
      }
    }
    return out;
  }
}
