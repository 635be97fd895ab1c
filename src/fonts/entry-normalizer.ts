import type {
  FontCacheLogger,
  FontCacheResult,
  FontEntry,
  RawFontRecord,
  SkippedRecord
} from '../types/fonts.js';
import { MalformedRecordError } from './errors.js';
import { fcWeightToCss, isVariableWeight, slantToStyle, widthToStretch } from './font-style.js';
import { scanRecords } from './record-scanner.js';

export interface NormalizeOptions {
  logger?: FontCacheLogger;
}

function parseWeight(record: RawFontRecord): number {
  const value = record.weight.trim();
  const n = value.length > 0 ? Number(value) : NaN;
  if (!Number.isFinite(n)) {
    throw new MalformedRecordError(record.line, `weight ${JSON.stringify(record.weight)} is not a number`);
  }
  return n;
}

function toEntries(record: RawFontRecord): FontEntry[] {
  if (record.file.length === 0) {
    throw new MalformedRecordError(record.line, 'empty file path');
  }

  const families = record.families.filter((f) => f.length > 0);
  if (families.length === 0) {
    throw new MalformedRecordError(record.line, `no family name for ${record.file}`);
  }

  const style = slantToStyle(record.slant, record.file);
  const weight = fcWeightToCss(parseWeight(record));
  const stretch = widthToStretch(record.width, record.file);

  return families.map((family): FontEntry => ({
    file: record.file,
    family,
    style,
    variant: 'normal',
    weight,
    stretch,
    size: 'scalable'
  }));
}

function compareByFile(a: FontEntry, b: FontEntry): number {
  if (a.file < b.file) return -1;
  if (a.file > b.file) return 1;
  return 0;
}

/**
 * Turns raw fontconfig output into cache entries sorted by file path.
 *
 * Variable-weight faces are logged and left out; every other problem is fatal.
 */
export function normalizeEntries(text: string, options: NormalizeOptions = {}): FontCacheResult {
  const logger = options.logger ?? console;
  const entries: FontEntry[] = [];
  const skipped: SkippedRecord[] = [];

  for (const record of scanRecords(text)) {
    if (isVariableWeight(record.weight)) {
      logger.warn(`Skipping ${record.file} (unsupported variable weight)`);
      skipped.push({ file: record.file, reason: 'variable-weight', weight: record.weight });
      continue;
    }
    entries.push(...toEntries(record));
  }

  // stable: entries of the same file keep their input order
  entries.sort(compareByFile);

  return {
    entries: Object.freeze(entries.map((e) => Object.freeze(e))),
    skipped: Object.freeze(skipped)
  };
}
