export type FontStyle = 'normal' | 'italic' | 'oblique';

export type FontVariant = 'normal';

export type FontStretch =
  | 'ultra-condensed'
  | 'extra-condensed'
  | 'condensed'
  | 'semi-condensed'
  | 'normal'
  | 'semi-expanded'
  | 'expanded'
  | 'extra-expanded'
  | 'ultra-expanded';

export type FontSize = 'scalable';

export interface FontEntry {
  readonly file: string;
  readonly family: string;
  readonly style: FontStyle;
  readonly variant: FontVariant;
  readonly weight: number;
  readonly stretch: FontStretch;
  readonly size: FontSize;
}

/** One record as fontconfig printed it, after escape-aware splitting. */
export interface RawFontRecord {
  file: string;
  families: string[];
  slant: string;
  weight: string;
  width: string;
  line: number;
}

export interface SkippedRecord {
  file: string;
  reason: 'variable-weight';
  weight: string;
}

export interface FontCacheResult {
  readonly entries: readonly FontEntry[];
  readonly skipped: readonly SkippedRecord[];
}

export type FontCacheLogger = Pick<Console, 'log' | 'warn' | 'error'>;
