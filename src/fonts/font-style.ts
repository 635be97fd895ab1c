import type { FontStretch, FontStyle } from '../types/fonts.js';
import { UnknownStyleCodeError } from './errors.js';

const SLANT_STYLES = new Map<string, FontStyle>([
  ['0', 'normal'],
  ['100', 'italic'],
  ['110', 'oblique']
]);

const WIDTH_STRETCHES = new Map<string, FontStretch>([
  ['50', 'ultra-condensed'],
  ['63', 'extra-condensed'],
  ['75', 'condensed'],
  ['87', 'semi-condensed'],
  ['100', 'normal'],
  ['113', 'semi-expanded'],
  ['125', 'expanded'],
  ['150', 'extra-expanded'],
  ['200', 'ultra-expanded']
]);

// fontconfig weight -> OpenType/CSS weight, as in FcWeightToOpenType.
// 215 (EXTRABLACK) only appears in the fontconfig header.
const FC_WEIGHTS = [0, 40, 50, 55, 75, 80, 100, 180, 200, 205, 210, 215] as const;
const CSS_WEIGHTS = [100, 200, 300, 350, 380, 400, 500, 600, 700, 800, 900, 1000] as const;

// OpenType usWidthClass 1..9 -> fontconfig width.
const OPENTYPE_WIDTHS = [50, 63, 75, 87, 100, 113, 125, 150, 200] as const;

function interpolate(x: number, xs: readonly number[], ys: readonly number[]): number {
  if (x <= xs[0]) return ys[0];
  const last = xs.length - 1;
  if (x >= xs[last]) return ys[last];

  for (let i = 0; i < last; i++) {
    const x0 = xs[i];
    const x1 = xs[i + 1];
    if (x > x1) continue;
    const y0 = ys[i];
    const y1 = ys[i + 1];
    return y0 + ((x - x0) / (x1 - x0)) * (y1 - y0);
  }
  return ys[last];
}

function roundHalfUp(v: number): number {
  return Math.floor(v + 0.5);
}

export function slantToStyle(code: string, file?: string): FontStyle {
  const style = SLANT_STYLES.get(code);
  if (!style) throw new UnknownStyleCodeError('slant', code, file);
  return style;
}

export function widthToStretch(code: string, file?: string): FontStretch {
  const stretch = WIDTH_STRETCHES.get(code);
  if (!stretch) throw new UnknownStyleCodeError('width', code, file);
  return stretch;
}

/**
 * Maps a fontconfig weight (0..215) onto the CSS 100..1000 scale.
 * Values between table points are interpolated linearly and rounded half-up;
 * values outside the table clamp to its ends.
 */
export function fcWeightToCss(raw: number): number {
  return roundHalfUp(interpolate(raw, FC_WEIGHTS, CSS_WEIGHTS));
}

/** Inverse of {@link fcWeightToCss}, for backends that read OpenType weights directly. */
export function cssWeightToFc(css: number): number {
  return roundHalfUp(interpolate(css, CSS_WEIGHTS, FC_WEIGHTS));
}

export function openTypeWidthToFc(widthClass: number): number {
  const idx = Math.round(widthClass) - 1;
  if (idx < 0) return OPENTYPE_WIDTHS[0];
  if (idx >= OPENTYPE_WIDTHS.length) return OPENTYPE_WIDTHS[OPENTYPE_WIDTHS.length - 1];
  return OPENTYPE_WIDTHS[idx];
}

/** fontconfig prints variable weights as a range, e.g. `[40 210]`. */
export function isVariableWeight(field: string): boolean {
  return /^\[.*\]$/s.test(field);
}

export function knownWidthCodes(): string[] {
  return Array.from(WIDTH_STRETCHES.keys());
}
