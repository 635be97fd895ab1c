import { describe, it, expect } from 'vitest';
import {
  cssWeightToFc,
  fcWeightToCss,
  isVariableWeight,
  knownWidthCodes,
  openTypeWidthToFc,
  slantToStyle,
  widthToStretch
} from '../../src/fonts/font-style.js';
import { UnknownStyleCodeError } from '../../src/fonts/errors.js';

describe('fcWeightToCss', () => {
  it('maps every table point exactly', () => {
    const points: Array<[number, number]> = [
      [0, 100], [40, 200], [50, 300], [55, 350], [75, 380], [80, 400],
      [100, 500], [180, 600], [200, 700], [205, 800], [210, 900], [215, 1000]
    ];
    for (const [fc, css] of points) {
      expect(fcWeightToCss(fc)).toBe(css);
    }
  });

  it('interpolates between points', () => {
    expect(fcWeightToCss(45)).toBe(250);
    expect(fcWeightToCss(140)).toBe(550);
    expect(fcWeightToCss(202.5)).toBe(750);
  });

  it('rounds half-way results up', () => {
    // 350 + (60 - 55) / (75 - 55) * (380 - 350) = 357.5
    expect(fcWeightToCss(60)).toBe(358);
  });

  it('clamps outside the table', () => {
    expect(fcWeightToCss(-10)).toBe(100);
    expect(fcWeightToCss(250)).toBe(1000);
  });

  it('never decreases as the raw weight grows', () => {
    let previous = fcWeightToCss(0);
    for (let raw = 0.5; raw <= 215; raw += 0.5) {
      const current = fcWeightToCss(raw);
      expect(current).toBeGreaterThanOrEqual(previous);
      previous = current;
    }
  });
});

describe('cssWeightToFc', () => {
  it('inverts the table', () => {
    expect(cssWeightToFc(100)).toBe(0);
    expect(cssWeightToFc(400)).toBe(80);
    expect(cssWeightToFc(550)).toBe(140);
    expect(cssWeightToFc(700)).toBe(200);
    expect(cssWeightToFc(1000)).toBe(215);
    expect(cssWeightToFc(1)).toBe(0);
  });
});

describe('openTypeWidthToFc', () => {
  it('maps width classes 1..9 and clamps the rest', () => {
    expect(openTypeWidthToFc(1)).toBe(50);
    expect(openTypeWidthToFc(5)).toBe(100);
    expect(openTypeWidthToFc(9)).toBe(200);
    expect(openTypeWidthToFc(0)).toBe(50);
    expect(openTypeWidthToFc(12)).toBe(200);
  });
});

describe('slantToStyle', () => {
  it('maps known slant codes', () => {
    expect(slantToStyle('0')).toBe('normal');
    expect(slantToStyle('100')).toBe('italic');
    expect(slantToStyle('110')).toBe('oblique');
  });

  it('rejects unknown slant codes', () => {
    expect(() => slantToStyle('55', '/f.ttf')).toThrow(UnknownStyleCodeError);
    expect(() => slantToStyle('55', '/f.ttf')).toThrow('Unknown slant code "55" for /f.ttf');
  });
});

describe('widthToStretch', () => {
  it('maps the nine width codes to nine distinct stretches', () => {
    const codes = knownWidthCodes();
    expect(codes).toEqual(['50', '63', '75', '87', '100', '113', '125', '150', '200']);
    const stretches = codes.map((c) => widthToStretch(c));
    expect(new Set(stretches).size).toBe(9);
    expect(stretches[0]).toBe('ultra-condensed');
    expect(stretches[4]).toBe('normal');
    expect(stretches[8]).toBe('ultra-expanded');
  });

  it('rejects unknown width codes', () => {
    try {
      widthToStretch('90');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownStyleCodeError);
      if (error instanceof UnknownStyleCodeError) {
        expect(error.stage).toBe('mapping');
        expect(error.attribute).toBe('width');
        expect(error.code).toBe('90');
      }
    }
  });
});

describe('isVariableWeight', () => {
  it('detects bracketed ranges', () => {
    expect(isVariableWeight('[100 200]')).toBe(true);
    expect(isVariableWeight('100')).toBe(false);
    expect(isVariableWeight('[100')).toBe(false);
  });
});
