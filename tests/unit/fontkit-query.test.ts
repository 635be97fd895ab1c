import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { FontkitQueryService, formatFaceRecord, type FontLike, type FontOpener } from '../../src/fonts/fontkit-query.js';
import { ALL_FONTS } from '../../src/fonts/fontconfig-query.js';
import { normalizeEntries } from '../../src/fonts/entry-normalizer.js';
import { ServiceUnavailableError } from '../../src/fonts/errors.js';

const regular: FontLike = {
  familyName: 'Test Sans',
  'OS/2': { usWeightClass: 400, usWidthClass: 5, fsSelection: { italic: false } }
};

function quietLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('formatFaceRecord', () => {
  it('converts OpenType attributes to fontconfig codes', () => {
    const font: FontLike = {
      familyName: 'My Font',
      'OS/2': { usWeightClass: 700, usWidthClass: 3, fsSelection: { italic: true } }
    };
    expect(formatFaceRecord('/f/My Font.ttf', font)).toBe('/f/My\\ Font.ttf My\\ Font 100 200 75\n');
  });

  it('prefers oblique over italic', () => {
    const font: FontLike = { familyName: 'Slanted', 'OS/2': { fsSelection: { italic: true, oblique: true } } };
    expect(formatFaceRecord('/s.otf', font)).toBe('/s.otf Slanted 110 80 100\n');
  });

  it('writes a weight range for variable fonts', () => {
    const font: FontLike = { familyName: 'Var', variationAxes: { wght: { min: 100, max: 900 } } };
    expect(formatFaceRecord('/v.ttf', font)).toBe('/v.ttf Var 0 [0 210] 100\n');
  });

  it('escapes commas and backslashes in paths', () => {
    expect(formatFaceRecord('/a,b\\c.ttf', regular)).toBe('/a\\,b\\\\c.ttf Test\\ Sans 0 80 100\n');
  });
});

describe('FontkitQueryService', () => {
  it('emits one record per face of a collection', async () => {
    const open: FontOpener = () => ({ fonts: [regular, { ...regular, familyName: 'Test Sans Bold', 'OS/2': { usWeightClass: 700 } }] });
    const service = new FontkitQueryService({ open, systemDirs: [] });

    await expect(service.query(['/c.ttc'])).resolves.toBe('/c.ttc Test\\ Sans 0 80 100\n/c.ttc Test\\ Sans\\ Bold 0 200 100\n');
  });

  it('produces output the normalizer reads back', async () => {
    const service = new FontkitQueryService({ open: () => regular, systemDirs: [] });
    const result = normalizeEntries(await service.query(['/fonts/test.ttf']), { logger: quietLogger() });

    expect(result.entries).toEqual([
      {
        file: '/fonts/test.ttf',
        family: 'Test Sans',
        style: 'normal',
        variant: 'normal',
        weight: 400,
        stretch: 'normal',
        size: 'scalable'
      }
    ]);
  });

  it('fails on an unreadable explicit file', async () => {
    const open: FontOpener = () => {
      throw new Error('corrupt');
    };
    const service = new FontkitQueryService({ open, systemDirs: [] });
    const run = service.query(['/bad.ttf']);

    await expect(run).rejects.toBeInstanceOf(ServiceUnavailableError);
    await expect(run).rejects.toThrow('fontkit failed: cannot read /bad.ttf: corrupt');
  });

  it('fails on an explicit face without a family name', async () => {
    const service = new FontkitQueryService({ open: () => ({ 'OS/2': { usWeightClass: 400 } }), systemDirs: [] });
    const run = service.query(['/nameless.ttf']);

    await expect(run).rejects.toBeInstanceOf(ServiceUnavailableError);
    await expect(run).rejects.toThrow('fontkit failed: no family name in /nameless.ttf');
  });

  describe('whole catalog', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'fontkit-query-'));
      mkdirSync(join(dir, 'sub'));
      writeFileSync(join(dir, 'a.ttf'), '');
      writeFileSync(join(dir, 'notes.txt'), '');
      writeFileSync(join(dir, 'sub', 'broken.otf'), '');
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('scans font directories and logs unreadable files', async () => {
      const logger = quietLogger();
      const broken = join(dir, 'sub', 'broken.otf');
      const open: FontOpener = (file) => {
        if (file === broken) throw new Error('bad table');
        return regular;
      };
      const service = new FontkitQueryService({ open, systemDirs: [dir], logger });

      await expect(service.query(ALL_FONTS)).resolves.toBe(`${join(dir, 'a.ttf')} Test\\ Sans 0 80 100\n`);
      expect(logger.warn).toHaveBeenCalledWith(`Ignoring unreadable font ${broken}: bad table`);
    });

    it('leaves out faces without a family name', async () => {
      const logger = quietLogger();
      const nameless = join(dir, 'a.ttf');
      writeFileSync(join(dir, 'b.ttf'), '');
      const open: FontOpener = (file) => {
        if (file === nameless) return { 'OS/2': { usWeightClass: 400 } };
        if (file.endsWith('.otf')) throw new Error('bad table');
        return { ...regular, familyName: 'B' };
      };
      const service = new FontkitQueryService({ open, systemDirs: [dir], logger });

      const text = await service.query(ALL_FONTS);
      expect(text).toBe(`${join(dir, 'b.ttf')} B 0 80 100\n`);
      expect(logger.warn).toHaveBeenCalledWith(`Ignoring font without a family name ${nameless}`);
      expect(normalizeEntries(text, { logger }).entries.map((e) => e.family)).toEqual(['B']);
    });
  });
});
