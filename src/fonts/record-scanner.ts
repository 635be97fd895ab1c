import type { RawFontRecord } from '../types/fonts.js';
import { MalformedRecordError } from './errors.js';

/*
 * Record format, one font face per line:
 *
 *   <file> <family[,family...]> <slant> <weight> <width>
 *
 * Fields are separated by a single space. A backslash makes the character
 * after it literal, so `\ ` and `\,` are part of a value and `\\` is a
 * backslash. A field that starts with `[` runs to its matching `]`, spaces
 * included, because fontconfig prints weight ranges unescaped (`[40 210]`).
 */

const ESCAPE = '\\';
const FIELD_SEPARATOR = ' ';
const LIST_SEPARATOR = ',';
export const RECORD_FIELD_COUNT = 5;

function splitUnescaped(input: string, separator: string, line: number, groupBrackets: boolean): string[] {
  const parts: string[] = [];
  let current = '';
  let depth = 0;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (ch === ESCAPE) {
      if (i + 1 >= input.length) {
        throw new MalformedRecordError(line, 'dangling escape at end of value');
      }
      current += ch + input[i + 1];
      i++;
      continue;
    }

    if (groupBrackets) {
      if (ch === '[' && (depth > 0 || current.length === 0)) depth++;
      else if (ch === ']' && depth > 0) depth--;
    }

    if (ch === separator && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }

    current += ch;
  }

  parts.push(current);
  return parts;
}

/** Splits one record line into its still-escaped fields. */
export function splitFields(input: string, line = 1): string[] {
  return splitUnescaped(input, FIELD_SEPARATOR, line, true);
}

/** Splits an escaped field on unescaped commas. */
export function splitList(field: string, line = 1): string[] {
  return splitUnescaped(field, LIST_SEPARATOR, line, false);
}

export function unescapeValue(value: string): string {
  return value.replace(/\\(.)/gs, '$1');
}

export function scanRecords(text: string): RawFontRecord[] {
  const records: RawFontRecord[] = [];
  const lines = text.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const raw = lines[i].endsWith('\r') ? lines[i].slice(0, -1) : lines[i];
    if (raw.trim().length === 0) continue;

    const fields = splitFields(raw, lineNo);
    if (fields.length !== RECORD_FIELD_COUNT) {
      throw new MalformedRecordError(lineNo, `expected ${RECORD_FIELD_COUNT} fields, found ${fields.length}`);
    }

    const [file, familyList, slant, weight, width] = fields;
    records.push({
      file: unescapeValue(file),
      families: splitList(familyList, lineNo).map(unescapeValue),
      slant: unescapeValue(slant),
      weight: unescapeValue(weight),
      width: unescapeValue(width),
      line: lineNo
    });
  }

  return records;
}
