import type { FontEntry } from '../types/fonts.js';

function quote(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

export function formatEntry(entry: FontEntry): string {
  return (
    `FontEntry(file=${quote(entry.file)}, family=${quote(entry.family)}, ` +
    `style=${quote(entry.style)}, variant=${quote(entry.variant)}, weight=${entry.weight}, ` +
    `stretch=${quote(entry.stretch)}, size=${quote(entry.size)})`
  );
}

export function formatListing(entries: readonly FontEntry[]): string {
  return entries.map((e) => `${formatEntry(e)}\n`).join('');
}
