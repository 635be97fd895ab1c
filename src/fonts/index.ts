export * from './errors.js';
export * from './font-style.js';
export * from './record-scanner.js';
export { normalizeEntries, type NormalizeOptions } from './entry-normalizer.js';
export * from './fontconfig-query.js';
export { FontkitQueryService, formatFaceRecord, type FontkitQueryOptions, type FontOpener } from './fontkit-query.js';
export { listBundledFonts, listSystemFontFiles, systemFontDirs } from './font-discovery.js';
