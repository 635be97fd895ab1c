export type * from './fonts.js';
export type * from './config.js';
export type * from './output.js';
export type * from './progress.js';
