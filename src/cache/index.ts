export * from './cache-document.js';
export { formatEntry, formatListing } from './listing.js';
