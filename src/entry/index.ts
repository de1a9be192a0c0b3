export { Entry } from './entry.js';
export { EntryMeta, compareEntryMeta } from './entry-meta.js';
