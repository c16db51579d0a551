/**
 * Memory engine: storage, ranking, extraction and curation.
 */

export * from './types.js';
export * from './store.js';
export * from './ranker.js';
export * from './decode.js';
export * from './embeddings.js';
export * from './completion.js';
export * from './extraction.js';
export * from './curation.js';
