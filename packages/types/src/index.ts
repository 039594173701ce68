/**
 * @bifgen/types - Data model shared by the bifgen parser, generator and CLI
 */

// Type descriptors and restrictions
export * from './descriptors.js';

// Prototypes, entries, stanzas and vocabularies
export * from './entries.js';

// Log levels (shared by core and cli)
export * from './logging.js';
