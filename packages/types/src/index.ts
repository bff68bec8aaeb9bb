/**
 * @fenceline/types - Type definitions shared across fenceline packages
 */

// Logging
export * from './logging.js';

// Extraction engine
export * from './extraction.js';

// Directory dumper
export * from './dump.js';
