/**
 * Schema module — single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Config files and session outcomes validate through these schemas.
 */

export * from './capability.js';
export * from './article.js';
export * from './outcome.js';
export * from './config.js';
export * from './jsonOutput.js';
