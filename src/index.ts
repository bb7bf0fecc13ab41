/**
 * docweave
 *
 * Context assembly for retrieval-augmented generation over a linked,
 * versioned document corpus.
 *
 * @packageDocumentation
 */

// Core types
export * from './core/index.js';

// Configuration
export * from './config/index.js';

// Storage
export * from './storage/index.js';

// Retrieval
export * from './retrieval/index.js';

// Link graph
export * from './graph/index.js';

// Supersession
export * from './supersession/index.js';

// Index-time hooks
export * from './hooks/index.js';

// Maintenance
export * from './maintenance/index.js';

// Engine
export * from './engine/index.js';

// Utils
export * from './utils/errors.js';
export { throwIfCancelled, isCancellation } from './utils/cancellation.js';
export { createLogger, setLogLevel, setJsonMode, type Logger, type LogLevel } from './utils/logger.js';
export { ReadWriteLock } from './utils/rw-lock.js';
export { cosineSimilarity, similarityScore } from './utils/embedding-utils.js';
