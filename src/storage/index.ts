/**
 * Storage layer exports.
 */

// Database
export {
  getDb,
  setDb,
  resetDb,
  closeDb,
  runMigrations,
  clearAllData,
  getDbStats,
  generateId,
  getSchemaVersion,
  SCHEMA_VERSION,
} from './db.js';

// Types
export type {
  StoredDocument,
  DocumentInput,
  VectorSearchFilter,
  VectorSearchHit,
  VectorStore,
  DocumentRepository,
  SupersessionRecord,
  SpliceResult,
  SupersessionRepository,
} from './types.js';

// Stores
export { SqliteDocumentStore } from './document-store.js';
export { SqliteVectorStore } from './vector-store.js';
export { SqliteSupersessionStore } from './supersession-store.js';
