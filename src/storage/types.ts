/**
 * Storage types and the repository interfaces the engine consumes.
 */

import type { PromotionLevel, TenantKey } from '../core/types.js';

/**
 * A document as persisted by the indexer.
 */
export interface StoredDocument {
  id: string;
  /** Formatted tenant key (`project:branch:pathHash`) */
  tenantKey: string;
  /** Relative path, unique per tenant */
  path: string;
  title: string;
  summary: string | null;
  content: string;
  charCount: number;
  docType: string;
  /** Promotion tag as written by the indexer; may be missing or malformed */
  promotionTag: string | null;
  /** Document date from frontmatter (ISO 8601) */
  date: string | null;
  indexedAt: string;
}

/**
 * Input for indexing a document.
 */
export interface DocumentInput {
  /** Kept when the path is already indexed; generated otherwise */
  id?: string;
  path: string;
  title: string;
  summary?: string | null;
  content: string;
  docType: string;
  promotionTag?: string | null;
  date?: string | null;
}

/**
 * Filter applied to every vector search.
 */
export interface VectorSearchFilter {
  tenant: TenantKey;
  /** Documents below this level are excluded */
  minPromotionLevel: PromotionLevel;
  /** Allow-list of doc types; absent means all types */
  docTypes?: readonly string[];
}

/**
 * A vector search hit: the document plus its raw similarity score in [0, 1].
 */
export interface VectorSearchHit {
  document: StoredDocument;
  score: number;
}

/**
 * Vector search backend.
 */
export interface VectorStore {
  /**
   * Return up to topN hits ordered by score descending.
   * Throws when the backend is unreachable; an empty array means no matches.
   */
  search(
    embedding: readonly number[],
    topN: number,
    filter: VectorSearchFilter,
  ): Promise<VectorSearchHit[]>;
}

/**
 * Tenant-scoped document lookups.
 */
export interface DocumentRepository {
  getByPath(path: string): Promise<StoredDocument | null>;
  getById(id: string): Promise<StoredDocument | null>;
  /** Documents keyed by path; paths that aren't indexed are absent */
  getByPaths(paths: readonly string[]): Promise<Map<string, StoredDocument>>;
  exists(path: string): Promise<boolean>;
  /** Documents whose tag parses to exactly this level, ordered by path */
  getByPromotionLevel(level: PromotionLevel, docTypes?: readonly string[]): Promise<StoredDocument[]>;
  updatePromotionLevel(id: string, level: PromotionLevel): Promise<void>;
}

/**
 * A persisted supersession: documentId supersedes the document at supersededPath.
 */
export interface SupersessionRecord {
  documentId: string;
  supersededPath: string;
  /** Null while the target path isn't indexed */
  supersededDocumentId: string | null;
  createdAt: string;
}

/**
 * Result of splicing a document out of its chain.
 */
export interface SpliceResult {
  /** True when the predecessor was linked directly to the successor */
  chainReconnected: boolean;
  /** Successor left with a dangling target (the removed document was oldest) */
  orphanedSuccessorId: string | null;
}

/**
 * Tenant-scoped supersession persistence.
 */
export interface SupersessionRepository {
  /** The record this document declares (its outgoing edge) */
  getByDocumentId(documentId: string): Promise<SupersessionRecord | null>;
  /** The record whose resolved target is this document (its successor) */
  getSuccessor(documentId: string): Promise<SupersessionRecord | null>;
  getAll(): Promise<SupersessionRecord[]>;
  /** Records whose target hasn't been resolved */
  getUnresolved(): Promise<SupersessionRecord[]>;
  /** Insert or replace the record for record.documentId */
  save(record: Omit<SupersessionRecord, 'createdAt'>): Promise<void>;
  resolveTarget(documentId: string, supersededDocumentId: string): Promise<void>;
  delete(documentId: string): Promise<boolean>;
  /**
   * Remove a document from its chain in one transaction: its own record is
   * deleted and its successor is pointed at its predecessor.
   */
  splice(documentId: string): Promise<SpliceResult>;
}
