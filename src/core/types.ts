/**
 * Core domain types shared by retrieval, graph and supersession modules.
 */

/** Declared importance tier of a document. */
export type PromotionLevel = 'standard' | 'important' | 'critical';

/** Promotion levels, lowest first. */
export const PROMOTION_LEVELS: readonly PromotionLevel[] = ['standard', 'important', 'critical'];

/**
 * Tenant identity. Document paths are unique within one tenant.
 */
export interface TenantKey {
  projectName: string;
  branchName: string;
  /** Hash of the repository root path, distinguishes checkouts of one project */
  pathHash: string;
}

/**
 * A document returned by relevance retrieval.
 */
export interface RetrievedDocument {
  id: string;
  /** Relative path, stable identity within a tenant */
  path: string;
  title: string;
  summary: string | null;
  content: string;
  charCount: number;
  docType: string;
  promotionLevel: PromotionLevel;
  /** Similarity score from the vector store, null for documents reached without search */
  rawScore: number | null;
  /** Score after promotion boosting, null when rawScore is null */
  boostedScore: number | null;
  date: string | null;
}

/**
 * A document reached by following links from a direct match.
 */
export interface LinkedDocument extends RetrievedDocument {
  /** Path of the document whose link led here */
  linkedFrom: string;
  /** Hops from the nearest direct match, always >= 1 */
  linkDepth: number;
}

/**
 * Per-call retrieval options, already resolved by the caller.
 */
export interface RetrievalOptions {
  /** Raw similarity floor in [0, 1] */
  minRelevanceScore: number;
  /** Maximum direct matches, >= 1 */
  maxResults: number;
  /** Maximum linked documents, >= 0 */
  maxLinkedDocs: number;
  /** Maximum traversal depth, >= 0 */
  maxLinkDepth: number;
  /** Inject critical documents regardless of relevance */
  includeCritical: boolean;
  minPromotionLevel: PromotionLevel;
  /** Restrict to these doc types when present */
  docTypes?: readonly string[];
  applyRelevanceBoosting: boolean;
}

/**
 * Result of relevance retrieval.
 */
export interface RetrievalResult {
  documents: RetrievedDocument[];
  /** Matches at or above the relevance floor, before truncation */
  totalMatches: number;
}

/**
 * Result of retrieval followed by link expansion.
 */
export interface LinkedRetrievalResult extends RetrievalResult {
  linkedDocuments: LinkedDocument[];
}
