/**
 * Assembled context types.
 */

import type { LinkedDocument, RetrievedDocument } from '../core/types.js';
import type { SupersessionInfo } from '../supersession/types.js';

/** Which bucket an entry came from. Precedence: critical > direct > linked. */
export type ContextSource = 'critical' | 'direct' | 'linked';

/**
 * One document in an assembled context, with its attribution.
 */
export interface ContextEntry {
  document: RetrievedDocument | LinkedDocument;
  source: ContextSource;
  /**
   * Ranking score after the supersession multiplier. Critical entries start
   * from the configured critical base score; linked entries have none.
   */
  finalScore: number | null;
  /** Referring path, linked entries only */
  linkedFrom: string | null;
  /** Hops from the nearest direct match, linked entries only */
  linkDepth: number | null;
  supersession: SupersessionInfo;
}

/**
 * The ranked, deduplicated bundle handed to the generation step.
 */
export interface RAGContext {
  /** Critical first, then direct by score, then linked by depth */
  entries: ContextEntry[];
  criticalCount: number;
  directCount: number;
  linkedCount: number;
  /** Direct matches at or above the relevance floor, before truncation */
  totalMatches: number;
  /** Sum of charCount over entries */
  totalCharCount: number;
}
