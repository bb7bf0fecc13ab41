/**
 * Promotion-aware scoring for retrieved documents.
 *
 * boosted = min(1.0, raw + boost(level))
 *
 * Boost per level comes from configuration (defaults: critical +0.15,
 * important +0.10, standard +0).
 */

import type { PromotionLevel, RetrievedDocument } from '../core/types.js';
import { parsePromotionLevel } from '../core/promotion.js';
import type { PromotionBoosts } from '../config/engine-config.js';
import type { StoredDocument } from '../storage/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('scoring');

/** Upper bound for any similarity-derived score */
export const MAX_SCORE = 1.0;

/**
 * Apply the additive promotion boost, capped at 1.0.
 */
export function boostScore(raw: number, level: PromotionLevel, boosts: PromotionBoosts): number {
  return Math.min(MAX_SCORE, raw + boosts[level]);
}

/**
 * Resolve a stored promotion tag. Missing or unrecognised tags count as
 * standard and are logged.
 */
export function resolvePromotionLevel(document: StoredDocument): PromotionLevel {
  const level = parsePromotionLevel(document.promotionTag);
  if (level !== null) return level;

  if (document.promotionTag === null || document.promotionTag.trim() === '') {
    log.warn(`Missing promotion level on ${document.path}, using standard`);
  } else {
    log.warn(`Unrecognised promotion level "${document.promotionTag}" on ${document.path}, using standard`);
  }
  return 'standard';
}

/**
 * Build an immutable RetrievedDocument from a stored document.
 */
export function toRetrievedDocument(
  document: StoredDocument,
  promotionLevel: PromotionLevel,
  rawScore: number | null,
  boostedScore: number | null,
): RetrievedDocument {
  return Object.freeze({
    id: document.id,
    path: document.path,
    title: document.title,
    summary: document.summary,
    content: document.content,
    charCount: document.charCount,
    docType: document.docType,
    promotionLevel,
    rawScore,
    boostedScore,
    date: document.date,
  });
}

/**
 * Ranking order: boosted score desc, then raw score desc, then path asc.
 */
export function compareByScore(a: RetrievedDocument, b: RetrievedDocument): number {
  const boosted = (b.boostedScore ?? 0) - (a.boostedScore ?? 0);
  if (boosted !== 0) return boosted;
  const raw = (b.rawScore ?? 0) - (a.rawScore ?? 0);
  if (raw !== 0) return raw;
  return a.path.localeCompare(b.path);
}
