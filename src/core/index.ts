/**
 * Core types and utilities shared across the codebase.
 */

export type {
  PromotionLevel,
  TenantKey,
  RetrievedDocument,
  LinkedDocument,
  RetrievalOptions,
  RetrievalResult,
  LinkedRetrievalResult,
} from './types.js';

export { PROMOTION_LEVELS } from './types.js';

export {
  parsePromotionLevel,
  promotionRank,
  meetsPromotionFloor,
  levelsAtOrAbove,
  tagsForLevels,
} from './promotion.js';

export { formatTenantKey } from './tenant.js';
