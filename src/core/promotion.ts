/**
 * Promotion level parsing and ordering.
 */

import { PROMOTION_LEVELS, type PromotionLevel } from './types.js';

const ALIASES: Record<string, PromotionLevel> = {
  standard: 'standard',
  important: 'important',
  promoted: 'important',
  critical: 'critical',
  pinned: 'critical',
};

/**
 * Parse a stored promotion tag. Returns null when the tag is missing or unknown.
 */
export function parsePromotionLevel(value: string | null | undefined): PromotionLevel | null {
  if (value === null || value === undefined) return null;
  return ALIASES[value.trim().toLowerCase()] ?? null;
}

/**
 * Rank of a level: standard = 0, important = 1, critical = 2.
 */
export function promotionRank(level: PromotionLevel): number {
  return PROMOTION_LEVELS.indexOf(level);
}

/**
 * True when level is at or above floor.
 */
export function meetsPromotionFloor(level: PromotionLevel, floor: PromotionLevel): boolean {
  return promotionRank(level) >= promotionRank(floor);
}

/**
 * Levels at or above floor.
 */
export function levelsAtOrAbove(floor: PromotionLevel): PromotionLevel[] {
  return PROMOTION_LEVELS.filter((level) => meetsPromotionFloor(level, floor));
}

/**
 * Every stored tag that parses to one of the given levels, lowercase.
 */
export function tagsForLevels(levels: readonly PromotionLevel[]): string[] {
  return Object.entries(ALIASES)
    .filter(([, level]) => levels.includes(level))
    .map(([tag]) => tag);
}
