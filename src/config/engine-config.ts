/**
 * Centralized configuration for the retrieval engine.
 */

import type { PromotionLevel, RetrievalOptions } from '../core/types.js';

/**
 * Additive score boost per promotion level.
 */
export type PromotionBoosts = Record<PromotionLevel, number>;

/**
 * Complete engine configuration.
 */
export interface EngineConfig {
  // Scoring
  /** Added to the raw similarity score per promotion level, result capped at 1.0 */
  promotionBoosts: PromotionBoosts;
  /** Vector store over-fetch multiplier applied to maxResults */
  overFetchFactor: number;
  /** Score assigned to injected critical documents before supersession adjustment */
  criticalBaseScore: number;

  // Supersession
  supersession: {
    /** Multiplier base: a document d hops behind the current version scores decayFactor^d */
    decayFactor: number;
    /** Hop limit for chain walks */
    maxChainDepth: number;
    /** Lower a superseded document's promotion level to standard on registration */
    demoteSuperseded: boolean;
  };

  // Retrieval defaults (used when a caller supplies partial options)
  retrieval: RetrievalOptions;

  // Storage
  /** Path to SQLite database file */
  dbPath: string;
}

/**
 * Default promotion boosts.
 */
export const DEFAULT_PROMOTION_BOOSTS: PromotionBoosts = {
  standard: 0,
  important: 0.1,
  critical: 0.15,
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: EngineConfig = {
  promotionBoosts: DEFAULT_PROMOTION_BOOSTS,
  overFetchFactor: 2,
  criticalBaseScore: 1.0,

  supersession: {
    decayFactor: 0.5,
    maxChainDepth: 10,
    demoteSuperseded: true,
  },

  retrieval: {
    minRelevanceScore: 0.5,
    maxResults: 3,
    maxLinkedDocs: 5,
    maxLinkDepth: 2,
    includeCritical: true,
    minPromotionLevel: 'standard',
    applyRelevanceBoosting: true,
  },

  dbPath: '~/.docweave/knowledge.db',
};

/**
 * Get configuration with overrides applied.
 * Nested sections are merged one level deep.
 */
export function getConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    ...DEFAULT_CONFIG,
    ...overrides,
    promotionBoosts: { ...DEFAULT_CONFIG.promotionBoosts, ...overrides.promotionBoosts },
    supersession: { ...DEFAULT_CONFIG.supersession, ...overrides.supersession },
    retrieval: { ...DEFAULT_CONFIG.retrieval, ...overrides.retrieval },
  };
}

/**
 * Resolve ~ to home directory in paths.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}

/**
 * Validate configuration values.
 */
export function validateConfig(config: EngineConfig): string[] {
  const errors: string[] = [];

  for (const [level, boost] of Object.entries(config.promotionBoosts)) {
    if (!Number.isFinite(boost) || boost < 0 || boost > 1) {
      errors.push(`promotionBoosts.${level} must be between 0 and 1`);
    }
  }
  if (!Number.isFinite(config.overFetchFactor) || config.overFetchFactor < 1) {
    errors.push('overFetchFactor must be at least 1');
  }
  if (config.criticalBaseScore < 0 || config.criticalBaseScore > 1) {
    errors.push('criticalBaseScore must be between 0 and 1');
  }
  if (config.supersession.decayFactor <= 0 || config.supersession.decayFactor > 1) {
    errors.push('supersession.decayFactor must be in (0, 1]');
  }
  if (!Number.isInteger(config.supersession.maxChainDepth) || config.supersession.maxChainDepth < 1) {
    errors.push('supersession.maxChainDepth must be a positive integer');
  }

  return errors;
}
