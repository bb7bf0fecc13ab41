/**
 * Boundary validation for per-call retrieval options.
 *
 * Options arrive already resolved by the tenant/config layer; this module only
 * rejects values that are out of range before any work begins.
 */

import { PROMOTION_LEVELS, type RetrievalOptions } from '../core/types.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './engine-config.js';

/**
 * Default retrieval options.
 */
export const DEFAULT_RETRIEVAL_OPTIONS: RetrievalOptions = DEFAULT_CONFIG.retrieval;

/**
 * Fill missing fields from defaults.
 */
export function resolveRetrievalOptions(
  partial: Partial<RetrievalOptions> = {},
  defaults: RetrievalOptions = DEFAULT_RETRIEVAL_OPTIONS,
): RetrievalOptions {
  return { ...defaults, ...partial };
}

/**
 * List every out-of-range option. Empty when the options are valid.
 */
export function getRetrievalOptionErrors(options: RetrievalOptions): string[] {
  const errors: string[] = [];

  if (
    !Number.isFinite(options.minRelevanceScore) ||
    options.minRelevanceScore < 0 ||
    options.minRelevanceScore > 1
  ) {
    errors.push('minRelevanceScore must be between 0 and 1 (inclusive)');
  }
  if (!Number.isInteger(options.maxResults) || options.maxResults < 1) {
    errors.push('maxResults must be an integer >= 1');
  }
  if (!Number.isInteger(options.maxLinkedDocs) || options.maxLinkedDocs < 0) {
    errors.push('maxLinkedDocs must be an integer >= 0');
  }
  if (!Number.isInteger(options.maxLinkDepth) || options.maxLinkDepth < 0) {
    errors.push('maxLinkDepth must be an integer >= 0');
  }
  if (!PROMOTION_LEVELS.includes(options.minPromotionLevel)) {
    errors.push(`minPromotionLevel must be one of ${PROMOTION_LEVELS.join(', ')}`);
  }
  if (options.docTypes !== undefined && options.docTypes.some((t) => t.trim() === '')) {
    errors.push('docTypes must not contain empty entries');
  }

  return errors;
}

/**
 * Throw ConfigError (INVALID_OPTIONS) when any option is out of range.
 */
export function assertValidRetrievalOptions(options: RetrievalOptions): void {
  const errors = getRetrievalOptionErrors(options);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid retrieval options: ${errors.join('; ')}`, 'INVALID_OPTIONS');
  }
}
