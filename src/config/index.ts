/**
 * Configuration exports.
 */

export {
  DEFAULT_CONFIG,
  DEFAULT_PROMOTION_BOOSTS,
  getConfig,
  resolvePath,
  validateConfig,
  type EngineConfig,
  type PromotionBoosts,
} from './engine-config.js';

export {
  loadConfig,
  loadEngineConfig,
  toRuntimeConfig,
  validateExternalConfig,
  EXTERNAL_DEFAULTS,
  type ExternalConfig,
  type ResolvedExternalConfig,
  type LoadConfigOptions,
} from './loader.js';

export {
  DEFAULT_RETRIEVAL_OPTIONS,
  resolveRetrievalOptions,
  getRetrievalOptionErrors,
  assertValidRetrievalOptions,
} from './retrieval-options.js';
