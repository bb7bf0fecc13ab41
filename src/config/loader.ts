/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. Programmatic overrides (passed directly)
 * 2. Environment variables (DOCWEAVE_*)
 * 3. Project config file (./docweave.config.json)
 * 4. User config file (~/.docweave/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { resolvePath, DEFAULT_CONFIG, validateConfig, type EngineConfig } from './engine-config.js';
import { parsePromotionLevel } from '../core/promotion.js';
import { ConfigError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

/** External config file structure (matches config.schema.json) */
export interface ExternalConfig {
  scoring?: {
    standardBoost?: number;
    importantBoost?: number;
    criticalBoost?: number;
    overFetchFactor?: number;
    criticalBaseScore?: number;
  };
  supersession?: {
    decayFactor?: number;
    maxChainDepth?: number;
    demoteSuperseded?: boolean;
  };
  retrieval?: {
    minRelevanceScore?: number;
    maxResults?: number;
    maxLinkedDocs?: number;
    maxLinkDepth?: number;
    includeCritical?: boolean;
    /** standard | important | critical (aliases promoted and pinned accepted) */
    minPromotionLevel?: string;
    applyRelevanceBoosting?: boolean;
  };
  storage?: {
    dbPath?: string;
  };
}

/** External config with every section and field present */
export interface ResolvedExternalConfig {
  scoring: Required<NonNullable<ExternalConfig['scoring']>>;
  supersession: Required<NonNullable<ExternalConfig['supersession']>>;
  retrieval: Required<NonNullable<ExternalConfig['retrieval']>>;
  storage: Required<NonNullable<ExternalConfig['storage']>>;
}

/** Default external config values */
const EXTERNAL_DEFAULTS: ResolvedExternalConfig = {
  scoring: {
    standardBoost: DEFAULT_CONFIG.promotionBoosts.standard,
    importantBoost: DEFAULT_CONFIG.promotionBoosts.important,
    criticalBoost: DEFAULT_CONFIG.promotionBoosts.critical,
    overFetchFactor: DEFAULT_CONFIG.overFetchFactor,
    criticalBaseScore: DEFAULT_CONFIG.criticalBaseScore,
  },
  supersession: { ...DEFAULT_CONFIG.supersession },
  retrieval: {
    minRelevanceScore: DEFAULT_CONFIG.retrieval.minRelevanceScore,
    maxResults: DEFAULT_CONFIG.retrieval.maxResults,
    maxLinkedDocs: DEFAULT_CONFIG.retrieval.maxLinkedDocs,
    maxLinkDepth: DEFAULT_CONFIG.retrieval.maxLinkDepth,
    includeCritical: DEFAULT_CONFIG.retrieval.includeCritical,
    minPromotionLevel: DEFAULT_CONFIG.retrieval.minPromotionLevel,
    applyRelevanceBoosting: DEFAULT_CONFIG.retrieval.applyRelevanceBoosting,
  },
  storage: {
    dbPath: DEFAULT_CONFIG.dbPath,
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shallow shape check: every known section present must be an object.
 * Field values are checked by validateExternalConfig.
 */
function isExternalConfig(value: unknown): value is ExternalConfig {
  if (!isRecord(value)) return false;
  return (['scoring', 'supersession', 'retrieval', 'storage'] as const).every(
    (section) => value[section] === undefined || isRecord(value[section]),
  );
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(resolvedPath, 'utf-8'));
    if (!isExternalConfig(parsed)) {
      log.warn(`Ignoring config file ${path}: expected an object of config sections`);
      return null;
    }
    return parsed;
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, { error });
    return null;
  }
}

function envNumber(name: string): number | undefined {
  const raw = process.env[name];
  return raw ? parseFloat(raw) : undefined;
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  return raw ? parseInt(raw, 10) : undefined;
}

function envBool(name: string): boolean | undefined {
  const raw = process.env[name];
  return raw ? raw === 'true' : undefined;
}

/**
 * Drop keys whose value is undefined so they don't mask lower-priority sources.
 */
function compact<T extends object>(section: T): T | undefined {
  const entries = Object.entries(section).filter(([, v]) => v !== undefined);
  return entries.length > 0 ? section : undefined;
}

/**
 * Load config from environment variables.
 * Variables are prefixed with DOCWEAVE_ and use underscores for nesting.
 * Examples:
 *   DOCWEAVE_SCORING_CRITICAL_BOOST=0.2
 *   DOCWEAVE_RETRIEVAL_MAX_RESULTS=5
 *   DOCWEAVE_STORAGE_DB_PATH=~/.docweave/knowledge.db
 */
function loadEnvConfig(): ExternalConfig {
  const config: ExternalConfig = {};

  const scoring: NonNullable<ExternalConfig['scoring']> = {};
  const standardBoost = envNumber('DOCWEAVE_SCORING_STANDARD_BOOST');
  if (standardBoost !== undefined) scoring.standardBoost = standardBoost;
  const importantBoost = envNumber('DOCWEAVE_SCORING_IMPORTANT_BOOST');
  if (importantBoost !== undefined) scoring.importantBoost = importantBoost;
  const criticalBoost = envNumber('DOCWEAVE_SCORING_CRITICAL_BOOST');
  if (criticalBoost !== undefined) scoring.criticalBoost = criticalBoost;
  const overFetchFactor = envNumber('DOCWEAVE_SCORING_OVER_FETCH_FACTOR');
  if (overFetchFactor !== undefined) scoring.overFetchFactor = overFetchFactor;
  const criticalBaseScore = envNumber('DOCWEAVE_SCORING_CRITICAL_BASE_SCORE');
  if (criticalBaseScore !== undefined) scoring.criticalBaseScore = criticalBaseScore;
  config.scoring = compact(scoring);

  const supersession: NonNullable<ExternalConfig['supersession']> = {};
  const decayFactor = envNumber('DOCWEAVE_SUPERSESSION_DECAY_FACTOR');
  if (decayFactor !== undefined) supersession.decayFactor = decayFactor;
  const maxChainDepth = envInt('DOCWEAVE_SUPERSESSION_MAX_CHAIN_DEPTH');
  if (maxChainDepth !== undefined) supersession.maxChainDepth = maxChainDepth;
  const demoteSuperseded = envBool('DOCWEAVE_SUPERSESSION_DEMOTE_SUPERSEDED');
  if (demoteSuperseded !== undefined) supersession.demoteSuperseded = demoteSuperseded;
  config.supersession = compact(supersession);

  const retrieval: NonNullable<ExternalConfig['retrieval']> = {};
  const minRelevanceScore = envNumber('DOCWEAVE_RETRIEVAL_MIN_RELEVANCE_SCORE');
  if (minRelevanceScore !== undefined) retrieval.minRelevanceScore = minRelevanceScore;
  const maxResults = envInt('DOCWEAVE_RETRIEVAL_MAX_RESULTS');
  if (maxResults !== undefined) retrieval.maxResults = maxResults;
  const maxLinkedDocs = envInt('DOCWEAVE_RETRIEVAL_MAX_LINKED_DOCS');
  if (maxLinkedDocs !== undefined) retrieval.maxLinkedDocs = maxLinkedDocs;
  const maxLinkDepth = envInt('DOCWEAVE_RETRIEVAL_MAX_LINK_DEPTH');
  if (maxLinkDepth !== undefined) retrieval.maxLinkDepth = maxLinkDepth;
  const includeCritical = envBool('DOCWEAVE_RETRIEVAL_INCLUDE_CRITICAL');
  if (includeCritical !== undefined) retrieval.includeCritical = includeCritical;
  if (process.env.DOCWEAVE_RETRIEVAL_MIN_PROMOTION_LEVEL) {
    retrieval.minPromotionLevel = process.env.DOCWEAVE_RETRIEVAL_MIN_PROMOTION_LEVEL;
  }
  const applyRelevanceBoosting = envBool('DOCWEAVE_RETRIEVAL_APPLY_BOOSTING');
  if (applyRelevanceBoosting !== undefined) retrieval.applyRelevanceBoosting = applyRelevanceBoosting;
  config.retrieval = compact(retrieval);

  if (process.env.DOCWEAVE_STORAGE_DB_PATH) {
    config.storage = { dbPath: process.env.DOCWEAVE_STORAGE_DB_PATH };
  }

  return config;
}

/**
 * Merge two configs section by section, with source overriding target.
 */
function mergeConfig(target: ResolvedExternalConfig, source: ExternalConfig): ResolvedExternalConfig {
  return {
    scoring: { ...target.scoring, ...source.scoring },
    supersession: { ...target.supersession, ...source.supersession },
    retrieval: { ...target.retrieval, ...source.retrieval },
    storage: { ...target.storage, ...source.storage },
  };
}

function checkRange(
  errors: string[],
  name: string,
  value: number | undefined,
  min: number,
  max: number,
): void {
  if (value === undefined) return;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < min || value > max) {
    errors.push(`${name} must be between ${min} and ${max} (inclusive)`);
  }
}

function checkMinInt(errors: string[], name: string, value: number | undefined, min: number): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < min) {
    errors.push(`${name} must be an integer >= ${min}`);
  }
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  checkRange(errors, 'scoring.standardBoost', config.scoring?.standardBoost, 0, 1);
  checkRange(errors, 'scoring.importantBoost', config.scoring?.importantBoost, 0, 1);
  checkRange(errors, 'scoring.criticalBoost', config.scoring?.criticalBoost, 0, 1);
  checkRange(errors, 'scoring.criticalBaseScore', config.scoring?.criticalBaseScore, 0, 1);
  if (config.scoring?.overFetchFactor !== undefined && !(config.scoring.overFetchFactor >= 1)) {
    errors.push('scoring.overFetchFactor must be at least 1');
  }

  if (config.supersession?.decayFactor !== undefined) {
    const factor = config.supersession.decayFactor;
    if (!(factor > 0 && factor <= 1)) {
      errors.push('supersession.decayFactor must be in (0, 1]');
    }
  }
  checkMinInt(errors, 'supersession.maxChainDepth', config.supersession?.maxChainDepth, 1);

  checkRange(errors, 'retrieval.minRelevanceScore', config.retrieval?.minRelevanceScore, 0, 1);
  checkMinInt(errors, 'retrieval.maxResults', config.retrieval?.maxResults, 1);
  checkMinInt(errors, 'retrieval.maxLinkedDocs', config.retrieval?.maxLinkedDocs, 0);
  checkMinInt(errors, 'retrieval.maxLinkDepth', config.retrieval?.maxLinkDepth, 0);
  if (
    config.retrieval?.minPromotionLevel !== undefined &&
    parsePromotionLevel(config.retrieval.minPromotionLevel) === null
  ) {
    errors.push('retrieval.minPromotionLevel must be standard, important or critical');
  }

  return errors;
}

export interface LoadConfigOptions {
  /** Programmatic overrides (highest priority) */
  overrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedExternalConfig {
  let config = mergeConfig(EXTERNAL_DEFAULTS, {});

  if (!options.skipUserConfig) {
    const userConfig = loadConfigFile(options.userConfigPath ?? '~/.docweave/config.json');
    if (userConfig) {
      config = mergeConfig(config, userConfig);
    }
  }

  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'docweave.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = mergeConfig(config, projectConfig);
    }
  }

  if (!options.skipEnv) {
    config = mergeConfig(config, loadEnvConfig());
  }

  if (options.overrides) {
    config = mergeConfig(config, options.overrides);
  }

  return config;
}

/**
 * Convert the external config to the runtime EngineConfig.
 */
export function toRuntimeConfig(external: ResolvedExternalConfig): EngineConfig {
  return {
    promotionBoosts: {
      standard: external.scoring.standardBoost,
      important: external.scoring.importantBoost,
      critical: external.scoring.criticalBoost,
    },
    overFetchFactor: external.scoring.overFetchFactor,
    criticalBaseScore: external.scoring.criticalBaseScore,
    supersession: { ...external.supersession },
    retrieval: {
      minRelevanceScore: external.retrieval.minRelevanceScore,
      maxResults: external.retrieval.maxResults,
      maxLinkedDocs: external.retrieval.maxLinkedDocs,
      maxLinkDepth: external.retrieval.maxLinkDepth,
      includeCritical: external.retrieval.includeCritical,
      minPromotionLevel:
        parsePromotionLevel(external.retrieval.minPromotionLevel) ??
        DEFAULT_CONFIG.retrieval.minPromotionLevel,
      applyRelevanceBoosting: external.retrieval.applyRelevanceBoosting,
    },
    dbPath: external.storage.dbPath,
  };
}

/**
 * Load, validate and convert configuration in one step.
 * Throws ConfigError (CONFIG_INVALID) listing every problem found.
 */
export function loadEngineConfig(options: LoadConfigOptions = {}): EngineConfig {
  const external = loadConfig(options);
  const errors = validateExternalConfig(external);
  const runtime = toRuntimeConfig(external);
  errors.push(...validateConfig(runtime).filter((e) => !errors.includes(e)));

  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }
  return runtime;
}

export { EXTERNAL_DEFAULTS };
