/**
 * Tests for config/loader.ts: defaults, file and env layering, validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  EXTERNAL_DEFAULTS,
  loadConfig,
  loadEngineConfig,
  toRuntimeConfig,
  validateExternalConfig,
} from '../../src/config/loader.js';
import { DEFAULT_CONFIG } from '../../src/config/engine-config.js';
import { ConfigError } from '../../src/utils/errors.js';

function clearDocweaveEnv(): void {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith('DOCWEAVE_') && key !== 'DOCWEAVE_LOG_LEVEL') {
      delete process.env[key];
    }
  }
}

describe('loadConfig', () => {
  let dir: string;
  let userPath: string;
  let projectPath: string;

  beforeEach(() => {
    clearDocweaveEnv();
    dir = mkdtempSync(join(tmpdir(), 'docweave-config-'));
    userPath = join(dir, 'user.json');
    projectPath = join(dir, 'project.json');
  });

  afterEach(() => {
    clearDocweaveEnv();
    rmSync(dir, { recursive: true, force: true });
  });

  const fromFiles = () =>
    loadConfig({ userConfigPath: userPath, projectConfigPath: projectPath });

  it('returns defaults when no source exists', () => {
    const config = loadConfig({ skipEnv: true, skipProjectConfig: true, skipUserConfig: true });

    expect(config).toEqual(EXTERNAL_DEFAULTS);
    expect(config.scoring.criticalBoost).toBe(0.15);
    expect(config.supersession.decayFactor).toBe(0.5);
    expect(config.retrieval.maxResults).toBe(3);
  });

  it('layers user file < project file < env < overrides', () => {
    writeFileSync(userPath, JSON.stringify({ retrieval: { maxResults: 4, maxLinkDepth: 1 } }));
    writeFileSync(
      projectPath,
      JSON.stringify({ retrieval: { maxResults: 6 }, scoring: { criticalBoost: 0.2 } }),
    );
    process.env.DOCWEAVE_SCORING_CRITICAL_BOOST = '0.3';

    const config = loadConfig({
      userConfigPath: userPath,
      projectConfigPath: projectPath,
      overrides: { scoring: { importantBoost: 0.05 } },
    });

    expect(config.retrieval.maxResults).toBe(6);
    expect(config.retrieval.maxLinkDepth).toBe(1);
    expect(config.scoring.criticalBoost).toBe(0.3);
    expect(config.scoring.importantBoost).toBe(0.05);
    expect(config.scoring.standardBoost).toBe(0);
  });

  it('reads typed values from the environment', () => {
    process.env.DOCWEAVE_SUPERSESSION_DEMOTE_SUPERSEDED = 'false';
    process.env.DOCWEAVE_SUPERSESSION_MAX_CHAIN_DEPTH = '4';
    process.env.DOCWEAVE_RETRIEVAL_MIN_PROMOTION_LEVEL = 'important';
    process.env.DOCWEAVE_STORAGE_DB_PATH = '/tmp/test.db';

    const config = fromFiles();

    expect(config.supersession.demoteSuperseded).toBe(false);
    expect(config.supersession.maxChainDepth).toBe(4);
    expect(config.retrieval.minPromotionLevel).toBe('important');
    expect(config.storage.dbPath).toBe('/tmp/test.db');
  });

  it('ignores unparseable config files', () => {
    writeFileSync(projectPath, '{ not json');
    expect(fromFiles()).toEqual(EXTERNAL_DEFAULTS);
  });

  it('ignores config files with non-object sections', () => {
    writeFileSync(projectPath, JSON.stringify({ scoring: 5 }));
    expect(fromFiles()).toEqual(EXTERNAL_DEFAULTS);
  });
});

describe('validateExternalConfig', () => {
  it('accepts the defaults', () => {
    expect(validateExternalConfig(EXTERNAL_DEFAULTS)).toEqual([]);
  });

  it('reports every out-of-range value', () => {
    const errors = validateExternalConfig({
      scoring: { criticalBoost: 1.5, overFetchFactor: 0.5 },
      supersession: { decayFactor: 0, maxChainDepth: 0 },
      retrieval: { maxResults: 0, maxLinkDepth: -1, minPromotionLevel: 'urgent' },
    });

    expect(errors).toEqual([
      'scoring.criticalBoost must be between 0 and 1 (inclusive)',
      'scoring.overFetchFactor must be at least 1',
      'supersession.decayFactor must be in (0, 1]',
      'supersession.maxChainDepth must be an integer >= 1',
      'retrieval.maxResults must be an integer >= 1',
      'retrieval.maxLinkDepth must be an integer >= 0',
      'retrieval.minPromotionLevel must be standard, important or critical',
    ]);
  });
});

describe('toRuntimeConfig', () => {
  it('converts defaults back to DEFAULT_CONFIG', () => {
    expect(toRuntimeConfig(EXTERNAL_DEFAULTS)).toEqual(DEFAULT_CONFIG);
  });

  it('normalises promotion aliases', () => {
    const runtime = toRuntimeConfig({
      ...EXTERNAL_DEFAULTS,
      retrieval: { ...EXTERNAL_DEFAULTS.retrieval, minPromotionLevel: 'Pinned' },
    });
    expect(runtime.retrieval.minPromotionLevel).toBe('critical');
  });
});

describe('loadEngineConfig', () => {
  const isolated = { skipEnv: true, skipProjectConfig: true, skipUserConfig: true };

  it('returns the runtime config', () => {
    const config = loadEngineConfig({ ...isolated, overrides: { supersession: { decayFactor: 0.25 } } });
    expect(config.supersession.decayFactor).toBe(0.25);
  });

  it('throws ConfigError listing problems', () => {
    const load = () => loadEngineConfig({ ...isolated, overrides: { retrieval: { maxResults: 0 } } });

    expect(load).toThrow(ConfigError);
    expect(load).toThrow('Invalid configuration: retrieval.maxResults must be an integer >= 1');
  });
});
