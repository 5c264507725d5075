import path from 'path';
import {
  DEFAULT_CONFIG,
  configFromEnv,
  createGateConfig,
  loadConfigFile,
  parseConfigFile,
  resolveGateConfig,
} from '../../src/core/config';
import { ConfigError } from '../../src/core/errors';

const FIXTURE = path.join(__dirname, '../fixtures/gatekeep.yaml');

describe('createGateConfig', () => {
  it('returns frozen defaults', () => {
    const config = createGateConfig();
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.duplicateThreshold).toBe(0.9);
    expect(config.issueDuplicateThreshold).toBe(0.85);
    expect(config.suspicionThreshold).toBe(0.6);
    expect(config.newAccountDays).toBe(90);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.sensitivePaths)).toBe(true);
  });

  it('applies overrides and ignores undefined ones', () => {
    const config = createGateConfig({ linkingThreshold: 0.6, duplicateThreshold: undefined });
    expect(config.linkingThreshold).toBe(0.6);
    expect(config.duplicateThreshold).toBe(0.9);
  });

  it('lists every problem before refusing', () => {
    let caught: unknown;
    try {
      createGateConfig({ duplicateThreshold: 1.2, staleInactiveDays: -1, maxConcurrent: 0 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.problems).toEqual([
      'duplicateThreshold must be within [0, 1] (got 1.2)',
      'staleInactiveDays must be >= 0 (got -1)',
      'maxConcurrent must be a positive integer (got 0)',
    ]);
  });

  it('rejects empty sensitive path entries', () => {
    expect(() => createGateConfig({ sensitivePaths: ['auth', ' '] }))
      .toThrow('Invalid configuration: sensitivePaths must not contain empty entries');
  });
});

describe('configFromEnv', () => {
  it('reads prefixed variables', () => {
    expect(configFromEnv({
      GATEKEEP_DUPLICATE_THRESHOLD: '0.95',
      GATEKEEP_SENSITIVE_PATHS: 'auth, billing,',
      GATEKEEP_ENABLE_TIER3: 'no',
      UNRELATED: 'x',
    })).toEqual({
      duplicateThreshold: 0.95,
      sensitivePaths: ['auth', 'billing'],
      enableTier3: false,
    });
  });

  it('rejects values that do not parse', () => {
    expect(() => configFromEnv({ GATEKEEP_MAX_CONCURRENT: 'lots' }))
      .toThrow('Invalid configuration: GATEKEEP_MAX_CONCURRENT must be a number (got "lots")');
  });
});

describe('config file', () => {
  it('parses snake_case keys', () => {
    expect(parseConfigFile('duplicate_threshold: 0.92\nlabel_max_suggestions: 5\nvision_document_path: VISION.yaml\n'))
      .toEqual({ duplicateThreshold: 0.92, labelMaxSuggestions: 5, visionDocumentPath: 'VISION.yaml' });
  });

  it('treats an empty file as no overrides', () => {
    expect(parseConfigFile('')).toEqual({});
  });

  it('rejects unknown keys and wrong types', () => {
    let caught: unknown;
    try {
      parseConfigFile('dupe_threshold: 0.9\nmax_concurrent: three\n');
    } catch (err) {
      caught = err;
    }
    expect(caught instanceof ConfigError && caught.problems).toEqual([
      'max_concurrent must be a number',
      'unknown key "dupe_threshold"',
    ]);
  });

  it('returns undefined for a missing file', () => {
    expect(loadConfigFile(path.join(__dirname, 'missing.yaml'))).toBeUndefined();
  });
});

describe('resolveGateConfig', () => {
  it('layers defaults, environment, file and overrides in that order', () => {
    const config = resolveGateConfig({
      env: { GATEKEEP_DUPLICATE_THRESHOLD: '0.8', GATEKEEP_LINKING_THRESHOLD: '0.5' },
      filePath: FIXTURE,
      overrides: { maxConcurrent: 7 },
    });

    expect(config.duplicateThreshold).toBe(0.85);
    expect(config.linkingThreshold).toBe(0.5);
    expect(config.maxConcurrent).toBe(7);
    expect(config.sensitivePaths).toEqual(['auth', 'billing']);
    expect(config.enableTier3).toBe(false);
  });

  it('falls back to defaults without a file', () => {
    const config = resolveGateConfig({ env: {}, filePath: path.join(__dirname, 'missing.yaml') });
    expect(config).toEqual(DEFAULT_CONFIG);
  });
});
