/**
 * GateConfig: the single immutable settings struct passed to every engine.
 *
 * Precedence (lowest first): built-in defaults, GATEKEEP_* environment
 * variables, the .gatekeep.yaml file, explicit overrides. Every path goes
 * through createGateConfig, which validates and freezes.
 */

import { existsSync, readFileSync } from 'fs';
import { load } from 'js-yaml';
import { ConfigError } from './errors';

export interface GateConfig {
  // Tier 1
  readonly duplicateThreshold: number;
  readonly issueDuplicateThreshold: number;
  readonly clusterThreshold: number;

  // Tier 2
  readonly suspicionThreshold: number;
  readonly issueSuspicionThreshold: number;
  readonly newAccountDays: number;
  readonly sensitivePaths: readonly string[];
  readonly minTestRatio: number;
  readonly issueMinBodyLength: number;

  // Tier 3
  readonly enableTier3: boolean;
  readonly visionDocumentPath?: string;
  readonly judgeTimeoutMs: number;

  // Blended features
  readonly linkingThreshold: number;
  readonly staleSimilarityThreshold: number;
  readonly staleInactiveDays: number;
  readonly conflictThreshold: number;
  readonly conflictFileOverlapWeight: number;
  readonly labelThreshold: number;
  readonly labelKeywordWeight: number;
  readonly labelMaxSuggestions: number;
  readonly reviewMaxSuggestions: number;

  // Batch
  readonly maxConcurrent: number;
}

export const DEFAULT_SENSITIVE_PATHS: readonly string[] = [
  'auth', 'crypto', 'security', 'login', 'password',
  '.github/workflows', 'ci', 'cd', 'deploy',
  'Dockerfile', 'docker-compose',
  'requirements.txt', 'package.json', 'pyproject.toml',
  'Gemfile', 'go.mod', 'Cargo.toml',
];

export const DEFAULT_CONFIG: GateConfig = Object.freeze({
  duplicateThreshold: 0.9,
  issueDuplicateThreshold: 0.85,
  clusterThreshold: 0.9,
  suspicionThreshold: 0.6,
  issueSuspicionThreshold: 0.6,
  newAccountDays: 90,
  sensitivePaths: DEFAULT_SENSITIVE_PATHS,
  minTestRatio: 0.1,
  issueMinBodyLength: 30,
  enableTier3: true,
  visionDocumentPath: undefined,
  judgeTimeoutMs: 60_000,
  linkingThreshold: 0.45,
  staleSimilarityThreshold: 0.75,
  staleInactiveDays: 90,
  conflictThreshold: 0.3,
  conflictFileOverlapWeight: 0.5,
  labelThreshold: 0.3,
  labelKeywordWeight: 0.3,
  labelMaxSuggestions: 3,
  reviewMaxSuggestions: 3,
  maxConcurrent: 3,
});

type NumericKey = {
  [K in keyof GateConfig]-?: GateConfig[K] extends number ? K : never;
}[keyof GateConfig];

type Mutable<T> = { -readonly [K in keyof T]?: T[K] };

const UNIT_INTERVAL_KEYS: NumericKey[] = [
  'duplicateThreshold', 'issueDuplicateThreshold', 'clusterThreshold',
  'suspicionThreshold', 'issueSuspicionThreshold', 'minTestRatio',
  'linkingThreshold', 'staleSimilarityThreshold',
  'conflictThreshold', 'conflictFileOverlapWeight',
  'labelThreshold', 'labelKeywordWeight',
];

const NON_NEGATIVE_KEYS: NumericKey[] = ['newAccountDays', 'staleInactiveDays', 'issueMinBodyLength'];

const POSITIVE_INTEGER_KEYS: NumericKey[] = [
  'labelMaxSuggestions', 'reviewMaxSuggestions', 'maxConcurrent', 'judgeTimeoutMs',
];

const NUMERIC_KEYS: NumericKey[] = [...UNIT_INTERVAL_KEYS, ...NON_NEGATIVE_KEYS, ...POSITIVE_INTEGER_KEYS];

export function validateConfig(config: GateConfig): string[] {
  const problems: string[] = [];

  for (const key of UNIT_INTERVAL_KEYS) {
    const value = config[key];
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      problems.push(`${key} must be within [0, 1] (got ${value})`);
    }
  }
  for (const key of NON_NEGATIVE_KEYS) {
    const value = config[key];
    if (!Number.isFinite(value) || value < 0) {
      problems.push(`${key} must be >= 0 (got ${value})`);
    }
  }
  for (const key of POSITIVE_INTEGER_KEYS) {
    const value = config[key];
    if (!Number.isInteger(value) || value < 1) {
      problems.push(`${key} must be a positive integer (got ${value})`);
    }
  }
  if (config.sensitivePaths.some(p => p.trim() === '')) {
    problems.push('sensitivePaths must not contain empty entries');
  }

  return problems;
}

function applyLayer(target: Mutable<GateConfig>, layer: Partial<GateConfig>): void {
  for (const key of NUMERIC_KEYS) {
    const value = layer[key];
    if (value !== undefined) target[key] = value;
  }
  if (layer.sensitivePaths !== undefined) target.sensitivePaths = layer.sensitivePaths;
  if (layer.enableTier3 !== undefined) target.enableTier3 = layer.enableTier3;
  if (layer.visionDocumentPath !== undefined) target.visionDocumentPath = layer.visionDocumentPath;
}

/** Merge overrides onto the defaults, validate, and freeze. Throws ConfigError. */
export function createGateConfig(overrides: Partial<GateConfig> = {}): GateConfig {
  const merged: Mutable<GateConfig> = {};
  applyLayer(merged, overrides);

  const config: GateConfig = {
    ...DEFAULT_CONFIG,
    ...merged,
    sensitivePaths: Object.freeze([...(merged.sensitivePaths ?? DEFAULT_CONFIG.sensitivePaths)]),
  };

  const problems = validateConfig(config);
  if (problems.length > 0) throw new ConfigError(problems);

  return Object.freeze(config);
}

// --- Environment ---

const ENV_PREFIX = 'GATEKEEP_';

function snakeCase(key: string): string {
  return key.replace(/([A-Z])/g, '_$1').toLowerCase();
}

function toEnvName(key: keyof GateConfig): string {
  return ENV_PREFIX + snakeCase(key).toUpperCase();
}

function parseNumber(name: string, raw: string, problems: string[]): number | undefined {
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) {
    problems.push(`${name} must be a number (got "${raw}")`);
    return undefined;
  }
  return value;
}

function parseBoolean(name: string, raw: string, problems: string[]): boolean | undefined {
  const v = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  problems.push(`${name} must be a boolean (got "${raw}")`);
  return undefined;
}

/**
 * Read overrides from GATEKEEP_* variables, e.g. GATEKEEP_DUPLICATE_THRESHOLD=0.92
 * or GATEKEEP_SENSITIVE_PATHS=auth,billing. Unset variables are skipped.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<GateConfig> {
  const overrides: Mutable<GateConfig> = {};
  const problems: string[] = [];

  for (const key of NUMERIC_KEYS) {
    const raw = env[toEnvName(key)];
    if (raw !== undefined) overrides[key] = parseNumber(toEnvName(key), raw, problems);
  }

  const paths = env[toEnvName('sensitivePaths')];
  if (paths !== undefined) overrides.sensitivePaths = paths.split(',').map(s => s.trim()).filter(Boolean);

  const tier3 = env[toEnvName('enableTier3')];
  if (tier3 !== undefined) overrides.enableTier3 = parseBoolean(toEnvName('enableTier3'), tier3, problems);

  const vision = env[toEnvName('visionDocumentPath')];
  if (vision) overrides.visionDocumentPath = vision;

  if (problems.length > 0) throw new ConfigError(problems);
  return overrides;
}

// --- Config file ---

export const CONFIG_FILE_NAME = '.gatekeep.yaml';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

/**
 * Parse the snake_case YAML config file. Unknown keys are rejected so typos
 * surface instead of silently falling back to defaults.
 */
export function parseConfigFile(yamlText: string): Partial<GateConfig> {
  const parsed: unknown = load(yamlText) ?? {};
  if (!isRecord(parsed)) throw new ConfigError(['config file must be a mapping']);

  const overrides: Mutable<GateConfig> = {};
  const problems: string[] = [];
  const known = new Set<string>();

  for (const key of NUMERIC_KEYS) {
    const name = snakeCase(key);
    known.add(name);
    if (!(name in parsed)) continue;
    const value = parsed[name];
    if (typeof value === 'number') overrides[key] = value;
    else problems.push(`${name} must be a number`);
  }

  known.add('sensitive_paths');
  if ('sensitive_paths' in parsed) {
    const value = parsed.sensitive_paths;
    if (isStringList(value)) overrides.sensitivePaths = value;
    else problems.push('sensitive_paths must be a list of strings');
  }

  known.add('enable_tier3');
  if ('enable_tier3' in parsed) {
    const value = parsed.enable_tier3;
    if (typeof value === 'boolean') overrides.enableTier3 = value;
    else problems.push('enable_tier3 must be a boolean');
  }

  known.add('vision_document_path');
  if ('vision_document_path' in parsed) {
    const value = parsed.vision_document_path;
    if (typeof value === 'string') overrides.visionDocumentPath = value;
    else problems.push('vision_document_path must be a string');
  }

  for (const name of Object.keys(parsed)) {
    if (!known.has(name)) problems.push(`unknown key "${name}"`);
  }

  if (problems.length > 0) throw new ConfigError(problems);
  return overrides;
}

export function loadConfigFile(filePath: string): Partial<GateConfig> | undefined {
  if (!existsSync(filePath)) return undefined;
  return parseConfigFile(readFileSync(filePath, 'utf-8'));
}

/** defaults < env < file < overrides */
export function resolveGateConfig(opts: {
  env?: NodeJS.ProcessEnv;
  filePath?: string;
  overrides?: Partial<GateConfig>;
} = {}): GateConfig {
  const merged: Mutable<GateConfig> = {};
  applyLayer(merged, configFromEnv(opts.env ?? process.env));
  if (opts.filePath) applyLayer(merged, loadConfigFile(opts.filePath) ?? {});
  applyLayer(merged, opts.overrides ?? {});
  return createGateConfig(merged);
}
