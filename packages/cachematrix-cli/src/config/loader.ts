/**
 * Configuration loading from multiple sources.
 *
 * Priority (highest to lowest):
 * 1. Programmatic options / CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Defaults
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { isVariantName, type HarnessOptions, type VariantName } from 'cachematrix';
import { configLog } from '../common/logger.js';
import { ConfigError } from '../common/errors.js';
import {
  type CliConfig,
  type OutputConfig,
  type OutputFormat,
  type PartialCliConfig,
  DEFAULT_CONFIG,
} from './types.js';

export const DEFAULT_CONFIG_FILE = 'cachematrix.json';

const NUMERIC_HARNESS_KEYS = [
  'repeats',
  'randomSize',
  'trials',
  'randomCalls',
  'tolerance',
  'identityTolerance',
  'seed',
] as const;

/**
 * Load configuration from a JSON file.
 */
export function loadConfigFile(configPath: string): PartialCliConfig {
  const resolved = resolve(configPath);
  if (!existsSync(resolved)) {
    configLog('Config file not found: %s', resolved);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (err) {
    configLog('Failed to parse config file %s: %O', resolved, err);
    throw new ConfigError(`Failed to parse config file: ${resolved}`, err instanceof Error ? err : undefined);
  }

  const config = parseConfigObject(parsed, resolved);
  configLog('Loaded config from %s', resolved);
  return config;
}

/**
 * Load configuration from environment variables.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialCliConfig {
  const config: PartialCliConfig = {};

  if (env.CACHEMATRIX_VARIANTS) {
    config.variants = parseVariantList(env.CACHEMATRIX_VARIANTS, 'CACHEMATRIX_VARIANTS');
  }

  const harness: Partial<HarnessOptions> = {};
  if (env.CACHEMATRIX_TRIALS) {
    harness.trials = parseInteger(env.CACHEMATRIX_TRIALS, 'CACHEMATRIX_TRIALS');
  }
  if (env.CACHEMATRIX_SIZE) {
    harness.randomSize = parseInteger(env.CACHEMATRIX_SIZE, 'CACHEMATRIX_SIZE');
  }
  if (env.CACHEMATRIX_SEED) {
    harness.seed = parseInteger(env.CACHEMATRIX_SEED, 'CACHEMATRIX_SEED');
  }
  if (env.CACHEMATRIX_TOLERANCE) {
    harness.tolerance = parseNumber(env.CACHEMATRIX_TOLERANCE, 'CACHEMATRIX_TOLERANCE');
  }
  if (env.CACHEMATRIX_IDENTITY_TOLERANCE) {
    harness.identityTolerance = parseNumber(env.CACHEMATRIX_IDENTITY_TOLERANCE, 'CACHEMATRIX_IDENTITY_TOLERANCE');
  }
  if (Object.keys(harness).length > 0) {
    config.harness = harness;
  }

  if (env.CACHEMATRIX_FORMAT) {
    config.output = { format: parseFormat(env.CACHEMATRIX_FORMAT, 'CACHEMATRIX_FORMAT') };
  }

  return config;
}

/**
 * Deep merge configuration objects.
 */
function mergeConfig(
  base: CliConfig,
  ...overrides: PartialCliConfig[]
): CliConfig {
  const result: CliConfig = {
    variants: [...base.variants],
    harness: { ...base.harness },
    output: { ...base.output },
  };

  for (const override of overrides) {
    if (override.variants !== undefined) result.variants = [...override.variants];
    if (override.harness) {
      result.harness = { ...result.harness, ...override.harness };
    }
    if (override.output) {
      result.output = { ...result.output, ...override.output };
    }
  }

  return result;
}

/**
 * Load full configuration from all sources.
 */
export function loadConfig(options: {
  configPath?: string;
  overrides?: PartialCliConfig;
  env?: NodeJS.ProcessEnv;
} = {}): CliConfig {
  const sources: PartialCliConfig[] = [];

  // Load from file if specified or default exists
  const configPath = options.configPath || DEFAULT_CONFIG_FILE;
  if (options.configPath || existsSync(configPath)) {
    sources.push(loadConfigFile(configPath));
  }

  sources.push(loadEnvConfig(options.env));

  if (options.overrides) {
    sources.push(options.overrides);
  }

  const config = mergeConfig(DEFAULT_CONFIG, ...sources);
  configLog('Final config: %O', config);

  return config;
}

/**
 * Validate the parsed contents of a config file.
 */
export function parseConfigObject(raw: unknown, source: string): PartialCliConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: expected a JSON object`);
  }

  const config: PartialCliConfig = {};

  const variants = raw.variants;
  if (variants !== undefined) {
    if (!Array.isArray(variants)) {
      throw new ConfigError(`${source}: 'variants' must be an array of variant names`);
    }
    config.variants = variants.map((name: unknown) => toVariantName(name, `${source}: variants`));
  }

  if (raw.harness !== undefined) {
    config.harness = parseHarnessObject(raw.harness, `${source}: harness`);
  }

  if (raw.output !== undefined) {
    config.output = parseOutputObject(raw.output, `${source}: output`);
  }

  return config;
}

function parseHarnessObject(raw: unknown, source: string): Partial<HarnessOptions> {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source} must be an object`);
  }

  const harness: Partial<HarnessOptions> = {};
  const scales: unknown = raw.scales;
  if (scales !== undefined) {
    if (!Array.isArray(scales) || !scales.every(isFiniteNumber)) {
      throw new ConfigError(`${source}.scales must be an array of numbers`);
    }
    harness.scales = scales;
  }
  for (const key of NUMERIC_HARNESS_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (!isFiniteNumber(value)) {
      throw new ConfigError(`${source}.${key} must be a number`);
    }
    harness[key] = value;
  }
  return harness;
}

function parseOutputObject(raw: unknown, source: string): Partial<OutputConfig> {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source} must be an object`);
  }

  const output: Partial<OutputConfig> = {};
  const { format, color } = raw;
  if (format !== undefined) {
    if (typeof format !== 'string') {
      throw new ConfigError(`${source}.format must be a string`);
    }
    output.format = parseFormat(format, `${source}.format`);
  }
  if (color !== undefined) {
    if (typeof color !== 'boolean') {
      throw new ConfigError(`${source}.color must be true or false`);
    }
    output.color = color;
  }
  return output;
}

/**
 * Parse a comma-separated list of variant names.
 */
export function parseVariantList(raw: string, source: string): VariantName[] {
  const names = raw.split(',').map(name => name.trim()).filter(name => name.length > 0);
  if (names.length === 0) {
    throw new ConfigError(`${source}: no variant names given`);
  }
  return names.map(name => toVariantName(name, source));
}

/**
 * Parse a base-10 integer setting, rejecting trailing garbage.
 */
export function parseInteger(raw: string, source: string): number {
  const trimmed = raw.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new ConfigError(`${source}: expected an integer, got '${raw}'`);
  }
  return parseInt(trimmed, 10);
}

/**
 * Parse a finite numeric setting such as `1e-8`.
 */
export function parseNumber(raw: string, source: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError(`${source}: expected a number, got '${raw}'`);
  }
  return value;
}

export function parseFormat(raw: string, source: string): OutputFormat {
  if (raw === 'table' || raw === 'json') {
    return raw;
  }
  throw new ConfigError(`${source}: expected 'table' or 'json', got '${raw}'`);
}

function toVariantName(name: unknown, source: string): VariantName {
  if (typeof name !== 'string' || !isVariantName(name)) {
    throw new ConfigError(`${source}: unknown variant '${String(name)}'`);
  }
  return name;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
