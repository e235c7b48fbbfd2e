/**
 * Configuration loader
 *
 * Loads configuration from a config file, environment variables, and caller
 * overrides, merging them in order of precedence.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as YAML from 'js-yaml';
import type { ZodError } from 'zod';
import { ConfigError, getErrorMessage } from '../errors.js';
import { getDefaultConfig } from './defaults.js';
import {
  partialSessionConfigSchema,
  sessionConfigSchema,
  type TPartialSessionConfig,
  type TSessionConfig,
} from './types.js';

/**
 * Configuration file names to search for, in order
 */
export const CONFIG_FILE_NAMES = [
  'scene-mock.config.yaml',
  'scene-mock.config.yml',
  'scene-mock.config.json',
];

/**
 * Environment variable prefix
 */
export const ENV_PREFIX = 'SCENE_MOCK_';

export interface LoadConfigOptions {
  /** Explicit config file. When set, the file must exist. */
  configPath?: string;
  /** Directory searched for CONFIG_FILE_NAMES. Defaults to process.cwd(). */
  cwd?: string;
  /** Environment to read overrides from. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence values, e.g. from CLI flags */
  overrides?: TPartialSessionConfig;
}

/**
 * Load configuration with the following precedence (highest to lowest):
 * 1. Overrides
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 *
 * @throws {ConfigError} If a source cannot be read or fails validation
 */
export function loadConfig(options: LoadConfigOptions = {}): TSessionConfig {
  let config = getDefaultConfig();

  const fileConfig = loadConfigFile(options.configPath, options.cwd ?? process.cwd());
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  config = mergeConfig(config, loadEnvConfig(options.env ?? process.env));

  if (options.overrides) {
    config = mergeConfig(config, validatePartial(options.overrides, 'overrides'));
  }

  const result = sessionConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError('merged configuration', formatIssues(result.error));
  }
  return result.data;
}

/**
 * Find and parse the config file. Returns null when there is none.
 */
export function loadConfigFile(configPath: string | undefined, cwd: string): TPartialSessionConfig | null {
  if (configPath) {
    const absolutePath = path.resolve(cwd, configPath);
    if (!fs.existsSync(absolutePath)) {
      throw new ConfigError(absolutePath, ['file not found']);
    }
    return parseConfigFile(absolutePath);
  }

  for (const fileName of CONFIG_FILE_NAMES) {
    const candidate = path.join(cwd, fileName);
    if (fs.existsSync(candidate)) {
      return parseConfigFile(candidate);
    }
  }
  return null;
}

/**
 * Parse a YAML or JSON config file (JSON is read by the YAML parser too).
 */
export function parseConfigFile(filePath: string): TPartialSessionConfig {
  let raw: unknown;
  try {
    raw = YAML.load(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(filePath, [getErrorMessage(error)], { cause: error });
  }

  // An empty file parses to undefined
  if (raw === undefined || raw === null) {
    return {};
  }
  return validatePartial(raw, filePath);
}

/**
 * Read overrides from SCENE_MOCK_* environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv): TPartialSessionConfig {
  const config: TPartialSessionConfig = {};

  const portType = env[`${ENV_PREFIX}DEFAULT_PORT_TYPE`];
  if (portType) {
    config.defaultPortType = portType;
  }

  const seed = env[`${ENV_PREFIX}SEED_BUILTIN_PORTS`];
  if (seed !== undefined && seed !== '') {
    config.seedBuiltinPorts = parseBoolean(seed, `${ENV_PREFIX}SEED_BUILTIN_PORTS`);
  }

  const cacheSize = env[`${ENV_PREFIX}MATCHER_CACHE_SIZE`];
  if (cacheSize) {
    const parsed = Number(cacheSize);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new ConfigError(`${ENV_PREFIX}MATCHER_CACHE_SIZE`, [`expected a positive integer, got "${cacheSize}"`]);
    }
    config.matcherCacheSize = parsed;
  }

  const warnings = env[`${ENV_PREFIX}WARNINGS`];
  if (warnings) {
    config.warnings = validatePartial({ warnings }, `${ENV_PREFIX}WARNINGS`).warnings;
  }

  const schemaPath = env[`${ENV_PREFIX}SCHEMA`];
  if (schemaPath) {
    config.schemaPath = schemaPath;
  }

  return config;
}

/**
 * Shallow merge; keys explicitly set to undefined in `override` are ignored.
 */
export function mergeConfig(base: TSessionConfig, override: TPartialSessionConfig): TSessionConfig {
  const merged: TSessionConfig = { ...base };
  if (override.defaultPortType !== undefined) merged.defaultPortType = override.defaultPortType;
  if (override.reservedNames !== undefined) merged.reservedNames = [...override.reservedNames];
  if (override.seedBuiltinPorts !== undefined) merged.seedBuiltinPorts = override.seedBuiltinPorts;
  if (override.matcherCacheSize !== undefined) merged.matcherCacheSize = override.matcherCacheSize;
  if (override.warnings !== undefined) merged.warnings = override.warnings;
  if (override.schemaPath !== undefined) merged.schemaPath = override.schemaPath;
  return merged;
}

/**
 * Apply caller-supplied values on top of the defaults, without reading any
 * file or environment variable.
 *
 * @throws {ConfigError} If the values fail validation
 */
export function resolveConfig(partial: TPartialSessionConfig = {}): TSessionConfig {
  const config = mergeConfig(getDefaultConfig(), validatePartial(partial, 'session options'));
  const result = sessionConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError('session options', formatIssues(result.error));
  }
  return result.data;
}

function validatePartial(raw: unknown, source: string): TPartialSessionConfig {
  const result = partialSessionConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(source, formatIssues(result.error));
  }
  return result.data;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

function parseBoolean(value: string, source: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(source, [`expected a boolean, got "${value}"`]);
}
