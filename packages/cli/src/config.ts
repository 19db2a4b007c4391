/**
 * CLI configuration loading
 *
 * Loads `.knitrc` (itself a knit document), searching from the current
 * directory up to the filesystem root. Environment variables override it.
 */

import { MAX_NESTING_DEPTH, parse, type Value } from '@knit/format';
import { isEnvironment, isLogLevel, type Environment, type LogLevel } from '@knit/logger';
import * as fs from 'node:fs';
import * as path from 'node:path';

export const CONFIG_FILE_NAME = '.knitrc';

export interface KnitConfig {
  environment: Environment;
  /** Overrides the environment's minimum log level */
  logLevel?: LogLevel;
  maxDepth?: number;
  /** File extensions picked up when a directory is checked */
  extensions: string[];
}

export const DEFAULT_CONFIG: KnitConfig = {
  environment: 'development',
  extensions: ['knit'],
};

export class ConfigError extends Error {
  readonly key: string | null;

  constructor(message: string, key: string | null = null) {
    super(message);
    this.name = 'ConfigError';
    this.key = key;
  }
}

function expectString(key: string, value: Value): string {
  if (typeof value !== 'string') {
    throw new ConfigError(`'${key}' must be a string`, key);
  }
  return value;
}

/**
 * Validate a parsed `.knitrc` document
 */
export function parseConfig(content: string, filePath: string = CONFIG_FILE_NAME): KnitConfig {
  const result = parse(content);
  if (!result.success) {
    throw new ConfigError(`Invalid ${filePath}: ${result.error.message}`);
  }

  const config: KnitConfig = { ...DEFAULT_CONFIG, extensions: [...DEFAULT_CONFIG.extensions] };

  for (const [key, value] of result.document) {
    switch (key) {
      case 'environment': {
        const environment = expectString(key, value);
        if (!isEnvironment(environment)) {
          throw new ConfigError(`Unknown environment '${environment}'`, key);
        }
        config.environment = environment;
        break;
      }
      case 'log_level': {
        const level = expectString(key, value);
        if (!isLogLevel(level)) {
          throw new ConfigError(`Unknown log level '${level}'`, key);
        }
        config.logLevel = level;
        break;
      }
      case 'max_depth':
        if (
          typeof value !== 'number' ||
          !Number.isInteger(value) ||
          value < 1 ||
          value > MAX_NESTING_DEPTH
        ) {
          throw new ConfigError(`'${key}' must be an integer from 1 to ${MAX_NESTING_DEPTH}`, key);
        }
        config.maxDepth = value;
        break;
      case 'extensions':
        if (!Array.isArray(value) || value.length === 0) {
          throw new ConfigError(`'${key}' must be a non-empty array of strings`, key);
        }
        config.extensions = value.map((item) => expectString(key, item).replace(/^\./, ''));
        break;
      default:
        throw new ConfigError(`Unknown key '${key}' in ${filePath}`, key);
    }
  }

  return config;
}

/**
 * Apply KNIT_ENV and KNIT_LOG_LEVEL on top of a config
 */
export function applyEnvironment(
  config: KnitConfig,
  env: Record<string, string | undefined>,
): KnitConfig {
  const result = { ...config };

  const environment = env.KNIT_ENV;
  if (environment !== undefined && environment !== '') {
    if (!isEnvironment(environment)) {
      throw new ConfigError(`Unknown environment '${environment}' in KNIT_ENV`, 'KNIT_ENV');
    }
    result.environment = environment;
  }

  const level = env.KNIT_LOG_LEVEL;
  if (level !== undefined && level !== '') {
    if (!isLogLevel(level)) {
      throw new ConfigError(`Unknown log level '${level}' in KNIT_LOG_LEVEL`, 'KNIT_LOG_LEVEL');
    }
    result.logLevel = level;
  }

  return result;
}

/**
 * Find `.knitrc`, searching from startDir up to root
 */
export function findConfigFile(startDir: string): string | null {
  let currentDir = path.resolve(startDir);

  while (true) {
    const configPath = path.join(currentDir, CONFIG_FILE_NAME);

    if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
      return configPath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached filesystem root
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Load knit configuration from `.knitrc` and the environment
 */
export function loadConfig(
  startDir: string = process.cwd(),
  env: Record<string, string | undefined> = process.env,
): KnitConfig {
  const configPath = findConfigFile(startDir);
  const config =
    configPath === null
      ? { ...DEFAULT_CONFIG, extensions: [...DEFAULT_CONFIG.extensions] }
      : parseConfig(fs.readFileSync(configPath, 'utf-8'), configPath);

  return applyEnvironment(config, env);
}
