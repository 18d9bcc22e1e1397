/**
 * Configuration Loader
 * Merges defaults, an optional JSON config file, environment variables
 * and command-line overrides into one validated WorldConfig
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import dotenv from 'dotenv';
import type { WorldConfig } from '../core/types.js';
import { ConfigError } from '../core/errors.js';
import { createWorldConfig, partialWorldConfigSchema } from '../core/config.js';

export type ConfigOverrides = Partial<WorldConfig>;

/**
 * Environment variables read by loadEnvOverrides
 */
export const ENV_KEYS = {
  seed: 'MARKET_SEED',
  pathCount: 'MARKET_PATHS',
  maxTimeSteps: 'MARKET_TICKS',
  shopperCount: 'MARKET_SHOPPERS',
  walkingSpeed: 'MARKET_WALKING_SPEED',
  itemsPerStall: 'MARKET_ITEMS_PER_STALL',
  stallPositions: 'MARKET_STALL_POSITIONS',
  configFile: 'MARKET_CONFIG_FILE',
} as const;

/**
 * Load .env.local into process.env (existing variables win)
 */
export function loadDotEnv(path: string = '.env.local'): void {
  dotenv.config({ path });
}

// ============================================================================
// Value Parsing
// ============================================================================

export function parseNumber(name: string, raw: string): number {
  const trimmed = raw.trim();
  const value = trimmed === '' ? NaN : Number(trimmed);
  if (!Number.isFinite(value)) {
    throw new ConfigError([{ path: name, message: `"${raw}" is not a number` }]);
  }
  return value;
}

/**
 * Parse a whole number no smaller than `min`
 */
export function parseCount(name: string, raw: string, min: number): number {
  const value = parseNumber(name, raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError([{ path: name, message: `"${raw}" must be an integer >= ${min}` }]);
  }
  return value;
}

/**
 * Parse "a,b,c" into numbers
 */
export function parseNumberList(name: string, raw: string): number[] {
  return raw.split(',').map((part, i) => parseNumber(`${name}[${i}]`, part));
}

// ============================================================================
// Sources
// ============================================================================

/**
 * Read overrides from environment variables; unset variables are skipped
 */
export function loadEnvOverrides(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const seed = env[ENV_KEYS.seed];
  if (seed !== undefined) overrides.seed = parseNumber(ENV_KEYS.seed, seed);

  const paths = env[ENV_KEYS.pathCount];
  if (paths !== undefined) overrides.pathCount = parseNumber(ENV_KEYS.pathCount, paths);

  const ticks = env[ENV_KEYS.maxTimeSteps];
  if (ticks !== undefined) overrides.maxTimeSteps = parseNumber(ENV_KEYS.maxTimeSteps, ticks);

  const shoppers = env[ENV_KEYS.shopperCount];
  if (shoppers !== undefined) {
    overrides.shopperCount = parseNumber(ENV_KEYS.shopperCount, shoppers);
  }

  const speed = env[ENV_KEYS.walkingSpeed];
  if (speed !== undefined) overrides.walkingSpeed = parseNumber(ENV_KEYS.walkingSpeed, speed);

  const perStall = env[ENV_KEYS.itemsPerStall];
  if (perStall !== undefined) {
    overrides.itemsPerStall = parseNumber(ENV_KEYS.itemsPerStall, perStall);
  }

  const stalls = env[ENV_KEYS.stallPositions];
  if (stalls !== undefined) {
    overrides.stallPositions = parseNumberList(ENV_KEYS.stallPositions, stalls);
  }

  return overrides;
}

/**
 * Read overrides from a JSON file containing any subset of WorldConfig fields
 */
export function loadConfigFile(path: string): ConfigOverrides {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new ConfigError([{ path: 'configFile', message: `${fullPath} does not exist` }]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([{ path: 'configFile', message: `${fullPath}: ${reason}` }]);
  }

  const result = partialWorldConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => ({
        path: issue.path.length > 0 ? issue.path.join('.') : 'configFile',
        message: issue.message,
      }))
    );
  }
  return result.data;
}

// ============================================================================
// Resolution
// ============================================================================

export interface ResolveConfigOptions {
  configFile?: string | null;
  env?: NodeJS.ProcessEnv;
  cli?: ConfigOverrides;
}

/**
 * Precedence: defaults < config file < environment < command line
 */
export function resolveWorldConfig(options: ResolveConfigOptions = {}): Readonly<WorldConfig> {
  const env = options.env ?? process.env;
  const configFile = options.configFile ?? env[ENV_KEYS.configFile] ?? null;

  const fromFile = configFile ? loadConfigFile(configFile) : {};
  const fromEnv = loadEnvOverrides(env);

  return createWorldConfig({ ...fromFile, ...fromEnv, ...options.cli });
}
