/**
 * Configuration loading and management for vendorscore
 *
 * Loads config from ~/.vendorscore/.env and ~/.vendorscore/vendorscore.json
 */

import { readFileSync, existsSync, mkdirSync, renameSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_WEIGHTS, weightsSchema } from '../scoring/weights';
import { DEFAULT_RISK_THRESHOLDS } from '../scoring/risk-rules';
import type { NormalizationOptions, RiskThresholds, Weights } from '../scoring/types';
import { ValidationError, toValidationIssues } from './errors';
import { createLogger } from './logger';

const logger = createLogger('config');

// Load .env file from ~/.vendorscore/.env first, then CWD fallback
dotenvConfig({ path: join(homedir(), '.vendorscore', '.env') });
dotenvConfig(); // CWD fallback (won't override existing vars)

export type NormalizationConfig = NormalizationOptions;

export interface RankingConfig {
  defaultLimit: number;
  maxLimit: number;
}

export interface DatabaseConfig {
  /** SQLite file path, or ':memory:' for a throwaway database */
  path: string;
  /** Write the file after every mutation */
  autoSave: boolean;
}

export interface Config {
  weights: Weights;
  risk: RiskThresholds;
  normalization: NormalizationConfig;
  ranking: RankingConfig;
  database: DatabaseConfig;
}

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env = process.env): string {
  const override = env.VENDORSCORE_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.vendorscore');
}

function resolveConfigPath(env = process.env): string {
  const override = env.VENDORSCORE_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), 'vendorscore.json');
}

const CONFIG_DIR = resolveStateDir();
const CONFIG_FILE = resolveConfigPath();

export const DEFAULT_CONFIG: Config = {
  weights: DEFAULT_WEIGHTS,
  risk: DEFAULT_RISK_THRESHOLDS,
  normalization: {
    winsorize: false,
    lowerPercentile: 0.05,
    upperPercentile: 0.95,
  },
  ranking: {
    defaultLimit: 50,
    maxLimit: 100,
  },
  database: {
    path: join(CONFIG_DIR, 'vendorscore.db'),
    autoSave: true,
  },
};

const fraction = z.number().finite().min(0).max(1);
const positiveCount = z.number().int().positive();

const configSchema = z.object({
  weights: weightsSchema,
  risk: z.object({
    costSpikePct: z.number().finite().nonnegative(),
    transitDaysByMode: z.object({
      Air: z.number().finite().nonnegative(),
      Ocean: z.number().finite().nonnegative(),
      Ground: z.number().finite().nonnegative(),
    }),
    maxLeadTimeWeeks: z.number().finite().nonnegative(),
    capacityFloor: z.number().finite().nonnegative(),
    stalenessDays: z.number().finite().nonnegative(),
    minReliability: fraction,
  }),
  normalization: z
    .object({
      winsorize: z.boolean(),
      lowerPercentile: fraction,
      upperPercentile: fraction,
    })
    .refine((n) => n.lowerPercentile <= n.upperPercentile, {
      message: 'lowerPercentile must not exceed upperPercentile',
    }),
  ranking: z
    .object({
      defaultLimit: positiveCount,
      maxLimit: positiveCount,
    })
    .refine((r) => r.defaultLimit <= r.maxLimit, {
      message: 'defaultLimit must not exceed maxLimit',
    }),
  database: z.object({
    path: z.string().min(1),
    autoSave: z.boolean(),
  }),
});

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
function substituteEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
      return process.env[varName] ?? '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVars);
  }
  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value);
    }
    return result;
  }
  return obj;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Protects against prototype pollution.
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    if (DANGEROUS_KEYS.has(key)) continue;
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {};
  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    if (isPlainObject(parsed)) return parsed;
    logger.error({ configPath }, 'Config file is not a JSON object; using defaults');
  } catch (err) {
    logger.error({ configPath, error: err }, 'Failed to parse config file; using defaults');
  }
  return {};
}

/**
 * Merge a partial config over the defaults, substitute env vars and validate.
 * Throws ValidationError when the result is not a usable config.
 */
export function resolveConfig(overrides: Record<string, unknown> = {}): Config {
  const merged = deepMerge({ ...DEFAULT_CONFIG }, overrides);
  const substituted = substituteEnvVars(merged);
  const result = configSchema.safeParse(substituted);
  if (!result.success) {
    throw new ValidationError('Invalid configuration', toValidationIssues(result.error.issues));
  }
  const data = result.data;
  return {
    ...data,
    weights: Object.freeze({ ...data.weights }),
    database: {
      ...data.database,
      path: data.database.path === ':memory:' ? ':memory:' : resolveUserPath(data.database.path),
    },
  };
}

/**
 * Load configuration from file and environment
 */
export async function loadConfig(customPath?: string): Promise<Config> {
  const configPath = customPath ?? CONFIG_FILE;
  const fileConfig = readConfigFile(configPath);
  const config = resolveConfig(fileConfig);
  logger.debug({ configPath, database: config.database.path }, 'Configuration loaded');
  return config;
}

/**
 * Persist a weights set into the config file, keeping every other section.
 * Written to a temp file and renamed over the original.
 */
export function saveWeights(weights: Weights, customPath?: string): string {
  const configPath = customPath ?? CONFIG_FILE;
  const parsed = weightsSchema.parse(weights);
  const fileConfig = readConfigFile(configPath);
  const next = { ...fileConfig, weights: parsed };

  mkdirSync(dirname(configPath), { recursive: true });
  const tmpPath = `${configPath}.tmp`;
  writeFileSync(tmpPath, `${JSON.stringify(next, null, 2)}\n`, 'utf-8');
  renameSync(tmpPath, configPath);
  logger.info({ configPath, weights: parsed }, 'Weights saved to config');
  return configPath;
}

export { CONFIG_DIR, CONFIG_FILE };
