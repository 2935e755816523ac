/**
 * Energy Pipeline Configuration
 *
 * Loads configuration from .energy-pipelinerc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (ENERGY_PIPELINE_*, LOG_LEVEL)
 * 3. Config file (.energy-pipelinerc or --config path)
 * 4. Default values
 *
 * @module core/config
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ENERGY_TYPES, EXPECTED_REGION_COUNT, type EnergyType } from './constants.js';
import { ConfigurationError, errorMessage } from './errors.js';
import type { YearRange } from './types.js';
import type { LogLevel } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface DatasetConfig {
  /** Distinct region codes the cleaned table must contain */
  readonly expectedRegionCount: number;
  /** Energy types whose absence from the source header is fatal */
  readonly requiredEnergyTypes: readonly EnergyType[];
  /** When set, the observed years must match exactly */
  readonly expectedYearRange?: YearRange;
}

export interface PipelineConfig {
  /** Path of the semicolon-delimited source file */
  readonly dataPath: string;
  readonly dataset: DatasetConfig;
  readonly cache: {
    /** Filtered views kept by the aggregator before the oldest is evicted */
    readonly maxViews: number;
  };
  readonly server: {
    readonly host: string;
    readonly port: number;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly json: boolean;
  };
  /** Resolved config file path, null when defaults and env only */
  readonly configPath: string | null;
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<PipelineConfig, 'configPath'> = {
  dataPath: './data/prod-region-annuelle-enr.csv',
  dataset: {
    expectedRegionCount: EXPECTED_REGION_COUNT,
    requiredEnergyTypes: [],
  },
  cache: {
    maxViews: 64,
  },
  server: {
    host: '127.0.0.1',
    port: 8080,
  },
  logging: {
    level: 'info',
    json: false,
  },
};

// ============================================================================
// Config File Schema
// ============================================================================

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const yearRangeSchema = z
  .object({ min: z.number().int(), max: z.number().int() })
  .refine((range) => range.min <= range.max, 'expectedYearRange.min must be <= max');

const configFileSchema = z
  .object({
    dataPath: z.string().min(1).optional(),
    dataset: z
      .object({
        expectedRegionCount: z.number().int().positive().optional(),
        requiredEnergyTypes: z.array(z.enum(ENERGY_TYPES)).optional(),
        expectedYearRange: yearRangeSchema.optional(),
      })
      .strict()
      .optional(),
    cache: z.object({ maxViews: z.number().int().positive().optional() }).strict().optional(),
    server: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().min(0).max(65535).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({ level: logLevelSchema.optional(), json: z.boolean().optional() })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.energy-pipelinerc',
  '.energy-pipelinerc.yaml',
  '.energy-pipelinerc.yml',
  '.energy-pipelinerc.json',
];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

async function parseConfigFile(filePath: string): Promise<ConfigFile> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    // YAML is a superset of JSON, so one parser covers every file name
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Config file ${filePath} is not valid YAML: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const result = configFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join('.') || '(root)';
    throw new ConfigurationError(`Invalid config file ${filePath}: ${path}: ${issue?.message ?? 'invalid'}`, {
      column: path,
    });
  }
  return result.data;
}

export type Environment = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Environment, name: string): string | undefined {
  const value = env[`ENERGY_PIPELINE_${name}`];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvNumber(env: Environment, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = Number(value);
  if (!Number.isInteger(num)) {
    throw new ConfigurationError(`ENERGY_PIPELINE_${name} must be an integer, got "${value}"`);
  }
  return num;
}

function getEnvLogLevel(env: Environment): LogLevel | undefined {
  const value = env.LOG_LEVEL?.toLowerCase();
  if (value === undefined || value === '') return undefined;
  const result = logLevelSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error, got "${value}"`);
  }
  return result.data;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  readonly cwd?: string;
  /** Environment to read (default: process.env) */
  readonly env?: Environment;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly dataPath?: string;
    readonly port?: number;
    readonly host?: string;
    readonly verbose?: boolean;
    readonly json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<PipelineConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(cwd, options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
  } else {
    const envConfigPath = getEnvVar(env, 'CONFIG');
    configPath = envConfigPath ? resolve(cwd, envConfigPath) : findConfigFile(cwd);
    if (configPath !== null && !existsSync(configPath)) {
      configPath = null;
    }
  }

  if (configPath !== null) {
    fileConfig = await parseConfigFile(configPath);
  }

  // Relative data paths in a config file resolve against that file
  const fileDataPath =
    fileConfig.dataPath !== undefined && configPath !== null
      ? resolve(dirname(configPath), fileConfig.dataPath)
      : undefined;

  const overrides = options.overrides ?? {};

  const dataPath =
    overrides.dataPath ?? getEnvVar(env, 'DATA') ?? fileDataPath ?? DEFAULT_CONFIG.dataPath;

  const port =
    overrides.port ?? getEnvNumber(env, 'PORT') ?? fileConfig.server?.port ?? DEFAULT_CONFIG.server.port;
  if (port < 0 || port > 65535) {
    throw new ConfigurationError(`Port out of range: ${port}`);
  }

  return {
    dataPath: resolve(cwd, dataPath),
    dataset: {
      expectedRegionCount:
        fileConfig.dataset?.expectedRegionCount ?? DEFAULT_CONFIG.dataset.expectedRegionCount,
      requiredEnergyTypes:
        fileConfig.dataset?.requiredEnergyTypes ?? DEFAULT_CONFIG.dataset.requiredEnergyTypes,
      expectedYearRange: fileConfig.dataset?.expectedYearRange,
    },
    cache: {
      maxViews: fileConfig.cache?.maxViews ?? DEFAULT_CONFIG.cache.maxViews,
    },
    server: {
      host: overrides.host ?? getEnvVar(env, 'HOST') ?? fileConfig.server?.host ?? DEFAULT_CONFIG.server.host,
      port,
    },
    logging: {
      level: overrides.verbose
        ? 'debug'
        : getEnvLogLevel(env) ?? fileConfig.logging?.level ?? DEFAULT_CONFIG.logging.level,
      json: overrides.json ?? fileConfig.logging?.json ?? DEFAULT_CONFIG.logging.json,
    },
    configPath,
  };
}
