/**
 * Forest Atlas Configuration Management
 *
 * Loads configuration from .forest-atlasrc (YAML or JSON) with environment
 * variable overrides and defaults. Loaded once per process; the core treats
 * the result as read-only.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line overrides
 * 2. Environment variables (FOREST_ATLAS_*, plus DATABASE_URL and LOG_LEVEL)
 * 3. Config file (.forest-atlasrc or --config path)
 * 4. Default values
 *
 * @module core/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { ConfigurationError } from './errors.js';
import type { RetryPolicy } from './types.js';
import { isLogLevel, type LogLevel } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Earth Engine REST access
 */
export interface EarthEngineConfig {
  /** Cloud project registered for Earth Engine; required to initialise a session */
  readonly projectId: string | null;
  readonly apiBaseUrl: string;
  /** OAuth2 bearer token obtained by the caller's credential flow */
  readonly accessToken: string | null;
  readonly timeoutMs: number;
}

/**
 * Hansen/UMD Global Forest Change dataset
 */
export interface HansenConfig {
  readonly assetId: string;
  readonly datasetVersion: string;
  /** Default % canopy cover threshold (0-100) */
  readonly treeCoverThreshold: number;
  readonly firstLossYear: number;
  readonly lastLossYear: number;
  readonly scaleMeters: number;
  readonly maxPixels: number;
}

/**
 * Dynamic World near-real-time land cover
 */
export interface DynamicWorldConfig {
  readonly collectionId: string;
  readonly scaleMeters: number;
  readonly maxPixels: number;
  /** Tree probability (0-1) above which a "trees" pixel counts as forest */
  readonly forestThreshold: number;
  readonly windowDays: number;
  readonly lookbackDays: number;
  readonly extendedLookbackDays: number;
  readonly gapFilling: boolean;
  /** Coverage (% of region) below which the lookback is widened once */
  readonly coverageTargetPct: number;
}

export interface DatabaseConfig {
  /** sqlite:// or postgresql:// URL; null means the default SQLite file */
  readonly url: string | null;
}

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly json: boolean;
}

export interface ForestAtlasConfig {
  readonly version: number;
  readonly earthEngine: EarthEngineConfig;
  readonly hansen: HansenConfig;
  readonly dynamicWorld: DynamicWorldConfig;
  readonly retry: RetryPolicy;
  readonly database: DatabaseConfig;
  readonly logging: LoggingConfig;
  /** Resolved config file path, if one was read */
  readonly configPath: string | null;
}

// ============================================================================
// Config File Schema
// ============================================================================

const ConfigFileSchema = z.object({
  version: z.number().int().optional(),
  earthEngine: z
    .object({
      projectId: z.string().min(1).optional(),
      apiBaseUrl: z.string().url().optional(),
      timeoutMs: z.number().int().positive().optional(),
    })
    .optional(),
  hansen: z
    .object({
      assetId: z.string().min(1).optional(),
      datasetVersion: z.string().min(1).optional(),
      treeCoverThreshold: z.number().int().min(0).max(100).optional(),
      firstLossYear: z.number().int().optional(),
      lastLossYear: z.number().int().optional(),
      scaleMeters: z.number().positive().optional(),
      maxPixels: z.number().positive().optional(),
    })
    .optional(),
  dynamicWorld: z
    .object({
      collectionId: z.string().min(1).optional(),
      scaleMeters: z.number().positive().optional(),
      maxPixels: z.number().positive().optional(),
      forestThreshold: z.number().min(0).max(1).optional(),
      windowDays: z.number().int().positive().optional(),
      lookbackDays: z.number().int().nonnegative().optional(),
      extendedLookbackDays: z.number().int().nonnegative().optional(),
      gapFilling: z.boolean().optional(),
      coverageTargetPct: z.number().min(0).max(100).optional(),
    })
    .optional(),
  retry: z
    .object({
      maxAttempts: z.number().int().positive().optional(),
      backoffBase: z.number().positive().optional(),
    })
    .optional(),
  database: z
    .object({
      url: z.string().min(1).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<ForestAtlasConfig, 'configPath'> = {
  version: 1,

  earthEngine: {
    projectId: null,
    apiBaseUrl: 'https://earthengine.googleapis.com/v1',
    accessToken: null,
    timeoutMs: 120_000,
  },

  hansen: {
    assetId: 'UMD/hansen/global_forest_change_2024_v1_12',
    datasetVersion: 'v1.12',
    treeCoverThreshold: 30,
    firstLossYear: 2001,
    lastLossYear: 2024,
    scaleMeters: 30,
    maxPixels: 1e10,
  },

  dynamicWorld: {
    collectionId: 'GOOGLE/DYNAMICWORLD/V1',
    scaleMeters: 10,
    maxPixels: 1e10,
    forestThreshold: 0.15,
    windowDays: 30,
    lookbackDays: 180,
    extendedLookbackDays: 365,
    gapFilling: true,
    coverageTargetPct: 99.9,
  },

  retry: {
    maxAttempts: 3,
    backoffBase: 2,
  },

  database: {
    url: null,
  },

  logging: {
    level: 'info',
    json: false,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.forest-atlasrc',
  '.forest-atlasrc.yaml',
  '.forest-atlasrc.yml',
  '.forest-atlasrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

/**
 * Parse and validate config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    // YAML is a superset of JSON, so one parser covers both
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(
      `Cannot parse config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.errors[0];
    const path = issue?.path.join('.') ?? '';
    throw new ConfigurationError(
      `Invalid config file ${filePath}: ${path ? `${path}: ` : ''}${issue?.message ?? 'invalid value'}`
    );
  }

  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`FOREST_ATLAS_${name}`];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvNumber(env: Env, name: string): number | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  const num = Number(value);
  if (!Number.isFinite(num)) {
    throw new ConfigurationError(`FOREST_ATLAS_${name} must be a number, got "${value}"`);
  }
  return num;
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
  readonly env?: Env;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly projectId?: string;
  };
}

/**
 * Load and merge configuration from all sources
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ForestAtlasConfig> {
  const env = options.env ?? process.env;

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar(env, 'CONFIG');
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = parseConfigFile(configPath);
      }
    } else {
      configPath = findConfigFile(options.cwd ?? process.cwd());
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const envLogLevel = env.LOG_LEVEL?.toLowerCase();

  const config: ForestAtlasConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    earthEngine: {
      projectId:
        options.overrides?.projectId ??
        getEnvVar(env, 'EE_PROJECT_ID') ??
        env.GEE_PROJECT_ID ??
        fileConfig.earthEngine?.projectId ??
        DEFAULT_CONFIG.earthEngine.projectId,
      apiBaseUrl:
        getEnvVar(env, 'EE_API_URL') ??
        fileConfig.earthEngine?.apiBaseUrl ??
        DEFAULT_CONFIG.earthEngine.apiBaseUrl,
      // Tokens come from the environment only, never from a checked-in file
      accessToken: getEnvVar(env, 'EE_ACCESS_TOKEN') ?? DEFAULT_CONFIG.earthEngine.accessToken,
      timeoutMs:
        getEnvNumber(env, 'EE_TIMEOUT_MS') ??
        fileConfig.earthEngine?.timeoutMs ??
        DEFAULT_CONFIG.earthEngine.timeoutMs,
    },

    hansen: {
      assetId: fileConfig.hansen?.assetId ?? DEFAULT_CONFIG.hansen.assetId,
      datasetVersion: fileConfig.hansen?.datasetVersion ?? DEFAULT_CONFIG.hansen.datasetVersion,
      treeCoverThreshold:
        getEnvNumber(env, 'TREE_COVER_THRESHOLD') ??
        fileConfig.hansen?.treeCoverThreshold ??
        DEFAULT_CONFIG.hansen.treeCoverThreshold,
      firstLossYear: fileConfig.hansen?.firstLossYear ?? DEFAULT_CONFIG.hansen.firstLossYear,
      lastLossYear: fileConfig.hansen?.lastLossYear ?? DEFAULT_CONFIG.hansen.lastLossYear,
      scaleMeters:
        getEnvNumber(env, 'SCALE_METERS') ??
        fileConfig.hansen?.scaleMeters ??
        DEFAULT_CONFIG.hansen.scaleMeters,
      maxPixels:
        getEnvNumber(env, 'MAX_PIXELS') ??
        fileConfig.hansen?.maxPixels ??
        DEFAULT_CONFIG.hansen.maxPixels,
    },

    dynamicWorld: {
      ...DEFAULT_CONFIG.dynamicWorld,
      ...fileConfig.dynamicWorld,
    },

    retry: {
      maxAttempts:
        getEnvNumber(env, 'MAX_RETRIES') ??
        fileConfig.retry?.maxAttempts ??
        DEFAULT_CONFIG.retry.maxAttempts,
      backoffBase:
        getEnvNumber(env, 'BACKOFF_BASE') ??
        fileConfig.retry?.backoffBase ??
        DEFAULT_CONFIG.retry.backoffBase,
    },

    database: {
      url: env.DATABASE_URL ?? fileConfig.database?.url ?? DEFAULT_CONFIG.database.url,
    },

    logging: {
      level: options.overrides?.verbose
        ? 'debug'
        : envLogLevel && isLogLevel(envLogLevel)
          ? envLogLevel
          : fileConfig.logging?.level ?? DEFAULT_CONFIG.logging.level,
      json:
        options.overrides?.json ??
        getEnvBool(env, 'JSON') ??
        fileConfig.logging?.json ??
        DEFAULT_CONFIG.logging.json,
    },

    configPath,
  };

  validateConfig(config);
  return Object.freeze(config);
}

/**
 * Validate merged configuration
 *
 * @throws ConfigurationError if a value is out of range
 */
export function validateConfig(config: ForestAtlasConfig): void {
  if (config.version !== 1) {
    throw new ConfigurationError(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  const { treeCoverThreshold, firstLossYear, lastLossYear } = config.hansen;
  if (!Number.isInteger(treeCoverThreshold) || treeCoverThreshold < 0 || treeCoverThreshold > 100) {
    throw new ConfigurationError(
      `Tree cover threshold must be an integer 0-100, got ${treeCoverThreshold}`
    );
  }

  if (firstLossYear > lastLossYear) {
    throw new ConfigurationError(
      `Hansen loss year range is empty: ${firstLossYear}-${lastLossYear}`
    );
  }

  if (!Number.isInteger(config.retry.maxAttempts) || config.retry.maxAttempts < 1) {
    throw new ConfigurationError(
      `Retry maxAttempts must be a positive integer, got ${config.retry.maxAttempts}`
    );
  }

  if (config.retry.backoffBase <= 0) {
    throw new ConfigurationError(
      `Retry backoffBase must be positive, got ${config.retry.backoffBase}`
    );
  }

  if (config.hansen.scaleMeters <= 0 || config.dynamicWorld.scaleMeters <= 0) {
    throw new ConfigurationError('Scale must be a positive number of meters');
  }
}
