/**
 * Config Loader - Configuration loading and merging
 *
 * Loads configuration from .outcome-loop/config.json, merges it over the
 * defaults, applies environment variable overrides and validates the
 * result.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { formatIssues } from '../outcomes/schema.js';
import { DEFAULT_CONFIG, OUTCOME_LOOP_DIR } from './defaults.js';
import { configFileSchema, learningConfigSchema } from './schema.js';
import type { LearningConfig } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Config file name */
const CONFIG_FILE = 'config.json';

/** Environment variable prefix for config overrides */
const ENV_PREFIX = 'OUTCOME_LOOP_';

/** Environment variable names for specific config options */
export const ENV_VARS = {
  DB_PATH: `${ENV_PREFIX}DB_PATH`,
  LEARNING_RATE: `${ENV_PREFIX}LEARNING_RATE`,
  INITIAL_ALPHA: `${ENV_PREFIX}INITIAL_ALPHA`,
  INITIAL_BETA: `${ENV_PREFIX}INITIAL_BETA`,
  BUCKETS: `${ENV_PREFIX}BUCKETS`,
  LOG_LEVEL: `${ENV_PREFIX}LOG_LEVEL`,
} as const;

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(message: string, filePath: string, errorCause?: Error | undefined) {
    super(message);
    this.name = 'ConfigLoadError';
    this.filePath = filePath;
    this.errorCause = errorCause;
  }
}

/**
 * Error thrown when configuration parsing or validation fails
 */
export class ConfigParseError extends Error {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(message: string, filePath: string, errorCause?: Error | undefined) {
    super(message);
    this.name = 'ConfigParseError';
    this.filePath = filePath;
    this.errorCause = errorCause;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a number from an environment variable string
 */
function parseEnvNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const num = parseFloat(value);
  return isNaN(num) ? undefined : num;
}

/**
 * Parse an integer from an environment variable string
 */
function parseEnvInteger(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

// ============================================================================
// Config Loader
// ============================================================================

export interface ConfigLoaderOptions {
  /** Root directory to search for .outcome-loop/config.json */
  rootDir?: string;
  /** Whether to apply environment variable overrides (default: true) */
  applyEnvOverrides?: boolean;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface ConfigLoadResult {
  config: LearningConfig;
  /** Path to the config file, when one was found */
  configPath: string | null;
  envOverridesApplied: boolean;
}

export class ConfigLoader {
  private readonly configPath: string;
  private readonly applyEnvOverrides: boolean;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ConfigLoaderOptions = {}) {
    const rootDir = options.rootDir ?? process.cwd();
    this.configPath = path.join(rootDir, OUTCOME_LOOP_DIR, CONFIG_FILE);
    this.applyEnvOverrides = options.applyEnvOverrides ?? true;
    this.env = options.env ?? process.env;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file, merge with defaults, and apply env overrides
   */
  async load(): Promise<ConfigLoadResult> {
    const found = await fileExists(this.configPath);
    const fileConfig = found ? await this.loadFromFile(this.configPath) : {};

    const envConfig = this.applyEnvOverrides ? this.getEnvOverrides() : {};
    const envOverridesApplied = Object.keys(envConfig).length > 0;

    const result = learningConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...fileConfig, ...envConfig });
    if (!result.success) {
      throw new ConfigParseError(
        `Invalid configuration: ${formatIssues(result.error).join('; ')}`,
        this.configPath
      );
    }

    return {
      config: result.data,
      configPath: found ? this.configPath : null,
      envOverridesApplied,
    };
  }

  /**
   * Write a configuration file
   */
  async save(config: LearningConfig): Promise<void> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2), 'utf-8');
  }

  private async loadFromFile(filePath: string): Promise<Record<string, unknown>> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new ConfigLoadError(
        `Failed to read configuration file: ${cause?.message ?? String(error)}`,
        filePath,
        cause
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new ConfigParseError(
        `Failed to parse configuration file: ${cause?.message ?? String(error)}`,
        filePath,
        cause
      );
    }

    const result = configFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new ConfigParseError(
        `Invalid configuration file: ${formatIssues(result.error).join('; ')}`,
        filePath
      );
    }
    return stripUndefined(result.data);
  }

  private getEnvOverrides(): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};

    const dbPath = this.env[ENV_VARS.DB_PATH];
    if (dbPath) overrides['dbPath'] = dbPath;

    const learningRate = parseEnvNumber(this.env[ENV_VARS.LEARNING_RATE]);
    if (learningRate !== undefined) overrides['learningRate'] = learningRate;

    const initialAlpha = parseEnvNumber(this.env[ENV_VARS.INITIAL_ALPHA]);
    if (initialAlpha !== undefined) overrides['initialAlpha'] = initialAlpha;

    const initialBeta = parseEnvNumber(this.env[ENV_VARS.INITIAL_BETA]);
    if (initialBeta !== undefined) overrides['initialBeta'] = initialBeta;

    const buckets = parseEnvInteger(this.env[ENV_VARS.BUCKETS]);
    if (buckets !== undefined) overrides['calibrationBuckets'] = buckets;

    const logLevel = this.env[ENV_VARS.LOG_LEVEL];
    if (logLevel) overrides['logLevel'] = logLevel.toLowerCase();

    return overrides;
  }
}

function stripUndefined(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

/**
 * Load configuration rooted at a directory
 */
export async function loadConfig(rootDir?: string): Promise<LearningConfig> {
  const loader = new ConfigLoader(rootDir !== undefined ? { rootDir } : {});
  const result = await loader.load();
  return result.config;
}
