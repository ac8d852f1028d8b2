import dotenv from 'dotenv';
import { z } from 'zod';
import { AppConfig, AssetSlot, DeepPartial, QualityPolicy } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/ApplicationError.js';

const qualityPolicySchema = z.object({
  preferredVote: z.number().min(0).max(10),
  relaxedVote: z.number().min(0).max(10),
  voteThreshold: z.number().min(0).max(10),
  preferredWidth: z.number().int().nonnegative(),
  preferredHeight: z.number().int().nonnegative(),
  minWidth: z.number().int().nonnegative(),
  minHeight: z.number().int().nonnegative(),
});

const appConfigSchema = z.object({
  catalog: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url(),
    imageBaseUrl: z.string().url(),
    language: z.string().min(2),
    region: z.string().min(2),
    fallbackLanguages: z.array(z.string().min(2)),
    idScheme: z.string().min(1),
  }),
  network: z.object({
    maxRetries: z.number().int().min(1),
    retryDelaySeconds: z.number().nonnegative(),
    backoffFactor: z.number().min(1),
    timeoutSeconds: z.number().positive(),
  }),
  sync: z.object({
    concurrency: z.number().int().min(1),
    batchTimeoutSeconds: z.number().positive(),
    dryRun: z.boolean(),
  }),
  paths: z.object({
    cacheDir: z.string().min(1),
    metadataDir: z.string().min(1),
    assetsPath: z.string().min(1),
  }),
  features: z.object({
    runMetadata: z.boolean(),
    runEnhanced: z.boolean(),
    runPoster: z.boolean(),
    runSeason: z.boolean(),
    runBackground: z.boolean(),
    runCleanup: z.boolean(),
    ignoredFields: z.array(z.string()),
  }),
  quality: z.object({
    poster: qualityPolicySchema,
    background: qualityPolicySchema,
    season: qualityPolicySchema,
  }),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']),
    file: z.object({
      enabled: z.boolean(),
      path: z.string(),
      maxSize: z.string(),
      maxFiles: z.number().int().positive(),
    }),
    console: z.object({
      enabled: z.boolean(),
      colorize: z.boolean(),
    }),
  }),
});

const ASSET_SLOTS: AssetSlot[] = ['poster', 'background', 'season'];

export class ConfigManager {
  private static instance: ConfigManager | null = null;
  private config: AppConfig;

  private constructor(config: AppConfig) {
    this.config = config;
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      dotenv.config();
      ConfigManager.instance = new ConfigManager(ConfigManager.validate(ConfigManager.loadFromEnv()));
    }
    return ConfigManager.instance;
  }

  /**
   * Build a standalone instance from defaults plus overrides, ignoring the environment
   */
  static fromObject(overrides: DeepPartial<AppConfig> = {}): ConfigManager {
    return new ConfigManager(ConfigManager.validate(mergeValue(cloneDefaults(), overrides)));
  }

  /**
   * Drop the cached singleton (tests)
   */
  static resetInstance(): void {
    ConfigManager.instance = null;
  }

  private static loadFromEnv(): AppConfig {
    const config = cloneDefaults();

    // Catalog
    config.catalog.apiKey = process.env.CATALOG_API_KEY;
    config.catalog.baseUrl = getString('CATALOG_BASE_URL', config.catalog.baseUrl);
    config.catalog.imageBaseUrl = getString('CATALOG_IMAGE_BASE_URL', config.catalog.imageBaseUrl);
    config.catalog.language = getString('CATALOG_LANGUAGE', config.catalog.language);
    config.catalog.region = getString('CATALOG_REGION', config.catalog.region);
    config.catalog.fallbackLanguages = getStringArray(
      'CATALOG_FALLBACK_LANGUAGES',
      config.catalog.fallbackLanguages
    );
    config.catalog.idScheme = getString('CATALOG_ID_SCHEME', config.catalog.idScheme);

    // Network
    config.network.maxRetries = getNumber('NETWORK_MAX_RETRIES', config.network.maxRetries);
    config.network.retryDelaySeconds = getNumber('NETWORK_RETRY_DELAY', config.network.retryDelaySeconds);
    config.network.backoffFactor = getNumber('NETWORK_BACKOFF_FACTOR', config.network.backoffFactor);
    config.network.timeoutSeconds = getNumber('NETWORK_TIMEOUT', config.network.timeoutSeconds);

    // Sync
    config.sync.concurrency = getNumber('SYNC_CONCURRENCY', config.sync.concurrency);
    config.sync.batchTimeoutSeconds = getNumber('SYNC_BATCH_TIMEOUT', config.sync.batchTimeoutSeconds);
    config.sync.dryRun = getBoolean('DRY_RUN', config.sync.dryRun);

    // Paths
    config.paths.cacheDir = getString('CACHE_DIR', config.paths.cacheDir);
    config.paths.metadataDir = getString('METADATA_DIR', config.paths.metadataDir);
    config.paths.assetsPath = getString('ASSETS_PATH', config.paths.assetsPath);

    // Features
    config.features.runMetadata = getBoolean('RUN_METADATA', config.features.runMetadata);
    config.features.runEnhanced = getBoolean('RUN_ENHANCED', config.features.runEnhanced);
    config.features.runPoster = getBoolean('RUN_POSTER', config.features.runPoster);
    config.features.runSeason = getBoolean('RUN_SEASON', config.features.runSeason);
    config.features.runBackground = getBoolean('RUN_BACKGROUND', config.features.runBackground);
    config.features.runCleanup = getBoolean('RUN_CLEANUP', config.features.runCleanup);
    config.features.ignoredFields = getStringArray('IGNORED_FIELDS', config.features.ignoredFields);

    // Quality policies, e.g. POSTER_PREFERRED_VOTE, SEASON_MIN_WIDTH
    for (const slot of ASSET_SLOTS) {
      config.quality[slot] = loadQualityPolicy(slot, config.quality[slot]);
    }

    // Logging
    config.logging.level = getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    return config;
  }

  private static validate(config: unknown): AppConfig {
    const result = appConfigSchema.safeParse(config);
    if (!result.success) {
      const issue = result.error.issues[0];
      const key = issue ? issue.path.join('.') : 'config';
      throw new ConfigurationError(
        key,
        `Configuration validation failed: ${result.error.issues
          .map((i) => `${i.path.join('.')}: ${i.message}`)
          .join('; ')}`
      );
    }
    return result.data;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getQualityPolicy(slot: AssetSlot): QualityPolicy {
    return this.config.quality[slot];
  }

  isDryRun(): boolean {
    return this.config.sync.dryRun;
  }

  reload(): void {
    dotenv.config();
    this.config = ConfigManager.validate(ConfigManager.loadFromEnv());
  }
}

function cloneDefaults(): AppConfig {
  return structuredClone(defaultConfig);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeValue(base: unknown, override: unknown): unknown {
  if (override === undefined) {
    return base;
  }
  if (isPlainObject(base) && isPlainObject(override)) {
    const merged: Record<string, unknown> = { ...base };
    for (const [key, value] of Object.entries(override)) {
      merged[key] = mergeValue(base[key], value);
    }
    return merged;
  }
  return override;
}

function loadQualityPolicy(slot: AssetSlot, defaults: QualityPolicy): QualityPolicy {
  const prefix = slot.toUpperCase();
  return {
    preferredVote: getFloat(`${prefix}_PREFERRED_VOTE`, defaults.preferredVote),
    relaxedVote: getFloat(`${prefix}_VOTE_RELAXED`, defaults.relaxedVote),
    voteThreshold: getFloat(`${prefix}_VOTE_THRESHOLD`, defaults.voteThreshold),
    preferredWidth: getNumber(`${prefix}_PREFERRED_WIDTH`, defaults.preferredWidth),
    preferredHeight: getNumber(`${prefix}_PREFERRED_HEIGHT`, defaults.preferredHeight),
    minWidth: getNumber(`${prefix}_MIN_WIDTH`, defaults.minWidth),
    minHeight: getNumber(`${prefix}_MIN_HEIGHT`, defaults.minHeight),
  };
}

function getString(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value || defaultValue;
}

function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
  }
  return parsed;
}

function getFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
  }
  return parsed;
}

function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function getStringArray(key: string, defaultValue: string[]): string[] {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  const match = validValues.find((candidate) => candidate === value);
  if (!match) {
    throw new ConfigurationError(key, `Environment variable ${key} must be one of: ${validValues.join(', ')}`);
  }
  return match;
}
