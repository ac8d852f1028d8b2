export type AssetSlot = 'poster' | 'background' | 'season';

/**
 * Image selection and upgrade thresholds for one asset slot
 */
export interface QualityPolicy {
  preferredVote: number;
  relaxedVote: number;
  /** Minimum vote that upgrades a slot with no recorded quality */
  voteThreshold: number;
  preferredWidth: number;
  preferredHeight: number;
  minWidth: number;
  minHeight: number;
}

export interface CatalogConfig {
  apiKey?: string | undefined;
  baseUrl: string;
  imageBaseUrl: string;
  language: string;
  region: string;
  fallbackLanguages: string[];
  /** Scheme prefix of embedded identifiers that carry this catalog's id */
  idScheme: string;
}

export interface NetworkConfig {
  maxRetries: number;
  retryDelaySeconds: number;
  backoffFactor: number;
  timeoutSeconds: number;
}

export interface SyncConfig {
  concurrency: number;
  batchTimeoutSeconds: number;
  dryRun: boolean;
}

export interface PathsConfig {
  cacheDir: string;
  metadataDir: string;
  assetsPath: string;
}

export interface FeatureConfig {
  runMetadata: boolean;
  runEnhanced: boolean;
  runPoster: boolean;
  runSeason: boolean;
  runBackground: boolean;
  runCleanup: boolean;
  /** Fields left out of the completeness percentage */
  ignoredFields: string[];
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  catalog: CatalogConfig;
  network: NetworkConfig;
  sync: SyncConfig;
  paths: PathsConfig;
  features: FeatureConfig;
  quality: Record<AssetSlot, QualityPolicy>;
  logging: LoggingConfig;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Array<infer U>
    ? U[]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};
