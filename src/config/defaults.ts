import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  catalog: {
    baseUrl: 'https://api.themoviedb.org/3',
    imageBaseUrl: 'https://image.tmdb.org/t/p/original',
    language: 'en',
    region: 'US',
    fallbackLanguages: [],
    idScheme: 'tmdb',
  },
  network: {
    maxRetries: 3,
    retryDelaySeconds: 2,
    backoffFactor: 2,
    timeoutSeconds: 10,
  },
  sync: {
    concurrency: 5,
    batchTimeoutSeconds: 600, // 10 minutes
    dryRun: false,
  },
  paths: {
    cacheDir: './cache',
    metadataDir: './metadata',
    assetsPath: './assets',
  },
  features: {
    runMetadata: true,
    runEnhanced: true,
    runPoster: true,
    runSeason: true,
    runBackground: false,
    runCleanup: true,
    ignoredFields: ['runtime', 'guest'],
  },
  quality: {
    poster: {
      preferredVote: 5.0,
      relaxedVote: 3.5,
      voteThreshold: 5.0,
      preferredWidth: 2000,
      preferredHeight: 3000,
      minWidth: 1000,
      minHeight: 1500,
    },
    season: {
      preferredVote: 5.0,
      relaxedVote: 0.5,
      voteThreshold: 3.0,
      preferredWidth: 2000,
      preferredHeight: 3000,
      minWidth: 1000,
      minHeight: 1500,
    },
    background: {
      preferredVote: 5.0,
      relaxedVote: 3.5,
      voteThreshold: 5.0,
      preferredWidth: 3840,
      preferredHeight: 2160,
      minWidth: 1920,
      minHeight: 1080,
    },
  },
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSize: '10',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
};
