export { ConfigManager } from './config/ConfigManager.js';
export { defaultConfig } from './config/defaults.js';
export type * from './config/types.js';
export * from './errors/index.js';
export type * from './types/models.js';
export { logger, initializeLogger } from './utils/logging.js';
export { buildCacheKey, buildTitleKey, cleanTitle, parseCacheKey } from './utils/cacheKeys.js';
export { KeyedLock } from './utils/KeyedLock.js';

export { ResponseCache } from './services/catalog/ResponseCache.js';
export { AxiosCatalogTransport } from './services/catalog/CatalogTransport.js';
export type { CatalogTransport, TransportResponse } from './services/catalog/CatalogTransport.js';
export { RetryingClient } from './services/catalog/RetryingClient.js';
export type { FetchResult } from './services/catalog/RetryingClient.js';
export { CatalogService } from './services/catalog/CatalogService.js';
export { IdentifierCacheStore } from './services/cache/IdentifierCacheStore.js';
export { IdentifierResolver } from './services/resolution/IdentifierResolver.js';
export type { ResolutionResult, ResolveRequest } from './services/resolution/IdentifierResolver.js';
export { diffMetadata, isUnchanged } from './services/metadata/MetadataDiffer.js';
export { buildMovieRecord, buildShowRecord } from './services/metadata/MetadataBuilder.js';
export { MetadataDocumentStore } from './services/metadata/MetadataDocumentStore.js';
export { selectBest, selectBestWithTier } from './services/assets/AssetSelector.js';
export { AssetUpgradeDecider } from './services/assets/AssetUpgradeDecider.js';
export type { UpgradeDecision, UpgradeStatus } from './services/assets/AssetUpgradeDecider.js';
export { AssetService } from './services/assets/AssetService.js';
export { OrphanReconciler, buildLiveSet } from './services/cleanup/OrphanReconciler.js';
export type { ReconcileReport } from './services/cleanup/OrphanReconciler.js';
export { LibrarySyncService, createLibrarySyncService } from './services/sync/LibrarySyncService.js';
export type { LibraryInput, LibrarySummary, RunSummary } from './services/sync/LibrarySyncService.js';
