/**
 * Library Sync Service
 *
 * Runs every item of a library through resolve -> details -> metadata record
 * -> poster -> background -> season posters, with bounded concurrency and a
 * deadline for the whole batch. Reconciliation runs once, after all libraries
 * of a run have settled.
 */

import pMap from 'p-map';
import { AppConfig, AssetSlot, FeatureConfig } from '../../config/types.js';
import { BatchTimeoutError, Sleeper } from '../../errors/index.js';
import { ExternalId, MediaItem } from '../../types/models.js';
import { buildCacheKey, buildTitleKey } from '../../utils/cacheKeys.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { logger } from '../../utils/logging.js';
import { AssetResult, AssetService } from '../assets/AssetService.js';
import { AssetUpgradeDecider } from '../assets/AssetUpgradeDecider.js';
import { itemDirectoryName } from '../assets/assetPaths.js';
import { IdentifierCacheStore } from '../cache/IdentifierCacheStore.js';
import { CatalogImages, CatalogService, toAssetCandidates } from '../catalog/CatalogService.js';
import { AxiosCatalogTransport, CatalogTransport } from '../catalog/CatalogTransport.js';
import { ResponseCache } from '../catalog/ResponseCache.js';
import { FetchResult, RetryingClient } from '../catalog/RetryingClient.js';
import { OrphanReconciler, ReconcileReport, buildLiveSet } from '../cleanup/OrphanReconciler.js';
import { BuildOptions, BuildResult, buildMovieRecord, buildShowRecord } from '../metadata/MetadataBuilder.js';
import { MetadataDocumentStore, UpsertOutcome } from '../metadata/MetadataDocumentStore.js';
import { IdentifierResolver } from '../resolution/IdentifierResolver.js';
import { SeasonDetails } from '../../validation/catalogSchemas.js';

export interface LibrarySyncDependencies {
  store: IdentifierCacheStore;
  catalog: CatalogService;
  resolver: IdentifierResolver;
  assets: AssetService;
  reconciler: OrphanReconciler;
  metadataDir: string;
  assetsRoot: string;
  concurrency: number;
  batchTimeoutMs: number;
  features: FeatureConfig;
  dryRun: boolean;
}

export interface LibraryInput {
  name: string;
  items: readonly MediaItem[];
}

export type ItemFailureStage = 'resolve' | 'details' | 'timeout' | 'unexpected';

export interface ItemFailure {
  title: string;
  year: number | null;
  stage: ItemFailureStage;
  error: string;
}

export type SlotCounters = Record<AssetResult['outcome'], number>;

export interface CompletenessStats {
  records: number;
  averagePercent: number;
  incomplete: number;
}

export interface LibrarySummary {
  library: string;
  items: number;
  resolved: number;
  unresolved: number;
  metadata: Record<UpsertOutcome, number>;
  assets: Record<AssetSlot, SlotCounters>;
  failures: ItemFailure[];
  completeness: CompletenessStats;
  timedOut: number;
  documentSaved: boolean;
  durationMs: number;
}

export interface RunSummary {
  libraries: LibrarySummary[];
  reconcile: ReconcileReport | null;
  dryRun: boolean;
}

interface ItemReport {
  resolved: boolean;
  metadata?: UpsertOutcome;
  completenessPercent?: number;
  assets: AssetResult[];
  failure?: ItemFailure;
}

function emptySlotCounters(): SlotCounters {
  return { downloaded: 0, upgraded: 0, unchanged: 0, skipped: 0, missing: 0, failed: 0 };
}

function emptySummary(library: string, items: number): LibrarySummary {
  return {
    library,
    items,
    resolved: 0,
    unresolved: 0,
    metadata: { created: 0, updated: 0, unchanged: 0 },
    assets: { poster: emptySlotCounters(), background: emptySlotCounters(), season: emptySlotCounters() },
    failures: [],
    completeness: { records: 0, averagePercent: 0, incomplete: 0 },
    timedOut: 0,
    documentSaved: false,
    durationMs: 0,
  };
}

function itemLabel(item: MediaItem): string {
  return buildTitleKey(item.title, item.year);
}

export class LibrarySyncService {
  constructor(private readonly deps: LibrarySyncDependencies) {}

  /**
   * Syncs each library in turn, then removes whatever none of them still
   * reference. A library that fails to load is reported and skipped.
   */
  async run(libraries: readonly LibraryInput[]): Promise<RunSummary> {
    await this.deps.store.load();

    const justWritten = new Set<string>();
    const documents: MetadataDocumentStore[] = [];
    const summaries: LibrarySummary[] = [];

    for (const library of libraries) {
      const document = new MetadataDocumentStore(this.deps.metadataDir, library.name, this.deps.dryRun);
      try {
        await document.load();
      } catch (error) {
        logger.error(`[LibrarySync] Skipping ${library.name}: metadata document unreadable`, {
          file: document.filePath,
          error: getErrorMessage(error),
        });
        const skipped = emptySummary(library.name, library.items.length);
        skipped.failures.push(
          ...library.items.map((item): ItemFailure => ({
            title: item.title,
            year: item.year,
            stage: 'unexpected',
            error: getErrorMessage(error),
          }))
        );
        summaries.push(skipped);
        continue;
      }
      documents.push(document);
      summaries.push(await this.syncLibrary(document, library.items, justWritten));
    }

    await this.deps.store.flush();

    let reconcile: ReconcileReport | null = null;
    if (this.deps.features.runCleanup) {
      reconcile = await this.deps.reconciler.reconcile({
        live: buildLiveSet(libraries.flatMap((library) => library.items)),
        cache: this.deps.store,
        documents,
        assetsRoot: this.deps.assetsRoot,
        justWritten,
      });
      await this.deps.store.flush();
    }

    return { libraries: summaries, reconcile, dryRun: this.deps.dryRun };
  }

  async syncLibrary(
    document: MetadataDocumentStore,
    items: readonly MediaItem[],
    justWritten: Set<string>
  ): Promise<LibrarySummary> {
    const startTime = Date.now();
    const library = document.libraryName;
    const summary = emptySummary(library, items.length);

    logger.info(`[LibrarySync] Syncing ${items.length} item(s) in ${library}`, {
      concurrency: this.deps.concurrency,
      batchTimeoutMs: this.deps.batchTimeoutMs,
      dryRun: this.deps.dryRun,
    });

    // Aborting stops abandoned items at their next step, before any further write
    const batch = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      timeoutId = setTimeout(() => {
        batch.abort(new BatchTimeoutError(this.deps.batchTimeoutMs));
        logger.warn(`[LibrarySync] Batch timeout reached for ${library}`, { timeoutMs: this.deps.batchTimeoutMs });
        resolve('timeout');
      }, this.deps.batchTimeoutMs);
    });

    const percents: number[] = [];
    try {
      await pMap(
        items,
        async (item) => {
          const timeoutFailure: ItemFailure = {
            title: item.title,
            year: item.year,
            stage: 'timeout',
            error: new BatchTimeoutError(this.deps.batchTimeoutMs).message,
          };

          if (batch.signal.aborted) {
            summary.timedOut++;
            summary.failures.push(timeoutFailure);
            return;
          }

          const outcome = await Promise.race([this.processItem(document, item, justWritten, batch.signal), deadline]);
          if (outcome === 'timeout') {
            logger.warn(`[LibrarySync] Abandoned ${itemLabel(item)} at batch timeout`);
            summary.timedOut++;
            summary.failures.push(timeoutFailure);
            return;
          }

          this.record(summary, outcome, percents);
        },
        { concurrency: this.deps.concurrency }
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (percents.length > 0) {
      const total = percents.reduce((sum, percent) => sum + percent, 0);
      summary.completeness = {
        records: percents.length,
        averagePercent: Math.round((total / percents.length) * 10) / 10,
        incomplete: percents.filter((percent) => percent < 100).length,
      };
    }

    try {
      summary.documentSaved = await document.save();
    } catch (error) {
      logger.error(`[LibrarySync] Failed to save metadata for ${library}`, {
        file: document.filePath,
        error: getErrorMessage(error),
      });
    }

    summary.durationMs = Date.now() - startTime;
    logger.info(`[LibrarySync] Finished ${library}`, {
      resolved: summary.resolved,
      unresolved: summary.unresolved,
      metadata: summary.metadata,
      failures: summary.failures.length,
      timedOut: summary.timedOut,
      durationMs: summary.durationMs,
    });
    return summary;
  }

  private record(summary: LibrarySummary, report: ItemReport, percents: number[]): void {
    if (report.resolved) {
      summary.resolved++;
    } else if (report.failure?.stage === 'resolve') {
      summary.unresolved++;
    }
    if (report.metadata) {
      summary.metadata[report.metadata]++;
    }
    if (report.completenessPercent !== undefined) {
      percents.push(report.completenessPercent);
    }
    for (const asset of report.assets) {
      summary.assets[asset.slot][asset.outcome]++;
    }
    if (report.failure) {
      summary.failures.push(report.failure);
    }
  }

  /**
   * Never rejects; failures come back on the report
   */
  private async processItem(
    document: MetadataDocumentStore,
    item: MediaItem,
    justWritten: Set<string>,
    signal: AbortSignal
  ): Promise<ItemReport> {
    const report: ItemReport = { resolved: false, assets: [] };
    const fail = (stage: ItemFailureStage, error: string): ItemReport => {
      report.failure = { title: item.title, year: item.year, stage, error };
      return report;
    };

    try {
      const resolution = await this.deps.resolver.resolveItem(item);
      if (resolution.status === 'not_found') {
        logger.warn(`[LibrarySync] No catalog match for ${itemLabel(item)}`, { reason: resolution.reason });
        return fail('resolve', resolution.reason);
      }
      if (resolution.status === 'error') {
        return fail('resolve', resolution.error.message);
      }
      report.resolved = true;
      const externalId = resolution.externalId;

      signal.throwIfAborted();
      let built: BuildResult;
      let seasons: SeasonDetails[] = [];
      if (item.mediaType === 'movie') {
        const details = await this.deps.catalog.details(externalId, 'movie');
        if (!details.success) {
          return fail('details', details.error.message);
        }
        built = buildMovieRecord(item, externalId, details.data, this.buildOptions());
      } else {
        const details = await this.deps.catalog.details(externalId, 'tv');
        if (!details.success) {
          return fail('details', details.error.message);
        }
        const local = item.seasons ?? {};
        const wanted = details.data.seasons
          .map((season) => season.season_number)
          .filter((seasonNumber) => seasonNumber !== 0 && local[seasonNumber] !== undefined);
        seasons = await this.fetchSeasons(item, externalId, wanted, signal);
        built = buildShowRecord(item, details.data, seasons, this.buildOptions());
      }

      signal.throwIfAborted();
      if (this.deps.features.runMetadata) {
        const upsert = document.upsert(buildTitleKey(item.title, item.year), built.record);
        report.metadata = upsert.outcome;
        report.completenessPercent = built.completeness.percent;
        if (upsert.outcome === 'updated') {
          logger.debug(`[LibrarySync] Updated metadata for ${itemLabel(item)}`, { fields: upsert.changedFields });
        }
      }

      report.assets.push(...(await this.syncItemAssets(item, externalId, seasons, justWritten, signal)));
      return report;
    } catch (error) {
      if (error instanceof BatchTimeoutError) {
        return fail('timeout', error.message);
      }
      logger.error(`[LibrarySync] Unexpected failure for ${itemLabel(item)}`, { error: getErrorMessage(error) });
      return fail('unexpected', getErrorMessage(error));
    }
  }

  private buildOptions(): BuildOptions {
    return {
      enhanced: this.deps.features.runEnhanced,
      ignoredFields: this.deps.features.ignoredFields,
    };
  }

  /**
   * Season detail failures are logged and the season left out
   */
  private async fetchSeasons(
    item: MediaItem,
    externalId: ExternalId,
    seasonNumbers: readonly number[],
    signal: AbortSignal
  ): Promise<SeasonDetails[]> {
    const seasons: SeasonDetails[] = [];
    for (const seasonNumber of seasonNumbers) {
      signal.throwIfAborted();
      const result = await this.deps.catalog.seasonDetails(externalId, seasonNumber);
      if (result.success) {
        seasons.push(result.data);
      } else {
        logger.warn(`[LibrarySync] Season ${seasonNumber} details unavailable for ${itemLabel(item)}`, {
          error: result.error.message,
        });
      }
    }
    return seasons;
  }

  private async syncItemAssets(
    item: MediaItem,
    externalId: ExternalId,
    seasons: readonly SeasonDetails[],
    justWritten: Set<string>,
    signal: AbortSignal
  ): Promise<AssetResult[]> {
    const { runPoster, runBackground, runSeason } = this.deps.features;
    const results: AssetResult[] = [];
    const label = itemLabel(item);
    const itemDirectory = itemDirectoryName(item.directoryPath);
    const request = {
      libraryName: item.libraryName,
      itemDirectory,
      label,
      justWritten,
      signal,
    };

    if (runPoster || runBackground) {
      const images: FetchResult<CatalogImages> = await this.deps.catalog.images(externalId, item.mediaType);
      if (!images.success) {
        logger.warn(`[LibrarySync] Image list unavailable for ${label}`, { error: images.error.message });
      }
      const cacheBase = { externalId, title: item.title, year: item.year, mediaType: item.mediaType };
      const cacheKey = buildCacheKey(item.mediaType, item.title, item.year);
      const slots: Array<{ slot: 'poster' | 'background'; enabled: boolean }> = [
        { slot: 'poster', enabled: runPoster },
        { slot: 'background', enabled: runBackground },
      ];

      for (const { slot, enabled } of slots) {
        if (!enabled) {
          continue;
        }
        if (!images.success) {
          results.push({ slot, outcome: 'failed', error: images.error });
          continue;
        }
        signal.throwIfAborted();
        results.push(
          await this.deps.assets.syncAsset({
            ...request,
            cacheKey,
            cacheBase,
            slot,
            candidates: slot === 'poster' ? images.data.posters : images.data.backdrops,
          })
        );
      }
    }

    if (runSeason && item.mediaType === 'tv') {
      for (const season of seasons) {
        signal.throwIfAborted();
        results.push(
          await this.deps.assets.syncAsset({
            ...request,
            cacheKey: buildCacheKey('tv', item.title, item.year, season.season_number),
            cacheBase: { externalId, title: item.title, year: item.year, mediaType: 'tv_season' },
            slot: 'season',
            seasonNumber: season.season_number,
            candidates: toAssetCandidates(season.images.posters),
          })
        );
      }
    }

    return results;
  }
}

export interface LibrarySyncOverrides {
  transport?: CatalogTransport;
  sleep?: Sleeper;
  decider?: AssetUpgradeDecider;
}

/**
 * Wires the default collaborators from a validated configuration
 */
export function createLibrarySyncService(
  config: AppConfig,
  overrides: LibrarySyncOverrides = {}
): LibrarySyncService {
  const dryRun = config.sync.dryRun;
  const client = new RetryingClient({
    transport: overrides.transport ?? new AxiosCatalogTransport(config.catalog, config.network),
    network: config.network,
    imageBaseUrl: config.catalog.imageBaseUrl,
    cache: new ResponseCache(),
    ...(overrides.sleep && { sleep: overrides.sleep }),
  });
  const catalog = new CatalogService(client, config.catalog);
  const store = new IdentifierCacheStore({ cacheDir: config.paths.cacheDir, dryRun });

  return new LibrarySyncService({
    store,
    catalog,
    resolver: new IdentifierResolver(store, catalog, config.catalog.idScheme),
    assets: new AssetService({
      catalog,
      store,
      ...(overrides.decider && { decider: overrides.decider }),
      assetsRoot: config.paths.assetsPath,
      language: config.catalog.language,
      fallbackLanguages: config.catalog.fallbackLanguages,
      quality: config.quality,
      dryRun,
    }),
    reconciler: new OrphanReconciler(dryRun),
    metadataDir: config.paths.metadataDir,
    assetsRoot: config.paths.assetsPath,
    concurrency: config.sync.concurrency,
    batchTimeoutMs: config.sync.batchTimeoutSeconds * 1000,
    features: config.features,
    dryRun,
  });
}
