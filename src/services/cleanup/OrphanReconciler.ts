/**
 * Orphan Reconciler
 *
 * Removes cache entries, metadata records and asset files that no longer
 * belong to any live media item. Each removal is independent: a failure is
 * logged and collected, and the pass continues.
 *
 * Runs under the cache store's exclusive lock, so no resolution or quality
 * update interleaves with it. Assets touched earlier in the same run are
 * never removed.
 */

import fs from 'fs/promises';
import { minimatch } from 'minimatch';
import path from 'path';
import { CompositeKey, MediaItem } from '../../types/models.js';
import { buildCacheKey, buildTitleKey } from '../../utils/cacheKeys.js';
import { getErrorCode, getErrorMessage } from '../../utils/errorHandling.js';
import { logger } from '../../utils/logging.js';
import { ASSET_FILE_PATTERNS, itemDirectoryName } from '../assets/assetPaths.js';
import { IdentifierCacheStore } from '../cache/IdentifierCacheStore.js';
import { MetadataDocumentStore } from '../metadata/MetadataDocumentStore.js';

export interface LiveSet {
  keys: Set<CompositeKey>;
  titles: Set<string>;
  directories: Set<string>;
}

export interface ReconcileInput {
  live: LiveSet;
  cache: IdentifierCacheStore;
  documents: readonly MetadataDocumentStore[];
  assetsRoot: string;
  justWritten: ReadonlySet<string>;
}

export interface ReconcileFailure {
  target: string;
  error: string;
}

export interface ReconcileReport {
  removedCount: number;
  cacheKeys: CompositeKey[];
  failedKeys: CompositeKey[];
  metadataTitles: Array<{ library: string; title: string }>;
  assetFiles: string[];
  directories: string[];
  failures: ReconcileFailure[];
  dryRun: boolean;
}

/**
 * Everything the current media-server enumeration still references.
 * Shows contribute one key per locally present season as well.
 */
export function buildLiveSet(items: readonly MediaItem[]): LiveSet {
  const live: LiveSet = { keys: new Set(), titles: new Set(), directories: new Set() };

  for (const item of items) {
    live.keys.add(buildCacheKey(item.mediaType, item.title, item.year));
    if (item.mediaType === 'tv') {
      for (const season of Object.keys(item.seasons ?? {})) {
        live.keys.add(buildCacheKey('tv', item.title, item.year, Number(season)));
      }
    }

    live.titles.add(buildTitleKey(item.title, item.year));

    const directory = itemDirectoryName(item.directoryPath);
    if (directory) {
      live.directories.add(directory);
    }
  }

  return live;
}

export function isAssetFileName(fileName: string): boolean {
  return ASSET_FILE_PATTERNS.some((pattern) => minimatch(fileName, pattern));
}

/**
 * All files under root whose names match an asset pattern
 */
async function findAssetFiles(root: string): Promise<string[]> {
  const found: string[] = [];

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && isAssetFileName(entry.name)) {
        found.push(fullPath);
      }
    }
  };

  try {
    await walk(root);
  } catch (error) {
    if (getErrorCode(error) !== 'ENOENT') {
      throw error;
    }
  }
  return found.sort();
}

export class OrphanReconciler {
  constructor(private readonly dryRun: boolean = false) {}

  async reconcile(input: ReconcileInput): Promise<ReconcileReport> {
    return input.cache.withExclusiveLock(() => this.run(input));
  }

  private async run(input: ReconcileInput): Promise<ReconcileReport> {
    const report: ReconcileReport = {
      removedCount: 0,
      cacheKeys: [],
      failedKeys: [],
      metadataTitles: [],
      assetFiles: [],
      directories: [],
      failures: [],
      dryRun: this.dryRun,
    };

    logger.info('[OrphanReconciler] Starting reconciliation', {
      liveKeys: input.live.keys.size,
      liveTitles: input.live.titles.size,
      liveDirectories: input.live.directories.size,
      dryRun: this.dryRun,
    });

    await this.reconcileCache(input, report);
    for (const document of input.documents) {
      await this.reconcileDocument(document, input.live.titles, report);
    }
    await this.reconcileAssets(input, report);

    report.removedCount =
      report.cacheKeys.length + report.failedKeys.length + report.metadataTitles.length + report.assetFiles.length;

    logger.info(`[OrphanReconciler] ${this.dryRun ? '[DryRun] Would remove' : 'Removed'} ${report.removedCount} orphan(s)`, {
      cacheKeys: report.cacheKeys.length,
      failedKeys: report.failedKeys.length,
      metadataTitles: report.metadataTitles.length,
      assetFiles: report.assetFiles.length,
      directories: report.directories.length,
      failures: report.failures.length,
    });
    return report;
  }

  private async reconcileCache(input: ReconcileInput, report: ReconcileReport): Promise<void> {
    const { cache, live } = input;
    const orphanKeys = cache.keys().filter((key) => !live.keys.has(key));
    const orphanFailed = cache.failedKeys().filter((key) => !live.keys.has(key));

    if (this.dryRun) {
      for (const key of [...orphanKeys, ...orphanFailed]) {
        logger.info('[DryRun] Would remove cache entry', { key });
      }
      report.cacheKeys.push(...orphanKeys);
      report.failedKeys.push(...orphanFailed);
      return;
    }

    try {
      const removed = await cache.remove([...orphanKeys, ...orphanFailed]);
      for (const key of removed.entries) {
        logger.info('[OrphanReconciler] Removed cache entry', { key });
      }
      report.cacheKeys.push(...removed.entries);
      report.failedKeys.push(...removed.failed);
    } catch (error) {
      logger.error('[OrphanReconciler] Failed to remove cache entries', { error: getErrorMessage(error) });
      report.failures.push({ target: cache.cacheFile, error: getErrorMessage(error) });
    }
  }

  private async reconcileDocument(
    document: MetadataDocumentStore,
    liveTitles: ReadonlySet<string>,
    report: ReconcileReport
  ): Promise<void> {
    const library = document.libraryName;

    if (this.dryRun) {
      for (const title of document.titles().filter((t) => !liveTitles.has(t))) {
        logger.info('[DryRun] Would remove metadata record', { library, title });
        report.metadataTitles.push({ library, title });
      }
      return;
    }

    const removed = document.removeMissing(liveTitles);
    if (removed.length === 0) {
      return;
    }

    try {
      await document.save();
      for (const title of removed) {
        logger.info('[OrphanReconciler] Removed metadata record', { library, title });
        report.metadataTitles.push({ library, title });
      }
    } catch (error) {
      logger.error('[OrphanReconciler] Failed to save metadata document', {
        library,
        file: document.filePath,
        error: getErrorMessage(error),
      });
      report.failures.push({ target: document.filePath, error: getErrorMessage(error) });
    }
  }

  private async reconcileAssets(input: ReconcileInput, report: ReconcileReport): Promise<void> {
    let files: string[];
    try {
      files = await findAssetFiles(input.assetsRoot);
    } catch (error) {
      logger.error('[OrphanReconciler] Failed to scan asset tree', {
        assetsRoot: input.assetsRoot,
        error: getErrorMessage(error),
      });
      report.failures.push({ target: input.assetsRoot, error: getErrorMessage(error) });
      return;
    }

    for (const file of files) {
      const directory = path.dirname(file);
      if (input.live.directories.has(path.basename(directory))) {
        continue;
      }

      if (input.justWritten.has(path.resolve(file))) {
        logger.debug('[OrphanReconciler] Keeping asset written this run', { file });
        continue;
      }

      if (this.dryRun) {
        logger.info('[DryRun] Would remove asset', { file });
        report.assetFiles.push(file);
        continue;
      }

      try {
        await fs.unlink(file);
        report.assetFiles.push(file);
        logger.info('[OrphanReconciler] Removed asset', { file });
      } catch (error) {
        logger.error('[OrphanReconciler] Failed to remove asset', { file, error: getErrorMessage(error) });
        report.failures.push({ target: file, error: getErrorMessage(error) });
        continue;
      }

      await this.removeIfEmpty(directory, input.assetsRoot, report);
    }
  }

  private async removeIfEmpty(directory: string, assetsRoot: string, report: ReconcileReport): Promise<void> {
    if (path.resolve(directory) === path.resolve(assetsRoot)) {
      return;
    }

    try {
      const remaining = await fs.readdir(directory);
      if (remaining.length > 0) {
        return;
      }
      await fs.rmdir(directory);
      report.directories.push(directory);
      logger.debug('[OrphanReconciler] Removed empty directory', { directory });
    } catch (error) {
      logger.warn('[OrphanReconciler] Failed to remove directory', {
        directory,
        error: getErrorMessage(error),
      });
      report.failures.push({ target: directory, error: getErrorMessage(error) });
    }
  }
}
