/**
 * Asset Service
 *
 * Download/commit pipeline for one asset slot of one item:
 * select -> download to a temp file -> decide -> move into place -> record quality.
 * Everything after selection holds the cache key's lock.
 */

import fs from 'fs-extra';
import path from 'path';
import { AssetSlot, QualityPolicy } from '../../config/types.js';
import { AssetCandidate, CompositeKey } from '../../types/models.js';
import { getErrorMessage, toError } from '../../utils/errorHandling.js';
import { md5Buffer, md5File } from '../../utils/fileHash.js';
import { logger } from '../../utils/logging.js';
import { CacheEntryBase, IdentifierCacheStore } from '../cache/IdentifierCacheStore.js';
import { CatalogService } from '../catalog/CatalogService.js';
import { selectBestWithTier } from './AssetSelector.js';
import { AssetUpgradeDecider, UpgradeStatus } from './AssetUpgradeDecider.js';
import { assetPathFor, tempAssetPath } from './assetPaths.js';

export type AssetOutcome = 'downloaded' | 'upgraded' | 'unchanged' | 'skipped' | 'missing' | 'failed';

export interface AssetServiceOptions {
  catalog: Pick<CatalogService, 'download'>;
  store: IdentifierCacheStore;
  decider?: AssetUpgradeDecider;
  assetsRoot: string;
  language: string;
  fallbackLanguages: readonly string[];
  quality: Record<AssetSlot, QualityPolicy>;
  dryRun: boolean;
}

export interface AssetRequest {
  libraryName: string;
  itemDirectory: string;
  /** For log lines, e.g. "Dune (2021)" */
  label: string;
  cacheKey: CompositeKey;
  cacheBase: Omit<CacheEntryBase, 'key'>;
  slot: AssetSlot;
  seasonNumber?: number;
  candidates: readonly AssetCandidate[];
  /** Absolute paths of assets touched this run; protects them from reconciliation */
  justWritten: Set<string>;
  /** Once aborted, no file is moved into place and no quality is recorded */
  signal?: AbortSignal;
}

export interface AssetResult {
  slot: AssetSlot;
  seasonNumber?: number;
  outcome: AssetOutcome;
  status?: UpgradeStatus;
  path?: string;
  bytes?: number;
  error?: Error;
}

const SLOT_LABELS: Record<AssetSlot, string> = {
  poster: 'Poster',
  background: 'Background',
  season: 'Season poster',
};

export class AssetService {
  private readonly decider: AssetUpgradeDecider;

  constructor(private readonly options: AssetServiceOptions) {
    this.decider = options.decider ?? new AssetUpgradeDecider();
  }

  async syncAsset(request: AssetRequest): Promise<AssetResult> {
    const { slot, seasonNumber } = request;
    const slotLabel = `${SLOT_LABELS[slot]}${seasonNumber !== undefined ? ` ${seasonNumber}` : ''}`;
    const base: Pick<AssetResult, 'slot' | 'seasonNumber'> = {
      slot,
      ...(seasonNumber !== undefined && { seasonNumber }),
    };

    const policy = this.options.quality[slot];
    const selection = selectBestWithTier(
      request.candidates,
      slot === 'background' ? null : this.options.language,
      slot === 'background' ? [] : this.options.fallbackLanguages,
      policy
    );
    if (!selection) {
      logger.info(`[AssetService] No suitable ${slotLabel.toLowerCase()} for ${request.label}`);
      return { ...base, outcome: 'missing' };
    }

    const { candidate } = selection;
    const target = path.resolve(
      assetPathFor(this.options.assetsRoot, request.libraryName, request.itemDirectory, slot, seasonNumber)
    );
    request.justWritten.add(target);

    return this.options.store.withKeyLock(request.cacheKey, () =>
      this.commit(request, base, slotLabel, candidate, target)
    );
  }

  /**
   * Read quality, download, decide and write for one target
   */
  private async commit(
    request: AssetRequest,
    base: Pick<AssetResult, 'slot' | 'seasonNumber'>,
    slotLabel: string,
    candidate: AssetCandidate,
    target: string
  ): Promise<AssetResult> {
    const { slot, signal } = request;
    const policy = this.options.quality[slot];
    signal?.throwIfAborted();
    const cachedQuality = this.options.store.get(request.cacheKey)?.qualityMetrics[slot];

    if (this.options.dryRun) {
      const decision = await this.decider.shouldUpgrade(target, candidate, null, cachedQuality, policy.voteThreshold);
      logger.info(
        `[DryRun] ${slotLabel} for ${request.label}: ${decision.upgrade ? 'would write' : 'would keep existing'}`,
        { status: decision.status, target, candidate: candidate.path, ...decision.context }
      );
      let outcome: AssetOutcome = 'skipped';
      if (decision.upgrade) {
        outcome = (await fs.pathExists(target)) ? 'upgraded' : 'downloaded';
      }
      return { ...base, outcome, status: decision.status, path: target };
    }

    const tempPath = tempAssetPath(this.options.assetsRoot, request.libraryName);
    try {
      const download = await this.options.catalog.download(candidate.path);
      if (!download.success) {
        logger.warn(`[AssetService] ${slotLabel} download failed for ${request.label}`, {
          candidate: candidate.path,
          attempts: download.attempts,
          error: download.error.message,
        });
        return { ...base, outcome: 'failed', path: target, error: download.error };
      }

      await fs.outputFile(tempPath, download.data);

      const decision = await this.decider.shouldUpgrade(
        target,
        candidate,
        tempPath,
        cachedQuality,
        policy.voteThreshold
      );
      if (!decision.upgrade) {
        logger.info(`[AssetService] No ${slotLabel.toLowerCase()} upgrade needed for ${request.label}`, {
          status: decision.status,
          ...decision.context,
        });
        return { ...base, outcome: 'skipped', status: decision.status, path: target };
      }

      signal?.throwIfAborted();
      const existingHash = await md5File(target);
      let outcome: AssetOutcome;
      if (existingHash === md5Buffer(download.data)) {
        outcome = 'unchanged';
      } else {
        await fs.ensureDir(path.dirname(target));
        await fs.move(tempPath, target, { overwrite: true });
        outcome = existingHash === null ? 'downloaded' : 'upgraded';
      }

      await this.options.store.updateQuality(request.cacheKey, slot, candidate.voteAverage, request.cacheBase);

      logger.info(`[AssetService] ${slotLabel} ${outcome} for ${request.label}`, {
        status: decision.status,
        target,
        voteAverage: candidate.voteAverage,
        bytes: download.data.length,
      });
      return { ...base, outcome, status: decision.status, path: target, bytes: download.data.length };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      logger.error(`[AssetService] ${slotLabel} failed for ${request.label}`, {
        target,
        error: getErrorMessage(error),
      });
      return { ...base, outcome: 'failed', path: target, error: toError(error) };
    } finally {
      await fs.remove(tempPath);
    }
  }
}
