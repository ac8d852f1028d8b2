/**
 * Identifier Cache Store
 *
 * Persistent map of composite key -> resolved catalog id (meta_cache.json)
 * plus the negative cache of keys whose search found nothing
 * (failed_items.json).
 *
 * Both files are rewritten whole on every change. Writes go through one
 * queue so two saves never interleave, and each lands via temp file + rename.
 * Mutators update memory synchronously; callers that read, await and then
 * write must hold the key lock (withKeyLock) around the whole sequence.
 */

import path from 'path';
import { z } from 'zod';
import { AssetSlot } from '../../config/types.js';
import { ErrorCode, FileSystemError } from '../../errors/index.js';
import { CacheEntry, CompositeKey, MediaType } from '../../types/models.js';
import { parseCacheKey } from '../../utils/cacheKeys.js';
import { readJsonFile, writeFileAtomically } from '../../utils/atomicWrite.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { KeyedLock } from '../../utils/KeyedLock.js';
import { logger } from '../../utils/logging.js';

export const CACHE_FILE_NAME = 'meta_cache.json';
export const FAILED_FILE_NAME = 'failed_items.json';

export type CacheEntryBase = Pick<CacheEntry, 'key' | 'externalId' | 'title' | 'year' | 'mediaType'>;

export interface IdentifierCacheStoreOptions {
  cacheDir: string;
  dryRun?: boolean;
  lock?: KeyedLock;
}

const externalIdSchema = z.union([z.string().min(1), z.number()]);
const yearSchema = z.union([z.number().int(), z.string().regex(/^\d{4}$/).transform(Number)]).nullable();
const mediaTypeSchema = z.enum(['movie', 'tv', 'tv_season']);

const structuredEntrySchema = z.object({
  externalId: externalIdSchema,
  title: z.string().optional(),
  year: yearSchema.optional(),
  mediaType: mediaTypeSchema.optional(),
  qualityMetrics: z.record(z.number()).optional(),
  lastUpdated: z.string().optional(),
});

// Older files keyed everything in snake_case, with per-slot averages at the top level
const legacyEntrySchema = z.object({
  tmdb_id: externalIdSchema,
  title: z.string().optional(),
  year: yearSchema.optional().catch(null),
  media_type: mediaTypeSchema.optional().catch(undefined),
  last_updated: z.string().optional(),
  poster_average: z.number().optional(),
  bg_average: z.number().optional(),
  season_average: z.number().optional(),
});

const ASSET_SLOTS: readonly AssetSlot[] = ['poster', 'background', 'season'];

function isAssetSlot(value: string): value is AssetSlot {
  return (ASSET_SLOTS as readonly string[]).includes(value);
}

function toQualityMetrics(raw: Record<string, number> | undefined): CacheEntry['qualityMetrics'] {
  const metrics: CacheEntry['qualityMetrics'] = {};
  for (const [slot, value] of Object.entries(raw ?? {})) {
    if (isAssetSlot(slot)) {
      metrics[slot] = value;
    }
  }
  return metrics;
}

/**
 * Decode one stored value. Accepts the structured shape, the legacy
 * `{ tmdb_id }` shape and a bare id. Returns null for anything else.
 */
export function decodeCacheValue(key: CompositeKey, value: unknown): CacheEntry | null {
  const fromKey = parseCacheKey(key);
  const fallbackMediaType: MediaType = fromKey?.mediaType ?? 'movie';

  const bare = externalIdSchema.safeParse(value);
  if (bare.success) {
    return {
      key,
      externalId: bare.data,
      title: fromKey?.title ?? '',
      year: fromKey?.year ?? null,
      mediaType: fallbackMediaType,
      qualityMetrics: {},
      lastUpdated: '',
    };
  }

  const structured = structuredEntrySchema.safeParse(value);
  if (structured.success) {
    const entry = structured.data;
    return {
      key,
      externalId: entry.externalId,
      title: entry.title ?? fromKey?.title ?? '',
      year: entry.year !== undefined ? entry.year : fromKey?.year ?? null,
      mediaType: entry.mediaType ?? fallbackMediaType,
      qualityMetrics: toQualityMetrics(entry.qualityMetrics),
      lastUpdated: entry.lastUpdated ?? '',
    };
  }

  const legacy = legacyEntrySchema.safeParse(value);
  if (legacy.success) {
    const entry = legacy.data;
    const qualityMetrics: CacheEntry['qualityMetrics'] = {};
    if (entry.poster_average !== undefined) qualityMetrics.poster = entry.poster_average;
    if (entry.bg_average !== undefined) qualityMetrics.background = entry.bg_average;
    if (entry.season_average !== undefined) qualityMetrics.season = entry.season_average;

    return {
      key,
      externalId: entry.tmdb_id,
      title: entry.title ?? fromKey?.title ?? '',
      year: entry.year ?? fromKey?.year ?? null,
      mediaType: fromKey?.mediaType ?? entry.media_type ?? fallbackMediaType,
      qualityMetrics,
      lastUpdated: entry.last_updated ?? '',
    };
  }

  return null;
}

export class IdentifierCacheStore {
  readonly cacheFile: string;
  readonly failedFile: string;
  readonly dryRun: boolean;

  private readonly lock: KeyedLock;
  private readonly records = new Map<CompositeKey, CacheEntry>();
  private readonly failed = new Set<CompositeKey>();
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(options: IdentifierCacheStoreOptions) {
    this.cacheFile = path.join(options.cacheDir, CACHE_FILE_NAME);
    this.failedFile = path.join(options.cacheDir, FAILED_FILE_NAME);
    this.dryRun = options.dryRun ?? false;
    this.lock = options.lock ?? new KeyedLock();
  }

  /**
   * Read both files into memory. Missing files mean an empty cache;
   * an unreadable file is an error so it is never overwritten.
   */
  async load(): Promise<void> {
    this.records.clear();
    this.failed.clear();

    const cacheData = await this.readJsonObject(this.cacheFile);
    let dropped = 0;
    for (const [key, value] of Object.entries(cacheData)) {
      const entry = decodeCacheValue(key, value);
      if (entry) {
        this.records.set(key, entry);
      } else {
        dropped++;
        logger.warn('[IdentifierCacheStore] Dropping unrecognized cache value', { key });
      }
    }

    const failedData = await this.readJsonObject(this.failedFile);
    for (const [key, value] of Object.entries(failedData)) {
      if (value === true) {
        this.failed.add(key);
      }
    }

    logger.info('[IdentifierCacheStore] Cache loaded', {
      entries: this.records.size,
      failed: this.failed.size,
      dropped,
    });
  }

  get(key: CompositeKey): CacheEntry | undefined {
    return this.records.get(key);
  }

  isFailed(key: CompositeKey): boolean {
    return this.failed.has(key);
  }

  entries(): CacheEntry[] {
    return [...this.records.values()];
  }

  keys(): CompositeKey[] {
    return [...this.records.keys()];
  }

  failedKeys(): CompositeKey[] {
    return [...this.failed];
  }

  /**
   * Insert or replace an entry. Quality metrics already recorded for the key are kept.
   */
  async put(base: CacheEntryBase): Promise<CacheEntry> {
    const existing = this.records.get(base.key);
    const entry: CacheEntry = {
      ...base,
      qualityMetrics: { ...existing?.qualityMetrics },
      lastUpdated: new Date().toISOString(),
    };
    this.records.set(base.key, entry);

    const wasFailed = this.failed.delete(base.key);
    await this.saveEntries();
    if (wasFailed) {
      await this.saveFailed();
    }
    return entry;
  }

  async markFailed(key: CompositeKey): Promise<void> {
    this.failed.add(key);
    await this.saveFailed();
  }

  async clearFailed(key: CompositeKey): Promise<boolean> {
    if (!this.failed.delete(key)) {
      return false;
    }
    await this.saveFailed();
    return true;
  }

  /**
   * Record the vote average of the asset now saved for a slot.
   * Creates the entry from `base` when the key has none yet.
   */
  async updateQuality(
    key: CompositeKey,
    slot: AssetSlot,
    voteAverage: number,
    base: Omit<CacheEntryBase, 'key'>
  ): Promise<CacheEntry> {
    const existing = this.records.get(key);
    const entry: CacheEntry = existing
      ? { ...existing, qualityMetrics: { ...existing.qualityMetrics } }
      : { key, ...base, qualityMetrics: {}, lastUpdated: '' };

    entry.qualityMetrics[slot] = voteAverage;
    entry.lastUpdated = new Date().toISOString();
    this.records.set(key, entry);

    await this.saveEntries();
    return entry;
  }

  /**
   * Drop entries and failed markers for the given keys. Returns the keys that existed.
   */
  async remove(keys: Iterable<CompositeKey>): Promise<{ entries: CompositeKey[]; failed: CompositeKey[] }> {
    const removedEntries: CompositeKey[] = [];
    const removedFailed: CompositeKey[] = [];
    for (const key of keys) {
      if (this.records.delete(key)) removedEntries.push(key);
      if (this.failed.delete(key)) removedFailed.push(key);
    }

    if (removedEntries.length > 0) await this.saveEntries();
    if (removedFailed.length > 0) await this.saveFailed();
    return { entries: removedEntries, failed: removedFailed };
  }

  withKeyLock<T>(key: CompositeKey, fn: () => Promise<T>): Promise<T> {
    return this.lock.withKey(key, fn);
  }

  withExclusiveLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.lock.withExclusive(fn);
  }

  /**
   * Resolves once every queued write has finished
   */
  flush(): Promise<void> {
    return this.writeQueue;
  }

  private saveEntries(): Promise<void> {
    const payload: Record<string, Omit<CacheEntry, 'key'>> = {};
    for (const { key, ...rest } of this.records.values()) {
      payload[key] = rest;
    }
    return this.enqueueWrite(this.cacheFile, payload);
  }

  private saveFailed(): Promise<void> {
    const payload: Record<string, true> = {};
    for (const key of this.failed) {
      payload[key] = true;
    }
    return this.enqueueWrite(this.failedFile, payload);
  }

  /**
   * Payload is serialized now so the file reflects memory at the time of the change.
   * Save failures are logged; in-memory state is kept.
   */
  private enqueueWrite(file: string, payload: object): Promise<void> {
    if (this.dryRun) {
      logger.debug('[DryRun] Would write cache file', { file });
      return this.writeQueue;
    }

    const json = JSON.stringify(payload, null, 2);
    const write = this.writeQueue
      .then(() => writeFileAtomically(file, json, 'IdentifierCacheStore'))
      .catch((error: unknown) => {
        logger.error('[IdentifierCacheStore] Failed to save cache file', {
          file,
          error: getErrorMessage(error),
        });
      });
    this.writeQueue = write;
    return write;
  }

  private async readJsonObject(file: string): Promise<Record<string, unknown>> {
    const parsed = await readJsonFile(file, 'IdentifierCacheStore');
    if (parsed === undefined) {
      return {};
    }

    const result = z.record(z.unknown()).safeParse(parsed);
    if (!result.success) {
      throw new FileSystemError(
        `Expected a JSON object in ${file}`,
        ErrorCode.FS_READ_FAILED,
        file,
        { service: 'IdentifierCacheStore', operation: 'load' }
      );
    }
    return result.data;
  }
}
