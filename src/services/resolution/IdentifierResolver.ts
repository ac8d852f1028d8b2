/**
 * Identifier Resolver
 *
 * Maps a local (title, year, media type) to the catalog's external id.
 * Order: persistent cache, failed-lookup cache, embedded ids, then search
 * with up to four query variants. The whole sequence runs under the key
 * lock, so concurrent callers for one key trigger at most one search.
 */

import { ResourceNotFoundError } from '../../errors/index.js';
import { CompositeKey, ExternalId, LibraryMediaType, MediaItem } from '../../types/models.js';
import { buildCacheKey, cleanTitle } from '../../utils/cacheKeys.js';
import { findExternalId } from '../../utils/externalIds.js';
import { logger } from '../../utils/logging.js';
import { IdentifierCacheStore } from '../cache/IdentifierCacheStore.js';
import { CatalogService, SearchHit } from '../catalog/CatalogService.js';

export interface ResolveRequest {
  title: string;
  year: number | null;
  mediaType: LibraryMediaType;
  guids?: readonly string[];
}

export type ResolutionSource = 'cache' | 'embedded' | 'search';

export type ResolutionResult =
  | { status: 'resolved'; key: CompositeKey; externalId: ExternalId; source: ResolutionSource }
  | { status: 'not_found'; key: CompositeKey; reason: 'failed_cache' | 'search_exhausted' }
  | { status: 'error'; key: CompositeKey; error: Error };

export interface SearchVariant {
  title: string;
  year: number | null;
}

/**
 * (title, year), (title, any year), then the same with a trailing
 * parenthetical removed. Duplicates are dropped, order kept.
 */
export function searchVariants(title: string, year: number | null): SearchVariant[] {
  const candidates: SearchVariant[] = [
    { title, year },
    { title, year: null },
  ];

  const cleaned = cleanTitle(title);
  if (cleaned && cleaned !== title) {
    candidates.push({ title: cleaned, year }, { title: cleaned, year: null });
  }

  const seen = new Set<string>();
  return candidates.filter((variant) => {
    const signature = `${variant.title}\u0000${variant.year ?? ''}`;
    if (seen.has(signature)) {
      return false;
    }
    seen.add(signature);
    return true;
  });
}

/**
 * Highest vote count wins, popularity breaks ties, then original order
 */
export function pickTopHit(hits: readonly SearchHit[]): SearchHit | undefined {
  return [...hits].sort((a, b) => b.voteCount - a.voteCount || b.popularity - a.popularity)[0];
}

/**
 * Numeric ids are stored as numbers, anything else verbatim
 */
export function normalizeExternalId(id: string): ExternalId {
  return /^\d+$/.test(id) ? Number(id) : id;
}

export class IdentifierResolver {
  constructor(
    private readonly store: IdentifierCacheStore,
    private readonly catalog: Pick<CatalogService, 'search'>,
    private readonly idScheme: string = 'tmdb'
  ) {}

  async resolve(request: ResolveRequest): Promise<ResolutionResult> {
    const key = buildCacheKey(request.mediaType, request.title, request.year);
    return this.store.withKeyLock(key, () => this.resolveLocked(key, request));
  }

  resolveItem(item: MediaItem): Promise<ResolutionResult> {
    return this.resolve({
      title: item.title,
      year: item.year,
      mediaType: item.mediaType,
      guids: item.guids,
    });
  }

  private async resolveLocked(key: CompositeKey, request: ResolveRequest): Promise<ResolutionResult> {
    const { title, year, mediaType } = request;

    const cached = this.store.get(key);
    if (cached) {
      logger.debug('[IdentifierResolver] Cache hit', { key, externalId: cached.externalId });
      return { status: 'resolved', key, externalId: cached.externalId, source: 'cache' };
    }

    if (this.store.isFailed(key)) {
      logger.debug('[IdentifierResolver] Skipping previously failed lookup', { key });
      return { status: 'not_found', key, reason: 'failed_cache' };
    }

    const embedded = findExternalId(request.guids ?? [], this.idScheme);
    if (embedded) {
      const externalId = normalizeExternalId(embedded);
      await this.store.put({ key, externalId, title, year, mediaType });
      logger.debug('[IdentifierResolver] Resolved from embedded id', { key, externalId });
      return { status: 'resolved', key, externalId, source: 'embedded' };
    }

    for (const [index, variant] of searchVariants(title, year).entries()) {
      const result = await this.catalog.search(mediaType, variant.title, variant.year);

      if (!result.success) {
        if (result.error instanceof ResourceNotFoundError) {
          continue;
        }
        logger.warn('[IdentifierResolver] Search failed, leaving key unresolved', {
          key,
          query: variant.title,
          year: variant.year,
          error: result.error.message,
        });
        return { status: 'error', key, error: result.error };
      }

      const best = pickTopHit(result.data);
      if (best) {
        await this.store.put({ key, externalId: best.id, title, year, mediaType });
        logger.info('[IdentifierResolver] Resolved by search', {
          key,
          externalId: best.id,
          variant: index + 1,
          query: variant.title,
          year: variant.year,
        });
        return { status: 'resolved', key, externalId: best.id, source: 'search' };
      }
    }

    await this.store.markFailed(key);
    logger.warn('[IdentifierResolver] No catalog match after all search variants', { key });
    return { status: 'not_found', key, reason: 'search_exhausted' };
  }
}
