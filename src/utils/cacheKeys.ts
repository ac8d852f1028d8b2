/**
 * Composite keys shared by the identifier cache, the metadata documents
 * and the orphan reconciler. All three must derive them the same way.
 */

import { CompositeKey, LibraryMediaType, MediaType } from '../types/models.js';

/**
 * Build the composite cache key for a movie, show or season
 *
 * @example
 * buildCacheKey('movie', 'Dune', 2021) // "movie:Dune:2021"
 * buildCacheKey('tv', 'Severance', 2022, 2) // "tv:Severance:2022:season2"
 */
export function buildCacheKey(
  mediaType: LibraryMediaType,
  title: string,
  year: number | null,
  seasonNumber?: number
): CompositeKey {
  const base = `${mediaType}:${title}:${year ?? ''}`;
  if (mediaType === 'tv' && seasonNumber !== undefined) {
    return `${base}:season${seasonNumber}`;
  }
  return base;
}

/**
 * Media type recorded on a cache entry for the given key parts
 */
export function entryMediaType(mediaType: LibraryMediaType, seasonNumber?: number): MediaType {
  return mediaType === 'tv' && seasonNumber !== undefined ? 'tv_season' : mediaType;
}

/**
 * Human-readable record key used by metadata documents, e.g. "Dune (2021)"
 */
export function buildTitleKey(title: string, year: number | null): string {
  return year === null ? title : `${title} (${year})`;
}

/**
 * Strip a trailing parenthetical such as "(Extended Cut)" or "(2019)"
 */
export function cleanTitle(title: string): string {
  return title.replace(/\s*\([^()]*\)\s*$/, '').trim();
}

export interface ParsedCacheKey {
  mediaType: MediaType;
  title: string;
  year: number | null;
  seasonNumber?: number;
}

/**
 * Split a composite key back into its parts. Titles may themselves contain colons.
 *
 * @example
 * parseCacheKey('movie:Star Wars: Episode IV:1977')
 * // { mediaType: 'movie', title: 'Star Wars: Episode IV', year: 1977 }
 */
export function parseCacheKey(key: CompositeKey): ParsedCacheKey | null {
  const parts = key.split(':');
  const kind = parts.shift();
  if (kind !== 'movie' && kind !== 'tv') {
    return null;
  }

  let seasonNumber: number | undefined;
  const last = parts[parts.length - 1];
  const seasonMatch = last !== undefined ? /^season(\d+)$/.exec(last) : null;
  if (kind === 'tv' && seasonMatch && parts.length >= 3) {
    seasonNumber = Number(seasonMatch[1]);
    parts.pop();
  }

  if (parts.length < 2) {
    return null;
  }
  const yearPart = parts.pop() ?? '';
  const year = /^\d{4}$/.test(yearPart) ? Number(yearPart) : null;
  const title = parts.join(':');

  return {
    mediaType: seasonNumber !== undefined ? 'tv_season' : kind,
    title,
    year,
    ...(seasonNumber !== undefined && { seasonNumber }),
  };
}
