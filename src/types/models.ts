import type { AssetSlot } from '../config/types.js';

export type { AssetSlot };

/**
 * A cacheable media unit. Seasons are cached separately from their show.
 */
export type MediaType = 'movie' | 'tv' | 'tv_season';

/**
 * Library item kinds the media server produces
 */
export type LibraryMediaType = Exclude<MediaType, 'tv_season'>;

export type ExternalId = string | number;

/**
 * `movie:{title}:{year}`, `tv:{title}:{year}` or `tv:{title}:{year}:season{n}`
 */
export type CompositeKey = string;

/**
 * Data contract the media-server client must populate for each library item.
 * Nothing downstream inspects the server client's own objects.
 */
export interface MediaItem {
  /** Stable local id on the media server */
  ratingKey: string;
  title: string;
  year: number | null;
  mediaType: LibraryMediaType;
  libraryName: string;
  /** Embedded external identifiers, e.g. `tmdb://603` or `imdb://tt0133093` */
  guids: string[];
  /** Absolute on-disk directory of the movie or show */
  directoryPath: string;
  /** Season number -> episode numbers present locally (shows only) */
  seasons?: Record<number, number[]>;
}

/**
 * One resolved media unit in the persistent identifier cache
 */
export interface CacheEntry {
  key: CompositeKey;
  externalId: ExternalId;
  title: string;
  year: number | null;
  mediaType: MediaType;
  /** Vote average of the asset currently saved per slot. A hint, not proof the file exists. */
  qualityMetrics: Partial<Record<AssetSlot, number>>;
  lastUpdated: string;
}

/**
 * A candidate image from the catalog's image list for one fetch
 */
export interface AssetCandidate {
  path: string;
  language: string | null;
  voteAverage: number;
  width: number;
  height: number;
}

export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue };

export interface MetadataFields {
  [field: string]: MetadataValue;
}

export type MetadataMatch = {
  title: string;
  year: number | null;
  mapping_id: ExternalId | '';
};

/**
 * Persisted metadata for one item, keyed by `"Title (Year)"` in its library document
 */
export interface MetadataRecord extends MetadataFields {
  match: MetadataMatch;
}

export interface MetadataDocument {
  metadata: Record<string, MetadataFields>;
}
