/**
 * Catalog Service
 *
 * Typed catalog operations on top of RetryingClient. Every response is
 * validated at this boundary; a payload that fails validation is reported
 * as a MalformedResponseError.
 */

import { z } from 'zod';
import { CatalogConfig } from '../../config/types.js';
import { MalformedResponseError } from '../../errors/index.js';
import { AssetCandidate, ExternalId, LibraryMediaType } from '../../types/models.js';
import { logger } from '../../utils/logging.js';
import {
  CatalogImage,
  MovieDetails,
  SeasonDetails,
  ShowDetails,
  imagesResponseSchema,
  movieDetailsSchema,
  searchResponseSchema,
  seasonDetailsSchema,
  showDetailsSchema,
} from '../../validation/catalogSchemas.js';
import { RequestParams } from './ResponseCache.js';
import { FetchResult, RetryingClient } from './RetryingClient.js';

export interface SearchHit {
  id: number;
  voteCount: number;
  popularity: number;
}

export interface CatalogImages {
  posters: AssetCandidate[];
  backdrops: AssetCandidate[];
}

/**
 * Map catalog image entries to selector candidates
 */
export function toAssetCandidates(images: readonly CatalogImage[]): AssetCandidate[] {
  return images.map((image) => ({
    path: image.file_path,
    language: image.iso_639_1 ?? null,
    voteAverage: image.vote_average,
    width: image.width,
    height: image.height,
  }));
}

export class CatalogService {
  constructor(
    private readonly client: RetryingClient,
    private readonly catalog: Pick<CatalogConfig, 'language' | 'fallbackLanguages'>
  ) {}

  /**
   * Search movies or shows by title. An empty list is a successful result.
   */
  async search(
    mediaType: LibraryMediaType,
    query: string,
    year?: number | null
  ): Promise<FetchResult<SearchHit[]>> {
    const endpoint = `/search/${mediaType}`;
    const yearParam = mediaType === 'movie' ? 'year' : 'first_air_date_year';
    const params: RequestParams = { query, include_adult: false };
    if (year != null) {
      params[yearParam] = year;
    }

    const result = this.parse(searchResponseSchema, await this.client.fetch(endpoint, params), endpoint);
    if (!result.success) {
      return result;
    }

    return {
      ...result,
      data: result.data.results.map((hit) => ({
        id: hit.id,
        voteCount: hit.vote_count,
        popularity: hit.popularity,
      })),
    };
  }

  /**
   * Full details with credits, ratings and external ids appended
   */
  async details(id: ExternalId, mediaType: 'movie'): Promise<FetchResult<MovieDetails>>;
  async details(id: ExternalId, mediaType: 'tv'): Promise<FetchResult<ShowDetails>>;
  async details(
    id: ExternalId,
    mediaType: LibraryMediaType
  ): Promise<FetchResult<MovieDetails | ShowDetails>> {
    if (mediaType === 'movie') {
      const endpoint = `/movie/${id}`;
      const result = await this.client.fetch(endpoint, {
        append_to_response: 'credits,release_dates,external_ids',
      });
      return this.parse(movieDetailsSchema, result, endpoint);
    }

    const endpoint = `/tv/${id}`;
    const result = await this.client.fetch(endpoint, {
      append_to_response: 'credits,content_ratings,external_ids',
    });
    return this.parse(showDetailsSchema, result, endpoint);
  }

  async seasonDetails(id: ExternalId, seasonNumber: number): Promise<FetchResult<SeasonDetails>> {
    const endpoint = `/tv/${id}/season/${seasonNumber}`;
    const result = await this.client.fetch(endpoint, {
      append_to_response: 'credits,images',
      include_image_language: this.imageLanguages(),
    });
    return this.parse(seasonDetailsSchema, result, endpoint);
  }

  /**
   * Poster and backdrop candidates in the preferred, fallback and neutral languages
   */
  async images(id: ExternalId, mediaType: LibraryMediaType): Promise<FetchResult<CatalogImages>> {
    const endpoint = `/${mediaType}/${id}/images`;
    const result = this.parse(
      imagesResponseSchema,
      await this.client.fetch(endpoint, { include_image_language: this.imageLanguages() }),
      endpoint
    );
    if (!result.success) {
      return result;
    }

    return {
      ...result,
      data: {
        posters: toAssetCandidates(result.data.posters),
        backdrops: toAssetCandidates(result.data.backdrops),
      },
    };
  }

  download(imagePath: string): Promise<FetchResult<Buffer>> {
    return this.client.download(imagePath);
  }

  private imageLanguages(): string {
    const languages = [this.catalog.language.split('-')[0] ?? this.catalog.language, ...this.catalog.fallbackLanguages];
    return [...new Set(languages), 'null'].join(',');
  }

  private parse<S extends z.ZodTypeAny>(
    schema: S,
    result: FetchResult<unknown>,
    endpoint: string
  ): FetchResult<z.output<S>> {
    if (!result.success) {
      return result;
    }

    const parsed = schema.safeParse(result.data);
    if (!parsed.success) {
      logger.warn('[CatalogService] Response failed validation', {
        endpoint,
        issues: parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return {
        success: false,
        error: new MalformedResponseError(
          'catalog',
          endpoint,
          `Unexpected response shape from ${endpoint}`,
          { service: 'CatalogService', operation: 'parse' },
          parsed.error
        ),
        attempts: result.attempts,
      };
    }

    return { ...result, data: parsed.data };
  }
}
