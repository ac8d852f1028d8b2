/**
 * Metadata Builder
 *
 * Turns catalog details into the persisted record shape for one movie or
 * show. Pure: fetching is done by the caller.
 */

import { ExternalId, MediaItem, MetadataFields, MetadataRecord } from '../../types/models.js';
import { Completeness, calculateCompleteness } from '../../utils/completeness.js';
import {
  CreditPerson,
  MovieDetails,
  SeasonDetails,
  ShowDetails,
} from '../../validation/catalogSchemas.js';

export interface BuildOptions {
  /** Include cast and crew fields */
  enhanced: boolean;
  /** Fields left out of the completeness percentage */
  ignoredFields: readonly string[];
}

export interface BuildResult {
  record: MetadataRecord;
  completeness: Completeness;
}

export const MOVIE_BASIC_FIELDS = [
  'sort_title',
  'original_title',
  'originally_available',
  'content_rating',
  'studio',
  'runtime',
  'tagline',
  'summary',
  'country',
  'genre',
] as const;

export const MOVIE_ENHANCED_FIELDS = ['cast', 'director', 'writer', 'producer', 'collection'] as const;

export const SHOW_BASIC_FIELDS = [
  'sort_title',
  'original_title',
  'originally_available',
  'content_rating',
  'studio',
  'summary',
  'country',
  'genre',
] as const;

export const SHOW_ENHANCED_FIELDS = ['tagline'] as const;

const DIRECTOR_JOBS = new Set(['Director', 'Co-Director', 'Assistant Director']);
const WRITER_JOBS = new Set(['Writer', 'Screenplay', 'Story', 'Creator', 'Co-Writer', 'Author', 'Adaptation']);
const PRODUCER_JOBS = new Set([
  'Producer',
  'Executive Producer',
  'Associate Producer',
  'Co-Producer',
  'Line Producer',
  'Co-Executive Producer',
]);

const TOP_CAST = 10;
const TOP_GUESTS = 5;
const CONTENT_RATING_REGION = 'US';

const regionNames = new Intl.DisplayNames(['en'], { type: 'region' });

/**
 * ISO 3166-1 codes to English country names; unknown codes are dropped
 */
export function countryNames(codes: readonly string[]): string[] {
  const names: string[] = [];
  for (const code of codes.map((value) => value.toUpperCase())) {
    if (!/^[A-Z]{2}$/.test(code)) {
      continue;
    }
    const name = regionNames.of(code);
    if (name && name !== code) {
      names.push(name);
    }
  }
  return names;
}

function namesWithJob(crew: readonly CreditPerson[] | null, jobs: ReadonlySet<string>): string[] {
  return (crew ?? []).filter((member) => member.job !== undefined && jobs.has(member.job)).map((member) => member.name);
}

function topNames(people: readonly CreditPerson[] | null, limit: number): string[] {
  return (people ?? []).slice(0, limit).map((person) => person.name);
}

function pick(fields: MetadataFields, allowed: readonly string[]): MetadataFields {
  const picked: MetadataFields = {};
  for (const field of allowed) {
    const value = fields[field];
    if (value !== undefined) {
      picked[field] = value;
    }
  }
  return picked;
}

export function buildMovieRecord(
  item: MediaItem,
  externalId: ExternalId,
  details: MovieDetails,
  options: BuildOptions
): BuildResult {
  const certification =
    details.release_dates.results
      .filter((country) => country.iso_3166_1 === CONTENT_RATING_REGION)
      .flatMap((country) => country.release_dates)
      .find((release) => release.certification)?.certification ?? '';

  const crew = details.credits.crew;
  const all: MetadataFields = {
    sort_title: item.title,
    original_title: details.original_title ?? item.title,
    originally_available: details.release_date ?? '',
    content_rating: certification,
    studio: details.production_companies.map((company) => company.name).filter(Boolean).join(', '),
    runtime: details.runtime ?? null,
    tagline: details.tagline ?? '',
    summary: details.overview ?? '',
    country: countryNames(details.production_countries.map((country) => country.iso_3166_1)),
    genre: details.genres.map((genre) => genre.name),
    cast: topNames(details.credits.cast, TOP_CAST),
    director: namesWithJob(crew, DIRECTOR_JOBS),
    writer: namesWithJob(crew, WRITER_JOBS),
    producer: namesWithJob(crew, PRODUCER_JOBS),
    collection: details.belongs_to_collection?.name ?? '',
  };

  const fields: string[] = [...MOVIE_BASIC_FIELDS, ...(options.enhanced ? MOVIE_ENHANCED_FIELDS : [])];
  const picked = pick(all, fields);

  return {
    record: {
      match: { title: item.title, year: item.year, mapping_id: externalId },
      ...picked,
    },
    completeness: calculateCompleteness(
      picked,
      fields.filter((field) => field !== 'collection'),
      options.ignoredFields
    ),
  };
}

function buildSeasonFields(
  season: SeasonDetails,
  presentEpisodes: readonly number[],
  show: ShowDetails,
  enhanced: boolean
): MetadataFields {
  const episodes: MetadataFields = {};

  for (const episode of season.episodes) {
    if (!presentEpisodes.includes(episode.episode_number)) {
      continue;
    }

    const crew = episode.crew?.length ? episode.crew : season.credits.crew?.length ? season.credits.crew : show.credits.crew;
    const cast = season.credits.cast?.length ? season.credits.cast : show.credits.cast;

    const fields: MetadataFields = {
      title: episode.name,
      sort_title: episode.name,
      originally_available: episode.air_date ?? '',
      runtime: episode.runtime ?? null,
      summary: episode.overview ?? '',
    };
    if (enhanced) {
      fields.cast = topNames(cast, TOP_CAST);
      fields.guest = topNames(episode.guest_stars, TOP_GUESTS);
      fields.director = namesWithJob(crew, DIRECTOR_JOBS);
      fields.writer = namesWithJob(crew, WRITER_JOBS);
    }
    episodes[String(episode.episode_number)] = fields;
  }

  return {
    originally_available: season.air_date ?? '',
    episodes,
  };
}

/**
 * Seasons are limited to those present locally; season 0 (specials) is skipped
 */
export function buildShowRecord(
  item: MediaItem,
  details: ShowDetails,
  seasons: readonly SeasonDetails[],
  options: BuildOptions
): BuildResult {
  const contentRating =
    details.content_ratings.results.find((rating) => rating.iso_3166_1 === CONTENT_RATING_REGION)?.rating ?? '';

  const all: MetadataFields = {
    sort_title: item.title,
    original_title: details.original_name ?? item.title,
    originally_available: details.first_air_date ?? '',
    content_rating: contentRating,
    studio: details.networks.map((network) => network.name).filter(Boolean).join(', '),
    tagline: details.tagline ?? '',
    summary: details.overview ?? '',
    country: countryNames(details.origin_country),
    genre: details.genres.map((genre) => genre.name),
  };

  const fields: string[] = [...SHOW_BASIC_FIELDS, ...(options.enhanced ? SHOW_ENHANCED_FIELDS : [])];
  const picked = pick(all, fields);

  const seasonFields: MetadataFields = {};
  const local = item.seasons ?? {};
  for (const season of seasons) {
    const presentEpisodes = local[season.season_number];
    if (season.season_number === 0 || presentEpisodes === undefined) {
      continue;
    }
    seasonFields[String(season.season_number)] = buildSeasonFields(season, presentEpisodes, details, options.enhanced);
  }

  const mappingId = details.external_ids.tvdb_id ?? '';

  return {
    record: {
      match: { title: item.title, year: item.year, mapping_id: mappingId },
      ...picked,
      seasons: seasonFields,
    },
    completeness: calculateCompleteness(picked, fields, options.ignoredFields),
  };
}
