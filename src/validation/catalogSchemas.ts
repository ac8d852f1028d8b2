import { z } from 'zod';

/**
 * Catalog Response Schemas
 *
 * Zod schemas for the catalog payloads this system reads. Unknown fields are
 * stripped rather than rejected; missing optional fields get neutral defaults.
 */

const namedSchema = z.object({
  name: z.string().default(''),
});

const creditPersonSchema = z.object({
  name: z.string().default(''),
  job: z.string().optional(),
});

const creditsSchema = z
  .object({
    cast: z.array(creditPersonSchema).nullable().default([]),
    crew: z.array(creditPersonSchema).nullable().default([]),
  })
  .default({});

export const catalogImageSchema = z.object({
  file_path: z.string(),
  iso_639_1: z.string().nullable().optional(),
  vote_average: z.number().default(0),
  width: z.number().int().default(0),
  height: z.number().int().default(0),
});

export const imagesResponseSchema = z.object({
  posters: z.array(catalogImageSchema).default([]),
  backdrops: z.array(catalogImageSchema).default([]),
});

export const searchResponseSchema = z.object({
  results: z
    .array(
      z.object({
        id: z.number().int(),
        vote_count: z.number().default(0),
        popularity: z.number().default(0),
      })
    )
    .default([]),
});

export const movieDetailsSchema = z.object({
  id: z.number().int(),
  title: z.string().optional(),
  original_title: z.string().optional(),
  release_date: z.string().nullable().optional(),
  runtime: z.number().nullable().optional(),
  tagline: z.string().nullable().optional(),
  overview: z.string().nullable().optional(),
  genres: z.array(namedSchema).default([]),
  production_companies: z.array(namedSchema).default([]),
  production_countries: z.array(z.object({ iso_3166_1: z.string() })).default([]),
  belongs_to_collection: namedSchema.nullable().optional(),
  credits: creditsSchema,
  release_dates: z
    .object({
      results: z
        .array(
          z.object({
            iso_3166_1: z.string(),
            release_dates: z.array(z.object({ certification: z.string().default('') })).default([]),
          })
        )
        .default([]),
    })
    .default({}),
  external_ids: z.object({ imdb_id: z.string().nullable().optional() }).default({}),
});

export const showDetailsSchema = z.object({
  id: z.number().int(),
  name: z.string().optional(),
  original_name: z.string().optional(),
  first_air_date: z.string().nullable().optional(),
  tagline: z.string().nullable().optional(),
  overview: z.string().nullable().optional(),
  genres: z.array(namedSchema).default([]),
  networks: z.array(namedSchema).default([]),
  origin_country: z.array(z.string()).default([]),
  content_ratings: z
    .object({
      results: z.array(z.object({ iso_3166_1: z.string(), rating: z.string().default('') })).default([]),
    })
    .default({}),
  credits: creditsSchema,
  external_ids: z.object({ tvdb_id: z.number().int().nullable().optional() }).default({}),
  seasons: z.array(z.object({ season_number: z.number().int() })).default([]),
});

export const seasonDetailsSchema = z.object({
  season_number: z.number().int(),
  air_date: z.string().nullable().optional(),
  credits: creditsSchema,
  episodes: z
    .array(
      z.object({
        episode_number: z.number().int(),
        name: z.string().default(''),
        air_date: z.string().nullable().optional(),
        runtime: z.number().nullable().optional(),
        overview: z.string().nullable().optional(),
        crew: z.array(creditPersonSchema).nullable().default([]),
        guest_stars: z.array(creditPersonSchema).nullable().default([]),
      })
    )
    .default([]),
  images: imagesResponseSchema.default({}),
});

export type CatalogImage = z.infer<typeof catalogImageSchema>;
export type ImagesResponse = z.infer<typeof imagesResponseSchema>;
export type SearchResponse = z.infer<typeof searchResponseSchema>;
export type MovieDetails = z.infer<typeof movieDetailsSchema>;
export type ShowDetails = z.infer<typeof showDetailsSchema>;
export type SeasonDetails = z.infer<typeof seasonDetailsSchema>;
export type CreditPerson = z.infer<typeof creditPersonSchema>;
