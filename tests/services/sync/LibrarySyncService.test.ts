import { jest } from '@jest/globals';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { ConfigManager } from '../../../src/config/ConfigManager.js';
import { AppConfig, DeepPartial } from '../../../src/config/types.js';
import { TransportResponse } from '../../../src/services/catalog/CatalogTransport.js';
import { RequestParams } from '../../../src/services/catalog/ResponseCache.js';
import { LibraryInput, createLibrarySyncService } from '../../../src/services/sync/LibrarySyncService.js';
import { MediaItem } from '../../../src/types/models.js';
import { FakeTransport, ok } from '../../helpers/FakeTransport.js';
import { jpegBuffer } from '../../helpers/images.js';

jest.mock('../../../src/utils/logging.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const IMAGE_BASE = 'https://images.example.test/original';

const dune: MediaItem = {
  ratingKey: '1',
  title: 'Dune',
  year: 2021,
  mediaType: 'movie',
  libraryName: 'Movies',
  guids: ['tmdb://438631'],
  directoryPath: '/media/movies/Dune (2021)',
};

const unknown: MediaItem = {
  ratingKey: '2',
  title: 'Unknown Movie',
  year: 2000,
  mediaType: 'movie',
  libraryName: 'Movies',
  guids: [],
  directoryPath: '/media/movies/Unknown Movie (2000)',
};

const severance: MediaItem = {
  ratingKey: '3',
  title: 'Severance',
  year: 2022,
  mediaType: 'tv',
  libraryName: 'TV Shows',
  guids: [],
  directoryPath: '/media/tv/Severance',
  seasons: { 1: [1] },
};

const libraries: LibraryInput[] = [
  { name: 'Movies', items: [dune, unknown] },
  { name: 'TV Shows', items: [severance] },
];

function image(filePath: string, voteAverage: number, width = 2000, height = 3000) {
  return { file_path: filePath, iso_639_1: 'en', vote_average: voteAverage, width, height };
}

async function scriptCatalog(transport: FakeTransport): Promise<void> {
  const jpeg = await jpegBuffer(30, 45);
  transport
    .on('/movie/438631', ok({ id: 438631, title: 'Dune', original_title: 'Dune', release_date: '2021-09-15', overview: 'Spice.' }))
    .on(
      '/movie/438631/images',
      ok({
        posters: [image('/dune-poster.jpg', 5.5)],
        backdrops: [{ ...image('/dune-bg.jpg', 6, 3840, 2160), iso_639_1: null }],
      })
    )
    .on('/search/movie', ok({ results: [] }))
    .on('/search/tv', ok({ results: [{ id: 95396, vote_count: 100, popularity: 10 }] }))
    .on(
      '/tv/95396',
      ok({
        id: 95396,
        name: 'Severance',
        first_air_date: '2022-02-18',
        external_ids: { tvdb_id: 371980 },
        seasons: [{ season_number: 0 }, { season_number: 1 }, { season_number: 2 }],
      })
    )
    .on(
      '/tv/95396/season/1',
      ok({
        season_number: 1,
        air_date: '2022-02-18',
        episodes: [{ episode_number: 1, name: 'Good News About Hell' }],
        images: { posters: [image('/sev-s1.jpg', 4)] },
      })
    )
    .on('/tv/95396/images', ok({ posters: [image('/sev-poster.jpg', 5.2)], backdrops: [] }));

  for (const file of ['/dune-poster.jpg', '/dune-bg.jpg', '/sev-s1.jpg', '/sev-poster.jpg']) {
    transport.onBinary(`${IMAGE_BASE}${file}`, ok(jpeg));
  }
}

describe('LibrarySyncService', () => {
  let root: string;
  let transport: FakeTransport;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'library-sync-'));
    transport = new FakeTransport();
    await scriptCatalog(transport);
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  function configFor(overrides: DeepPartial<AppConfig> = {}): AppConfig {
    return ConfigManager.fromObject({
      catalog: { imageBaseUrl: IMAGE_BASE },
      network: { maxRetries: 1, retryDelaySeconds: 0 },
      sync: { concurrency: 2, batchTimeoutSeconds: 30 },
      paths: {
        cacheDir: path.join(root, 'cache'),
        metadataDir: path.join(root, 'metadata'),
        assetsPath: path.join(root, 'assets'),
      },
      features: { runBackground: true },
      ...overrides,
    }).getConfig();
  }

  const asset = (...segments: string[]): string => path.join(root, 'assets', ...segments);

  it('should sync metadata and artwork, then remove orphans', async () => {
    await fs.outputJson(path.join(root, 'cache', 'meta_cache.json'), { 'movie:Gone:1990': 5 });
    await fs.outputFile(asset('Movies', 'Gone (1990)', 'poster.jpg'), 'old');

    const service = createLibrarySyncService(configFor(), { transport, sleep: async () => undefined });
    const summary = await service.run(libraries);

    const [movies, shows] = summary.libraries;
    expect(movies).toMatchObject({
      library: 'Movies',
      items: 2,
      resolved: 1,
      unresolved: 1,
      metadata: { created: 1, updated: 0, unchanged: 0 },
      timedOut: 0,
      documentSaved: true,
      failures: [{ title: 'Unknown Movie', year: 2000, stage: 'resolve', error: 'search_exhausted' }],
    });
    expect(movies?.assets.poster.downloaded).toBe(1);
    expect(movies?.assets.background.downloaded).toBe(1);
    expect(movies?.completeness.records).toBe(1);

    expect(shows).toMatchObject({ library: 'TV Shows', resolved: 1, unresolved: 0, failures: [] });
    expect(shows?.assets.poster.downloaded).toBe(1);
    expect(shows?.assets.background.missing).toBe(1);
    expect(shows?.assets.season.downloaded).toBe(1);
    expect(transport.callsTo('/tv/95396/season/2')).toEqual([]);
    expect(transport.callsTo('/tv/95396/season/0')).toEqual([]);

    expect(summary.reconcile).toMatchObject({
      removedCount: 2,
      cacheKeys: ['movie:Gone:1990'],
      failedKeys: [],
      metadataTitles: [],
      assetFiles: [asset('Movies', 'Gone (1990)', 'poster.jpg')],
      directories: [asset('Movies', 'Gone (1990)')],
    });

    for (const file of [
      asset('Movies', 'Dune (2021)', 'poster.jpg'),
      asset('Movies', 'Dune (2021)', 'fanart.jpg'),
      asset('TV Shows', 'Severance', 'poster.jpg'),
      asset('TV Shows', 'Severance', 'Season01.jpg'),
    ]) {
      expect(await fs.pathExists(file)).toBe(true);
    }

    const movieDocument = await fs.readJson(path.join(root, 'metadata', 'movies_metadata.json'));
    expect(Object.keys(movieDocument.metadata)).toEqual(['Dune (2021)']);
    expect(movieDocument.metadata['Dune (2021)'].match).toEqual({ title: 'Dune', year: 2021, mapping_id: 438631 });

    const showDocument = await fs.readJson(path.join(root, 'metadata', 'tv_shows_metadata.json'));
    expect(showDocument.metadata['Severance (2022)'].match).toEqual({ title: 'Severance', year: 2022, mapping_id: 371980 });
    expect(Object.keys(showDocument.metadata['Severance (2022)'].seasons)).toEqual(['1']);

    const cache = await fs.readJson(path.join(root, 'cache', 'meta_cache.json'));
    expect(Object.keys(cache).sort()).toEqual(['movie:Dune:2021', 'tv:Severance:2022', 'tv:Severance:2022:season1']);
    expect(cache['movie:Dune:2021'].qualityMetrics).toEqual({ poster: 5.5, background: 6 });
    expect(cache['tv:Severance:2022:season1']).toMatchObject({ mediaType: 'tv_season', qualityMetrics: { season: 4 } });
    expect(await fs.readJson(path.join(root, 'cache', 'failed_items.json'))).toEqual({
      'movie:Unknown Movie:2000': true,
    });
  });

  it('should settle into no changes on a second run', async () => {
    const service = createLibrarySyncService(configFor(), { transport, sleep: async () => undefined });

    await service.run(libraries);
    const second = await service.run(libraries);

    const [movies, shows] = second.libraries;
    expect(movies?.metadata).toEqual({ created: 0, updated: 0, unchanged: 1 });
    expect(shows?.metadata).toEqual({ created: 0, updated: 0, unchanged: 1 });
    expect(movies?.assets.poster).toMatchObject({ downloaded: 0, upgraded: 0, skipped: 1 });
    expect(movies?.documentSaved).toBe(false);
    expect(movies?.failures).toEqual([{ title: 'Unknown Movie', year: 2000, stage: 'resolve', error: 'failed_cache' }]);
    expect(transport.callsTo('/search/movie')).toHaveLength(2);
    expect(second.reconcile?.removedCount).toBe(0);
  });

  it('should write nothing in dry run', async () => {
    const service = createLibrarySyncService(configFor({ sync: { dryRun: true } }), {
      transport,
      sleep: async () => undefined,
    });

    const summary = await service.run(libraries);

    expect(summary.dryRun).toBe(true);
    expect(summary.libraries[0]?.metadata.created).toBe(1);
    expect(summary.libraries[0]?.documentSaved).toBe(false);
    expect(summary.libraries[0]?.assets.poster.downloaded).toBe(1);
    expect(summary.reconcile?.dryRun).toBe(true);
    expect(transport.binaryCalls).toEqual([]);
    expect(await fs.readdir(root)).toEqual([]);
  });

  it('should skip metadata and artwork that are switched off', async () => {
    const service = createLibrarySyncService(
      configFor({
        features: {
          runMetadata: false,
          runPoster: false,
          runBackground: false,
          runSeason: false,
          runCleanup: false,
        },
      }),
      { transport, sleep: async () => undefined }
    );

    const summary = await service.run(libraries);

    expect(summary.reconcile).toBeNull();
    expect(summary.libraries[0]?.metadata).toEqual({ created: 0, updated: 0, unchanged: 0 });
    expect(transport.callsTo('/movie/438631/images')).toEqual([]);
    expect(transport.binaryCalls).toEqual([]);
    expect(await fs.pathExists(path.join(root, 'metadata'))).toBe(false);
  });

  it('should not download or write artwork for an item after its batch times out', async () => {
    const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));
    class SlowImageTransport extends FakeTransport {
      readonly started: string[] = [];

      override async getBinary(url: string): Promise<TransportResponse<Buffer>> {
        this.started.push(url);
        await delay(200);
        return super.getBinary(url);
      }
    }
    const slow = new SlowImageTransport();
    const seasonNumbers = [1, 2, 3, 4];
    const jpeg = await jpegBuffer(30, 45);
    slow
      .on(
        '/tv/7',
        ok({
          id: 7,
          name: 'Show',
          first_air_date: '2020-01-01',
          seasons: seasonNumbers.map((n) => ({ season_number: n })),
        })
      )
      .on('/tv/7/images', ok({ posters: [image('/show.jpg', 6)], backdrops: [] }))
      .onBinary(`${IMAGE_BASE}/show.jpg`, ok(jpeg));
    for (const n of seasonNumbers) {
      slow
        .on(`/tv/7/season/${n}`, ok({ season_number: n, images: { posters: [image(`/s${n}.jpg`, 6)] } }))
        .onBinary(`${IMAGE_BASE}/s${n}.jpg`, ok(jpeg));
    }
    const show: MediaItem = {
      ...severance,
      ratingKey: '20',
      title: 'Show',
      year: 2020,
      guids: ['tmdb://7'],
      directoryPath: '/media/tv/Show (2020)',
      seasons: { 1: [1], 2: [1], 3: [1], 4: [1] },
    };

    const service = createLibrarySyncService(configFor({ sync: { concurrency: 1, batchTimeoutSeconds: 0.3 } }), {
      transport: slow,
      sleep: async () => undefined,
    });
    const summary = await service.run([{ name: 'TV Shows', items: [show] }]);
    const startedAtReturn = slow.started.length;

    await delay(500);

    expect(summary.libraries[0]?.timedOut).toBe(1);
    expect(slow.started).toHaveLength(startedAtReturn);
    for (const n of seasonNumbers) {
      expect(await fs.pathExists(asset('TV Shows', 'Show (2020)', `Season0${n}.jpg`))).toBe(false);
    }
    expect((await fs.readdir(asset('TV Shows'))).filter((name) => name.startsWith('temp_'))).toEqual([]);
    const cache = await fs.readJson(path.join(root, 'cache', 'meta_cache.json'));
    expect(cache['tv:Show:2020:season1']).toBeUndefined();
  });

  it('should report items cut off by the batch timeout without retrying them', async () => {
    class StalledTransport extends FakeTransport {
      override get(endpoint: string, params: RequestParams): Promise<TransportResponse<unknown>> {
        if (endpoint === '/movie/1') {
          this.calls.push({ endpoint, params });
          return new Promise<TransportResponse<unknown>>(() => undefined);
        }
        return super.get(endpoint, params);
      }
    }
    const stalled = new StalledTransport();
    const stuck: MediaItem = { ...dune, ratingKey: '10', title: 'Stuck', year: 2001, guids: ['tmdb://1'] };
    const queued: MediaItem = { ...dune, ratingKey: '11', title: 'Queued', year: 2002, guids: ['tmdb://2'] };

    const service = createLibrarySyncService(
      configFor({ sync: { concurrency: 1, batchTimeoutSeconds: 0.05 }, features: { runCleanup: false } }),
      { transport: stalled, sleep: async () => undefined }
    );
    const summary = await service.run([{ name: 'Movies', items: [stuck, queued] }]);

    const [movies] = summary.libraries;
    expect(movies?.timedOut).toBe(2);
    expect(movies?.failures.map((failure) => [failure.title, failure.stage])).toEqual([
      ['Stuck', 'timeout'],
      ['Queued', 'timeout'],
    ]);
    expect(stalled.callsTo('/movie/1')).toHaveLength(1);
    expect(stalled.callsTo('/movie/2')).toEqual([]);
  });
});
