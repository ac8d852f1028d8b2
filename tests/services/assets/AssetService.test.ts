import { jest } from '@jest/globals';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { AssetSlot, QualityPolicy } from '../../../src/config/types.js';
import { BatchTimeoutError, ProviderServerError } from '../../../src/errors/index.js';
import { AssetRequest, AssetService } from '../../../src/services/assets/AssetService.js';
import { IdentifierCacheStore } from '../../../src/services/cache/IdentifierCacheStore.js';
import { FetchResult } from '../../../src/services/catalog/RetryingClient.js';
import { AssetCandidate } from '../../../src/types/models.js';
import { candidate, posterPolicy } from '../../helpers/fixtures.js';
import { jpegBuffer, writeJpeg } from '../../helpers/images.js';

jest.mock('../../../src/utils/logging.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const quality: Record<AssetSlot, QualityPolicy> = {
  poster: posterPolicy,
  background: posterPolicy,
  season: { ...posterPolicy, voteThreshold: 3 },
};

class FakeDownloads {
  readonly requested: string[] = [];

  constructor(private readonly respond: (imagePath: string) => Promise<FetchResult<Buffer>>) {}

  async download(imagePath: string): Promise<FetchResult<Buffer>> {
    this.requested.push(imagePath);
    return this.respond(imagePath);
  }
}

function served(data: Buffer): FetchResult<Buffer> {
  return { success: true, data, attempts: 1, fromCache: false };
}

describe('AssetService', () => {
  let root: string;
  let assetsRoot: string;
  let store: IdentifierCacheStore;
  let image: Buffer;
  let downloads: FakeDownloads;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'asset-service-'));
    assetsRoot = path.join(root, 'assets');
    store = new IdentifierCacheStore({ cacheDir: path.join(root, 'cache') });
    await store.load();
    image = await jpegBuffer(40, 60);
    downloads = new FakeDownloads(async () => served(image));
  });

  afterEach(async () => {
    await store.flush();
    await fs.remove(root);
  });

  function createService(dryRun = false): AssetService {
    return new AssetService({
      catalog: downloads,
      store,
      assetsRoot,
      language: 'en',
      fallbackLanguages: [],
      quality,
      dryRun,
    });
  }

  function request(overrides: Partial<AssetRequest> = {}): AssetRequest {
    return {
      libraryName: 'Movies',
      itemDirectory: 'Dune (2021)',
      label: 'Dune (2021)',
      cacheKey: 'movie:Dune:2021',
      cacheBase: { externalId: 438631, title: 'Dune', year: 2021, mediaType: 'movie' },
      slot: 'poster',
      candidates: [candidate({ path: '/dune.jpg', voteAverage: 5.5 })],
      justWritten: new Set<string>(),
      ...overrides,
    };
  }

  const posterPath = (): string => path.join(assetsRoot, 'Movies', 'Dune (2021)', 'poster.jpg');

  it('should report a missing asset when there are no candidates', async () => {
    const result = await createService().syncAsset(request({ candidates: [] }));

    expect(result).toEqual({ slot: 'poster', outcome: 'missing' });
    expect(downloads.requested).toEqual([]);
  });

  it('should download a new poster and record its quality', async () => {
    const justWritten = new Set<string>();

    const result = await createService().syncAsset(request({ justWritten }));

    expect(result).toMatchObject({
      slot: 'poster',
      outcome: 'downloaded',
      status: 'UPGRADE_VOTES',
      path: posterPath(),
      bytes: image.length,
    });
    expect(downloads.requested).toEqual(['/dune.jpg']);
    expect(await fs.readFile(posterPath())).toEqual(image);
    expect(store.get('movie:Dune:2021')?.qualityMetrics).toEqual({ poster: 5.5 });
    expect([...justWritten]).toEqual([posterPath()]);
    expect(await fs.readdir(path.join(assetsRoot, 'Movies'))).toEqual(['Dune (2021)']);
  });

  it('should leave identical bytes in place', async () => {
    await fs.outputFile(posterPath(), image);
    const before = (await fs.stat(posterPath())).mtimeMs;

    const result = await createService().syncAsset(request());

    expect(result.outcome).toBe('unchanged');
    expect((await fs.stat(posterPath())).mtimeMs).toBe(before);
    expect(store.get('movie:Dune:2021')?.qualityMetrics.poster).toBe(5.5);
  });

  it('should replace an asset the candidate outvotes', async () => {
    await fs.ensureDir(path.dirname(posterPath()));
    await writeJpeg(posterPath(), 20, 30);
    await store.updateQuality('movie:Dune:2021', 'poster', 5, request().cacheBase);

    const result = await createService().syncAsset(request({ candidates: [candidate({ path: '/better.jpg', voteAverage: 6 })] }));

    expect(result).toMatchObject({ outcome: 'upgraded', status: 'UPGRADE_VOTES' });
    expect(await fs.readFile(posterPath())).toEqual(image);
    expect(store.get('movie:Dune:2021')?.qualityMetrics.poster).toBe(6);
  });

  it('should keep a larger existing asset and its recorded quality', async () => {
    await fs.ensureDir(path.dirname(posterPath()));
    await writeJpeg(posterPath(), 80, 120);
    const existing = await fs.readFile(posterPath());
    await store.updateQuality('movie:Dune:2021', 'poster', 7, request().cacheBase);

    const result = await createService().syncAsset(request());

    expect(result).toMatchObject({ outcome: 'skipped', status: 'NO_UPGRADE_NEEDED' });
    expect(await fs.readFile(posterPath())).toEqual(existing);
    expect(store.get('movie:Dune:2021')?.qualityMetrics.poster).toBe(7);
    expect(await fs.readdir(path.join(assetsRoot, 'Movies'))).toEqual(['Dune (2021)']);
  });

  it('should report a failed download', async () => {
    const error = new ProviderServerError('catalog', 503);
    downloads = new FakeDownloads(async () => ({ success: false, error, attempts: 3 }));

    const result = await createService().syncAsset(request());

    expect(result).toEqual({ slot: 'poster', outcome: 'failed', path: posterPath(), error });
    expect(await fs.pathExists(posterPath())).toBe(false);
    expect(store.get('movie:Dune:2021')).toBeUndefined();
  });

  it('should only report what it would do in dry run', async () => {
    const justWritten = new Set<string>();

    const result = await createService(true).syncAsset(request({ justWritten }));

    expect(result).toEqual({ slot: 'poster', outcome: 'downloaded', status: 'UPGRADE_VOTES', path: posterPath() });
    expect(downloads.requested).toEqual([]);
    expect(await fs.pathExists(assetsRoot)).toBe(false);
    expect(justWritten.has(posterPath())).toBe(true);
  });

  it('should decide and write one request at a time per cache key', async () => {
    let active = 0;
    let maxActive = 0;
    downloads = new FakeDownloads(async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setImmediate(resolve));
      active--;
      return served(image);
    });
    const service = createService();

    const results = await Promise.all([service.syncAsset(request()), service.syncAsset(request())]);

    expect(maxActive).toBe(1);
    expect(results.map((result) => result.outcome)).toEqual(['downloaded', 'skipped']);
    expect(results[1]?.status).toBe('NO_UPGRADE_NEEDED');
    expect(await fs.readFile(posterPath())).toEqual(image);
    expect(store.get('movie:Dune:2021')?.qualityMetrics).toEqual({ poster: 5.5 });
  });

  it('should stop before writing once its signal is aborted', async () => {
    const batch = new AbortController();
    const reason = new BatchTimeoutError(250);
    downloads = new FakeDownloads(async () => {
      batch.abort(reason);
      return served(image);
    });

    await expect(createService().syncAsset(request({ signal: batch.signal }))).rejects.toBe(reason);

    expect(downloads.requested).toEqual(['/dune.jpg']);
    expect(await fs.pathExists(posterPath())).toBe(false);
    expect(await fs.readdir(path.join(assetsRoot, 'Movies'))).toEqual([]);
    expect(store.get('movie:Dune:2021')).toBeUndefined();
  });

  it('should not start a download when already aborted', async () => {
    const batch = new AbortController();
    batch.abort(new BatchTimeoutError(250));

    await expect(createService().syncAsset(request({ signal: batch.signal }))).rejects.toBeInstanceOf(BatchTimeoutError);

    expect(downloads.requested).toEqual([]);
  });

  it('should name season posters by season number', async () => {
    const seasonCandidates: AssetCandidate[] = [candidate({ path: '/s1.jpg', voteAverage: 4 })];

    const result = await createService().syncAsset(
      request({
        libraryName: 'TV Shows',
        itemDirectory: 'Severance',
        label: 'Severance (2022)',
        cacheKey: 'tv:Severance:2022:season1',
        cacheBase: { externalId: 95396, title: 'Severance', year: 2022, mediaType: 'tv_season' },
        slot: 'season',
        seasonNumber: 1,
        candidates: seasonCandidates,
      })
    );

    expect(result).toMatchObject({ slot: 'season', seasonNumber: 1, outcome: 'downloaded' });
    expect(await fs.pathExists(path.join(assetsRoot, 'TV Shows', 'Severance', 'Season01.jpg'))).toBe(true);
    expect(store.get('tv:Severance:2022:season1')).toMatchObject({ mediaType: 'tv_season', qualityMetrics: { season: 4 } });
  });

  it('should save backgrounds as fanart regardless of language', async () => {
    const result = await createService().syncAsset(
      request({ slot: 'background', candidates: [candidate({ path: '/bg.jpg', language: 'fr' })] })
    );

    expect(result.path).toBe(path.join(assetsRoot, 'Movies', 'Dune (2021)', 'fanart.jpg'));
    expect(result.outcome).toBe('downloaded');
  });
});
