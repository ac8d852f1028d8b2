import { jest } from '@jest/globals';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { FileSystemError } from '../../../src/errors/index.js';
import {
  CACHE_FILE_NAME,
  FAILED_FILE_NAME,
  IdentifierCacheStore,
  decodeCacheValue,
} from '../../../src/services/cache/IdentifierCacheStore.js';

jest.mock('../../../src/utils/logging.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const dune = { key: 'movie:Dune:2021', externalId: 438631, title: 'Dune', year: 2021, mediaType: 'movie' as const };

describe('IdentifierCacheStore', () => {
  let cacheDir: string;
  let store: IdentifierCacheStore;

  beforeEach(async () => {
    cacheDir = await fs.mkdtemp(path.join(os.tmpdir(), 'identifier-cache-'));
    store = new IdentifierCacheStore({ cacheDir });
  });

  afterEach(async () => {
    await fs.remove(cacheDir);
  });

  async function readCacheFile(name: string): Promise<unknown> {
    return fs.readJson(path.join(cacheDir, name));
  }

  describe('load', () => {
    it('should start empty when no files exist', async () => {
      await store.load();

      expect(store.entries()).toEqual([]);
      expect(store.failedKeys()).toEqual([]);
    });

    it('should read bare ids and legacy entries, dropping anything else', async () => {
      await fs.writeJson(path.join(cacheDir, CACHE_FILE_NAME), {
        'movie:Dune:2021': 438631,
        'tv:Severance:2022': { tmdb_id: 95396, title: 'Severance', year: '2022', poster_average: 5.4, bg_average: 6.1 },
        'movie:Broken:2000': ['not', 'an', 'id'],
      });
      await fs.writeJson(path.join(cacheDir, FAILED_FILE_NAME), { 'movie:Nope:1999': true, 'movie:Other:1999': false });

      await store.load();

      expect(store.get('movie:Dune:2021')).toEqual({
        key: 'movie:Dune:2021',
        externalId: 438631,
        title: 'Dune',
        year: 2021,
        mediaType: 'movie',
        qualityMetrics: {},
        lastUpdated: '',
      });
      expect(store.get('tv:Severance:2022')).toEqual({
        key: 'tv:Severance:2022',
        externalId: 95396,
        title: 'Severance',
        year: 2022,
        mediaType: 'tv',
        qualityMetrics: { poster: 5.4, background: 6.1 },
        lastUpdated: '',
      });
      expect(store.get('movie:Broken:2000')).toBeUndefined();
      expect(store.failedKeys()).toEqual(['movie:Nope:1999']);
    });

    it('should treat an empty file as an empty cache', async () => {
      await fs.writeFile(path.join(cacheDir, CACHE_FILE_NAME), '  \n');

      await store.load();

      expect(store.keys()).toEqual([]);
    });

    it('should refuse a file that is not a JSON object', async () => {
      await fs.writeFile(path.join(cacheDir, CACHE_FILE_NAME), '[1, 2]');

      await expect(store.load()).rejects.toBeInstanceOf(FileSystemError);
    });

    it('should refuse invalid JSON', async () => {
      await fs.writeFile(path.join(cacheDir, CACHE_FILE_NAME), '{"movie:Dune:2021": ');

      await expect(store.load()).rejects.toBeInstanceOf(FileSystemError);
    });
  });

  describe('put', () => {
    it('should write the structured shape without the key', async () => {
      await store.load();
      await store.put(dune);

      expect(await readCacheFile(CACHE_FILE_NAME)).toEqual({
        'movie:Dune:2021': {
          externalId: 438631,
          title: 'Dune',
          year: 2021,
          mediaType: 'movie',
          qualityMetrics: {},
          lastUpdated: expect.any(String),
        },
      });
      expect(await fs.readdir(cacheDir)).toEqual([CACHE_FILE_NAME]);
    });

    it('should keep quality already recorded for the key', async () => {
      await store.load();
      await store.updateQuality(dune.key, 'poster', 7.2, dune);

      const entry = await store.put({ ...dune, externalId: 999 });

      expect(entry.externalId).toBe(999);
      expect(entry.qualityMetrics).toEqual({ poster: 7.2 });
    });

    it('should clear a failed marker for the key', async () => {
      await store.load();
      await store.markFailed(dune.key);
      expect(await readCacheFile(FAILED_FILE_NAME)).toEqual({ 'movie:Dune:2021': true });

      await store.put(dune);

      expect(store.isFailed(dune.key)).toBe(false);
      expect(await readCacheFile(FAILED_FILE_NAME)).toEqual({});
    });

    it('should round-trip through a fresh store', async () => {
      await store.load();
      await store.put(dune);
      await store.updateQuality(dune.key, 'background', 6.5, dune);

      const reloaded = new IdentifierCacheStore({ cacheDir });
      await reloaded.load();

      expect(reloaded.get(dune.key)).toMatchObject({ ...dune, qualityMetrics: { background: 6.5 } });
    });
  });

  describe('updateQuality', () => {
    it('should create a missing entry from the base', async () => {
      await store.load();

      const entry = await store.updateQuality('tv:Severance:2022:season1', 'season', 5.1, {
        externalId: 95396,
        title: 'Severance',
        year: 2022,
        mediaType: 'tv_season',
      });

      expect(entry).toMatchObject({
        key: 'tv:Severance:2022:season1',
        externalId: 95396,
        mediaType: 'tv_season',
        qualityMetrics: { season: 5.1 },
      });
      expect(entry.lastUpdated).not.toBe('');
    });
  });

  describe('clearFailed', () => {
    it('should report whether a marker was removed', async () => {
      await store.load();
      await store.markFailed(dune.key);

      expect(await store.clearFailed(dune.key)).toBe(true);
      expect(await store.clearFailed(dune.key)).toBe(false);
    });
  });

  describe('remove', () => {
    it('should return only the keys that existed', async () => {
      await store.load();
      await store.put(dune);
      await store.markFailed('movie:Nope:1999');

      const removed = await store.remove(['movie:Dune:2021', 'movie:Nope:1999', 'movie:Ghost:1990']);

      expect(removed).toEqual({ entries: ['movie:Dune:2021'], failed: ['movie:Nope:1999'] });
      expect(await readCacheFile(CACHE_FILE_NAME)).toEqual({});
      expect(await readCacheFile(FAILED_FILE_NAME)).toEqual({});
    });
  });

  describe('dry run', () => {
    it('should change memory but never touch disk', async () => {
      const dryStore = new IdentifierCacheStore({ cacheDir, dryRun: true });
      await dryStore.load();

      await dryStore.put(dune);
      await dryStore.markFailed('movie:Nope:1999');
      await dryStore.flush();

      expect(dryStore.get(dune.key)?.externalId).toBe(438631);
      expect(await fs.readdir(cacheDir)).toEqual([]);
    });
  });

  describe('decodeCacheValue', () => {
    it('should fill title and year from the key when the value lacks them', () => {
      expect(decodeCacheValue('tv:Severance:2022:season2', { externalId: '95396' })).toEqual({
        key: 'tv:Severance:2022:season2',
        externalId: '95396',
        title: 'Severance',
        year: 2022,
        mediaType: 'tv_season',
        qualityMetrics: {},
        lastUpdated: '',
      });
    });

    it('should ignore unknown quality slots', () => {
      expect(
        decodeCacheValue('movie:Dune:2021', { externalId: 1, qualityMetrics: { poster: 5, banner: 9 } })?.qualityMetrics
      ).toEqual({ poster: 5 });
    });

    it('should reject values with no id', () => {
      expect(decodeCacheValue('movie:Dune:2021', { title: 'Dune' })).toBeNull();
      expect(decodeCacheValue('movie:Dune:2021', '')).toBeNull();
    });
  });
});
