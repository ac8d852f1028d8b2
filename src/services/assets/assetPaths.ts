import crypto from 'crypto';
import path from 'path';
import { AssetSlot } from '../../config/types.js';

/**
 * File names the asset tree may contain, as minimatch patterns
 */
export const ASSET_FILE_PATTERNS = ['poster.jpg', 'fanart.jpg', 'Season*.jpg'] as const;

/**
 * @example
 * assetFileName('poster') // "poster.jpg"
 * assetFileName('season', 3) // "Season03.jpg"
 */
export function assetFileName(slot: AssetSlot, seasonNumber?: number): string {
  switch (slot) {
    case 'poster':
      return 'poster.jpg';
    case 'background':
      return 'fanart.jpg';
    case 'season':
      return `Season${String(seasonNumber ?? 0).padStart(2, '0')}.jpg`;
  }
}

/**
 * `<assetsRoot>/<library>/<itemDirectory>/<file>`
 */
export function assetPathFor(
  assetsRoot: string,
  libraryName: string,
  itemDirectory: string,
  slot: AssetSlot,
  seasonNumber?: number
): string {
  return path.join(assetsRoot, libraryName, itemDirectory, assetFileName(slot, seasonNumber));
}

/**
 * Directory name an item's assets live under: the last segment of its media
 * directory. The media server may report either separator style.
 *
 * @example
 * itemDirectoryName('/data/movies/Dune (2021)/') // "Dune (2021)"
 * itemDirectoryName('D:\\Movies\\Dune (2021)') // "Dune (2021)"
 */
export function itemDirectoryName(directoryPath: string): string {
  return directoryPath.replace(/[\\/]+$/, '').split(/[\\/]/).pop() ?? '';
}

/**
 * Download target, inside the library's asset folder so the final move stays on one device
 */
export function tempAssetPath(assetsRoot: string, libraryName: string): string {
  return path.join(assetsRoot, libraryName, `temp_${crypto.randomUUID().replace(/-/g, '')}.jpg`);
}
