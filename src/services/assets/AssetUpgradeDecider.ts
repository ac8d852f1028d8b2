/**
 * Asset Upgrade Decider
 *
 * Decides whether a downloaded candidate replaces the asset on disk.
 * First matching rule wins:
 *
 * 1. candidate vote > cached vote                      UPGRADE_VOTES
 * 2. nothing cached and candidate vote >= threshold    UPGRADE_THRESHOLD
 * 3. no file at the asset path                         NO_EXISTING_ASSET
 * 4. local copy wider or taller than the existing file UPGRADE_DIMENSIONS
 *    (local copy missing: NO_IMAGE_FOR_COMPARE, unreadable: ERROR_IMAGE_COMPARE)
 * 5. otherwise                                         NO_UPGRADE_NEEDED
 *
 * Never writes anything.
 */

import fs from 'fs-extra';
import { AssetCandidate } from '../../types/models.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { ImageDimensionReader, ImageDimensions, readImageDimensions } from '../../utils/imageDimensions.js';

export type UpgradeStatus =
  | 'UPGRADE_VOTES'
  | 'UPGRADE_THRESHOLD'
  | 'NO_EXISTING_ASSET'
  | 'UPGRADE_DIMENSIONS'
  | 'NO_IMAGE_FOR_COMPARE'
  | 'ERROR_IMAGE_COMPARE'
  | 'NO_UPGRADE_NEEDED';

export interface UpgradeContext {
  candidateVotes: number;
  cachedVotes: number;
  voteThreshold: number;
  candidateWidth: number;
  candidateHeight: number;
  existingAssetExists?: boolean;
  localCopyExists?: boolean;
  localCopy?: ImageDimensions;
  existing?: ImageDimensions;
  error?: string;
}

export interface UpgradeDecision {
  upgrade: boolean;
  status: UpgradeStatus;
  context: UpgradeContext;
}

export type PathExists = (filePath: string) => Promise<boolean>;

export class AssetUpgradeDecider {
  constructor(
    private readonly readDimensions: ImageDimensionReader = readImageDimensions,
    private readonly pathExists: PathExists = (filePath) => fs.pathExists(filePath)
  ) {}

  async shouldUpgrade(
    existingAssetPath: string,
    candidate: AssetCandidate,
    candidateLocalCopyPath: string | null,
    cachedQuality: number | undefined,
    voteThreshold: number
  ): Promise<UpgradeDecision> {
    const cachedVotes = cachedQuality ?? 0;
    const context: UpgradeContext = {
      candidateVotes: candidate.voteAverage,
      cachedVotes,
      voteThreshold,
      candidateWidth: candidate.width,
      candidateHeight: candidate.height,
    };

    if (candidate.voteAverage > cachedVotes) {
      return { upgrade: true, status: 'UPGRADE_VOTES', context };
    }

    if (cachedVotes === 0 && candidate.voteAverage >= voteThreshold) {
      return { upgrade: true, status: 'UPGRADE_THRESHOLD', context };
    }

    context.existingAssetExists = await this.pathExists(existingAssetPath);
    if (!context.existingAssetExists) {
      return { upgrade: true, status: 'NO_EXISTING_ASSET', context };
    }

    context.localCopyExists = candidateLocalCopyPath !== null && (await this.pathExists(candidateLocalCopyPath));
    if (candidateLocalCopyPath === null || !context.localCopyExists) {
      return { upgrade: false, status: 'NO_IMAGE_FOR_COMPARE', context };
    }

    let localCopy: ImageDimensions;
    let existing: ImageDimensions;
    try {
      localCopy = await this.readDimensions(candidateLocalCopyPath);
      existing = await this.readDimensions(existingAssetPath);
    } catch (error) {
      context.error = getErrorMessage(error);
      return { upgrade: false, status: 'ERROR_IMAGE_COMPARE', context };
    }
    context.localCopy = localCopy;
    context.existing = existing;

    if (localCopy.width > existing.width || localCopy.height > existing.height) {
      return { upgrade: true, status: 'UPGRADE_DIMENSIONS', context };
    }

    return { upgrade: false, status: 'NO_UPGRADE_NEEDED', context };
  }
}
