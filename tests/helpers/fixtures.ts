import { QualityPolicy } from '../../src/config/types.js';
import { AssetCandidate } from '../../src/types/models.js';

export const posterPolicy: QualityPolicy = {
  preferredVote: 5,
  relaxedVote: 3.5,
  voteThreshold: 5,
  preferredWidth: 2000,
  preferredHeight: 3000,
  minWidth: 1000,
  minHeight: 1500,
};

export function candidate(overrides: Partial<AssetCandidate> = {}): AssetCandidate {
  return {
    path: '/poster.jpg',
    language: 'en',
    voteAverage: 5.5,
    width: 2000,
    height: 3000,
    ...overrides,
  };
}
