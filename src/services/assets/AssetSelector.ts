/**
 * Asset Selector
 *
 * Picks one image from the catalog's candidates with tiered fallback, so a
 * title whose images all miss the preferred bar still gets the best usable one:
 *
 * 1. Narrow to the first listed language with a match (else keep everything)
 * 2. preferred vote and preferred size, max by (vote, area)
 * 3. relaxed vote and minimum size, max by (vote, area)
 * 4. minimum size only, max by area
 * 5. max by area
 */

import { QualityPolicy } from '../../config/types.js';
import { AssetCandidate } from '../../types/models.js';
import { logger } from '../../utils/logging.js';

export type SelectionTier = 'preferred' | 'relaxed' | 'minimum_size' | 'largest';

export interface Selection {
  candidate: AssetCandidate;
  tier: SelectionTier;
  language: string | null;
}

function area(candidate: AssetCandidate): number {
  return candidate.width * candidate.height;
}

function byVoteThenArea(a: AssetCandidate, b: AssetCandidate): number {
  return a.voteAverage - b.voteAverage || area(a) - area(b);
}

function byArea(a: AssetCandidate, b: AssetCandidate): number {
  return area(a) - area(b);
}

/**
 * Strictly greater replaces, so ties keep the earliest candidate
 */
function maxBy(
  candidates: readonly AssetCandidate[],
  compare: (a: AssetCandidate, b: AssetCandidate) => number
): AssetCandidate | undefined {
  let best: AssetCandidate | undefined;
  for (const candidate of candidates) {
    if (best === undefined || compare(candidate, best) > 0) {
      best = candidate;
    }
  }
  return best;
}

/**
 * "en-US" and "EN" both become "en"
 */
export function normalizeLanguage(language: string | null): string | null {
  if (!language) {
    return null;
  }
  return language.split('-')[0]?.toLowerCase() ?? null;
}

/**
 * Candidates in the first listed language that has any, or all of them
 */
export function filterByLanguage(
  candidates: readonly AssetCandidate[],
  languages: readonly string[]
): { considered: readonly AssetCandidate[]; language: string | null } {
  for (const wanted of languages.map(normalizeLanguage)) {
    if (wanted === null) {
      continue;
    }
    const matching = candidates.filter((candidate) => normalizeLanguage(candidate.language) === wanted);
    if (matching.length > 0) {
      return { considered: matching, language: wanted };
    }
  }
  return { considered: candidates, language: null };
}

export function selectBestWithTier(
  candidates: readonly AssetCandidate[],
  preferredLanguage: string | null,
  fallbackLanguages: readonly string[],
  policy: QualityPolicy
): Selection | null {
  if (candidates.length === 0) {
    return null;
  }

  const languages = preferredLanguage === null ? [] : [preferredLanguage, ...fallbackLanguages];
  const { considered, language } = filterByLanguage(candidates, languages);

  const tiers: Array<{ tier: SelectionTier; accepts: (c: AssetCandidate) => boolean; compare: typeof byArea }> = [
    {
      tier: 'preferred',
      accepts: (c) =>
        c.voteAverage >= policy.preferredVote && c.width >= policy.preferredWidth && c.height >= policy.preferredHeight,
      compare: byVoteThenArea,
    },
    {
      tier: 'relaxed',
      accepts: (c) => c.voteAverage >= policy.relaxedVote && c.width >= policy.minWidth && c.height >= policy.minHeight,
      compare: byVoteThenArea,
    },
    {
      tier: 'minimum_size',
      accepts: (c) => c.width >= policy.minWidth && c.height >= policy.minHeight,
      compare: byArea,
    },
    {
      tier: 'largest',
      accepts: () => true,
      compare: byArea,
    },
  ];

  for (const { tier, accepts, compare } of tiers) {
    const best = maxBy(considered.filter(accepts), compare);
    if (best) {
      logger.debug('[AssetSelector] Candidate selected', {
        tier,
        language,
        path: best.path,
        voteAverage: best.voteAverage,
        width: best.width,
        height: best.height,
        considered: considered.length,
      });
      return { candidate: best, tier, language };
    }
  }

  return null;
}

/**
 * Best candidate for the policy, or null when there are none.
 * Pass a null language to skip language filtering (backgrounds).
 */
export function selectBest(
  candidates: readonly AssetCandidate[],
  preferredLanguage: string | null,
  fallbackLanguages: readonly string[],
  policy: QualityPolicy
): AssetCandidate | null {
  return selectBestWithTier(candidates, preferredLanguage, fallbackLanguages, policy)?.candidate ?? null;
}
