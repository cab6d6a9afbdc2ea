/**
 * Update Candidate Selection
 *
 * @module routedb/selector
 */

import type { CompatibilityMode, UpdateCandidate } from './types.js';

const COMPATIBILITY_PREFERENCE: Record<CompatibilityMode, number> = {
  exactMatch: 1,
  backwardCompatible: 0,
};

/**
 * Pick the best update among `candidates`, or null if none is newer than the
 * current database.
 *
 * Only candidates created strictly after `currentDatasetDate` are considered
 * (all of them when there is no current database). The most recent one wins;
 * on equal dates an exact schema match is preferred, and on a full tie the
 * candidate listed first.
 */
export function selectUpdateCandidate(
  currentDatasetDate: Date | null,
  candidates: readonly UpdateCandidate[]
): UpdateCandidate | null {
  let best: UpdateCandidate | null = null;

  for (const candidate of candidates) {
    if (
      currentDatasetDate !== null &&
      candidate.creationDate.getTime() <= currentDatasetDate.getTime()
    ) {
      continue;
    }
    if (best === null || isBetter(candidate, best)) {
      best = candidate;
    }
  }

  return best;
}

function isBetter(candidate: UpdateCandidate, incumbent: UpdateCandidate): boolean {
  const dateDiff = candidate.creationDate.getTime() - incumbent.creationDate.getTime();
  if (dateDiff !== 0) {
    return dateDiff > 0;
  }
  return (
    COMPATIBILITY_PREFERENCE[candidate.compatibilityMode] >
    COMPATIBILITY_PREFERENCE[incumbent.compatibilityMode]
  );
}
